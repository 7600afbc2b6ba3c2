export { Tokenizer, Token, TokenType, TokenizerOptions, DEFAULT_UNIT_MARKER } from "./tokenizer";
export { Parser, parseProgram } from "./parser";
export { compileSource, runInContext, IOptions } from "./runner/bfRunner";
export { DebugCommandProcessor, DebugResponse, describeTransition, parseBreakpointTarget, HELP_TEXT } from "./debugger/protocol";
export * from "./vm";
