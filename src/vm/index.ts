// Optimizer
export { Optimizer, optimize, optimizeCommands, resolveLoops, expandInstructions, OptimizerOptions } from "./optimizer";

// Machine
export { Tape } from "./tape";
export {
  Interpreter,
  InterpreterOptions,
  ExecutionStatus,
  StepResult,
  MachineState,
  ExecutionResult,
  ExecutionIO,
  execute,
} from "./interpreter";
export { ByteInput, ByteOutput, BufferInput, BufferOutput, EMPTY_INPUT } from "./io";
export {
  MachineConfig,
  EofBehavior,
  BoundaryPolicy,
  DEFAULT_MACHINE_CONFIG,
  resolveMachineConfig,
  parseEofBehavior,
  parseBoundaryPolicy,
  parseTapeSize,
} from "./config";

// Debugger
export { Debugger, RunState, BreakpointTarget, DebugResult, Transition, Inspection } from "./debugger";

// Types
export {
  PrimitiveCommand,
  SourcePosition,
  Unit,
  ParsedProgram,
  Instruction,
  CompiledProgram,
  TapeSnapshot,
  IMPLICIT_UNIT_NAME,
} from "./types";

// Opcodes
export { default as OpCodes } from "./opcodes";

// Rendering
export { formatInstruction, stringifyProgram, programSection, hexdumpTape, formatContext, unitAt, hex } from "./util";

export * from "./errors";
