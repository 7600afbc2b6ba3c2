import { parseProgram } from "../parser";
import { TokenizerOptions } from "../tokenizer";
import { execute, ExecutionResult, MachineState } from "../vm/interpreter";
import { BufferInput, BufferOutput } from "../vm/io";
import { MachineConfig } from "../vm/config";
import { optimize } from "../vm/optimizer";
import { CompiledProgram } from "../vm/types";

export interface IOptions extends Partial<MachineConfig>, TokenizerOptions {
  maxSteps?: number;
  debug?: boolean;
  onDumpState?: (state: MachineState) => void;
}

/**
 * Parse and optimize source text.
 */
export function compileSource(code: string, options: TokenizerOptions & { debug?: boolean } = {}): CompiledProgram {
  const parsed = parseProgram(code, options);
  return optimize(parsed, { debug: options.debug });
}

/**
 * Compile and run a program against an in-memory input, capturing its output.
 */
export function runInContext(
  code: string,
  input: Uint8Array | string = new Uint8Array(0),
  options: IOptions = {}
): { result: ExecutionResult; stdout: Uint8Array } {
  const program = compileSource(code, options);
  const output = new BufferOutput();
  const result = execute(
    program,
    {
      tapeSize: options.tapeSize,
      eofBehavior: options.eofBehavior,
      pointerBoundaryPolicy: options.pointerBoundaryPolicy,
      maxSteps: options.maxSteps,
      debug: options.debug,
    },
    { input: new BufferInput(input), output, onDumpState: options.onDumpState }
  );
  return { result, stdout: output.toBytes() };
}
