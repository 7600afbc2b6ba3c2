import OpCodes from "./opcodes";
import { EofBehavior, MachineConfig, resolveMachineConfig } from "./config";
import { ExecutionLimitError, InputExhaustedError, RuntimeFault } from "./errors";
import { ByteInput, ByteOutput, EMPTY_INPUT } from "./io";
import { Tape } from "./tape";
import { CompiledProgram, Instruction, TapeSnapshot } from "./types";
import { formatInstruction, hex } from "./util";

/**
 * Tape interpreter for the optimized instruction stream.
 *
 * Execution is driven one instruction at a time through `step()`; `run()` is
 * just `step()` in a loop. A fatal fault stops the machine where it stood: the
 * cursor stays on the failing instruction and the tape is left as executing
 * the original commands one at a time would have left it, so both can be
 * inspected afterwards.
 */

export type ExecutionStatus = "running" | "halted" | "errored";

export type StepResult =
  | { status: "running"; cursor: number }
  | { status: "halted"; cursor: number }
  | { status: "errored"; cursor: number; error: RuntimeFault };

export interface MachineState {
  tape: TapeSnapshot;
  cursor: number;
  executedSteps: number;
}

export interface InterpreterOptions extends Partial<MachineConfig> {
  input?: ByteInput;
  output?: ByteOutput;
  /** Called by '#' instructions. */
  onDumpState?: (state: MachineState) => void;
  /** Fault with ExecutionLimitError after this many instructions. */
  maxSteps?: number;
  debug?: boolean;
}

const DISCARD_OUTPUT: ByteOutput = { writeByte: () => undefined };

export class Interpreter {
  readonly config: MachineConfig;
  private readonly tape: Tape;
  private readonly instructions: readonly Instruction[];
  private readonly input: ByteInput;
  private readonly output: ByteOutput;
  private readonly onDumpState?: (state: MachineState) => void;
  private readonly maxSteps: number | null;
  private readonly debugMode: boolean;

  private cursor = 0;
  private steps = 0;
  private fault: RuntimeFault | null = null;

  constructor(readonly program: CompiledProgram, options: InterpreterOptions = {}) {
    this.config = resolveMachineConfig({
      tapeSize: options.tapeSize,
      eofBehavior: options.eofBehavior,
      pointerBoundaryPolicy: options.pointerBoundaryPolicy,
    });
    this.tape = new Tape(this.config.tapeSize, this.config.pointerBoundaryPolicy);
    this.instructions = program.instructions;
    this.input = options.input ?? EMPTY_INPUT;
    this.output = options.output ?? DISCARD_OUTPUT;
    this.onDumpState = options.onDumpState;
    this.maxSteps = options.maxSteps ?? null;
    this.debugMode = options.debug ?? false;

    if (this.maxSteps !== null && (!Number.isInteger(this.maxSteps) || this.maxSteps < 0)) {
      throw new RangeError(`maxSteps must be a non-negative integer, got ${this.maxSteps}`);
    }
  }

  /**
   * Debug logging helper
   */
  private debug(message: string): void {
    if (this.debugMode) {
      console.error(`[DEBUG] ${message}`);
    }
  }

  // ========================================================================
  // Introspection
  // ========================================================================

  get instructionPointer(): number {
    return this.cursor;
  }

  get pointer(): number {
    return this.tape.pointer;
  }

  get executedSteps(): number {
    return this.steps;
  }

  get status(): ExecutionStatus {
    if (this.fault !== null) {
      return "errored";
    }
    return this.cursor >= this.instructions.length ? "halted" : "running";
  }

  get lastError(): RuntimeFault | null {
    return this.fault;
  }

  currentInstruction(): Instruction | null {
    return this.cursor < this.instructions.length ? this.instructions[this.cursor] : null;
  }

  currentCell(): number {
    return this.tape.readCurrentCell();
  }

  snapshot(): TapeSnapshot {
    return this.tape.snapshot();
  }

  state(): MachineState {
    return { tape: this.tape.snapshot(), cursor: this.cursor, executedSteps: this.steps };
  }

  // ========================================================================
  // Execution
  // ========================================================================

  /**
   * Execute exactly one instruction. Once the machine has halted or faulted
   * this keeps returning that result without doing anything.
   */
  step(): StepResult {
    if (this.fault !== null) {
      return { status: "errored", cursor: this.cursor, error: this.fault };
    }
    if (this.cursor >= this.instructions.length) {
      return { status: "halted", cursor: this.cursor };
    }

    const index = this.cursor;
    try {
      if (this.maxSteps !== null && this.steps >= this.maxSteps) {
        throw new ExecutionLimitError(this.maxSteps);
      }
      this.cursor = this.executeInstruction(this.instructions[index], index);
    } catch (e) {
      if (e instanceof RuntimeFault) {
        this.fault = e.locate(index);
        this.debug(`Fault at ${hex(index)}: ${e.message}`);
        return { status: "errored", cursor: this.cursor, error: this.fault };
      }
      throw e;
    }
    this.steps++;

    return this.cursor >= this.instructions.length
      ? { status: "halted", cursor: this.cursor }
      : { status: "running", cursor: this.cursor };
  }

  /**
   * Step until the program halts or faults.
   */
  run(): StepResult {
    let result = this.step();
    while (result.status === "running") {
      result = this.step();
    }
    return result;
  }

  /**
   * Execute one instruction and return the next cursor.
   */
  private executeInstruction(instruction: Instruction, index: number): number {
    if (this.debugMode) {
      this.debug(
        `IP=${hex(index)} | ${formatInstruction(instruction)} | TP=${hex(this.tape.pointer)} cell=${this.tape.readCurrentCell()}`
      );
    }

    switch (instruction.opcode) {
      case OpCodes.ADJ:
        this.tape.adjustCurrentCell(instruction.delta);
        return index + 1;

      case OpCodes.MOV:
        this.tape.movePointer(instruction.delta);
        return index + 1;

      case OpCodes.JZ:
        return this.tape.readCurrentCell() === 0 ? instruction.target + 1 : index + 1;

      case OpCodes.JNZ:
        return this.tape.readCurrentCell() !== 0 ? instruction.target + 1 : index + 1;

      case OpCodes.IN:
        this.readInput();
        return index + 1;

      case OpCodes.OUT:
        this.output.writeByte(this.tape.readCurrentCell());
        return index + 1;

      case OpCodes.DUMP:
        this.onDumpState?.(this.state());
        return index + 1;
    }
  }

  private readInput(): void {
    const byte = this.input.readByte();
    if (byte !== null) {
      this.tape.writeCurrentCell(byte);
      return;
    }

    switch (this.config.eofBehavior) {
      case EofBehavior.WriteZero:
        this.tape.writeCurrentCell(0);
        break;
      case EofBehavior.WriteMinusOne:
        this.tape.writeCurrentCell(255);
        break;
      case EofBehavior.LeaveUnchanged:
        break;
      case EofBehavior.FatalError:
        throw new InputExhaustedError();
    }
  }
}

// ========================================================================
// Plain run
// ========================================================================

export type ExecutionResult =
  | { ok: true; tape: TapeSnapshot; steps: number }
  | { ok: false; error: RuntimeFault; tape: TapeSnapshot; steps: number };

export interface ExecutionIO {
  input?: ByteInput;
  output?: ByteOutput;
  onDumpState?: (state: MachineState) => void;
}

/**
 * Run a program to completion on a fresh tape. Runtime faults come back as a
 * result carrying the tape at the moment of failure; they are not thrown.
 */
export function execute(
  program: CompiledProgram,
  config: Partial<MachineConfig> & { maxSteps?: number; debug?: boolean } = {},
  io: ExecutionIO = {}
): ExecutionResult {
  const interpreter = new Interpreter(program, { ...config, ...io });
  const result = interpreter.run();
  const tape = interpreter.snapshot();
  const steps = interpreter.executedSteps;

  if (result.status === "errored") {
    return { ok: false, error: result.error, tape, steps };
  }
  return { ok: true, tape, steps };
}
