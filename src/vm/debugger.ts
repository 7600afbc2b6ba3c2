import { BFError, BreakpointError, NameError, RuntimeFault, SessionStateError } from "./errors";
import { Interpreter, InterpreterOptions, StepResult } from "./interpreter";
import { CompiledProgram, Instruction, TapeSnapshot } from "./types";
import { hex, unitAt } from "./util";

export enum RunState {
  Running = "running",
  PausedAtBreakpoint = "paused-at-breakpoint",
  PausedByStep = "paused-by-step",
  Halted = "halted",
  Errored = "errored",
}

/** An instruction index, or the name of a unit. */
export type BreakpointTarget = number | string;

export type DebugResult<T> = { ok: true; value: T } | { ok: false; error: BFError };

export interface Transition {
  state: RunState;
  cursor: number;
  unit: string | null;
  executed: number; // instructions executed by this command
  error: RuntimeFault | null;
}

export interface Inspection {
  state: RunState;
  cursor: number;
  pointer: number;
  cell: number;
  tape: TapeSnapshot;
  instruction: Instruction | null;
  unit: string | null;
  breakpoints: number[];
  error: RuntimeFault | null;
}

function success<T>(value: T): DebugResult<T> {
  return { ok: true, value };
}

function failure<T>(error: BFError): DebugResult<T> {
  return { ok: false, error };
}

/**
 * A debugging session over one compiled program.
 *
 * The session starts paused before the first instruction. Every command is a
 * synchronous call that returns once the machine is stopped again; pausing is
 * simply not calling `step` any more. Usage errors come back as failed results
 * and never change the run-state.
 */
export class Debugger {
  private readonly interpreter: Interpreter;
  private readonly breakpointSet = new Set<number>();
  private runState = RunState.PausedByStep;
  private closed = false;

  constructor(readonly program: CompiledProgram, options: InterpreterOptions = {}) {
    this.interpreter = new Interpreter(program, options);
  }

  get state(): RunState {
    return this.runState;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ========================================================================
  // Execution
  // ========================================================================

  /**
   * Run until a breakpoint is reached, the program halts, or it faults. The
   * breakpoint check happens after each instruction, so resuming from a
   * breakpoint always makes progress.
   */
  continue(): DebugResult<Transition> {
    const blocked = this.requirePaused("continue");
    if (blocked) {
      return failure(blocked);
    }

    this.runState = RunState.Running;
    let executed = 0;
    for (;;) {
      const result = this.interpreter.step();
      if (result.status !== "errored") {
        executed++;
      }
      if (result.status !== "running") {
        return success(this.settle(result, RunState.PausedByStep, executed));
      }
      if (this.breakpointSet.has(result.cursor)) {
        return success(this.settle(result, RunState.PausedAtBreakpoint, executed));
      }
    }
  }

  /** Same transition as `continue`; starting and resuming are one operation. */
  run(): DebugResult<Transition> {
    return this.continue();
  }

  /**
   * Execute exactly one instruction. Breakpoints are not consulted.
   */
  step(): DebugResult<Transition> {
    const blocked = this.requirePaused("step");
    if (blocked) {
      return failure(blocked);
    }

    const result = this.interpreter.step();
    return success(this.settle(result, RunState.PausedByStep, result.status === "errored" ? 0 : 1));
  }

  /**
   * Step until the cursor leaves the unit it started in. Breakpoints are not
   * consulted.
   */
  stepUnit(): DebugResult<Transition> {
    const blocked = this.requirePaused("step over the unit");
    if (blocked) {
      return failure(blocked);
    }

    const startUnit = unitAt(this.program, this.interpreter.instructionPointer);
    this.runState = RunState.Running;
    let executed = 0;
    for (;;) {
      const result = this.interpreter.step();
      if (result.status !== "errored") {
        executed++;
      }
      if (result.status !== "running" || unitAt(this.program, result.cursor) !== startUnit) {
        return success(this.settle(result, RunState.PausedByStep, executed));
      }
    }
  }

  private settle(result: StepResult, pausedAs: RunState, executed: number): Transition {
    let error: RuntimeFault | null = null;
    switch (result.status) {
      case "running":
        this.runState = pausedAs;
        break;
      case "halted":
        this.runState = RunState.Halted;
        break;
      case "errored":
        this.runState = RunState.Errored;
        error = result.error;
        break;
    }
    const unit = unitAt(this.program, result.cursor);
    return { state: this.runState, cursor: result.cursor, unit: unit ? unit.name : null, executed, error };
  }

  // ========================================================================
  // Breakpoints
  // ========================================================================

  /**
   * Resolve a breakpoint target to an instruction index. Unit names resolve
   * to the start of the first unit carrying that name.
   */
  resolveTarget(target: BreakpointTarget): DebugResult<number> {
    if (typeof target === "string") {
      const start = this.program.unitIndex.get(target);
      return start === undefined ? failure(new NameError(target)) : success(start);
    }

    const count = this.program.instructions.length;
    if (!Number.isInteger(target) || target < 0 || target >= count) {
      const range = count === 0 ? "the program is empty" : `expected ${hex(0)}..${hex(count - 1)}`;
      return failure(new BreakpointError(`Breakpoint ${Number.isInteger(target) ? hex(target) : target} is outside the program (${range})`));
    }
    return success(target);
  }

  setBreakpoint(target: BreakpointTarget): DebugResult<number> {
    const blocked = this.requirePaused("set a breakpoint");
    if (blocked) {
      return failure(blocked);
    }
    const resolved = this.resolveTarget(target);
    if (resolved.ok) {
      this.breakpointSet.add(resolved.value);
    }
    return resolved;
  }

  /**
   * Remove a breakpoint. The value is the resolved index and whether a
   * breakpoint was actually set there.
   */
  clearBreakpoint(target: BreakpointTarget): DebugResult<{ index: number; removed: boolean }> {
    const blocked = this.requirePaused("clear a breakpoint");
    if (blocked) {
      return failure(blocked);
    }
    const resolved = this.resolveTarget(target);
    if (!resolved.ok) {
      return resolved;
    }
    return success({ index: resolved.value, removed: this.breakpointSet.delete(resolved.value) });
  }

  breakpoints(): number[] {
    return [...this.breakpointSet].sort((a, b) => a - b);
  }

  // ========================================================================
  // Inspection and teardown
  // ========================================================================

  /**
   * Read-only view of the machine. Valid while paused and after the program
   * halted or faulted, when it shows the state at the moment it stopped.
   */
  inspect(): DebugResult<Inspection> {
    if (this.closed) {
      return failure(new SessionStateError("The debugging session has ended"));
    }
    if (this.runState === RunState.Running) {
      return failure(new SessionStateError("Cannot inspect while the program is running"));
    }

    const cursor = this.interpreter.instructionPointer;
    const unit = unitAt(this.program, cursor);
    return success({
      state: this.runState,
      cursor,
      pointer: this.interpreter.pointer,
      cell: this.interpreter.currentCell(),
      tape: this.interpreter.snapshot(),
      instruction: this.interpreter.currentInstruction(),
      unit: unit ? unit.name : null,
      breakpoints: this.breakpoints(),
      error: this.interpreter.lastError,
    });
  }

  quit(): DebugResult<void> {
    this.closed = true;
    return success(undefined);
  }

  private requirePaused(action: string): SessionStateError | null {
    if (this.closed) {
      return new SessionStateError("The debugging session has ended");
    }
    switch (this.runState) {
      case RunState.Halted:
        return new SessionStateError(`Cannot ${action}: the program has halted`);
      case RunState.Errored:
        return new SessionStateError(`Cannot ${action}: the program stopped with an error`);
      case RunState.Running:
        return new SessionStateError(`Cannot ${action} while the program is running`);
      default:
        return null;
    }
  }
}
