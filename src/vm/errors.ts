import { SourcePosition } from "./types";

export class BFError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Unbalanced loop markers. Raised by the parser, and by the optimizer when it
 * is handed a command stream that was never parsed.
 */
export class StructureError extends BFError {
  constructor(
    message: string,
    public readonly position: SourcePosition | null = null,
    public readonly excerpt: string | null = null
  ) {
    const where = position ? ` at line ${position.line}, column ${position.column}` : "";
    super(`${message}${where}${excerpt ? `\n${excerpt}` : ""}`);
  }
}

export class ConfigError extends BFError {}

// ========================================================================
// Runtime faults
// ========================================================================

/**
 * Base for errors that halt an execution. The interpreter stamps the index of
 * the instruction that was executing when the fault was raised.
 */
export class RuntimeFault extends BFError {
  private index: number | null = null;

  get instructionIndex(): number | null {
    return this.index;
  }

  locate(instructionIndex: number): this {
    if (this.index === null) {
      this.index = instructionIndex;
    }
    return this;
  }
}

export class BoundaryError extends RuntimeFault {
  constructor(
    public readonly attemptedPointer: number,
    public readonly tapeSize: number
  ) {
    super(`Pointer moved outside of the tape: ${attemptedPointer} is not in [0, ${tapeSize})`);
  }
}

export class InputExhaustedError extends RuntimeFault {
  constructor() {
    super("Tried to read past the end of input");
  }
}

export class ExecutionLimitError extends RuntimeFault {
  constructor(public readonly limit: number) {
    super(`Exceeded maximum step limit (${limit})`);
  }
}

// ========================================================================
// Debugger usage errors (never change run-state)
// ========================================================================

export class NameError extends BFError {
  constructor(public readonly unitName: string) {
    super(`No unit named '${unitName}'`);
  }
}

export class BreakpointError extends BFError {}

export class SessionStateError extends BFError {}
