import OpCodes from "./opcodes";

/**
 * Commands as they appear in source, one per command character.
 */
export enum PrimitiveCommand {
  IncrementCell = "+",
  DecrementCell = "-",
  ShiftRight = ">",
  ShiftLeft = "<",
  LoopOpen = "[",
  LoopClose = "]",
  ReadByte = ",",
  WriteByte = ".",
  DumpState = "#",
}

export interface SourcePosition {
  offset: number; // character offset into the source
  line: number; // 1-based
  column: number; // 1-based
}

/**
 * A named, contiguous range [start, end) of commands or instructions,
 * depending on which stage produced it.
 */
export interface Unit {
  readonly name: string;
  readonly start: number;
  readonly end: number;
  readonly implicit: boolean; // commands before the first marker
}

export const IMPLICIT_UNIT_NAME = "(no unit)";

export interface ParsedProgram {
  readonly source: string;
  readonly commands: readonly PrimitiveCommand[];
  readonly positions: readonly SourcePosition[];
  readonly units: readonly Unit[];
}

export type Instruction =
  | { readonly opcode: OpCodes.ADJ; readonly delta: number }
  | { readonly opcode: OpCodes.MOV; readonly delta: number }
  | { readonly opcode: OpCodes.JZ; readonly target: number } // index of the matching JNZ
  | { readonly opcode: OpCodes.JNZ; readonly target: number } // index of the matching JZ
  | { readonly opcode: OpCodes.IN }
  | { readonly opcode: OpCodes.OUT }
  | { readonly opcode: OpCodes.DUMP };

/**
 * The optimizer's output. Immutable once built; any number of executions may
 * share one instance.
 */
export interface CompiledProgram {
  readonly instructions: readonly Instruction[];
  readonly units: readonly Unit[]; // in instruction-index space
  readonly unitIndex: ReadonlyMap<string, number>; // unit name -> start instruction
  readonly origins: readonly number[]; // instruction -> first primitive command it came from
  readonly positions: readonly SourcePosition[]; // primitive command -> source position
}

export interface TapeSnapshot {
  readonly cells: Uint8Array;
  readonly pointer: number;
}
