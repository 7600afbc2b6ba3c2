import OpCodes from "./opcodes";
import { CompiledProgram, Instruction, TapeSnapshot, Unit } from "./types";

export type Highlighter = (text: string) => string;

const plain: Highlighter = text => text;

export function hex(value: number, digits = 1): string {
  return `0x${value.toString(16).padStart(digits, "0")}`;
}

export function formatInstruction(instruction: Instruction): string {
  switch (instruction.opcode) {
    case OpCodes.ADJ:
      return instruction.delta > 0 ? `+${instruction.delta}` : `-${-instruction.delta}`;
    case OpCodes.MOV:
      return instruction.delta > 0 ? `>${instruction.delta}` : `<${-instruction.delta}`;
    case OpCodes.JZ:
      return `[ -> ${hex(instruction.target)}`;
    case OpCodes.JNZ:
      return `] -> ${hex(instruction.target)}`;
    case OpCodes.IN:
      return ",";
    case OpCodes.OUT:
      return ".";
    case OpCodes.DUMP:
      return "#";
  }
}

/**
 * The unit whose range contains an instruction index, or null when the index
 * lies past the last instruction.
 */
export function unitAt(program: CompiledProgram, index: number): Unit | null {
  for (const unit of program.units) {
    if (unit.start <= index && index < unit.end) {
      return unit;
    }
  }
  return null;
}

export interface ProgramListingOptions {
  cursor?: number;
  breakpoints?: ReadonlySet<number>;
}

/**
 * One line per instruction, grouped under a `[unit]` header. The two-character
 * gutter marks the cursor with `>` and breakpoints with `*`; loop bodies are
 * indented two spaces per nesting level.
 */
export function stringifyProgram(program: CompiledProgram, options: ProgramListingOptions = {}): string {
  const { instructions } = program;
  const digits = Math.max(1, Math.max(instructions.length - 1, 0).toString(16).length);
  const breakpoints = options.breakpoints ?? new Set<number>();
  const lines: string[] = [];
  let depth = 0;

  for (const unit of program.units) {
    lines.push(`[${unit.name}]`);
    for (let i = unit.start; i < unit.end; i++) {
      const instruction = instructions[i];
      if (instruction.opcode === OpCodes.JNZ) {
        depth = Math.max(0, depth - 1);
      }
      const gutter = `${options.cursor === i ? ">" : " "}${breakpoints.has(i) ? "*" : " "}`;
      lines.push(`${gutter} ${hex(i, digits)}  ${"  ".repeat(depth)}${formatInstruction(instruction)}`);
      if (instruction.opcode === OpCodes.JZ) {
        depth++;
      }
    }
  }

  if (options.cursor !== undefined && options.cursor >= instructions.length) {
    lines.push(`>  ${hex(instructions.length, digits)}  (end)`);
  }

  return lines.join("\n");
}

/**
 * The listing lines around the cursor: `before` lines above it and `after`
 * below.
 */
export function programSection(
  program: CompiledProgram,
  options: ProgramListingOptions & { before?: number; after?: number } = {}
): string {
  const lines = stringifyProgram(program, options).split("\n");
  const at = lines.findIndex(line => line.startsWith(">"));
  if (at < 0) {
    return lines.slice(0, (options.after ?? 5) + 1).join("\n");
  }
  const from = Math.max(0, at - (options.before ?? 5));
  return lines.slice(from, at + (options.after ?? 5) + 1).join("\n");
}

const BYTES_PER_LINE = 16;
const HEX_COLUMN_WIDTH = BYTES_PER_LINE * 3; // "xx " per byte plus the mid-line gap, minus the last space

function printable(byte: number): string {
  return byte >= 0x20 && byte < 0x7f ? String.fromCharCode(byte) : ".";
}

export interface HexdumpOptions {
  highlight?: Highlighter; // applied to the pointer cell
}

/**
 * Canonical hexdump of the tape. A run of more than one all-zero line is shown
 * as its first line followed by `....`; the line holding the pointer is
 * always shown.
 */
export function hexdumpTape(snapshot: TapeSnapshot, options: HexdumpOptions = {}): string {
  const highlight = options.highlight ?? plain;
  const { cells, pointer } = snapshot;
  const digits = Math.max(1, Math.max(cells.length - 1, 0).toString(16).length);
  const lines: string[] = [];
  let zeroLines = 0;

  for (let start = 0; start < cells.length; start += BYTES_PER_LINE) {
    const row = cells.subarray(start, start + BYTES_PER_LINE);
    const holdsPointer = pointer >= start && pointer < start + row.length;

    if (!holdsPointer && row.every(byte => byte === 0)) {
      zeroLines++;
      if (zeroLines === 2) {
        lines.push("....");
      }
      if (zeroLines >= 2) {
        continue;
      }
    } else {
      zeroLines = 0;
    }

    let hexColumn = "";
    let rawWidth = 0;
    let ascii = "";
    row.forEach((byte, i) => {
      const separator = i === 0 ? "" : i === BYTES_PER_LINE / 2 ? "  " : " ";
      const text = byte.toString(16).padStart(2, "0");
      const isPointer = start + i === pointer;
      hexColumn += separator + (isPointer ? highlight(text) : text);
      rawWidth += separator.length + text.length;
      ascii += isPointer ? highlight(printable(byte)) : printable(byte);
    });

    lines.push(`${hex(start, digits)}  ${hexColumn}${" ".repeat(HEX_COLUMN_WIDTH - rawWidth)}  |${ascii}|`);
  }

  return lines.join("\n");
}

export interface ContextView {
  program: CompiledProgram;
  tape: TapeSnapshot;
  cursor: number;
  breakpoints: ReadonlySet<number>;
  state: string;
}

export interface ContextStyle {
  heading?: Highlighter;
  highlight?: Highlighter;
}

/**
 * Tape, the program around the cursor and the registers, in one block.
 */
export function formatContext(view: ContextView, style: ContextStyle = {}): string {
  const heading = style.heading ?? plain;
  const unit = unitAt(view.program, view.cursor);
  return [
    heading("Tape:"),
    hexdumpTape(view.tape, { highlight: style.highlight }),
    "",
    heading("Program:"),
    programSection(view.program, { cursor: view.cursor, breakpoints: view.breakpoints }),
    "",
    heading("Registers:"),
    `PC: ${hex(view.cursor)}`,
    `TP: ${hex(view.tape.pointer)}`,
    `Current Unit: ${unit ? unit.name : "(none)"}`,
    `State: ${view.state}`,
  ].join("\n");
}
