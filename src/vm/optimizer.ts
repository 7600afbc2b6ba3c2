import OpCodes from "./opcodes";
import { StructureError } from "./errors";
import { describeSourceLocation } from "../errors/errors";
import {
  CompiledProgram,
  IMPLICIT_UNIT_NAME,
  Instruction,
  ParsedProgram,
  PrimitiveCommand,
  SourcePosition,
} from "./types";

export interface OptimizerOptions {
  debug?: boolean;
}

type RunFamily = OpCodes.ADJ | OpCodes.MOV;

function runFamily(command: PrimitiveCommand): RunFamily | null {
  switch (command) {
    case PrimitiveCommand.IncrementCell:
    case PrimitiveCommand.DecrementCell:
      return OpCodes.ADJ;
    case PrimitiveCommand.ShiftRight:
    case PrimitiveCommand.ShiftLeft:
      return OpCodes.MOV;
    default:
      return null;
  }
}

function runStep(command: PrimitiveCommand): number {
  return command === PrimitiveCommand.IncrementCell || command === PrimitiveCommand.ShiftRight ? 1 : -1;
}

// Cell runs may mix + and -; pointer runs keep one direction so that the
// boundary policy sees the same walk as one-by-one execution.
function continuesRun(first: PrimitiveCommand, next: PrimitiveCommand): boolean {
  const family = runFamily(first);
  return family !== null && runFamily(next) === family && (family === OpCodes.ADJ || next === first);
}

// A cell delta that is a multiple of 256 leaves the cell as it was.
function isNoop(family: RunFamily, delta: number): boolean {
  return family === OpCodes.ADJ && delta % 256 === 0;
}

/**
 * Rewrites a parsed command list into the instruction stream the interpreter
 * runs: runs of +/- and of one pointer direction are coalesced into counted
 * instructions (never across a unit boundary), cell runs that wrap back to
 * where they started are dropped, every loop instruction learns the index of
 * its partner, and units are remapped onto instruction indices.
 */
export class Optimizer {
  private readonly instructions: Instruction[] = [];
  private readonly origins: number[] = [];

  constructor(private readonly program: ParsedProgram, private readonly options: OptimizerOptions = {}) {}

  optimize(): CompiledProgram {
    const { commands, units } = this.program;
    const unitStarts = new Set(units.map(unit => unit.start));
    // command index -> index of the first instruction emitted at or after it
    const remap: number[] = new Array(commands.length + 1);

    let i = 0;
    // whether the next run may fold into the last instruction, which happens
    // when only dropped runs lie between them
    let mergeable = false;
    while (i < commands.length) {
      const family = runFamily(commands[i]);
      if (family === null) {
        remap[i] = this.instructions.length;
        this.emit(this.single(commands[i]), i);
        mergeable = false;
        i++;
        continue;
      }

      const runStart = i;
      const runIndices: number[] = [];
      let delta = 0;
      do {
        runIndices.push(i);
        delta += runStep(commands[i]);
        i++;
      } while (i < commands.length && continuesRun(commands[runStart], commands[i]) && !unitStarts.has(i));

      if (unitStarts.has(runStart)) {
        mergeable = false;
      }
      if (isNoop(family, delta)) {
        runIndices.forEach(index => (remap[index] = this.instructions.length));
        continue;
      }

      const last = this.instructions.length - 1;
      const previous = this.instructions[last];
      if (mergeable && previous.opcode === family && "delta" in previous && Math.sign(previous.delta) === Math.sign(delta)) {
        this.instructions[last] = { opcode: family, delta: previous.delta + delta };
        runIndices.forEach(index => (remap[index] = last));
        continue;
      }

      runIndices.forEach(index => (remap[index] = this.instructions.length));
      this.emit({ opcode: family, delta }, runStart);
      mergeable = true;
    }
    remap[commands.length] = this.instructions.length;

    const instructions = resolveLoops(
      this.instructions,
      index => this.positionOf(this.origins[index]),
      this.program.source
    );
    const remappedUnits = units.map(unit =>
      Object.freeze({ ...unit, start: remap[unit.start], end: remap[unit.end] })
    );

    const unitIndex = new Map<string, number>();
    for (const unit of remappedUnits) {
      if (!unit.implicit && !unitIndex.has(unit.name)) {
        unitIndex.set(unit.name, unit.start);
      }
    }

    if (this.options.debug) {
      console.error(
        `[DEBUG] Optimized ${commands.length} commands into ${instructions.length} instructions across ${units.length} unit(s)`
      );
    }

    return Object.freeze({
      instructions: Object.freeze(instructions),
      units: Object.freeze(remappedUnits),
      unitIndex,
      origins: Object.freeze([...this.origins]),
      positions: this.program.positions,
    });
  }

  private single(command: PrimitiveCommand): Instruction {
    switch (command) {
      case PrimitiveCommand.LoopOpen:
        return { opcode: OpCodes.JZ, target: -1 };
      case PrimitiveCommand.LoopClose:
        return { opcode: OpCodes.JNZ, target: -1 };
      case PrimitiveCommand.ReadByte:
        return { opcode: OpCodes.IN };
      case PrimitiveCommand.WriteByte:
        return { opcode: OpCodes.OUT };
      case PrimitiveCommand.DumpState:
        return { opcode: OpCodes.DUMP };
      default:
        throw new Error(`Command '${command}' is part of a run`);
    }
  }

  private emit(instruction: Instruction, origin: number): void {
    this.instructions.push(instruction);
    this.origins.push(origin);
  }

  private positionOf(commandIndex: number): SourcePosition | null {
    const { positions } = this.program;
    return commandIndex < positions.length ? positions[commandIndex] : null;
  }
}

/**
 * Pair every JZ with its JNZ using an explicit stack, returning a new stream
 * of frozen instructions. Existing targets are ignored and recomputed.
 *
 * @throws StructureError on an unmatched loop instruction
 */
export function resolveLoops(
  instructions: readonly Instruction[],
  locate: (index: number) => SourcePosition | null = () => null,
  source = ""
): Instruction[] {
  const resolved: Instruction[] = [...instructions];
  const open: number[] = [];

  const fail = (message: string, index: number): StructureError => {
    const position = locate(index);
    const excerpt = position && source ? describeSourceLocation(source, position.offset, position.column) : null;
    return new StructureError(`${message} (instruction ${index})`, position, excerpt);
  };

  resolved.forEach((instruction, index) => {
    if (instruction.opcode === OpCodes.JZ) {
      open.push(index);
    } else if (instruction.opcode === OpCodes.JNZ) {
      const start = open.pop();
      if (start === undefined) {
        throw fail("']' has no matching '['", index);
      }
      resolved[start] = { opcode: OpCodes.JZ, target: index };
      resolved[index] = { opcode: OpCodes.JNZ, target: start };
    }
  });

  const unclosed = open[open.length - 1];
  if (unclosed !== undefined) {
    throw fail("'[' has no matching ']'", unclosed);
  }

  return resolved.map(instruction => Object.freeze(instruction));
}

/**
 * Optimize a parsed program.
 */
export function optimize(program: ParsedProgram, options: OptimizerOptions = {}): CompiledProgram {
  return new Optimizer(program, options).optimize();
}

/**
 * Optimize a bare command list that did not come through the parser. The
 * whole list forms one implicit unit.
 */
export function optimizeCommands(commands: readonly PrimitiveCommand[]): CompiledProgram {
  return optimize({
    source: "",
    commands,
    positions: [],
    units: [{ name: IMPLICIT_UNIT_NAME, start: 0, end: commands.length, implicit: true }],
  });
}

/**
 * Re-derive a primitive command list with the same behaviour as an
 * instruction stream.
 */
export function expandInstructions(instructions: readonly Instruction[]): PrimitiveCommand[] {
  const commands: PrimitiveCommand[] = [];
  const repeat = (command: PrimitiveCommand, count: number) => {
    for (let n = 0; n < count; n++) {
      commands.push(command);
    }
  };

  for (const instruction of instructions) {
    switch (instruction.opcode) {
      case OpCodes.ADJ:
        repeat(instruction.delta > 0 ? PrimitiveCommand.IncrementCell : PrimitiveCommand.DecrementCell, Math.abs(instruction.delta));
        break;
      case OpCodes.MOV:
        repeat(instruction.delta > 0 ? PrimitiveCommand.ShiftRight : PrimitiveCommand.ShiftLeft, Math.abs(instruction.delta));
        break;
      case OpCodes.JZ:
        commands.push(PrimitiveCommand.LoopOpen);
        break;
      case OpCodes.JNZ:
        commands.push(PrimitiveCommand.LoopClose);
        break;
      case OpCodes.IN:
        commands.push(PrimitiveCommand.ReadByte);
        break;
      case OpCodes.OUT:
        commands.push(PrimitiveCommand.WriteByte);
        break;
      case OpCodes.DUMP:
        commands.push(PrimitiveCommand.DumpState);
        break;
    }
  }

  return commands;
}
