import { parseProgram } from "../parser";
import { TokenizerOptions } from "../tokenizer";
import { BoundaryPolicy } from "../vm/config";
import { BoundaryError } from "../vm/errors";
import { optimize } from "../vm/optimizer";
import { Tape } from "../vm/tape";
import { CompiledProgram, PrimitiveCommand } from "../vm/types";

export function compile(code: string, options: TokenizerOptions = {}): CompiledProgram {
  return optimize(parseProgram(code, options));
}

export interface ReferenceRun {
  cells: number[];
  pointer: number;
  output: number[];
  error: BoundaryError | null;
}

function pairBrackets(commands: readonly PrimitiveCommand[]): number[] {
  const partner: number[] = [];
  const open: number[] = [];
  commands.forEach((command, index) => {
    if (command === PrimitiveCommand.LoopOpen) {
      open.push(index);
    } else if (command === PrimitiveCommand.LoopClose) {
      const start = open.pop();
      if (start === undefined) {
        throw new Error("unbalanced reference program");
      }
      partner[start] = index;
      partner[index] = start;
    }
  });
  return partner;
}

/**
 * Executes an unoptimized command list one command at a time, stopping at the
 * first boundary fault. EOF leaves the cell unchanged.
 */
export function runReference(
  commands: readonly PrimitiveCommand[],
  input: readonly number[] = [],
  tapeSize = 64,
  policy: BoundaryPolicy = BoundaryPolicy.Error
): ReferenceRun {
  const tape = new Tape(tapeSize, policy);
  const partner = pairBrackets(commands);
  const output: number[] = [];
  let nextInput = 0;
  let error: BoundaryError | null = null;

  try {
    for (let pc = 0; pc < commands.length; pc++) {
      switch (commands[pc]) {
        case PrimitiveCommand.IncrementCell:
          tape.adjustCurrentCell(1);
          break;
        case PrimitiveCommand.DecrementCell:
          tape.adjustCurrentCell(-1);
          break;
        case PrimitiveCommand.ShiftRight:
          tape.movePointer(1);
          break;
        case PrimitiveCommand.ShiftLeft:
          tape.movePointer(-1);
          break;
        case PrimitiveCommand.LoopOpen:
          if (tape.readCurrentCell() === 0) {
            pc = partner[pc];
          }
          break;
        case PrimitiveCommand.LoopClose:
          if (tape.readCurrentCell() !== 0) {
            pc = partner[pc];
          }
          break;
        case PrimitiveCommand.ReadByte:
          if (nextInput < input.length) {
            tape.writeCurrentCell(input[nextInput++]);
          }
          break;
        case PrimitiveCommand.WriteByte:
          output.push(tape.readCurrentCell());
          break;
        case PrimitiveCommand.DumpState:
          break;
      }
    }
  } catch (e) {
    if (!(e instanceof BoundaryError)) {
      throw e;
    }
    error = e;
  }

  const snapshot = tape.snapshot();
  return { cells: Array.from(snapshot.cells), pointer: snapshot.pointer, output, error };
}
