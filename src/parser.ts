import { Token, TokenType, Tokenizer, TokenizerOptions } from "./tokenizer";
import { describeSourceLocation } from "./errors/errors";
import { StructureError } from "./vm/errors";
import {
  IMPLICIT_UNIT_NAME,
  ParsedProgram,
  PrimitiveCommand,
  SourcePosition,
  Unit,
} from "./vm/types";

interface OpenUnit {
  name: string;
  start: number;
  implicit: boolean;
}

export class Parser {
  private readonly commands: PrimitiveCommand[] = [];
  private readonly positions: SourcePosition[] = [];
  private readonly units: Unit[] = [];
  private currentUnit: OpenUnit | null = null;

  constructor(private readonly source: string, private readonly tokens: Token[]) {}

  /**
   * Collect commands and units, rejecting unbalanced loop markers.
   *
   * @throws StructureError pointing at the unmatched ']' or the innermost
   *   unclosed '['
   */
  parse(): ParsedProgram {
    const openLoops: SourcePosition[] = [];

    for (const token of this.tokens) {
      if (token.type === TokenType.UNIT) {
        this.beginUnit(token.lexeme);
        continue;
      }
      if (token.command === null) {
        continue;
      }

      const position: SourcePosition = { offset: token.indexInSource, line: token.line, column: token.col };
      if (token.command === PrimitiveCommand.LoopOpen) {
        openLoops.push(position);
      } else if (token.command === PrimitiveCommand.LoopClose) {
        if (openLoops.pop() === undefined) {
          throw this.structureError("']' has no matching '['", position);
        }
      }
      this.commands.push(token.command);
      this.positions.push(position);
    }

    const unclosed = openLoops[openLoops.length - 1];
    if (unclosed !== undefined) {
      throw this.structureError("'[' has no matching ']'", unclosed);
    }

    this.closeUnit();
    if (this.units.length === 0) {
      this.units.push({ name: IMPLICIT_UNIT_NAME, start: 0, end: this.commands.length, implicit: true });
    }

    return {
      source: this.source,
      commands: this.commands,
      positions: this.positions,
      units: this.units,
    };
  }

  private beginUnit(name: string): void {
    if (this.currentUnit === null && this.commands.length > 0) {
      this.currentUnit = { name: IMPLICIT_UNIT_NAME, start: 0, implicit: true };
    }
    this.closeUnit();
    this.currentUnit = { name, start: this.commands.length, implicit: false };
  }

  private closeUnit(): void {
    if (this.currentUnit !== null) {
      this.units.push({ ...this.currentUnit, end: this.commands.length });
      this.currentUnit = null;
    }
  }

  private structureError(message: string, position: SourcePosition): StructureError {
    return new StructureError(message, position, describeSourceLocation(this.source, position.offset, position.column));
  }
}

/**
 * Tokenize and parse in one go.
 */
export function parseProgram(source: string, options: TokenizerOptions = {}): ParsedProgram {
  const tokens = new Tokenizer(source, options).scanEverything();
  return new Parser(source, tokens).parse();
}
