import { PrimitiveCommand } from "./vm/types";

export enum TokenType {
  COMMAND = "COMMAND",
  UNIT = "UNIT",
}

export interface TokenizerOptions {
  /** Treat '#' as a DumpState command instead of a comment. */
  allowDumpState?: boolean;
  /** First non-whitespace character of a line that opens a unit. */
  unitMarker?: string;
}

export const DEFAULT_UNIT_MARKER = ";";

const COMMAND_CHARS: ReadonlyMap<string, PrimitiveCommand> = new Map([
  ["+", PrimitiveCommand.IncrementCell],
  ["-", PrimitiveCommand.DecrementCell],
  [">", PrimitiveCommand.ShiftRight],
  ["<", PrimitiveCommand.ShiftLeft],
  ["[", PrimitiveCommand.LoopOpen],
  ["]", PrimitiveCommand.LoopClose],
  [",", PrimitiveCommand.ReadByte],
  [".", PrimitiveCommand.WriteByte],
]);

export class Token {
  constructor(
    public readonly type: TokenType,
    public readonly lexeme: string, // command character, or the unit name
    public readonly line: number,
    public readonly col: number,
    public readonly indexInSource: number,
    public readonly command: PrimitiveCommand | null = null
  ) {}
}

/**
 * Splits source text into command and unit tokens. Every character that is
 * not a command is a comment, except on marker lines, whose remainder names a
 * unit and contributes no commands.
 */
export class Tokenizer {
  private readonly allowDumpState: boolean;
  private readonly unitMarker: string;

  constructor(private readonly source: string, options: TokenizerOptions = {}) {
    this.allowDumpState = options.allowDumpState ?? false;
    this.unitMarker = options.unitMarker ?? DEFAULT_UNIT_MARKER;
    if (this.unitMarker.length !== 1 || /\s/.test(this.unitMarker) || COMMAND_CHARS.has(this.unitMarker)) {
      throw new Error(`Invalid unit marker '${this.unitMarker}'`);
    }
  }

  scanEverything(): Token[] {
    const tokens: Token[] = [];
    const lines = this.source.split("\n");
    let lineStart = 0;

    lines.forEach((text, i) => {
      const line = i + 1;
      const firstNonSpace = text.search(/\S/);

      if (firstNonSpace >= 0 && text[firstNonSpace] === this.unitMarker) {
        const name = text.slice(firstNonSpace + 1).trim();
        tokens.push(new Token(TokenType.UNIT, name, line, firstNonSpace + 1, lineStart + firstNonSpace));
      } else {
        for (let col = 0; col < text.length; col++) {
          const command = this.commandFor(text[col]);
          if (command !== null) {
            tokens.push(new Token(TokenType.COMMAND, text[col], line, col + 1, lineStart + col, command));
          }
        }
      }

      lineStart += text.length + 1;
    });

    return tokens;
  }

  private commandFor(char: string): PrimitiveCommand | null {
    if (char === "#") {
      return this.allowDumpState ? PrimitiveCommand.DumpState : null;
    }
    return COMMAND_CHARS.get(char) ?? null;
  }
}
