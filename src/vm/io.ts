/**
 * Pull-based byte source. `null` signals end of input.
 */
export interface ByteInput {
  readByte(): number | null;
}

/**
 * Push-based byte sink.
 */
export interface ByteOutput {
  writeByte(byte: number): void;
}

export class BufferInput implements ByteInput {
  private readonly bytes: Uint8Array;
  private cursor = 0;

  constructor(data: Uint8Array | string | readonly number[] = []) {
    this.bytes = typeof data === "string" ? new TextEncoder().encode(data) : Uint8Array.from(data);
  }

  readByte(): number | null {
    if (this.cursor >= this.bytes.length) {
      return null;
    }
    return this.bytes[this.cursor++];
  }

  get remaining(): number {
    return this.bytes.length - this.cursor;
  }
}

export class BufferOutput implements ByteOutput {
  private readonly bytes: number[] = [];

  writeByte(byte: number): void {
    this.bytes.push(byte & 0xff);
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  /** Output decoded as Latin-1, one character per byte. */
  toString(): string {
    return Buffer.from(this.bytes).toString("latin1");
  }
}

export const EMPTY_INPUT: ByteInput = { readByte: () => null };
