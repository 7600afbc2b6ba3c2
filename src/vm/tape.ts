import { BoundaryPolicy } from "./config";
import { BoundaryError } from "./errors";
import { TapeSnapshot } from "./types";

/**
 * Fixed-size tape of 8-bit cells and a pointer. Cell arithmetic always wraps
 * modulo 256; what happens when the pointer runs off either end is decided by
 * the boundary policy.
 */
export class Tape {
  private readonly cells: Uint8Array;
  private ptr = 0;

  constructor(size: number, private readonly policy: BoundaryPolicy = BoundaryPolicy.Error) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Tape size must be a positive integer, got ${size}`);
    }
    this.cells = new Uint8Array(size);
  }

  get size(): number {
    return this.cells.length;
  }

  get pointer(): number {
    return this.ptr;
  }

  adjustCurrentCell(delta: number): void {
    // Uint8Array stores modulo 256; masking keeps huge deltas exact.
    this.cells[this.ptr] = (this.cells[this.ptr] + (delta & 0xff)) & 0xff;
  }

  /**
   * Move by `delta` cells as if stepping one cell at a time.
   *
   * @throws BoundaryError under the Error policy, with the pointer left on the
   *   last cell of the tape it reached
   */
  movePointer(delta: number): void {
    const target = this.ptr + delta;
    const size = this.cells.length;
    if (target >= 0 && target < size) {
      this.ptr = target;
      return;
    }

    switch (this.policy) {
      case BoundaryPolicy.Wrap:
        this.ptr = ((target % size) + size) % size;
        break;
      case BoundaryPolicy.Clamp:
        this.ptr = target < 0 ? 0 : size - 1;
        break;
      case BoundaryPolicy.Error:
        this.ptr = target < 0 ? 0 : size - 1;
        throw new BoundaryError(target < 0 ? -1 : size, size);
    }
  }

  readCurrentCell(): number {
    return this.cells[this.ptr];
  }

  writeCurrentCell(byte: number): void {
    this.cells[this.ptr] = byte & 0xff;
  }

  cellAt(index: number): number {
    if (index < 0 || index >= this.cells.length) {
      throw new RangeError(`Cell ${index} is outside of the tape`);
    }
    return this.cells[index];
  }

  snapshot(): TapeSnapshot {
    return Object.freeze({ cells: this.cells.slice(), pointer: this.ptr });
  }
}
