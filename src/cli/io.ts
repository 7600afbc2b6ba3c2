import * as fs from "fs";
import { ByteInput, ByteOutput } from "../vm/io";

const STDIN_FD = 0;
const FLUSH_THRESHOLD = 4096;

function sleep(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

/**
 * Blocking byte reader over a file descriptor (stdin by default).
 */
export class FdInput implements ByteInput {
  private readonly buffer = Buffer.alloc(1);
  private ended = false;

  constructor(private readonly fd: number = STDIN_FD) {}

  readByte(): number | null {
    if (this.ended) {
      return null;
    }
    for (;;) {
      try {
        const read = fs.readSync(this.fd, this.buffer, 0, 1, null);
        if (read === 0) {
          this.ended = true;
          return null;
        }
        return this.buffer[0];
      } catch (e) {
        const code = e instanceof Error && "code" in e ? e.code : undefined;
        if (code === "EAGAIN") {
          // non-blocking stdin with nothing buffered yet
          sleep(10);
          continue;
        }
        if (code === "EOF") {
          this.ended = true;
          return null;
        }
        throw e;
      }
    }
  }
}

/**
 * Buffers bytes and writes them to a stream at line ends, when the buffer
 * fills up, and on `flush()`.
 */
export class StreamOutput implements ByteOutput {
  private pending: number[] = [];

  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  writeByte(byte: number): void {
    this.pending.push(byte);
    if (byte === 0x0a || this.pending.length >= FLUSH_THRESHOLD) {
      this.flush();
    }
  }

  flush(): void {
    if (this.pending.length > 0) {
      this.stream.write(Buffer.from(this.pending));
      this.pending = [];
    }
  }
}
