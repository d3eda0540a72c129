/**
 * Newline-delimited framing used by the pipe transport.
 *
 * @module protocol/line-framer
 */

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/**
 * Maximum size of a single line (16 MB).
 */
export const MAX_LINE_SIZE = 16 * 1024 * 1024;

/**
 * Adds the line terminator to an encoded payload.
 */
export function frameLine(payload: Buffer): Buffer {
  return Buffer.concat([payload, Buffer.from([NEWLINE])]);
}

/**
 * Reassembles newline-delimited frames from arbitrary chunks.
 *
 * A trailing `\r` is stripped so CRLF peers work too. Blank lines are skipped.
 *
 * @example
 * ```typescript
 * const framer = new LineFramer();
 * framer.push(Buffer.from('{"a":1}\n{"b"'));  // → [<{"a":1}>]
 * framer.push(Buffer.from(':2}\n'));          // → [<{"b":2}>]
 * ```
 */
export class LineFramer {
  private buffer: Buffer = Buffer.alloc(0);

  /**
   * Number of bytes waiting for a terminator.
   */
  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Appends a chunk and returns every complete line it finishes.
   *
   * @throws {RangeError} If an unterminated line grows past {@link MAX_LINE_SIZE}
   */
  push(chunk: Buffer): Buffer[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    const frames: Buffer[] = [];
    let start = 0;
    let newline = this.buffer.indexOf(NEWLINE, start);

    while (newline !== -1) {
      let end = newline;
      if (end > start && this.buffer[end - 1] === CARRIAGE_RETURN) {
        end--;
      }
      if (end > start) {
        frames.push(this.buffer.subarray(start, end));
      }
      start = newline + 1;
      newline = this.buffer.indexOf(NEWLINE, start);
    }

    this.buffer = start === 0 ? this.buffer : this.buffer.subarray(start);

    if (this.buffer.length > MAX_LINE_SIZE) {
      this.buffer = Buffer.alloc(0);
      throw new RangeError(`Line exceeds maximum size of ${MAX_LINE_SIZE} bytes`);
    }

    return frames;
  }

  /**
   * Drops any partial line.
   */
  reset(): void {
    this.buffer = Buffer.alloc(0);
  }
}
