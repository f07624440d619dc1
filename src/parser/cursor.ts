import { describeByte, JsonParseError, ParseErrorKind, positionAt } from "./errors.js";

/** Returned by `peek()` past the last byte. */
export const END = -1;

/**
 * Read position over an input buffer. The buffer is never copied or written;
 * the only state is the byte offset.
 */
export class Cursor {
  private position = 0;

  constructor(readonly input: Uint8Array) {}

  get offset(): number {
    return this.position;
  }

  get atEnd(): boolean {
    return this.position >= this.input.length;
  }

  peek(): number {
    return this.position < this.input.length ? this.input[this.position] : END;
  }

  /** Consumes the current byte and returns it, or END when exhausted. */
  next(): number {
    if (this.position >= this.input.length) {
      return END;
    }
    const byte = this.input[this.position];
    this.position += 1;
    return byte;
  }

  advance(count = 1): void {
    this.position = Math.min(this.position + count, this.input.length);
  }

  slice(start: number, end: number): Uint8Array {
    return this.input.subarray(start, end);
  }

  fail(kind: ParseErrorKind, expected: string, offset = this.position): JsonParseError {
    const byte = offset < this.input.length ? this.input[offset] : undefined;
    return new JsonParseError(kind, {
      ...positionAt(this.input, offset),
      expected,
      actual: describeByte(byte),
    });
  }
}
