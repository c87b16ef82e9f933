import type { Position } from "../errors/diagnostic.js";
import { decodeAt } from "./utf8.js";

const LINE_FEED = 0x0a;

/**
 * Cursor over UTF-8 input. Offsets count bytes, columns count scalar values.
 * `\r\n` is one line break: the `\r` moves the column and the `\n` resets it.
 */
export class SpanTracker {
  private offset: number = 0;
  private line: number = 1;
  private column: number = 1;

  /** Move over one scalar value, or one invalid byte (`codePoint` -1). */
  advance(codePoint: number, byteWidth: number): void {
    if (codePoint === LINE_FEED) {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.offset += byteWidth;
  }

  get currentOffset(): number {
    return this.offset;
  }

  position(): Position {
    return { offset: this.offset, line: this.line, column: this.column };
  }
}

/** Position of a byte offset, counted from the start of `bytes`. */
export function positionAt(bytes: Uint8Array, offset: number): Position {
  if (offset < 0 || offset > bytes.length) {
    throw new RangeError(`Offset ${offset} is outside the input (0..${bytes.length})`);
  }
  const tracker = new SpanTracker();
  while (tracker.currentOffset < offset) {
    const decoded = decodeAt(bytes, tracker.currentOffset);
    if (decoded === null) break;
    tracker.advance(decoded.codePoint, decoded.width);
  }
  return tracker.position();
}
