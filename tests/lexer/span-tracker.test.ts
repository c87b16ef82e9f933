import { describe, it, expect } from "vitest";
import { SpanTracker, positionAt } from "../../src/lexer/span-tracker.js";

const encode = (text: string) => new TextEncoder().encode(text);

describe("SpanTracker", () => {
  it("starts at line 1, column 1", () => {
    expect(new SpanTracker().position()).toEqual({ offset: 0, line: 1, column: 1 });
  });

  it("moves the column by one per scalar value and the offset by its width", () => {
    const tracker = new SpanTracker();
    tracker.advance(0x61, 1);
    tracker.advance(0xe9, 2);
    expect(tracker.position()).toEqual({ offset: 3, line: 1, column: 3 });
  });

  it("starts a new line after a line feed", () => {
    const tracker = new SpanTracker();
    tracker.advance(0x61, 1);
    tracker.advance(0x0a, 1);
    expect(tracker.position()).toEqual({ offset: 2, line: 2, column: 1 });
  });
});

describe("positionAt", () => {
  it("counts \\r\\n as a single line break", () => {
    expect(positionAt(encode("ab\r\ncd"), 4)).toEqual({ offset: 4, line: 2, column: 1 });
    expect(positionAt(encode("ab\r\ncd"), 5)).toEqual({ offset: 5, line: 2, column: 2 });
  });

  it("counts columns in scalar values and offsets in bytes", () => {
    expect(positionAt(encode("éa"), 2)).toEqual({ offset: 2, line: 1, column: 2 });
    expect(positionAt(encode("😀x"), 4)).toEqual({ offset: 4, line: 1, column: 2 });
  });

  it("accepts the end of input", () => {
    expect(positionAt(encode("a\nb"), 3)).toEqual({ offset: 3, line: 2, column: 2 });
  });

  it("rejects offsets outside the input", () => {
    expect(() => positionAt(encode("abc"), -1)).toThrow(RangeError);
    expect(() => positionAt(encode("abc"), 4)).toThrow(RangeError);
  });
});
