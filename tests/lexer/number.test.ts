import { describe, it, expect } from "vitest";
import { formatNumberValue, scanNumber } from "../../src/lexer/number.js";

describe("scanNumber", () => {
  it("reads hexadecimal literals with separators", () => {
    expect(scanNumber("0xfedc__1240__abcd")).toEqual({
      ok: true,
      value: { kind: "integer", value: 0xfedc1240abcdn },
      base: "hexadecimal",
      hasUnderscores: true,
    });
  });

  it("reads decimal literals with separators", () => {
    expect(scanNumber("100_000_000")).toEqual({
      ok: true,
      value: { kind: "integer", value: 100000000n },
      base: "decimal",
      hasUnderscores: true,
    });
  });

  it("reads binary literals", () => {
    expect(scanNumber("0b1010")).toEqual({
      ok: true,
      value: { kind: "integer", value: 10n },
      base: "binary",
      hasUnderscores: false,
    });
  });

  it("accepts upper-case hex digits", () => {
    const scanned = scanNumber("0xFF");
    expect(scanned.ok && scanned.value).toEqual({ kind: "integer", value: 255n });
  });

  it("accepts repeated separators between digits", () => {
    const scanned = scanNumber("1__2");
    expect(scanned.ok && scanned.value).toEqual({ kind: "integer", value: 12n });
  });

  it("keeps values beyond 64 bits exact", () => {
    const scanned = scanNumber("123456789012345678901234567890");
    expect(scanned.ok && scanned.value).toEqual({ kind: "integer", value: 123456789012345678901234567890n });
  });

  it("reads decimals as unscaled value and scale", () => {
    expect(scanNumber("3.14")).toEqual({
      ok: true,
      value: { kind: "decimal", unscaled: 314n, scale: 2 },
      base: "decimal",
      hasUnderscores: false,
    });
    const scanned = scanNumber("1_000.000_1");
    expect(scanned.ok && scanned.value).toEqual({ kind: "decimal", unscaled: 10000001n, scale: 4 });
  });

  it.each([
    ["_12", "Leading '_' in integer part"],
    ["12_", "Trailing '_' in integer part"],
    ["1_.5", "Trailing '_' in integer part"],
    ["1._5", "Leading '_' in fractional part"],
    ["0x_ff", "Leading '_' in digits after '0x'"],
    ["0x", "Missing digits after '0x'"],
    ["0b102", "Invalid character '2' in binary literal"],
    ["0X10", "Invalid character 'X' in decimal literal"],
    ["12abc", "Invalid character 'a' in decimal literal"],
    ["0x1.5", "A hexadecimal literal cannot have a fractional part"],
    ["1.", "Missing fractional part"],
    ["1.2.3", "A number literal can have only one decimal point"],
  ])("rejects %s", (text, message) => {
    expect(scanNumber(text)).toEqual({ ok: false, message });
  });
});

describe("formatNumberValue", () => {
  it("prints integers in decimal", () => {
    expect(formatNumberValue({ kind: "integer", value: 0xffn })).toBe("255");
  });

  it("prints exactly `scale` fractional digits", () => {
    expect(formatNumberValue({ kind: "decimal", unscaled: 314n, scale: 2 })).toBe("3.14");
    expect(formatNumberValue({ kind: "decimal", unscaled: 1050n, scale: 2 })).toBe("10.50");
    expect(formatNumberValue({ kind: "decimal", unscaled: 5n, scale: 3 })).toBe("0.005");
  });
});
