import type { NumberBase, NumberValue } from "../ast/nodes.js";

export type NumberScan =
  | { ok: true; value: NumberValue; base: NumberBase; hasUnderscores: boolean }
  | { ok: false; message: string };

const DIGITS: Record<NumberBase, string> = {
  binary: "01",
  decimal: "0123456789",
  hexadecimal: "0123456789abcdef",
};

const PREFIXES: Record<NumberBase, string> = {
  binary: "0b",
  decimal: "",
  hexadecimal: "0x",
};

/**
 * Validate one numeric literal. `text` is the whole word the lexer delimited, so
 * anything that is not a digit, separator, prefix or decimal point is an error.
 */
export function scanNumber(text: string): NumberScan {
  const base: NumberBase = text.startsWith("0x")
    ? "hexadecimal"
    : text.startsWith("0b")
      ? "binary"
      : "decimal";
  const body = text.slice(PREFIXES[base].length);
  const hasUnderscores = body.includes("_");

  if (base !== "decimal") {
    if (body.includes(".")) {
      return { ok: false, message: `A ${base} literal cannot have a fractional part` };
    }
    const problem = checkDigits(body, base, `digits after '${PREFIXES[base]}'`);
    if (problem) return { ok: false, message: problem };
    const value = BigInt(PREFIXES[base] + stripSeparators(body));
    return { ok: true, value: { kind: "integer", value }, base, hasUnderscores };
  }

  const parts = body.split(".");
  if (parts.length > 2) {
    return { ok: false, message: "A number literal can have only one decimal point" };
  }
  const integral = parts[0];
  const fractional: string | undefined = parts[1];
  const problem = checkDigits(integral, base, "integer part")
    ?? (fractional !== undefined ? checkDigits(fractional, base, "fractional part") : null);
  if (problem) return { ok: false, message: problem };

  if (fractional === undefined) {
    return { ok: true, value: { kind: "integer", value: BigInt(stripSeparators(integral)) }, base, hasUnderscores };
  }
  const fraction = stripSeparators(fractional);
  return {
    ok: true,
    value: {
      kind: "decimal",
      unscaled: BigInt(stripSeparators(integral) + fraction),
      scale: fraction.length,
    },
    base,
    hasUnderscores,
  };
}

function checkDigits(part: string, base: NumberBase, what: string): string | null {
  if (part.length === 0) return `Missing ${what}`;
  for (const ch of part) {
    if (ch !== "_" && !DIGITS[base].includes(ch.toLowerCase())) {
      return `Invalid character '${ch}' in ${base} literal`;
    }
  }
  if (part.startsWith("_")) return `Leading '_' in ${what}`;
  if (part.endsWith("_")) return `Trailing '_' in ${what}`;
  return null;
}

function stripSeparators(digits: string): string {
  return digits.replace(/_/g, "");
}

/** Canonical text of a value: decimal base, no separators, `scale` fractional digits. */
export function formatNumberValue(value: NumberValue): string {
  if (value.kind === "integer") return value.value.toString();
  if (value.scale <= 0) return value.unscaled.toString();
  const digits = value.unscaled.toString().padStart(value.scale + 1, "0");
  const cut = digits.length - value.scale;
  return `${digits.slice(0, cut)}.${digits.slice(cut)}`;
}
