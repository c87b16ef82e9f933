import { isGroupEnabled, type Config } from "../config.js";
import type { DelimiterKind } from "../ast/nodes.js";

// any ascii operator except: [] {} () " ; \
const OPERATOR_CHARS = "?!#@$+-*/=<>,.:|%^&~'`";

const ID_START = /^\p{ID_Start}$/u;
const ID_CONTINUE = /^\p{ID_Continue}$/u;
const WHITESPACE = /^\p{White_Space}$/u;
const CONTROL = /^\p{Cc}$/u;

const OPENERS: Record<string, DelimiterKind> = { "(": "paren", "{": "brace", "[": "bracket" };
const CLOSERS: Record<string, DelimiterKind> = { ")": "paren", "}": "brace", "]": "bracket" };

export function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

/** Control characters that are not whitespace are never valid input. */
export function isDisallowedControl(ch: string): boolean {
  return CONTROL.test(ch) && !WHITESPACE.test(ch);
}

export function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

export function isHexDigit(ch: string): boolean {
  return isDigit(ch) || (ch >= "a" && ch <= "f") || (ch >= "A" && ch <= "F");
}

function isMathOperator(ch: string): boolean {
  const cp = ch.codePointAt(0) ?? 0;
  return (cp >= 0x2200 && cp <= 0x22ff) || (cp >= 0x2a00 && cp <= 0x2aff);
}

export function openDelimiter(ch: string, config: Config): DelimiterKind | null {
  const kind = OPENERS[ch];
  return kind !== undefined && isGroupEnabled(config, kind) ? kind : null;
}

export function closeDelimiter(ch: string, config: Config): DelimiterKind | null {
  const kind = CLOSERS[ch];
  return kind !== undefined && isGroupEnabled(config, kind) ? kind : null;
}

// Characters that are punctuation only while their feature is on.
function isSymbolChar(ch: string, config: Config): boolean {
  switch (ch) {
    case ";": return !config.lineComments;
    case "{": case "}": return !config.braceGroups;
    case "[": case "]": return !config.bracketGroups;
  }
  return OPERATOR_CHARS.includes(ch) || isMathOperator(ch);
}

export function isAtomStart(ch: string, config: Config): boolean {
  if (ch === "#" && config.byteStrings) return false;
  return ID_START.test(ch) || ch === "_" || isSymbolChar(ch, config);
}

export function isAtomContinue(ch: string, config: Config): boolean {
  return ID_CONTINUE.test(ch) || ch === "_" || isSymbolChar(ch, config);
}

/** `_` followed only by digits and underscores reads as a malformed number, not a name. */
export function looksNumeric(word: string): boolean {
  return isDigit(word[0] ?? "") || /^_[0-9_]*[0-9][0-9_]*$/.test(word);
}

/** Whether `text` lexes as exactly one atom under `config`. */
export function isAtomText(text: string, config: Config): boolean {
  const chars = Array.from(text);
  if (chars.length === 0 || !isAtomStart(chars[0], config) || looksNumeric(text)) return false;
  return chars.every((ch) => isAtomContinue(ch, config));
}
