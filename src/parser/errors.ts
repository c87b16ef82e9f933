import type { Diagnostic, Span } from "../errors/diagnostic.js";
import { error } from "../errors/diagnostic.js";
import { DELIMITERS, type DelimiterKind } from "../ast/nodes.js";
import type { ErrorToken } from "../lexer/tokens.js";

export function lexicalError(token: ErrorToken): Diagnostic {
  return error(token.code, token.message, token.span, lexicalHint(token));
}

function lexicalHint(token: ErrorToken): string | undefined {
  switch (token.code) {
    case "MalformedNumber":
      if (token.text.startsWith("#")) return "Byte strings are pairs of hex digits between '#' marks, e.g. #01ff#";
      if (token.text.includes("_")) return "'_' may only appear between digits, e.g. 1_000";
      return undefined;
    case "UnterminatedString":
      return "Add a closing '\"'";
    default:
      return undefined;
  }
}

export function unmatchedClose(delimiter: DelimiterKind, span: Span): Diagnostic {
  return error("UnmatchedClose", `Unmatched closing '${DELIMITERS[delimiter].close}'`, span);
}

export function mismatchedDelimiter(open: DelimiterKind, openSpan: Span, close: DelimiterKind, closeSpan: Span): Diagnostic {
  return {
    ...error(
      "MismatchedDelimiter",
      `Expected '${DELIMITERS[open].close}' to close '${DELIMITERS[open].open}', got '${DELIMITERS[close].close}'`,
      closeSpan,
      `The group opened at ${openSpan.start.line}:${openSpan.start.column} is closed here anyway`,
    ),
    related: openSpan,
  };
}

export function unterminatedGroup(delimiter: DelimiterKind, openSpan: Span): Diagnostic {
  return error(
    "UnterminatedGroup",
    `Unterminated group: '${DELIMITERS[delimiter].open}' is never closed`,
    openSpan,
    `Add a closing '${DELIMITERS[delimiter].close}'`,
  );
}

export function disabledDelimiter(delimiter: DelimiterKind, text: string, span: Span): Diagnostic {
  return error("InvalidCharacter", `'${text}' is not a delimiter: ${delimiter} groups are disabled`, span);
}
