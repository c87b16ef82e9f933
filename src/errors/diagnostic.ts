export interface Position {
  offset: number;
  line: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
  source: string;
}

export type Severity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "InvalidCharacter"
  | "MalformedNumber"
  | "UnterminatedString"
  | "UnmatchedClose"
  | "MismatchedDelimiter"
  | "UnterminatedGroup";

export interface Diagnostic {
  severity: Severity;
  code: DiagnosticCode;
  message: string;
  span: Span;
  /** Secondary location, e.g. the opening delimiter of a mismatched group. */
  related?: Span;
  help?: string;
}

export function error(code: DiagnosticCode, message: string, span: Span, help?: string): Diagnostic {
  return { severity: "error", code, message, span, help };
}

export function makeSpan(start: Position, end: Position, source: string): Span {
  return { start, end, source };
}

export function joinSpans(first: Span, last: Span): Span {
  return { start: first.start, end: last.end, source: first.source };
}

/** Raised when the input buffer is not text at all; nothing is lexed. */
export class InvalidSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSourceError";
  }
}
