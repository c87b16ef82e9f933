import type { DiagnosticCode, Span } from "../errors/diagnostic.js";
import { DELIMITERS, type DelimiterKind, type NumberBase, type NumberValue } from "../ast/nodes.js";

export enum TokenKind {
  Atom = "Atom",
  Number = "Number",
  String = "String",
  Bytes = "Bytes",
  Comment = "Comment",
  Open = "Open",
  Close = "Close",

  // Special
  Error = "Error",
  EOF = "EOF",
}

interface BaseToken {
  span: Span;
}

export interface AtomToken extends BaseToken {
  kind: TokenKind.Atom;
  text: string;
}

export interface NumberToken extends BaseToken {
  kind: TokenKind.Number;
  value: NumberValue;
  base: NumberBase;
  hasUnderscores: boolean;
  raw: string;
}

export interface StringToken extends BaseToken {
  kind: TokenKind.String;
  value: string;
  raw: string;
}

export interface BytesToken extends BaseToken {
  kind: TokenKind.Bytes;
  bytes: Uint8Array;
  raw: string;
}

export interface CommentToken extends BaseToken {
  kind: TokenKind.Comment;
  text: string;
}

export interface OpenToken extends BaseToken {
  kind: TokenKind.Open;
  delimiter: DelimiterKind;
}

export interface CloseToken extends BaseToken {
  kind: TokenKind.Close;
  delimiter: DelimiterKind;
}

export interface ErrorToken extends BaseToken {
  kind: TokenKind.Error;
  code: DiagnosticCode;
  message: string;
  /** Offending source text. */
  text: string;
}

export interface EofToken extends BaseToken {
  kind: TokenKind.EOF;
}

export type Token =
  | AtomToken
  | NumberToken
  | StringToken
  | BytesToken
  | CommentToken
  | OpenToken
  | CloseToken
  | ErrorToken
  | EofToken;

/** Source text of a token, as far as it can be rebuilt from the token alone. */
export function tokenText(token: Token): string {
  switch (token.kind) {
    case TokenKind.Atom: return token.text;
    case TokenKind.Number: return token.raw;
    case TokenKind.String: return `"${token.raw}"`;
    case TokenKind.Bytes: return `#${token.raw}#`;
    case TokenKind.Comment: return `;${token.text}`;
    case TokenKind.Open: return DELIMITERS[token.delimiter].open;
    case TokenKind.Close: return DELIMITERS[token.delimiter].close;
    case TokenKind.Error: return token.text;
    case TokenKind.EOF: return "";
  }
}
