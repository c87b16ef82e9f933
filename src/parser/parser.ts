import { TokenKind, type CloseToken, type OpenToken, type Token } from "../lexer/tokens.js";
import type { Diagnostic, Span } from "../errors/diagnostic.js";
import { joinSpans } from "../errors/diagnostic.js";
import { DEFAULT_CONFIG, isGroupEnabled, type Config } from "../config.js";
import { DELIMITERS, type Comment, type DelimiterKind, type Node } from "../ast/nodes.js";
import { disabledDelimiter, lexicalError, mismatchedDelimiter, unmatchedClose, unterminatedGroup } from "./errors.js";

export interface ParseResult {
  nodes: Node[];
  /** Comments in source order; not part of the tree. */
  comments: Comment[];
  diagnostics: Diagnostic[];
}

interface OpenGroup {
  delimiter: DelimiterKind;
  openSpan: Span;
  children: Node[];
}

/**
 * Builds groups from a token sequence, pulling one token at a time. Errors are
 * collected and the best tree available is always returned.
 */
export class Parser {
  private tokens: Iterator<Token>;
  private config: Config;
  private stack: OpenGroup[] = [];
  private nodes: Node[] = [];
  private comments: Comment[] = [];
  private diagnostics: Diagnostic[] = [];
  private lastSpan: Span | null = null;

  constructor(tokens: Iterable<Token>, config: Config = DEFAULT_CONFIG) {
    this.tokens = tokens[Symbol.iterator]();
    this.config = config;
  }

  parse(): ParseResult {
    while (true) {
      const token = this.nextToken();
      if (token.kind === TokenKind.EOF) {
        this.finish(token.span);
        break;
      }
      this.accept(token);
    }
    return { nodes: this.nodes, comments: this.comments, diagnostics: this.diagnostics };
  }

  // ============================================================
  // Tokens
  // ============================================================

  private nextToken(): Token {
    const next = this.tokens.next();
    if (next.done) {
      // sequence ended without an explicit EOF marker
      const end = this.lastSpan?.end ?? { offset: 0, line: 1, column: 1 };
      return { kind: TokenKind.EOF, span: { start: end, end, source: this.lastSpan?.source ?? "<input>" } };
    }
    this.lastSpan = next.value.span;
    return next.value;
  }

  private accept(token: Token): void {
    switch (token.kind) {
      case TokenKind.Atom:
        this.append({ kind: "Atom", text: token.text, span: token.span });
        break;
      case TokenKind.Number:
        this.append({ kind: "Number", value: token.value, base: token.base, raw: token.raw, span: token.span });
        break;
      case TokenKind.String:
        this.append({ kind: "String", value: token.value, raw: token.raw, span: token.span });
        break;
      case TokenKind.Bytes:
        this.append({ kind: "Bytes", bytes: token.bytes, span: token.span });
        break;
      case TokenKind.Comment:
        this.comments.push({ text: token.text, span: token.span });
        break;
      case TokenKind.Open:
        this.openGroup(token);
        break;
      case TokenKind.Close:
        this.closeGroup(token);
        break;
      case TokenKind.Error:
        this.diagnostics.push(lexicalError(token));
        break;
      case TokenKind.EOF:
        break;
    }
  }

  // ============================================================
  // Groups
  // ============================================================

  private openGroup(token: OpenToken): void {
    if (!isGroupEnabled(this.config, token.delimiter)) {
      this.diagnostics.push(disabledDelimiter(token.delimiter, DELIMITERS[token.delimiter].open, token.span));
      return;
    }
    this.stack.push({ delimiter: token.delimiter, openSpan: token.span, children: [] });
  }

  private closeGroup(token: CloseToken): void {
    if (!isGroupEnabled(this.config, token.delimiter)) {
      this.diagnostics.push(disabledDelimiter(token.delimiter, DELIMITERS[token.delimiter].close, token.span));
      return;
    }

    const group = this.stack.pop();
    if (group === undefined) {
      this.diagnostics.push(unmatchedClose(token.delimiter, token.span));
      return;
    }
    if (group.delimiter !== token.delimiter) {
      this.diagnostics.push(mismatchedDelimiter(group.delimiter, group.openSpan, token.delimiter, token.span));
    }

    this.append({
      kind: "Group",
      delimiter: group.delimiter,
      children: group.children,
      terminated: true,
      span: joinSpans(group.openSpan, token.span),
    });
  }

  private finish(eofSpan: Span): void {
    for (const group of this.stack) {
      this.diagnostics.push(unterminatedGroup(group.delimiter, group.openSpan));
    }
    for (let group = this.stack.pop(); group !== undefined; group = this.stack.pop()) {
      this.append({
        kind: "Group",
        delimiter: group.delimiter,
        children: group.children,
        terminated: false,
        span: joinSpans(group.openSpan, eofSpan),
      });
    }
  }

  private append(node: Node): void {
    const top = this.stack.at(-1);
    if (top) {
      top.children.push(node);
    } else {
      this.nodes.push(node);
    }
  }
}
