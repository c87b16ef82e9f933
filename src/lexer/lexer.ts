import { InvalidSourceError, makeSpan, type DiagnosticCode, type Position, type Span } from "../errors/diagnostic.js";
import { DEFAULT_CONFIG, type Config } from "../config.js";
import { TokenKind, type Token } from "./tokens.js";
import { SpanTracker } from "./span-tracker.js";
import { decodeAt } from "./utf8.js";
import { scanNumber } from "./number.js";
import {
  closeDelimiter,
  isAtomContinue,
  isAtomStart,
  isDigit,
  isDisallowedControl,
  isHexDigit,
  isWhitespace,
  looksNumeric,
  openDelimiter,
} from "./chars.js";

/** Text, or the raw UTF-8 bytes of it. */
export type SourceText = string | Uint8Array;

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function toBytes(source: SourceText): Uint8Array {
  if (typeof source === "string") {
    if (LONE_SURROGATE.test(source)) {
      throw new InvalidSourceError("Source contains an unpaired surrogate and is not valid text");
    }
    return new TextEncoder().encode(source);
  }
  if (source instanceof Uint8Array) return source;
  throw new InvalidSourceError("Source must be a string or a Uint8Array");
}

interface Char {
  /** Empty for an invalid byte. */
  ch: string;
  codePoint: number;
}

export class Lexer implements Iterable<Token> {
  private bytes: Uint8Array;
  private config: Config;
  private filename: string;
  private tracker: SpanTracker = new SpanTracker();
  private decoder: TextDecoder = new TextDecoder();
  /** Set when a comment was cut short by an invalid byte and the line goes on. */
  private inComment: boolean = false;

  constructor(source: SourceText, config: Config = DEFAULT_CONFIG, filename: string = "<input>") {
    this.bytes = toBytes(source);
    this.config = config;
    this.filename = filename;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (const token of this) tokens.push(token);
    return tokens;
  }

  *[Symbol.iterator](): Iterator<Token> {
    while (true) {
      const token = this.next();
      yield token;
      if (token.kind === TokenKind.EOF) return;
    }
  }

  /** Pull the next token. Returns EOF again once the input is exhausted. */
  next(): Token {
    if (this.inComment) return this.continueComment();
    this.skipWhitespace();
    const start = this.tracker.position();
    const current = this.peek();

    if (current === null) {
      return { kind: TokenKind.EOF, span: this.spanFrom(start) };
    }

    if (current.codePoint < 0) {
      const byte = this.bytes[start.offset];
      this.advance();
      return this.errorToken("InvalidCharacter", `Invalid UTF-8 byte 0x${byte.toString(16).padStart(2, "0")}`, start);
    }

    const ch = current.ch;
    if (isDisallowedControl(ch)) {
      this.advance();
      return this.errorToken("InvalidCharacter", `Control character ${codePointName(current.codePoint)} is not allowed`, start);
    }

    const open = openDelimiter(ch, this.config);
    if (open) {
      this.advance();
      return { kind: TokenKind.Open, delimiter: open, span: this.spanFrom(start) };
    }
    const close = closeDelimiter(ch, this.config);
    if (close) {
      this.advance();
      return { kind: TokenKind.Close, delimiter: close, span: this.spanFrom(start) };
    }

    if (ch === ";" && this.config.lineComments) return this.readComment(start);
    if (ch === '"') return this.readString(start);
    if (ch === "#" && this.config.byteStrings) return this.readBytes(start);
    if (isDigit(ch) || isAtomStart(ch, this.config)) return this.readWord(start);

    this.advance();
    return this.errorToken("InvalidCharacter", `Unexpected character '${ch}' (${codePointName(current.codePoint)})`, start);
  }

  private readWord(start: Position): Token {
    this.advance();
    this.advanceWhile((ch) => isAtomContinue(ch, this.config));
    const text = this.sliceFrom(start);

    if (!looksNumeric(text)) {
      return { kind: TokenKind.Atom, text, span: this.spanFrom(start) };
    }

    const scanned = scanNumber(text);
    if (!scanned.ok) {
      return this.errorToken("MalformedNumber", scanned.message, start);
    }
    return {
      kind: TokenKind.Number,
      value: scanned.value,
      base: scanned.base,
      hasUnderscores: scanned.hasUnderscores,
      raw: text,
      span: this.spanFrom(start),
    };
  }

  private readComment(start: Position): Token {
    this.advance(); // skip ';'
    return this.readCommentText(start);
  }

  /** The rest of a comment after an invalid byte: the byte itself, then its text. */
  private continueComment(): Token {
    const start = this.tracker.position();
    const current = this.peek();
    if (current === null || current.codePoint >= 0) return this.readCommentText(start);

    const byte = this.bytes[start.offset];
    this.advance();
    this.inComment = !this.atLineEnd();
    return this.errorToken("InvalidCharacter", `Invalid UTF-8 byte 0x${byte.toString(16).padStart(2, "0")}`, start);
  }

  private readCommentText(start: Position): Token {
    const textStart = this.tracker.currentOffset;
    while (!this.atLineEnd() && (this.peek()?.codePoint ?? -1) >= 0) {
      this.advance();
    }
    this.inComment = !this.atLineEnd();
    const text = this.decoder.decode(this.bytes.subarray(textStart, this.tracker.currentOffset));
    return { kind: TokenKind.Comment, text, span: this.spanFrom(start) };
  }

  /** At the end of input, or before `\n` or `\r\n`. */
  private atLineEnd(): boolean {
    const current = this.peek();
    if (current === null || current.ch === "\n") return true;
    return current.ch === "\r" && this.bytes[this.tracker.currentOffset + 1] === 0x0a;
  }

  private readString(start: Position): Token {
    this.advance(); // skip opening "
    const rawStart = this.tracker.currentOffset;
    let value = "";
    let invalid = false;

    while (true) {
      const current = this.peek();
      if (current === null) {
        return this.errorToken("UnterminatedString", "Unterminated string literal", start);
      }
      if (current.ch === '"') break;
      this.advance();

      if (current.codePoint < 0) {
        invalid = true;
      } else if (current.ch === "\\") {
        const escaped = this.peek();
        if (escaped === null) continue;
        this.advance();
        switch (escaped.ch) {
          case "n": value += "\n"; break;
          case "t": value += "\t"; break;
          case "r": value += "\r"; break;
          case "\\": value += "\\"; break;
          case '"': value += '"'; break;
          default:
            if (escaped.codePoint < 0) invalid = true;
            value += "\\" + escaped.ch;
        }
      } else {
        value += current.ch;
      }
    }

    const raw = this.decoder.decode(this.bytes.subarray(rawStart, this.tracker.currentOffset));
    this.advance(); // skip closing "
    if (invalid) {
      return this.errorToken("InvalidCharacter", "String literal contains invalid UTF-8", start);
    }
    return { kind: TokenKind.String, value, raw, span: this.spanFrom(start) };
  }

  private readBytes(start: Position): Token {
    this.advance(); // skip opening #
    const rawStart = this.tracker.currentOffset;
    this.advanceWhile((ch) => ch !== "#" && isAtomContinue(ch, this.config));
    const raw = this.decoder.decode(this.bytes.subarray(rawStart, this.tracker.currentOffset));

    if (this.peek()?.ch !== "#") {
      return this.errorToken("MalformedNumber", "Unterminated byte string: expected closing '#'", start);
    }
    this.advance(); // skip closing #

    const nonHex = Array.from(raw).find((ch) => !isHexDigit(ch));
    if (nonHex !== undefined) {
      return this.errorToken("MalformedNumber", `Invalid character '${nonHex}' in byte string`, start);
    }
    if (raw.length % 2 !== 0) {
      return this.errorToken("MalformedNumber", "Byte string must contain an even number of hex digits", start);
    }

    const bytes = new Uint8Array(raw.length / 2);
    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = parseInt(raw.slice(i * 2, i * 2 + 2), 16);
    }
    return { kind: TokenKind.Bytes, bytes, raw, span: this.spanFrom(start) };
  }

  private skipWhitespace(): void {
    this.advanceWhile(isWhitespace);
  }

  private advanceWhile(predicate: (ch: string) => boolean): void {
    while (true) {
      const current = this.peek();
      if (current === null || current.codePoint < 0 || !predicate(current.ch)) return;
      this.advance();
    }
  }

  private peek(): Char | null {
    const decoded = decodeAt(this.bytes, this.tracker.currentOffset);
    if (decoded === null) return null;
    return {
      ch: decoded.codePoint < 0 ? "" : String.fromCodePoint(decoded.codePoint),
      codePoint: decoded.codePoint,
    };
  }

  private advance(): void {
    const decoded = decodeAt(this.bytes, this.tracker.currentOffset);
    if (decoded !== null) {
      this.tracker.advance(decoded.codePoint, decoded.width);
    }
  }

  private sliceFrom(start: Position): string {
    return this.decoder.decode(this.bytes.subarray(start.offset, this.tracker.currentOffset));
  }

  private spanFrom(start: Position): Span {
    return makeSpan(start, this.tracker.position(), this.filename);
  }

  private errorToken(code: DiagnosticCode, message: string, start: Position): Token {
    return {
      kind: TokenKind.Error,
      code,
      message,
      text: this.sliceFrom(start),
      span: this.spanFrom(start),
    };
  }
}

function codePointName(codePoint: number): string {
  return `U+${codePoint.toString(16).toUpperCase().padStart(4, "0")}`;
}

