import { DELIMITERS, type Comment, type Node, type NumberNode } from "../ast/nodes.js";
import type { Span } from "../errors/diagnostic.js";
import { DEFAULT_CONFIG, isGroupEnabled, type Config } from "../config.js";
import { isAtomText, isWhitespace } from "../lexer/chars.js";
import { formatNumberValue } from "../lexer/number.js";

export interface PrintOptions {
  /** Between the children of a group. Must be whitespace. Defaults to one space. */
  separator?: string;
  /** Comments to write back at the positions their spans give. */
  comments?: readonly Comment[];
  /** Reuse the literal text kept on numbers and strings. Defaults to true. */
  preserveFormatting?: boolean;
}

/** The tree cannot be written as text that the given Config would read back. */
export class PrinterError extends Error {
  readonly code = "ConfigurationMismatch";
  readonly span?: Span;

  constructor(message: string, span?: Span) {
    super(message);
    this.name = "PrinterError";
    this.span = span;
  }
}

const STRING_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\t": "\\t",
  "\r": "\\r",
};

export class Printer {
  private config: Config;
  private separator: string;
  private preserveFormatting: boolean;
  private comments: Comment[];

  private out: string = "";
  private nextComment: number = 0;
  private atLineStart: boolean = true;
  private needSeparator: boolean = false;
  private lastLine: number = 0;

  constructor(config: Config = DEFAULT_CONFIG, options: PrintOptions = {}) {
    this.config = config;
    this.separator = options.separator ?? " ";
    this.preserveFormatting = options.preserveFormatting ?? true;
    this.comments = [...(options.comments ?? [])].sort((a, b) => a.span.start.offset - b.span.start.offset);

    if (this.separator.length === 0 || !Array.from(this.separator).every(isWhitespace)) {
      throw new PrinterError(`Separator ${JSON.stringify(this.separator)} must be non-empty whitespace`);
    }
    if (this.comments.length > 0 && !config.lineComments) {
      throw new PrinterError("Cannot print comments: line comments are disabled", this.comments[0].span);
    }
    for (const comment of this.comments) {
      if (comment.text.includes("\n")) {
        throw new PrinterError("Cannot print a comment that spans several lines", comment.span);
      }
    }
  }

  print(nodes: readonly Node[]): string {
    this.out = "";
    this.nextComment = 0;
    this.atLineStart = true;
    this.needSeparator = false;
    this.lastLine = 0;

    for (const node of nodes) {
      this.emitNode(node, "\n");
    }
    this.flushComments(Number.POSITIVE_INFINITY);
    return this.out;
  }

  private emitNode(node: Node, separator: string): void {
    this.flushComments(node.span.start.offset);
    if (this.needSeparator && !this.atLineStart) {
      this.out += separator;
      this.atLineStart = separator.endsWith("\n");
    }

    switch (node.kind) {
      case "Atom":
        if (!isAtomText(node.text, this.config)) {
          throw new PrinterError(`'${node.text}' would not read back as a single atom under this configuration`, node.span);
        }
        this.write(node.text);
        break;
      case "Number":
        this.write(this.numberText(node));
        break;
      case "String":
        this.write(`"${this.preserveFormatting && node.raw !== undefined ? node.raw : escapeString(node.value)}"`);
        break;
      case "Bytes":
        if (!this.config.byteStrings) {
          throw new PrinterError("Cannot print a byte string: byte strings are disabled", node.span);
        }
        this.write(`#${Array.from(node.bytes, (b) => b.toString(16).padStart(2, "0")).join("")}#`);
        break;
      case "Group": {
        if (!isGroupEnabled(this.config, node.delimiter)) {
          throw new PrinterError(`Cannot print a ${node.delimiter} group: ${node.delimiter} groups are disabled`, node.span);
        }
        const { open, close } = DELIMITERS[node.delimiter];
        this.write(open);
        this.needSeparator = false;
        for (const child of node.children) {
          this.emitNode(child, this.separator);
        }
        this.flushComments(node.span.end.offset);
        this.write(close);
        break;
      }
    }

    this.needSeparator = true;
    this.lastLine = node.span.end.line;
  }

  private numberText(node: NumberNode): string {
    const negative = node.value.kind === "integer" ? node.value.value < 0n : node.value.unscaled < 0n;
    if (negative) {
      throw new PrinterError("Negative numbers have no literal form", node.span);
    }
    if (node.value.kind === "decimal" && !(Number.isInteger(node.value.scale) && node.value.scale > 0)) {
      throw new PrinterError(`A decimal needs at least one fractional digit, got scale ${node.value.scale}`, node.span);
    }
    if (this.preserveFormatting && node.raw !== undefined) return node.raw;
    return formatNumberValue(node.value);
  }

  private flushComments(beforeOffset: number): void {
    while (this.nextComment < this.comments.length && this.comments[this.nextComment].span.start.offset < beforeOffset) {
      const comment = this.comments[this.nextComment++];
      if (!this.atLineStart) {
        this.out += comment.span.start.line > this.lastLine ? "\n" : " ";
      }
      this.out += `;${comment.text}\n`;
      this.atLineStart = true;
    }
  }

  private write(text: string): void {
    this.out += text;
    this.atLineStart = false;
  }
}

function escapeString(value: string): string {
  return value.replace(/[\\"\n\t\r]/g, (ch) => STRING_ESCAPES[ch] ?? ch);
}
