import { Lexer, type SourceText } from "./lexer/lexer.js";
import { Parser, type ParseResult } from "./parser/parser.js";
import { Printer, type PrintOptions } from "./printer/printer.js";
import { DEFAULT_CONFIG, type Config } from "./config.js";
import type { Token } from "./lexer/tokens.js";
import type { Node } from "./ast/nodes.js";
import type { Diagnostic } from "./errors/diagnostic.js";

export * from "./ast/nodes.js";
export { structurallyEqual, nodeListsEqual } from "./ast/equality.js";
export { ALL_FEATURES, DEFAULT_CONFIG, createConfig, isGroupEnabled, type Config } from "./config.js";
export * from "./errors/diagnostic.js";
export { formatDiagnostic, formatDiagnostics } from "./errors/reporter.js";
export * from "./lexer/tokens.js";
export { Lexer, toBytes, type SourceText } from "./lexer/lexer.js";
export { SpanTracker, positionAt } from "./lexer/span-tracker.js";
export { scanNumber, formatNumberValue, type NumberScan } from "./lexer/number.js";
export { Parser, type ParseResult } from "./parser/parser.js";
export { Printer, PrinterError, type PrintOptions } from "./printer/printer.js";

export interface ParseOptions {
  config?: Config;
  /** Recorded in every span; shown by the reporter. */
  filename?: string;
}

export interface FormatOptions extends ParseOptions, Omit<PrintOptions, "comments"> {
  /** Carry the source's comments into the output. */
  keepComments?: boolean;
}

export interface FormatResult {
  text: string;
  diagnostics: Diagnostic[];
}

export function tokenize(source: SourceText, options: ParseOptions = {}): Token[] {
  return new Lexer(source, options.config ?? DEFAULT_CONFIG, options.filename).tokenize();
}

/**
 * Lex and group in one pass: the parser pulls tokens from the lexer as it goes.
 */
export function parse(source: SourceText, options: ParseOptions = {}): ParseResult {
  const config = options.config ?? DEFAULT_CONFIG;
  const lexer = new Lexer(source, config, options.filename);
  return new Parser(lexer, config).parse();
}

export function print(nodes: Node | readonly Node[], config: Config = DEFAULT_CONFIG, options: PrintOptions = {}): string {
  return new Printer(config, options).print("kind" in nodes ? [nodes] : nodes);
}

/** Parse then print. The text is printed even when there are diagnostics. */
export function format(source: SourceText, options: FormatOptions = {}): FormatResult {
  const config = options.config ?? DEFAULT_CONFIG;
  const { nodes, comments, diagnostics } = parse(source, options);
  const text = print(nodes, config, {
    separator: options.separator,
    preserveFormatting: options.preserveFormatting,
    comments: options.keepComments ? comments : undefined,
  });
  return { text, diagnostics };
}
