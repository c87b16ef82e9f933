#!/usr/bin/env node
import { Command } from "commander";
import { readFile } from "node:fs/promises";
import { ALL_FEATURES, createConfig, type Config } from "./config.js";
import { format, parse, tokenize } from "./sexpr.js";
import { TokenKind, tokenText } from "./lexer/tokens.js";
import { lexicalError } from "./parser/errors.js";
import { formatDiagnostics } from "./errors/reporter.js";
import type { Diagnostic } from "./errors/diagnostic.js";

interface FeatureFlags {
  comments?: boolean;
  bytes?: boolean;
  braces?: boolean;
  brackets?: boolean;
  all?: boolean;
}

function configFrom(opts: FeatureFlags): Config {
  if (opts.all) return ALL_FEATURES;
  return createConfig({
    lineComments: !!opts.comments,
    byteStrings: !!opts.bytes,
    braceGroups: !!opts.braces,
    bracketGroups: !!opts.brackets,
  });
}

function withFeatureFlags(command: Command): Command {
  return command
    .option("--comments", "Recognize ';' line comments")
    .option("--bytes", "Recognize #hex# byte strings")
    .option("--braces", "Treat { } as group delimiters")
    .option("--brackets", "Treat [ ] as group delimiters")
    .option("--all", "Enable every optional feature");
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString("hex");
  return value;
}

async function run(file: string, action: (bytes: Uint8Array) => Diagnostic[]): Promise<void> {
  try {
    const bytes = await readFile(file);
    const diagnostics = action(bytes);
    if (diagnostics.length > 0) {
      console.error(formatDiagnostics(bytes.toString("utf-8"), diagnostics));
      process.exit(1);
    }
  } catch (e) {
    console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
  }
}

const program = new Command()
  .name("sexpr")
  .description("Tokenize, parse and re-print S-expression text")
  .version("0.1.0");

withFeatureFlags(
  program
    .command("tokens <file>")
    .description("Print the token stream, one token per line"),
).action(async (file: string, opts: FeatureFlags) => {
  await run(file, (bytes) => {
    const diagnostics: Diagnostic[] = [];
    for (const tok of tokenize(bytes, { config: configFrom(opts), filename: file })) {
      console.log(`${tok.kind}\t${JSON.stringify(tokenText(tok))}\t${tok.span.start.line}:${tok.span.start.column}`);
      if (tok.kind === TokenKind.Error) {
        diagnostics.push(lexicalError(tok));
      }
    }
    return diagnostics;
  });
});

withFeatureFlags(
  program
    .command("parse <file>")
    .description("Print the parsed tree and comments as JSON"),
).action(async (file: string, opts: FeatureFlags) => {
  await run(file, (bytes) => {
    const { nodes, comments, diagnostics } = parse(bytes, { config: configFrom(opts), filename: file });
    console.log(JSON.stringify({ nodes, comments }, jsonReplacer, 2));
    return diagnostics;
  });
});

withFeatureFlags(
  program
    .command("fmt <file>")
    .description("Re-print the file from its parsed tree")
    .option("--canonical", "Drop literal formatting (bases, separators, escapes)")
    .option("--keep-comments", "Carry comments into the output")
    .option("-s, --separator <text>", "Separator between group children", " "),
).action(async (file: string, opts: FeatureFlags & { canonical?: boolean; keepComments?: boolean; separator: string }) => {
  await run(file, (bytes) => {
    const { text, diagnostics } = format(bytes, {
      config: configFrom(opts),
      filename: file,
      separator: opts.separator,
      preserveFormatting: !opts.canonical,
      keepComments: !!opts.keepComments,
    });
    process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
    return diagnostics;
  });
});

program.parseAsync().catch((e: unknown) => {
  console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
});
