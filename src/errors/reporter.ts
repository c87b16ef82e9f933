import chalk from "chalk";
import type { Diagnostic, Span } from "./diagnostic.js";

function sourceLine(lines: string[], line: number): string {
  return (lines[line - 1] ?? "").replace(/\r$/, "");
}

function carets(from: number, width: number): string {
  return `${" ".repeat(from - 1)}${"^".repeat(Math.max(1, width))}`;
}

/** Source lines under a span, each followed by its underline. */
function excerpt(lines: string[], span: Span): Array<[number, string, string]> {
  const first = sourceLine(lines, span.start.line);
  if (span.start.line === span.end.line) {
    return [[span.start.line, first, carets(span.start.column, span.end.column - span.start.column)]];
  }
  const rows: Array<[number, string, string]> = [
    [span.start.line, first, carets(span.start.column, Array.from(first).length - span.start.column + 1)],
  ];
  if (span.end.column > 1) {
    rows.push([span.end.line, sourceLine(lines, span.end.line), carets(1, span.end.column - 1)]);
  }
  return rows;
}

export function formatDiagnostic(source: string, diag: Diagnostic): string {
  const lines = source.split("\n");
  const rows = excerpt(lines, diag.span);
  const gutter = Math.max(...rows.map(([n]) => String(n).length));
  const padding = " ".repeat(gutter);

  const severityLabel =
    diag.severity === "error"
      ? chalk.red.bold("error")
      : diag.severity === "warning"
        ? chalk.yellow.bold("warning")
        : chalk.blue.bold("info");

  let output = `${severityLabel}[${diag.code}]: ${chalk.bold(diag.message)}\n`;
  output += `${padding} ${chalk.blue("-->")} ${diag.span.source}:${diag.span.start.line}:${diag.span.start.column}\n`;
  output += `${padding} ${chalk.blue("|")}\n`;
  for (const [lineNum, text, underline] of rows) {
    output += `${chalk.blue(String(lineNum).padStart(gutter))} ${chalk.blue("|")} ${text}\n`;
    output += `${padding} ${chalk.blue("|")} ${chalk.red(underline)}\n`;
  }

  if (diag.related) {
    const related = diag.related;
    output += `${padding} ${chalk.blue("=")} ${chalk.cyan("note")}: opened at ${related.source}:${related.start.line}:${related.start.column}: ${sourceLine(lines, related.start.line).trim()}\n`;
  }
  if (diag.help) {
    output += `${padding} ${chalk.blue("=")} ${chalk.green("help")}: ${diag.help}\n`;
  }

  return output;
}

export function formatDiagnostics(source: string, diagnostics: Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(source, d)).join("\n");
}
