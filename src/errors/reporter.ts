import chalk from "chalk";
import type { Diagnostic } from "./diagnostic.js";

export function formatDiagnostic(source: string, diag: Diagnostic): string {
  const lines = source.split("\n");
  const line = (lines[diag.span.start.line - 1] ?? "").replace(/\r$/, "");
  const lineNum = String(diag.span.start.line);
  const padding = " ".repeat(lineNum.length);
  // Multi-line spans are underlined to the end of their first line.
  const endColumn = diag.span.end.line === diag.span.start.line
    ? diag.span.end.column
    : line.length + 1;

  const severityLabel =
    diag.severity === "error"
      ? chalk.red.bold("syntax error")
      : chalk.yellow.bold("warning");

  let output = `${severityLabel}: ${chalk.bold(diag.message)}\n`;
  output += `${padding} ${chalk.blue("-->")} ${diag.span.source}:${diag.span.start.line}:${diag.span.start.column}\n`;
  output += `${padding} ${chalk.blue("|")}\n`;
  output += `${chalk.blue(lineNum)} ${chalk.blue("|")} ${line}\n`;
  output += `${padding} ${chalk.blue("|")} ${" ".repeat(diag.span.start.column - 1)}${chalk.red("^".repeat(Math.max(1, endColumn - diag.span.start.column)))}\n`;

  if (diag.help) {
    output += `${padding} ${chalk.blue("=")} ${chalk.green("help")}: ${diag.help}\n`;
  }

  return output;
}

export function formatDiagnostics(source: string, diagnostics: Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(source, d)).join("\n");
}
