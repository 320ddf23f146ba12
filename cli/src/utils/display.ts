import chalk from "chalk";
import ora, { type Ora } from "ora";
import type { PostResult } from "@fanpost/core";

export function createSpinner(text: string): Ora {
  return ora({ text, spinner: "dots" });
}

export function success(msg: string): void {
  console.log(chalk.green("  " + msg));
}

export function error(msg: string): void {
  console.error(chalk.red("  " + msg));
}

export function warn(msg: string): void {
  console.log(chalk.yellow("  " + msg));
}

export function info(msg: string): void {
  console.log(chalk.cyan("  " + msg));
}

export function table(headers: string[], rows: string[][]): void {
  const colWidths = headers.map((h, i) => {
    const maxData = rows.reduce((max, row) => Math.max(max, (row[i] ?? "").length), 0);
    return Math.max(h.length, maxData) + 2;
  });

  const divider = colWidths.map((w) => "-".repeat(w)).join("+");
  const formatRow = (cells: string[]) =>
    cells.map((cell, i) => (cell ?? "").padEnd(colWidths[i])).join("|");

  console.log(chalk.bold(formatRow(headers)));
  console.log(divider);
  for (const row of rows) {
    console.log(formatRow(row));
  }
}

/** Rows of a results table: target, status, detail. */
export function resultRows(result: PostResult): string[][] {
  return result.entries().map(([key, outcome]) => [
    key,
    outcome.success ? "posted" : "failed",
    outcome.success ? "" : `${outcome.errorType ?? "unknownError"}: ${outcome.error ?? ""}`,
  ]);
}

export function banner(): void {
  console.log(chalk.cyan.bold("\n  fanpost"));
  console.log(chalk.dim("  One post, every feed.\n"));
}
