import chalk from "chalk";

import { INVOCATION_STATUSES } from "../engine/types.js";

import type { InvocationStatus, RunSummary, SummaryEntry } from "../engine/types.js";

/**
 * Status colors for terminal output
 */
const STATUS_COLORS: Record<InvocationStatus, typeof chalk> = {
  success: chalk.green,
  failure: chalk.red,
  timeout: chalk.yellow,
  "tool-missing": chalk.magenta,
};

const COLUMN_WIDTHS = {
  url: 50,
  payload: 20,
  status: 12,
  output: 50,
  score: 5,
};

/**
 * Shorten text to a column width, collapsing whitespace
 */
export function truncate(text: string, width: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > width ? `${flat.slice(0, width - 3)}...` : flat;
}

/** Results table layouts */
export const TABLE_STYLES = ["simple", "plain", "grid", "fancy_grid"] as const;

export type TableStyle = (typeof TABLE_STYLES)[number];

/** Left edge, fill, column joint and right edge of a horizontal rule */
type Rule = readonly [string, string, string, string];

interface GridBorder {
  top: Rule;
  header: Rule;
  between: Rule;
  bottom: Rule;
  vertical: string;
}

const GRID_BORDERS: Record<"grid" | "fancy_grid", GridBorder> = {
  grid: {
    top: ["+", "-", "+", "+"],
    header: ["+", "=", "+", "+"],
    between: ["+", "-", "+", "+"],
    bottom: ["+", "-", "+", "+"],
    vertical: "|",
  },
  fancy_grid: {
    top: ["╒", "═", "╤", "╕"],
    header: ["╞", "═", "╪", "╡"],
    between: ["├", "─", "┼", "┤"],
    bottom: ["╘", "═", "╧", "╛"],
    vertical: "│",
  },
};

const WIDTHS = [COLUMN_WIDTHS.url, COLUMN_WIDTHS.payload, COLUMN_WIDTHS.status, COLUMN_WIDTHS.output, COLUMN_WIDTHS.score];

function cell(text: string, width: number): string {
  return truncate(text, width).padEnd(width);
}

function rowCells(entry: SummaryEntry): string[] {
  return [
    cell(entry.url, COLUMN_WIDTHS.url),
    cell(entry.payload, COLUMN_WIDTHS.payload),
    STATUS_COLORS[entry.status](cell(entry.status, COLUMN_WIDTHS.status)),
    cell(entry.output || entry.error, COLUMN_WIDTHS.output),
    String(entry.score).padStart(COLUMN_WIDTHS.score),
  ];
}

function headerCells(): string[] {
  return [
    "URL".padEnd(COLUMN_WIDTHS.url),
    "Payload".padEnd(COLUMN_WIDTHS.payload),
    "Status".padEnd(COLUMN_WIDTHS.status),
    "Output".padEnd(COLUMN_WIDTHS.output),
    "Score".padStart(COLUMN_WIDTHS.score),
  ];
}

function highlight(entry: SummaryEntry, row: string): string {
  return entry.score > 0 ? chalk.red(row) : row;
}

function rule([left, fill, joint, right]: Rule): string {
  return chalk.gray(left + WIDTHS.map((width) => fill.repeat(width + 2)).join(joint) + right);
}

function gridLines(summary: RunSummary, border: GridBorder): string[] {
  const row = (cells: string[]): string =>
    `${border.vertical} ${cells.join(` ${border.vertical} `)} ${border.vertical}`;

  const lines = [rule(border.top), chalk.bold(row(headerCells())), rule(border.header)];
  summary.entries.forEach((entry, i) => {
    if (i > 0) lines.push(rule(border.between));
    lines.push(highlight(entry, row(rowCells(entry))));
  });
  lines.push(rule(border.bottom));
  return lines;
}

function columnLines(summary: RunSummary, ruled: boolean): string[] {
  const header = headerCells().join("  ");
  const separator = chalk.gray("─".repeat(header.length));

  const lines = [chalk.bold(header)];
  if (ruled) lines.push(separator);
  for (const entry of summary.entries) {
    lines.push(highlight(entry, rowCells(entry).join("  ")));
  }
  if (ruled) lines.push(separator);
  return lines;
}

/**
 * Format results as a terminal table, best score first
 */
export function formatResultsTable(summary: RunSummary, style: TableStyle = "simple"): string {
  if (summary.entries.length === 0) {
    return chalk.yellow("No results to show.");
  }

  const body =
    style === "grid" || style === "fancy_grid"
      ? gridLines(summary, GRID_BORDERS[style])
      : columnLines(summary, style === "simple");

  return [chalk.cyan.bold("=== RCE Test Results ==="), ...body, formatTotals(summary)].join("\n");
}

/**
 * One-line totals
 */
export function formatTotals(summary: RunSummary): string {
  const parts = [chalk.bold(`${summary.total} tested`)];
  for (const status of INVOCATION_STATUSES) {
    const count = summary.byStatus[status];
    if (count > 0) parts.push(STATUS_COLORS[status](`${count} ${status}`));
  }
  parts.push(summary.flagged > 0 ? chalk.red.bold(`${summary.flagged} flagged`) : chalk.gray("0 flagged"));
  return parts.join(chalk.gray(" | "));
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  return chalk.red(`Error: ${error.message}`);
}

/**
 * Format a warning for terminal output
 */
export function formatWarning(message: string): string {
  return chalk.yellow(`Warning: ${message}`);
}

/**
 * Format a success message for terminal output
 */
export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}
