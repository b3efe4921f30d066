/**
 * Machine-readable run reports and the writer for all report files
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";

import { formatHtml } from "./html-formatter.js";

import type { RunSummary } from "../engine/types.js";

export const CSV_COLUMNS = [
  "domain",
  "url",
  "payload",
  "status",
  "attempts",
  "score",
  "rce_parameters",
  "output",
  "error",
] as const;

/**
 * Format a run summary as JSON
 */
export function formatJsonReport(summary: RunSummary, version: string): string {
  return JSON.stringify({ version, ...summary }, null, 2);
}

/**
 * Quote a CSV field when it contains a separator, quote or line break
 */
export function escapeCsv(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Format summary entries as CSV, best score first
 */
export function formatCsv(summary: RunSummary): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const entry of summary.entries) {
    lines.push(
      [
        entry.domain,
        entry.url,
        entry.payload,
        entry.status,
        String(entry.attemptCount),
        String(entry.score),
        entry.rceParameters.join(" "),
        entry.output,
        entry.error,
      ]
        .map(escapeCsv)
        .join(",")
    );
  }
  return `${lines.join("\r\n")}\r\n`;
}

export interface ReportPaths {
  json: string;
  csv: string;
  html: string;
}

/**
 * Write the JSON, CSV and HTML summaries for a run
 */
export async function writeReports(
  summary: RunSummary,
  outputDir: string,
  timestamp: string,
  version: string
): Promise<ReportPaths> {
  await mkdir(outputDir, { recursive: true });

  const paths: ReportPaths = {
    json: join(outputDir, `rce_summary_${timestamp}.json`),
    csv: join(outputDir, `rce_summary_${timestamp}.csv`),
    html: join(outputDir, `rce_summary_${timestamp}.html`),
  };

  await writeFile(paths.json, formatJsonReport(summary, version), "utf-8");
  await writeFile(paths.csv, formatCsv(summary), "utf-8");
  await writeFile(paths.html, formatHtml(summary, version), "utf-8");

  return paths;
}
