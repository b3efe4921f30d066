/**
 * Per-item raw-output captures and the end-of-run archive
 */

import { mkdir, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";

import AdmZip from "adm-zip";

import { targetDomain } from "./targets.js";

import type { ProcessedItem } from "./types.js";

const MAX_URL_PART = 120;

/**
 * Run timestamp used in artifact and report names (local time)
 */
export function runTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Directory holding one domain's captures
 */
export function artifactDirName(url: string): string {
  return `rce_results_${targetDomain(url).replace(/:/g, "_")}`;
}

function sanitize(text: string): string {
  return encodeURIComponent(text).replace(/[%*'()!~]/g, "_");
}

/**
 * Deterministic capture file name for a work item
 */
export function artifactFileName(url: string, payload: string, workItemId: string, timestamp: string): string {
  const urlPart = sanitize(url).slice(0, MAX_URL_PART);
  const payloadPart = sanitize(payload.slice(0, 10));
  return `${urlPart}_${payloadPart}_${workItemId.slice(0, 8)}_${timestamp}.txt`;
}

/**
 * Text written to a capture file
 */
export function formatArtifact(processed: ProcessedItem): string {
  const { item, result } = processed;
  const lines = [
    `URL: ${item.url}`,
    `Payload: ${item.payload}`,
    `Status: ${result.status}`,
    `Attempts: ${result.attemptCount}`,
    `Score: ${processed.score}`,
  ];
  if (processed.parameters.length > 0) {
    lines.push(`RCE parameters: ${processed.parameters.map((p) => p.parameterName).join(", ")}`);
  }
  lines.push("");
  if (result.status === "success") {
    lines.push("Output:", result.stdout + result.stderr);
  } else {
    lines.push(`Error: ${result.error ?? ""}`);
    if (result.stderr) lines.push(result.stderr);
  }
  return lines.join("\n");
}

/**
 * Writes captures under an output directory and bundles them at the end
 */
export class ArtifactWriter {
  private readonly written: string[] = [];

  constructor(
    public readonly outputDir: string,
    public readonly timestamp: string
  ) {}

  get paths(): readonly string[] {
    return this.written;
  }

  /**
   * Write one capture and return its path
   */
  async write(processed: ProcessedItem): Promise<string> {
    const { item } = processed;
    const dir = join(this.outputDir, artifactDirName(item.url));
    const filePath = join(dir, artifactFileName(item.url, item.payload, item.id, this.timestamp));
    await mkdir(dir, { recursive: true });
    await writeFile(filePath, formatArtifact(processed), "utf-8");
    this.written.push(filePath);
    return filePath;
  }

  /**
   * Bundle this run's captures into a zip. Returns null when nothing was written.
   */
  archive(): string | null {
    if (this.written.length === 0) return null;
    const zip = new AdmZip();
    for (const filePath of this.written) {
      zip.addLocalFile(filePath, basename(dirname(filePath)));
    }
    const zipPath = join(this.outputDir, `rce_results_${this.timestamp}.zip`);
    zip.writeZip(zipPath);
    return zipPath;
  }
}
