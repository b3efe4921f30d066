/**
 * Target Enumerator
 *
 * Loads URLs and payloads from their sources and expands them into the
 * ordered, deduplicated WorkItem sequence the scheduler consumes.
 */

import { createHash } from "crypto";
import { createReadStream } from "fs";
import { stat } from "fs/promises";
import { createInterface } from "readline";
import type { Readable } from "stream";

import { z } from "zod";

import { ConfigurationError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { DEFAULT_PAYLOADS } from "./payloads.js";

import type { WorkItem } from "./types.js";

const log = logger.child("[targets]");

/** Where URLs come from; the first present source wins */
export interface UrlSource {
  single?: string;
  file?: string;
  /** Piped input; only pass a non-TTY stream */
  stdin?: Readable;
  /** Stop after this many accepted URLs */
  maxUrls?: number;
}

/** Where payloads come from; built-in defaults when none applies */
export interface PayloadSource {
  single?: string;
  file?: string;
  /** Used when neither is given, if it is a non-empty file */
  fallbackFile?: string;
}

export type SourceOrigin = "single" | "file" | "stdin" | "default";

export interface LoadedUrls {
  urls: string[];
  /** Lines that were not valid targets */
  skipped: number;
  origin: SourceOrigin;
}

export interface LoadedPayloads {
  payloads: string[];
  origin: SourceOrigin;
}

export interface Enumeration {
  /** Items to dispatch */
  items: WorkItem[];
  /** Every distinct pair, excluded ones included */
  all: WorkItem[];
  /** Pairs dropped because they were already complete */
  excluded: number;
}

const HttpUrlSchema = z.string().refine((value) => {
  if (!URL.canParse(value)) return false;
  const url = new URL(value);
  return (url.protocol === "http:" || url.protocol === "https:") && url.search.length > 1;
}, "must be an absolute http(s) URL with at least one query parameter");

/**
 * Check that a string is an absolute http(s) URL carrying a query string
 */
export function isTargetUrl(value: string): boolean {
  return HttpUrlSchema.safeParse(value).success;
}

/**
 * Stable identity of a (url, payload) pair
 */
export function workItemId(url: string, payload: string): string {
  return createHash("sha256").update(JSON.stringify([url, payload])).digest("hex");
}

/**
 * Host part used to group results
 */
export function targetDomain(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return "unknown";
  }
}

async function ensureReadableFile(filePath: string, what: string): Promise<void> {
  let size: number;
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new ConfigurationError(`${what} is not a file: ${filePath}`, { filePath });
    }
    size = info.size;
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    throw new ConfigurationError(`${what} not found: ${filePath}`, {
      filePath,
      cause: errorMessage(error),
    });
  }
  if (size === 0) {
    throw new ConfigurationError(`${what} is empty: ${filePath}`, { filePath });
  }
}

/**
 * Yield trimmed, non-empty lines of a stream
 */
async function* readLines(input: Readable): AsyncGenerator<string> {
  const rl = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      const trimmed = line.trim();
      if (trimmed.length > 0) {
        yield trimmed;
      }
    }
  } finally {
    rl.close();
  }
}

async function collectUrls(lines: AsyncIterable<string>, maxUrls?: number): Promise<Omit<LoadedUrls, "origin">> {
  const seen = new Set<string>();
  const urls: string[] = [];
  let skipped = 0;

  for await (const line of lines) {
    if (!isTargetUrl(line)) {
      skipped++;
      log.debug(`Skipping invalid URL: ${line}`);
      continue;
    }
    if (seen.has(line)) continue;
    seen.add(line);
    urls.push(line);
    if (maxUrls !== undefined && urls.length >= maxUrls) break;
  }

  return { urls, skipped };
}

/**
 * Load target URLs. Malformed lines are skipped and counted.
 */
export async function loadUrls(source: UrlSource): Promise<LoadedUrls> {
  if (source.single !== undefined) {
    if (!isTargetUrl(source.single)) {
      throw new ConfigurationError(`Invalid URL: ${source.single}`, { url: source.single });
    }
    return { urls: [source.single], skipped: 0, origin: "single" };
  }

  let loaded: Omit<LoadedUrls, "origin">;
  let origin: SourceOrigin;

  if (source.file !== undefined) {
    await ensureReadableFile(source.file, "URL file");
    loaded = await collectUrls(readLines(createReadStream(source.file, "utf-8")), source.maxUrls);
    origin = "file";
  } else if (source.stdin !== undefined) {
    loaded = await collectUrls(readLines(source.stdin), source.maxUrls);
    origin = "stdin";
  } else {
    throw new ConfigurationError("No URL source: pass --url-file, --single-url or pipe URLs on stdin");
  }

  if (loaded.skipped > 0) {
    log.warn(`Skipped ${loaded.skipped} malformed URL line(s)`);
  }
  if (loaded.urls.length === 0) {
    throw new ConfigurationError(`No valid URLs found in ${origin}`, { skipped: loaded.skipped });
  }

  log.info(`Loaded ${loaded.urls.length} URLs from ${origin}`);
  return { ...loaded, origin };
}

async function isNonEmptyFile(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    return info.isFile() && info.size > 0;
  } catch (error) {
    log.debug(`No payload file at ${filePath}: ${errorMessage(error)}`);
    return false;
  }
}

async function readPayloadFile(filePath: string): Promise<string[]> {
  const payloads: string[] = [];
  const seen = new Set<string>();
  for await (const line of readLines(createReadStream(filePath, "utf-8"))) {
    if (seen.has(line)) continue;
    seen.add(line);
    payloads.push(line);
  }
  if (payloads.length === 0) {
    throw new ConfigurationError(`No payloads found in ${filePath}`, { filePath });
  }
  log.info(`Loaded ${payloads.length} payloads from ${filePath}`);
  return payloads;
}

/**
 * Load payloads: a literal, then the payload file, then the fallback file,
 * then the built-in list
 */
export async function loadPayloads(source: PayloadSource): Promise<LoadedPayloads> {
  if (source.single !== undefined) {
    return { payloads: [source.single], origin: "single" };
  }

  if (source.file !== undefined) {
    await ensureReadableFile(source.file, "Payload file");
    return { payloads: await readPayloadFile(source.file), origin: "file" };
  }

  if (source.fallbackFile !== undefined && (await isNonEmptyFile(source.fallbackFile))) {
    return { payloads: await readPayloadFile(source.fallbackFile), origin: "file" };
  }

  log.info(`Using ${DEFAULT_PAYLOADS.length} built-in payloads`);
  return { payloads: [...DEFAULT_PAYLOADS], origin: "default" };
}

/**
 * Expand URLs × payloads into WorkItems, URL-major, in input order.
 * Identities in `exclude` are left out of `items` but keep their index.
 */
export function enumerateWorkItems(
  urls: readonly string[],
  payloads: readonly string[],
  exclude: ReadonlySet<string> = new Set()
): Enumeration {
  const all: WorkItem[] = [];
  const seen = new Set<string>();

  for (const url of urls) {
    for (const payload of payloads) {
      const id = workItemId(url, payload);
      if (seen.has(id)) continue;
      seen.add(id);
      all.push({ url, payload, id, index: all.length });
    }
  }

  const items = all.filter((item) => !exclude.has(item.id));
  return { items, all, excluded: all.length - items.length };
}
