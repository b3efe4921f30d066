/**
 * Parameter Extractor
 *
 * Pipes substitution output through `gf rce` and keeps every newly seen
 * parameter name in an append-only corpus file.
 */

import { open, readFile } from "fs/promises";

import pLimit from "p-limit";

import { errorMessage, hasErrorCode } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { execCommand } from "./process.js";

import type { CommandExecutor } from "./process.js";
import type { ExtractedParameter, WorkItem } from "./types.js";

const log = logger.child("[extract]");

/** gf rule set for RCE-prone parameters */
export const RCE_RULE = "rce";

/** Parameter names the `rce` rule of the common gf pattern set matches */
export const RCE_PARAMETERS: ReadonlySet<string> = new Set([
  "arg",
  "cli",
  "cmd",
  "code",
  "command",
  "daemon",
  "dir",
  "do",
  "download",
  "exe",
  "exec",
  "execute",
  "feature",
  "func",
  "function",
  "ip",
  "jump",
  "load",
  "log",
  "module",
  "option",
  "payload",
  "ping",
  "print",
  "process",
  "query",
  "read",
  "reg",
  "req",
  "run",
  "step",
  "upload",
]);

const PARAM_NAME = /^[A-Za-z0-9_.[\]-]+$/;

/**
 * Append-only, deduplicated list of parameter names
 */
export class ParameterCorpus {
  private names = new Set<string>();
  private endsWithNewline = true;
  /** Single writer for the corpus file */
  private readonly writer = pLimit(1);

  constructor(public readonly filePath: string) {}

  /**
   * Read the existing corpus. A missing file is an empty corpus.
   */
  async load(): Promise<void> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return;
      }
      throw error;
    }

    for (const line of content.split("\n")) {
      const name = line.trim();
      if (name) this.names.add(name);
    }
    this.endsWithNewline = content.length === 0 || content.endsWith("\n");
    log.debug(`Loaded ${this.names.size} parameter names from ${this.filePath}`);
  }

  has(name: string): boolean {
    return this.names.has(name);
  }

  get size(): number {
    return this.names.size;
  }

  /**
   * Append names not yet present. Resolves with the names written once they
   * are flushed to disk.
   */
  async append(names: readonly string[]): Promise<string[]> {
    const fresh: string[] = [];
    for (const name of names) {
      if (this.names.has(name)) continue;
      this.names.add(name);
      fresh.push(name);
    }
    if (fresh.length === 0) return [];

    await this.writer(async () => {
      const prefix = this.endsWithNewline ? "" : "\n";
      const handle = await open(this.filePath, "a");
      try {
        await handle.appendFile(`${prefix}${fresh.join("\n")}\n`, "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      this.endsWithNewline = true;
    });

    return fresh;
  }
}

/**
 * Keys of a matched line that the rule would have matched. When none is a
 * known name the rule is a custom one, and every key counts.
 */
function matchedKeys(keys: readonly string[]): string[] {
  const known = keys.filter((key) => RCE_PARAMETERS.has(key.toLowerCase()));
  return known.length > 0 ? known : [...keys];
}

/**
 * Parse pattern-filter output into parameter names.
 *
 * A line holding a URL or query string yields the parameter names the rule
 * matched; a bare token is taken as a name.
 */
export function parseFilterOutput(output: string, sourceUrl: string): ExtractedParameter[] {
  const seen = new Set<string>();
  const params: ExtractedParameter[] = [];

  const add = (name: string): void => {
    if (!name || seen.has(name)) return;
    seen.add(name);
    params.push({ sourceUrl, parameterName: name });
  };

  for (const raw of output.split("\n")) {
    const line = raw.trim();
    if (!line) continue;

    const queryStart = line.indexOf("?");
    if (queryStart !== -1 || line.includes("=")) {
      const query = queryStart === -1 ? line : line.slice(queryStart + 1);
      const keys = [...new URLSearchParams(query.split("#")[0]).keys()];
      for (const key of matchedKeys(keys)) {
        add(key);
      }
    } else if (PARAM_NAME.test(line)) {
      add(line);
    }
  }

  return params;
}

/**
 * Query parameter names of a URL
 */
export function queryParameterNames(url: string): string[] {
  try {
    return [...new Set(new URL(url).searchParams.keys())];
  } catch {
    return [];
  }
}

export interface ExtractorConfig {
  /** Resolved gf path; extraction is skipped when null */
  filterPath: string | null;
  timeoutMs: number;
}

export class ParameterExtractor {
  private readonly executor: CommandExecutor;

  constructor(
    private readonly config: ExtractorConfig,
    private readonly corpus: ParameterCorpus,
    executor?: CommandExecutor
  ) {
    this.executor = executor ?? execCommand;
  }

  /**
   * Extract RCE-relevant parameters from one invocation's stdout.
   * Failures are logged and yield no parameters.
   */
  async extract(item: WorkItem, stdout: string): Promise<ExtractedParameter[]> {
    if (this.config.filterPath === null || stdout.trim().length === 0) {
      return [];
    }

    const output = await this.executor(this.config.filterPath, [RCE_RULE], {
      timeoutMs: this.config.timeoutMs,
      input: stdout,
    });

    if (output.spawnError || output.timedOut) {
      log.warn(`Pattern filter failed for ${item.url}: ${output.spawnError ?? "timed out"}`);
      return [];
    }
    // grep-style tools exit 1 when nothing matched
    if (output.exitCode !== 0) {
      if (output.stderr.trim()) {
        log.warn(`Pattern filter exited ${output.exitCode} for ${item.url}: ${output.stderr.trim()}`);
      }
      return [];
    }

    const params = parseFilterOutput(output.stdout, item.url);
    if (params.length === 0) return params;

    try {
      const added = await this.corpus.append(params.map((p) => p.parameterName));
      if (added.length > 0) {
        log.info(`New RCE parameters: ${added.join(", ")}`);
      }
    } catch (error) {
      log.error(`Failed to append to ${this.corpus.filePath}: ${errorMessage(error)}`);
    }

    return params;
  }
}
