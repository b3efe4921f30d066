/**
 * Run configuration
 *
 * Reads the optional YAML config file and merges it with command-line
 * flags into a probe configuration. Flags win over the file, the file
 * wins over built-in defaults. Keys may be written in camelCase or
 * snake_case (`max_workers`), and a null value leaves the default.
 */

import { existsSync, readFileSync } from "fs";
import { resolve } from "path";

import YAML from "yaml";
import { z } from "zod";

import { DEFAULT_PAYLOAD_FILE } from "../engine/payloads.js";
import { defaultMaxWorkers } from "../engine/scheduler.js";
import { ConfigurationError } from "../lib/errors.js";
import { err, ok } from "../lib/result.js";
import { TABLE_STYLES } from "./formatters.js";

import type { ProbeConfig } from "../engine/probe.js";
import type { BackoffStrategy } from "../engine/types.js";
import type { Result } from "../lib/result.js";
import type { TableStyle } from "./formatters.js";

export const DEFAULT_CONFIG_FILE = "rce_config.yaml";

export const DEFAULTS = {
  timeoutSeconds: 30,
  retries: 2,
  retryDelayMs: 1000,
  backoff: "fixed",
  outputDir: ".",
  stateFile: "rce_state.json",
  corpusFile: "rce_all_params.txt",
  logFile: "rce_test.log",
  tableStyle: "simple",
} as const;

/**
 * Config file schema
 */
export const FileConfigSchema = z
  .object({
    urlFile: z.string().min(1).optional(),
    payloadFile: z.string().min(1).optional(),
    maxWorkers: z.number().int().positive().optional(),
    timeout: z.number().positive().optional(),
    retries: z.number().int().nonnegative().optional(),
    retryDelay: z.number().int().nonnegative().optional(),
    backoff: z.enum(["fixed", "exponential"]).optional(),
    qsreplacePath: z.string().min(1).optional(),
    gfPath: z.string().min(1).optional(),
    quiet: z.boolean().optional(),
    verbose: z.boolean().optional(),
    dryRun: z.boolean().optional(),
    maxUrls: z.number().int().positive().optional(),
    outputDir: z.string().min(1).optional(),
    stateFile: z.string().min(1).optional(),
    corpusFile: z.string().min(1).optional(),
    logFile: z.string().min(1).optional(),
    tableStyle: z.enum(TABLE_STYLES).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

/**
 * Flags as parsed by the `run` command
 */
export interface RunFlags {
  urlFile?: string;
  singleUrl?: string;
  payloadFile?: string;
  singlePayload?: string;
  maxWorkers?: number;
  timeout?: number;
  retries?: number;
  retryDelay?: number;
  backoff?: BackoffStrategy;
  qsreplacePath?: string;
  gfPath?: string;
  maxUrls?: number;
  outputDir?: string;
  stateFile?: string;
  corpusFile?: string;
  logFile?: string;
  tableStyle?: TableStyle;
  config?: string;
  quiet?: boolean;
  verbose?: boolean;
  dryRun?: boolean;
  resume?: boolean;
  print: boolean;
  archive: boolean;
}

export interface ResolvedRunConfig {
  probe: ProbeConfig;
  quiet: boolean;
  verbose: boolean;
  print: boolean;
  archive: boolean;
  logFile: string;
  tableStyle: TableStyle;
}

function camelCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_match, letter: string) => letter.toUpperCase());
}

/**
 * Rewrite snake_case keys to camelCase and drop null values
 */
function normalizeKeys(raw: unknown, source: string): Result<unknown, ConfigurationError> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return ok(raw);
  }
  const normalized: Record<string, unknown> = {};
  const origin: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    const name = camelCase(key);
    const previous = origin[name];
    if (previous !== undefined) {
      return err(new ConfigurationError(`Invalid config in ${source}: both ${previous} and ${key} are set`, { source }));
    }
    origin[name] = key;
    if (value !== null) {
      normalized[name] = value;
    }
  }
  return ok(normalized);
}

/**
 * Parse config file text
 */
export function parseConfig(content: string, source: string): Result<FileConfig, ConfigurationError> {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ConfigurationError(`Invalid YAML in ${source}: ${reason}`, { source }));
  }

  // An empty document parses to null
  if (raw === null || raw === undefined) {
    return ok({});
  }

  const normalized = normalizeKeys(raw, source);
  if (!normalized.success) {
    return normalized;
  }

  const result = FileConfigSchema.safeParse(normalized.data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return err(new ConfigurationError(`Invalid config in ${source}: ${issues}`, { source }));
  }
  return ok(result.data);
}

/**
 * Load the config file
 *
 * An explicit path must exist. The default file is optional.
 */
export function loadConfigFile(
  explicitPath: string | undefined,
  cwd: string = process.cwd()
): Result<FileConfig, ConfigurationError> {
  const filePath = resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);

  if (!existsSync(filePath)) {
    if (explicitPath !== undefined) {
      return err(new ConfigurationError(`Config file not found: ${filePath}`, { filePath }));
    }
    return ok({});
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ConfigurationError(`Cannot read config file ${filePath}: ${reason}`, { filePath }));
  }
  return parseConfig(content, filePath);
}

/**
 * Merge flags over the config file over defaults
 */
export function resolveRunConfig(flags: RunFlags, file: FileConfig): ResolvedRunConfig {
  const timeoutSeconds = flags.timeout ?? file.timeout ?? DEFAULTS.timeoutSeconds;

  const probe: ProbeConfig = {
    urlFile: flags.urlFile ?? file.urlFile,
    singleUrl: flags.singleUrl,
    payloadFile: flags.payloadFile ?? file.payloadFile,
    singlePayload: flags.singlePayload,
    fallbackPayloadFile: DEFAULT_PAYLOAD_FILE,
    maxUrls: flags.maxUrls ?? file.maxUrls,
    maxWorkers: flags.maxWorkers ?? file.maxWorkers ?? defaultMaxWorkers(),
    timeoutMs: Math.round(timeoutSeconds * 1000),
    retries: flags.retries ?? file.retries ?? DEFAULTS.retries,
    retryDelayMs: flags.retryDelay ?? file.retryDelay ?? DEFAULTS.retryDelayMs,
    backoff: flags.backoff ?? file.backoff ?? DEFAULTS.backoff,
    qsreplacePath: flags.qsreplacePath ?? file.qsreplacePath,
    gfPath: flags.gfPath ?? file.gfPath,
    dryRun: flags.dryRun ?? file.dryRun ?? false,
    resume: flags.resume ?? false,
    outputDir: flags.outputDir ?? file.outputDir ?? DEFAULTS.outputDir,
    stateFile: flags.stateFile ?? file.stateFile ?? DEFAULTS.stateFile,
    corpusFile: flags.corpusFile ?? file.corpusFile ?? DEFAULTS.corpusFile,
  };

  return {
    probe,
    quiet: flags.quiet ?? file.quiet ?? false,
    verbose: flags.verbose ?? file.verbose ?? false,
    print: flags.print,
    archive: flags.archive,
    logFile: flags.logFile ?? file.logFile ?? DEFAULTS.logFile,
    tableStyle: flags.tableStyle ?? file.tableStyle ?? DEFAULTS.tableStyle,
  };
}
