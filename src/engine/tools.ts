/**
 * Tool Locator
 *
 * Resolves the substitution tool and the pattern filter once at startup.
 * Resolution order: explicit path, environment variable, PATH, then a few
 * common install directories.
 */

import { constants } from "fs";
import { access, stat } from "fs/promises";
import { homedir } from "os";
import { delimiter, join } from "path";

import { ToolUnavailableError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { execCommand } from "./process.js";

import type { CommandExecutor } from "./process.js";

const log = logger.child("[tools]");

/** External tools the engine drives */
export type ToolName = "qsreplace" | "gf";

export const TOOL_ENV_VARS: Record<ToolName, string> = {
  qsreplace: "QSREPLACE_PATH",
  gf: "GF_PATH",
};

/** Probe timeout for the `-h` check */
export const PROBE_TIMEOUT_MS = 5000;

export type CandidateSource = "explicit" | "env" | "path" | "common";

export interface ToolCandidate {
  source: CandidateSource;
  path: string;
}

/** Immutable result of tool resolution; null only in dry-run */
export interface ResolvedTools {
  readonly qsreplace: string | null;
  readonly gf: string | null;
}

export interface LocateOptions {
  qsreplacePath?: string;
  gfPath?: string;
  dryRun?: boolean;
  env?: NodeJS.ProcessEnv;
  /** Directories searched after PATH */
  commonDirs?: string[];
  executor?: CommandExecutor;
}

export function defaultCommonDirs(): string[] {
  const home = homedir();
  return [
    "/usr/local/bin",
    "/usr/bin",
    join(home, "go", "bin"),
    join(home, ".npm-global", "bin"),
    join(home, "bin"),
  ];
}

/**
 * Candidate paths for a tool in priority order
 */
export function toolCandidates(
  name: ToolName,
  explicitPath: string | undefined,
  env: NodeJS.ProcessEnv,
  commonDirs: readonly string[]
): ToolCandidate[] {
  const candidates: ToolCandidate[] = [];

  if (explicitPath) {
    candidates.push({ source: "explicit", path: explicitPath });
  }

  const envPath = env[TOOL_ENV_VARS[name]];
  if (envPath) {
    candidates.push({ source: "env", path: envPath });
  }

  for (const dir of (env["PATH"] ?? "").split(delimiter)) {
    if (dir) {
      candidates.push({ source: "path", path: join(dir, name) });
    }
  }

  for (const dir of commonDirs) {
    candidates.push({ source: "common", path: join(dir, name) });
  }

  return candidates;
}

/**
 * Whether a path is a regular file with the execute bit set
 */
export async function isExecutableFile(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    if (!info.isFile()) return false;
    await access(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Run the tool with `-h` and check it responds like the expected binary
 */
async function probeTool(toolPath: string, executor: CommandExecutor): Promise<boolean> {
  const output = await executor(toolPath, ["-h"], { timeoutMs: PROBE_TIMEOUT_MS });
  if (output.spawnError || output.timedOut) return false;
  const text = `${output.stdout}\n${output.stderr}`.toLowerCase();
  return output.exitCode === 0 || text.includes("usage");
}

/**
 * Resolve one tool to a verified executable path
 *
 * @throws ToolUnavailableError
 */
export async function resolveTool(
  name: ToolName,
  explicitPath: string | undefined,
  options: LocateOptions = {}
): Promise<string> {
  const env = options.env ?? process.env;
  const executor = options.executor ?? execCommand;
  const candidates = toolCandidates(name, explicitPath, env, options.commonDirs ?? defaultCommonDirs());

  for (const candidate of candidates) {
    if (!(await isExecutableFile(candidate.path))) {
      if (candidate.source === "explicit" || candidate.source === "env") {
        log.warn(`${name}: ${candidate.source} path ${candidate.path} is not an executable file`);
      }
      continue;
    }

    log.debug(`${name}: found at ${candidate.path} (${candidate.source})`);

    let functional: boolean;
    try {
      functional = await probeTool(candidate.path, executor);
    } catch (error) {
      throw new ToolUnavailableError(name, `probe failed: ${errorMessage(error)}`, { path: candidate.path });
    }
    if (!functional) {
      throw new ToolUnavailableError(name, `${candidate.path} did not respond to -h`, { path: candidate.path });
    }
    return candidate.path;
  }

  throw new ToolUnavailableError(
    name,
    `not found (set --${name}-path or ${TOOL_ENV_VARS[name]}, or add it to PATH)`
  );
}

/**
 * Resolve both tools. In dry-run, failures become warnings and null paths.
 */
export async function locateTools(options: LocateOptions = {}): Promise<ResolvedTools> {
  const resolveOrWarn = async (name: ToolName, explicitPath: string | undefined): Promise<string | null> => {
    try {
      return await resolveTool(name, explicitPath, options);
    } catch (error) {
      if (options.dryRun && error instanceof ToolUnavailableError) {
        log.warn(`${error.message} (ignored in dry-run)`);
        return null;
      }
      throw error;
    }
  };

  const qsreplace = await resolveOrWarn("qsreplace", options.qsreplacePath);
  const gf = await resolveOrWarn("gf", options.gfPath);

  return Object.freeze({ qsreplace, gf });
}
