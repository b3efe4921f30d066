/**
 * Invocation Runner
 *
 * Runs the substitution tool for one work item: the URL goes to stdin,
 * the payload is the tool's argument. Each attempt is bounded by the
 * timeout; non-zero exits and timeouts are retried with backoff.
 */

import { setTimeout as delay } from "timers/promises";

import {
  InvocationFailure,
  InvocationTimeout,
  errorMessage,
} from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { execCommand } from "./process.js";

import type { CommandExecutor, ProcessOutput } from "./process.js";
import type { BackoffStrategy, InvocationResult, WorkItem } from "./types.js";

const log = logger.child("[runner]");

export interface RunnerConfig {
  /** Resolved substitution tool; null in dry-run without the tool */
  toolPath: string | null;
  /** Per-attempt timeout */
  timeoutMs: number;
  /** Extra attempts after the first */
  retries: number;
  retryDelayMs: number;
  backoff: BackoffStrategy;
  dryRun: boolean;
}

export const DEFAULT_RUNNER_CONFIG: Omit<RunnerConfig, "toolPath"> = {
  timeoutMs: 30_000,
  retries: 2,
  retryDelayMs: 1000,
  backoff: "fixed",
  dryRun: false,
};

export interface RunnerDeps {
  executor?: CommandExecutor;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Delay before the attempt following `attempt` (1-based)
 */
export function backoffDelay(attempt: number, baseMs: number, strategy: BackoffStrategy): number {
  return strategy === "exponential" ? baseMs * 2 ** (attempt - 1) : baseMs;
}

function firstLine(text: string): string | undefined {
  const line = text.split("\n").find((l) => l.trim().length > 0);
  return line?.trim().slice(0, 200);
}

export class InvocationRunner {
  private readonly config: RunnerConfig;
  private readonly executor: CommandExecutor;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: Partial<RunnerConfig> & Pick<RunnerConfig, "toolPath">, deps: RunnerDeps = {}) {
    this.config = { ...DEFAULT_RUNNER_CONFIG, ...config };
    this.executor = deps.executor ?? execCommand;
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
  }

  get dryRun(): boolean {
    return this.config.dryRun;
  }

  /**
   * Run the tool for one work item. Never throws; the outcome is tagged.
   *
   * Once `signal` is aborted no further attempt starts, and the result is
   * marked interrupted when retries were left.
   */
  async run(item: WorkItem, signal?: AbortSignal): Promise<InvocationResult> {
    if (this.config.dryRun) {
      log.debug(`[dry run] would test ${item.url} with payload ${item.payload}`);
      return {
        workItemId: item.id,
        attemptCount: 0,
        exitCode: null,
        stdout: "",
        stderr: "",
        durationMs: 0,
        timedOut: false,
        status: "success",
        dryRun: true,
      };
    }

    const toolPath = this.config.toolPath;
    if (toolPath === null) {
      return {
        workItemId: item.id,
        attemptCount: 0,
        exitCode: null,
        stdout: "",
        stderr: "",
        durationMs: 0,
        timedOut: false,
        status: "tool-missing",
        error: "substitution tool is not resolved",
        dryRun: false,
      };
    }

    const maxAttempts = this.config.retries + 1;
    let sawFailure = false;
    let last: ProcessOutput = { stdout: "", stderr: "", exitCode: null, timedOut: false };
    let lastError: InvocationTimeout | InvocationFailure | undefined;
    let durationMs = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const started = Date.now();
      last = await this.attempt(toolPath, item);
      durationMs = Date.now() - started;

      if (last.spawnError) {
        log.error(`Cannot spawn ${toolPath}: ${last.spawnError}`);
        return {
          workItemId: item.id,
          attemptCount: attempt,
          exitCode: null,
          stdout: last.stdout,
          stderr: last.stderr,
          durationMs,
          timedOut: false,
          status: "tool-missing",
          error: `${toolPath}: ${last.spawnError}`,
          dryRun: false,
        };
      }

      if (!last.timedOut && last.exitCode === 0) {
        return {
          workItemId: item.id,
          attemptCount: attempt,
          exitCode: 0,
          stdout: last.stdout,
          stderr: last.stderr,
          durationMs,
          timedOut: false,
          status: "success",
          dryRun: false,
        };
      }

      if (last.signal) {
        log.warn(`Attempt ${attempt} for ${item.url} was killed by ${last.signal}`);
        return this.interrupted(item, attempt, last, durationMs, `Attempt ${attempt} killed by ${last.signal}`);
      }

      if (last.timedOut) {
        lastError = new InvocationTimeout(attempt, this.config.timeoutMs, { url: item.url });
      } else {
        sawFailure = true;
        lastError = new InvocationFailure(attempt, last.exitCode ?? -1, firstLine(last.stderr), { url: item.url });
      }
      log.warn(`Attempt ${attempt}/${maxAttempts} for ${item.url} (${item.payload.slice(0, 10)}): ${lastError.message}`);

      if (attempt < maxAttempts) {
        await this.sleep(backoffDelay(attempt, this.config.retryDelayMs, this.config.backoff));
        if (signal?.aborted) {
          return this.interrupted(item, attempt, last, durationMs, `Stopped after attempt ${attempt}: ${lastError.message}`);
        }
      }
    }

    return {
      workItemId: item.id,
      attemptCount: maxAttempts,
      exitCode: last.exitCode,
      stdout: last.stdout,
      stderr: last.stderr,
      durationMs,
      timedOut: last.timedOut,
      status: sawFailure ? "failure" : "timeout",
      error: lastError?.message,
      dryRun: false,
    };
  }

  private interrupted(
    item: WorkItem,
    attemptCount: number,
    last: ProcessOutput,
    durationMs: number,
    error: string
  ): InvocationResult {
    return {
      workItemId: item.id,
      attemptCount,
      exitCode: last.exitCode,
      stdout: last.stdout,
      stderr: last.stderr,
      durationMs,
      timedOut: last.timedOut,
      status: "failure",
      error,
      dryRun: false,
      interrupted: true,
    };
  }

  private async attempt(toolPath: string, item: WorkItem): Promise<ProcessOutput> {
    try {
      return await this.executor(toolPath, [item.payload], {
        timeoutMs: this.config.timeoutMs,
        input: `${item.url}\n`,
      });
    } catch (error) {
      return { stdout: "", stderr: errorMessage(error), exitCode: null, timedOut: false };
    }
  }
}
