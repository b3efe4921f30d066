/**
 * Run command - Test URLs against payloads through the substitution tool
 */

import { resolve } from "path";
import type { Readable } from "stream";

import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import ora from "ora";

import type { Command } from "commander";

import { VERSION, runProbe, terminateActiveProcesses } from "../../engine/index.js";
import { ProbeError } from "../../lib/errors.js";
import { logger } from "../../lib/index.js";
import { loadConfigFile, resolveRunConfig } from "../config.js";
import { TABLE_STYLES, formatError, formatResultsTable, formatSuccess, formatTotals, formatWarning } from "../formatters.js";
import { writeReports } from "../report-formatters.js";

import type { ProbeDeps } from "../../engine/probe.js";
import type { BackoffStrategy } from "../../engine/types.js";
import type { RunFlags } from "../config.js";
import type { TableStyle } from "../formatters.js";

/** Exit status after an interrupted run */
export const INTERRUPTED_EXIT_CODE = 130;

/**
 * Parse a whole number not below `min`
 */
export function parseInteger(min: number): (value: string) => number {
  return (value: string) => {
    if (!/^\d+$/.test(value.trim())) {
      throw new InvalidArgumentError("Not a whole number.");
    }
    const parsed = Number.parseInt(value, 10);
    if (parsed < min) {
      throw new InvalidArgumentError(`Must be at least ${min}.`);
    }
    return parsed;
  };
}

/**
 * Parse a timeout in seconds
 */
export function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive number of seconds.");
  }
  return parsed;
}

export function parseBackoff(value: string): BackoffStrategy {
  if (value === "fixed" || value === "exponential") {
    return value;
  }
  throw new InvalidArgumentError("Use: fixed, exponential");
}

export function parseTableStyle(value: string): TableStyle {
  const style = TABLE_STYLES.find((s) => s === value);
  if (style === undefined) {
    throw new InvalidArgumentError(`Use: ${TABLE_STYLES.join(", ")}`);
  }
  return style;
}

/**
 * SIGINT listener: the first interrupt stops dispatch, the next one forces
 * an exit through `onForce`
 */
export function interruptHandler(controller: AbortController, onForce: () => void): () => void {
  return () => {
    if (controller.signal.aborted) {
      onForce();
    } else {
      controller.abort();
    }
  };
}

export interface RunCommandDeps {
  /** Stop signal for the run */
  signal?: AbortSignal;
  /** Piped URL input */
  stdin?: Readable;
  /** Where the default config file is looked up */
  cwd?: string;
  /** Show a spinner; defaults to whether stderr is a TTY */
  interactive?: boolean;
  /** Stand-ins for tools, clock and environment */
  probe?: Omit<ProbeDeps, "stdin" | "signal" | "onStart" | "onResult">;
}

/**
 * Run a probe from command-line flags and report on it
 *
 * @returns the process exit status
 */
export async function executeRun(flags: RunFlags, deps: RunCommandDeps = {}): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();
  const fileConfig = loadConfigFile(flags.config, cwd);
  if (!fileConfig.success) {
    console.error(formatError(fileConfig.error));
    return 1;
  }

  const config = resolveRunConfig(flags, fileConfig.data);
  if (config.quiet) {
    logger.configure({ level: "error" });
  } else if (config.verbose) {
    logger.configure({ level: "debug" });
  }
  logger.attachFile(resolve(cwd, config.logFile));

  const interactive = deps.interactive ?? process.stderr.isTTY === true;
  const spinner = !config.quiet && interactive ? ora() : null;
  const onAbort = (): void => {
    spinner?.stop();
    console.error(formatWarning("Interrupted, finishing in-flight work (press Ctrl+C again to force quit)..."));
  };
  deps.signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const report = await runProbe(config.probe, {
      ...deps.probe,
      stdin: deps.stdin,
      signal: deps.signal,
      onStart: (total) => {
        spinner?.start(`Testing 0/${total}...`);
      },
      onResult: (_processed, completed, total) => {
        if (spinner) {
          spinner.text = `Testing ${completed}/${total}...`;
        }
      },
    });

    if (report.stopped) {
      const finished = report.scheduled - report.notDispatched - report.interrupted;
      spinner?.warn(`Stopped after ${finished} of ${report.scheduled} work items`);
    } else {
      spinner?.succeed(`Tested ${report.scheduled} work items`);
    }

    if (report.summary.total > 0) {
      const paths = await writeReports(report.summary, config.probe.outputDir, report.timestamp, VERSION);
      logger.info(`Reports: ${paths.json}, ${paths.csv}, ${paths.html}`);

      if (config.archive && report.artifacts) {
        const zipPath = report.artifacts.archive();
        if (zipPath) {
          logger.info(`Archive: ${zipPath}`);
        }
      }

      if (config.print && !config.quiet) {
        console.log();
        console.log(formatResultsTable(report.summary, config.tableStyle));
      } else if (!config.quiet) {
        console.log(formatTotals(report.summary));
      }

      if (report.summary.flagged > 0 && !config.quiet) {
        console.log(chalk.red.bold(`\n${report.summary.flagged} result(s) scored above 0, review the captures.`));
      } else if (!config.quiet) {
        console.log(formatSuccess("No result scored above 0"));
      }
    }

    return report.stopped ? INTERRUPTED_EXIT_CODE : 0;
  } catch (error) {
    spinner?.fail("Run failed");
    const failure = error instanceof Error ? error : new Error(String(error));
    console.error(formatError(failure));
    if (logger.isVerbose() && failure instanceof ProbeError && failure.context) {
      console.error(chalk.gray(JSON.stringify(failure.context, null, 2)));
    }
    return 1;
  } finally {
    deps.signal?.removeEventListener("abort", onAbort);
    await logger.detachFile();
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command("run", { isDefault: true })
    .description("Test URLs with RCE payloads through qsreplace")
    .option("--url-file <path>", "File with target URLs, one per line")
    .option("--single-url <url>", "Single URL to test")
    .option("--payload-file <path>", "File with payloads, one per line (default: payloads.txt when present)")
    .option("--single-payload <payload>", "Single payload to test")
    .option("--max-workers <n>", "Max concurrent workers", parseInteger(1))
    .option("--timeout <seconds>", "Timeout per qsreplace attempt in seconds", parseSeconds)
    .option("--retries <n>", "Retries after a failed attempt", parseInteger(0))
    .option("--retry-delay <ms>", "Delay between attempts in milliseconds", parseInteger(0))
    .option("--backoff <strategy>", "Retry backoff: fixed, exponential", parseBackoff)
    .option("--qsreplace-path <path>", "Custom path to qsreplace executable")
    .option("--gf-path <path>", "Custom path to gf executable")
    .option("--max-urls <n>", "Maximum number of URLs to process", parseInteger(1))
    .option("--output-dir <dir>", "Directory for captures, reports and the archive")
    .option("--state-file <path>", "State file used for resume")
    .option("--corpus-file <path>", "File collecting RCE-relevant parameter names")
    .option("--log-file <path>", "File every log line is appended to (default: rce_test.log)")
    .option("--table-style <style>", `Results table style: ${TABLE_STYLES.join(", ")}`, parseTableStyle)
    .option("--config <path>", "YAML config file (default: rce_config.yaml when present)")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .option("-v, --verbose", "Verbose output")
    .option("--dry-run", "Simulate execution without running qsreplace")
    .option("--resume", "Skip work items completed by a previous run")
    .option("--no-print", "Skip printing the results table")
    .option("--no-archive", "Skip the zip archive of captured output")
    .action(async (flags: RunFlags) => {
      const controller = new AbortController();
      const onSigint = interruptHandler(controller, () => {
        const killed = terminateActiveProcesses();
        console.error(formatError(new Error(`Interrupted again, killed ${killed} running tool process(es)`)));
        process.exit(INTERRUPTED_EXIT_CODE);
      });
      process.on("SIGINT", onSigint);

      try {
        const code = await executeRun(flags, {
          signal: controller.signal,
          stdin: process.stdin.isTTY ? undefined : process.stdin,
        });
        if (code !== 0) {
          process.exit(code);
        }
      } finally {
        process.off("SIGINT", onSigint);
      }
    });
}
