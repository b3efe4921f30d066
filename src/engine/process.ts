/**
 * Child process execution with a hard timeout
 *
 * Each child leads its own process group. A terminal interrupt therefore
 * reaches qsprobe only, and the timeout kills the child together with
 * anything it forked.
 */

import { spawn } from "child_process";

import type { Readable } from "stream";

import { errorMessage, hasErrorCode } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

const log = logger.child("[process]");

/** Options for a single command execution */
export interface ExecOptions {
  /** Kill the child after this many milliseconds */
  timeoutMs: number;
  /** Written to the child's stdin, which is then closed */
  input?: string;
}

/** Captured outcome of a command */
export interface ProcessOutput {
  stdout: string;
  stderr: string;
  /** null when the process never exited on its own */
  exitCode: number | null;
  timedOut: boolean;
  /** Signal that killed the process from outside, not by the timeout */
  signal?: NodeJS.Signals;
  /** errno code when the process could not be spawned (e.g. ENOENT) */
  spawnError?: string;
}

/** Runs one external command; swapped out in tests */
export type CommandExecutor = (
  command: string,
  args: readonly string[],
  options: ExecOptions
) => Promise<ProcessOutput>;

/** Process groups of running children */
const activeGroups = new Set<number>();

function killGroup(pid: number): void {
  try {
    if (process.platform === "win32") {
      process.kill(pid, "SIGKILL");
    } else {
      process.kill(-pid, "SIGKILL");
    }
  } catch (error) {
    if (!hasErrorCode(error, "ESRCH")) {
      log.debug(`Could not kill process group ${pid}: ${errorMessage(error)}`);
    }
  }
}

/**
 * Kill every running child and its process group
 *
 * @returns how many groups were signalled
 */
export function terminateActiveProcesses(): number {
  const count = activeGroups.size;
  for (const pid of activeGroups) {
    killGroup(pid);
  }
  activeGroups.clear();
  return count;
}

function closeStreams(proc: { stdout: Readable; stderr: Readable }): void {
  proc.stdout.destroy();
  proc.stderr.destroy();
}

/**
 * Execute a command and capture its output.
 *
 * Never rejects: spawn failures are reported through `spawnError`.
 */
export const execCommand: CommandExecutor = (command, args, options) => {
  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;
    let exit: { code: number | null; signal: NodeJS.Signals | null } | undefined;

    const proc = spawn(command, [...args], {
      stdio: ["pipe", "pipe", "pipe"],
      detached: true,
    });
    const pid = proc.pid;
    if (pid !== undefined) {
      activeGroups.add(pid);
    }

    const finish = (output: ProcessOutput): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (pid !== undefined) {
        activeGroups.delete(pid);
      }
      resolve(output);
    };

    const exited = (): ProcessOutput => {
      const output: ProcessOutput = {
        stdout,
        stderr,
        exitCode: timedOut ? null : (exit?.code ?? null),
        timedOut,
      };
      if (!timedOut && exit?.signal) {
        output.signal = exit.signal;
      }
      return output;
    };

    proc.stdout.setEncoding("utf8");
    proc.stderr.setEncoding("utf8");

    proc.stdout.on("data", (data: string) => {
      stdout += data;
    });

    proc.stderr.on("data", (data: string) => {
      stderr += data;
    });

    const timer = setTimeout(() => {
      // Forked children may still hold the pipes after the child exited
      timedOut = exit === undefined;
      if (pid !== undefined) {
        killGroup(pid);
      }
      closeStreams(proc);
      if (exit) {
        finish(exited());
      }
    }, options.timeoutMs);

    proc.on("exit", (code, signal) => {
      exit = { code, signal };
      if (timedOut) {
        closeStreams(proc);
        finish(exited());
      }
    });

    proc.on("close", () => {
      finish(exited());
    });

    proc.on("error", (error: NodeJS.ErrnoException) => {
      finish({
        stdout,
        stderr: stderr ? `${stderr}\n${error.message}` : error.message,
        exitCode: null,
        timedOut: false,
        spawnError: error.code ?? "UNKNOWN",
      });
    });

    // The child may exit before reading its input
    proc.stdin.on("error", (error) => {
      log.debug(`stdin of ${command} closed early: ${error.message}`);
    });
    proc.stdin.end(options.input ?? "");
  });
};
