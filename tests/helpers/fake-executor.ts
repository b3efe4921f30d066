/**
 * In-process stand-in for external commands
 */

import type { CommandExecutor, ExecOptions, ProcessOutput } from "@/engine/process.js";

export interface RecordedCall {
  command: string;
  args: string[];
  options: ExecOptions;
}

export type FakeHandler = (call: RecordedCall) => Partial<ProcessOutput> | Promise<Partial<ProcessOutput>>;

export interface FakeExecutor {
  executor: CommandExecutor;
  calls: RecordedCall[];
}

/**
 * Build an executor that answers every call through `handler`
 */
export function fakeExecutor(handler: FakeHandler = () => ({})): FakeExecutor {
  const calls: RecordedCall[] = [];
  const executor: CommandExecutor = async (command, args, options) => {
    const call = { command, args: [...args], options };
    calls.push(call);
    const output = await handler(call);
    return { stdout: "", stderr: "", exitCode: 0, timedOut: false, ...output };
  };
  return { executor, calls };
}

/** Output of a process killed by the timeout */
export const TIMED_OUT: Partial<ProcessOutput> = { exitCode: null, timedOut: true };

export const noSleep = async (): Promise<void> => undefined;
