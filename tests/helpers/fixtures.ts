/**
 * Builders for engine values
 */

import { workItemId } from "@/engine/targets.js";

import type { ExtractedParameter, InvocationResult, WorkItem } from "@/engine/types.js";

export function makeItem(url: string, payload: string, index = 0): WorkItem {
  return { url, payload, id: workItemId(url, payload), index };
}

export function makeResult(item: WorkItem, overrides: Partial<InvocationResult> = {}): InvocationResult {
  return {
    workItemId: item.id,
    attemptCount: 1,
    exitCode: 0,
    stdout: "",
    stderr: "",
    durationMs: 10,
    timedOut: false,
    status: "success",
    dryRun: false,
    ...overrides,
  };
}

export function params(sourceUrl: string, ...names: string[]): ExtractedParameter[] {
  return names.map((parameterName) => ({ sourceUrl, parameterName }));
}
