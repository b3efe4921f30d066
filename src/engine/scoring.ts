/**
 * Scorer & Aggregator
 *
 * Scores are a pure function of an invocation result and the parameters
 * the pattern filter flagged for it, so a run can be re-aggregated from
 * persisted results.
 */

import { queryParameterNames } from "./extractor.js";
import { targetDomain } from "./targets.js";

import type {
  DomainSummary,
  ExtractedParameter,
  InvocationResult,
  InvocationStatus,
  ProcessedItem,
  RunSummary,
  StoredResult,
  SummaryEntry,
  WorkItem,
} from "./types.js";

/** Substrings suggesting a command ran on the target */
export const RCE_INDICATORS = [
  "uid=",
  "gid=",
  "root:",
  "etc/passwd",
  "etc/shadow",
  "vulnerable",
  "bash",
  "whoami",
  "uname -a",
  "id:",
  "successfully executed",
] as const;

/** Substrings suggesting the command was rejected */
export const NEGATIVE_INDICATORS = ["command not found", "permission denied"] as const;

export const SCORE_WEIGHTS = {
  indicator: 2,
  negative: -1,
  slowResponse: 1,
  flaggedParameter: 3,
} as const;

/** Responses at least this slow count as a timing signal */
export const SLOW_RESPONSE_MS = 5000;

/**
 * Score one result. Non-success and dry-run results score 0.
 */
export function scoreResult(
  result: InvocationResult,
  targetUrl: string,
  parameters: readonly ExtractedParameter[]
): number {
  if (result.status !== "success" || result.dryRun) {
    return 0;
  }

  const output = result.stdout.toLowerCase();
  let score = 0;

  for (const indicator of RCE_INDICATORS) {
    if (output.includes(indicator)) score += SCORE_WEIGHTS.indicator;
  }

  if (NEGATIVE_INDICATORS.some((indicator) => output.includes(indicator))) {
    score += SCORE_WEIGHTS.negative;
  }

  if (result.durationMs >= SLOW_RESPONSE_MS) {
    score += SCORE_WEIGHTS.slowResponse;
  }

  const flagged = new Set(parameters.map((p) => p.parameterName));
  if (queryParameterNames(targetUrl).some((name) => flagged.has(name))) {
    score += SCORE_WEIGHTS.flaggedParameter;
  }

  return Math.max(0, score);
}

/**
 * Score descending, then enumeration order
 */
export function compareEntries(a: { score: number; index: number }, b: { score: number; index: number }): number {
  return b.score - a.score || a.index - b.index;
}

export function toSummaryEntry(processed: ProcessedItem): SummaryEntry {
  const { item, result } = processed;
  return {
    domain: targetDomain(item.url),
    url: item.url,
    payload: item.payload,
    workItemId: item.id,
    index: item.index,
    status: result.status,
    attemptCount: result.attemptCount,
    exitCode: result.exitCode,
    durationMs: result.durationMs,
    timedOut: result.timedOut,
    score: processed.score,
    output: result.stdout + result.stderr,
    error: result.error ?? "",
    rceParameters: processed.parameters.map((p) => p.parameterName),
    dryRun: result.dryRun,
  };
}

/**
 * Build the run summary from processed items, in any completion order
 */
export function aggregate(processed: readonly ProcessedItem[], generatedAt: Date = new Date()): RunSummary {
  const entries = processed.map(toSummaryEntry).sort(compareEntries);

  const byStatus: Record<InvocationStatus, number> = { success: 0, failure: 0, timeout: 0, "tool-missing": 0 };
  const byDomain = new Map<string, SummaryEntry[]>();

  for (const entry of entries) {
    byStatus[entry.status]++;
    const group = byDomain.get(entry.domain);
    if (group) {
      group.push(entry);
    } else {
      byDomain.set(entry.domain, [entry]);
    }
  }

  // Entries are sorted, so each group's first entry is its best
  const domains: DomainSummary[] = [...byDomain].map(([domain, group]) => ({
    domain,
    maxScore: group[0]?.score ?? 0,
    entries: group,
  }));
  domains.sort((a, b) => compareEntries(
    { score: a.maxScore, index: a.entries[0]?.index ?? 0 },
    { score: b.maxScore, index: b.entries[0]?.index ?? 0 }
  ));

  return {
    generatedAt: generatedAt.toISOString(),
    total: entries.length,
    byStatus,
    flagged: entries.filter((e) => e.score > 0).length,
    entries,
    domains,
  };
}

/**
 * Score a work item's result and bundle it for aggregation
 */
export function processResult(
  item: WorkItem,
  result: InvocationResult,
  parameters: ExtractedParameter[]
): ProcessedItem {
  return { item, result, parameters, score: scoreResult(result, item.url, parameters) };
}

/**
 * The part of a processed item kept in its state record
 */
export function toStoredResult(processed: ProcessedItem): StoredResult {
  const { item, result } = processed;
  const stored: StoredResult = {
    url: item.url,
    payload: item.payload,
    attemptCount: result.attemptCount,
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    durationMs: result.durationMs,
    timedOut: result.timedOut,
    parameters: processed.parameters.map((p) => p.parameterName),
  };
  if (result.error !== undefined) {
    stored.error = result.error;
  }
  return stored;
}

/**
 * Rebuild and rescore an item completed by an earlier run
 */
export function restoreProcessed(item: WorkItem, status: InvocationStatus, stored: StoredResult): ProcessedItem {
  const result: InvocationResult = {
    workItemId: item.id,
    attemptCount: stored.attemptCount,
    exitCode: stored.exitCode,
    stdout: stored.stdout,
    stderr: stored.stderr,
    durationMs: stored.durationMs,
    timedOut: stored.timedOut,
    status,
    dryRun: false,
  };
  if (stored.error !== undefined) {
    result.error = stored.error;
  }
  const parameters = stored.parameters.map((parameterName) => ({ sourceUrl: item.url, parameterName }));
  return processResult(item, result, parameters);
}
