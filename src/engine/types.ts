/**
 * Test-execution engine types
 */

/** One (URL, payload) pair to test */
export interface WorkItem {
  /** Target URL with at least one query parameter */
  readonly url: string;
  /** Opaque payload string */
  readonly payload: string;
  /** SHA-256 of (url, payload); dedup and resume key */
  readonly id: string;
  /** Position in enumeration order */
  readonly index: number;
}

/** Outcome of an invocation after retries */
export const INVOCATION_STATUSES = ["success", "failure", "timeout", "tool-missing"] as const;

export type InvocationStatus = (typeof INVOCATION_STATUSES)[number];

/** Result of running the substitution tool for one work item */
export interface InvocationResult {
  workItemId: string;
  /** Attempts actually made (1..retries+1) */
  attemptCount: number;
  /** Exit code of the last attempt, null when nothing exited */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Wall time of the last attempt */
  durationMs: number;
  /** Whether the last attempt timed out */
  timedOut: boolean;
  status: InvocationStatus;
  /** Message of the last attempt's error */
  error?: string;
  /** Synthetic result, no process was spawned */
  dryRun: boolean;
  /** Cut short by a signal or a stop before retries ran out; not terminal */
  interrupted?: boolean;
}

/** A parameter the pattern filter flagged as RCE-relevant */
export interface ExtractedParameter {
  sourceUrl: string;
  parameterName: string;
}

/** Persisted status of a work item; in-progress is the only non-terminal one */
export type RecordStatus = InvocationStatus | "in-progress";

/** What a terminal record keeps so later runs can re-aggregate it */
export interface StoredResult {
  url: string;
  payload: string;
  attemptCount: number;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  error?: string;
  /** RCE-relevant parameter names found for the item */
  parameters: string[];
}

/** Durable record of a dispatched work item */
export interface StateRecord {
  workItemId: string;
  status: RecordStatus;
  /** ISO-8601 */
  timestamp: string;
  /** Present on terminal records */
  result?: StoredResult;
}

/** Backoff between retry attempts */
export type BackoffStrategy = "fixed" | "exponential";

/** Completed work item as it flows into aggregation */
export interface ProcessedItem {
  item: WorkItem;
  result: InvocationResult;
  parameters: ExtractedParameter[];
  score: number;
  /** Raw-output capture written for this item, if any */
  artifactPath?: string;
}

/** Derived reporting row */
export interface SummaryEntry {
  domain: string;
  url: string;
  payload: string;
  workItemId: string;
  index: number;
  status: InvocationStatus;
  attemptCount: number;
  exitCode: number | null;
  durationMs: number;
  timedOut: boolean;
  score: number;
  output: string;
  error: string;
  rceParameters: string[];
  dryRun: boolean;
}

/** Entries of one target domain */
export interface DomainSummary {
  domain: string;
  maxScore: number;
  entries: SummaryEntry[];
}

/** Aggregated view of a run */
export interface RunSummary {
  generatedAt: string;
  total: number;
  byStatus: Record<InvocationStatus, number>;
  /** Entries with a score above zero */
  flagged: number;
  /** All entries, score descending then enumeration order */
  entries: SummaryEntry[];
  domains: DomainSummary[];
}

/** Whether a persisted status is terminal */
export function isTerminal(status: RecordStatus): status is InvocationStatus {
  return status !== "in-progress";
}
