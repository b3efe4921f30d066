/**
 * Test-execution engine
 *
 * Turns a URL × payload cross product into bounded, retried, resumable
 * invocations of the substitution tool, then scores and aggregates them.
 */

// Types
export type {
  WorkItem,
  InvocationStatus,
  InvocationResult,
  ExtractedParameter,
  RecordStatus,
  StateRecord,
  StoredResult,
  BackoffStrategy,
  ProcessedItem,
  SummaryEntry,
  DomainSummary,
  RunSummary,
} from "./types.js";

export { INVOCATION_STATUSES, isTerminal } from "./types.js";

// Target Enumerator
export {
  loadUrls,
  loadPayloads,
  enumerateWorkItems,
  isTargetUrl,
  workItemId,
  targetDomain,
} from "./targets.js";

export type { UrlSource, PayloadSource, LoadedUrls, LoadedPayloads, Enumeration } from "./targets.js";

export { DEFAULT_PAYLOADS, DEFAULT_PAYLOAD_FILE } from "./payloads.js";

// Tool Locator
export { locateTools, resolveTool, toolCandidates, TOOL_ENV_VARS } from "./tools.js";
export type { ToolName, ResolvedTools, LocateOptions } from "./tools.js";

// Process execution
export { execCommand, terminateActiveProcesses } from "./process.js";
export type { CommandExecutor, ExecOptions, ProcessOutput } from "./process.js";

// Invocation Runner
export { InvocationRunner, backoffDelay, DEFAULT_RUNNER_CONFIG } from "./invoker.js";
export type { RunnerConfig, RunnerDeps } from "./invoker.js";

// Parameter Extractor
export {
  ParameterCorpus,
  ParameterExtractor,
  parseFilterOutput,
  queryParameterNames,
  RCE_PARAMETERS,
} from "./extractor.js";

// State Store
export { StateStore, openStateStore, STATE_VERSION } from "./state-store.js";

// Scheduler
export { Scheduler, defaultMaxWorkers } from "./scheduler.js";
export type { SchedulerDeps, SchedulerOptions, SchedulerOutcome } from "./scheduler.js";

// Scorer & Aggregator
export {
  scoreResult,
  aggregate,
  processResult,
  toStoredResult,
  restoreProcessed,
  RCE_INDICATORS,
  SLOW_RESPONSE_MS,
} from "./scoring.js";

// Artifacts
export { ArtifactWriter, runTimestamp, artifactFileName, artifactDirName } from "./artifacts.js";

// Probe run
export { runProbe, collectResults } from "./probe.js";
export type { ProbeConfig, ProbeDeps, ProbeReport } from "./probe.js";

export const VERSION = "0.1.0";
