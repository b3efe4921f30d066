/**
 * End-to-end probe run: resolve tools, enumerate work, schedule it and
 * aggregate the results.
 */

import { resolve } from "path";
import type { Readable } from "stream";

import { logger } from "../lib/logger.js";
import { ArtifactWriter, runTimestamp } from "./artifacts.js";
import { ParameterCorpus, ParameterExtractor } from "./extractor.js";
import { InvocationRunner } from "./invoker.js";
import { Scheduler } from "./scheduler.js";
import { aggregate, restoreProcessed } from "./scoring.js";
import { openStateStore } from "./state-store.js";
import { enumerateWorkItems, loadPayloads, loadUrls } from "./targets.js";
import { locateTools } from "./tools.js";
import { isTerminal } from "./types.js";

import type { CommandExecutor } from "./process.js";
import type { StateStore } from "./state-store.js";
import type { ResolvedTools } from "./tools.js";
import type { BackoffStrategy, ProcessedItem, RunSummary, WorkItem } from "./types.js";

const log = logger.child("[probe]");

export interface ProbeConfig {
  urlFile?: string;
  singleUrl?: string;
  payloadFile?: string;
  singlePayload?: string;
  /** Read when no payload source is given and the file exists */
  fallbackPayloadFile?: string;
  maxUrls?: number;
  maxWorkers?: number;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  backoff: BackoffStrategy;
  qsreplacePath?: string;
  gfPath?: string;
  dryRun: boolean;
  resume: boolean;
  outputDir: string;
  stateFile: string;
  corpusFile: string;
}

export interface ProbeDeps {
  /** Piped URL input, when stdin is not a TTY */
  stdin?: Readable;
  signal?: AbortSignal;
  executor?: CommandExecutor;
  sleep?: (ms: number) => Promise<void>;
  env?: NodeJS.ProcessEnv;
  commonDirs?: string[];
  now?: () => Date;
  onStart?: (total: number) => void;
  onResult?: (processed: ProcessedItem, completed: number, total: number) => void;
}

export interface ProbeReport {
  summary: RunSummary;
  tools: ResolvedTools;
  /** Run timestamp used in artifact and report names */
  timestamp: string;
  /** Work items scheduled this run */
  scheduled: number;
  /** Pairs skipped because the state marked them complete */
  alreadyComplete: number;
  /** Malformed URL lines skipped */
  skippedUrls: number;
  stopped: boolean;
  notDispatched: number;
  /** Items cut short this run, left for resume */
  interrupted: number;
  /** Summary entries taken from earlier runs' state records */
  carriedOver: number;
  /** Captures written this run; absent in dry-run */
  artifacts?: ArtifactWriter;
}

/**
 * Run a probe
 *
 * @throws ConfigurationError, ToolUnavailableError, StatePersistenceError
 */
export async function runProbe(config: ProbeConfig, deps: ProbeDeps = {}): Promise<ProbeReport> {
  const now = deps.now ?? (() => new Date());
  const timestamp = runTimestamp(now());

  if (config.dryRun) {
    log.info("Dry run: no tool will be invoked and no state will be written");
  }

  const tools = await locateTools({
    qsreplacePath: config.qsreplacePath,
    gfPath: config.gfPath,
    dryRun: config.dryRun,
    env: deps.env,
    commonDirs: deps.commonDirs,
    executor: deps.executor,
  });

  const state = config.dryRun ? undefined : await openStateStore(resolve(config.stateFile), { now });
  const exclude = config.resume && state ? state.loadAll() : new Set<string>();
  if (config.resume && state) {
    log.info(`Resuming: ${exclude.size} work item(s) already complete in ${state.filePath}`);
  }

  const urls = await loadUrls({
    single: config.singleUrl,
    file: config.urlFile,
    stdin: deps.stdin,
    maxUrls: config.maxUrls,
  });
  const payloads = await loadPayloads({
    single: config.singlePayload,
    file: config.payloadFile,
    fallbackFile: config.fallbackPayloadFile,
  });
  const { items, all, excluded } = enumerateWorkItems(urls.urls, payloads.payloads, exclude);

  log.info(
    `${items.length} work item(s) from ${urls.urls.length} URL(s) × ${payloads.payloads.length} payload(s)` +
      (excluded > 0 ? `, ${excluded} already complete` : "")
  );

  const base = {
    tools,
    timestamp,
    scheduled: items.length,
    alreadyComplete: excluded,
    skippedUrls: urls.skipped,
  };

  if (items.length === 0) {
    log.success("All work items already processed");
    const collected = collectResults(all, [], state);
    return {
      ...base,
      summary: aggregate(collected.results, now()),
      stopped: false,
      notDispatched: 0,
      interrupted: 0,
      carriedOver: collected.carriedOver,
    };
  }

  const corpus = new ParameterCorpus(resolve(config.corpusFile));
  await corpus.load();

  const runner = new InvocationRunner(
    {
      toolPath: tools.qsreplace,
      timeoutMs: config.timeoutMs,
      retries: config.retries,
      retryDelayMs: config.retryDelayMs,
      backoff: config.backoff,
      dryRun: config.dryRun,
    },
    { executor: deps.executor, sleep: deps.sleep }
  );
  const extractor = new ParameterExtractor(
    { filterPath: tools.gf, timeoutMs: config.timeoutMs },
    corpus,
    deps.executor
  );
  const artifacts = config.dryRun ? undefined : new ArtifactWriter(resolve(config.outputDir), timestamp);

  deps.onStart?.(items.length);
  const scheduler = new Scheduler({ runner, state, extractor, artifacts });
  const outcome = await scheduler.run(items, {
    maxWorkers: config.maxWorkers,
    signal: deps.signal,
    onResult: deps.onResult,
  });

  if (outcome.stopped) {
    log.warn(`Stopped early: ${outcome.processed.length} done, ${outcome.notDispatched} not dispatched`);
  }

  const collected = collectResults(all, outcome.processed, state);
  if (collected.carriedOver > 0) {
    log.info(`Summary includes ${collected.carriedOver} result(s) from earlier runs`);
  }

  return {
    ...base,
    summary: aggregate(collected.results, now()),
    stopped: outcome.stopped,
    notDispatched: outcome.notDispatched,
    interrupted: outcome.interrupted,
    carriedOver: collected.carriedOver,
    artifacts,
  };
}

/**
 * Results for every enumerated pair: this run's, else a terminal result
 * persisted by an earlier run
 */
export function collectResults(
  all: readonly WorkItem[],
  processed: readonly ProcessedItem[],
  state?: StateStore
): { results: ProcessedItem[]; carriedOver: number } {
  const current = new Map(processed.map((p) => [p.item.id, p]));
  const results: ProcessedItem[] = [];
  let carriedOver = 0;

  for (const item of all) {
    const fresh = current.get(item.id);
    if (fresh) {
      results.push(fresh);
      continue;
    }
    const record = state?.get(item.id);
    if (record?.result && isTerminal(record.status)) {
      results.push(restoreProcessed(item, record.status, record.result));
      carriedOver++;
    }
  }

  return { results, carriedOver };
}
