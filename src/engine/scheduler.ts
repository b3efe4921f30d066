/**
 * Scheduler
 *
 * Bounded worker pool over the enumerated work items. Items start in
 * enumeration order and may complete in any order. Each completed item is
 * recorded in the State Store and the result stream in one step, then the
 * state is flushed before the worker takes its next item.
 */

import { availableParallelism } from "os";

import pLimit from "p-limit";

import { StatePersistenceError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { processResult, toStoredResult } from "./scoring.js";

import type { ArtifactWriter } from "./artifacts.js";
import type { ParameterExtractor } from "./extractor.js";
import type { InvocationRunner } from "./invoker.js";
import type { StateStore } from "./state-store.js";
import type { ExtractedParameter, InvocationResult, ProcessedItem, WorkItem } from "./types.js";

const log = logger.child("[scheduler]");

export interface SchedulerDeps {
  runner: InvocationRunner;
  /** Ignored in dry-run */
  state?: StateStore;
  extractor?: ParameterExtractor;
  artifacts?: ArtifactWriter;
}

export interface SchedulerOptions {
  /** Pool size; defaults to the host's available parallelism */
  maxWorkers?: number;
  /** Stops dispatch of new items; in-flight items finish */
  signal?: AbortSignal;
  /** Called after each item is recorded */
  onResult?: (processed: ProcessedItem, completed: number, total: number) => void;
}

export interface SchedulerOutcome {
  /** Completed items in completion order */
  processed: ProcessedItem[];
  /** Whether the stop signal cut the run short */
  stopped: boolean;
  /** Items never dispatched because of the stop signal */
  notDispatched: number;
  /** Items cut short before a terminal outcome; left for resume */
  interrupted: number;
}

export function defaultMaxWorkers(): number {
  return Math.max(1, availableParallelism());
}

export class Scheduler {
  /** Dry runs never touch the State Store */
  private readonly state: StateStore | undefined;

  constructor(private readonly deps: SchedulerDeps) {
    this.state = deps.runner.dryRun ? undefined : deps.state;
  }

  /**
   * Run every item through the pool
   *
   * @throws StatePersistenceError after in-flight items have drained
   */
  async run(items: readonly WorkItem[], options: SchedulerOptions = {}): Promise<SchedulerOutcome> {
    const maxWorkers = Math.max(1, options.maxWorkers ?? defaultMaxWorkers());
    const limit = pLimit(maxWorkers);
    const { signal } = options;

    const processed: ProcessedItem[] = [];
    /** Identities taken by a worker this run */
    const dispatched = new Set<string>();
    let notDispatched = 0;
    let interrupted = 0;
    const failure: { fatal?: StatePersistenceError } = {};

    const onAbort = (): void => {
      log.warn(`Stop requested; waiting for ${limit.activeCount} in-flight item(s) to finish`);
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    log.debug(`Dispatching ${items.length} item(s) across ${maxWorkers} worker(s)`);

    const tasks = items.map((item) =>
      limit(async () => {
        if (dispatched.has(item.id)) {
          log.debug(`Skipping duplicate work item ${item.id}`);
          return;
        }
        if (signal?.aborted || failure.fatal) {
          notDispatched++;
          return;
        }
        dispatched.add(item.id);
        try {
          const result = await this.processItem(item, signal);
          if (result.result.interrupted) {
            // Stays in-progress, so a resume runs it again
            interrupted++;
            log.warn(`Interrupted ${item.url}: ${result.result.error ?? "no terminal outcome"}`);
          } else {
            this.state?.markComplete(item.id, result.result.status, toStoredResult(result));
            processed.push(result);
            options.onResult?.(result, processed.length, items.length);
          }
          await this.state?.flush();
        } catch (error) {
          if (error instanceof StatePersistenceError) {
            failure.fatal ??= error;
            log.error(`State persistence failed, stopping dispatch: ${error.message}`);
          } else {
            log.error(`Unexpected error for ${item.url}: ${errorMessage(error)}`);
          }
        }
      })
    );

    await Promise.all(tasks);
    signal?.removeEventListener("abort", onAbort);

    if (failure.fatal) {
      throw failure.fatal;
    }
    await this.state?.flush();

    return {
      processed,
      stopped: signal?.aborted ?? false,
      notDispatched,
      interrupted,
    };
  }

  /**
   * Invoke, extract, score and capture one item
   */
  private async processItem(item: WorkItem, signal?: AbortSignal): Promise<ProcessedItem> {
    const { runner, extractor, artifacts } = this.deps;

    this.state?.markStarted(item.id);
    const result = await runner.run(item, signal);
    if (result.interrupted) {
      return processResult(item, result, []);
    }
    this.logResult(item, result);

    let parameters: ExtractedParameter[] = [];
    if (extractor && result.status === "success" && !result.dryRun) {
      try {
        parameters = await extractor.extract(item, result.stdout);
      } catch (error) {
        log.warn(`Parameter extraction failed for ${item.url}: ${errorMessage(error)}`);
      }
    }

    const processed = processResult(item, result, parameters);

    if (artifacts && !result.dryRun) {
      try {
        processed.artifactPath = await artifacts.write(processed);
      } catch (error) {
        log.error(`Could not save output for ${item.url}: ${errorMessage(error)}`);
      }
    }

    return processed;
  }

  private logResult(item: WorkItem, result: InvocationResult): void {
    const label = `${item.url} with payload ${item.payload.slice(0, 10)}`;
    if (result.dryRun) {
      log.info(`[dry run] would test ${label}`);
    } else if (result.status === "success") {
      log.debug(`Tested ${label} (${result.attemptCount} attempt(s), ${result.durationMs}ms)`);
    } else {
      log.warn(`Gave up on ${label}: ${result.status}${result.error ? ` (${result.error})` : ""}`);
    }
  }
}
