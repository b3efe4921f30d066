/**
 * State Store
 *
 * Durable record of dispatched work items, used to resume an interrupted
 * run. The whole state is rewritten on flush through a temp file and a
 * rename, so the file on disk is always a complete snapshot.
 */

import { mkdir, open, readFile, rename, rm } from "fs/promises";
import { dirname } from "path";

import pLimit from "p-limit";
import { z } from "zod";

import { StatePersistenceError, errorMessage, hasErrorCode } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { isTerminal } from "./types.js";

import type { InvocationStatus, RecordStatus, StateRecord, StoredResult } from "./types.js";

const log = logger.child("[state]");

/**
 * Current state file version - increment when format changes
 */
export const STATE_VERSION = 1;

const RecordStatusSchema = z.enum(["in-progress", "success", "failure", "timeout", "tool-missing"]);

const StoredResultSchema = z.object({
  url: z.string(),
  payload: z.string(),
  attemptCount: z.number().int().nonnegative(),
  exitCode: z.number().int().nullable(),
  stdout: z.string(),
  stderr: z.string(),
  durationMs: z.number().nonnegative(),
  timedOut: z.boolean(),
  error: z.string().optional(),
  parameters: z.array(z.string()),
});

const StateFileSchema = z.object({
  version: z.literal(STATE_VERSION),
  records: z.record(
    z.object({
      status: RecordStatusSchema,
      timestamp: z.string(),
      result: StoredResultSchema.optional(),
    })
  ),
});

type StateFile = z.infer<typeof StateFileSchema>;

export interface StateStoreOptions {
  now?: () => Date;
}

export class StateStore {
  private entries = new Map<string, Omit<StateRecord, "workItemId">>();
  /** Bumped on every mutation */
  private revision = 0;
  private persistedRevision = 0;
  private tempCounter = 0;
  /** Single writer for the state file */
  private readonly writer = pLimit(1);
  private readonly now: () => Date;

  constructor(
    public readonly filePath: string,
    options: StateStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load persisted state. A missing file is an empty state.
   *
   * @throws StatePersistenceError when the file is unreadable or invalid
   */
  async load(): Promise<void> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        this.entries.clear();
        return;
      }
      throw new StatePersistenceError(`Cannot read state file: ${errorMessage(error)}`, this.filePath);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new StatePersistenceError(
        `State file is not valid JSON (${errorMessage(error)}). Run \`qsprobe reset\` to start over.`,
        this.filePath
      );
    }

    const result = StateFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new StatePersistenceError(
        `State file has an unexpected format. Run \`qsprobe reset\` to start over.`,
        this.filePath,
        { issues: result.error.issues.map((i) => i.message) }
      );
    }

    this.entries = new Map(Object.entries(result.data.records));
    this.persistedRevision = this.revision;
    log.debug(`Loaded ${this.entries.size} state records from ${this.filePath}`);
  }

  /**
   * Whether the item reached a terminal status
   */
  isComplete(workItemId: string): boolean {
    const entry = this.entries.get(workItemId);
    return entry !== undefined && isTerminal(entry.status);
  }

  /**
   * Record the first dispatch attempt (non-terminal)
   */
  markStarted(workItemId: string): void {
    this.set(workItemId, "in-progress");
  }

  /**
   * Record a terminal outcome. Durable after the next flush().
   */
  markComplete(workItemId: string, status: InvocationStatus, result?: StoredResult): void {
    this.set(workItemId, status, result);
  }

  /**
   * Identities with a terminal status
   */
  loadAll(): Set<string> {
    const done = new Set<string>();
    for (const [id, entry] of this.entries) {
      if (isTerminal(entry.status)) done.add(id);
    }
    return done;
  }

  get(workItemId: string): StateRecord | undefined {
    const entry = this.entries.get(workItemId);
    return entry ? { workItemId, ...entry } : undefined;
  }

  records(): StateRecord[] {
    return [...this.entries].map(([workItemId, entry]) => ({ workItemId, ...entry }));
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Persist every mutation made before this call
   *
   * @throws StatePersistenceError
   */
  async flush(): Promise<void> {
    await this.writer(async () => {
      if (this.persistedRevision === this.revision) return;
      const revision = this.revision;
      await this.writeSnapshot(this.snapshot());
      this.persistedRevision = revision;
    });
  }

  /**
   * Forget all records and delete the state file
   */
  async reset(): Promise<void> {
    await this.writer(async () => {
      this.entries.clear();
      this.revision++;
      try {
        await rm(this.filePath, { force: true });
      } catch (error) {
        throw new StatePersistenceError(`Cannot delete state file: ${errorMessage(error)}`, this.filePath);
      }
      this.persistedRevision = this.revision;
    });
  }

  private set(workItemId: string, status: RecordStatus, result?: StoredResult): void {
    const timestamp = this.now().toISOString();
    this.entries.set(workItemId, result ? { status, timestamp, result } : { status, timestamp });
    this.revision++;
  }

  private snapshot(): StateFile {
    return {
      version: STATE_VERSION,
      records: Object.fromEntries(this.entries),
    };
  }

  private async writeSnapshot(state: StateFile): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.${++this.tempCounter}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      const handle = await open(tempPath, "w");
      try {
        await handle.writeFile(JSON.stringify(state), "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        log.debug(`Could not remove ${tempPath}: ${errorMessage(cleanupError)}`);
      });
      throw new StatePersistenceError(`Cannot write state file: ${errorMessage(error)}`, this.filePath);
    }
  }
}

/**
 * Create a state store and load its file
 */
export async function openStateStore(filePath: string, options?: StateStoreOptions): Promise<StateStore> {
  const store = new StateStore(filePath, options);
  await store.load();
  return store;
}
