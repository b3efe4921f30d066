/**
 * Scheduler Tests
 */

import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { InvocationRunner } from "@/engine/invoker.js";
import { Scheduler } from "@/engine/scheduler.js";
import { aggregate } from "@/engine/scoring.js";
import { StateStore, openStateStore } from "@/engine/state-store.js";
import { enumerateWorkItems } from "@/engine/targets.js";
import { StatePersistenceError } from "@/lib/errors.js";
import { logger } from "@/lib/logger.js";

import { TIMED_OUT, fakeExecutor, noSleep } from "../helpers/fake-executor.js";

import type { FakeHandler } from "../helpers/fake-executor.js";

const URLS = [
  "http://a.test/?id=1",
  "http://a.test/?id=2",
  "http://b.test/?cmd=1",
  "http://c.test/?q=1",
  "http://c.test/?exec=1",
];
const PAYLOADS = [";id;", "|whoami", "$(uname -a)"];

/** Deterministic tool: output depends only on the input pair */
const substitute: FakeHandler = ({ args, options }) => {
  const url = (options.input ?? "").trim();
  const payload = args[0] ?? "";
  if (url.includes("c.test") && payload === "|whoami") return TIMED_OUT;
  if (url.includes("b.test")) return { stdout: "uid=0(root)\n" };
  return { stdout: `${url.length}:${payload.length}\n` };
};

function runner(handler: FakeHandler = substitute, dryRun = false): InvocationRunner {
  const { executor } = fakeExecutor(handler);
  return new InvocationRunner({ toolPath: "/bin/qsreplace", retries: 1, dryRun }, { executor, sleep: noSleep });
}

function statusesOf(store: StateStore): Array<[string, string]> {
  return store
    .records()
    .map((r): [string, string] => [r.workItemId, r.status])
    .sort(([a], [b]) => a.localeCompare(b));
}

describe("Scheduler", () => {
  let dir: string;

  beforeEach(async () => {
    logger.configure({ level: "silent" });
    dir = await mkdtemp(join(tmpdir(), "qsprobe-scheduler-"));
  });

  afterEach(async () => {
    logger.configure({ level: "info" });
    await rm(dir, { recursive: true, force: true });
  });

  it("processes every item once and records it", async () => {
    const { items } = enumerateWorkItems(URLS, PAYLOADS);
    const state = await openStateStore(join(dir, "rce_state.json"));

    const outcome = await new Scheduler({ runner: runner(), state }).run(items, { maxWorkers: 4 });

    expect(outcome.stopped).toBe(false);
    expect(outcome.notDispatched).toBe(0);
    expect(outcome.processed).toHaveLength(15);
    expect(new Set(outcome.processed.map((p) => p.item.id)).size).toBe(15);
    expect(state.loadAll().size).toBe(15);

    const reloaded = await openStateStore(join(dir, "rce_state.json"));
    expect(statusesOf(reloaded)).toEqual(statusesOf(state));
  });

  it("processes a repeated identity only once", async () => {
    const { items } = enumerateWorkItems(URLS.slice(0, 1), PAYLOADS.slice(0, 1));
    const calls: string[] = [];
    const counting = runner((call) => {
      calls.push(call.command);
      return {};
    });

    const outcome = await new Scheduler({ runner: counting }).run([...items, ...items], { maxWorkers: 1 });

    expect(outcome.processed).toHaveLength(1);
    expect(calls).toHaveLength(1);
  });

  it("reports progress for each recorded item", async () => {
    const { items } = enumerateWorkItems(URLS.slice(0, 2), PAYLOADS.slice(0, 1));
    const progress: Array<[number, number]> = [];

    await new Scheduler({ runner: runner() }).run(items, {
      maxWorkers: 1,
      onResult: (_processed, completed, total) => progress.push([completed, total]),
    });

    expect(progress).toEqual([
      [1, 2],
      [2, 2],
    ]);
  });

  it("produces the same summary on repeated serial runs", async () => {
    const { items } = enumerateWorkItems(URLS, PAYLOADS);

    const first = await new Scheduler({ runner: runner() }).run(items, { maxWorkers: 1 });
    const second = await new Scheduler({ runner: runner() }).run(items, { maxWorkers: 1 });

    const normalize = (summary: ReturnType<typeof aggregate>) => ({
      ...summary,
      entries: summary.entries.map((e) => ({ ...e, durationMs: 0 })),
      domains: summary.domains.map((d) => ({
        ...d,
        entries: d.entries.map((e) => ({ ...e, durationMs: 0 })),
      })),
    });
    const a = normalize(aggregate(first.processed, new Date(0)));
    const b = normalize(aggregate(second.processed, new Date(0)));

    expect(a).toEqual(b);
    expect(a.byStatus).toEqual({ success: 13, failure: 0, timeout: 2, "tool-missing": 0 });
    expect(a.domains.map((d) => d.domain)).toEqual(["b.test", "a.test", "c.test"]);
    expect(a.entries.slice(0, 3).map((e) => [e.url, e.score])).toEqual([
      ["http://b.test/?cmd=1", 2],
      ["http://b.test/?cmd=1", 2],
      ["http://b.test/?cmd=1", 2],
    ]);
  });

  it("stops dispatching once aborted and lets in-flight items finish", async () => {
    const { items } = enumerateWorkItems(URLS, PAYLOADS);
    const state = await openStateStore(join(dir, "rce_state.json"));
    const controller = new AbortController();

    const outcome = await new Scheduler({ runner: runner(), state }).run(items, {
      maxWorkers: 1,
      signal: controller.signal,
      onResult: (_processed, completed) => {
        if (completed === 4) controller.abort();
      },
    });

    expect(outcome.stopped).toBe(true);
    expect(outcome.processed).toHaveLength(4);
    expect(outcome.notDispatched).toBe(11);

    const reloaded = await openStateStore(join(dir, "rce_state.json"));
    expect(reloaded.loadAll().size).toBe(4);
  });

  it("resumes to the same state as an uninterrupted run", async () => {
    const { items } = enumerateWorkItems(URLS, PAYLOADS);

    const fullState = await openStateStore(join(dir, "full.json"));
    await new Scheduler({ runner: runner(), state: fullState }).run(items, { maxWorkers: 2 });

    const statePath = join(dir, "resumed.json");
    const controller = new AbortController();
    const interrupted = await openStateStore(statePath);
    await new Scheduler({ runner: runner(), state: interrupted }).run(items, {
      maxWorkers: 2,
      signal: controller.signal,
      onResult: (_processed, completed) => {
        if (completed === 5) controller.abort();
      },
    });

    const resumed = await openStateStore(statePath);
    const remaining = enumerateWorkItems(URLS, PAYLOADS, resumed.loadAll());
    expect(remaining.excluded).toBe(resumed.loadAll().size);
    await new Scheduler({ runner: runner(), state: resumed }).run(remaining.items, { maxWorkers: 2 });

    expect(statusesOf(await openStateStore(statePath))).toEqual(statusesOf(fullState));
  });

  it("has nothing left to do after a complete run", async () => {
    const { items } = enumerateWorkItems(URLS, PAYLOADS);
    const state = await openStateStore(join(dir, "rce_state.json"));
    await new Scheduler({ runner: runner(), state }).run(items);

    const again = enumerateWorkItems(URLS, PAYLOADS, (await openStateStore(join(dir, "rce_state.json"))).loadAll());

    expect(again.items).toEqual([]);
    expect(again.excluded).toBe(15);
  });

  it("records a retried timeout as one terminal record", async () => {
    const { items } = enumerateWorkItems(["http://example.com/a?id=1"], [";id;"]);
    const { executor, calls } = fakeExecutor(() => TIMED_OUT);
    const timingOut = new InvocationRunner(
      { toolPath: "/bin/qsreplace", retries: 2, timeoutMs: 30000 },
      { executor, sleep: noSleep }
    );
    const state = await openStateStore(join(dir, "rce_state.json"));

    const outcome = await new Scheduler({ runner: timingOut, state }).run(items);

    expect(calls).toHaveLength(3);
    expect(outcome.processed[0]?.result.status).toBe("timeout");
    expect(outcome.processed[0]?.result.attemptCount).toBe(3);
    expect(state.records().map((r) => r.status)).toEqual(["timeout"]);
  });

  it("keeps the scored result in the terminal record", async () => {
    const { items } = enumerateWorkItems(["http://b.test/?cmd=1"], [";id;"]);
    const state = await openStateStore(join(dir, "rce_state.json"));

    await new Scheduler({ runner: runner(), state }).run(items);

    const reloaded = await openStateStore(join(dir, "rce_state.json"));
    expect(reloaded.get(items[0]?.id ?? "")?.result).toMatchObject({
      url: "http://b.test/?cmd=1",
      payload: ";id;",
      attemptCount: 1,
      exitCode: 0,
      stdout: "uid=0(root)\n",
      stderr: "",
      timedOut: false,
      parameters: [],
    });
  });

  it("leaves an item killed by an outside signal in progress", async () => {
    const { items } = enumerateWorkItems(["http://example.com/a?id=1"], [";id;"]);
    const { executor, calls } = fakeExecutor(() => ({ exitCode: null, signal: "SIGINT" }));
    const killed = new InvocationRunner({ toolPath: "/bin/qsreplace", retries: 2 }, { executor, sleep: noSleep });
    const state = await openStateStore(join(dir, "rce_state.json"));

    const outcome = await new Scheduler({ runner: killed, state }).run(items);

    expect(calls).toHaveLength(1);
    expect(outcome.processed).toEqual([]);
    expect(outcome.interrupted).toBe(1);
    expect((await openStateStore(join(dir, "rce_state.json"))).records().map((r) => r.status)).toEqual([
      "in-progress",
    ]);
  });

  it("does not retry once stopped, and leaves the item for resume", async () => {
    const { items } = enumerateWorkItems(["http://example.com/a?id=1"], [";id;"]);
    const controller = new AbortController();
    const { executor, calls } = fakeExecutor(() => {
      controller.abort();
      return { exitCode: 1, stderr: "boom\n" };
    });
    const failing = new InvocationRunner({ toolPath: "/bin/qsreplace", retries: 2 }, { executor, sleep: noSleep });
    const state = await openStateStore(join(dir, "rce_state.json"));

    const outcome = await new Scheduler({ runner: failing, state }).run(items, { signal: controller.signal });

    expect(calls).toHaveLength(1);
    expect(outcome.stopped).toBe(true);
    expect(outcome.interrupted).toBe(1);
    expect(state.loadAll().size).toBe(0);
    expect(state.records().map((r) => r.status)).toEqual(["in-progress"]);
  });

  it("never spawns or writes state in dry-run", async () => {
    const { items } = enumerateWorkItems(URLS, PAYLOADS);
    const { executor, calls } = fakeExecutor();
    const dry = new InvocationRunner({ toolPath: "/bin/qsreplace", dryRun: true }, { executor });
    const state = new StateStore(join(dir, "rce_state.json"));

    const outcome = await new Scheduler({ runner: dry, state }).run(items, { maxWorkers: 3 });

    expect(calls).toEqual([]);
    expect(outcome.processed).toHaveLength(15);
    expect(outcome.processed.every((p) => p.result.dryRun && p.score === 0)).toBe(true);
    expect(state.size).toBe(0);
  });

  it("stops and rethrows when the state cannot be persisted", async () => {
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "");
    const state = new StateStore(join(blocker, "rce_state.json"));
    const { items } = enumerateWorkItems(URLS, PAYLOADS);

    const run = new Scheduler({ runner: runner(), state }).run(items, { maxWorkers: 1 });

    await expect(run).rejects.toBeInstanceOf(StatePersistenceError);
  });
});
