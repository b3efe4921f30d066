import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { afterEach, describe, it, expect, vi } from "vitest";

import { Logger } from "@/lib/logger.js";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("suppresses messages below the level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const log = new Logger();
    log.configure({ level: "warn" });

    log.info("hidden");

    expect(info).not.toHaveBeenCalled();
  });

  it("children follow the parent's level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const parent = new Logger();
    const child = parent.child("[child]");

    child.debug("before");
    expect(debug).not.toHaveBeenCalled();

    parent.configure({ level: "debug" });
    child.debug("after");

    expect(debug).toHaveBeenCalledTimes(1);
    expect(child.isVerbose()).toBe(true);
  });

  it("prefixes child messages", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const parent = new Logger();
    parent.child("[a]").child("[b]").info("message");

    expect(info).toHaveBeenCalledWith("[a] [b] message");
  });

  it("silent suppresses errors", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const log = new Logger();
    log.configure({ level: "silent" });

    log.error("hidden");

    expect(error).not.toHaveBeenCalled();
  });

  describe("log file", () => {
    const at = () => new Date(Date.UTC(2024, 4, 1, 9, 3, 5));

    it("records info and above even when the console is silent", async () => {
      const dir = await mkdtemp(join(tmpdir(), "qsprobe-log-"));
      try {
        const file = join(dir, "rce_test.log");
        const root = new Logger();
        root.configure({ level: "silent" });
        root.attachFile(file, at);
        const child = root.child("[runner]");

        child.debug("hidden");
        child.info("Loaded %d URLs", 2);
        child.warn("Attempt 1/3 failed");
        root.error("fatal");
        await child.detachFile();

        expect(await readFile(file, "utf-8")).toBe(
          "2024-05-01T09:03:05.000Z - INFO - [runner] Loaded 2 URLs\n" +
            "2024-05-01T09:03:05.000Z - WARN - [runner] Attempt 1/3 failed\n" +
            "2024-05-01T09:03:05.000Z - ERROR - fatal\n"
        );
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });

    it("records debug lines in verbose mode and appends across runs", async () => {
      const dir = await mkdtemp(join(tmpdir(), "qsprobe-log-"));
      const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
      try {
        const file = join(dir, "rce_test.log");
        const root = new Logger();
        root.configure({ level: "debug" });

        root.attachFile(file, at);
        root.debug("first");
        await root.detachFile();
        root.attachFile(file, at);
        root.debug("second");
        await root.detachFile();
        root.debug("not written");

        expect(debug).toHaveBeenCalledTimes(3);
        expect(await readFile(file, "utf-8")).toBe(
          "2024-05-01T09:03:05.000Z - DEBUG - first\n2024-05-01T09:03:05.000Z - DEBUG - second\n"
        );
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });
  });
});
