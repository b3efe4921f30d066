/**
 * Artifact Tests
 */

import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import AdmZip from "adm-zip";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import {
  ArtifactWriter,
  artifactDirName,
  artifactFileName,
  formatArtifact,
  runTimestamp,
} from "@/engine/artifacts.js";
import { processResult } from "@/engine/scoring.js";

import { makeItem, makeResult, params } from "../helpers/fixtures.js";

const URL_ID = "http://example.com/a?id=1";

describe("naming", () => {
  it("formats the run timestamp in local time", () => {
    expect(runTimestamp(new Date(2024, 4, 1, 9, 3, 5))).toBe("20240501_090305");
  });

  it("names the domain directory after the host", () => {
    expect(artifactDirName("http://example.com:8080/a?id=1")).toBe("rce_results_example.com_8080");
  });

  it("builds a file-system safe file name", () => {
    const item = makeItem(URL_ID, ";id;");

    expect(artifactFileName(URL_ID, ";id;", item.id, "20240501_090305")).toBe(
      `http_3A_2F_2Fexample.com_2Fa_3Fid_3D1__3Bid_3B_${item.id.slice(0, 8)}_20240501_090305.txt`
    );
  });

  it("caps the URL part and the payload part", () => {
    const url = `http://example.com/?q=${"a".repeat(300)}`;
    const name = artifactFileName(url, "0123456789abcdef", "deadbeefcafe", "ts");

    expect(name).toBe(`${"http_3A_2F_2Fexample.com_2F_3Fq_3D"}${"a".repeat(86)}_0123456789_deadbeef_ts.txt`);
  });
});

describe("formatArtifact", () => {
  it("records output and flagged parameters for a success", () => {
    const item = makeItem(URL_ID, ";id;");
    const processed = processResult(item, makeResult(item, { stdout: "uid=0(root)\n" }), params(URL_ID, "id"));

    expect(formatArtifact(processed)).toBe(
      [
        `URL: ${URL_ID}`,
        "Payload: ;id;",
        "Status: success",
        "Attempts: 1",
        "Score: 5",
        "RCE parameters: id",
        "",
        "Output:",
        "uid=0(root)\n",
      ].join("\n")
    );
  });

  it("records the error for a failure", () => {
    const item = makeItem(URL_ID, ";id;");
    const result = makeResult(item, {
      status: "failure",
      attemptCount: 3,
      exitCode: 1,
      stderr: "bad input",
      error: "Attempt 3 exited with code 1: bad input",
    });

    expect(formatArtifact(processResult(item, result, []))).toBe(
      [
        `URL: ${URL_ID}`,
        "Payload: ;id;",
        "Status: failure",
        "Attempts: 3",
        "Score: 0",
        "",
        "Error: Attempt 3 exited with code 1: bad input",
        "bad input",
      ].join("\n")
    );
  });
});

describe("ArtifactWriter", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "qsprobe-artifacts-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes captures under the domain directory", async () => {
    const writer = new ArtifactWriter(dir, "20240501_090305");
    const item = makeItem(URL_ID, ";id;");
    const processed = processResult(item, makeResult(item, { stdout: "hello" }), []);

    const filePath = await writer.write(processed);

    expect(filePath).toBe(
      join(dir, "rce_results_example.com", artifactFileName(URL_ID, ";id;", item.id, "20240501_090305"))
    );
    expect(await readFile(filePath, "utf-8")).toBe(formatArtifact(processed));
    expect(writer.paths).toEqual([filePath]);
  });

  it("archives this run's captures", async () => {
    const writer = new ArtifactWriter(dir, "20240501_090305");
    const first = makeItem(URL_ID, ";id;");
    const second = makeItem("http://other.test/?cmd=1", "|whoami", 1);
    const pathA = await writer.write(processResult(first, makeResult(first), []));
    const pathB = await writer.write(processResult(second, makeResult(second), []));

    const zipPath = writer.archive();

    expect(zipPath).toBe(join(dir, "rce_results_20240501_090305.zip"));
    const entries = new AdmZip(join(dir, "rce_results_20240501_090305.zip")).getEntries().map((e) => e.entryName);
    expect(entries.sort()).toEqual(
      [
        `rce_results_example.com/${pathA.split("/").pop() ?? ""}`,
        `rce_results_other.test/${pathB.split("/").pop() ?? ""}`,
      ].sort()
    );
  });

  it("skips the archive when nothing was written", () => {
    expect(new ArtifactWriter(dir, "ts").archive()).toBeNull();
  });
});
