import os from "node:os";
import path from "node:path";
import { promises as nodeFs } from "node:fs";

import { describe, expect, it } from "vitest";

import { clampConcurrency, mapWithConcurrency } from "../src/utils/concurrency.js";
import { createInMemoryLogFilesystem, createNodeLogFilesystem } from "../src/utils/filesystem.js";

const decoder = new TextDecoder();

describe("InMemoryLogFilesystem", () => {
  it("writes, appends and lists files", async () => {
    const fs = createInMemoryLogFilesystem({}, { startMtimeMs: 100 });

    await expect(fs.writeTextFile("/logs/run.log", "x")).rejects.toMatchObject({ code: "ENOENT" });
    await fs.ensureDir("/logs/archive");
    await fs.writeTextFile("/logs/run.log", "one\n");
    await fs.appendTextFile("/logs/run.log", "two\n");

    expect(fs.readTextFile("/logs/run.log")).toBe("one\ntwo\n");
    expect(decoder.decode(await fs.readFile("/logs/run.log"))).toBe("one\ntwo\n");
    expect(await fs.stat("/logs/run.log")).toEqual({ kind: "file", mtimeMs: 105, size: 8 });
    expect((await fs.readDir("/logs")).map((entry) => [entry.name, entry.kind])).toEqual([
      ["archive", "directory"],
      ["run.log", "file"],
    ]);
    expect(fs.snapshot()).toEqual({ "/logs/run.log": "one\ntwo\n" });
  });

  it("fails reads of missing and denied files", async () => {
    const fs = createInMemoryLogFilesystem({ "/logs/run.log": "data" });
    fs.denyRead("/logs/run.log");

    await expect(fs.readFile("/logs/run.log")).rejects.toMatchObject({ code: "EACCES" });
    await expect(fs.readFile("/logs/other.log")).rejects.toMatchObject({ code: "ENOENT" });
    await expect(fs.readDir("/nope")).rejects.toMatchObject({ code: "ENOENT" });
    await expect(fs.stat("/nope")).rejects.toMatchObject({ code: "ENOENT" });
  });
});

describe("createNodeLogFilesystem", () => {
  it("reads back what it writes", async () => {
    const root = await nodeFs.mkdtemp(path.join(os.tmpdir(), "agent-kit-fs-"));
    const fs = createNodeLogFilesystem();
    const logDir = path.join(root, "logs");
    const logFile = path.join(logDir, "run.log");

    try {
      await fs.ensureDir(logDir);
      await fs.writeTextFile(logFile, "a\n");
      await fs.appendTextFile(logFile, "b\n");

      expect(decoder.decode(await fs.readFile(logFile))).toBe("a\nb\n");
      expect((await fs.stat(logFile)).size).toBe(4);
      expect((await fs.readDir(logDir)).map((entry) => [entry.name, entry.kind])).toEqual([["run.log", "file"]]);
    } finally {
      await nodeFs.rm(root, { recursive: true, force: true });
    }
  });
});

describe("concurrency helpers", () => {
  it("clamps concurrency to 1..16", () => {
    expect([undefined, Number.NaN, 0, 3.7, 100].map(clampConcurrency)).toEqual([1, 1, 1, 3, 16]);
  });

  it("keeps input order and respects the limit", async () => {
    let active = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 10, 20, 0], 2, async (delayMs, index) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
      active -= 1;
      return `${index}:${delayMs}`;
    });

    expect(results).toEqual(["0:30", "1:10", "2:20", "3:0"]);
    expect(peak).toBe(2);
  });

  it("starts no new task after a failure and waits for the ones in flight", async () => {
    const started: number[] = [];
    const finished: number[] = [];

    const call = mapWithConcurrency([0, 1, 2, 3, 4, 5], 2, async (item) => {
      started.push(item);
      if (item === 0) {
        await new Promise((resolve) => setTimeout(resolve, 5));
        throw new Error("task 0 failed");
      }
      await new Promise((resolve) => setTimeout(resolve, 20));
      finished.push(item);
      return item;
    });

    await expect(call).rejects.toThrow("task 0 failed");
    expect(started).toEqual([0, 1]);
    expect(finished).toEqual([1]);
  });
});
