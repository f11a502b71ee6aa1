import { describe, expect, it } from "vitest";

import {
  countToolUsage,
  discoverTools,
  filterByChangeType,
  filterByExtension,
  filterBySuccess,
  getRunsByFile,
} from "../src/logs/query.js";
import { createRunResult, createSessionResult } from "../src/logs/types.js";

const runA = createRunResult({
  runId: "a",
  source: "/logs/a.log",
  records: {
    patches: [
      {
        filePath: "src/a.ts",
        operation: "add",
        diff: "+x",
        linesAdded: 1,
        linesRemoved: 0,
        line: 1,
        source: "/logs/a.log",
      },
    ],
    commands: [],
    toolUsages: [
      {
        toolName: "read_file",
        toolKind: "read",
        arguments: { path: "README.md" },
        targetFile: "README.md",
        line: 2,
        source: "/logs/a.log",
      },
    ],
    changes: [
      {
        type: "error",
        category: "changes",
        text: "oops",
        match: "oops",
        priority: 100,
        line: 3,
        source: "/logs/a.log",
      },
    ],
  },
});

const runB = createRunResult({
  runId: "b",
  source: "/logs/b.log",
  records: {
    patches: [],
    commands: [{ command: "make", exitCode: 2, targetFiles: ["Makefile"], line: 2, source: "/logs/b.log" }],
    toolUsages: [
      {
        toolName: "read_file",
        toolKind: "read",
        arguments: { path: "x".repeat(200) },
        line: 3,
        source: "/logs/b.log",
      },
      { toolName: "shell", toolKind: "run", arguments: {}, line: 4, source: "/logs/b.log" },
    ],
    changes: [
      {
        type: "modification",
        category: "changes",
        text: "Updated guide",
        match: "Updated guide",
        priority: 40,
        filePath: "docs/guide.md",
        line: 1,
        source: "/logs/b.log",
      },
    ],
  },
});

const session = createSessionResult({
  sessionId: "s1",
  runs: [runA, runB],
  failures: [{ source: "/logs/c.log", kind: "decode", reason: "bad" }],
});

describe("run results", () => {
  it("derive success and error counts from their records", () => {
    expect([runA.success, runA.errorCount, runA.filesTouched]).toEqual([true, 1, ["README.md", "src/a.ts"]]);
    expect([runB.success, runB.errorCount, runB.filesTouched]).toEqual([false, 1, ["docs/guide.md"]]);
  });
});

describe("filterByExtension", () => {
  it("narrows records and drops runs left empty", () => {
    const filtered = filterByExtension(session, "ts");

    expect(filtered.sessionId).toBe("s1");
    expect(filtered.failures).toEqual(session.failures);
    expect(filtered.runs).toHaveLength(1);
    const [run] = filtered.runs;
    expect(run?.runId).toBe("a");
    expect(run?.patches).toHaveLength(1);
    expect(run?.toolUsages).toEqual([]);
    expect(run?.changes).toEqual([]);
    expect(run?.filesTouched).toEqual(["src/a.ts"]);
    expect(run?.success).toBe(true);
    expect(run?.errorCount).toBe(1);
    expect(filtered.stats.totalRuns).toBe(1);
    expect(filtered.stats.failedFiles).toBe(1);
  });

  it("accepts a leading dot and plain run arrays", () => {
    const filtered = filterByExtension([runA, runB], ".md");

    expect(filtered.map((run) => run.runId)).toEqual(["a", "b"]);
    expect(filtered[0]?.toolUsages.map((usage) => usage.targetFile)).toEqual(["README.md"]);
    expect(filtered[1]?.changes.map((change) => change.filePath)).toEqual(["docs/guide.md"]);
  });
});

describe("filterByChangeType", () => {
  it("keeps only runs with a change of the given type", () => {
    const filtered = filterByChangeType(session, "error");

    expect(filtered.runs.map((run) => run.runId)).toEqual(["a"]);
    expect(filtered.runs[0]?.changes.map((change) => change.text)).toEqual(["oops"]);
    expect(filtered.stats.totalChanges).toBe(1);
  });
});

describe("filterBySuccess / getRunsByFile", () => {
  it("selects runs by verdict", () => {
    expect(filterBySuccess([runA, runB], false)).toEqual([runB]);
    expect(filterBySuccess(session, true).runs.map((run) => run.runId)).toEqual(["a"]);
  });

  it("finds runs by touched file, including command targets", () => {
    expect(getRunsByFile(session, "Makefile").runs.map((run) => run.runId)).toEqual(["b"]);
    expect(getRunsByFile([runA, runB], "src/a.ts").map((run) => run.runId)).toEqual(["a"]);
    expect(getRunsByFile([runA, runB], "missing.ts")).toEqual([]);
  });
});

describe("tool statistics", () => {
  it("counts tool usage in order of first use", () => {
    const counts = countToolUsage(session);

    expect(counts).toEqual({ read_file: 2, shell: 1 });
    expect(Object.keys(counts)).toEqual(["read_file", "shell"]);
  });

  it("discovers tools with sorted, truncated examples", () => {
    expect(discoverTools(session)).toEqual({
      read_file: {
        count: 2,
        kinds: ["read"],
        examples: ['{"path":"README.md"}', `{"path":"${"x".repeat(141)}...`],
      },
      shell: { count: 1, kinds: ["run"], examples: [] },
    });
  });
});
