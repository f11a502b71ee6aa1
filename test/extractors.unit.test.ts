import { describe, expect, it } from "vitest";

import { ConfigurationError, InvalidPatternError } from "../src/errors.js";
import {
  ChangeDetector,
  CommandExtractor,
  CustomExtractor,
  PatchExtractor,
  ToolUsageExtractor,
  categorizeTool,
} from "../src/logs/extractors.js";

function shellCall(callId: string, command: readonly string[]): string {
  return JSON.stringify({
    type: "function_call",
    name: "shell",
    arguments: JSON.stringify({ command }),
    call_id: callId,
  });
}

function shellOutput(callId: string, output: string, exitCode: number): string {
  return JSON.stringify({
    type: "function_call_output",
    call_id: callId,
    output: JSON.stringify({ output, metadata: { exit_code: exitCode } }),
  });
}

describe("PatchExtractor", () => {
  it("reads apply_patch payloads from a JSON command array", () => {
    const log = [
      shellCall("c2", [
        "apply_patch",
        "*** Begin Patch\n*** Add File: src/hello.py\n+def hello():\n+    return 1\n*** End Patch",
      ]),
    ];

    expect(new PatchExtractor().extract(log)).toEqual([
      {
        filePath: "src/hello.py",
        operation: "add",
        diff: "+def hello():\n+    return 1",
        linesAdded: 2,
        linesRemoved: 0,
        line: 1,
        source: "<inline>",
      },
    ]);
  });

  it("reads the input of a custom apply_patch tool call", () => {
    const log = [
      JSON.stringify({
        type: "custom_tool_call",
        name: "apply_patch",
        input: "*** Begin Patch\n*** Delete File: old.txt\n*** End Patch",
        call_id: "p1",
      }),
    ];

    expect(new PatchExtractor().extract(log).map((patch) => [patch.operation, patch.filePath])).toEqual([
      ["delete", "old.txt"],
    ]);
  });

  it("returns nothing for empty input", () => {
    expect(new PatchExtractor().extract("")).toEqual([]);
    expect(new CommandExtractor().extract([])).toEqual([]);
    expect(new ChangeDetector().extract("")).toEqual([]);
  });

  it("ends a unified diff block at the first blank line", () => {
    const log = [
      "Applying change",
      "--- a/src/app.ts",
      "+++ b/src/app.ts",
      "@@ -1 +1 @@",
      "-old",
      "+new",
      "",
      "trailing note",
    ].join("\n");

    const [patch, ...rest] = new PatchExtractor().extract(log, { source: "run.log" });

    expect(rest).toEqual([]);
    expect(patch).toEqual({
      filePath: "src/app.ts",
      operation: "diff",
      diff: "--- a/src/app.ts\n+++ b/src/app.ts\n@@ -1 +1 @@\n-old\n+new",
      linesAdded: 1,
      linesRemoved: 1,
      line: 2,
      source: "run.log",
    });
  });

  it("keeps a single-space context line inside a unified diff hunk", () => {
    const log = ["--- a/x.ts", "+++ b/x.ts", "@@ -1,4 +1,4 @@", "-a", "+b", " ", "-c", "+d"].join("\n");

    expect(new PatchExtractor().extract(log)).toEqual([
      {
        filePath: "x.ts",
        operation: "diff",
        diff: "--- a/x.ts\n+++ b/x.ts\n@@ -1,4 +1,4 @@\n-a\n+b\n \n-c\n+d",
        linesAdded: 2,
        linesRemoved: 2,
        line: 1,
        source: "<inline>",
      },
    ]);
  });

  it("extends a patch block without End Patch to the end of the log", () => {
    const log = "*** Begin Patch\n*** Update File: lib/util.ts\n@@\n-a\n+b\n+c";

    const patches = new PatchExtractor().extract(log);

    expect(patches).toHaveLength(1);
    expect(patches[0]).toMatchObject({
      filePath: "lib/util.ts",
      operation: "update",
      diff: "@@\n-a\n+b\n+c",
      linesAdded: 2,
      linesRemoved: 1,
      line: 2,
    });
  });

  it("records moves and keeps only files matching the file pattern", () => {
    const log = [
      "*** Begin Patch",
      "*** Update File: old.ts",
      "*** Move to: new.ts",
      "@@",
      "-x",
      "+y",
      "*** Delete File: notes.md",
      "*** End Patch",
    ].join("\n");

    const all = new PatchExtractor().extract(log);
    const onlyTs = new PatchExtractor({ filePattern: "\\.ts$" }).extract(log);

    expect(all.map((patch) => [patch.operation, patch.filePath, patch.line])).toEqual([
      ["update", "old.ts", 2],
      ["delete", "notes.md", 7],
    ]);
    expect(onlyTs).toHaveLength(1);
    expect(onlyTs[0]?.movePath).toBe("new.ts");
  });
});

describe("CommandExtractor", () => {
  it("pairs shell calls with their outputs", () => {
    const log = [shellCall("c1", ["ls", "-la"]), shellOutput("c1", "a.txt\n", 0)];

    expect(new CommandExtractor().extract(log)).toEqual([
      {
        command: "ls -la",
        toolName: "shell",
        callId: "c1",
        exitCode: 0,
        output: "a.txt\n",
        targetFiles: [],
        line: 1,
        source: "<inline>",
      },
    ]);
  });

  it("pairs a tool_result output with its call", () => {
    const log = [
      shellCall("c1", ["make", "test"]),
      JSON.stringify({ type: "tool_result", call_id: "c1", output: "exit code: 2\noutput:\nboom" }),
    ];

    expect(new CommandExtractor().extract(log)).toEqual([
      {
        command: "make test",
        toolName: "shell",
        callId: "c1",
        exitCode: 2,
        output: "boom",
        targetFiles: [],
        line: 1,
        source: "<inline>",
      },
    ]);
    expect(new ToolUsageExtractor().extract(log)[0]?.resultSummary).toBe("boom");
  });

  it("quotes arguments that need it", () => {
    const log = [shellCall("c3", ["grep", "-n", "hello world", "src"])];

    expect(new CommandExtractor().extract(log)[0]?.command).toBe("grep -n 'hello world' src");
  });

  it("reads shell prompts with their output and exit status", () => {
    const log = ["$ make test", "running 3 tests", "[exit code: 2]", "", "$ echo done"].join("\n");

    expect(new CommandExtractor().extract(log)).toEqual([
      {
        command: "make test",
        exitCode: 2,
        output: "running 3 tests",
        targetFiles: [],
        line: 1,
        source: "<inline>",
      },
      { command: "echo done", targetFiles: [], line: 5, source: "<inline>" },
    ]);
  });

  it("keeps duplicates unless asked to deduplicate", () => {
    const log = "$ make build\n\n$ make build";
    const extractor = new CommandExtractor();

    expect(extractor.extract(log).map((command) => command.line)).toEqual([1, 3]);
    expect(extractor.extract(log, { deduplicate: true }).map((command) => command.line)).toEqual([1]);
  });
});

describe("ToolUsageExtractor", () => {
  it("records tool name, kind, flattened arguments and a result summary", () => {
    const log = [
      JSON.stringify({
        type: "function_call",
        name: "read_file",
        arguments: JSON.stringify({ path: "README.md", limit: 20 }),
        call_id: "r1",
      }),
      JSON.stringify({ type: "function_call_output", call_id: "r1", output: "  # Title\n" }),
    ];

    expect(new ToolUsageExtractor().extract(log)).toEqual([
      {
        toolName: "read_file",
        toolKind: "read",
        arguments: { path: "README.md", limit: "20" },
        targetFile: "README.md",
        callId: "r1",
        resultSummary: "# Title",
        line: 1,
        source: "<inline>",
      },
    ]);
  });

  it("skips lines that are not tool events", () => {
    const log = ["{not json function_call", "plain text", JSON.stringify({ type: "message" })];
    expect(new ToolUsageExtractor().extract(log)).toEqual([]);
  });
});

describe("ChangeDetector", () => {
  it("takes a recognised change_type as-is and classifies the rest", () => {
    const log = [
      JSON.stringify({
        type: "codex_change",
        change_type: "creation",
        file_path: "src/new.ts",
        content: "Created src/new.ts",
      }),
      JSON.stringify({ type: "codex_change", change_type: "weird", content: "Updated README" }),
    ];

    const changes = new ChangeDetector().extract(log);

    expect(changes.map((change) => [change.type, change.priority, change.filePath, change.line])).toEqual([
      ["creation", 100, "src/new.ts", 1],
      ["modification", 40, undefined, 2],
    ]);
    expect(changes[0]?.category).toBe("changes");
    expect(changes[1]?.match).toBe(log[1]);
  });
});

describe("CustomExtractor", () => {
  it("turns each match into a change with the first capture group as text", () => {
    const extractor = new CustomExtractor({ pattern: "ERROR:\\s*(.+)", changeType: "error" });

    expect(extractor.extract("step1 ok\nERROR: disk full\nstep2 ok")).toEqual([
      {
        type: "error",
        category: "custom",
        text: "disk full",
        match: "ERROR: disk full",
        priority: 100,
        line: 2,
        source: "<inline>",
      },
    ]);
  });

  it("fills filePath from a named file group and applies the file pattern", () => {
    const extractor = new CustomExtractor({
      pattern: "wrote (?<file>\\S+)",
      changeType: "modification",
      category: "writes",
      priority: 5,
      filePattern: "\\.ts$",
    });

    expect(extractor.extract("wrote src/a.ts\nwrote docs/b.md")).toEqual([
      {
        type: "modification",
        category: "writes",
        text: "src/a.ts",
        match: "wrote src/a.ts",
        priority: 5,
        filePath: "src/a.ts",
        line: 1,
        source: "<inline>",
      },
    ]);
  });

  it("gives the same records on repeated calls", () => {
    const extractor = new CustomExtractor({ pattern: /todo/gi });
    const log = "TODO one\ntodo two";

    expect(extractor.extract(log)).toEqual(extractor.extract(log));
    expect(extractor.extract(log).map((change) => change.line)).toEqual([1, 2]);
  });

  it("rejects invalid patterns and unsupported flags at construction", () => {
    expect(() => new CustomExtractor({ pattern: "(unclosed" })).toThrow(InvalidPatternError);
    expect(() => new CustomExtractor({ pattern: "x", flags: "g" })).toThrow(ConfigurationError);
    expect(() => new CustomExtractor({ pattern: "x", flags: "g" })).toThrow(/flags/);
    expect(() => new CustomExtractor({ pattern: "" })).toThrow(ConfigurationError);
    expect(() => new CustomExtractor({ pattern: /x/, flags: "m" })).toThrow(
      "Invalid custom extractor flags: set flags on the RegExp pattern itself",
    );
  });
});

describe("categorizeTool", () => {
  it.each([
    ["apply_patch", "edit"],
    ["writeFile", "edit"],
    ["read_file", "read"],
    ["grep_files", "search"],
    ["list_dir", "list"],
    ["shell", "run"],
    ["webFetch", "web"],
    ["mystery", "unknown"],
  ] as const)("%s -> %s", (toolName, kind) => {
    expect(categorizeTool(toolName)).toBe(kind);
  });
});
