import { describe, expect, it } from "vitest";

import type { AgentCliLaunchOptions, AgentCliLauncher } from "../src/agent/run.js";
import { AgentSession } from "../src/agent/session.js";
import { createInMemoryLogFilesystem } from "../src/utils/filesystem.js";

const patchLine = JSON.stringify({
  type: "function_call",
  name: "shell",
  arguments: JSON.stringify({
    command: ["apply_patch", "*** Begin Patch\n*** Add File: a.txt\n+hello\n*** End Patch"],
  }),
  call_id: "c1",
});

function createSession() {
  const calls: AgentCliLaunchOptions[] = [];
  // Prompt "good" writes a patch; anything else exits with 1.
  const launcher: AgentCliLauncher = async (options) => {
    calls.push(options);
    const prompt = options.args[options.args.length - 1];
    if (prompt === "good") {
      options.onLine(patchLine);
      return { exitCode: 0, timedOut: false };
    }
    return { exitCode: 1, timedOut: false };
  };
  const session = new AgentSession({
    sessionId: "s1",
    logDir: "/runs",
    launcher,
    fs: createInMemoryLogFilesystem(),
    clock: () => new Date(2024, 4, 1, 10, 0, 0),
    defaults: { model: "m", writableRoot: "/work" },
  });
  return { session, calls };
}

describe("AgentSession", () => {
  it("has no summary before it runs", () => {
    const { session } = createSession();

    expect(session.getSummary()).toBeUndefined();
    expect(session.countToolUsage()).toEqual({});
    expect(session.getRunsBySuccess(true)).toEqual([]);
  });

  it("runs queued requests in order and aggregates their results", async () => {
    const { session, calls } = createSession();
    expect(session.addRun({ prompt: "good", runId: "run-a-0000000001" })).toBe("run-a-0000000001");
    session.addRun({ prompt: "bad", runId: "run-b-0000000001", model: "other" });
    expect(session.pendingRuns).toBe(2);

    const execution = await session.executeAll();

    expect(session.pendingRuns).toBe(0);
    expect(execution.outcomes.map((outcome) => [outcome.runId, outcome.status])).toEqual([
      ["run-a-0000000001", "completed"],
      ["run-b-0000000001", "failed"],
    ]);
    expect(calls.map((call) => call.args[0])).toEqual(["--model=m", "--model=other"]);
    expect(calls.map((call) => call.cwd)).toEqual(["/work", "/work"]);
    expect(execution.session.sessionId).toBe("s1");
    expect(execution.session.stats.totalRuns).toBe(2);
    expect(session.getSummary()).toEqual({
      sessionId: "s1",
      totalRuns: 2,
      successfulRuns: 1,
      successRate: 0.5,
      totalFilesTouched: 1,
      totalChanges: 0,
      durationMs: 0,
    });
    expect(session.countToolUsage()).toEqual({ shell: 1 });
    expect(session.getRunsBySuccess(false).map((run) => run.runId)).toEqual(["run-b-0000000001"]);
  });

  it("keeps earlier runs in the session result across batches", async () => {
    const { session } = createSession();
    session.addRun({ prompt: "good", runId: "run-a-0000000001" });
    await session.executeAll();
    session.addRun({ prompt: "good", runId: "run-c-0000000001" });

    const second = await session.executeAll();

    expect(second.outcomes).toHaveLength(1);
    expect(second.session.runs.map((run) => run.runId)).toEqual(["run-a-0000000001", "run-c-0000000001"]);
    expect(session.outcomes).toHaveLength(2);
    expect(session.result).toBe(second.session);
  });
});
