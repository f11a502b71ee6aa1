import { describe, expect, it, vi } from "vitest";

import {
  NO_SANDBOX_ENV_KEY,
  buildAgentCliArgs,
  createRunId,
  formatRunLogName,
  runAgent,
  type AgentCliExit,
  type AgentCliLaunchOptions,
  type AgentCliLauncher,
} from "../src/agent/run.js";
import { AgentProcessError, ConfigurationError } from "../src/errors.js";
import { createInMemoryLogFilesystem } from "../src/utils/filesystem.js";
import type { AgentKitTelemetryEvent } from "../src/utils/telemetry.js";

const RUN_ID = "abcdef0123456789";
const STARTED = new Date(2024, 4, 1, 10, 0, 0);
const LOG_FILE = "/runs/codex_run_20240501_100000_abcdef01.log";

const patchLine = JSON.stringify({
  type: "function_call",
  name: "shell",
  arguments: JSON.stringify({
    command: ["apply_patch", "*** Begin Patch\n*** Add File: hello.py\n+print('hi')\n*** End Patch"],
  }),
  call_id: "c1",
});

function scriptedLauncher(
  lines: readonly string[],
  exit: AgentCliExit = { exitCode: 0, timedOut: false },
) {
  const calls: AgentCliLaunchOptions[] = [];
  const launcher: AgentCliLauncher = async (options) => {
    calls.push(options);
    for (const line of lines) {
      options.onLine(line);
    }
    return exit;
  };
  return { launcher, calls };
}

function baseRequest(launcher: AgentCliLauncher) {
  return {
    prompt: "Create hello.py",
    runId: RUN_ID,
    logDir: "/runs",
    writableRoot: "/work",
    launcher,
    fs: createInMemoryLogFilesystem(),
    clock: () => STARTED,
  };
}

describe("buildAgentCliArgs", () => {
  it("defaults to full-auto and quiet", () => {
    expect(buildAgentCliArgs({ prompt: "do it", model: "o4-mini", writableRoot: "/work" })).toEqual([
      "--model=o4-mini",
      "--writable-root=/work",
      "--full-auto",
      "--quiet",
      "do it",
    ]);
  });

  it("passes every option in a fixed order", () => {
    expect(
      buildAgentCliArgs({
        prompt: "p",
        model: "m",
        provider: "openai",
        writableRoot: "/w",
        approvalMode: "suggest",
        autoApproveEverything: true,
        quiet: false,
        extraArgs: ["--x"],
      }),
    ).toEqual([
      "--model=m",
      "--provider=openai",
      "--writable-root=/w",
      "--approval-mode=suggest",
      "--dangerously-auto-approve-everything",
      "--x",
      "p",
    ]);
  });
});

describe("run ids and log names", () => {
  it("creates 16 hex character ids", () => {
    expect(createRunId()).toMatch(/^[0-9a-f]{16}$/);
  });

  it("names logs by local start time and run id prefix", () => {
    expect(formatRunLogName(new Date(2024, 0, 2, 3, 4, 5), "0123456789abcdef")).toBe(
      "codex_run_20240102_030405_01234567.log",
    );
  });
});

describe("runAgent", () => {
  it("tees output into the log file and parses it", async () => {
    const { launcher, calls } = scriptedLauncher(["2024-05-01 10:00:01 starting", patchLine]);
    const request = { ...baseRequest(launcher), model: "o4-mini" };

    const outcome = await runAgent(request);

    expect(outcome).toMatchObject({
      runId: RUN_ID,
      status: "completed",
      exitCode: 0,
      logFile: LOG_FILE,
      startedAt: STARTED.toISOString(),
      endedAt: STARTED.toISOString(),
      durationMs: 0,
    });
    expect(outcome.error).toBeUndefined();
    expect(outcome.result.runId).toBe(RUN_ID);
    expect(outcome.result.startedAt).toBe("2024-05-01T10:00:01");
    expect(outcome.result.patches.map((patch) => patch.filePath)).toEqual(["hello.py"]);
    expect(outcome.result.success).toBe(true);
    expect(request.fs.readTextFile(LOG_FILE)).toBe(`2024-05-01 10:00:01 starting\n${patchLine}\n`);

    expect(calls).toHaveLength(1);
    expect(calls[0]?.command).toBe("codex");
    expect(calls[0]?.cwd).toBe("/work");
    expect(calls[0]?.timeoutMs).toBe(300_000);
    expect(calls[0]?.args).toEqual([
      "--model=o4-mini",
      "--writable-root=/work",
      "--full-auto",
      "--quiet",
      "Create hello.py",
    ]);
    expect(calls[0]?.env[NO_SANDBOX_ENV_KEY]).toBe("1");
  });

  it("forwards lines and JSON entries to the callbacks", async () => {
    const { launcher } = scriptedLauncher(["plain", '{"type":"message","text":"hi"}']);
    const onOutputLine = vi.fn();
    const onJsonLine = vi.fn();

    await runAgent({ ...baseRequest(launcher), onOutputLine, onJsonLine });

    expect(onOutputLine.mock.calls).toEqual([["plain"], ['{"type":"message","text":"hi"}']]);
    expect(onJsonLine.mock.calls).toEqual([[{ type: "message", text: "hi" }]]);
  });

  it("reports a non-zero exit as a failed run with an empty result", async () => {
    const { launcher } = scriptedLauncher([patchLine], { exitCode: 3, timedOut: false });

    const outcome = await runAgent(baseRequest(launcher));

    expect(outcome.status).toBe("failed");
    expect(outcome.exitCode).toBe(3);
    expect(outcome.error).toBeInstanceOf(AgentProcessError);
    expect(outcome.error).toMatchObject({ failure: "exit", message: "Agent CLI exited with code 3" });
    expect(outcome.result.patches).toEqual([]);
    expect(outcome.result.success).toBe(false);
  });

  it("reports a timeout", async () => {
    const { launcher } = scriptedLauncher([], { exitCode: null, timedOut: true });

    const outcome = await runAgent({ ...baseRequest(launcher), timeoutMs: 50 });

    expect(outcome.status).toBe("timeout");
    expect(outcome.exitCode).toBeNull();
    expect(outcome.error).toMatchObject({ failure: "timeout", message: "Agent CLI timed out after 50ms" });
  });

  it("reports launch failures and callback errors on the outcome", async () => {
    const failingLauncher: AgentCliLauncher = async () => {
      throw new AgentProcessError("Failed to start codex: spawn codex ENOENT", "launch", null);
    };
    const launchOutcome = await runAgent(baseRequest(failingLauncher));
    expect(launchOutcome.status).toBe("failed");
    expect(launchOutcome.error?.message).toBe("Failed to start codex: spawn codex ENOENT");

    const { launcher } = scriptedLauncher(["line"]);
    const callbackOutcome = await runAgent({
      ...baseRequest(launcher),
      onOutputLine: () => {
        throw new Error("callback broke");
      },
    });
    expect(callbackOutcome.status).toBe("failed");
    expect(callbackOutcome.error?.message).toBe("callback broke");
  });

  it("can leave the sandbox override unset", async () => {
    const { launcher, calls } = scriptedLauncher([]);

    await runAgent({ ...baseRequest(launcher), allowNoSandbox: false, env: { EXTRA: "1" } });

    expect(calls[0]?.env.EXTRA).toBe("1");
    expect(calls[0]?.env[NO_SANDBOX_ENV_KEY]).toBe(process.env[NO_SANDBOX_ENV_KEY]);
  });

  it("falls back to AGENT_* settings for the binary, log directory and timeout", async () => {
    const { launcher, calls } = scriptedLauncher([]);

    const outcome = await runAgent({
      prompt: "Create hello.py",
      runId: RUN_ID,
      writableRoot: "/work",
      launcher,
      fs: createInMemoryLogFilesystem(),
      clock: () => STARTED,
      env: { AGENT_CLI_BIN: "my-codex", AGENT_LOG_DIR: "/env-runs", AGENT_RUN_TIMEOUT_MS: "1234" },
    });

    expect(calls[0]?.command).toBe("my-codex");
    expect(calls[0]?.timeoutMs).toBe(1234);
    expect(outcome.logFile).toBe("/env-runs/codex_run_20240501_100000_abcdef01.log");
    expect(outcome.status).toBe("completed");

    await expect(
      runAgent({ ...baseRequest(launcher), env: { AGENT_RUN_TIMEOUT_MS: "soon" } }),
    ).rejects.toThrow(/^Invalid AGENT_RUN_TIMEOUT_MS: /);
  });

  it("rejects an empty prompt", async () => {
    const { launcher, calls } = scriptedLauncher([]);

    await expect(runAgent({ ...baseRequest(launcher), prompt: "   " })).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    expect(calls).toEqual([]);
  });

  it("emits run telemetry", async () => {
    const events: AgentKitTelemetryEvent[] = [];
    const { launcher } = scriptedLauncher(["one"]);

    await runAgent({
      ...baseRequest(launcher),
      telemetry: {
        emit: (event) => {
          events.push(event);
        },
      },
    });

    expect(events.map((event) => event.type)).toEqual([
      "agent.run.started",
      "agent.run.output",
      "agent.run.completed",
    ]);
    expect(events[2]).toMatchObject({ runId: RUN_ID, status: "completed", exitCode: 0, success: false });
  });
});
