import { spawn } from "node:child_process";
import { randomBytes } from "node:crypto";
import path from "node:path";
import readline from "node:readline";

import { AgentProcessError, ConfigurationError } from "../errors.js";
import { parseJsonObject } from "../logs/entries.js";
import { LogParser } from "../logs/parser.js";
import { createRunResult, type RunResult } from "../logs/types.js";
import { resolveAgentKitConfig, type AgentKitConfig } from "../utils/env.js";
import { createNodeLogFilesystem, type LogFilesystem } from "../utils/filesystem.js";
import {
  createTelemetrySession,
  toIsoNow,
  type TelemetrySelection,
} from "../utils/telemetry.js";

export const NO_SANDBOX_ENV_KEY = "CODEX_UNSAFE_ALLOW_NO_SANDBOX";

export type AgentApprovalMode = "suggest" | "auto-edit" | "full-auto";

export type AgentCliArgsRequest = {
  readonly prompt: string;
  readonly model?: string;
  readonly provider?: string;
  readonly writableRoot?: string;
  /** Defaults to "full-auto". */
  readonly approvalMode?: AgentApprovalMode;
  readonly autoApproveEverything?: boolean;
  /** Defaults to true. */
  readonly quiet?: boolean;
  readonly extraArgs?: readonly string[];
};

export type AgentCliLaunchOptions = {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly env: NodeJS.ProcessEnv;
  readonly timeoutMs: number;
  /** Called for every stdout/stderr line, in arrival order. */
  readonly onLine: (line: string) => void;
};

export type AgentCliExit = {
  readonly exitCode: number | null;
  readonly timedOut: boolean;
};

/** Starts the agent CLI and settles once it has exited. Rejects when it cannot start. */
export type AgentCliLauncher = (options: AgentCliLaunchOptions) => Promise<AgentCliExit>;

export type AgentRunRequest = AgentCliArgsRequest & {
  readonly runId?: string;
  readonly logDir?: string;
  readonly timeoutMs?: number;
  readonly cliBin?: string;
  /** Sets CODEX_UNSAFE_ALLOW_NO_SANDBOX=1 for the CLI unless false. */
  readonly allowNoSandbox?: boolean;
  readonly env?: Readonly<Record<string, string>>;
  readonly launcher?: AgentCliLauncher;
  readonly fs?: LogFilesystem;
  readonly telemetry?: TelemetrySelection;
  readonly onOutputLine?: (line: string) => void;
  readonly onJsonLine?: (entry: Record<string, unknown>) => void;
  readonly clock?: () => Date;
};

export type AgentRunStatus = "completed" | "failed" | "timeout";

export type AgentRunOutcome = {
  readonly runId: string;
  readonly status: AgentRunStatus;
  readonly exitCode: number | null;
  readonly logFile: string;
  readonly startedAt: string;
  readonly endedAt: string;
  readonly durationMs: number;
  /** Parsed log on success; an empty, unsuccessful result otherwise. */
  readonly result: RunResult;
  readonly error?: Error;
};

export function createRunId(): string {
  return randomBytes(8).toString("hex");
}

export function buildAgentCliArgs(request: AgentCliArgsRequest): string[] {
  const args: string[] = [];
  if (request.model) {
    args.push(`--model=${request.model}`);
  }
  if (request.provider) {
    args.push(`--provider=${request.provider}`);
  }
  if (request.writableRoot) {
    args.push(`--writable-root=${request.writableRoot}`);
  }
  const approvalMode = request.approvalMode ?? "full-auto";
  args.push(approvalMode === "full-auto" ? "--full-auto" : `--approval-mode=${approvalMode}`);
  if (request.autoApproveEverything) {
    args.push("--dangerously-auto-approve-everything");
  }
  if (request.quiet ?? true) {
    args.push("--quiet");
  }
  args.push(...(request.extraArgs ?? []), request.prompt);
  return args;
}

/** `codex_run_<YYYYMMDD_HHMMSS>_<first 8 chars of the run id>.log`, local time. */
export function formatRunLogName(startedAt: Date, runId: string): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  const stamp =
    `${startedAt.getFullYear()}${pad(startedAt.getMonth() + 1)}${pad(startedAt.getDate())}_` +
    `${pad(startedAt.getHours())}${pad(startedAt.getMinutes())}${pad(startedAt.getSeconds())}`;
  return `codex_run_${stamp}_${runId.slice(0, 8)}.log`;
}

/**
 * Runs the agent CLI once, tees its output into a log file and parses that log.
 *
 * `cliBin`, `logDir` and `timeoutMs` fall back to the AGENT_* variables of
 * `process.env` merged with `request.env` (see resolveAgentKitConfig), then to the
 * built-in defaults.
 *
 * Launch failures, non-zero exits and timeouts are reported on the outcome; only
 * an empty prompt or an invalid AGENT_* value throws.
 */
export async function runAgent(request: AgentRunRequest): Promise<AgentRunOutcome> {
  if (request.prompt.trim().length === 0) {
    throw new ConfigurationError("Agent prompt must be a non-empty string");
  }
  const clock = request.clock ?? (() => new Date());
  const fs = request.fs ?? createNodeLogFilesystem();
  const launcher = request.launcher ?? spawnAgentCli;
  const telemetry = createTelemetrySession(request.telemetry);
  const runId = request.runId ?? createRunId();
  let config: AgentKitConfig | undefined;
  const fromEnv = (): AgentKitConfig =>
    (config ??= resolveAgentKitConfig({ ...process.env, ...request.env }));
  const logDir = request.logDir ?? fromEnv().logDir;
  const timeoutMs = request.timeoutMs ?? fromEnv().runTimeoutMs;
  const cliBin = request.cliBin ?? fromEnv().cliBin;
  const writableRoot = request.writableRoot ?? process.cwd();
  const started = clock();
  const logFile = path.join(logDir, formatRunLogName(started, runId));

  telemetry?.emit({
    type: "agent.run.started",
    timestamp: toIsoNow(),
    level: "info",
    runId,
    logFile,
    ...(request.model ? { model: request.model } : {}),
    ...(request.provider ? { provider: request.provider } : {}),
  });

  let status: AgentRunStatus = "failed";
  let exitCode: number | null = null;
  let result: RunResult | undefined;
  let failure: Error | undefined;

  try {
    await fs.ensureDir(logDir);
    await fs.writeTextFile(logFile, "");

    let pendingWrite: Promise<void> = Promise.resolve();
    let lineError: unknown;
    const handleLine = (line: string) => {
      pendingWrite = pendingWrite.then(() => fs.appendTextFile(logFile, `${line}\n`));
      telemetry?.emit({
        type: "agent.run.output",
        timestamp: toIsoNow(),
        level: "debug",
        runId,
        line,
      });
      try {
        request.onOutputLine?.(line);
        const entry = request.onJsonLine ? parseJsonObject(line) : undefined;
        if (entry) {
          request.onJsonLine?.(entry);
        }
      } catch (error) {
        lineError ??= error;
      }
    };

    const exit = await launcher({
      command: cliBin,
      args: buildAgentCliArgs({ ...request, writableRoot }),
      cwd: writableRoot,
      env: {
        ...process.env,
        ...request.env,
        ...(request.allowNoSandbox === false ? {} : { [NO_SANDBOX_ENV_KEY]: "1" }),
      },
      timeoutMs,
      onLine: handleLine,
    }).finally(() => pendingWrite);
    exitCode = exit.exitCode;

    if (lineError !== undefined) {
      throw lineError;
    }
    if (exit.timedOut) {
      status = "timeout";
      throw new AgentProcessError(
        `Agent CLI timed out after ${timeoutMs}ms`,
        "timeout",
        exit.exitCode,
      );
    }
    if (exit.exitCode !== 0) {
      throw new AgentProcessError(
        `Agent CLI exited with code ${exit.exitCode ?? "null"}`,
        "exit",
        exit.exitCode,
      );
    }

    const parser = new LogParser({ logDir, fs });
    result = await parser.parseRun(logFile, { runId });
    status = "completed";
  } catch (error) {
    failure = toRunError(error, exitCode);
  }

  const ended = clock();
  const outcome: AgentRunOutcome = Object.freeze({
    runId,
    status,
    exitCode,
    logFile,
    startedAt: started.toISOString(),
    endedAt: ended.toISOString(),
    durationMs: Math.max(0, ended.getTime() - started.getTime()),
    result:
      result ??
      createRunResult({
        runId,
        source: logFile,
        startedAt: started.toISOString(),
        records: { patches: [], commands: [], toolUsages: [], changes: [] },
      }),
    ...(failure ? { error: failure } : {}),
  });

  telemetry?.emit({
    type: "agent.run.completed",
    timestamp: toIsoNow(),
    level: failure ? "error" : "info",
    runId,
    status,
    exitCode,
    durationMs: outcome.durationMs,
    success: outcome.result.success,
    ...(failure ? { error: failure.message } : {}),
  });
  await telemetry?.flush();
  return outcome;
}

/**
 * Default launcher: spawns the CLI, reads stdout and stderr line by line, and
 * sends SIGTERM once `timeoutMs` elapses.
 */
export const spawnAgentCli: AgentCliLauncher = async (options) => {
  const child = spawn(options.command, [...options.args], {
    cwd: options.cwd,
    env: options.env,
    stdio: ["ignore", "pipe", "pipe"],
  });

  let timedOut = false;
  const timeout =
    options.timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          child.kill("SIGTERM");
        }, options.timeoutMs)
      : undefined;

  for (const stream of [child.stdout, child.stderr]) {
    readline.createInterface({ input: stream, crlfDelay: Infinity }).on("line", options.onLine);
  }

  const exitCode = await new Promise<number | null>((resolve, reject) => {
    child.on("error", (error) => {
      reject(
        new AgentProcessError(`Failed to start ${options.command}: ${error.message}`, "launch", null, {
          cause: error,
        }),
      );
    });
    child.on("close", (code) => resolve(code));
  }).finally(() => {
    if (timeout) {
      clearTimeout(timeout);
    }
  });

  return { exitCode, timedOut };
};

function toRunError(error: unknown, exitCode: number | null): Error {
  if (error instanceof Error) {
    return error;
  }
  return new AgentProcessError(String(error), "launch", exitCode);
}
