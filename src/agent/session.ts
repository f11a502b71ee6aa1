import { randomUUID } from "node:crypto";

import { countToolUsage, filterBySuccess } from "../logs/query.js";
import { createSessionResult, type RunResult, type SessionResult } from "../logs/types.js";
import type { LogFilesystem } from "../utils/filesystem.js";
import {
  createTelemetrySession,
  toIsoNow,
  type TelemetrySelection,
  type TelemetrySession,
} from "../utils/telemetry.js";
import {
  createRunId,
  runAgent,
  type AgentCliLauncher,
  type AgentRunOutcome,
  type AgentRunRequest,
} from "./run.js";

/** Per-run settings a session fills in when a queued run leaves them out. */
export type AgentRunDefaults = Omit<
  AgentRunRequest,
  "prompt" | "runId" | "launcher" | "fs" | "telemetry" | "logDir"
>;

export type AgentSessionOptions = {
  readonly sessionId?: string;
  readonly defaults?: AgentRunDefaults;
  readonly logDir?: string;
  readonly launcher?: AgentCliLauncher;
  readonly fs?: LogFilesystem;
  readonly telemetry?: TelemetrySelection;
  readonly clock?: () => Date;
};

export type AgentSessionRunRequest = Omit<
  AgentRunRequest,
  "launcher" | "fs" | "telemetry" | "logDir"
>;

export type AgentSessionSummary = {
  readonly sessionId: string;
  readonly totalRuns: number;
  readonly successfulRuns: number;
  readonly successRate: number;
  readonly totalFilesTouched: number;
  readonly totalChanges: number;
  readonly durationMs: number;
};

export type AgentSessionExecution = {
  readonly session: SessionResult;
  readonly outcomes: readonly AgentRunOutcome[];
};

/**
 * Queues agent runs that share defaults and a log directory, executes them one at
 * a time and aggregates their parsed logs.
 */
export class AgentSession {
  readonly sessionId: string;
  readonly #defaults: AgentRunDefaults;
  readonly #logDir: string | undefined;
  readonly #launcher: AgentCliLauncher | undefined;
  readonly #fs: LogFilesystem | undefined;
  readonly #telemetrySelection: TelemetrySelection | undefined;
  readonly #telemetry: TelemetrySession | undefined;
  readonly #clock: () => Date;
  readonly #queue: AgentRunRequest[] = [];
  readonly #outcomes: AgentRunOutcome[] = [];
  #result: SessionResult | undefined;
  #durationMs = 0;

  constructor(options: AgentSessionOptions = {}) {
    this.sessionId = options.sessionId ?? randomUUID();
    this.#defaults = options.defaults ?? {};
    this.#logDir = options.logDir;
    this.#launcher = options.launcher;
    this.#fs = options.fs;
    this.#telemetrySelection = options.telemetry;
    this.#telemetry = createTelemetrySession(options.telemetry);
    this.#clock = options.clock ?? (() => new Date());
  }

  get pendingRuns(): number {
    return this.#queue.length;
  }

  get outcomes(): readonly AgentRunOutcome[] {
    return [...this.#outcomes];
  }

  get result(): SessionResult | undefined {
    return this.#result;
  }

  /** Queues a run and returns its id. */
  addRun(request: AgentSessionRunRequest): string {
    const runId = request.runId ?? createRunId();
    this.#queue.push({
      ...this.#defaults,
      clock: this.#clock,
      ...request,
      runId,
      ...(this.#logDir !== undefined ? { logDir: this.#logDir } : {}),
      ...(this.#launcher ? { launcher: this.#launcher } : {}),
      ...(this.#fs ? { fs: this.#fs } : {}),
      ...(this.#telemetrySelection ? { telemetry: this.#telemetrySelection } : {}),
    });
    return runId;
  }

  /**
   * Runs every queued request in order. The session result covers all runs this
   * session has executed so far.
   */
  async executeAll(): Promise<AgentSessionExecution> {
    const startedAt = this.#clock().getTime();
    const batch = this.#queue.splice(0, this.#queue.length);
    const outcomes: AgentRunOutcome[] = [];
    for (const request of batch) {
      outcomes.push(await runAgent(request));
    }
    this.#outcomes.push(...outcomes);
    this.#durationMs += Math.max(0, this.#clock().getTime() - startedAt);

    const session = createSessionResult({
      sessionId: this.sessionId,
      runs: this.#outcomes.map((outcome) => outcome.result),
    });
    this.#result = session;

    this.#telemetry?.emit({
      type: "session.completed",
      timestamp: toIsoNow(),
      level: "info",
      sessionId: this.sessionId,
      totalRuns: session.stats.totalRuns,
      successfulRuns: session.stats.successfulRuns,
      durationMs: this.#durationMs,
    });
    await this.#telemetry?.flush();
    return { session, outcomes };
  }

  /** Undefined until `executeAll` has completed once. */
  getSummary(): AgentSessionSummary | undefined {
    const session = this.#result;
    if (!session) {
      return undefined;
    }
    return {
      sessionId: this.sessionId,
      totalRuns: session.stats.totalRuns,
      successfulRuns: session.stats.successfulRuns,
      successRate: session.stats.successRate,
      totalFilesTouched: session.stats.filesTouched.length,
      totalChanges: session.stats.totalChanges,
      durationMs: this.#durationMs,
    };
  }

  countToolUsage(): Record<string, number> {
    return this.#result ? countToolUsage(this.#result) : {};
  }

  getRunsBySuccess(success: boolean): RunResult[] {
    return this.#result ? [...filterBySuccess(this.#result, success).runs] : [];
  }
}
