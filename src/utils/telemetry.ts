import type { ParseFailureKind } from "../logs/types.js";
import { resolveAgentKitConfig } from "./env.js";

export const TELEMETRY_LEVELS = ["debug", "info", "warn", "error"] as const;

export type TelemetryLevel = (typeof TELEMETRY_LEVELS)[number];

export type LogLevel = TelemetryLevel | "silent";

type TelemetryBaseEvent = {
  readonly timestamp: string;
  readonly level: TelemetryLevel;
};

export type LogParseStartedEvent = TelemetryBaseEvent & {
  readonly type: "log.parse.started";
  readonly source: string;
};

export type LogParseFailedEvent = TelemetryBaseEvent & {
  readonly type: "log.parse.failed";
  readonly source: string;
  readonly kind: ParseFailureKind;
  readonly reason: string;
};

export type LogParseCompletedEvent = TelemetryBaseEvent & {
  readonly type: "log.parse.completed";
  readonly source: string;
  readonly runId: string;
  readonly patchCount: number;
  readonly commandCount: number;
  readonly toolUsageCount: number;
  readonly changeCount: number;
  readonly success: boolean;
  readonly durationMs: number;
};

export type AgentRunStartedEvent = TelemetryBaseEvent & {
  readonly type: "agent.run.started";
  readonly runId: string;
  readonly logFile: string;
  readonly model?: string;
  readonly provider?: string;
};

export type AgentRunOutputEvent = TelemetryBaseEvent & {
  readonly type: "agent.run.output";
  readonly runId: string;
  readonly line: string;
};

export type AgentRunCompletedEvent = TelemetryBaseEvent & {
  readonly type: "agent.run.completed";
  readonly runId: string;
  readonly status: "completed" | "failed" | "timeout";
  readonly exitCode: number | null;
  readonly durationMs: number;
  readonly success: boolean;
  readonly error?: string;
};

export type SessionCompletedEvent = TelemetryBaseEvent & {
  readonly type: "session.completed";
  readonly sessionId: string;
  readonly totalRuns: number;
  readonly successfulRuns: number;
  readonly durationMs: number;
};

export type BenchmarkAttemptCompletedEvent = TelemetryBaseEvent & {
  readonly type: "benchmark.attempt.completed";
  readonly problemId: string;
  readonly model: string;
  readonly attempt: number;
  readonly passed: boolean;
  readonly error?: string;
};

export type AgentKitTelemetryEvent =
  | LogParseStartedEvent
  | LogParseFailedEvent
  | LogParseCompletedEvent
  | AgentRunStartedEvent
  | AgentRunOutputEvent
  | AgentRunCompletedEvent
  | SessionCompletedEvent
  | BenchmarkAttemptCompletedEvent;

export type TelemetrySink = {
  readonly emit: (event: AgentKitTelemetryEvent) => void | Promise<void>;
  readonly flush?: () => void | Promise<void>;
};

export type TelemetryConfig = {
  readonly sink: TelemetrySink;
};

export type TelemetrySelection = TelemetrySink | TelemetryConfig;

export type TelemetrySession = {
  readonly emit: (event: AgentKitTelemetryEvent) => void;
  readonly flush: () => Promise<void>;
};

export function toIsoNow(): string {
  return new Date().toISOString();
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

function isTelemetrySink(value: unknown): value is TelemetrySink {
  return (
    typeof value === "object" && value !== null && "emit" in value && typeof value.emit === "function"
  );
}

function resolveTelemetrySelection(
  telemetry: TelemetrySelection | undefined,
): TelemetryConfig | undefined {
  if (!telemetry) {
    return undefined;
  }
  if (isTelemetrySink(telemetry)) {
    return { sink: telemetry };
  }
  if (isTelemetrySink(telemetry.sink)) {
    return telemetry;
  }
  throw new Error("Invalid telemetry config: expected a sink with emit(event).");
}

/**
 * Wraps a sink so that emitting never throws and async sinks can be awaited with
 * `flush()`.
 */
export function createTelemetrySession(
  telemetry: TelemetrySelection | undefined,
): TelemetrySession | undefined {
  const config = resolveTelemetrySelection(telemetry);
  if (!config) {
    return undefined;
  }

  const pending = new Set<Promise<void>>();
  const trackPromise = (promise: Promise<void>): void => {
    pending.add(promise);
    void promise.finally(() => {
      pending.delete(promise);
    });
  };
  const emit = (event: AgentKitTelemetryEvent): void => {
    try {
      const output = config.sink.emit(event);
      if (isPromiseLike(output)) {
        const task = Promise.resolve(output)
          .then(() => undefined)
          .catch(() => undefined);
        trackPromise(task);
      }
    } catch {
      // Telemetry failures must never break parsing or runs.
    }
  };
  const flush = async (): Promise<void> => {
    while (pending.size > 0) {
      await Promise.allSettled([...pending]);
    }
    if (typeof config.sink.flush === "function") {
      try {
        await config.sink.flush();
      } catch {
        // Telemetry failures must never break parsing or runs.
      }
    }
  };

  return { emit, flush };
}

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

export type ConsoleTelemetrySinkOptions = {
  readonly level?: LogLevel;
  /** Receives each formatted line; defaults to stderr. */
  readonly write?: (line: string) => void;
};

/**
 * Sink that prints events at or above `level` (default AGENT_KIT_LOG_LEVEL, else
 * warn). Output goes to stderr so that stdout stays usable for machine-readable
 * results.
 */
export function createConsoleTelemetrySink(options: ConsoleTelemetrySinkOptions = {}): TelemetrySink {
  const threshold = LEVEL_WEIGHTS[options.level ?? resolveAgentKitConfig().logLevel];
  const write =
    options.write ??
    ((line: string) => {
      process.stderr.write(`${line}\n`);
    });
  return {
    emit: (event) => {
      if (LEVEL_WEIGHTS[event.level] < threshold) {
        return;
      }
      write(formatTelemetryEvent(event));
    },
  };
}

/** `<timestamp> <LEVEL> <type> <json of the remaining fields>` */
export function formatTelemetryEvent(event: AgentKitTelemetryEvent): string {
  const { timestamp, level, type, ...details } = event;
  const head = `${timestamp} ${level.toUpperCase()} ${type}`;
  return Object.keys(details).length > 0 ? `${head} ${JSON.stringify(details)}` : head;
}
