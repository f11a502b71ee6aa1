import { randomUUID } from "node:crypto";
import path from "node:path";

import { minimatch } from "minimatch";
import { z } from "zod";

import {
  ConfigurationError,
  DecodeError,
  FileAccessError,
  getErrnoCode,
  toErrorMessage,
} from "../errors.js";
import { clampConcurrency, mapWithConcurrency } from "../utils/concurrency.js";
import { resolveAgentKitConfig, type AgentKitConfig } from "../utils/env.js";
import {
  createNodeLogFilesystem,
  type LogDirectoryEntry,
  type LogFilesystem,
} from "../utils/filesystem.js";
import {
  createTelemetrySession,
  toIsoNow,
  type TelemetrySelection,
  type TelemetrySession,
} from "../utils/telemetry.js";
import type { ChangeClassification } from "./classifier.js";
import {
  ChangeDetector,
  CommandExtractor,
  PatchExtractor,
  ToolUsageExtractor,
  type ExtractOptions,
  type LogExtractor,
} from "./extractors.js";
import {
  compareLexical,
  createRunResult,
  createSessionResult,
  splitLogEntries,
  type ChangeRecord,
  type ParseFailure,
  type PatchRecord,
  type RunResult,
  type SessionResult,
} from "./types.js";

/** Categories filled by the built-in extractors; custom registrations must avoid them. */
export const BUILTIN_EXTRACTOR_CATEGORIES = ["patches", "commands", "tool_usages", "changes"] as const;

const LOG_TIMESTAMP_PATTERN = /\b(\d{4})[-/](\d{2})[-/](\d{2})[ T](\d{2}):(\d{2}):(\d{2})\b/;

const parserOptionsSchema = z.object({
  logDir: z.string().trim().min(1).optional(),
  logPattern: z.string().trim().min(1).optional(),
  deduplicate: z.boolean().default(false),
  concurrency: z.number().finite().optional(),
  sessionId: z.string().trim().min(1).optional(),
});

export type LogParserOptions = z.input<typeof parserOptionsSchema> & {
  readonly fs?: LogFilesystem;
  readonly telemetry?: TelemetrySelection;
  /** Classifier used for `codex_change` entries without a recognised type. */
  readonly classify?: (text: string) => ChangeClassification;
};

export type ParseRunOptions = {
  /** Defaults to the file name without its extension. */
  readonly runId?: string;
};

type RegisteredExtractor = {
  readonly category: string;
  readonly extractor: LogExtractor<ChangeRecord>;
};

type ParseOutcome =
  | { readonly kind: "run"; readonly run: RunResult }
  | { readonly kind: "failure"; readonly failure: ParseFailure };

const strictDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Runs the built-in extractors plus any registered custom ones over log files and
 * folds the results into run and session results.
 *
 * `logDir` and `logPattern` default to AGENT_LOG_DIR and AGENT_LOG_PATTERN.
 * Registration is only allowed while no parse is in flight on this instance;
 * each parse works on the registry as it was when the parse started.
 */
export class LogParser {
  readonly logDir: string;
  readonly logPattern: string;
  readonly #deduplicate: boolean;
  readonly #concurrency: number;
  readonly #sessionId: string | undefined;
  readonly #fs: LogFilesystem;
  readonly #telemetry: TelemetrySession | undefined;
  readonly #patchExtractor = new PatchExtractor();
  readonly #commandExtractor = new CommandExtractor();
  readonly #toolUsageExtractor = new ToolUsageExtractor();
  readonly #changeDetector: ChangeDetector;
  readonly #registered = new Map<string, LogExtractor<ChangeRecord>>();
  #inFlight = 0;

  constructor(options: LogParserOptions = {}) {
    const parsed = parserOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(
        `Invalid log parser option ${issue?.path.join(".") ?? ""}: ${issue?.message ?? "invalid value"}`,
        { cause: parsed.error },
      );
    }
    let config: AgentKitConfig | undefined;
    const fromEnv = (): AgentKitConfig => (config ??= resolveAgentKitConfig());
    this.logDir = parsed.data.logDir ?? fromEnv().logDir;
    this.logPattern = parsed.data.logPattern ?? fromEnv().logPattern;
    this.#deduplicate = parsed.data.deduplicate;
    this.#concurrency = clampConcurrency(parsed.data.concurrency);
    this.#sessionId = parsed.data.sessionId;
    this.#fs = options.fs ?? createNodeLogFilesystem();
    this.#telemetry = createTelemetrySession(options.telemetry);
    this.#changeDetector = new ChangeDetector(options.classify ? { classify: options.classify } : {});
  }

  get registeredCategories(): string[] {
    return [...this.#registered.keys()];
  }

  registerExtractor(category: string, extractor: LogExtractor<ChangeRecord>): void {
    const name = category.trim();
    if (name.length === 0) {
      throw new ConfigurationError("Extractor category must be a non-empty string");
    }
    if (this.#inFlight > 0) {
      throw new ConfigurationError(
        `Cannot register extractor "${name}" while a parse is in progress`,
      );
    }
    if (isBuiltinCategory(name) || this.#registered.has(name)) {
      throw new ConfigurationError(`Extractor category "${name}" is already registered`);
    }
    this.#registered.set(name, extractor);
  }

  /** Files in `logDir` whose names match `logPattern`, in lexical path order. */
  async listLogFiles(): Promise<string[]> {
    let entries: readonly LogDirectoryEntry[];
    try {
      entries = await this.#fs.readDir(this.logDir);
    } catch (error) {
      throw new ConfigurationError(
        `Log directory "${this.logDir}" is not readable: ${getErrnoCode(error) ?? toErrorMessage(error)}`,
        { cause: error },
      );
    }
    return entries
      .filter((entry) => entry.kind === "file" && minimatch(entry.name, this.logPattern, { dot: true }))
      .map((entry) => path.join(this.logDir, entry.name))
      .sort(compareLexical);
  }

  async parseRun(filePath: string, options: ParseRunOptions = {}): Promise<RunResult> {
    const extractors = this.#beginParse();
    try {
      return await this.#parseRun(filePath, extractors, options.runId);
    } finally {
      this.#endParse();
    }
  }

  /**
   * Parses every path (in lexical order). Unreadable and undecodable files are
   * recorded as failures; any other error rejects the call.
   */
  async parseFiles(filePaths: readonly string[]): Promise<SessionResult> {
    const extractors = this.#beginParse();
    const startedAt = Date.now();
    try {
      const ordered = [...filePaths].sort(compareLexical);
      const outcomes = await mapWithConcurrency(
        ordered,
        this.#concurrency,
        async (filePath): Promise<ParseOutcome> => {
          try {
            return { kind: "run", run: await this.#parseRun(filePath, extractors, undefined) };
          } catch (error) {
            const failure = toParseFailure(filePath, error);
            if (!failure) {
              throw error;
            }
            this.#telemetry?.emit({
              type: "log.parse.failed",
              timestamp: toIsoNow(),
              level: "warn",
              ...failure,
            });
            return { kind: "failure", failure };
          }
        },
      );

      const runs: RunResult[] = [];
      const failures: ParseFailure[] = [];
      for (const outcome of outcomes) {
        if (outcome.kind === "run") {
          runs.push(outcome.run);
        } else {
          failures.push(outcome.failure);
        }
      }
      runs.sort((left, right) => compareLexical(left.source, right.source));
      const session = createSessionResult({
        sessionId: this.#sessionId ?? randomUUID(),
        runs,
        failures,
      });
      this.#telemetry?.emit({
        type: "session.completed",
        timestamp: toIsoNow(),
        level: "info",
        sessionId: session.sessionId,
        totalRuns: session.stats.totalRuns,
        successfulRuns: session.stats.successfulRuns,
        durationMs: Date.now() - startedAt,
      });
      return session;
    } finally {
      this.#endParse();
      await this.#telemetry?.flush();
    }
  }

  async parseDirectory(): Promise<SessionResult> {
    return this.parseFiles(await this.listLogFiles());
  }

  /** Patches of every run in `logDir`, in run order. */
  async getPatches(): Promise<PatchRecord[]> {
    const session = await this.parseDirectory();
    return session.runs.flatMap((run) => run.patches);
  }

  #beginParse(): readonly RegisteredExtractor[] {
    this.#inFlight += 1;
    return [...this.#registered.entries()].map(([category, extractor]) => ({ category, extractor }));
  }

  #endParse(): void {
    this.#inFlight -= 1;
  }

  async #parseRun(
    filePath: string,
    extractors: readonly RegisteredExtractor[],
    runId: string | undefined,
  ): Promise<RunResult> {
    const startedAt = Date.now();
    this.#telemetry?.emit({
      type: "log.parse.started",
      timestamp: toIsoNow(),
      level: "debug",
      source: filePath,
    });

    const text = await this.#readLogText(filePath);
    const document = splitLogEntries(text);
    const extractOptions: ExtractOptions = { source: filePath, deduplicate: this.#deduplicate };

    const changes: ChangeRecord[] = this.#changeDetector.extract(document, extractOptions);
    for (const { category, extractor } of extractors) {
      for (const record of extractor.extract(document, extractOptions)) {
        changes.push(record.category === category ? record : { ...record, category });
      }
    }

    const run = createRunResult({
      runId: runId ?? path.basename(filePath, path.extname(filePath)),
      source: filePath,
      startedAt: findLogTimestamp(text) ?? (await this.#readMtime(filePath)),
      records: {
        patches: this.#patchExtractor.extract(document, extractOptions),
        commands: this.#commandExtractor.extract(document, extractOptions),
        toolUsages: this.#toolUsageExtractor.extract(document, extractOptions),
        changes: sortStableByLine(changes),
      },
    });

    this.#telemetry?.emit({
      type: "log.parse.completed",
      timestamp: toIsoNow(),
      level: "info",
      source: filePath,
      runId: run.runId,
      patchCount: run.patches.length,
      commandCount: run.commands.length,
      toolUsageCount: run.toolUsages.length,
      changeCount: run.changes.length,
      success: run.success,
      durationMs: Date.now() - startedAt,
    });
    return run;
  }

  async #readLogText(filePath: string): Promise<string> {
    let bytes: Uint8Array;
    try {
      bytes = await this.#fs.readFile(filePath);
    } catch (error) {
      throw new FileAccessError(filePath, getErrnoCode(error) ?? toErrorMessage(error), {
        cause: error,
      });
    }
    try {
      return strictDecoder.decode(bytes);
    } catch (error) {
      throw new DecodeError(filePath, { cause: error });
    }
  }

  async #readMtime(filePath: string): Promise<string> {
    try {
      const info = await this.#fs.stat(filePath);
      return new Date(info.mtimeMs).toISOString();
    } catch (error) {
      throw new FileAccessError(filePath, getErrnoCode(error) ?? toErrorMessage(error), {
        cause: error,
      });
    }
  }
}

/**
 * First `YYYY-MM-DD HH:MM:SS` (or `YYYY/MM/DD ...`) timestamp in the text, as a
 * local ISO date-time without zone.
 */
export function findLogTimestamp(text: string): string | undefined {
  const match = LOG_TIMESTAMP_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hour, minute, second] = match;
  return `${year}-${month}-${day}T${hour}:${minute}:${second}`;
}

function toParseFailure(filePath: string, error: unknown): ParseFailure | undefined {
  if (error instanceof FileAccessError) {
    return { source: filePath, kind: "file_access", reason: error.reason };
  }
  if (error instanceof DecodeError) {
    return { source: filePath, kind: "decode", reason: error.message };
  }
  return undefined;
}

function isBuiltinCategory(name: string): boolean {
  return BUILTIN_EXTRACTOR_CATEGORIES.some((category) => category === name);
}

function sortStableByLine<T extends { readonly line: number }>(records: readonly T[]): T[] {
  return records
    .map((record, index) => ({ record, index }))
    .sort((left, right) => left.record.line - right.record.line || left.index - right.index)
    .map(({ record }) => record);
}
