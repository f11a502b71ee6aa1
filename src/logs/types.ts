export const CHANGE_TYPES = [
  "patch",
  "command",
  "tool_use",
  "error",
  "creation",
  "deletion",
  "modification",
  "custom",
  "unknown",
] as const;

export type ChangeType = (typeof CHANGE_TYPES)[number];

export const TOOL_KINDS = [
  "edit",
  "read",
  "search",
  "list",
  "delete",
  "run",
  "create",
  "web",
  "unknown",
] as const;

export type ToolKind = (typeof TOOL_KINDS)[number];

export function isChangeType(value: string): value is ChangeType {
  return CHANGE_TYPES.some((type) => type === value);
}

/**
 * One line of raw log text.
 *
 * `index` is the 0-based sequence position, `line` the 1-based line number and
 * `offset` the character offset of the line start in the normalised text.
 */
export type LogEntry = {
  readonly index: number;
  readonly line: number;
  readonly offset: number;
  readonly text: string;
};

/**
 * A split log: normalised text plus its entries. Records point back into it by
 * line number only.
 */
export type LogDocument = {
  readonly text: string;
  readonly entries: readonly LogEntry[];
};

type RecordOrigin = {
  /** 1-based line of the log entry the record was found on. */
  readonly line: number;
  /** Identifier of the log the record came from (usually the file name). */
  readonly source: string;
};

export type PatchOperation = "add" | "update" | "delete" | "diff";

export type PatchRecord = RecordOrigin & {
  readonly filePath: string;
  readonly operation: PatchOperation;
  readonly diff: string;
  readonly linesAdded: number;
  readonly linesRemoved: number;
  readonly movePath?: string;
};

export type CommandRecord = RecordOrigin & {
  readonly command: string;
  readonly toolName?: string;
  readonly callId?: string;
  readonly exitCode?: number;
  readonly output?: string;
  readonly targetFiles: readonly string[];
};

export type ToolUsageRecord = RecordOrigin & {
  readonly toolName: string;
  readonly toolKind: ToolKind;
  readonly arguments: Readonly<Record<string, string>>;
  readonly targetFile?: string;
  readonly callId?: string;
  readonly resultSummary?: string;
};

export type ChangeRecord = RecordOrigin & {
  readonly type: ChangeType;
  /** Registry category that produced the record ("changes" for the built-in detector). */
  readonly category: string;
  /** Captured text: the first capture group when there is one, otherwise the match. */
  readonly text: string;
  /** Full matched span. */
  readonly match: string;
  /** Rank of the rule that assigned `type`; higher is more specific. */
  readonly priority: number;
  readonly filePath?: string;
};

export type RunResult = {
  readonly runId: string;
  readonly source: string;
  readonly startedAt?: string;
  readonly patches: readonly PatchRecord[];
  readonly commands: readonly CommandRecord[];
  readonly toolUsages: readonly ToolUsageRecord[];
  readonly changes: readonly ChangeRecord[];
  readonly filesTouched: readonly string[];
  readonly success: boolean;
  readonly errorCount: number;
};

export type ParseFailureKind = "file_access" | "decode";

export type ParseFailure = {
  readonly source: string;
  readonly kind: ParseFailureKind;
  readonly reason: string;
};

export type SessionStats = {
  readonly totalRuns: number;
  readonly successfulRuns: number;
  readonly failedFiles: number;
  readonly successRate: number;
  readonly totalPatches: number;
  readonly totalCommands: number;
  readonly totalToolUsages: number;
  readonly totalChanges: number;
  readonly filesTouched: readonly string[];
};

export type SessionResult = {
  readonly sessionId: string;
  readonly runs: readonly RunResult[];
  readonly failures: readonly ParseFailure[];
  readonly stats: SessionStats;
};

export type RunRecords = Pick<RunResult, "patches" | "commands" | "toolUsages" | "changes">;

export function splitLogEntries(input: string | readonly string[]): LogDocument {
  const text = typeof input === "string" ? normalizeLogText(input) : input.join("\n");
  const lines = text.split("\n");
  const entries: LogEntry[] = [];
  let offset = 0;
  for (let index = 0; index < lines.length; index += 1) {
    const lineText = lines[index] ?? "";
    entries.push({ index, line: index + 1, offset, text: lineText });
    offset += lineText.length + 1;
  }
  return { text, entries };
}

export function normalizeLogText(raw: string): string {
  return raw.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

/** 1-based line number containing `offset` in `text`. */
export function lineAtOffset(text: string, offset: number): number {
  let line = 1;
  const end = Math.min(Math.max(offset, 0), text.length);
  for (let index = 0; index < end; index += 1) {
    if (text.charCodeAt(index) === 10) {
      line += 1;
    }
  }
  return line;
}

/**
 * Sorted, de-duplicated list of file paths referenced by a run's records.
 */
export function collectFilesTouched(records: RunRecords): string[] {
  const files = new Set<string>();
  for (const patch of records.patches) {
    files.add(patch.filePath);
    if (patch.movePath) {
      files.add(patch.movePath);
    }
  }
  for (const change of records.changes) {
    if (change.filePath) {
      files.add(change.filePath);
    }
  }
  for (const usage of records.toolUsages) {
    if (usage.targetFile) {
      files.add(usage.targetFile);
    }
  }
  return [...files].sort(compareLexical);
}

/**
 * A run succeeds when it produced at least one patch or one non-error change and
 * did not finish with a failing command.
 */
export function deriveRunSuccess(records: RunRecords): boolean {
  const producedOutput =
    records.patches.length > 0 ||
    records.changes.some((change) => change.type !== "error" && change.type !== "unknown");
  if (!producedOutput) {
    return false;
  }
  const lastPatchLine = records.patches.reduce((max, patch) => Math.max(max, patch.line), 0);
  return !records.commands.some(
    (command) =>
      command.exitCode !== undefined && command.exitCode !== 0 && command.line > lastPatchLine,
  );
}

export function countErrors(records: RunRecords): number {
  let count = 0;
  for (const change of records.changes) {
    if (change.type === "error") {
      count += 1;
    }
  }
  for (const command of records.commands) {
    if (command.exitCode !== undefined && command.exitCode !== 0) {
      count += 1;
    }
  }
  return count;
}

/** Plain code-unit ordering: "run_1" < "run_10" < "run_2". */
export function compareLexical(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  if (left > right) {
    return 1;
  }
  return 0;
}

export function createRunResult(params: {
  readonly runId: string;
  readonly source: string;
  readonly startedAt?: string;
  readonly records: RunRecords;
}): RunResult {
  const { records } = params;
  return Object.freeze({
    runId: params.runId,
    source: params.source,
    ...(params.startedAt ? { startedAt: params.startedAt } : {}),
    patches: Object.freeze([...records.patches]),
    commands: Object.freeze([...records.commands]),
    toolUsages: Object.freeze([...records.toolUsages]),
    changes: Object.freeze([...records.changes]),
    filesTouched: Object.freeze(collectFilesTouched(records)),
    success: deriveRunSuccess(records),
    errorCount: countErrors(records),
  });
}

export function computeSessionStats(
  runs: readonly RunResult[],
  failures: readonly ParseFailure[],
): SessionStats {
  const files = new Set<string>();
  let successfulRuns = 0;
  let totalPatches = 0;
  let totalCommands = 0;
  let totalToolUsages = 0;
  let totalChanges = 0;
  for (const run of runs) {
    if (run.success) {
      successfulRuns += 1;
    }
    totalPatches += run.patches.length;
    totalCommands += run.commands.length;
    totalToolUsages += run.toolUsages.length;
    totalChanges += run.changes.length;
    for (const file of run.filesTouched) {
      files.add(file);
    }
  }
  return Object.freeze({
    totalRuns: runs.length,
    successfulRuns,
    failedFiles: failures.length,
    successRate: runs.length > 0 ? successfulRuns / runs.length : 0,
    totalPatches,
    totalCommands,
    totalToolUsages,
    totalChanges,
    filesTouched: Object.freeze([...files].sort(compareLexical)),
  });
}

export function createSessionResult(params: {
  readonly sessionId: string;
  readonly runs: readonly RunResult[];
  readonly failures?: readonly ParseFailure[];
}): SessionResult {
  const failures = params.failures ?? [];
  return Object.freeze({
    sessionId: params.sessionId,
    runs: Object.freeze([...params.runs]),
    failures: Object.freeze([...failures]),
    stats: computeSessionStats(params.runs, failures),
  });
}
