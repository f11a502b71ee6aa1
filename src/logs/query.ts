import {
  collectFilesTouched,
  compareLexical,
  createSessionResult,
  type ChangeType,
  type RunRecords,
  type RunResult,
  type SessionResult,
  type ToolKind,
} from "./types.js";

export type RunCollection = SessionResult | readonly RunResult[];

export type DiscoveredTool = {
  readonly count: number;
  readonly kinds: readonly ToolKind[];
  /** Up to five distinct invocations, sorted, each capped at 150 characters. */
  readonly examples: readonly string[];
};

const MAX_TOOL_EXAMPLES = 5;
const MAX_TOOL_EXAMPLE_CHARS = 150;

/**
 * Keeps only records that touch a file with the given extension ("ts" and ".ts"
 * are equivalent). Runs left with no records are dropped.
 */
export function filterByExtension(target: SessionResult, extension: string): SessionResult;
export function filterByExtension(target: readonly RunResult[], extension: string): RunResult[];
export function filterByExtension(target: RunCollection, extension: string): RunCollection {
  const suffix = extension.startsWith(".") ? extension : `.${extension}`;
  const matches = (filePath: string | undefined) =>
    filePath !== undefined && filePath.endsWith(suffix);

  return mapRuns(target, (run) => {
    const records: RunRecords = {
      patches: run.patches.filter((patch) => matches(patch.filePath) || matches(patch.movePath)),
      commands: run.commands.filter((command) => command.targetFiles.some((file) => matches(file))),
      toolUsages: run.toolUsages.filter((usage) => matches(usage.targetFile)),
      changes: run.changes.filter((change) => matches(change.filePath)),
    };
    return hasRecords(records) ? withRecords(run, records) : undefined;
  });
}

/** Keeps only changes of `type`; runs without such a change are dropped. */
export function filterByChangeType(target: SessionResult, type: ChangeType): SessionResult;
export function filterByChangeType(target: readonly RunResult[], type: ChangeType): RunResult[];
export function filterByChangeType(target: RunCollection, type: ChangeType): RunCollection {
  return mapRuns(target, (run) => {
    const changes = run.changes.filter((change) => change.type === type);
    if (changes.length === 0) {
      return undefined;
    }
    return withRecords(run, { ...run, changes });
  });
}

export function filterBySuccess(target: SessionResult, success: boolean): SessionResult;
export function filterBySuccess(target: readonly RunResult[], success: boolean): RunResult[];
export function filterBySuccess(target: RunCollection, success: boolean): RunCollection {
  return mapRuns(target, (run) => (run.success === success ? run : undefined));
}

/** Runs that touched `filePath`, including commands that targeted it. */
export function getRunsByFile(target: SessionResult, filePath: string): SessionResult;
export function getRunsByFile(target: readonly RunResult[], filePath: string): RunResult[];
export function getRunsByFile(target: RunCollection, filePath: string): RunCollection {
  return mapRuns(target, (run) =>
    run.filesTouched.includes(filePath) ||
    run.commands.some((command) => command.targetFiles.includes(filePath))
      ? run
      : undefined,
  );
}

/** Invocation count per tool name, in order of first use. */
export function countToolUsage(target: RunCollection): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const run of toRuns(target)) {
    for (const usage of run.toolUsages) {
      counts[usage.toolName] = (counts[usage.toolName] ?? 0) + 1;
    }
  }
  return counts;
}

export function discoverTools(target: RunCollection): Record<string, DiscoveredTool> {
  const found = new Map<string, { count: number; kinds: Set<ToolKind>; examples: Set<string> }>();
  for (const run of toRuns(target)) {
    for (const usage of run.toolUsages) {
      let entry = found.get(usage.toolName);
      if (!entry) {
        entry = { count: 0, kinds: new Set(), examples: new Set() };
        found.set(usage.toolName, entry);
      }
      entry.count += 1;
      entry.kinds.add(usage.toolKind);
      const example = formatInvocation(usage.arguments);
      if (example !== undefined && entry.examples.size < MAX_TOOL_EXAMPLES) {
        entry.examples.add(example);
      }
    }
  }

  const tools: Record<string, DiscoveredTool> = {};
  for (const [name, entry] of found) {
    tools[name] = {
      count: entry.count,
      kinds: [...entry.kinds].sort(compareLexical),
      examples: [...entry.examples].sort(compareLexical),
    };
  }
  return tools;
}

function formatInvocation(args: Readonly<Record<string, string>>): string | undefined {
  const keys = Object.keys(args).sort(compareLexical);
  if (keys.length === 0) {
    return undefined;
  }
  const text = JSON.stringify(Object.fromEntries(keys.map((key) => [key, args[key]])));
  return text.length > MAX_TOOL_EXAMPLE_CHARS
    ? `${text.slice(0, MAX_TOOL_EXAMPLE_CHARS)}...`
    : text;
}

function toRuns(target: RunCollection): readonly RunResult[] {
  return isSessionResult(target) ? target.runs : target;
}

function isSessionResult(target: RunCollection): target is SessionResult {
  return !Array.isArray(target);
}

function mapRuns(
  target: RunCollection,
  select: (run: RunResult) => RunResult | undefined,
): RunCollection {
  const runs: RunResult[] = [];
  for (const run of toRuns(target)) {
    const selected = select(run);
    if (selected) {
      runs.push(selected);
    }
  }
  if (!isSessionResult(target)) {
    return runs;
  }
  return createSessionResult({ sessionId: target.sessionId, runs, failures: target.failures });
}

function hasRecords(records: RunRecords): boolean {
  return (
    records.patches.length > 0 ||
    records.commands.length > 0 ||
    records.toolUsages.length > 0 ||
    records.changes.length > 0
  );
}

// Filtered views keep the run's own verdict; only the record lists narrow.
function withRecords(run: RunResult, records: RunRecords): RunResult {
  return Object.freeze({
    ...run,
    patches: Object.freeze([...records.patches]),
    commands: Object.freeze([...records.commands]),
    toolUsages: Object.freeze([...records.toolUsages]),
    changes: Object.freeze([...records.changes]),
    filesTouched: Object.freeze(collectFilesTouched(records)),
  });
}
