import { z } from "zod";

import { ConfigurationError, InvalidPatternError, toErrorMessage } from "../errors.js";
import { classifyChange, type ChangeClassification } from "./classifier.js";
import {
  findTargetFiles,
  indexToolOutputs,
  renderCommandArgument,
  scanCodexChangeEvents,
  scanToolEvents,
  type ToolCallEvent,
} from "./entries.js";
import {
  BEGIN_PATCH_LINE,
  countDiffLines,
  findPatchBlocks,
  findUnifiedDiffBlocks,
  parsePatchSections,
  type PatchSection,
} from "./patch.js";
import {
  CHANGE_TYPES,
  isChangeType,
  lineAtOffset,
  splitLogEntries,
  type ChangeRecord,
  type ChangeType,
  type CommandRecord,
  type LogDocument,
  type PatchRecord,
  type ToolKind,
  type ToolUsageRecord,
} from "./types.js";

export const DEFAULT_LOG_SOURCE = "<inline>";
export const CHANGE_DETECTOR_CATEGORY = "changes";
const EXPLICIT_CHANGE_PRIORITY = 100;
const RESULT_SUMMARY_MAX_CHARS = 200;
const PROMPT_LINE_PATTERN = /^\s*\$ (.+?)\s*$/;
const PROMPT_EXIT_PATTERN = /^\s*\[?exit (?:code|status):?\s*(-?\d+)\]?\s*$/i;

export type LogInput = string | readonly string[] | LogDocument;

export type ExtractOptions = {
  /** Identifier stamped on every record; defaults to "<inline>". */
  readonly source?: string;
  /** Keep only the first record per normalised content. */
  readonly deduplicate?: boolean;
};

export type ExtractorOptions = {
  /** Regex a record's file path must match for the record to be kept. */
  readonly filePattern?: string | RegExp;
};

export interface LogExtractor<TRecord> {
  extract(input: LogInput, options?: ExtractOptions): TRecord[];
}

export function toLogDocument(input: LogInput): LogDocument {
  if (typeof input === "string" || isLineArray(input)) {
    return splitLogEntries(input);
  }
  return input;
}

/**
 * Shared scan/dedupe/filter plumbing. Subclasses only scan a document; they keep
 * no state between calls.
 */
export abstract class BaseExtractor<TRecord> implements LogExtractor<TRecord> {
  readonly #filePattern: RegExp | undefined;

  constructor(options: ExtractorOptions = {}) {
    this.#filePattern =
      options.filePattern === undefined ? undefined : compilePattern(options.filePattern, "");
  }

  extract(input: LogInput, options: ExtractOptions = {}): TRecord[] {
    const document = toLogDocument(input);
    const records = this.scan(document, options.source ?? DEFAULT_LOG_SOURCE);
    if (!options.deduplicate) {
      return records;
    }
    const seen = new Set<string>();
    return records.filter((record) => {
      const key = this.contentKey(record);
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });
  }

  protected abstract scan(document: LogDocument, source: string): TRecord[];

  protected abstract contentKey(record: TRecord): string;

  protected matchesFilePattern(filePath: string | undefined): boolean {
    if (!this.#filePattern) {
      return true;
    }
    return filePath !== undefined && this.#filePattern.test(filePath);
  }
}

export class PatchExtractor extends BaseExtractor<PatchRecord> {
  protected scan(document: LogDocument, source: string): PatchRecord[] {
    const records: PatchRecord[] = [];
    const push = (section: PatchSection, line: number) => {
      if (!this.matchesFilePattern(section.filePath)) {
        return;
      }
      const counts = countDiffLines(section.body);
      records.push({
        filePath: section.filePath,
        operation: section.operation,
        diff: section.body,
        linesAdded: counts.added,
        linesRemoved: counts.removed,
        ...(section.movePath ? { movePath: section.movePath } : {}),
        line,
        source,
      });
    };

    for (const event of scanToolEvents(document)) {
      if (event.kind !== "call") {
        continue;
      }
      const payload = findPatchPayload(event);
      if (payload === undefined) {
        continue;
      }
      for (const section of parsePatchSections(payload)) {
        push(section, event.line);
      }
    }
    for (const block of findPatchBlocks(document)) {
      for (const section of block.sections) {
        push(section, block.line + section.lineOffset);
      }
    }
    for (const block of findUnifiedDiffBlocks(document)) {
      for (const section of block.sections) {
        push(section, block.line + section.lineOffset);
      }
    }
    return sortByLine(records);
  }

  protected contentKey(record: PatchRecord): string {
    return [record.operation, record.filePath, normalizeContent(record.diff)].join("\u0000");
  }
}

export class CommandExtractor extends BaseExtractor<CommandRecord> {
  protected scan(document: LogDocument, source: string): CommandRecord[] {
    const records: CommandRecord[] = [];
    const events = scanToolEvents(document);
    const outputs = indexToolOutputs(events);

    for (const event of events) {
      if (event.kind !== "call") {
        continue;
      }
      const command =
        renderCommandArgument(event.arguments.command) ?? renderCommandArgument(event.arguments.cmd);
      if (command === undefined) {
        continue;
      }
      const targetFiles = findTargetFiles(event.arguments);
      if (this.hasFileFilterMismatch(targetFiles)) {
        continue;
      }
      const output = event.callId ? outputs.get(event.callId) : undefined;
      records.push({
        command,
        toolName: event.name,
        ...(event.callId ? { callId: event.callId } : {}),
        ...(output?.exitCode !== undefined ? { exitCode: output.exitCode } : {}),
        ...(output ? { output: output.output } : {}),
        targetFiles,
        line: event.line,
        source,
      });
    }

    records.push(...scanPromptCommands(document, source));
    return sortByLine(records);
  }

  protected contentKey(record: CommandRecord): string {
    return normalizeContent(record.command);
  }

  private hasFileFilterMismatch(targetFiles: readonly string[]): boolean {
    if (targetFiles.length === 0) {
      return false;
    }
    return !targetFiles.some((file) => this.matchesFilePattern(file));
  }
}

export class ToolUsageExtractor extends BaseExtractor<ToolUsageRecord> {
  protected scan(document: LogDocument, source: string): ToolUsageRecord[] {
    const records: ToolUsageRecord[] = [];
    const events = scanToolEvents(document);
    const outputs = indexToolOutputs(events);

    for (const event of events) {
      if (event.kind !== "call") {
        continue;
      }
      const targetFile = findTargetFiles(event.arguments)[0];
      if (targetFile !== undefined && !this.matchesFilePattern(targetFile)) {
        continue;
      }
      const output = event.callId ? outputs.get(event.callId) : undefined;
      const summary = output ? summarizeOutput(output.output) : "";
      records.push({
        toolName: event.name,
        toolKind: categorizeTool(event.name),
        arguments: flattenArguments(event.arguments),
        ...(targetFile !== undefined ? { targetFile } : {}),
        ...(event.callId ? { callId: event.callId } : {}),
        ...(summary ? { resultSummary: summary } : {}),
        line: event.line,
        source,
      });
    }
    return records;
  }

  protected contentKey(record: ToolUsageRecord): string {
    const args = Object.keys(record.arguments)
      .sort()
      .map((key) => [key, record.arguments[key]]);
    return `${record.toolName}\u0000${JSON.stringify(args)}`;
  }
}

export type ChangeDetectorOptions = ExtractorOptions & {
  readonly classify?: (text: string) => ChangeClassification;
};

/**
 * Explicit `codex_change` entries. A recognised `change_type` is taken as-is;
 * anything else is classified from the entry content.
 */
export class ChangeDetector extends BaseExtractor<ChangeRecord> {
  readonly #classify: (text: string) => ChangeClassification;

  constructor(options: ChangeDetectorOptions = {}) {
    super(options);
    this.#classify = options.classify ?? classifyChange;
  }

  protected scan(document: LogDocument, source: string): ChangeRecord[] {
    const records: ChangeRecord[] = [];
    for (const event of scanCodexChangeEvents(document)) {
      if (!this.matchesFilePattern(event.filePath)) {
        continue;
      }
      const classification: ChangeClassification =
        event.changeType !== undefined && isChangeType(event.changeType)
          ? { type: event.changeType, priority: EXPLICIT_CHANGE_PRIORITY }
          : this.#classify(event.content);
      records.push({
        type: classification.type,
        category: CHANGE_DETECTOR_CATEGORY,
        text: event.content,
        match: event.raw,
        priority: classification.priority,
        ...(event.filePath ? { filePath: event.filePath } : {}),
        line: event.line,
        source,
      });
    }
    return records;
  }

  protected contentKey(record: ChangeRecord): string {
    return `${record.type}\u0000${record.filePath ?? ""}\u0000${normalizeContent(record.text)}`;
  }
}

const DEFAULT_CUSTOM_FLAGS = "i";

const customExtractorConfigSchema = z
  .object({
    pattern: z.union([z.string().min(1), z.instanceof(RegExp)]),
    changeType: z.enum(CHANGE_TYPES).default("custom"),
    /** String patterns only; defaults to "i". A RegExp carries its own flags. */
    flags: z
      .string()
      .regex(/^[imsu]*$/, "only the i, m, s and u flags are supported")
      .optional(),
    category: z.string().trim().min(1).default("custom"),
    priority: z.number().int().default(EXPLICIT_CHANGE_PRIORITY),
    filePattern: z.union([z.string(), z.instanceof(RegExp)]).optional(),
  })
  .superRefine((config, ctx) => {
    if (config.pattern instanceof RegExp && config.flags !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["flags"],
        message: "set flags on the RegExp pattern itself",
      });
    }
  });

export type CustomExtractorConfig = z.input<typeof customExtractorConfigSchema>;

/**
 * Caller-defined pattern. Each match becomes a change of the configured type; the
 * first capture group (or the whole match) is the captured text, and a named
 * `file` group fills `filePath`.
 *
 * The configuration is validated and the pattern compiled once, here; a bad
 * pattern throws InvalidPatternError.
 */
export class CustomExtractor extends BaseExtractor<ChangeRecord> {
  readonly changeType: ChangeType;
  readonly category: string;
  readonly priority: number;
  readonly #pattern: RegExp;

  constructor(config: CustomExtractorConfig) {
    const parsed = customExtractorConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.join(".") || "config";
      throw new ConfigurationError(
        `Invalid custom extractor ${where}: ${issue?.message ?? "invalid value"}`,
        { cause: parsed.error },
      );
    }
    super(parsed.data.filePattern === undefined ? {} : { filePattern: parsed.data.filePattern });
    const { pattern, flags } = parsed.data;
    this.#pattern =
      typeof pattern === "string"
        ? compilePattern(pattern, `${flags ?? DEFAULT_CUSTOM_FLAGS}g`)
        : compilePattern(pattern.source, `${stripStatefulFlags(pattern.flags)}g`);
    this.changeType = parsed.data.changeType;
    this.category = parsed.data.category;
    this.priority = parsed.data.priority;
  }

  get pattern(): string {
    return this.#pattern.source;
  }

  protected scan(document: LogDocument, source: string): ChangeRecord[] {
    const records: ChangeRecord[] = [];
    // matchAll clones the regex, so the shared instance keeps no lastIndex state.
    for (const match of document.text.matchAll(this.#pattern)) {
      const whole = match[0];
      if (whole.length === 0) {
        continue;
      }
      const filePath = match.groups?.file?.trim();
      if (!this.matchesFilePattern(filePath)) {
        continue;
      }
      records.push({
        type: this.changeType,
        category: this.category,
        text: match[1] ?? whole,
        match: whole,
        priority: this.priority,
        ...(filePath ? { filePath } : {}),
        line: lineAtOffset(document.text, match.index ?? 0),
        source,
      });
    }
    return records;
  }

  protected contentKey(record: ChangeRecord): string {
    return `${record.type}\u0000${normalizeContent(record.text)}`;
  }
}

const TOOL_KIND_KEYWORDS: ReadonlyArray<readonly [ToolKind, readonly string[]]> = [
  ["edit", ["edit", "write", "modify", "update", "replace", "patch", "apply"]],
  ["read", ["read", "cat", "view", "show", "open"]],
  ["search", ["search", "grep", "find", "query", "rg", "glob"]],
  ["list", ["list", "ls", "dir", "tree"]],
  ["delete", ["delete", "remove", "rm", "unlink"]],
  ["run", ["run", "exec", "command", "terminal", "shell", "bash"]],
  ["create", ["create", "new", "make", "mkdir", "touch"]],
  ["web", ["web", "browser", "http", "url", "fetch"]],
];

/** Kind of a tool from the words in its name ("read_file" -> "read"). */
export function categorizeTool(toolName: string): ToolKind {
  const words = new Set(
    toolName
      .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
      .toLowerCase()
      .split(/[^a-z0-9]+/)
      .filter(Boolean),
  );
  for (const [kind, keywords] of TOOL_KIND_KEYWORDS) {
    if (keywords.some((keyword) => words.has(keyword))) {
      return kind;
    }
  }
  return "unknown";
}

function scanPromptCommands(document: LogDocument, source: string): CommandRecord[] {
  const records: CommandRecord[] = [];
  const { entries } = document;
  for (let index = 0; index < entries.length; index += 1) {
    const entry = entries[index];
    const match = entry ? PROMPT_LINE_PATTERN.exec(entry.text) : null;
    if (!entry || !match?.[1]) {
      continue;
    }
    const outputLines: string[] = [];
    let exitCode: number | undefined;
    for (let cursor = index + 1; cursor < entries.length; cursor += 1) {
      const text = entries[cursor]?.text ?? "";
      if (text.trim().length === 0 || PROMPT_LINE_PATTERN.test(text)) {
        break;
      }
      const exitMatch = PROMPT_EXIT_PATTERN.exec(text);
      if (exitMatch?.[1]) {
        exitCode = Number.parseInt(exitMatch[1], 10);
        break;
      }
      outputLines.push(text);
    }
    records.push({
      command: match[1],
      ...(exitCode !== undefined ? { exitCode } : {}),
      ...(outputLines.length > 0 ? { output: outputLines.join("\n") } : {}),
      targetFiles: [],
      line: entry.line,
      source,
    });
  }
  return records;
}

function findPatchPayload(event: ToolCallEvent): string | undefined {
  const { command, input, patch } = event.arguments;
  const candidates: unknown[] = Array.isArray(command) ? [...command] : [command];
  candidates.push(input, patch);
  for (const candidate of candidates) {
    if (typeof candidate !== "string") {
      continue;
    }
    const start = candidate.indexOf(BEGIN_PATCH_LINE);
    if (start < 0) {
      continue;
    }
    const payload = candidate.slice(start);
    // Some logs double-escape the payload, leaving literal "\n" sequences.
    return payload.includes("\n") ? payload : payload.replace(/\\n/g, "\n");
  }
  return undefined;
}

function flattenArguments(args: Readonly<Record<string, unknown>>): Record<string, string> {
  const flattened: Record<string, string> = {};
  for (const [key, value] of Object.entries(args)) {
    if (value === undefined) {
      continue;
    }
    flattened[key] = typeof value === "string" ? value : JSON.stringify(value);
  }
  return flattened;
}

function summarizeOutput(output: string): string {
  const trimmed = output.trim();
  if (trimmed.length <= RESULT_SUMMARY_MAX_CHARS) {
    return trimmed;
  }
  return `${trimmed.slice(0, RESULT_SUMMARY_MAX_CHARS)}...`;
}

function sortByLine<T extends { readonly line: number }>(records: T[]): T[] {
  return records
    .map((record, index) => ({ record, index }))
    .sort((left, right) => left.record.line - right.record.line || left.index - right.index)
    .map(({ record }) => record);
}

function normalizeContent(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

function compilePattern(pattern: string | RegExp, flags: string): RegExp {
  if (pattern instanceof RegExp) {
    return new RegExp(pattern.source, stripStatefulFlags(pattern.flags));
  }
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new InvalidPatternError(pattern, toErrorMessage(error), { cause: error });
  }
}

function stripStatefulFlags(flags: string): string {
  return flags.replace(/[gy]/g, "");
}

function isLineArray(input: LogInput): input is readonly string[] {
  return Array.isArray(input);
}
