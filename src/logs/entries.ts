import { z } from "zod";

import type { LogDocument } from "./types.js";

const TOOL_EVENT_KEYWORD_PATTERN = /function_call|tool_call|tool_use|tool_result/;
const CODEX_CHANGE_KEYWORD = "codex_change";
const OUTPUT_ENTRY_TYPES = new Set(["function_call_output", "custom_tool_call_output", "tool_result"]);
const EXIT_CODE_LINE_PATTERN = /^exit code:\s*(-?\d+)\s*$/im;
const OUTPUT_SECTION_PATTERN = /^output:\n/im;

export const FILE_ARGUMENT_KEYS = ["target_file", "file_path", "filename", "path"] as const;

const jsonObjectSchema = z.record(z.unknown());

const toolCallEntrySchema = z
  .object({
    type: z.string().optional(),
    name: z.string().trim().min(1),
    arguments: z.union([z.string(), jsonObjectSchema]).optional(),
    input: z.string().optional(),
    call_id: z.string().optional(),
  })
  .passthrough();

const toolOutputEntrySchema = z
  .object({
    type: z.string().optional(),
    call_id: z.string().min(1),
    output: z.union([z.string(), jsonObjectSchema]),
  })
  .passthrough();

const structuredOutputSchema = z
  .object({
    output: z.string().optional(),
    metadata: z
      .object({
        exit_code: z.number().int().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const codexChangeEntrySchema = z
  .object({
    type: z.literal(CODEX_CHANGE_KEYWORD),
    change_type: z.string().optional(),
    file_path: z.string().optional(),
    content: z.string().optional(),
  })
  .passthrough();

export type ToolCallEvent = {
  readonly kind: "call";
  readonly line: number;
  readonly name: string;
  readonly callId?: string;
  /** Parsed arguments; a raw, non-JSON argument string is kept under `input`. */
  readonly arguments: Readonly<Record<string, unknown>>;
};

export type ToolOutputEvent = {
  readonly kind: "output";
  readonly line: number;
  readonly callId: string;
  readonly output: string;
  readonly exitCode?: number;
};

export type ToolEvent = ToolCallEvent | ToolOutputEvent;

export type CodexChangeEvent = {
  readonly line: number;
  readonly raw: string;
  readonly changeType?: string;
  readonly filePath?: string;
  readonly content: string;
};

/**
 * Tool invocations and their outputs, in log order. Lines that are not JSON or
 * do not match the expected shapes are skipped.
 */
export function scanToolEvents(document: LogDocument): ToolEvent[] {
  const events: ToolEvent[] = [];
  for (const entry of document.entries) {
    if (!TOOL_EVENT_KEYWORD_PATTERN.test(entry.text)) {
      continue;
    }
    const parsed = parseJsonObject(entry.text);
    if (!parsed) {
      continue;
    }

    const type = typeof parsed.type === "string" ? parsed.type : undefined;
    if (type !== undefined && OUTPUT_ENTRY_TYPES.has(type)) {
      const output = toolOutputEntrySchema.safeParse(parsed);
      if (output.success) {
        events.push({
          kind: "output",
          line: entry.line,
          callId: output.data.call_id,
          ...readToolOutput(output.data.output),
        });
      }
      continue;
    }

    const call = toolCallEntrySchema.safeParse(parsed);
    if (!call.success) {
      continue;
    }
    events.push({
      kind: "call",
      line: entry.line,
      name: call.data.name,
      ...(call.data.call_id ? { callId: call.data.call_id } : {}),
      arguments: readToolArguments(call.data.arguments, call.data.input),
    });
  }
  return events;
}

export function scanCodexChangeEvents(document: LogDocument): CodexChangeEvent[] {
  const events: CodexChangeEvent[] = [];
  for (const entry of document.entries) {
    if (!entry.text.includes(CODEX_CHANGE_KEYWORD)) {
      continue;
    }
    const parsed = codexChangeEntrySchema.safeParse(parseJsonObject(entry.text));
    if (!parsed.success) {
      continue;
    }
    events.push({
      line: entry.line,
      raw: entry.text,
      ...(parsed.data.change_type ? { changeType: parsed.data.change_type } : {}),
      ...(parsed.data.file_path ? { filePath: parsed.data.file_path } : {}),
      content: parsed.data.content ?? "",
    });
  }
  return events;
}

/** Output events keyed by call id; the first output for an id wins. */
export function indexToolOutputs(events: readonly ToolEvent[]): Map<string, ToolOutputEvent> {
  const outputs = new Map<string, ToolOutputEvent>();
  for (const event of events) {
    if (event.kind === "output" && !outputs.has(event.callId)) {
      outputs.set(event.callId, event);
    }
  }
  return outputs;
}

export function findTargetFiles(args: Readonly<Record<string, unknown>>): string[] {
  const files: string[] = [];
  for (const key of FILE_ARGUMENT_KEYS) {
    const value = args[key];
    if (typeof value === "string" && value.trim().length > 0) {
      files.push(value.trim());
    }
  }
  return files;
}

/**
 * Shell-style rendering of a `command` argument: arrays are joined with quoting,
 * strings are trimmed.
 */
export function renderCommandArgument(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (Array.isArray(value) && value.length > 0 && value.every((part) => typeof part === "string")) {
    return value.map((part) => quoteShellWord(String(part))).join(" ");
  }
  return undefined;
}

export function quoteShellWord(word: string): string {
  if (word.length === 0) {
    return "''";
  }
  if (/^[\w@%+=:,./-]+$/.test(word)) {
    return word;
  }
  return `'${word.replace(/'/g, `'"'"'`)}'`;
}

export function parseJsonObject(text: string): Record<string, unknown> | undefined {
  const trimmed = text.trim();
  if (!trimmed.startsWith("{")) {
    return undefined;
  }
  try {
    const parsed = jsonObjectSchema.safeParse(JSON.parse(trimmed));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

function readToolArguments(
  rawArguments: string | Record<string, unknown> | undefined,
  input: string | undefined,
): Record<string, unknown> {
  if (rawArguments === undefined) {
    return input !== undefined ? { input } : {};
  }
  if (typeof rawArguments !== "string") {
    return rawArguments;
  }
  const parsed = parseJsonObject(rawArguments);
  if (parsed) {
    return parsed;
  }
  return rawArguments.trim().length > 0 ? { input: rawArguments } : {};
}

function readToolOutput(output: string | Record<string, unknown>): {
  output: string;
  exitCode?: number;
} {
  const structured = structuredOutputSchema.safeParse(
    typeof output === "string" ? parseJsonObject(output) : output,
  );
  if (structured.success && structured.data.output !== undefined) {
    const exitCode = structured.data.metadata?.exit_code;
    return {
      output: structured.data.output,
      ...(exitCode !== undefined ? { exitCode } : {}),
    };
  }

  const text = typeof output === "string" ? output : JSON.stringify(output);
  const exitMatch = EXIT_CODE_LINE_PATTERN.exec(text);
  if (!exitMatch?.[1]) {
    return { output: text };
  }
  const sectionMatch = OUTPUT_SECTION_PATTERN.exec(text);
  return {
    output: sectionMatch ? text.slice(sectionMatch.index + sectionMatch[0].length) : text,
    exitCode: Number.parseInt(exitMatch[1], 10),
  };
}
