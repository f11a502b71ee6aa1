import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

import { ConfigurationError, getErrnoCode } from "../errors.js";
import type { LogLevel } from "./telemetry.js";

let envLoaded = false;

/**
 * Loads `.env.local` from `process.cwd()` once.
 *
 * - Does not override already-set `process.env` values.
 * - Missing file is silently ignored.
 */
export function loadLocalEnv(): void {
  if (envLoaded) {
    return;
  }
  const envPath = path.join(process.cwd(), ".env.local");
  loadEnvFromFile(envPath, { override: false });
  envLoaded = true;
}

export function loadEnvFromFile(
  filePath: string,
  { override = false, env = process.env }: { override?: boolean; env?: NodeJS.ProcessEnv } = {},
): void {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    if (getErrnoCode(error) === "ENOENT") {
      return;
    }
    throw error;
  }

  for (const line of content.split(/\r?\n/u)) {
    const entry = parseEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (override || env[key] === undefined) {
      env[key] = value;
    }
  }
}

export function parseEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const match = trimmed.match(/^(?:export\s+)?([A-Za-z_][A-Za-z0-9_\-.]*)\s*=\s*(.*)$/u);
  const key = match?.[1];
  if (!key) {
    return null;
  }
  let value = match?.[2] ?? "";

  if (value.startsWith('"') && value.endsWith('"') && value.length >= 2) {
    value = value.slice(1, -1);
  } else if (value.startsWith("'") && value.endsWith("'") && value.length >= 2) {
    value = value.slice(1, -1);
  } else {
    const commentIndex = value.indexOf(" #");
    if (commentIndex >= 0) {
      value = value.slice(0, commentIndex);
    }
    value = value.trim();
  }

  return [key, value];
}

export const DEFAULT_AGENT_CLI_BIN = "codex";
export const DEFAULT_LOG_DIR = ".";
export const DEFAULT_LOG_PATTERN = "codex_run_*.log";
export const DEFAULT_RUN_TIMEOUT_MS = 300_000;

const nonEmpty = z.string().trim().min(1);

const agentKitEnvSchema = z.object({
  AGENT_CLI_BIN: nonEmpty.default(DEFAULT_AGENT_CLI_BIN),
  AGENT_LOG_DIR: nonEmpty.default(DEFAULT_LOG_DIR),
  AGENT_LOG_PATTERN: nonEmpty.default(DEFAULT_LOG_PATTERN),
  AGENT_RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_RUN_TIMEOUT_MS),
  AGENT_KIT_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error", "silent"])
    .default("warn"),
});

export type AgentKitConfig = {
  readonly cliBin: string;
  readonly logDir: string;
  readonly logPattern: string;
  readonly runTimeoutMs: number;
  readonly logLevel: LogLevel;
};

/**
 * Reads the library settings from environment variables. Empty strings count as
 * unset.
 */
export function resolveAgentKitConfig(env: NodeJS.ProcessEnv = process.env): AgentKitConfig {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(agentKitEnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) {
      raw[key] = value;
    }
  }
  const parsed = agentKitEnvSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join(".") ?? "environment";
    throw new ConfigurationError(
      `Invalid ${variable}: ${issue?.message ?? "invalid value"}`,
      { cause: parsed.error },
    );
  }
  return Object.freeze({
    cliBin: parsed.data.AGENT_CLI_BIN,
    logDir: parsed.data.AGENT_LOG_DIR,
    logPattern: parsed.data.AGENT_LOG_PATTERN,
    runTimeoutMs: parsed.data.AGENT_RUN_TIMEOUT_MS,
    logLevel: parsed.data.AGENT_KIT_LOG_LEVEL,
  });
}
