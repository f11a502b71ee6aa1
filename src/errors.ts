export type AgentKitErrorCode =
  | "CONFIGURATION"
  | "INVALID_PATTERN"
  | "FILE_ACCESS"
  | "DECODE"
  | "AGENT_PROCESS";

export class AgentKitError extends Error {
  constructor(
    message: string,
    readonly code: AgentKitErrorCode,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "AgentKitError";
  }
}

export class ConfigurationError extends AgentKitError {
  constructor(
    message: string,
    options?: { readonly cause?: unknown; readonly code?: "CONFIGURATION" | "INVALID_PATTERN" },
  ) {
    super(message, options?.code ?? "CONFIGURATION", options);
    this.name = "ConfigurationError";
  }
}

export class InvalidPatternError extends ConfigurationError {
  constructor(
    readonly pattern: string,
    reason: string,
    options?: { readonly cause?: unknown },
  ) {
    super(`Invalid extractor pattern /${pattern}/: ${reason}`, {
      ...options,
      code: "INVALID_PATTERN",
    });
    this.name = "InvalidPatternError";
  }
}

export class FileAccessError extends AgentKitError {
  constructor(
    readonly filePath: string,
    readonly reason: string,
    options?: { readonly cause?: unknown },
  ) {
    super(`Cannot read log file "${filePath}": ${reason}`, "FILE_ACCESS", options);
    this.name = "FileAccessError";
  }
}

export class DecodeError extends AgentKitError {
  constructor(
    readonly filePath: string,
    options?: { readonly cause?: unknown },
  ) {
    super(`Log file "${filePath}" is not valid UTF-8 text`, "DECODE", options);
    this.name = "DecodeError";
  }
}

export type AgentProcessFailure = "launch" | "exit" | "timeout";

export class AgentProcessError extends AgentKitError {
  constructor(
    message: string,
    readonly failure: AgentProcessFailure,
    readonly exitCode: number | null,
    options?: { readonly cause?: unknown },
  ) {
    super(message, "AGENT_PROCESS", options);
    this.name = "AgentProcessError";
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error";
}

export function getErrnoCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}
