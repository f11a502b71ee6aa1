export {
  AgentKitError,
  AgentProcessError,
  ConfigurationError,
  DecodeError,
  FileAccessError,
  InvalidPatternError,
} from "./errors.js";
export type { AgentKitErrorCode, AgentProcessFailure } from "./errors.js";

export {
  CHANGE_TYPES,
  TOOL_KINDS,
  collectFilesTouched,
  compareLexical,
  computeSessionStats,
  countErrors,
  createRunResult,
  createSessionResult,
  deriveRunSuccess,
  isChangeType,
  splitLogEntries,
} from "./logs/types.js";
export type {
  ChangeRecord,
  ChangeType,
  CommandRecord,
  LogDocument,
  LogEntry,
  ParseFailure,
  ParseFailureKind,
  PatchOperation,
  PatchRecord,
  RunRecords,
  RunResult,
  SessionResult,
  SessionStats,
  ToolKind,
  ToolUsageRecord,
} from "./logs/types.js";

export {
  DEFAULT_CLASSIFICATION_RULES,
  UNKNOWN_CLASSIFICATION,
  classifyChange,
  createChangeClassifier,
} from "./logs/classifier.js";
export type {
  ChangeClassification,
  ChangeClassifier,
  ClassificationRule,
} from "./logs/classifier.js";

export {
  BaseExtractor,
  ChangeDetector,
  CommandExtractor,
  CustomExtractor,
  PatchExtractor,
  ToolUsageExtractor,
  categorizeTool,
} from "./logs/extractors.js";
export type {
  ChangeDetectorOptions,
  CustomExtractorConfig,
  ExtractOptions,
  ExtractorOptions,
  LogExtractor,
  LogInput,
} from "./logs/extractors.js";

export { BUILTIN_EXTRACTOR_CATEGORIES, LogParser, findLogTimestamp } from "./logs/parser.js";
export type { LogParserOptions, ParseRunOptions } from "./logs/parser.js";

export {
  countToolUsage,
  discoverTools,
  filterByChangeType,
  filterByExtension,
  filterBySuccess,
  getRunsByFile,
} from "./logs/query.js";
export type { DiscoveredTool, RunCollection } from "./logs/query.js";

export {
  extractDiffPaths,
  extractSuggestedEdits,
  parseCommandOutput,
  parseDiffStats,
} from "./logs/output.js";
export type { CommandOutput, DiffPaths, DiffStats, SuggestedEdit } from "./logs/output.js";

export {
  NO_SANDBOX_ENV_KEY,
  buildAgentCliArgs,
  createRunId,
  formatRunLogName,
  runAgent,
  spawnAgentCli,
} from "./agent/run.js";
export type {
  AgentApprovalMode,
  AgentCliArgsRequest,
  AgentCliExit,
  AgentCliLaunchOptions,
  AgentCliLauncher,
  AgentRunOutcome,
  AgentRunRequest,
  AgentRunStatus,
} from "./agent/run.js";

export { AgentSession } from "./agent/session.js";
export type {
  AgentRunDefaults,
  AgentSessionExecution,
  AgentSessionOptions,
  AgentSessionRunRequest,
  AgentSessionSummary,
} from "./agent/session.js";

export {
  DEFAULT_BENCHMARK_HINT,
  DEFAULT_MAX_ATTEMPTS,
  buildBenchmarkPrompt,
  checksPassed,
  createSourceFileVerifier,
  definesFunction,
  formatBenchmarkSummary,
  runBenchmarkProblem,
  runBenchmarkSuite,
  summarizeModelResults,
} from "./benchmark/harness.js";
export type {
  BenchmarkAgentRunner,
  BenchmarkCaseResult,
  BenchmarkCaseRunner,
  BenchmarkChecks,
  BenchmarkModelSummary,
  BenchmarkProblem,
  BenchmarkProblemResult,
  BenchmarkSuiteResult,
  BenchmarkVerifier,
  BenchmarkWorkspace,
  RunBenchmarkProblemParams,
  RunBenchmarkSuiteParams,
  SourceFileVerifierOptions,
} from "./benchmark/harness.js";

export {
  loadEnvFromFile,
  loadLocalEnv,
  resolveAgentKitConfig,
} from "./utils/env.js";
export type { AgentKitConfig } from "./utils/env.js";

export {
  InMemoryLogFilesystem,
  createInMemoryLogFilesystem,
  createNodeLogFilesystem,
} from "./utils/filesystem.js";
export type {
  InMemoryFileContent,
  LogDirectoryEntry,
  LogFilesystem,
  LogPathInfo,
  LogPathKind,
} from "./utils/filesystem.js";

export {
  createConsoleTelemetrySink,
  createTelemetrySession,
  formatTelemetryEvent,
} from "./utils/telemetry.js";
export type {
  AgentKitTelemetryEvent,
  LogLevel,
  TelemetryConfig,
  TelemetryLevel,
  TelemetrySelection,
  TelemetrySink,
} from "./utils/telemetry.js";
