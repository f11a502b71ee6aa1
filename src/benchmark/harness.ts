import { promises as nodeFs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { runAgent, type AgentRunOutcome, type AgentRunRequest } from "../agent/run.js";
import { toErrorMessage } from "../errors.js";
import { createNodeLogFilesystem, type LogFilesystem } from "../utils/filesystem.js";
import {
  createTelemetrySession,
  toIsoNow,
  type TelemetrySelection,
  type TelemetrySession,
} from "../utils/telemetry.js";

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BENCHMARK_HINT =
  "The apply_patch method with 'Add File' syntax works reliably in sandboxed environments for creating new files.";

export type BenchmarkProblem = {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  /** File the agent is asked to create, relative to the workspace. */
  readonly filename: string;
  readonly functionName: string;
  readonly hint?: string;
};

export type BenchmarkChecks = {
  readonly fileCreated: boolean;
  readonly functionExists: boolean;
  readonly ioCorrect: boolean;
  readonly error?: string;
};

export type BenchmarkVerifier = (
  problem: BenchmarkProblem,
  workspace: string,
) => Promise<BenchmarkChecks>;

export type BenchmarkAgentRunner = (request: AgentRunRequest) => Promise<AgentRunOutcome>;

export type BenchmarkProblemResult = {
  readonly problemId: string;
  readonly model: string;
  readonly attemptsUsed: number;
  readonly durationMs: number;
  readonly checks: BenchmarkChecks;
  readonly passed: boolean;
  readonly error?: string;
};

export type BenchmarkModelSummary = {
  readonly model: string;
  readonly total: number;
  readonly fileCreated: number;
  readonly functionExists: number;
  readonly ioCorrect: number;
  readonly passed: number;
  readonly fileCreatedRate: number;
  readonly functionExistsRate: number;
  readonly ioCorrectRate: number;
  readonly passRate: number;
  readonly averageDurationMs: number;
  readonly averageAttempts: number;
};

export type RunBenchmarkProblemParams = {
  readonly problem: BenchmarkProblem;
  readonly model: string;
  readonly provider?: string;
  readonly preamble: string;
  readonly workspace: string;
  readonly maxAttempts?: number;
  readonly timeoutMs?: number;
  /** Where run logs go; defaults to the workspace. */
  readonly logDir?: string;
  readonly runAgent?: BenchmarkAgentRunner;
  readonly verify: BenchmarkVerifier;
  readonly telemetry?: TelemetrySelection;
  readonly now?: () => number;
};

const FAILED_CHECKS: BenchmarkChecks = Object.freeze({
  fileCreated: false,
  functionExists: false,
  ioCorrect: false,
});

export function buildBenchmarkPrompt(preamble: string, problem: BenchmarkProblem): string {
  return `${preamble}\n\n${problem.description}\n\nHINT: ${problem.hint ?? DEFAULT_BENCHMARK_HINT}`;
}

export function checksPassed(checks: BenchmarkChecks): boolean {
  return checks.fileCreated && checks.functionExists && checks.ioCorrect;
}

/**
 * Attempts one problem up to `maxAttempts` times, stopping at the first attempt
 * whose checks all pass. The workspace is verified after every attempt, including
 * attempts where the agent run failed.
 */
export async function runBenchmarkProblem(
  params: RunBenchmarkProblemParams,
): Promise<BenchmarkProblemResult> {
  const telemetry = createTelemetrySession(params.telemetry);
  try {
    return await runProblemAttempts(params, telemetry);
  } finally {
    await telemetry?.flush();
  }
}

async function runProblemAttempts(
  params: RunBenchmarkProblemParams,
  telemetry: TelemetrySession | undefined,
): Promise<BenchmarkProblemResult> {
  const now = params.now ?? Date.now;
  const run = params.runAgent ?? runAgent;
  const maxAttempts = Math.max(1, Math.floor(params.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));
  const prompt = buildBenchmarkPrompt(params.preamble, params.problem);
  const startedAt = now();

  let checks: BenchmarkChecks = FAILED_CHECKS;
  let attemptsUsed = 0;
  let lastError: string | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    attemptsUsed = attempt;
    let agentError: string | undefined;
    try {
      const outcome = await run({
        prompt,
        model: params.model,
        ...(params.provider ? { provider: params.provider } : {}),
        writableRoot: params.workspace,
        logDir: params.logDir ?? params.workspace,
        ...(params.timeoutMs !== undefined ? { timeoutMs: params.timeoutMs } : {}),
      });
      agentError = outcome.error?.message;
    } catch (error) {
      agentError = toErrorMessage(error);
    }

    try {
      checks = await params.verify(params.problem, params.workspace);
    } catch (error) {
      checks = {
        ...FAILED_CHECKS,
        error: `Error verifying ${params.problem.filename}: ${toErrorMessage(error)}`,
      };
    }
    lastError = checks.error ?? agentError;
    const passed = checksPassed(checks);

    telemetry?.emit({
      type: "benchmark.attempt.completed",
      timestamp: toIsoNow(),
      level: passed ? "info" : "warn",
      problemId: params.problem.id,
      model: params.model,
      attempt,
      passed,
      ...(lastError !== undefined ? { error: lastError } : {}),
    });
    if (passed) {
      break;
    }
  }

  const passed = checksPassed(checks);
  return {
    problemId: params.problem.id,
    model: params.model,
    attemptsUsed,
    durationMs: Math.max(0, now() - startedAt),
    checks,
    passed,
    ...(!passed && lastError !== undefined ? { error: lastError } : {}),
  };
}

export function summarizeModelResults(
  model: string,
  results: readonly BenchmarkProblemResult[],
): BenchmarkModelSummary {
  const total = results.length;
  const count = (predicate: (result: BenchmarkProblemResult) => boolean) =>
    results.filter(predicate).length;
  const rate = (value: number) => (total > 0 ? value / total : 0);
  const average = (select: (result: BenchmarkProblemResult) => number) =>
    total > 0 ? results.reduce((sum, result) => sum + select(result), 0) / total : 0;

  const fileCreated = count((result) => result.checks.fileCreated);
  const functionExists = count((result) => result.checks.functionExists);
  const ioCorrect = count((result) => result.checks.ioCorrect);
  const passed = count((result) => result.passed);
  return {
    model,
    total,
    fileCreated,
    functionExists,
    ioCorrect,
    passed,
    fileCreatedRate: rate(fileCreated),
    functionExistsRate: rate(functionExists),
    ioCorrectRate: rate(ioCorrect),
    passRate: rate(passed),
    averageDurationMs: average((result) => result.durationMs),
    averageAttempts: average((result) => result.attemptsUsed),
  };
}

/** Fixed-width comparison table, one row per model. */
export function formatBenchmarkSummary(summaries: readonly BenchmarkModelSummary[]): string {
  const row = (cells: readonly [string, string, string, string, string, string, string]) =>
    [
      cells[0].padEnd(20),
      cells[1].padEnd(8),
      cells[2].padEnd(10),
      cells[3].padEnd(8),
      cells[4].padEnd(8),
      cells[5].padEnd(8),
      cells[6],
    ]
      .join(" ")
      .trimEnd();

  const lines = [
    row(["Model", "Files", "Functions", "I/O", "Full", "Time", "Attempts"]),
    "-".repeat(80),
  ];
  for (const summary of summaries) {
    const ratio = (value: number) => `${value}/${summary.total}`;
    lines.push(
      row([
        summary.model,
        ratio(summary.fileCreated),
        ratio(summary.functionExists),
        ratio(summary.ioCorrect),
        ratio(summary.passed),
        `${(summary.averageDurationMs / 1000).toFixed(1)}s`,
        summary.averageAttempts.toFixed(1),
      ]),
    );
  }
  return lines.join("\n");
}

export type BenchmarkWorkspace = {
  readonly path: string;
  readonly cleanup: () => Promise<void>;
};

export type RunBenchmarkSuiteParams = Omit<
  RunBenchmarkProblemParams,
  "problem" | "model" | "workspace" | "logDir"
> & {
  readonly problems: readonly BenchmarkProblem[];
  readonly models: readonly string[];
  /** Fresh workspace per model and problem; defaults to a temporary directory. */
  readonly createWorkspace?: (problem: BenchmarkProblem, model: string) => Promise<BenchmarkWorkspace>;
};

export type BenchmarkSuiteResult = {
  readonly results: Readonly<Record<string, readonly BenchmarkProblemResult[]>>;
  readonly summaries: readonly BenchmarkModelSummary[];
};

export async function runBenchmarkSuite(params: RunBenchmarkSuiteParams): Promise<BenchmarkSuiteResult> {
  const { problems, models, createWorkspace = createTemporaryWorkspace, ...shared } = params;
  const results: Record<string, BenchmarkProblemResult[]> = {};
  const summaries: BenchmarkModelSummary[] = [];

  for (const model of models) {
    const modelResults: BenchmarkProblemResult[] = [];
    for (const problem of problems) {
      const workspace = await createWorkspace(problem, model);
      try {
        modelResults.push(
          await runBenchmarkProblem({ ...shared, problem, model, workspace: workspace.path }),
        );
      } finally {
        await workspace.cleanup();
      }
    }
    results[model] = modelResults;
    summaries.push(summarizeModelResults(model, modelResults));
  }
  return { results, summaries };
}

async function createTemporaryWorkspace(): Promise<BenchmarkWorkspace> {
  const directory = await nodeFs.mkdtemp(path.join(os.tmpdir(), "agent-bench-"));
  return {
    path: directory,
    cleanup: async () => {
      await nodeFs.rm(directory, { recursive: true, force: true });
    },
  };
}

export type BenchmarkCaseResult = {
  readonly passed: boolean;
  readonly error?: string;
};

/** Runs the problem's input/output cases against the created file. */
export type BenchmarkCaseRunner = (
  problem: BenchmarkProblem,
  filePath: string,
) => Promise<BenchmarkCaseResult>;

export type SourceFileVerifierOptions = {
  readonly fs?: LogFilesystem;
  readonly runCases: BenchmarkCaseRunner;
};

const sourceDecoder = new TextDecoder("utf-8");

/**
 * Checks that the expected file exists, that it defines the expected function
 * (`def name(`, `function name(` or `const name =`), then delegates the I/O cases.
 */
export function createSourceFileVerifier(options: SourceFileVerifierOptions): BenchmarkVerifier {
  const fs = options.fs ?? createNodeLogFilesystem();
  return async (problem, workspace) => {
    const filePath = path.join(workspace, problem.filename);
    let source: string;
    try {
      const info = await fs.stat(filePath);
      if (info.kind !== "file") {
        return { ...FAILED_CHECKS, error: `File ${problem.filename} was not created` };
      }
      source = sourceDecoder.decode(await fs.readFile(filePath));
    } catch {
      return { ...FAILED_CHECKS, error: `File ${problem.filename} was not created` };
    }

    if (!definesFunction(source, problem.functionName)) {
      return {
        fileCreated: true,
        functionExists: false,
        ioCorrect: false,
        error: `Function '${problem.functionName}' not found in ${problem.filename}`,
      };
    }

    try {
      const cases = await options.runCases(problem, filePath);
      return {
        fileCreated: true,
        functionExists: true,
        ioCorrect: cases.passed,
        ...(cases.error !== undefined ? { error: cases.error } : {}),
      };
    } catch (error) {
      return {
        fileCreated: true,
        functionExists: true,
        ioCorrect: false,
        error: `Error testing function: ${toErrorMessage(error)}`,
      };
    }
  };
}

export function definesFunction(source: string, functionName: string): boolean {
  const name = escapeRegExp(functionName);
  const pattern = new RegExp(
    String.raw`^\s*(?:export\s+)?(?:async\s+)?(?:def|function)\s+${name}\s*\(|^\s*(?:export\s+)?(?:const|let|var)\s+${name}\s*=`,
    "m",
  );
  return pattern.test(source);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
