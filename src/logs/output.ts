import { lineAtOffset, normalizeLogText } from "./types.js";

export type DiffStats = {
  readonly added: number;
  readonly removed: number;
  readonly hunks: number;
  /** True when the text holds a `--- a/...` header directly followed by `+++ b/...`. */
  readonly isDiff: boolean;
};

export type DiffPaths = {
  readonly from?: string;
  readonly to?: string;
};

export type CommandOutput = {
  readonly stdout: string;
  readonly stderr: string;
};

export type SuggestedEdit = {
  readonly filePath: string;
  /** Matched text around the suggestion. */
  readonly context: string;
  readonly line: number;
};

const UNIFIED_DIFF_HEADER_PATTERN = /^--- a\/.*\n\+\+\+ b\/.*$/m;
const OLD_PATH_PATTERN = /^---\s+(?:a\/)?(.+?)\s*$/;
const NEW_PATH_PATTERN = /^\+\+\+\s+(?:b\/)?(.+?)\s*$/;
const STDOUT_LABEL = "stdout:";
const STDERR_LABEL = "stderr:";

const SUGGESTED_EDIT_PATTERNS: readonly RegExp[] = [
  /edit_file.*?target_file["']:\s*["']([^"']+)["']/gi,
  /suggested.*?edit.*?file[:\s]+(\S+)/gi,
  /modify.*?file[:\s]+(\S+)/gi,
];

export function parseDiffStats(diff: string): DiffStats {
  const text = normalizeLogText(diff);
  let added = 0;
  let removed = 0;
  let hunks = 0;
  for (const line of text.split("\n")) {
    if (line.startsWith("+") && !line.startsWith("+++")) {
      added += 1;
    } else if (line.startsWith("-") && !line.startsWith("---")) {
      removed += 1;
    } else if (line.startsWith("@@")) {
      hunks += 1;
    }
  }
  return { added, removed, hunks, isDiff: UNIFIED_DIFF_HEADER_PATTERN.test(text) };
}

/** Paths from the first `---` and `+++` headers, without their a/ and b/ prefixes. */
export function extractDiffPaths(diff: string): DiffPaths {
  let from: string | undefined;
  let to: string | undefined;
  for (const line of normalizeLogText(diff).split("\n")) {
    if (from === undefined) {
      from = OLD_PATH_PATTERN.exec(line)?.[1];
    }
    if (to === undefined) {
      to = NEW_PATH_PATTERN.exec(line)?.[1];
    }
    if (from !== undefined && to !== undefined) {
      break;
    }
  }
  return {
    ...(from !== undefined ? { from } : {}),
    ...(to !== undefined ? { to } : {}),
  };
}

/**
 * Splits `stdout: ... stderr: ...` output. Text without labels is all stdout.
 */
export function parseCommandOutput(output: string): CommandOutput {
  const stderrIndex = output.indexOf(STDERR_LABEL);
  if (stderrIndex >= 0) {
    const head = output.slice(0, stderrIndex);
    return {
      stdout: head.startsWith(STDOUT_LABEL) ? head.slice(STDOUT_LABEL.length).trim() : "",
      stderr: output.slice(stderrIndex + STDERR_LABEL.length).trim(),
    };
  }
  if (output.startsWith(STDOUT_LABEL)) {
    return { stdout: output.slice(STDOUT_LABEL.length).trim(), stderr: "" };
  }
  return { stdout: output.trim(), stderr: "" };
}

/** Edit suggestions mentioned in free text, in order of appearance. */
export function extractSuggestedEdits(content: string): SuggestedEdit[] {
  const text = normalizeLogText(content);
  const found: Array<SuggestedEdit & { readonly offset: number }> = [];
  for (const pattern of SUGGESTED_EDIT_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const filePath = match[1];
      if (!filePath) {
        continue;
      }
      const offset = match.index ?? 0;
      found.push({ filePath, context: match[0], line: lineAtOffset(text, offset), offset });
    }
  }
  return found
    .map((edit, index) => ({ edit, index }))
    .sort((left, right) => left.edit.offset - right.edit.offset || left.index - right.index)
    .map(({ edit }) => ({ filePath: edit.filePath, context: edit.context, line: edit.line }));
}
