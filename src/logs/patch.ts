import type { LogDocument, PatchOperation } from "./types.js";

export const BEGIN_PATCH_LINE = "*** Begin Patch";
const END_PATCH_LINE = "*** End Patch";
const ADD_FILE_PREFIX = "*** Add File: ";
const DELETE_FILE_PREFIX = "*** Delete File: ";
const UPDATE_FILE_PREFIX = "*** Update File: ";
const MOVE_TO_PREFIX = "*** Move to: ";
const END_OF_FILE_LINE = "*** End of File";
const DIFF_OLD_HEADER = /^--- (?:a\/)?(.+?)\s*$/;
const DIFF_NEW_HEADER = /^\+\+\+ (?:b\/)?(.+?)\s*$/;
const GIT_DIFF_HEADER = /^diff --git /;
const DEV_NULL = "/dev/null";

export type PatchSection = {
  readonly operation: PatchOperation;
  readonly filePath: string;
  readonly movePath?: string;
  readonly body: string;
  /** 0-based line of the section header, relative to the scanned text. */
  readonly lineOffset: number;
};

export type PatchBlock = {
  /** 1-based log line where the block starts. */
  readonly line: number;
  readonly sections: readonly PatchSection[];
};

export type DiffLineCounts = {
  readonly added: number;
  readonly removed: number;
};

/**
 * Splits an apply_patch payload into per-file sections.
 *
 * A section runs until the next file header, the End Patch marker, or the end of
 * the payload when the marker is missing. Malformed hunks are kept as-is.
 */
export function parsePatchSections(payload: string): PatchSection[] {
  const lines = payload.replace(/\r\n/g, "\n").replace(/\r/g, "\n").split("\n");
  const sections: PatchSection[] = [];
  let current:
    | {
        operation: PatchOperation;
        filePath: string;
        movePath?: string;
        body: string[];
        lineOffset: number;
      }
    | undefined;

  const flush = () => {
    if (!current) {
      return;
    }
    sections.push({
      operation: current.operation,
      filePath: current.filePath,
      ...(current.movePath ? { movePath: current.movePath } : {}),
      body: trimTrailingBlankLines(current.body).join("\n"),
      lineOffset: current.lineOffset,
    });
    current = undefined;
  };

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index] ?? "";
    const header = readSectionHeader(line);
    if (header) {
      flush();
      if (header.filePath.length > 0) {
        current = { ...header, body: [], lineOffset: index };
      }
      continue;
    }
    if (line.trim() === END_PATCH_LINE) {
      flush();
      continue;
    }
    if (!current || line.trim() === BEGIN_PATCH_LINE || line.trim() === END_OF_FILE_LINE) {
      continue;
    }
    if (line.startsWith(MOVE_TO_PREFIX) && current.body.length === 0) {
      const movePath = line.slice(MOVE_TO_PREFIX.length).trim();
      if (movePath.length > 0) {
        current.movePath = movePath;
      }
      continue;
    }
    current.body.push(line);
  }
  flush();
  return sections;
}

/**
 * Plain-text `*** Begin Patch` blocks. A block without its End Patch marker
 * extends to the end of the text.
 */
export function findPatchBlocks(document: LogDocument): PatchBlock[] {
  const blocks: PatchBlock[] = [];
  const { entries } = document;
  let index = 0;
  while (index < entries.length) {
    const start = entries[index];
    if (!start || start.text.trim() !== BEGIN_PATCH_LINE) {
      index += 1;
      continue;
    }
    let end = index + 1;
    while (end < entries.length && entries[end]?.text.trim() !== END_PATCH_LINE) {
      end += 1;
    }
    const payload = entries
      .slice(index, Math.min(end + 1, entries.length))
      .map((entry) => entry.text)
      .join("\n");
    blocks.push({ line: start.line, sections: parsePatchSections(payload) });
    index = end + 1;
  }
  return blocks;
}

/**
 * Unified-diff blocks (`--- a/x` followed by `+++ b/x`). A block ends at an empty
 * line, the next diff header, or the end of the text; a lone space is a context
 * line.
 */
export function findUnifiedDiffBlocks(document: LogDocument): PatchBlock[] {
  const blocks: PatchBlock[] = [];
  const { entries } = document;
  let index = 0;
  while (index < entries.length) {
    const oldHeader = entries[index];
    const newHeader = entries[index + 1];
    const oldMatch = oldHeader ? DIFF_OLD_HEADER.exec(oldHeader.text) : null;
    const newMatch = newHeader ? DIFF_NEW_HEADER.exec(newHeader.text) : null;
    if (!oldHeader || !oldMatch?.[1] || !newMatch?.[1]) {
      index += 1;
      continue;
    }

    let end = index + 2;
    while (end < entries.length) {
      const text = entries[end]?.text ?? "";
      if (text.length === 0 || GIT_DIFF_HEADER.test(text) || isDiffHeaderPair(entries, end)) {
        break;
      }
      end += 1;
    }

    const oldPath = oldMatch[1];
    const newPath = newMatch[1];
    const filePath = newPath === DEV_NULL ? oldPath : newPath;
    if (filePath !== DEV_NULL) {
      const body = entries
        .slice(index, end)
        .map((entry) => entry.text)
        .join("\n");
      blocks.push({
        line: oldHeader.line,
        sections: [{ operation: "diff", filePath, body, lineOffset: 0 }],
      });
    }
    index = end;
  }
  return blocks;
}

export function countDiffLines(body: string): DiffLineCounts {
  let added = 0;
  let removed = 0;
  for (const line of body.split("\n")) {
    if (line.startsWith("+") && !line.startsWith("+++")) {
      added += 1;
    } else if (line.startsWith("-") && !line.startsWith("---")) {
      removed += 1;
    }
  }
  return { added, removed };
}

function isDiffHeaderPair(entries: LogDocument["entries"], index: number): boolean {
  const first = entries[index]?.text;
  const second = entries[index + 1]?.text;
  return (
    first !== undefined &&
    second !== undefined &&
    DIFF_OLD_HEADER.test(first) &&
    DIFF_NEW_HEADER.test(second)
  );
}

function readSectionHeader(
  line: string,
): { operation: PatchOperation; filePath: string } | undefined {
  if (line.startsWith(ADD_FILE_PREFIX)) {
    return { operation: "add", filePath: line.slice(ADD_FILE_PREFIX.length).trim() };
  }
  if (line.startsWith(UPDATE_FILE_PREFIX)) {
    return { operation: "update", filePath: line.slice(UPDATE_FILE_PREFIX.length).trim() };
  }
  if (line.startsWith(DELETE_FILE_PREFIX)) {
    return { operation: "delete", filePath: line.slice(DELETE_FILE_PREFIX.length).trim() };
  }
  return undefined;
}

function trimTrailingBlankLines(lines: readonly string[]): string[] {
  let end = lines.length;
  while (end > 0 && (lines[end - 1] ?? "").trim().length === 0) {
    end -= 1;
  }
  return lines.slice(0, end);
}
