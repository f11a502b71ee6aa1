import { promises as fs } from "node:fs";
import path from "node:path";

export type LogPathKind = "file" | "directory" | "symlink" | "other";

export type LogPathInfo = {
  readonly kind: LogPathKind;
  readonly mtimeMs: number;
  readonly size: number;
};

export type LogDirectoryEntry = {
  readonly name: string;
  readonly path: string;
  readonly kind: LogPathKind;
  readonly mtimeMs: number;
};

/**
 * File access used by the parser, the runner and the benchmark verifier. Reads
 * return raw bytes so that callers decide how strictly to decode them.
 */
export interface LogFilesystem {
  readFile(filePath: string): Promise<Uint8Array>;
  writeTextFile(filePath: string, content: string): Promise<void>;
  appendTextFile(filePath: string, content: string): Promise<void>;
  ensureDir(directoryPath: string): Promise<void>;
  readDir(directoryPath: string): Promise<readonly LogDirectoryEntry[]>;
  stat(entryPath: string): Promise<LogPathInfo>;
}

export type InMemoryFileContent = string | Uint8Array;

type InMemoryFileRecord = {
  content: Uint8Array;
  mtimeMs: number;
};

type InMemoryDirRecord = {
  mtimeMs: number;
};

export type InMemoryLogFilesystemOptions = {
  /** Starting value of the fake clock that stamps `mtimeMs`. */
  readonly startMtimeMs?: number;
};

const textEncoder = new TextEncoder();
const lenientDecoder = new TextDecoder("utf-8");

export class InMemoryLogFilesystem implements LogFilesystem {
  readonly #files = new Map<string, InMemoryFileRecord>();
  readonly #dirs = new Map<string, InMemoryDirRecord>();
  readonly #unreadable = new Set<string>();
  #clock: number;

  constructor(
    initialFiles: Record<string, InMemoryFileContent> = {},
    options: InMemoryLogFilesystemOptions = {},
  ) {
    this.#clock = options.startMtimeMs ?? 0;
    this.#dirs.set(path.resolve("/"), { mtimeMs: this.#nextMtime() });
    for (const [filePath, content] of Object.entries(initialFiles)) {
      const absolutePath = path.resolve(filePath);
      this.#ensureDirSync(path.dirname(absolutePath));
      this.#files.set(absolutePath, { content: toBytes(content), mtimeMs: this.#nextMtime() });
    }
  }

  async readFile(filePath: string): Promise<Uint8Array> {
    const absolutePath = path.resolve(filePath);
    if (this.#unreadable.has(absolutePath)) {
      throw createFsError("EACCES", "permission denied", "open", absolutePath);
    }
    const file = this.#files.get(absolutePath);
    if (!file) {
      throw createFsError("ENOENT", "no such file or directory", "open", absolutePath);
    }
    return file.content.slice();
  }

  async writeTextFile(filePath: string, content: string): Promise<void> {
    const absolutePath = this.#requireParent(filePath);
    this.#files.set(absolutePath, { content: toBytes(content), mtimeMs: this.#nextMtime() });
  }

  async appendTextFile(filePath: string, content: string): Promise<void> {
    const absolutePath = this.#requireParent(filePath);
    const existing = this.#files.get(absolutePath)?.content ?? new Uint8Array();
    const appended = toBytes(content);
    const merged = new Uint8Array(existing.length + appended.length);
    merged.set(existing, 0);
    merged.set(appended, existing.length);
    this.#files.set(absolutePath, { content: merged, mtimeMs: this.#nextMtime() });
  }

  async ensureDir(directoryPath: string): Promise<void> {
    this.#ensureDirSync(path.resolve(directoryPath));
  }

  async readDir(directoryPath: string): Promise<readonly LogDirectoryEntry[]> {
    const absolutePath = path.resolve(directoryPath);
    if (!this.#dirs.has(absolutePath)) {
      throw createFsError("ENOENT", "no such file or directory", "scandir", absolutePath);
    }

    const entries: LogDirectoryEntry[] = [];
    for (const [dirPath, dirRecord] of this.#dirs.entries()) {
      if (dirPath !== absolutePath && path.dirname(dirPath) === absolutePath) {
        entries.push({
          name: path.basename(dirPath),
          path: dirPath,
          kind: "directory",
          mtimeMs: dirRecord.mtimeMs,
        });
      }
    }
    for (const [filePath, fileRecord] of this.#files.entries()) {
      if (path.dirname(filePath) === absolutePath) {
        entries.push({
          name: path.basename(filePath),
          path: filePath,
          kind: "file",
          mtimeMs: fileRecord.mtimeMs,
        });
      }
    }
    return entries;
  }

  async stat(entryPath: string): Promise<LogPathInfo> {
    const absolutePath = path.resolve(entryPath);
    const file = this.#files.get(absolutePath);
    if (file) {
      return { kind: "file", mtimeMs: file.mtimeMs, size: file.content.length };
    }
    const directory = this.#dirs.get(absolutePath);
    if (directory) {
      return { kind: "directory", mtimeMs: directory.mtimeMs, size: 0 };
    }
    throw createFsError("ENOENT", "no such file or directory", "stat", absolutePath);
  }

  /** Makes later reads of `filePath` fail with EACCES. */
  denyRead(filePath: string): void {
    this.#unreadable.add(path.resolve(filePath));
  }

  readTextFile(filePath: string): string | undefined {
    const file = this.#files.get(path.resolve(filePath));
    return file ? lenientDecoder.decode(file.content) : undefined;
  }

  snapshot(): Record<string, string> {
    const entries = [...this.#files.entries()].sort(([left], [right]) => left.localeCompare(right));
    return Object.fromEntries(
      entries.map(([filePath, record]) => [filePath, lenientDecoder.decode(record.content)]),
    );
  }

  #requireParent(filePath: string): string {
    const absolutePath = path.resolve(filePath);
    const parentPath = path.dirname(absolutePath);
    if (!this.#dirs.has(parentPath)) {
      throw createFsError("ENOENT", "no such file or directory", "open", parentPath);
    }
    return absolutePath;
  }

  #ensureDirSync(directoryPath: string): void {
    const missing: string[] = [];
    let cursor = path.resolve(directoryPath);
    while (!this.#dirs.has(cursor)) {
      missing.push(cursor);
      const parent = path.dirname(cursor);
      if (parent === cursor) {
        break;
      }
      cursor = parent;
    }
    for (const dirPath of missing.reverse()) {
      this.#dirs.set(dirPath, { mtimeMs: this.#nextMtime() });
    }
  }

  #nextMtime(): number {
    this.#clock += 1;
    return this.#clock;
  }
}

export function createNodeLogFilesystem(): LogFilesystem {
  return {
    readFile: async (filePath: string) => new Uint8Array(await fs.readFile(filePath)),
    writeTextFile: async (filePath: string, content: string) =>
      fs.writeFile(filePath, content, "utf8"),
    appendTextFile: async (filePath: string, content: string) =>
      fs.appendFile(filePath, content, "utf8"),
    ensureDir: async (directoryPath: string) => {
      await fs.mkdir(directoryPath, { recursive: true });
    },
    readDir: async (directoryPath: string) => {
      const entries = await fs.readdir(directoryPath, { withFileTypes: true });
      const result: LogDirectoryEntry[] = [];
      for (const entry of entries) {
        const entryPath = path.resolve(directoryPath, entry.name);
        const stats = await fs.lstat(entryPath);
        result.push({
          name: entry.name,
          path: entryPath,
          kind: statsToKind(stats),
          mtimeMs: stats.mtimeMs,
        });
      }
      return result;
    },
    stat: async (entryPath: string) => {
      const stats = await fs.stat(entryPath);
      return { kind: statsToKind(stats), mtimeMs: stats.mtimeMs, size: stats.size };
    },
  };
}

export function createInMemoryLogFilesystem(
  initialFiles: Record<string, InMemoryFileContent> = {},
  options: InMemoryLogFilesystemOptions = {},
): InMemoryLogFilesystem {
  return new InMemoryLogFilesystem(initialFiles, options);
}

function toBytes(content: InMemoryFileContent): Uint8Array {
  return typeof content === "string" ? textEncoder.encode(content) : content.slice();
}

function statsToKind(stats: {
  isFile(): boolean;
  isDirectory(): boolean;
  isSymbolicLink(): boolean;
}): LogPathKind {
  if (stats.isSymbolicLink()) {
    return "symlink";
  }
  if (stats.isDirectory()) {
    return "directory";
  }
  if (stats.isFile()) {
    return "file";
  }
  return "other";
}

function createFsError(
  code: string,
  description: string,
  syscall: string,
  filePath: string,
): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: ${description}, ${syscall} '${filePath}'`), {
    code,
    syscall,
    path: filePath,
  });
}
