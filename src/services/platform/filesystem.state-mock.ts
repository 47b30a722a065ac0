/**
 * Behavioral mock for FileSystemLayer with in-memory state.
 *
 * Provides a stateful mock that simulates real filesystem behavior:
 * - In-memory file/directory storage
 * - Proper error handling (ENOENT, EISDIR, etc.)
 * - Per-entry error injection
 * - Custom matchers for behavioral assertions
 *
 * @example
 * const mock = createFileSystemMock({
 *   entries: {
 *     "/data/server": directory(),
 *     "/data/server/installed-version.txt": file("0.2.0"),
 *   },
 * });
 *
 * await mock.writeFile("/data/server/cached-version.txt", "0.3.0");
 * expect(mock).toHaveFile("/data/server/cached-version.txt", "0.3.0");
 */

import { posix } from "node:path";
import { expect } from "vitest";
import type { DirEntry, FileSystemErrorCode, FileSystemLayer } from "./filesystem";
import { FileSystemError } from "../errors";
import type {
  MockState,
  MockWithState,
  Snapshot,
  MatcherImplementationsFor,
} from "../../test/state-mock";

// =============================================================================
// Entry Types
// =============================================================================

export interface FileEntry {
  readonly type: "file";
  readonly content: string | Buffer;
  readonly executable?: boolean;
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

export interface DirectoryEntry {
  readonly type: "directory";
  /** If set, accessing or writing into this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

export type Entry = FileEntry | DirectoryEntry;

// =============================================================================
// State Interface
// =============================================================================

export interface FileSystemMockState extends MockState {
  /**
   * Read-only access to all filesystem entries.
   * Keys are normalized POSIX path strings.
   */
  readonly entries: ReadonlyMap<string, Entry>;

  /**
   * Set an entry in the filesystem.
   * Normalizes the path and auto-creates parent directories.
   * This is a test helper - it does NOT follow real filesystem semantics.
   */
  setEntry(path: string, entry: Entry): void;

  /** Remove an entry (and nothing else). Test helper. */
  deleteEntry(path: string): void;
}

/**
 * FileSystemLayer with behavioral mock state access via `$` property.
 */
export type MockFileSystemLayer = FileSystemLayer & MockWithState<FileSystemMockState>;

// =============================================================================
// Entry Helper Functions
// =============================================================================

/**
 * Create a file entry.
 *
 * @example
 * file("0.2.0")
 * file(Buffer.from([0x7f, 0x45, 0x4c, 0x46]))  // Binary
 * file("binary", { executable: true })
 * file("secret", { error: "EACCES" })
 */
export function file(
  content: string | Buffer,
  options?: {
    executable?: boolean;
    error?: FileSystemErrorCode;
  }
): FileEntry {
  return {
    type: "file" as const,
    content,
    ...(options?.executable !== undefined && { executable: options.executable }),
    ...(options?.error !== undefined && { error: options.error }),
  };
}

/**
 * Create a directory entry.
 *
 * @example
 * directory()
 * directory({ error: "EACCES" })
 */
export function directory(options?: { error?: FileSystemErrorCode }): DirectoryEntry {
  return {
    type: "directory" as const,
    ...(options?.error !== undefined && { error: options.error }),
  };
}

// =============================================================================
// State Implementation
// =============================================================================

/**
 * Normalize a path for use as a map key.
 * Backslashes become slashes so paths built with path.join on Windows match.
 */
export function normalizePath(path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, "/"));
  return normalized.length > 1 && normalized.endsWith("/") ? normalized.slice(0, -1) : normalized;
}

function getParentPath(normalizedPath: string): string | null {
  const parent = posix.dirname(normalizedPath);
  return parent === normalizedPath ? null : parent;
}

function describeContent(content: string | Buffer): string {
  if (typeof content === "string") {
    return JSON.stringify(content.length > 50 ? content.substring(0, 50) + "..." : content);
  }
  return `<Buffer ${content.length} bytes>`;
}

class FileSystemMockStateImpl implements FileSystemMockState {
  private readonly _entries = new Map<string, Entry>();

  constructor(initialEntries: Iterable<[string, Entry]>) {
    for (const [path, entry] of initialEntries) {
      this.setEntry(path, entry);
    }
  }

  get entries(): ReadonlyMap<string, Entry> {
    return this._entries;
  }

  setEntry(path: string, entry: Entry): void {
    const normalizedPath = normalizePath(path);

    // Auto-create parent directories (test helper convenience)
    let parent = getParentPath(normalizedPath);
    while (parent !== null) {
      if (!this._entries.has(parent)) {
        this._entries.set(parent, directory());
      }
      parent = getParentPath(parent);
    }

    this._entries.set(normalizedPath, entry);
  }

  deleteEntry(path: string): void {
    this._entries.delete(normalizePath(path));
  }

  snapshot(): Snapshot {
    return { __brand: "Snapshot", value: this.toString() };
  }

  toString(): string {
    const sorted = [...this._entries.entries()].sort(([a], [b]) => a.localeCompare(b));
    return sorted
      .map(([path, entry]) => {
        const flags = [
          entry.type === "file" && entry.executable ? "exec" : null,
          entry.error ? `error:${entry.error}` : null,
        ]
          .filter((flag) => flag !== null)
          .join(",");
        const suffix = flags ? ` [${flags}]` : "";
        return entry.type === "file"
          ? `${path}: file(${describeContent(entry.content)})${suffix}`
          : `${path}: directory${suffix}`;
      })
      .join("\n");
  }
}

// =============================================================================
// Factory
// =============================================================================

export interface MockFileSystemOptions {
  /**
   * Initial entries in the filesystem. Parent directories are created implicitly.
   */
  entries?: Record<string, Entry>;
}

/**
 * Create a behavioral mock for FileSystemLayer.
 *
 * @example Error simulation
 * const mock = createFileSystemMock({
 *   entries: {
 *     "/data/server": directory({ error: "EACCES" }),
 *   },
 * });
 */
export function createFileSystemMock(options?: MockFileSystemOptions): MockFileSystemLayer {
  const state = new FileSystemMockStateImpl(Object.entries(options?.entries ?? {}));

  const throwIfError = (entry: Entry | undefined, path: string): void => {
    if (entry?.error) {
      throw new FileSystemError(entry.error, path, `Mock error: ${entry.error}`);
    }
  };

  // Writes need an existing, accessible parent directory and no directory at the path.
  const checkWritable = (path: string): void => {
    const existing = state.entries.get(path);
    if (existing?.type === "directory") {
      throw new FileSystemError("EISDIR", path, `Is a directory: ${path}`);
    }
    throwIfError(existing, path);

    const parent = getParentPath(path);
    if (parent !== null) {
      const parentEntry = state.entries.get(parent);
      if (!parentEntry) {
        throw new FileSystemError("ENOENT", path, `Parent directory not found: ${parent}`);
      }
      if (parentEntry.type !== "directory") {
        throw new FileSystemError("ENOTDIR", path, `Parent is not a directory: ${parent}`);
      }
      throwIfError(parentEntry, path);
    }
  };

  const childrenOf = (path: string): string[] => {
    const prefix = path === "/" ? "/" : path + "/";
    return [...state.entries.keys()].filter((key) => key.startsWith(prefix));
  };

  const layer: FileSystemLayer = {
    async readFile(rawPath: string): Promise<string> {
      const path = normalizePath(rawPath);
      const entry = state.entries.get(path);

      if (!entry) {
        throw new FileSystemError("ENOENT", path, `File not found: ${path}`);
      }
      throwIfError(entry, path);
      if (entry.type === "directory") {
        throw new FileSystemError("EISDIR", path, `Is a directory: ${path}`);
      }

      return typeof entry.content === "string" ? entry.content : entry.content.toString("utf-8");
    },

    async writeFile(rawPath: string, content: string): Promise<void> {
      const path = normalizePath(rawPath);
      checkWritable(path);
      state.setEntry(path, file(content));
    },

    async writeFileBuffer(rawPath: string, content: Buffer): Promise<void> {
      const path = normalizePath(rawPath);
      checkWritable(path);
      state.setEntry(path, file(content));
    },

    async mkdir(rawPath: string, mkdirOptions?): Promise<void> {
      const path = normalizePath(rawPath);
      const recursive = mkdirOptions?.recursive ?? true;
      const existing = state.entries.get(path);

      throwIfError(existing, path);
      if (existing?.type === "directory") {
        return;
      }
      if (existing?.type === "file") {
        throw new FileSystemError("EEXIST", path, `File exists at path: ${path}`);
      }

      if (recursive) {
        const segments = path.split("/").filter(Boolean);
        let current = "";
        for (const segment of segments) {
          current = current + "/" + segment;
          const entry = state.entries.get(current);
          throwIfError(entry, current);
          if (!entry) {
            state.setEntry(current, directory());
          } else if (entry.type !== "directory") {
            throw new FileSystemError("EEXIST", current, `Not a directory: ${current}`);
          }
        }
      } else {
        const parent = getParentPath(path);
        if (parent !== null) {
          const parentEntry = state.entries.get(parent);
          if (!parentEntry || parentEntry.type !== "directory") {
            throw new FileSystemError("ENOENT", path, `Parent directory not found: ${parent}`);
          }
        }
        state.setEntry(path, directory());
      }
    },

    async readdir(rawPath: string): Promise<readonly DirEntry[]> {
      const path = normalizePath(rawPath);
      const entry = state.entries.get(path);

      if (!entry) {
        throw new FileSystemError("ENOENT", path, `Directory not found: ${path}`);
      }
      throwIfError(entry, path);
      if (entry.type !== "directory") {
        throw new FileSystemError("ENOTDIR", path, `Not a directory: ${path}`);
      }

      const prefix = path === "/" ? "/" : path + "/";
      const children: DirEntry[] = [];
      for (const [entryPath, e] of state.entries) {
        if (!entryPath.startsWith(prefix)) continue;
        const relativePath = entryPath.substring(prefix.length);
        // Only direct children (no slashes in relative path)
        if (!relativePath.includes("/")) {
          children.push({
            name: relativePath,
            isDirectory: e.type === "directory",
            isFile: e.type === "file",
            isSymbolicLink: false,
          });
        }
      }
      return children;
    },

    async rm(rawPath: string, rmOptions?): Promise<void> {
      const path = normalizePath(rawPath);
      const recursive = rmOptions?.recursive ?? false;
      const force = rmOptions?.force ?? false;
      const entry = state.entries.get(path);

      if (!entry) {
        if (force) return;
        throw new FileSystemError("ENOENT", path, `Path not found: ${path}`);
      }
      throwIfError(entry, path);

      if (entry.type === "directory") {
        const children = childrenOf(path);
        if (children.length > 0 && !recursive) {
          throw new FileSystemError("ENOTEMPTY", path, `Directory not empty: ${path}`);
        }
        for (const child of children) {
          state.deleteEntry(child);
        }
      }

      state.deleteEntry(path);
    },

    async makeExecutable(rawPath: string): Promise<void> {
      const path = normalizePath(rawPath);
      const entry = state.entries.get(path);

      if (!entry) {
        throw new FileSystemError("ENOENT", path, `File not found: ${path}`);
      }
      throwIfError(entry, path);
      if (entry.type !== "file") {
        throw new FileSystemError("EISDIR", path, `Not a regular file: ${path}`);
      }

      state.setEntry(path, { ...entry, executable: true });
    },

    async rename(rawOldPath: string, rawNewPath: string): Promise<void> {
      const srcPath = normalizePath(rawOldPath);
      const destPath = normalizePath(rawNewPath);
      const entry = state.entries.get(srcPath);

      if (!entry) {
        throw new FileSystemError("ENOENT", srcPath, `Source not found: ${srcPath}`);
      }
      throwIfError(entry, srcPath);
      if (entry.type === "directory") {
        throw new FileSystemError("EISDIR", srcPath, `Mock only renames files: ${srcPath}`);
      }
      checkWritable(destPath);

      state.deleteEntry(srcPath);
      state.setEntry(destPath, entry);
    },
  };

  return Object.assign(layer, { $: state });
}

// =============================================================================
// Custom Matchers
// =============================================================================

interface FileSystemMatchers {
  /**
   * Assert that a file exists with optional content check.
   * Uses Buffer.equals() for Buffer content comparison.
   */
  toHaveFile(path: string, content?: string | Buffer): void;

  /** Assert that a directory exists. */
  toHaveDirectory(path: string): void;

  /** Assert that a file is executable. */
  toBeExecutable(path: string): void;
}

declare module "vitest" {
  interface Assertion<T> extends FileSystemMatchers {}
}

function contentMatches(expected: string | Buffer, actual: string | Buffer): boolean {
  const expectedBuffer = typeof expected === "string" ? Buffer.from(expected) : expected;
  const actualBuffer = typeof actual === "string" ? Buffer.from(actual) : actual;
  return expectedBuffer.equals(actualBuffer);
}

export const fileSystemMatchers: MatcherImplementationsFor<
  MockFileSystemLayer,
  FileSystemMatchers
> = {
  toHaveFile(received, path, content?) {
    const normalizedPath = normalizePath(path);
    const entry = received.$.entries.get(normalizedPath);

    if (!entry) {
      return {
        pass: false,
        message: () => `Expected file at ${normalizedPath} but it does not exist`,
      };
    }

    if (entry.type !== "file") {
      return {
        pass: false,
        message: () => `Expected file at ${normalizedPath} but found ${entry.type}`,
      };
    }

    if (content !== undefined && !contentMatches(content, entry.content)) {
      return {
        pass: false,
        message: () =>
          `Expected file ${normalizedPath} to have content ${describeContent(content)} ` +
          `but got ${describeContent(entry.content)}`,
      };
    }

    return {
      pass: true,
      message: () => `Expected ${normalizedPath} not to be a file`,
    };
  },

  toHaveDirectory(received, path) {
    const normalizedPath = normalizePath(path);
    const entry = received.$.entries.get(normalizedPath);

    if (!entry) {
      return {
        pass: false,
        message: () => `Expected directory at ${normalizedPath} but it does not exist`,
      };
    }

    if (entry.type !== "directory") {
      return {
        pass: false,
        message: () => `Expected directory at ${normalizedPath} but found ${entry.type}`,
      };
    }

    return {
      pass: true,
      message: () => `Expected ${normalizedPath} not to be a directory`,
    };
  },

  toBeExecutable(received, path) {
    const normalizedPath = normalizePath(path);
    const entry = received.$.entries.get(normalizedPath);

    if (!entry || entry.type !== "file") {
      return {
        pass: false,
        message: () => `Expected file at ${normalizedPath} but it does not exist`,
      };
    }

    const pass = entry.executable === true;
    return {
      pass,
      message: () =>
        pass
          ? `Expected file ${normalizedPath} not to be executable`
          : `Expected file ${normalizedPath} to be executable`,
    };
  },
};

expect.extend(fileSystemMatchers);
