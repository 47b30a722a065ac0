/**
 * FileSystemLayer - Abstraction over filesystem operations.
 *
 * Provides an injectable interface for filesystem access, enabling:
 * - Unit testing of services with the in-memory mock
 * - Integration testing of DefaultFileSystemLayer against a real temp directory
 * - Consistent error handling via FileSystemError
 */

import * as fs from "node:fs/promises";
import { FileSystemError } from "../errors";
import type { Logger } from "../logging";

/**
 * Directory entry returned by readdir.
 */
export interface DirEntry {
  /** Entry name (not full path) */
  readonly name: string;
  /** True if entry is a directory */
  readonly isDirectory: boolean;
  /** True if entry is a regular file */
  readonly isFile: boolean;
  /** True if entry is a symbolic link */
  readonly isSymbolicLink: boolean;
}

export interface MkdirOptions {
  /** Create parent directories if they don't exist (default: true) */
  readonly recursive?: boolean;
}

export interface RmOptions {
  /** Remove directories and their contents recursively (default: false) */
  readonly recursive?: boolean;
  /** Ignore errors if path doesn't exist (default: false) */
  readonly force?: boolean;
}

/**
 * Error codes for filesystem operations.
 */
export type FileSystemErrorCode =
  | "ENOENT" // File/directory not found
  | "EACCES" // Permission denied
  | "EEXIST" // File/directory already exists
  | "ENOTDIR" // Not a directory
  | "EISDIR" // Is a directory (when file expected)
  | "ENOTEMPTY" // Directory not empty
  | "UNKNOWN"; // Other errors (check originalCode)

/**
 * Abstraction over filesystem operations.
 *
 * All paths are absolute. All text operations use UTF-8 encoding.
 * Methods throw FileSystemError on failures.
 *
 * NOTE: No exists() method - use try/catch on actual operations to avoid TOCTOU races.
 */
export interface FileSystemLayer {
  /**
   * Read entire file as UTF-8 string.
   *
   * @throws FileSystemError with code ENOENT if file not found
   * @throws FileSystemError with code EISDIR if path is a directory
   */
  readFile(path: string): Promise<string>;

  /**
   * Write content to file. Overwrites existing file.
   *
   * @throws FileSystemError with code ENOENT if parent directory doesn't exist
   * @throws FileSystemError with code EISDIR if path is a directory
   */
  writeFile(path: string, content: string): Promise<void>;

  /**
   * Write binary content to file. Overwrites existing file.
   *
   * @throws FileSystemError with code ENOENT if parent directory doesn't exist
   */
  writeFileBuffer(path: string, content: Buffer): Promise<void>;

  /**
   * Create directory. Creates parent directories by default.
   * No-op if directory already exists.
   *
   * @throws FileSystemError with code EEXIST if path exists as a file
   */
  mkdir(path: string, options?: MkdirOptions): Promise<void>;

  /**
   * List directory contents.
   *
   * @throws FileSystemError with code ENOENT if directory not found
   * @throws FileSystemError with code ENOTDIR if path is not a directory
   */
  readdir(path: string): Promise<readonly DirEntry[]>;

  /**
   * Delete file or directory.
   *
   * @throws FileSystemError with code ENOENT if path not found (unless force: true)
   * @throws FileSystemError with code ENOTEMPTY if directory not empty (unless recursive: true)
   *
   * @example Remove if exists (no error if missing)
   * await fs.rm('/path/to/maybe', { force: true });
   */
  rm(path: string, options?: RmOptions): Promise<void>;

  /**
   * Make a file executable (sets mode 0o755).
   * Callers skip this on Windows, where executability comes from the extension.
   *
   * @throws FileSystemError with code ENOENT if file not found
   */
  makeExecutable(path: string): Promise<void>;

  /**
   * Rename (move) a file atomically.
   * This is the standard pattern for atomic file writes:
   * 1. Write to a temp file
   * 2. Rename temp file to target (atomic on most filesystems)
   *
   * @throws FileSystemError with code ENOENT if oldPath doesn't exist
   *
   * @example Atomic write pattern
   * await fs.writeFileBuffer('/path/to/file.download', content);
   * await fs.rename('/path/to/file.download', '/path/to/file');
   */
  rename(oldPath: string, newPath: string): Promise<void>;
}

// ============================================================================
// Helper Functions
// ============================================================================

const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<FileSystemErrorCode>([
  "ENOENT",
  "EACCES",
  "EEXIST",
  "ENOTDIR",
  "EISDIR",
  "ENOTEMPTY",
]);

function isKnownErrorCode(code: string): code is FileSystemErrorCode {
  return KNOWN_ERROR_CODES.has(code);
}

/**
 * Extract the POSIX error code from a Node.js error.
 * fs.rm() errors carry codes like ERR_FS_EISDIR with the POSIX code in `info.code`.
 */
function extractErrorCode(error: Error): string | undefined {
  if ("info" in error && typeof error.info === "object" && error.info !== null) {
    if ("code" in error.info && typeof error.info.code === "string") {
      return error.info.code;
    }
  }
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map a Node.js filesystem error to a FileSystemError.
 */
function mapError(error: unknown, path: string): FileSystemError {
  if (!(error instanceof Error)) {
    return new FileSystemError("UNKNOWN", path, String(error));
  }

  const code = extractErrorCode(error);

  if (code && isKnownErrorCode(code)) {
    return new FileSystemError(code, path, error.message, error);
  }

  // Unknown error code - preserve original code
  return new FileSystemError("UNKNOWN", path, error.message, error, code);
}

// ============================================================================
// DefaultFileSystemLayer Implementation
// ============================================================================

/**
 * Default implementation of FileSystemLayer using node:fs/promises.
 * Maps Node.js errors to FileSystemError for consistent error handling.
 */
export class DefaultFileSystemLayer implements FileSystemLayer {
  constructor(private readonly logger: Logger) {}

  async readFile(filePath: string): Promise<string> {
    this.logger.debug("Read", { path: filePath });
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw this.fail("Read failed", error, filePath);
    }
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    this.logger.debug("Write", { path: filePath });
    try {
      await fs.writeFile(filePath, content, "utf-8");
    } catch (error) {
      throw this.fail("Write failed", error, filePath);
    }
  }

  async writeFileBuffer(filePath: string, content: Buffer): Promise<void> {
    this.logger.debug("WriteBuffer", { path: filePath, size: content.length });
    try {
      await fs.writeFile(filePath, content);
    } catch (error) {
      throw this.fail("WriteBuffer failed", error, filePath);
    }
  }

  async mkdir(dirPath: string, options?: MkdirOptions): Promise<void> {
    const recursive = options?.recursive ?? true;
    this.logger.debug("Mkdir", { path: dirPath });
    try {
      await fs.mkdir(dirPath, { recursive });
    } catch (error) {
      throw this.fail("Mkdir failed", error, dirPath);
    }
  }

  async readdir(dirPath: string): Promise<readonly DirEntry[]> {
    try {
      const entries = await fs.readdir(dirPath, { withFileTypes: true });
      const result = entries.map((entry) => ({
        name: entry.name,
        isDirectory: entry.isDirectory(),
        isFile: entry.isFile(),
        isSymbolicLink: entry.isSymbolicLink(),
      }));
      this.logger.debug("Readdir", { path: dirPath, count: result.length });
      return result;
    } catch (error) {
      throw this.fail("Readdir failed", error, dirPath);
    }
  }

  async rm(targetPath: string, options?: RmOptions): Promise<void> {
    const recursive = options?.recursive ?? false;
    const force = options?.force ?? false;
    this.logger.debug("Rm", { path: targetPath, recursive });
    try {
      if (recursive) {
        await fs.rm(targetPath, { recursive, force });
        return;
      }
      const stat = await fs.stat(targetPath);
      if (stat.isDirectory()) {
        // rmdir fails with ENOTEMPTY if not empty
        await fs.rmdir(targetPath);
      } else {
        await fs.rm(targetPath, { force });
      }
    } catch (error) {
      const fsError = mapError(error, targetPath);
      if (force && fsError.fsCode === "ENOENT") {
        return;
      }
      throw this.fail("Rm failed", fsError, targetPath);
    }
  }

  async makeExecutable(filePath: string): Promise<void> {
    this.logger.debug("Chmod", { path: filePath, mode: "755" });
    try {
      await fs.chmod(filePath, 0o755);
    } catch (error) {
      throw this.fail("Chmod failed", error, filePath);
    }
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    this.logger.debug("Rename", { oldPath, newPath });
    try {
      await fs.rename(oldPath, newPath);
    } catch (error) {
      throw this.fail("Rename failed", error, oldPath);
    }
  }

  private fail(message: string, error: unknown, path: string): FileSystemError {
    const fsError = error instanceof FileSystemError ? error : mapError(error, path);
    this.logger.warn(message, {
      path,
      code: fsError.fsCode,
      error: fsError.message,
    });
    return fsError;
  }
}
