/**
 * Local state of the adapter install slot: the installed-version marker and
 * the cached latest release version with its fetch time.
 *
 * Reads never fail: a missing, empty or unreadable record reads as null.
 * Writes are best-effort and return a LocalStateWriteError instead of throwing.
 */

import { join } from "node:path";
import type { FileSystemLayer } from "../platform/filesystem";
import type { Clock } from "../platform/clock";
import { FailSafeLogger, type Logger } from "../logging";
import { FileSystemError, LocalStateWriteError, getErrorMessage } from "../errors";
import type { CachedVersion } from "./types";

export const INSTALLED_VERSION_FILE = "installed-version.txt";
export const CACHED_VERSION_FILE = "cached-version.txt";
export const CACHED_VERSION_TIMESTAMP_FILE = "cached-version-timestamp.txt";

const TIMESTAMP_PATTERN = /^\+?\d+$/;

export interface LocalStateStore {
  /** Trimmed installed-version marker, or null. */
  readInstalledVersion(): Promise<string | null>;

  writeInstalledVersion(version: string): Promise<LocalStateWriteError | null>;

  /**
   * Cached latest version, or null when no version is cached.
   * A missing or unparsable timestamp reads as 0.
   */
  readLatestCache(): Promise<CachedVersion | null>;

  /** Store the version with the current clock time. */
  writeLatestCache(version: string): Promise<LocalStateWriteError | null>;
}

export interface FileLocalStateStoreDeps {
  readonly fileSystem: FileSystemLayer;
  /** Directory holding the state files; created before each write. */
  readonly installDir: string;
  readonly clock: Clock;
  readonly logger: Logger;
}

export class FileLocalStateStore implements LocalStateStore {
  private readonly fileSystem: FileSystemLayer;
  private readonly installDir: string;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: FileLocalStateStoreDeps) {
    this.fileSystem = deps.fileSystem;
    this.installDir = deps.installDir;
    this.clock = deps.clock;
    this.logger = new FailSafeLogger(deps.logger);
  }

  async readInstalledVersion(): Promise<string | null> {
    return this.readRecord(INSTALLED_VERSION_FILE);
  }

  async writeInstalledVersion(version: string): Promise<LocalStateWriteError | null> {
    return this.writeRecord(INSTALLED_VERSION_FILE, version);
  }

  async readLatestCache(): Promise<CachedVersion | null> {
    const version = await this.readRecord(CACHED_VERSION_FILE);
    if (version === null) {
      return null;
    }

    const timestamp = await this.readRecord(CACHED_VERSION_TIMESTAMP_FILE);
    const fetchedAtSeconds = parseTimestamp(timestamp);
    if (fetchedAtSeconds === null) {
      this.logger.debug("Cache timestamp missing or unparsable, treating as stale", { timestamp });
    }
    return { version, fetchedAtSeconds: fetchedAtSeconds ?? 0 };
  }

  async writeLatestCache(version: string): Promise<LocalStateWriteError | null> {
    const versionError = await this.writeRecord(CACHED_VERSION_FILE, version);
    if (versionError) {
      return versionError;
    }
    return this.writeRecord(CACHED_VERSION_TIMESTAMP_FILE, String(this.clock.nowSeconds()));
  }

  private async readRecord(fileName: string): Promise<string | null> {
    const path = join(this.installDir, fileName);
    let content: string;
    try {
      content = await this.fileSystem.readFile(path);
    } catch (error) {
      if (!(error instanceof FileSystemError && error.fsCode === "ENOENT")) {
        this.logger.warn("State file unreadable", { path, error: getErrorMessage(error) });
      }
      return null;
    }

    const value = content.trim();
    return value === "" ? null : value;
  }

  private async writeRecord(fileName: string, value: string): Promise<LocalStateWriteError | null> {
    const path = join(this.installDir, fileName);
    try {
      await this.fileSystem.mkdir(this.installDir, { recursive: true });
      await this.fileSystem.writeFile(path, value);
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.warn("State write failed", { path, error: message });
      return new LocalStateWriteError(path, `Failed to write ${fileName}: ${message}`, error);
    }
    this.logger.debug("State written", { path, value });
    return null;
  }
}

/**
 * Parse a stored timestamp: a non-negative integer of seconds, or null.
 */
export function parseTimestamp(raw: string | null): number | null {
  if (raw === null || !TIMESTAMP_PATTERN.test(raw)) {
    return null;
  }
  const seconds = Number(raw);
  return Number.isSafeInteger(seconds) ? seconds : null;
}
