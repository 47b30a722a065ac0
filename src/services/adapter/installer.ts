/**
 * Installs the adapter executable for a target version.
 */

import { basename, dirname, join } from "node:path";
import type { FileSystemLayer } from "../platform/filesystem";
import type { HttpClient } from "../platform/network";
import { FailSafeLogger, type Logger } from "../logging";
import { FileSystemError, InstallError, getErrorMessage } from "../errors";
import { toError } from "../../shared/error-utils";
import type { LocalStateStore } from "./state-store";
import type { PlatformDescriptor } from "./types";

/**
 * Release asset URL for a version.
 *
 * @example
 * downloadUrl("vulnera-rs/adapter", "adapter-v", "0.2.0", "vulnera-adapter-x86_64-apple-darwin")
 * // "https://github.com/vulnera-rs/adapter/releases/download/adapter-v0.2.0/vulnera-adapter-x86_64-apple-darwin"
 */
export function downloadUrl(
  repository: string,
  tagPrefix: string,
  version: string,
  assetName: string
): string {
  return `https://github.com/${repository}/releases/download/${tagPrefix}${version}/${assetName}`;
}

/**
 * True when `path` exists and is not a directory.
 * Uses readdir on the parent; a missing or unreadable parent counts as absent.
 */
export async function isFilePresent(fileSystem: FileSystemLayer, path: string): Promise<boolean> {
  try {
    const entries = await fileSystem.readdir(dirname(path));
    const name = basename(path);
    return entries.some((entry) => entry.name === name && !entry.isDirectory);
  } catch (error) {
    if (error instanceof FileSystemError) {
      return false;
    }
    throw error;
  }
}

// ============================================================================
// Artifact download
// ============================================================================

/**
 * Fetches a release asset to a local file, uncompressed.
 */
export interface ArtifactDownloader {
  /**
   * Download `url` to `destPath`, replacing any existing file.
   * A failed write can leave a partial file behind; callers download to a
   * staging path.
   */
  download(url: string, destPath: string): Promise<void>;
}

export interface HttpArtifactDownloaderDeps {
  readonly httpClient: HttpClient;
  readonly fileSystem: FileSystemLayer;
  readonly logger: Logger;
  readonly timeoutMs: number;
}

export class HttpArtifactDownloader implements ArtifactDownloader {
  private readonly httpClient: HttpClient;
  private readonly fileSystem: FileSystemLayer;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(deps: HttpArtifactDownloaderDeps) {
    this.httpClient = deps.httpClient;
    this.fileSystem = deps.fileSystem;
    this.logger = new FailSafeLogger(deps.logger);
    this.timeoutMs = deps.timeoutMs;
  }

  async download(url: string, destPath: string): Promise<void> {
    const response = await this.httpClient.fetch(url, { timeout: this.timeoutMs });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} downloading ${url}`);
    }
    await this.fileSystem.writeFileBuffer(destPath, Buffer.from(response.body));
    this.logger.debug("Downloaded", { url, path: destPath, size: response.body.length });
  }
}

// ============================================================================
// Installer
// ============================================================================

export interface BinaryInstallerDeps {
  readonly stateStore: LocalStateStore;
  readonly downloader: ArtifactDownloader;
  readonly fileSystem: FileSystemLayer;
  readonly logger: Logger;
  readonly installDir: string;
  readonly repository: string;
  readonly tagPrefix: string;
}

export class BinaryInstaller {
  private readonly stateStore: LocalStateStore;
  private readonly downloader: ArtifactDownloader;
  private readonly fileSystem: FileSystemLayer;
  private readonly logger: Logger;
  private readonly installDir: string;
  private readonly repository: string;
  private readonly tagPrefix: string;

  constructor(deps: BinaryInstallerDeps) {
    this.stateStore = deps.stateStore;
    this.downloader = deps.downloader;
    this.fileSystem = deps.fileSystem;
    this.logger = new FailSafeLogger(deps.logger);
    this.installDir = deps.installDir;
    this.repository = deps.repository;
    this.tagPrefix = deps.tagPrefix;
  }

  /** Local executable path for a platform. */
  executablePath(descriptor: PlatformDescriptor): string {
    return join(this.installDir, descriptor.executableName);
  }

  /**
   * Make sure the executable for `targetVersion` is installed.
   * Downloads only when the executable is missing or the installed marker
   * differs from `targetVersion`.
   *
   * @returns Executable path
   * @throws InstallError if the directory, download or permission step fails
   */
  async ensure(descriptor: PlatformDescriptor, targetVersion: string): Promise<string> {
    const executablePath = this.executablePath(descriptor);
    const present = await isFilePresent(this.fileSystem, executablePath);
    const installedVersion = await this.stateStore.readInstalledVersion();

    if (present && installedVersion === targetVersion) {
      this.logger.debug("Already installed", { version: targetVersion, path: executablePath });
      return executablePath;
    }

    const url = downloadUrl(this.repository, this.tagPrefix, targetVersion, descriptor.assetName);
    this.logger.info("Installing adapter", {
      version: targetVersion,
      installedVersion,
      present,
      target: descriptor.targetTriple,
      url,
    });

    try {
      await this.fileSystem.mkdir(this.installDir, { recursive: true });
    } catch (error) {
      throw this.fail(
        "create-directory",
        url,
        this.installDir,
        `Failed to create install directory ${this.installDir}: ${getErrorMessage(error)}`,
        error
      );
    }

    // Staged beside the target so the rename below replaces it in one step,
    // already executable
    const stagingPath = `${executablePath}.download`;

    try {
      await this.downloader.download(url, stagingPath);
    } catch (error) {
      await this.discardStaging(stagingPath);
      throw this.fail(
        "download",
        url,
        executablePath,
        `Download failed for ${url}: ${getErrorMessage(error)}`,
        error
      );
    }

    if (!descriptor.isWindows) {
      try {
        await this.fileSystem.makeExecutable(stagingPath);
      } catch (error) {
        await this.discardStaging(stagingPath);
        throw this.fail(
          "make-executable",
          url,
          executablePath,
          `Failed to make ${executablePath} executable: ${getErrorMessage(error)}`,
          error
        );
      }
    }

    try {
      await this.fileSystem.rename(stagingPath, executablePath);
    } catch (error) {
      await this.discardStaging(stagingPath);
      throw this.fail(
        "download",
        url,
        executablePath,
        `Failed to move download into place at ${executablePath}: ${getErrorMessage(error)}`,
        error
      );
    }

    const markerError = await this.stateStore.writeInstalledVersion(targetVersion);
    if (markerError) {
      // Next resolution re-downloads; the executable itself is usable
      this.logger.warn("Installed version not recorded", { error: markerError.message });
    }

    this.logger.info("Adapter installed", { version: targetVersion, path: executablePath });
    return executablePath;
  }

  private async discardStaging(stagingPath: string): Promise<void> {
    try {
      await this.fileSystem.rm(stagingPath, { force: true });
    } catch (error) {
      this.logger.warn("Failed to remove partial download", {
        path: stagingPath,
        error: getErrorMessage(error),
      });
    }
  }

  private fail(
    stage: InstallError["stage"],
    url: string,
    path: string,
    message: string,
    cause: unknown
  ): InstallError {
    this.logger.error(
      "Install failed",
      { stage, url, path, error: getErrorMessage(cause) },
      toError(cause)
    );
    return new InstallError(stage, url, path, message, cause);
  }
}
