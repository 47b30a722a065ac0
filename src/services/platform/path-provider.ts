import { join, isAbsolute } from "node:path";
import type { PlatformInfo } from "./platform-info";

/**
 * Provisioner path provider.
 * Abstracts platform-specific locations of the local state.
 */
export interface PathProvider {
  /** Root directory for all provisioner data */
  readonly dataRootDir: string;

  /** Install slot for the adapter and its state files: `<dataRoot>/server/` */
  readonly installDir: string;

  /** Directory for session log files: `<dataRoot>/logs/` */
  readonly logsDir: string;

  /** Optional provisioner settings file: `<dataRoot>/provisioner.json` */
  readonly configPath: string;
}

export interface PathProviderOptions {
  /**
   * Use this directory as data root instead of the per-user default.
   * Hosts that own a working directory (editor extensions) point this at it.
   */
  readonly dataRootDir?: string;
}

/**
 * Default PathProvider implementation.
 *
 * Path structure:
 * - Linux: `~/.local/share/vulnera/`
 * - macOS: `~/Library/Application Support/Vulnera/`
 * - Windows: `<home>/AppData/Roaming/Vulnera/`
 */
export class DefaultPathProvider implements PathProvider {
  readonly dataRootDir: string;
  readonly installDir: string;
  readonly logsDir: string;
  readonly configPath: string;

  constructor(platformInfo: PlatformInfo, options: PathProviderOptions = {}) {
    this.dataRootDir = options.dataRootDir ?? this.computeDataRootDir(platformInfo);
    if (!isAbsolute(this.dataRootDir)) {
      throw new TypeError(`dataRootDir must be an absolute path, got: "${this.dataRootDir}"`);
    }
    this.installDir = join(this.dataRootDir, "server");
    this.logsDir = join(this.dataRootDir, "logs");
    this.configPath = join(this.dataRootDir, "provisioner.json");
  }

  private computeDataRootDir(platformInfo: PlatformInfo): string {
    const { platform, homeDir } = platformInfo;

    switch (platform) {
      case "darwin":
        return join(homeDir, "Library", "Application Support", "Vulnera");
      case "win32":
        return join(homeDir, "AppData", "Roaming", "Vulnera");
      case "linux":
      default:
        return join(homeDir, ".local", "share", "vulnera");
    }
  }
}
