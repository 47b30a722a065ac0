/**
 * Configuration service for the provisioner.
 *
 * Layers, lowest first: built-in defaults, the optional settings file at
 * `{dataRootDir}/provisioner.json`, then caller overrides.
 */

import type { FileSystemLayer } from "../platform/filesystem";
import type { PathProvider } from "../platform/path-provider";
import type { Logger } from "../logging";
import { FileSystemError, getErrorMessage } from "../errors";
import { mergeProvisionerConfig, parseProvisionerConfigOverrides } from "./schema";
import type { ProvisionerConfig, ProvisionerConfigOverrides } from "./types";
import { DEFAULT_PROVISIONER_CONFIG } from "./types";

export interface ConfigServiceDeps {
  readonly fileSystem: FileSystemLayer;
  readonly pathProvider: PathProvider;
  readonly logger: Logger;
}

export class ConfigService {
  private readonly fileSystem: FileSystemLayer;
  private readonly pathProvider: PathProvider;
  private readonly logger: Logger;

  constructor(deps: ConfigServiceDeps) {
    this.fileSystem = deps.fileSystem;
    this.pathProvider = deps.pathProvider;
    this.logger = deps.logger;
  }

  /**
   * Load the effective configuration.
   *
   * A missing settings file is normal. An unreadable or invalid one is logged
   * and ignored. Invalid caller overrides are a programming error and throw.
   *
   * @throws ConfigError if the caller overrides are invalid
   */
  async load(overrides: ProvisionerConfigOverrides = {}): Promise<ProvisionerConfig> {
    const callerLayer = parseProvisionerConfigOverrides(overrides);
    const fileLayer = await this.loadFileLayer();
    const config = mergeProvisionerConfig(DEFAULT_PROVISIONER_CONFIG, fileLayer, callerLayer);

    this.logger.debug("Config loaded", {
      repository: config.repository,
      tagPrefix: config.tagPrefix,
      cacheTtlSeconds: config.cacheTtlSeconds,
    });
    return config;
  }

  private async loadFileLayer(): Promise<ProvisionerConfigOverrides> {
    const configPath = this.pathProvider.configPath;

    let content: string;
    try {
      content = await this.fileSystem.readFile(configPath);
    } catch (error) {
      if (error instanceof FileSystemError && error.fsCode === "ENOENT") {
        this.logger.debug("Config file not found, using defaults", { path: configPath });
      } else {
        this.logger.warn("Config file unreadable, using defaults", {
          path: configPath,
          error: getErrorMessage(error),
        });
      }
      return {};
    }

    try {
      const layer = parseProvisionerConfigOverrides(JSON.parse(content));
      // Reject file values that only fail once merged (e.g. a bad repository name)
      mergeProvisionerConfig(DEFAULT_PROVISIONER_CONFIG, layer);
      return layer;
    } catch (error) {
      this.logger.warn("Config file invalid, using defaults", {
        path: configPath,
        error: getErrorMessage(error),
      });
      return {};
    }
  }
}
