/**
 * Lifecycle orchestrator - the entry point a host calls each time it is about
 * to launch the adapter.
 */

import type { FileSystemLayer } from "../platform/filesystem";
import type { Clock } from "../platform/clock";
import { FailSafeLogger, type Logger } from "../logging";
import type { ProvisionerConfig } from "../config/types";
import { resolvePlatform } from "./platform-resolver";
import { buildForwardedEnv, readOverride } from "./environment";
import { isFilePresent, type BinaryInstaller } from "./installer";
import type { LocalStateStore } from "./state-store";
import type { VersionResolver } from "./version-resolver";
import type { SessionPathCache } from "./session-cache";
import type { HostPlatform, ResolvedCommand, ShellEnv } from "./types";

export interface LifecycleOrchestratorDeps {
  readonly config: ProvisionerConfig;
  readonly versionResolver: VersionResolver;
  readonly installer: BinaryInstaller;
  readonly stateStore: LocalStateStore;
  readonly fileSystem: FileSystemLayer;
  readonly clock: Clock;
  readonly logger: Logger;
}

export interface ResolveCommandOptions {
  /** Snapshot of the caller's shell environment. */
  readonly shellEnv: ShellEnv;
  readonly platform: HostPlatform;
  /** Session cache of the last resolved path. */
  readonly cache?: SessionPathCache;
}

export class LifecycleOrchestrator {
  private readonly config: ProvisionerConfig;
  private readonly versionResolver: VersionResolver;
  private readonly installer: BinaryInstaller;
  private readonly stateStore: LocalStateStore;
  private readonly fileSystem: FileSystemLayer;
  private readonly clock: Clock;
  private readonly logger: Logger;

  /** Tail of the call queue; each resolution starts after the previous one settles. */
  private queue: Promise<unknown> = Promise.resolve();

  constructor(deps: LifecycleOrchestratorDeps) {
    this.config = deps.config;
    this.versionResolver = deps.versionResolver;
    this.installer = deps.installer;
    this.stateStore = deps.stateStore;
    this.fileSystem = deps.fileSystem;
    this.clock = deps.clock;
    this.logger = new FailSafeLogger(deps.logger);
  }

  /**
   * Resolve the command that launches the adapter, installing it if needed.
   *
   * Calls on one orchestrator run one at a time.
   *
   * @throws UnsupportedPlatformError if the host has no prebuilt adapter
   * @throws InstallError if installing the adapter fails
   */
  resolveCommand(options: ResolveCommandOptions): Promise<ResolvedCommand> {
    const run = this.queue.then(() => this.doResolveCommand(options));
    // Keep the queue alive after a failed call; the caller still sees the rejection
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async doResolveCommand(options: ResolveCommandOptions): Promise<ResolvedCommand> {
    const { shellEnv, platform, cache } = options;
    const envKeys = this.config.env;

    const pathOverride = readOverride(shellEnv, envKeys.pathOverride);
    if (pathOverride !== null) {
      this.logger.info("Using adapter path override", {
        key: envKeys.pathOverride,
        path: pathOverride,
      });
      return this.command(pathOverride, shellEnv);
    }

    const descriptor = resolvePlatform(platform.platform, platform.arch, {
      artifactName: this.config.artifactName,
      pathOverrideKey: envKeys.pathOverride,
    });

    const version = await this.versionResolver.resolve({
      explicitOverride: readOverride(shellEnv, envKeys.versionOverride),
      now: this.clock.nowSeconds(),
      cacheTtlSeconds: this.config.cacheTtlSeconds,
    });

    const cachedPath = cache?.get() ?? null;
    if (cachedPath !== null && (await this.isReusable(cachedPath, version))) {
      this.logger.debug("Reusing session path", { path: cachedPath, version });
      return this.command(cachedPath, shellEnv);
    }

    const path = await this.installer.ensure(descriptor, version);
    cache?.set(path);
    this.logger.info("Adapter ready", { path, version, target: descriptor.targetTriple });
    return this.command(path, shellEnv);
  }

  private async isReusable(path: string, version: string): Promise<boolean> {
    if (!(await isFilePresent(this.fileSystem, path))) {
      this.logger.debug("Session path missing", { path });
      return false;
    }
    const installedVersion = await this.stateStore.readInstalledVersion();
    if (installedVersion !== version) {
      this.logger.debug("Session path outdated", { path, installedVersion, version });
      return false;
    }
    return true;
  }

  private command(path: string, shellEnv: ShellEnv): ResolvedCommand {
    return { command: path, args: [], env: buildForwardedEnv(shellEnv, this.config.env) };
  }
}
