/**
 * Factory wiring the adapter provisioning services with their default
 * platform layers. Hosts that need different layers (tests, editor extension
 * sandboxes) inject their own.
 */

import { ConfigService } from "../config/config-service";
import type { ProvisionerConfig, ProvisionerConfigOverrides } from "../config/types";
import { DefaultFileSystemLayer, type FileSystemLayer } from "../platform/filesystem";
import { DefaultNetworkLayer, type HttpClient } from "../platform/network";
import { DefaultPathProvider, type PathProvider } from "../platform/path-provider";
import { NodePlatformInfo, type PlatformInfo } from "../platform/platform-info";
import { systemClock, type Clock } from "../platform/clock";
import { ElectronLogService, FailSafeLoggingService, type LoggingService } from "../logging";
import { FileLocalStateStore } from "./state-store";
import { GitHubReleaseSource, type ReleaseSource } from "./release-source";
import { VersionResolver } from "./version-resolver";
import { BinaryInstaller, HttpArtifactDownloader, type ArtifactDownloader } from "./installer";
import { LifecycleOrchestrator } from "./lifecycle";
import type { SessionPathCache } from "./session-cache";
import type { HostPlatform, ResolvedCommand, ShellEnv } from "./types";

export interface AdapterProvisionerOptions {
  /** Overrides applied on top of defaults and the settings file. */
  readonly config?: ProvisionerConfigOverrides;
  /** Data root; defaults to the per-user application data directory. */
  readonly dataRootDir?: string;
  readonly platformInfo?: PlatformInfo;
  /** Defaults to electron-log session files under `<dataRoot>/logs`. */
  readonly loggingService?: LoggingService;
  readonly fileSystem?: FileSystemLayer;
  readonly httpClient?: HttpClient;
  readonly clock?: Clock;
  readonly releaseSource?: ReleaseSource;
  readonly downloader?: ArtifactDownloader;
  /** Environment read for logging settings. Default: `process.env` */
  readonly processEnv?: NodeJS.ProcessEnv;
}

export interface ProvisionerResolveOptions {
  readonly shellEnv: ShellEnv;
  readonly cache?: SessionPathCache;
  /** Defaults to the platform of `platformInfo`. */
  readonly platform?: HostPlatform;
}

export interface AdapterProvisioner {
  readonly config: ProvisionerConfig;
  readonly pathProvider: PathProvider;
  resolveCommand(options: ProvisionerResolveOptions): Promise<ResolvedCommand>;
  dispose(): void;
}

/**
 * Create a provisioner with the effective configuration loaded.
 *
 * @throws ConfigError if `options.config` is invalid
 *
 * @example
 * const provisioner = await createAdapterProvisioner();
 * const cache = new SessionPathCache();
 * const command = await provisioner.resolveCommand({
 *   shellEnv: shellEnvFromRecord(process.env),
 *   cache,
 * });
 * spawn(command.command, [...command.args], { env: Object.fromEntries(command.env) });
 */
export async function createAdapterProvisioner(
  options: AdapterProvisionerOptions = {}
): Promise<AdapterProvisioner> {
  const platformInfo = options.platformInfo ?? new NodePlatformInfo();
  const pathProvider = new DefaultPathProvider(
    platformInfo,
    options.dataRootDir !== undefined ? { dataRootDir: options.dataRootDir } : {}
  );
  const loggingService = new FailSafeLoggingService(
    options.loggingService ?? new ElectronLogService(pathProvider, options.processEnv)
  );

  const fileSystem = options.fileSystem ?? new DefaultFileSystemLayer(loggingService.createLogger("fs"));
  const httpClient = options.httpClient ?? new DefaultNetworkLayer(loggingService.createLogger("network"));
  const clock = options.clock ?? systemClock;

  const config = await new ConfigService({
    fileSystem,
    pathProvider,
    logger: loggingService.createLogger("config"),
  }).load(options.config);

  const stateStore = new FileLocalStateStore({
    fileSystem,
    installDir: pathProvider.installDir,
    clock,
    logger: loggingService.createLogger("state-store"),
  });

  const releaseSource =
    options.releaseSource ??
    new GitHubReleaseSource({
      httpClient,
      logger: loggingService.createLogger("release-source"),
      repository: config.repository,
      tagPrefix: config.tagPrefix,
      userAgent: config.userAgent,
      timeoutMs: config.releaseListTimeoutMs,
    });

  const installerLogger = loggingService.createLogger("installer");
  const downloader =
    options.downloader ??
    new HttpArtifactDownloader({
      httpClient,
      fileSystem,
      logger: installerLogger,
      timeoutMs: config.downloadTimeoutMs,
    });

  const orchestrator = new LifecycleOrchestrator({
    config,
    versionResolver: new VersionResolver({
      stateStore,
      releaseSource,
      logger: loggingService.createLogger("version"),
      floorVersion: config.floorVersion,
    }),
    installer: new BinaryInstaller({
      stateStore,
      downloader,
      fileSystem,
      logger: installerLogger,
      installDir: pathProvider.installDir,
      repository: config.repository,
      tagPrefix: config.tagPrefix,
    }),
    stateStore,
    fileSystem,
    clock,
    logger: loggingService.createLogger("lifecycle"),
  });

  return {
    config,
    pathProvider,
    resolveCommand(resolveOptions: ProvisionerResolveOptions): Promise<ResolvedCommand> {
      return orchestrator.resolveCommand({
        shellEnv: resolveOptions.shellEnv,
        platform: resolveOptions.platform ?? platformInfo,
        ...(resolveOptions.cache !== undefined && { cache: resolveOptions.cache }),
      });
    },
    dispose(): void {
      loggingService.dispose();
    },
  };
}
