/**
 * Adapter provisioning: platform resolution, version resolution, installation
 * and the per-launch lifecycle.
 */

export {
  createAdapterProvisioner,
  type AdapterProvisioner,
  type AdapterProvisionerOptions,
  type ProvisionerResolveOptions,
} from "./provisioner";
export {
  LifecycleOrchestrator,
  type LifecycleOrchestratorDeps,
  type ResolveCommandOptions,
} from "./lifecycle";
export { SessionPathCache } from "./session-cache";
export { resolvePlatform, listSupportedPlatforms, type ResolvePlatformOptions } from "./platform-resolver";
export {
  FileLocalStateStore,
  type LocalStateStore,
  type FileLocalStateStoreDeps,
  INSTALLED_VERSION_FILE,
  CACHED_VERSION_FILE,
  CACHED_VERSION_TIMESTAMP_FILE,
} from "./state-store";
export {
  GitHubReleaseSource,
  parseLatestStableVersion,
  releasesUrl,
  type ReleaseSource,
  type GitHubReleaseSourceDeps,
} from "./release-source";
export {
  VersionResolver,
  type VersionResolverDeps,
  type ResolveVersionOptions,
  type ResolvedVersion,
  type VersionSource,
} from "./version-resolver";
export {
  BinaryInstaller,
  HttpArtifactDownloader,
  downloadUrl,
  isFilePresent,
  type ArtifactDownloader,
  type BinaryInstallerDeps,
  type HttpArtifactDownloaderDeps,
} from "./installer";
export { buildForwardedEnv, readOverride, shellEnvFromRecord } from "./environment";
export type {
  CachedVersion,
  EnvEntry,
  HostPlatform,
  PlatformDescriptor,
  ResolvedCommand,
  ShellEnv,
  SupportedArch,
  SupportedOs,
} from "./types";
