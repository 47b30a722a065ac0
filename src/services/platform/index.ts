/**
 * Platform layer exports.
 *
 * Platform layers abstract OS/runtime-specific operations (filesystem, HTTP,
 * host platform, data paths, wall clock) so services can be tested in memory.
 */

// Filesystem Layer
export { DefaultFileSystemLayer } from "./filesystem";
export type {
  FileSystemLayer,
  FileSystemErrorCode,
  DirEntry,
  MkdirOptions,
  RmOptions,
} from "./filesystem";

// Network Layer
export { DefaultNetworkLayer } from "./network";
export type { HttpClient, HttpRequestOptions, HttpResponse, NetworkLayerConfig } from "./network";

// Platform info
export { NodePlatformInfo } from "./platform-info";
export type { PlatformInfo } from "./platform-info";

// Paths
export { DefaultPathProvider } from "./path-provider";
export type { PathProvider, PathProviderOptions } from "./path-provider";

// Clock
export { systemClock } from "./clock";
export type { Clock } from "./clock";
