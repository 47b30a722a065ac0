/**
 * Public API exports for the services layer.
 * All services are plain Node.js.
 */

// Error types
export {
  ServiceError,
  UnsupportedPlatformError,
  InstallError,
  LocalStateWriteError,
  ConfigError,
  FileSystemError,
  isServiceError,
  getErrorMessage,
} from "./errors";
export type { SerializedError, ErrorSeverity, InstallStage } from "./errors";

// Adapter provisioning
export * from "./adapter";

// Configuration
export {
  ConfigService,
  DEFAULT_PROVISIONER_CONFIG,
  parseProvisionerConfig,
  parseProvisionerConfigOverrides,
  mergeProvisionerConfig,
} from "./config";
export type {
  ConfigServiceDeps,
  ProvisionerConfig,
  ProvisionerConfigOverrides,
  EnvKeyConfig,
} from "./config";

// Logging
export {
  ElectronLogService,
  FailSafeLogger,
  FailSafeLoggingService,
  LOGGER_NAMES,
} from "./logging";
export type { Logger, LoggerName, LoggingService, LogContext } from "./logging";

// Platform layers
export * from "./platform";
