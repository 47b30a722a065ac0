/**
 * Logging types and interfaces.
 *
 * Provides a testable logging abstraction over electron-log with:
 * - Type-safe logger names (scopes)
 * - Constrained context type (no nested objects, functions, symbols)
 * - Interface for dependency injection
 */

/**
 * Log levels in order of verbosity (most verbose to least).
 */
export const LogLevel = {
  silly: "silly",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Valid logger names (scopes).
 * Each name corresponds to a module or subsystem of the provisioner.
 */
export const LOGGER_NAMES = [
  "lifecycle", // LifecycleOrchestrator - per-launch resolution
  "version", // VersionResolver - version priority chain
  "release-source", // GitHubReleaseSource - release listing
  "state-store", // FileLocalStateStore - version marker and cache files
  "installer", // BinaryInstaller - download and install
  "network", // DefaultNetworkLayer - HTTP
  "fs", // DefaultFileSystemLayer - filesystem operations
  "config", // ConfigService - provisioner configuration
  "cli", // adapter-resolve entry point
] as const;

export type LoggerName = (typeof LOGGER_NAMES)[number];

/**
 * Type guard for logger names read from untyped input (environment variables).
 */
export function isLoggerName(value: string): value is LoggerName {
  return LOGGER_NAMES.some((name) => name === value);
}

/**
 * Type guard for log levels read from untyped input.
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some((level) => level === value);
}

/**
 * Context data for log entries.
 * Constrained to primitive types for serialization safety:
 * - No nested objects (prevents circular references)
 * - No functions or symbols (not serializable)
 * - null allowed for explicit "no value" cases
 */
export type LogContext = Record<string, string | number | boolean | null>;

/**
 * Logger interface for dependency injection.
 * Services receive this interface via constructor injection.
 *
 * @example
 * ```typescript
 * class MyService {
 *   constructor(private readonly logger: Logger) {}
 *
 *   async doWork(): Promise<void> {
 *     this.logger.debug('Starting work', { taskId: 'abc123' });
 *     try {
 *       // ... work
 *       this.logger.info('Work complete', { durationMs: 100 });
 *     } catch (err) {
 *       this.logger.error('Work failed', { taskId: 'abc123' }, toError(err));
 *     }
 *   }
 * }
 * ```
 */
export interface Logger {
  /**
   * Log a silly message (most verbose).
   * Use for per-iteration/per-scan details that would be overwhelming in normal debug output.
   */
  silly(message: string, context?: LogContext): void;

  /**
   * Log a debug message.
   * Use for detailed tracing information useful during development.
   */
  debug(message: string, context?: LogContext): void;

  /**
   * Log an info message.
   * Use for significant operations (start/stop, connections, completions).
   */
  info(message: string, context?: LogContext): void;

  /**
   * Log a warning message.
   * Use for recoverable issues or deprecated behavior.
   */
  warn(message: string, context?: LogContext): void;

  /**
   * Log an error message.
   * Use for failures that require attention.
   *
   * @param message - Human-readable error description
   * @param context - Structured context data
   * @param error - Optional Error object for stack trace inclusion
   */
  error(message: string, context?: LogContext, error?: Error): void;
}

/**
 * Logging service.
 * Creates named loggers; one instance per process.
 *
 * @example
 * ```typescript
 * const loggingService = new ElectronLogService(pathProvider);
 * const logger = loggingService.createLogger("installer");
 * const installer = new BinaryInstaller({ ..., logger });
 * ```
 */
export interface LoggingService {
  /**
   * Create a logger with the specified name (scope).
   * The name appears in log output to identify the source.
   *
   * @param name - Logger name/scope (e.g., 'installer', 'network')
   * @returns Logger instance for the named scope
   */
  createLogger(name: LoggerName): Logger;

  /**
   * Dispose of the logging service.
   */
  dispose(): void;
}
