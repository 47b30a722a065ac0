/**
 * Logging module exports.
 */

export type { Logger, LoggerName, LoggingService, LogContext } from "./types";
export { LogLevel, LOGGER_NAMES, isLoggerName, isLogLevel } from "./types";
export { ElectronLogService, formatContext } from "./electron-log-service";
export { FailSafeLogger, FailSafeLoggingService, type FallbackWriter } from "./fail-safe-logger";
