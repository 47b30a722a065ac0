/**
 * ElectronLogService - logging implementation using electron-log's Node.js entry.
 *
 * Features:
 * - Session-based log files: `<datetime>-<uuid>.log`
 * - Environment variable configuration for level and console output
 * - Named logger scopes for component identification
 * - Context serialization as key=value pairs
 */

import log from "electron-log/node";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { PathProvider } from "../platform/path-provider";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types";
import { isLoggerName, isLogLevel } from "./types";

type ElectronLogScope = ReturnType<typeof log.scope>;

/** Level used when VULNERA_PROVISIONER_LOGLEVEL is unset or invalid. */
const DEFAULT_LOG_LEVEL: LogLevel = "info";

const LOG_FORMAT = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";

/**
 * Format context object as key=value pairs for log message.
 *
 * @returns Formatted string like "key1=value1 key2=value2"
 */
export function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => {
      if (value === null) return `${key}=null`;
      return `${key}=${String(value)}`;
    })
    .join(" ");
}

function withContext(message: string, context: LogContext | undefined): string {
  const contextStr = formatContext(context);
  return contextStr ? `${message} ${contextStr}` : message;
}

function parseLogLevel(envValue: string | undefined): LogLevel | undefined {
  if (!envValue) return undefined;
  const normalized = envValue.toLowerCase().trim();
  return isLogLevel(normalized) ? normalized : undefined;
}

/**
 * Generate session-based log filename.
 * Format: YYYY-MM-DDTHH-MM-SS-<uuid>.log
 */
function generateSessionFilename(): string {
  const timestamp = new Date()
    .toISOString()
    .replace(/[:.]/g, "-") // Replace : and . with -
    .slice(0, 19); // YYYY-MM-DDTHH-MM-SS
  const uuid = randomUUID().slice(0, 8);
  return `${timestamp}-${uuid}.log`;
}

/**
 * Parse VULNERA_PROVISIONER_LOGGER (comma-separated logger names).
 * Unknown names are ignored.
 *
 * @returns Set of allowed logger names, or undefined if not set (allow all)
 */
function parseLoggerFilter(envValue: string | undefined): Set<LoggerName> | undefined {
  if (!envValue) return undefined;
  const names = envValue
    .split(",")
    .map((name) => name.trim())
    .filter(isLoggerName);
  if (names.length === 0) return undefined;
  return new Set(names);
}

class ElectronLogLogger implements Logger {
  constructor(private readonly scope: ElectronLogScope) {}

  silly(message: string, context?: LogContext): void {
    this.scope.silly(withContext(message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.scope.debug(withContext(message, context));
  }

  info(message: string, context?: LogContext): void {
    this.scope.info(withContext(message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.scope.warn(withContext(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (error) {
      this.scope.error(withContext(message, context), error);
    } else {
      this.scope.error(withContext(message, context));
    }
  }
}

/**
 * Logger that is a no-op unless its name is in the allowed set.
 */
class FilteredLogger implements Logger {
  private readonly enabled: boolean;

  constructor(
    private readonly inner: Logger,
    allowedLoggers: Set<LoggerName> | undefined,
    name: LoggerName
  ) {
    this.enabled = allowedLoggers === undefined || allowedLoggers.has(name);
  }

  silly(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.silly(message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.debug(message, context);
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.info(message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.warn(message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (this.enabled) this.inner.error(message, context, error);
  }
}

/**
 * Logging service on electron-log.
 *
 * Configuration:
 * - Level: VULNERA_PROVISIONER_LOGLEVEL (default: info)
 * - Console output via VULNERA_PROVISIONER_PRINT_LOGS (any non-empty value)
 * - Logger filtering via VULNERA_PROVISIONER_LOGGER (comma-separated logger names)
 * - Log files under `<dataRoot>/logs/`
 *
 * @example
 * ```typescript
 * const loggingService = new ElectronLogService(pathProvider);
 * const logger = loggingService.createLogger("installer");
 * logger.info("Installed", { version: "0.2.0" });
 * // Output: [2025-12-16 10:30:00.123] [info] [installer] Installed version=0.2.0
 * ```
 */
export class ElectronLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly logLevel: LogLevel;
  private readonly allowedLoggers: Set<LoggerName> | undefined;

  constructor(pathProvider: PathProvider, env: NodeJS.ProcessEnv = process.env) {
    this.logLevel = parseLogLevel(env.VULNERA_PROVISIONER_LOGLEVEL) ?? DEFAULT_LOG_LEVEL;
    const enableConsole = !!env.VULNERA_PROVISIONER_PRINT_LOGS;
    this.allowedLoggers = parseLoggerFilter(env.VULNERA_PROVISIONER_LOGGER);

    const filename = generateSessionFilename();
    log.transports.file.resolvePathFn = (): string => join(pathProvider.logsDir, filename);
    log.transports.file.level = this.logLevel;
    log.transports.file.format = LOG_FORMAT;

    log.transports.console.level = enableConsole ? this.logLevel : false;
    log.transports.console.format = LOG_FORMAT;
  }

  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const scope = log.scope(`[${name}]`);
    const logger = new FilteredLogger(new ElectronLogLogger(scope), this.allowedLoggers, name);
    this.loggers.set(name, logger);
    return logger;
  }

  dispose(): void {
    this.loggers.clear();
  }
}
