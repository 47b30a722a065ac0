/**
 * Logger wrapper that keeps logging failures out of the calling code.
 *
 * A logger that throws (full disk, closed stream, faulty transport) must not
 * change the outcome of a resolution. Failures are reported once per message
 * on the fallback stream instead.
 */

import { getErrorMessage } from "../../shared/error-utils";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types";

/** Destination for failures of the wrapped logger. */
export type FallbackWriter = (line: string) => void;

const writeToStderr: FallbackWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

export class FailSafeLogger implements Logger {
  constructor(
    private readonly inner: Logger,
    private readonly fallback: FallbackWriter = writeToStderr
  ) {}

  silly(message: string, context?: LogContext): void {
    this.guard("silly", message, () => this.inner.silly(message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.guard("debug", message, () => this.inner.debug(message, context));
  }

  info(message: string, context?: LogContext): void {
    this.guard("info", message, () => this.inner.info(message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.guard("warn", message, () => this.inner.warn(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.guard("error", message, () => this.inner.error(message, context, error));
  }

  private guard(level: LogLevel, message: string, write: () => void): void {
    try {
      write();
    } catch (error) {
      this.fallback(`[${level}] ${message} (logger failed: ${getErrorMessage(error)})`);
    }
  }
}

/**
 * Wrap every logger a service hands out in a FailSafeLogger.
 */
export class FailSafeLoggingService implements LoggingService {
  constructor(
    private readonly inner: LoggingService,
    private readonly fallback: FallbackWriter = writeToStderr
  ) {}

  createLogger(name: LoggerName): Logger {
    return new FailSafeLogger(this.inner.createLogger(name), this.fallback);
  }

  dispose(): void {
    this.inner.dispose();
  }
}
