/**
 * Logger doubles for service tests.
 */

import { vi, type Mock } from "vitest";
import type { Logger, LoggerName, LoggingService, LogContext } from "./types";

export interface MockLogger extends Logger {
  silly: Mock<(message: string, context?: LogContext) => void>;
  debug: Mock<(message: string, context?: LogContext) => void>;
  info: Mock<(message: string, context?: LogContext) => void>;
  warn: Mock<(message: string, context?: LogContext) => void>;
  error: Mock<(message: string, context?: LogContext, error?: Error) => void>;
}

export interface MockLoggingService extends LoggingService {
  createLogger: Mock<(name: LoggerName) => Logger>;
  dispose: Mock<() => void>;
  /** The logger handed out for `name`, if one was created. */
  getLogger(name: LoggerName): MockLogger | undefined;
}

function createMockLogger(): MockLogger {
  return {
    silly: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Logging service whose loggers are vitest spies, one per name.
 *
 * @example
 * const loggingService = createMockLoggingService();
 * const provisioner = await createAdapterProvisioner({ loggingService, ... });
 * await provisioner.resolveCommand({ shellEnv: [] });
 * expect(loggingService.getLogger("lifecycle")?.info).toHaveBeenCalled();
 */
export function createMockLoggingService(): MockLoggingService {
  const loggers = new Map<LoggerName, MockLogger>();

  return {
    createLogger: vi.fn((name: LoggerName): Logger => {
      const existing = loggers.get(name);
      if (existing) {
        return existing;
      }
      const logger = createMockLogger();
      loggers.set(name, logger);
      return logger;
    }),
    dispose: vi.fn(),
    getLogger(name: LoggerName): MockLogger | undefined {
      return loggers.get(name);
    },
  };
}

export function createSilentLogger(): Logger {
  return {
    silly: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}

// ============================================================================
// Behavioral Logger
// ============================================================================

export interface LoggedMessage {
  readonly level: "silly" | "debug" | "info" | "warn" | "error";
  readonly message: string;
  readonly context?: LogContext | undefined;
}

export interface BehavioralLogger extends Logger {
  getMessages(): readonly LoggedMessage[];
  getMessagesByLevel(level: LoggedMessage["level"]): readonly LoggedMessage[];
}

/**
 * Logger that stores what was logged, for asserting on messages rather than
 * on call counts.
 *
 * @example
 * const logger = createBehavioralLogger();
 * const store = new FileLocalStateStore({ ..., logger });
 *
 * await store.writeInstalledVersion("0.2.0");
 *
 * expect(logger.getMessagesByLevel("debug")).toEqual([
 *   {
 *     level: "debug",
 *     message: "State written",
 *     context: { path: "/data/server/installed-version.txt", value: "0.2.0" },
 *   },
 * ]);
 */
export function createBehavioralLogger(): BehavioralLogger {
  const messages: LoggedMessage[] = [];
  const record =
    (level: LoggedMessage["level"]) =>
    (message: string, context?: LogContext): void => {
      messages.push({ level, message, context });
    };

  return {
    silly: record("silly"),
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    getMessages: () => [...messages],
    getMessagesByLevel: (level) => messages.filter((m) => m.level === level),
  };
}

/**
 * Logger whose every method throws.
 * Used to verify that logging failures never change a result.
 */
export function createThrowingLogger(message = "logger unavailable"): Logger {
  const fail = (): never => {
    throw new Error(message);
  };
  return { silly: fail, debug: fail, info: fail, warn: fail, error: fail };
}
