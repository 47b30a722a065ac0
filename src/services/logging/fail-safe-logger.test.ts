import { describe, it, expect, vi } from "vitest";
import { FailSafeLogger, FailSafeLoggingService } from "./fail-safe-logger";
import {
  createBehavioralLogger,
  createMockLoggingService,
  createThrowingLogger,
} from "./logging.test-utils";

describe("FailSafeLogger", () => {
  it("forwards messages to the wrapped logger", () => {
    const inner = createBehavioralLogger();
    const logger = new FailSafeLogger(inner, vi.fn());

    logger.info("Resolved", { version: "0.2.0" });
    logger.warn("Stale cache");

    expect(inner.getMessages()).toEqual([
      { level: "info", message: "Resolved", context: { version: "0.2.0" } },
      { level: "warn", message: "Stale cache", context: undefined },
    ]);
  });

  it("reports failures of the wrapped logger to the fallback instead of throwing", () => {
    const fallback = vi.fn();
    const logger = new FailSafeLogger(createThrowingLogger("disk full"), fallback);

    expect(() => logger.error("Install failed", { stage: "download" })).not.toThrow();
    expect(fallback).toHaveBeenCalledWith("[error] Install failed (logger failed: disk full)");
  });

  it("guards every level", () => {
    const fallback = vi.fn();
    const logger = new FailSafeLogger(createThrowingLogger(), fallback);

    logger.silly("a");
    logger.debug("b");
    logger.info("c");
    logger.warn("d");
    logger.error("e");

    expect(fallback).toHaveBeenCalledTimes(5);
  });
});

describe("FailSafeLoggingService", () => {
  it("wraps loggers from the inner service", () => {
    const inner = createMockLoggingService();
    const service = new FailSafeLoggingService(inner, vi.fn());

    const logger = service.createLogger("installer");
    logger.info("Downloading");

    expect(inner.getLogger("installer")?.info).toHaveBeenCalledWith("Downloading", undefined);
  });

  it("delegates dispose", () => {
    const inner = createMockLoggingService();
    new FailSafeLoggingService(inner, vi.fn()).dispose();

    expect(inner.dispose).toHaveBeenCalledTimes(1);
  });
});
