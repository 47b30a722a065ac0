/**
 * Tests for ConfigService.
 */

import { describe, it, expect } from "vitest";
import { ConfigService } from "./config-service";
import { DEFAULT_PROVISIONER_CONFIG } from "./types";
import { ConfigError } from "../errors";
import { createFileSystemMock, directory, file } from "../platform/filesystem.state-mock";
import { createMockPathProvider } from "../platform/path-provider.test-utils";
import { createBehavioralLogger } from "../logging/logging.test-utils";
import type { Entry } from "../platform/filesystem.state-mock";

const CONFIG_PATH = "/test/app-data/provisioner.json";

function createService(entries: Record<string, Entry> = { "/test/app-data": directory() }) {
  const fileSystem = createFileSystemMock({ entries });
  const logger = createBehavioralLogger();
  const service = new ConfigService({
    fileSystem,
    pathProvider: createMockPathProvider(),
    logger,
  });
  return { service, logger, fileSystem };
}

describe("ConfigService", () => {
  it("returns defaults when the config file is missing", async () => {
    const { service, logger } = createService();

    const config = await service.load();

    expect(config).toEqual(DEFAULT_PROVISIONER_CONFIG);
    expect(logger.getMessagesByLevel("debug")).toContainEqual({
      level: "debug",
      message: "Config file not found, using defaults",
      context: { path: CONFIG_PATH },
    });
  });

  it("applies values from the config file", async () => {
    const { service } = createService({
      [CONFIG_PATH]: file(JSON.stringify({ cacheTtlSeconds: 3600, env: { defaultLogFilter: "warn" } })),
    });

    const config = await service.load();

    expect(config.cacheTtlSeconds).toBe(3600);
    expect(config.env.defaultLogFilter).toBe("warn");
    expect(config.repository).toBe(DEFAULT_PROVISIONER_CONFIG.repository);
  });

  it("applies caller overrides over the config file", async () => {
    const { service } = createService({
      [CONFIG_PATH]: file(JSON.stringify({ tagPrefix: "file-v", cacheTtlSeconds: 10 })),
    });

    const config = await service.load({ tagPrefix: "caller-v" });

    expect(config.tagPrefix).toBe("caller-v");
    expect(config.cacheTtlSeconds).toBe(10);
  });

  it("ignores a config file with invalid JSON", async () => {
    const { service, logger } = createService({ [CONFIG_PATH]: file("{ not json") });

    const config = await service.load();

    expect(config).toEqual(DEFAULT_PROVISIONER_CONFIG);
    const warnings = logger.getMessagesByLevel("warn");
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.message).toBe("Config file invalid, using defaults");
    expect(warnings[0]?.context?.path).toBe(CONFIG_PATH);
  });

  it("ignores a config file with unknown keys", async () => {
    const { service, logger } = createService({
      [CONFIG_PATH]: file(JSON.stringify({ cacheTtlSeconds: 5, mirror: "https://example.test" })),
    });

    const config = await service.load();

    expect(config.cacheTtlSeconds).toBe(DEFAULT_PROVISIONER_CONFIG.cacheTtlSeconds);
    expect(logger.getMessagesByLevel("warn")).toEqual([
      {
        level: "warn",
        message: "Config file invalid, using defaults",
        context: {
          path: CONFIG_PATH,
          error: "Invalid provisioner overrides: Unrecognized key(s) in object: 'mirror'",
        },
      },
    ]);
  });

  it("ignores a config file whose values fail validation", async () => {
    const { service, logger } = createService({
      [CONFIG_PATH]: file(JSON.stringify({ repository: "no-owner" })),
    });

    const config = await service.load();

    expect(config.repository).toBe(DEFAULT_PROVISIONER_CONFIG.repository);
    expect(logger.getMessagesByLevel("warn")[0]?.message).toBe(
      "Config file invalid, using defaults"
    );
  });

  it("warns and uses defaults when the config file is unreadable", async () => {
    const { service, logger } = createService({
      [CONFIG_PATH]: file("{}", { error: "EACCES" }),
    });

    const config = await service.load();

    expect(config).toEqual(DEFAULT_PROVISIONER_CONFIG);
    expect(logger.getMessagesByLevel("warn")).toEqual([
      {
        level: "warn",
        message: "Config file unreadable, using defaults",
        context: { path: CONFIG_PATH, error: "Mock error: EACCES" },
      },
    ]);
  });

  it("throws ConfigError for invalid caller overrides", async () => {
    const { service } = createService();

    await expect(service.load({ cacheTtlSeconds: -5 })).rejects.toThrow(ConfigError);
  });

  it("does not modify the filesystem", async () => {
    const { service, fileSystem } = createService({
      [CONFIG_PATH]: file(JSON.stringify({ cacheTtlSeconds: 1 })),
    });
    const snapshot = fileSystem.$.snapshot();

    await service.load();

    expect(fileSystem).toBeUnchanged(snapshot);
  });
});
