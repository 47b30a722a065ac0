/**
 * Tests for the version priority chain.
 */

import { describe, it, expect, vi } from "vitest";
import { VersionResolver, type ResolvedVersion } from "./version-resolver";
import { FileLocalStateStore } from "./state-store";
import type { ReleaseSource } from "./release-source";
import {
  createFileSystemMock,
  directory,
  file,
  type Entry,
} from "../platform/filesystem.state-mock";
import { ManualClock } from "../platform/clock.test-utils";
import {
  createBehavioralLogger,
  createSilentLogger,
  createThrowingLogger,
} from "../logging/logging.test-utils";
import type { Logger } from "../logging";

const NOW = 1_700_000_000;
const TTL = 60;
const CACHED_VERSION_PATH = "/data/server/cached-version.txt";
const CACHED_TIMESTAMP_PATH = "/data/server/cached-version-timestamp.txt";

function cacheEntries(version: string, fetchedAt: number): Record<string, Entry> {
  return {
    [CACHED_VERSION_PATH]: file(version),
    [CACHED_TIMESTAMP_PATH]: file(String(fetchedAt)),
  };
}

function createResolver(options: {
  entries?: Record<string, Entry>;
  latest?: string | null;
  logger?: Logger;
  storeLogger?: Logger;
}) {
  const fileSystem = createFileSystemMock({ entries: options.entries ?? {} });
  const stateStore = new FileLocalStateStore({
    fileSystem,
    installDir: "/data/server",
    clock: new ManualClock(NOW),
    logger: options.storeLogger ?? createSilentLogger(),
  });
  const latest = options.latest === undefined ? null : options.latest;
  const fetchLatestStableVersion = vi.fn(async (): Promise<string | null> => latest);
  const releaseSource: ReleaseSource = { fetchLatestStableVersion };
  const logger = options.logger ?? createBehavioralLogger();
  const resolver = new VersionResolver({
    stateStore,
    releaseSource,
    logger,
    floorVersion: "0.1.1",
  });
  return { resolver, fileSystem, fetchLatestStableVersion };
}

const defaults = { explicitOverride: null, now: NOW, cacheTtlSeconds: TTL };

describe("VersionResolver", () => {
  describe("explicit override", () => {
    it("wins over cache and network", async () => {
      const { resolver, fetchLatestStableVersion } = createResolver({
        entries: cacheEntries("0.2.0", NOW - 10),
        latest: "0.3.0",
      });

      const version = await resolver.resolve({ ...defaults, explicitOverride: "  0.9.0 \n" });

      expect(version).toBe("0.9.0");
      expect(fetchLatestStableVersion).not.toHaveBeenCalled();
    });

    it("is ignored when blank", async () => {
      const { resolver } = createResolver({ entries: cacheEntries("0.2.0", NOW - 10) });

      expect(await resolver.resolve({ ...defaults, explicitOverride: "   " })).toBe("0.2.0");
    });

    it("is returned without validation", async () => {
      const { resolver } = createResolver({});

      expect(await resolver.resolve({ ...defaults, explicitOverride: "not-a-version" })).toBe(
        "not-a-version"
      );
    });
  });

  describe("cache", () => {
    it("uses a fresh cache without touching the network", async () => {
      const { resolver, fetchLatestStableVersion } = createResolver({
        entries: cacheEntries("0.2.0", NOW - (TTL - 1)),
        latest: "0.3.0",
      });

      expect(await resolver.resolve(defaults)).toBe("0.2.0");
      expect(fetchLatestStableVersion).not.toHaveBeenCalled();
    });

    it("treats a cache exactly TTL seconds old as expired", async () => {
      const { resolver, fetchLatestStableVersion } = createResolver({
        entries: cacheEntries("0.2.0", NOW - TTL),
        latest: "0.3.0",
      });

      expect(await resolver.resolve(defaults)).toBe("0.3.0");
      expect(fetchLatestStableVersion).toHaveBeenCalledTimes(1);
    });

    it("treats a timestamp in the future as fresh", async () => {
      const { resolver } = createResolver({
        entries: cacheEntries("0.2.0", NOW + 3600),
        latest: "0.3.0",
      });

      expect(await resolver.resolve(defaults)).toBe("0.2.0");
    });

    it("treats a cache without timestamp as expired", async () => {
      const { resolver } = createResolver({
        entries: { [CACHED_VERSION_PATH]: file("0.2.0") },
        latest: "0.3.0",
      });

      expect(await resolver.resolve(defaults)).toBe("0.3.0");
    });

    it("always refetches with a zero TTL", async () => {
      const { resolver, fetchLatestStableVersion } = createResolver({
        entries: cacheEntries("0.2.0", NOW),
        latest: "0.3.0",
      });

      expect(await resolver.resolve({ ...defaults, cacheTtlSeconds: 0 })).toBe("0.3.0");
      expect(fetchLatestStableVersion).toHaveBeenCalledTimes(1);
    });
  });

  describe("network", () => {
    it("persists a fetched version with the current time", async () => {
      const { resolver, fileSystem } = createResolver({
        entries: cacheEntries("0.2.0", NOW - 3600),
        latest: "0.3.0",
      });

      expect(await resolver.resolve(defaults)).toBe("0.3.0");
      expect(fileSystem).toHaveFile(CACHED_VERSION_PATH, "0.3.0");
      expect(fileSystem).toHaveFile(CACHED_TIMESTAMP_PATH, String(NOW));
    });

    it("returns the fetched version when the cache write fails", async () => {
      const logger = createBehavioralLogger();
      const { resolver } = createResolver({
        entries: { "/data/server": directory({ error: "EACCES" }) },
        latest: "0.3.0",
        logger,
      });

      expect(await resolver.resolve(defaults)).toBe("0.3.0");
      expect(logger.getMessagesByLevel("warn")).toEqual([
        {
          level: "warn",
          message: "Could not cache latest version",
          context: { error: "Failed to write cached-version.txt: Mock error: EACCES" },
        },
      ]);
    });
  });

  describe("fallbacks", () => {
    it("returns an expired cached version when the fetch fails", async () => {
      const { resolver } = createResolver({
        entries: cacheEntries("0.2.0", NOW - 86_400 * 30),
        latest: null,
      });

      expect(await resolver.resolve(defaults)).toBe("0.2.0");
    });

    it("returns the floor version when nothing is cached and the fetch fails", async () => {
      const { resolver, fileSystem } = createResolver({ latest: null });
      const snapshot = fileSystem.$.snapshot();

      expect(await resolver.resolve(defaults)).toBe("0.1.1");
      expect(fileSystem).toBeUnchanged(snapshot);
    });
  });

  describe("resolveWithSource", () => {
    interface SourceCase {
      readonly expected: ResolvedVersion;
      readonly explicitOverride: string | null;
      readonly entries: Record<string, Entry>;
      readonly latest: string | null;
    }

    it.each<SourceCase>([
      {
        expected: { version: "1.0.0", source: "override" },
        explicitOverride: "1.0.0",
        entries: {},
        latest: null,
      },
      {
        expected: { version: "0.2.0", source: "fresh-cache" },
        explicitOverride: null,
        entries: cacheEntries("0.2.0", NOW),
        latest: null,
      },
      {
        expected: { version: "0.3.0", source: "network" },
        explicitOverride: null,
        entries: {},
        latest: "0.3.0",
      },
      {
        expected: { version: "0.2.0", source: "stale-cache" },
        explicitOverride: null,
        entries: cacheEntries("0.2.0", 0),
        latest: null,
      },
      {
        expected: { version: "0.1.1", source: "floor" },
        explicitOverride: null,
        entries: {},
        latest: null,
      },
    ])("reports $expected.source", async ({ expected, explicitOverride, entries, latest }) => {
      const { resolver } = createResolver({ entries, latest });

      expect(await resolver.resolveWithSource({ ...defaults, explicitOverride })).toEqual(expected);
    });
  });

  describe("logging", () => {
    it("logs the branch taken", async () => {
      const logger = createBehavioralLogger();
      const { resolver } = createResolver({ entries: cacheEntries("0.2.0", NOW - 5), logger });

      await resolver.resolve(defaults);

      expect(logger.getMessagesByLevel("info")).toEqual([
        {
          level: "info",
          message: "Using cached version",
          context: { version: "0.2.0", ageSeconds: 5 },
        },
      ]);
    });

    it("returns the same version when the logger throws", async () => {
      vi.spyOn(process.stderr, "write").mockReturnValue(true);
      const { resolver } = createResolver({
        entries: cacheEntries("0.2.0", 0),
        latest: null,
        logger: createThrowingLogger(),
      });

      expect(await resolver.resolve(defaults)).toBe("0.2.0");
    });

    it("caches the network result when the state store's logger throws", async () => {
      vi.spyOn(process.stderr, "write").mockReturnValue(true);
      const { resolver, fileSystem } = createResolver({
        latest: "0.3.0",
        logger: createThrowingLogger(),
        storeLogger: createThrowingLogger(),
      });

      expect(await resolver.resolve(defaults)).toBe("0.3.0");
      expect(fileSystem).toHaveFile(CACHED_VERSION_PATH, "0.3.0");
      expect(fileSystem).toHaveFile(CACHED_TIMESTAMP_PATH, String(NOW));
    });
  });
});
