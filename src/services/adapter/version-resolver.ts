/**
 * Version resolver - picks the adapter version to run.
 *
 * Priority, first satisfied step wins:
 * 1. Explicit override (non-blank, trimmed)
 * 2. Cached latest version younger than the TTL
 * 3. Live release listing (persisted to the cache)
 * 4. Cached latest version of any age
 * 5. Floor version
 */

import type { Logger } from "../logging";
import { FailSafeLogger } from "../logging";
import type { LocalStateStore } from "./state-store";
import type { ReleaseSource } from "./release-source";

export interface VersionResolverDeps {
  readonly stateStore: LocalStateStore;
  readonly releaseSource: ReleaseSource;
  readonly logger: Logger;
  /** Returned when neither cache nor network provides a version. */
  readonly floorVersion: string;
}

export interface ResolveVersionOptions {
  readonly explicitOverride: string | null;
  /** Whole seconds since the Unix epoch. */
  readonly now: number;
  readonly cacheTtlSeconds: number;
}

/** Which step of the priority chain produced the version. */
export type VersionSource = "override" | "fresh-cache" | "network" | "stale-cache" | "floor";

export interface ResolvedVersion {
  readonly version: string;
  readonly source: VersionSource;
}

export class VersionResolver {
  private readonly stateStore: LocalStateStore;
  private readonly releaseSource: ReleaseSource;
  private readonly logger: Logger;
  private readonly floorVersion: string;

  constructor(deps: VersionResolverDeps) {
    this.stateStore = deps.stateStore;
    this.releaseSource = deps.releaseSource;
    this.logger = new FailSafeLogger(deps.logger);
    this.floorVersion = deps.floorVersion;
  }

  /**
   * Resolve the target version. Never fails.
   */
  async resolve(options: ResolveVersionOptions): Promise<string> {
    const { version } = await this.resolveWithSource(options);
    return version;
  }

  /**
   * Same as {@link resolve}, also reporting which step won.
   */
  async resolveWithSource(options: ResolveVersionOptions): Promise<ResolvedVersion> {
    const override = options.explicitOverride?.trim() ?? "";
    if (override !== "") {
      this.logger.info("Using version override", { version: override });
      return { version: override, source: "override" };
    }

    const cached = await this.stateStore.readLatestCache();
    if (cached) {
      const ageSeconds = Math.max(0, options.now - cached.fetchedAtSeconds);
      if (ageSeconds < options.cacheTtlSeconds) {
        this.logger.info("Using cached version", { version: cached.version, ageSeconds });
        return { version: cached.version, source: "fresh-cache" };
      }
      this.logger.debug("Cached version expired", { version: cached.version, ageSeconds });
    }

    const latest = await this.releaseSource.fetchLatestStableVersion();
    if (latest !== null) {
      const writeError = await this.stateStore.writeLatestCache(latest);
      if (writeError) {
        this.logger.warn("Could not cache latest version", { error: writeError.message });
      }
      this.logger.info("Using latest release", { version: latest });
      return { version: latest, source: "network" };
    }

    if (cached) {
      this.logger.warn("Release listing unavailable, using stale cached version", {
        version: cached.version,
      });
      return { version: cached.version, source: "stale-cache" };
    }

    this.logger.warn("Release listing unavailable and nothing cached, using floor version", {
      version: this.floorVersion,
    });
    return { version: this.floorVersion, source: "floor" };
  }
}
