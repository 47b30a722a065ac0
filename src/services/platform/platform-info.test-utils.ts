/**
 * Test utilities for PlatformInfo.
 */
import type { PlatformInfo } from "./platform-info";

/**
 * Create a mock PlatformInfo.
 * Defaults to Linux x64 platform with test home directory.
 */
export function createMockPlatformInfo(overrides?: Partial<PlatformInfo>): PlatformInfo {
  return {
    platform: overrides?.platform ?? "linux",
    arch: overrides?.arch ?? "x64",
    homeDir: overrides?.homeDir ?? "/home/test",
  };
}
