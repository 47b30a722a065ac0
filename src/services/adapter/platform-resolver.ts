/**
 * Maps a host OS/architecture pair to the adapter's release asset.
 */

import { UnsupportedPlatformError } from "../errors";
import { DEFAULT_PROVISIONER_CONFIG } from "../config/types";
import type { PlatformDescriptor, SupportedArch, SupportedOs } from "./types";

interface SupportedTarget {
  readonly os: SupportedOs;
  readonly arch: SupportedArch;
  readonly targetTriple: string;
}

const SUPPORTED_TARGETS: readonly SupportedTarget[] = [
  { os: "linux", arch: "x64", targetTriple: "x86_64-unknown-linux-gnu" },
  { os: "linux", arch: "arm64", targetTriple: "aarch64-unknown-linux-gnu" },
  { os: "darwin", arch: "x64", targetTriple: "x86_64-apple-darwin" },
  { os: "darwin", arch: "arm64", targetTriple: "aarch64-apple-darwin" },
  { os: "win32", arch: "x64", targetTriple: "x86_64-pc-windows-msvc" },
];

export interface ResolvePlatformOptions {
  /** Base name of the executable and release assets. */
  readonly artifactName?: string;
  /** Environment variable named in the unsupported-platform message. */
  readonly pathOverrideKey?: string;
}

/**
 * All OS/architecture pairs with a prebuilt adapter.
 */
export function listSupportedPlatforms(): readonly { os: SupportedOs; arch: SupportedArch }[] {
  return SUPPORTED_TARGETS.map(({ os, arch }) => ({ os, arch }));
}

/**
 * Resolve the platform descriptor for an OS/architecture pair.
 *
 * @param os - Node.js platform name (`process.platform`)
 * @param arch - Node.js architecture name (`process.arch`)
 * @throws UnsupportedPlatformError for any pair without a prebuilt adapter
 *
 * @example
 * resolvePlatform("linux", "x64").assetName
 * // "vulnera-adapter-x86_64-unknown-linux-gnu"
 */
export function resolvePlatform(
  os: string,
  arch: string,
  options: ResolvePlatformOptions = {}
): PlatformDescriptor {
  const artifactName = options.artifactName ?? DEFAULT_PROVISIONER_CONFIG.artifactName;
  const target = SUPPORTED_TARGETS.find((entry) => entry.os === os && entry.arch === arch);

  if (!target) {
    throw new UnsupportedPlatformError(
      os,
      arch,
      artifactName,
      options.pathOverrideKey ?? DEFAULT_PROVISIONER_CONFIG.env.pathOverride
    );
  }

  const isWindows = target.os === "win32";
  const suffix = isWindows ? ".exe" : "";
  return {
    os: target.os,
    arch: target.arch,
    targetTriple: target.targetTriple,
    assetName: `${artifactName}-${target.targetTriple}${suffix}`,
    executableName: `${artifactName}${suffix}`,
    isWindows,
  };
}
