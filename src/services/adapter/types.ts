/**
 * Types shared by the adapter provisioning services.
 */

/** Operating systems with prebuilt adapter releases (Node.js `process.platform` names). */
export type SupportedOs = "linux" | "darwin" | "win32";

/** CPU architectures with prebuilt adapter releases (Node.js `process.arch` names). */
export type SupportedArch = "x64" | "arm64";

/**
 * Fixed description of the release asset and local executable for one platform.
 */
export interface PlatformDescriptor {
  readonly os: SupportedOs;
  readonly arch: SupportedArch;
  /** Target triple used in asset names, e.g. `x86_64-unknown-linux-gnu`. */
  readonly targetTriple: string;
  /** Release asset file name, e.g. `vulnera-adapter-x86_64-unknown-linux-gnu`. */
  readonly assetName: string;
  /** Local executable file name, `<artifact>` or `<artifact>.exe`. */
  readonly executableName: string;
  /** Native Windows executable: no executable bit to set. */
  readonly isWindows: boolean;
}

/**
 * Host OS/architecture as reported by the runtime. Unvalidated.
 */
export interface HostPlatform {
  readonly platform: string;
  readonly arch: string;
}

/**
 * Latest known release version together with the time it was fetched.
 */
export interface CachedVersion {
  readonly version: string;
  /** Whole seconds since the Unix epoch; 0 when unknown. */
  readonly fetchedAtSeconds: number;
}

/** One environment variable as a `[key, value]` pair. */
export type EnvEntry = readonly [key: string, value: string];

/**
 * Snapshot of the caller's shell environment, in the caller's order.
 * Keys may repeat; the first occurrence wins.
 */
export type ShellEnv = readonly EnvEntry[];

/**
 * Command the host spawns to start the adapter.
 * The host wires stdio for the adapter's line-oriented protocol.
 */
export interface ResolvedCommand {
  readonly command: string;
  /** Always empty; the adapter takes no arguments. */
  readonly args: readonly string[];
  readonly env: readonly EnvEntry[];
}
