/**
 * Configuration types for the provisioner.
 *
 * Defaults target the Vulnera adapter published on GitHub releases. Every value
 * can be overridden programmatically or through `<dataRoot>/provisioner.json`.
 */

/**
 * Names of the environment variables read from, or forwarded out of, the
 * caller's shell environment snapshot.
 */
export interface EnvKeyConfig {
  /** Full path to a self-provided adapter; bypasses resolution and installation. */
  readonly pathOverride: string;
  /** Version pin; skips cache and network. */
  readonly versionOverride: string;
  /** Keys copied to the adapter's environment when their value is non-blank. */
  readonly forwarded: readonly string[];
  /** Log-filter key injected with `defaultLogFilter` when the caller did not set it. */
  readonly logFilter: string;
  readonly defaultLogFilter: string;
}

export interface ProvisionerConfig {
  /** GitHub repository in `owner/name` form. */
  readonly repository: string;
  /** Base name of the executable and of the release assets. */
  readonly artifactName: string;
  /** Prefix of release tags belonging to the adapter (e.g. `adapter-v0.2.0`). */
  readonly tagPrefix: string;
  /** Version used when neither cache nor network can provide one. */
  readonly floorVersion: string;
  /** Age in seconds below which a cached latest version is used without a network call. */
  readonly cacheTtlSeconds: number;
  /** User-Agent sent to the release API. */
  readonly userAgent: string;
  /** Timeout of the release-listing request, ms. */
  readonly releaseListTimeoutMs: number;
  /** Timeout of the binary download, ms. */
  readonly downloadTimeoutMs: number;
  readonly env: EnvKeyConfig;
}

/**
 * Partial configuration accepted from callers and from the settings file.
 */
export type ProvisionerConfigOverrides = {
  readonly [K in Exclude<keyof ProvisionerConfig, "env">]?: ProvisionerConfig[K] | undefined;
} & {
  readonly env?: { readonly [K in keyof EnvKeyConfig]?: EnvKeyConfig[K] | undefined } | undefined;
};

export const DEFAULT_PROVISIONER_CONFIG: ProvisionerConfig = {
  repository: "vulnera-rs/adapter",
  artifactName: "vulnera-adapter",
  tagPrefix: "adapter-v",
  floorVersion: "0.1.1",
  cacheTtlSeconds: 24 * 60 * 60,
  userAgent: "vulnera-adapter-provisioner",
  releaseListTimeoutMs: 15_000,
  downloadTimeoutMs: 300_000,
  env: {
    pathOverride: "VULNERA_ADAPTER_PATH",
    versionOverride: "VULNERA_ADAPTER_VERSION",
    forwarded: ["VULNERA_API_URL", "VULNERA_API_KEY", "VULNERA_LOG"],
    logFilter: "VULNERA_LOG",
    defaultLogFilter: "info",
  },
};
