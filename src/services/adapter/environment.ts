/**
 * Reading overrides from, and forwarding variables out of, the caller's
 * shell environment snapshot.
 */

import type { EnvKeyConfig } from "../config/types";
import type { EnvEntry, ShellEnv } from "./types";

/**
 * Value of the first entry named `key`, trimmed.
 * Null when the key is absent or its first value is blank; later duplicates
 * are not consulted.
 */
export function readOverride(shellEnv: ShellEnv, key: string): string | null {
  const entry = shellEnv.find(([name]) => name === key);
  if (!entry) {
    return null;
  }
  const value = entry[1].trim();
  return value === "" ? null : value;
}

/**
 * Environment for the spawned adapter: allow-listed entries with a non-blank
 * value, verbatim and in snapshot order, plus the default log filter when the
 * log-filter key was not forwarded.
 */
export function buildForwardedEnv(
  shellEnv: ShellEnv,
  keys: Pick<EnvKeyConfig, "forwarded" | "logFilter" | "defaultLogFilter">
): EnvEntry[] {
  const allowed = new Set(keys.forwarded);
  const env: EnvEntry[] = shellEnv.filter(
    ([name, value]) => allowed.has(name) && value.trim() !== ""
  );

  if (!env.some(([name]) => name === keys.logFilter)) {
    env.push([keys.logFilter, keys.defaultLogFilter]);
  }
  return env;
}

/**
 * Convert a `process.env`-style record to a snapshot, dropping unset keys.
 */
export function shellEnvFromRecord(record: Readonly<Record<string, string | undefined>>): ShellEnv {
  const env: EnvEntry[] = [];
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) {
      env.push([key, value]);
    }
  }
  return env;
}
