/**
 * Zod schemas for provisioner configuration.
 */

import { z } from "zod";
import { ConfigError } from "../errors";
import type { ProvisionerConfig, ProvisionerConfigOverrides } from "./types";

const envKeySchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, { message: "Must be a valid environment variable name" });

const envKeyConfigSchema = z.object({
  pathOverride: envKeySchema,
  versionOverride: envKeySchema,
  forwarded: z.array(envKeySchema),
  logFilter: envKeySchema,
  defaultLogFilter: z.string().min(1),
});

const positiveMillisSchema = z.number().int().positive();

export const provisionerConfigSchema = z.object({
  repository: z
    .string()
    .regex(/^[\w.-]+\/[\w.-]+$/, { message: "Must be a GitHub repository as owner/name" }),
  artifactName: z.string().regex(/^[\w.-]+$/, { message: "Must be a plain file name" }),
  tagPrefix: z.string().min(1),
  floorVersion: z.string().trim().min(1),
  cacheTtlSeconds: z.number().int().nonnegative(),
  userAgent: z.string().min(1),
  releaseListTimeoutMs: positiveMillisSchema,
  downloadTimeoutMs: positiveMillisSchema,
  env: envKeyConfigSchema,
});

export const provisionerConfigOverridesSchema = provisionerConfigSchema
  .extend({ env: envKeyConfigSchema.partial().strict() })
  .partial()
  .strict();

function describeIssues(issues: readonly z.ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a complete configuration.
 *
 * @throws ConfigError listing every issue
 */
export function parseProvisionerConfig(input: unknown): ProvisionerConfig {
  const result = provisionerConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = describeIssues(result.error.issues);
    throw new ConfigError(`Invalid provisioner configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/**
 * Validate partial overrides (settings file or caller options).
 *
 * @throws ConfigError listing every issue, including unknown keys
 */
export function parseProvisionerConfigOverrides(input: unknown): ProvisionerConfigOverrides {
  const result = provisionerConfigOverridesSchema.safeParse(input);
  if (!result.success) {
    const issues = describeIssues(result.error.issues);
    throw new ConfigError(`Invalid provisioner overrides: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/**
 * Layer overrides onto a base configuration and validate the result.
 * Keys set to undefined keep the value from the layer below.
 *
 * @throws ConfigError if the merged configuration is invalid
 */
export function mergeProvisionerConfig(
  base: ProvisionerConfig,
  ...layers: readonly ProvisionerConfigOverrides[]
): ProvisionerConfig {
  let top: Record<string, unknown> = { ...base };
  let env: Record<string, unknown> = { ...base.env };
  for (const layer of layers) {
    const { env: layerEnv, ...rest } = layer;
    top = { ...top, ...definedEntries(rest) };
    env = { ...env, ...definedEntries(layerEnv ?? {}) };
  }
  return parseProvisionerConfig({ ...top, env });
}

function definedEntries(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));
}
