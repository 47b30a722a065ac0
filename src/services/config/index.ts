/**
 * Configuration service module.
 */

export { ConfigService, type ConfigServiceDeps } from "./config-service";
export {
  parseProvisionerConfig,
  parseProvisionerConfigOverrides,
  mergeProvisionerConfig,
} from "./schema";
export {
  type ProvisionerConfig,
  type ProvisionerConfigOverrides,
  type EnvKeyConfig,
  DEFAULT_PROVISIONER_CONFIG,
} from "./types";
