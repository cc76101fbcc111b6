/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, deepMerge, ENV_VAR_MAP } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  PatchwardenConfigSchema,
  PartialPatchwardenConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  ApprovalConfig,
  GithubConfig,
  IntegrationsConfig,
  JiraConfig,
  MergeGateConfig,
  PartialPatchwardenConfig,
  PatchwardenConfig,
  PipelineConfig,
  ProviderMode,
  RetryConfig,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
export { mergePolicyFromConfig } from './policy.js'
