/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  RostrumConfigSchema,
  PartialRostrumConfigSchema,
  LlmConfigSchema,
  FactCheckConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  RostrumConfig,
  PartialRostrumConfig,
  LlmConfig,
  LlmProvider,
  FactCheckConfig,
  GlobalSettings,
} from './config-schema.js'
export { DEFAULT_CONFIG, DEFAULT_LLM_CONFIG, DEFAULT_FACT_CHECK_CONFIG } from './defaults.js'
