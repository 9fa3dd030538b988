/**
 * Built-in default values for the rostrum configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type { FactCheckConfig, GlobalSettings, LlmConfig, RostrumConfig } from './config-schema.js'

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'info',
}

export const DEFAULT_LLM_CONFIG: LlmConfig = {
  provider: 'openai-compatible',
  base_url: 'https://api.groq.com/openai/v1',
  model: 'llama3-8b-8192',
  api_key_env: 'GROQ_API_KEY',
  temperature: 0.2,
  max_tokens: 1000,
  top_p: 0.9,
  timeout_ms: 60_000,
}

export const DEFAULT_FACT_CHECK_CONFIG: FactCheckConfig = {
  enabled: false,
  provider: 'tavily',
  base_url: 'https://api.tavily.com',
  api_key_env: 'TAVILY_API_KEY',
  max_results: 3,
  snippet_length: 250,
  timeout_ms: 30_000,
}

export const DEFAULT_CONFIG: RostrumConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  llm: DEFAULT_LLM_CONFIG,
  fact_check: DEFAULT_FACT_CHECK_CONFIG,
}
