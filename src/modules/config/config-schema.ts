/**
 * Zod validation schemas for the rostrum configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - llm (evaluation model)
 *  - fact_check (search service)
 *  - full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// LLM settings
// ---------------------------------------------------------------------------

export const LlmProviderSchema = z.enum([
  'openai-compatible',
  'claude-cli',
  'gemini-cli',
  'codex-cli',
  'none',
])
export type LlmProvider = z.infer<typeof LlmProviderSchema>

export const LlmConfigSchema = z
  .object({
    provider: LlmProviderSchema,
    /** API root of an OpenAI-compatible service */
    base_url: z.string().url(),
    model: z.string().min(1),
    /** Name of the environment variable that holds the API key */
    api_key_env: z.string().min(1),
    temperature: z.number().min(0).max(2),
    max_tokens: z.number().int().positive(),
    top_p: z.number().gt(0).max(1),
    timeout_ms: z.number().int().positive(),
    /** Path to the agent CLI binary for *-cli providers */
    cli_path: z.string().optional(),
  })
  .strict()

export type LlmConfig = z.infer<typeof LlmConfigSchema>

// ---------------------------------------------------------------------------
// Fact-check settings
// ---------------------------------------------------------------------------

export const FactCheckConfigSchema = z
  .object({
    enabled: z.boolean(),
    provider: z.literal('tavily'),
    base_url: z.string().url(),
    /** Name of the environment variable that holds the API key */
    api_key_env: z.string().min(1),
    max_results: z.number().int().min(1).max(20),
    /** Characters of each source's content kept in a fact-check */
    snippet_length: z.number().int().positive(),
    timeout_ms: z.number().int().positive(),
  })
  .strict()

export type FactCheckConfig = z.infer<typeof FactCheckConfigSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

/** All config format versions this tool can read and validate */
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

/** `config_format_version: 1` written unquoted in YAML loads as a number */
const ConfigFormatVersionSchema = z.preprocess(
  (value) => (typeof value === 'number' ? String(value) : value),
  z.literal('1')
)

export const RostrumConfigSchema = z
  .object({
    config_format_version: ConfigFormatVersionSchema,
    global: GlobalSettingsSchema,
    llm: LlmConfigSchema,
    fact_check: FactCheckConfigSchema,
  })
  .strict()

export type RostrumConfig = z.infer<typeof RostrumConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (a single file or overlay before merging)
// ---------------------------------------------------------------------------

export const PartialRostrumConfigSchema = z
  .object({
    config_format_version: ConfigFormatVersionSchema.optional(),
    global: GlobalSettingsSchema.partial().optional(),
    llm: LlmConfigSchema.partial().optional(),
    fact_check: FactCheckConfigSchema.partial().optional(),
  })
  .strict()

export type PartialRostrumConfig = z.infer<typeof PartialRostrumConfigSchema>
