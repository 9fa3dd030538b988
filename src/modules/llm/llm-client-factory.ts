/**
 * Builds the configured LlmClient, or null when the configured provider
 * cannot be used (no API key, provider "none").
 */

import { createLogger } from '../../utils/logger.js'
import type { LlmConfig } from '../config/config-schema.js'
import { ChatCompletionsClient } from './chat-completions-client.js'
import { CliLlmClient } from './cli-llm-client.js'
import type { LlmClient } from './types.js'

const logger = createLogger('llm:factory')

export function createLlmClient(
  config: LlmConfig,
  env: NodeJS.ProcessEnv = process.env
): LlmClient | null {
  switch (config.provider) {
    case 'none':
      return null
    case 'openai-compatible': {
      const apiKey = env[config.api_key_env]
      if (apiKey === undefined || apiKey.trim() === '') {
        logger.warn(
          { apiKeyEnv: config.api_key_env },
          'LLM API key variable is not set; evaluations will use placeholders'
        )
        return null
      }
      return new ChatCompletionsClient({
        baseUrl: config.base_url,
        model: config.model,
        apiKey,
        timeoutMs: config.timeout_ms,
      })
    }
    case 'claude-cli':
    case 'gemini-cli':
    case 'codex-cli':
      // `model` names an HTTP API model; agent CLIs keep their own default
      return new CliLlmClient({
        provider: config.provider,
        timeoutMs: config.timeout_ms,
        ...(config.cli_path !== undefined ? { cliPath: config.cli_path } : {}),
      })
  }
}
