/**
 * Builds the configured SearchClient, or null when fact-checking is disabled
 * or its API key variable is unset.
 */

import { createLogger } from '../../utils/logger.js'
import type { FactCheckConfig } from '../config/config-schema.js'
import { TavilySearchClient } from './tavily-search-client.js'
import type { SearchClient } from './types.js'

const logger = createLogger('fact-check:factory')

export function createSearchClient(
  config: FactCheckConfig,
  env: NodeJS.ProcessEnv = process.env
): SearchClient | null {
  if (!config.enabled) return null

  const apiKey = env[config.api_key_env]
  if (apiKey === undefined || apiKey.trim() === '') {
    logger.warn({ apiKeyEnv: config.api_key_env }, 'Search API key variable is not set; fact-checking disabled')
    return null
  }

  return new TavilySearchClient({
    baseUrl: config.base_url,
    apiKey,
    timeoutMs: config.timeout_ms,
  })
}
