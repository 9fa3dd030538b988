/**
 * fact-check module: statement lookups through a search collaborator
 */

export type { SearchClient, SearchResult, SearchOptions, SearchDepth, FactCheckRecord } from './types.js'
export { TavilySearchClient, UNKNOWN_SOURCE_TITLE } from './tavily-search-client.js'
export type { TavilySearchClientOptions } from './tavily-search-client.js'
export { createSearchClient } from './search-client-factory.js'
export {
  FactCheckAdapter,
  createFactCheckAdapter,
  formatFactCheck,
  formatResearchContext,
  NO_RESULTS_MESSAGE,
  FACT_CHECK_ERROR_MESSAGE,
} from './fact-check-adapter.js'
export type { FactCheckAdapterOptions } from './fact-check-adapter.js'
