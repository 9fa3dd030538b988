/**
 * Type definitions for the fact-check module.
 */

import type { TurnNumber } from '../../core/types.js'

/** One source returned by a search collaborator */
export interface SearchResult {
  title: string
  url: string
  content: string
}

export type SearchDepth = 'basic' | 'advanced'

export interface SearchOptions {
  maxResults: number
  searchDepth: SearchDepth
}

/**
 * A web search service.
 *
 * Implementations reject with CollaboratorFailureError on network, auth or
 * timeout errors.
 */
export interface SearchClient {
  readonly id: string
  search(query: string, options: SearchOptions): Promise<SearchResult[]>
}

/** One successful fact-check search, kept in session order */
export interface FactCheckRecord {
  readonly turn: TurnNumber
  readonly statement: string
  readonly results: readonly SearchResult[]
}
