/**
 * TavilySearchClient: SearchClient backed by the Tavily search API.
 */

import { z } from 'zod'
import { CollaboratorFailureError } from '../../core/errors.js'
import { postJson } from '../../utils/http.js'
import { createLogger } from '../../utils/logger.js'
import type { SearchClient, SearchOptions, SearchResult } from './types.js'

const logger = createLogger('fact-check:tavily')

/** Title used for sources the service returns without one */
export const UNKNOWN_SOURCE_TITLE = 'Unknown source'

const TavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().nullish(),
      url: z.string().nullish(),
      content: z.string().nullish(),
    })
  ),
})

export interface TavilySearchClientOptions {
  /** API root, e.g. https://api.tavily.com */
  baseUrl: string
  apiKey: string
  timeoutMs: number
}

export class TavilySearchClient implements SearchClient {
  readonly id = 'tavily'
  private readonly _endpoint: string
  private readonly _apiKey: string
  private readonly _timeoutMs: number

  constructor(options: TavilySearchClientOptions) {
    this._endpoint = `${options.baseUrl.replace(/\/+$/, '')}/search`
    this._apiKey = options.apiKey
    this._timeoutMs = options.timeoutMs
  }

  async search(query: string, options: SearchOptions): Promise<SearchResult[]> {
    logger.debug({ maxResults: options.maxResults, searchDepth: options.searchDepth }, 'Searching')

    const data = await postJson(
      this._endpoint,
      { query, search_depth: options.searchDepth, max_results: options.maxResults },
      {
        collaborator: this.id,
        timeoutMs: this._timeoutMs,
        headers: { Authorization: `Bearer ${this._apiKey}` },
      }
    )

    const parsed = TavilyResponseSchema.safeParse(data)
    if (!parsed.success) {
      throw new CollaboratorFailureError('tavily returned an unexpected response shape', {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      })
    }

    return parsed.data.results.map((r) => ({
      title: r.title ?? UNKNOWN_SOURCE_TITLE,
      url: r.url ?? '',
      content: r.content ?? '',
    }))
  }
}
