/**
 * FactCheckAdapter: looks statements up through a search collaborator and
 * keeps the session's fact-check history.
 *
 * factCheck() and researchContext() never reject: a missing collaborator
 * yields null (or ''), a failed search yields a fixed degradation message.
 */

import { createLogger } from '../../utils/logger.js'
import { errorMessage, truncate } from '../../utils/helpers.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { TurnNumber } from '../../core/types.js'
import type { FactCheckRecord, SearchClient, SearchResult } from './types.js'

const logger = createLogger('fact-check')

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const NO_RESULTS_MESSAGE =
  "I attempted to fact check this statement, but couldn't find relevant information."

export const FACT_CHECK_ERROR_MESSAGE =
  'I attempted to fact check this statement, but encountered an error.'

export const DEFAULT_MAX_RESULTS = 3
export const DEFAULT_SNIPPET_LENGTH = 250
export const RESEARCH_SNIPPET_LENGTH = 500

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** Render search results as the text block returned by factCheck() */
export function formatFactCheck(
  statement: string,
  turn: TurnNumber,
  results: readonly SearchResult[],
  snippetLength: number = DEFAULT_SNIPPET_LENGTH
): string {
  const blocks = results.map(
    (r) => `Source: ${r.title}\nURL: ${r.url}\nContent: ${truncate(r.content, snippetLength)}`
  )
  return `Fact check for turn ${String(turn)}: "${statement}"\n\n${blocks.join('\n\n')}`
}

/** Render topic research as a markdown block */
export function formatResearchContext(topic: string, results: readonly SearchResult[]): string {
  let context = `## Research on: ${topic}\n\n`
  results.forEach((r, i) => {
    context += `### Source ${String(i + 1)}: ${r.title}\n`
    context += `URL: ${r.url}\n\n`
    context += `${truncate(r.content, RESEARCH_SNIPPET_LENGTH)}\n\n`
  })
  return context
}

// ---------------------------------------------------------------------------
// FactCheckAdapter
// ---------------------------------------------------------------------------

export interface FactCheckAdapterOptions {
  /** Search collaborator; null or omitted means unavailable */
  search?: SearchClient | null
  /** Whether fact-checking is switched on (default: true when a client is given) */
  enabled?: boolean
  maxResults?: number
  snippetLength?: number
  eventBus?: TypedEventBus
}

export class FactCheckAdapter {
  private readonly _search: SearchClient | null
  private readonly _enabled: boolean
  private readonly _maxResults: number
  private readonly _snippetLength: number
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _records: FactCheckRecord[] = []

  constructor(options: FactCheckAdapterOptions = {}) {
    this._search = options.search ?? null
    this._enabled = options.enabled ?? this._search !== null
    this._maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS
    this._snippetLength = options.snippetLength ?? DEFAULT_SNIPPET_LENGTH
    this._eventBus = options.eventBus
  }

  /** Whether factCheck() will actually search */
  get isActive(): boolean {
    return this._enabled && this._search !== null
  }

  /**
   * Fact-check `statement` made at `turn`.
   *
   * @returns null when fact-checking is disabled or unconfigured, otherwise
   *   the formatted sources or a fixed message
   */
  async factCheck(statement: string, turn: TurnNumber): Promise<string | null> {
    if (!this._enabled || this._search === null) return null

    let found: SearchResult[]
    try {
      found = await this._search.search(`fact check: ${statement}`, {
        maxResults: this._maxResults,
        searchDepth: 'advanced',
      })
    } catch (err) {
      logger.error({ err, turn }, 'Fact-check search failed')
      this._eventBus?.emit('fact-check:failed', { statement, turn, error: errorMessage(err) })
      return FACT_CHECK_ERROR_MESSAGE
    }

    // The collaborator may ignore maxResults
    const results = found.slice(0, this._maxResults)
    this._records.push(Object.freeze({ turn, statement, results: Object.freeze(results) }))
    this._eventBus?.emit('fact-check:completed', { statement, turn, resultCount: results.length })

    if (results.length === 0) {
      logger.info({ turn }, 'Fact-check found no sources')
      return NO_RESULTS_MESSAGE
    }

    logger.info({ turn, sources: results.length }, 'Fact-check completed')
    return formatFactCheck(statement, turn, results, this._snippetLength)
  }

  /**
   * Background research on a debate topic.
   *
   * @returns '' when no search collaborator is configured
   */
  async researchContext(topic: string, maxResults: number = DEFAULT_MAX_RESULTS): Promise<string> {
    if (this._search === null) {
      logger.warn('Search collaborator not configured; cannot generate research context')
      return ''
    }

    try {
      const found = await this._search.search(topic, { maxResults, searchDepth: 'advanced' })
      const results = found.slice(0, maxResults)
      logger.info({ topic: truncate(topic, 50), sources: results.length }, 'Generated research context')
      return formatResearchContext(topic, results)
    } catch (err) {
      logger.error({ err }, 'Error generating research context')
      return `Error generating research context: ${errorMessage(err)}`
    }
  }

  /** Every successful fact-check so far, oldest first */
  getFactChecks(): readonly FactCheckRecord[] {
    return [...this._records]
  }
}

export function createFactCheckAdapter(options: FactCheckAdapterOptions = {}): FactCheckAdapter {
  return new FactCheckAdapter(options)
}
