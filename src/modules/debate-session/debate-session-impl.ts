/**
 * DebateSessionImpl: wires one ScoreLedger, one EvaluationPipeline and one
 * FactCheckAdapter to a topic over a shared event bus.
 */

import { createEventBus } from '../../core/event-bus.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { SpeakerName, TurnNumber } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { RostrumConfig } from '../config/config-schema.js'
import type { EvaluationPipeline } from '../evaluation/evaluation-pipeline.js'
import { createEvaluationPipeline } from '../evaluation/evaluation-pipeline-impl.js'
import type { PlaceholderEvaluator } from '../evaluation/placeholder-evaluator.js'
import type { Evaluation, EvaluationPromptBuilder } from '../evaluation/types.js'
import { FactCheckAdapter } from '../fact-check/fact-check-adapter.js'
import { createSearchClient } from '../fact-check/search-client-factory.js'
import type { FactCheckRecord, SearchClient } from '../fact-check/types.js'
import { createLlmClient } from '../llm/llm-client-factory.js'
import type { CompletionParams, LlmClient } from '../llm/types.js'
import { createScoreLedger } from '../score-ledger/score-ledger-impl.js'
import type { RankingEntry, ScoreLedger, SpeakerRecord } from '../score-ledger/score-ledger.js'
import type { DebateResults, DebateSession } from './debate-session.js'

const logger = createLogger('debate-session')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface DebateSessionOptions {
  topic: string
  /** Debaters registered in this order; the order breaks ranking ties */
  debaters?: SpeakerName[]
  llm?: LlmClient | null
  search?: SearchClient | null
  /** Defaults to true when a search client is given */
  factChecking?: boolean
  factCheckMaxResults?: number
  factCheckSnippetLength?: number
  completion?: Partial<CompletionParams>
  promptBuilder?: EvaluationPromptBuilder
  placeholder?: PlaceholderEvaluator
  eventBus?: TypedEventBus
}

// ---------------------------------------------------------------------------
// DebateSessionImpl
// ---------------------------------------------------------------------------

export class DebateSessionImpl implements DebateSession {
  readonly topic: string
  readonly events: TypedEventBus
  private readonly _ledger: ScoreLedger
  private readonly _pipeline: EvaluationPipeline
  private readonly _factChecker: FactCheckAdapter

  constructor(options: DebateSessionOptions) {
    this.topic = options.topic
    this.events = options.eventBus ?? createEventBus()
    this._ledger = createScoreLedger({
      speakers: options.debaters ?? [],
      eventBus: this.events,
    })
    this._pipeline = createEvaluationPipeline({
      topic: options.topic,
      ledger: this._ledger,
      llm: options.llm ?? null,
      eventBus: this.events,
      ...(options.promptBuilder !== undefined ? { promptBuilder: options.promptBuilder } : {}),
      ...(options.placeholder !== undefined ? { placeholder: options.placeholder } : {}),
      ...(options.completion !== undefined ? { completion: options.completion } : {}),
    })
    this._factChecker = new FactCheckAdapter({
      search: options.search ?? null,
      eventBus: this.events,
      ...(options.factChecking !== undefined ? { enabled: options.factChecking } : {}),
      ...(options.factCheckMaxResults !== undefined ? { maxResults: options.factCheckMaxResults } : {}),
      ...(options.factCheckSnippetLength !== undefined
        ? { snippetLength: options.factCheckSnippetLength }
        : {}),
    })

    logger.debug(
      { debaters: this._ledger.speakers(), factChecking: this._factChecker.isActive },
      'Debate session created'
    )
  }

  evaluate(speaker: SpeakerName, argument: string, turn: TurnNumber): Promise<Evaluation> {
    return this._pipeline.evaluate(speaker, argument, turn)
  }

  register(speaker: SpeakerName): void {
    this._ledger.register(speaker)
  }

  record(speaker: SpeakerName, evaluation: Evaluation): boolean {
    return this._ledger.record(speaker, evaluation)
  }

  rankings(): RankingEntry[] {
    return this._ledger.rankings()
  }

  winner(): SpeakerName | undefined {
    return this._ledger.winner()
  }

  getSpeakerRecord(speaker: SpeakerName): SpeakerRecord | undefined {
    return this._ledger.get(speaker)
  }

  factCheck(statement: string, turn: TurnNumber): Promise<string | null> {
    return this._factChecker.factCheck(statement, turn)
  }

  researchContext(maxResults?: number): Promise<string> {
    return this._factChecker.researchContext(this.topic, maxResults)
  }

  getFactChecks(): readonly FactCheckRecord[] {
    return this._factChecker.getFactChecks()
  }

  results(): DebateResults {
    const rankings = this._ledger.rankings()
    const first = rankings[0]
    return {
      topic: this.topic,
      winner: first?.name ?? null,
      winnerScore: first?.total ?? 0,
      rankings,
    }
  }
}

// ---------------------------------------------------------------------------
// Factory functions
// ---------------------------------------------------------------------------

export function createDebateSession(options: DebateSessionOptions): DebateSession {
  return new DebateSessionImpl(options)
}

/**
 * Build a session whose LLM and search collaborators come from configuration.
 * `llm` or `search` given in `options` replace the configured ones.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const session = createDebateSessionFromConfig(config.getConfig(), {
 *   topic: 'Cities should ban private cars',
 *   debaters: ['Alice', 'Bob'],
 * })
 */
export function createDebateSessionFromConfig(
  config: RostrumConfig,
  options: Omit<DebateSessionOptions, 'completion'>,
  env: NodeJS.ProcessEnv = process.env
): DebateSession {
  return new DebateSessionImpl({
    factChecking: config.fact_check.enabled,
    factCheckMaxResults: config.fact_check.max_results,
    factCheckSnippetLength: config.fact_check.snippet_length,
    ...options,
    llm: options.llm !== undefined ? options.llm : createLlmClient(config.llm, env),
    search: options.search !== undefined ? options.search : createSearchClient(config.fact_check, env),
    completion: {
      temperature: config.llm.temperature,
      maxTokens: config.llm.max_tokens,
      topP: config.llm.top_p,
    },
  })
}
