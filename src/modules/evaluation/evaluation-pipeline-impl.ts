/**
 * EvaluationPipelineImpl: concrete implementation of the EvaluationPipeline
 * interface.
 *
 * Flow per call:
 *   build prompt → call LLM → parse → validate → record → return
 *
 * Collaborator failures (no client, call rejected, empty output) and parse
 * failures both route to the placeholder evaluator, but are logged and
 * emitted with distinct reasons so that "LLM down" and "LLM returned
 * garbage" can be told apart.
 */

import { createLogger } from '../../utils/logger.js'
import { errorMessage, truncate } from '../../utils/helpers.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { EvaluationSource, FallbackReason, SpeakerName, TurnNumber } from '../../core/types.js'
import type { LlmClient, CompletionParams } from '../llm/types.js'
import { DEFAULT_COMPLETION_PARAMS } from '../llm/types.js'
import type { ScoreLedger } from '../score-ledger/score-ledger.js'
import type { EvaluationPipeline } from './evaluation-pipeline.js'
import { defaultPromptBuilder } from './evaluation-prompt.js'
import { parseEvaluation } from './evaluation-parser.js'
import { PlaceholderEvaluator } from './placeholder-evaluator.js'
import { MAX_SCORE, MIN_SCORE } from './score-normalizer.js'
import type { Evaluation, EvaluationPromptBuilder } from './types.js'

const logger = createLogger('evaluation-pipeline')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface EvaluationPipelineOptions {
  /** Debate topic quoted in every evaluation prompt */
  topic: string
  /** Ledger that receives every evaluation */
  ledger: ScoreLedger
  /** LLM collaborator; null or omitted means unavailable */
  llm?: LlmClient | null
  /** Prompt template collaborator; defaults to the built-in rubric */
  promptBuilder?: EvaluationPromptBuilder
  /** Fallback evaluator; override in tests to inject a seeded random source */
  placeholder?: PlaceholderEvaluator
  /** Sampling parameters for the evaluation call */
  completion?: Partial<CompletionParams>
  /** Optional event bus for evaluation:* events */
  eventBus?: TypedEventBus
}

type LlmOutcome =
  | { ok: true; evaluation: Evaluation }
  | { ok: false; reason: FallbackReason; detail?: string }

/** Whether a value is a usable overall score */
function isValidScore(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= MIN_SCORE && value <= MAX_SCORE
}

// ---------------------------------------------------------------------------
// EvaluationPipelineImpl
// ---------------------------------------------------------------------------

export class EvaluationPipelineImpl implements EvaluationPipeline {
  private readonly _topic: string
  private readonly _ledger: ScoreLedger
  private readonly _llm: LlmClient | null
  private readonly _promptBuilder: EvaluationPromptBuilder
  private readonly _placeholder: PlaceholderEvaluator
  private readonly _completion: CompletionParams
  private readonly _eventBus: TypedEventBus | undefined

  constructor(options: EvaluationPipelineOptions) {
    this._topic = options.topic
    this._ledger = options.ledger
    this._llm = options.llm ?? null
    this._promptBuilder = options.promptBuilder ?? defaultPromptBuilder
    this._placeholder = options.placeholder ?? new PlaceholderEvaluator()
    this._completion = { ...DEFAULT_COMPLETION_PARAMS, ...options.completion }
    this._eventBus = options.eventBus
  }

  async evaluate(speaker: SpeakerName, argument: string, turn: TurnNumber): Promise<Evaluation> {
    logger.debug({ speaker, turn }, 'Evaluating argument')

    const outcome = await this._evaluateWithLlm(speaker, argument, turn)

    let evaluation: Evaluation
    let source: EvaluationSource = 'llm'
    if (outcome.ok) {
      evaluation = outcome.evaluation
    } else {
      evaluation = this._fallback(speaker, turn, outcome.reason, outcome.detail)
      source = 'placeholder'
    }

    if (!isValidScore(evaluation.overallScore)) {
      logger.warn(
        { speaker, turn, overallScore: evaluation.overallScore },
        'Evaluation has no usable overall score; using placeholder'
      )
      evaluation = this._fallback(speaker, turn, 'invalid_score', String(evaluation.overallScore))
      source = 'placeholder'
    }

    this._ledger.record(speaker, evaluation)

    if (source === 'llm') {
      logger.info({ speaker, turn, overallScore: evaluation.overallScore }, 'Argument evaluated')
    }
    this._eventBus?.emit('evaluation:completed', {
      speaker,
      turn,
      overallScore: evaluation.overallScore,
      source,
    })

    return evaluation
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _evaluateWithLlm(
    speaker: SpeakerName,
    argument: string,
    turn: TurnNumber
  ): Promise<LlmOutcome> {
    if (this._llm === null) {
      logger.warn({ speaker, turn }, 'LLM collaborator unavailable; using placeholder evaluation')
      return { ok: false, reason: 'llm_unavailable' }
    }

    let response: string
    try {
      const prompt = this._promptBuilder.build({ topic: this._topic, speaker, turn, argument })
      response = await this._llm.complete({ ...prompt, ...this._completion })
    } catch (err) {
      logger.error({ err, speaker, turn, llm: this._llm.id }, 'LLM evaluation call failed; using placeholder')
      return { ok: false, reason: 'llm_failed', detail: errorMessage(err) }
    }

    if (response.trim() === '') {
      logger.warn({ speaker, turn, llm: this._llm.id }, 'LLM returned an empty response; using placeholder')
      return { ok: false, reason: 'empty_response' }
    }

    logger.debug({ speaker, turn, preview: truncate(response, 100) }, 'Raw evaluation response')

    const parsed = parseEvaluation(response, speaker, turn)
    if (parsed.status === 'failed') {
      logger.warn(
        { speaker, turn, reason: parsed.reason, preview: truncate(response, 200) },
        'Could not parse evaluation response; using placeholder'
      )
      return { ok: false, reason: 'parse_failed', detail: `${parsed.reason}: ${parsed.message}` }
    }

    return { ok: true, evaluation: parsed.evaluation }
  }

  private _fallback(
    speaker: SpeakerName,
    turn: TurnNumber,
    reason: FallbackReason,
    detail?: string
  ): Evaluation {
    this._eventBus?.emit('evaluation:fallback', {
      speaker,
      turn,
      reason,
      ...(detail !== undefined ? { detail } : {}),
    })
    return this._placeholder.evaluate(speaker, turn)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new EvaluationPipeline instance.
 */
export function createEvaluationPipeline(options: EvaluationPipelineOptions): EvaluationPipeline {
  return new EvaluationPipelineImpl(options)
}
