/**
 * Placeholder evaluator: synthetic evaluations for when the LLM path fails.
 *
 * Scores are drawn uniformly from [6.0, 9.5]. Strengths, weaknesses and
 * reasoning come from fixed pools of debate-feedback phrases.
 */

import type { SpeakerName, TurnNumber } from '../../core/types.js'
import type { Criterion } from './criteria.js'
import { roundScore } from './score-normalizer.js'
import { freezeEvaluation, type Evaluation } from './types.js'

export const PLACEHOLDER_MIN_SCORE = 6.0
export const PLACEHOLDER_MAX_SCORE = 9.5

/** Source of uniform values in [0, 1); injectable for deterministic tests */
export type RandomSource = () => number

export const STRENGTH_POOL: readonly string[] = [
  'Clear argumentation',
  'Good use of evidence',
  'Well-structured points',
  'Effectively addresses counterarguments',
  'Strong opening statement',
  'Uses persuasive language',
  'Appeals to both emotions and logic',
  'Provides strong examples',
  'Clear stance on the topic',
  'Connects well with audience',
]

export const WEAKNESS_POOL: readonly string[] = [
  'Could be more concise',
  'More specific examples needed',
  'Some logical fallacies present',
  'Counterarguments not fully addressed',
  'Overreliance on emotional appeals',
  'Sources could be stronger',
  'Occasional repetition of points',
  'Some tangential arguments',
  'Connection to topic sometimes unclear',
  'Conclusion could be stronger',
]

const REASONING_TEMPLATES: readonly ((speaker: string) => string)[] = [
  (s) => `This evaluation is based on ${s}'s argument structure and evidence presentation.`,
  (s) => `The evaluation considers the persuasive techniques and logical flow of ${s}'s arguments.`,
  (s) => `This assessment reflects the clarity, evidence, and persuasiveness of ${s}'s argument.`,
  (s) => `The scoring is based on how effectively ${s} addressed the debate topic and opponents' points.`,
  (s) => `This evaluation assesses the strength of reasoning and evidence in ${s}'s presentation.`,
]

export interface PlaceholderEvaluatorOptions {
  /** Uniform random source; defaults to Math.random */
  random?: RandomSource
}

export class PlaceholderEvaluator {
  private readonly _random: RandomSource

  constructor(options: PlaceholderEvaluatorOptions = {}) {
    this._random = options.random ?? Math.random
  }

  /**
   * Build a structurally valid evaluation for `speaker` at `turn`. Never throws.
   *
   * 2–3 strengths and 1–2 weaknesses are sampled without repetition.
   */
  evaluate(speaker: SpeakerName, turn: TurnNumber): Evaluation {
    const overallScore = this._drawScore()
    const criteriaScores: Record<Criterion, number> = {
      clarity: this._drawScore(),
      evidence: this._drawScore(),
      reasoning: this._drawScore(),
      persuasiveness: this._drawScore(),
      relevance: this._drawScore(),
    }

    const strengths = this._sample(STRENGTH_POOL, 2 + this._drawIndex(2))
    const weaknesses = this._sample(WEAKNESS_POOL, 1 + this._drawIndex(2))
    const template = REASONING_TEMPLATES[this._drawIndex(REASONING_TEMPLATES.length)]
    const reasoning = template !== undefined ? template(speaker) : `Automated evaluation of ${speaker}.`

    return freezeEvaluation({
      speaker,
      turn,
      overallScore,
      criteriaScores,
      strengths,
      weaknesses,
      reasoning,
    })
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /** A random value forced into [0, 1) */
  private _uniform(): number {
    const value = this._random()
    if (!Number.isFinite(value) || value < 0) return 0
    return value >= 1 ? 0.999999 : value
  }

  private _drawScore(): number {
    const span = PLACEHOLDER_MAX_SCORE - PLACEHOLDER_MIN_SCORE
    return roundScore(PLACEHOLDER_MIN_SCORE + this._uniform() * span)
  }

  private _drawIndex(size: number): number {
    return Math.floor(this._uniform() * size)
  }

  /** Partial Fisher–Yates shuffle: `count` distinct items in draw order */
  private _sample(pool: readonly string[], count: number): string[] {
    const items = [...pool]
    const taken = Math.min(count, items.length)
    for (let i = 0; i < taken; i++) {
      const j = i + this._drawIndex(items.length - i)
      const picked = items[j]
      const current = items[i]
      if (picked !== undefined && current !== undefined) {
        items[i] = picked
        items[j] = current
      }
    }
    return items.slice(0, taken)
  }
}

/**
 * Create a new PlaceholderEvaluator instance.
 */
export function createPlaceholderEvaluator(
  options: PlaceholderEvaluatorOptions = {}
): PlaceholderEvaluator {
  return new PlaceholderEvaluator(options)
}
