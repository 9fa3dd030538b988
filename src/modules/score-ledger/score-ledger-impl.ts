/**
 * ScoreLedgerImpl: in-memory ledger of per-speaker evaluations.
 *
 * record() appends and recomputes synchronously, so the append and the
 * average update run as one step on the event loop: concurrent evaluate()
 * calls that finish in any order cannot interleave inside it.
 */

import { createLogger } from '../../utils/logger.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { SpeakerName } from '../../core/types.js'
import { MAX_SCORE, MIN_SCORE } from '../evaluation/score-normalizer.js'
import { freezeEvaluation, type Evaluation } from '../evaluation/types.js'
import type { RankingEntry, ScoreLedger, SpeakerRecord } from './score-ledger.js'

const logger = createLogger('score-ledger')

interface MutableSpeakerRecord {
  name: SpeakerName
  evaluations: Evaluation[]
  total: number
}

export interface ScoreLedgerOptions {
  /** Speakers to register up front, in order */
  speakers?: readonly SpeakerName[]
  /** Optional event bus for ledger:* events */
  eventBus?: TypedEventBus
}

/** Arithmetic mean rounded to one decimal place; 0 for an empty list */
export function roundedMean(values: readonly number[]): number {
  if (values.length === 0) return 0
  const sum = values.reduce((acc, v) => acc + v, 0)
  return Math.round((sum / values.length) * 10) / 10
}

export class ScoreLedgerImpl implements ScoreLedger {
  // Map iteration follows insertion order, which is registration order
  private readonly _records = new Map<SpeakerName, MutableSpeakerRecord>()
  private readonly _eventBus: TypedEventBus | undefined

  constructor(options: ScoreLedgerOptions = {}) {
    this._eventBus = options.eventBus
    for (const name of options.speakers ?? []) {
      this.register(name)
    }
  }

  register(name: SpeakerName): void {
    if (this._records.has(name)) return
    this._records.set(name, { name, evaluations: [], total: 0 })
    logger.debug({ speaker: name }, 'Speaker registered')
  }

  record(name: SpeakerName, evaluation: Evaluation): boolean {
    const entry = this._records.get(name)
    if (entry === undefined) {
      logger.warn({ speaker: name, turn: evaluation.turn }, 'Evaluation for unknown speaker not recorded')
      this._eventBus?.emit('ledger:unknown-speaker', { speaker: name, turn: evaluation.turn })
      return false
    }

    const score = evaluation.overallScore
    if (!Number.isFinite(score) || score < MIN_SCORE || score > MAX_SCORE) {
      logger.warn(
        { speaker: name, turn: evaluation.turn, overallScore: score },
        'Evaluation with out-of-range score not recorded'
      )
      return false
    }

    // Frozen copy; the caller may still hold a mutable original
    entry.evaluations.push(freezeEvaluation(evaluation))
    entry.total = roundedMean(entry.evaluations.map((e) => e.overallScore))

    logger.debug(
      { speaker: name, total: entry.total, evaluationCount: entry.evaluations.length },
      'Evaluation recorded'
    )
    this._eventBus?.emit('ledger:recorded', {
      speaker: name,
      total: entry.total,
      evaluationCount: entry.evaluations.length,
    })
    return true
  }

  has(name: SpeakerName): boolean {
    return this._records.has(name)
  }

  get(name: SpeakerName): SpeakerRecord | undefined {
    const entry = this._records.get(name)
    if (entry === undefined) return undefined
    return { name: entry.name, evaluations: [...entry.evaluations], total: entry.total }
  }

  speakers(): SpeakerName[] {
    return Array.from(this._records.keys())
  }

  rankings(): RankingEntry[] {
    // Array.prototype.sort is stable, so ties keep registration order
    return Array.from(this._records.values())
      .map((entry) => ({
        name: entry.name,
        total: entry.total,
        evaluationCount: entry.evaluations.length,
      }))
      .sort((a, b) => b.total - a.total)
  }

  winner(): SpeakerName | undefined {
    return this.rankings()[0]?.name
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ScoreLedger instance.
 *
 * @example
 * const ledger = createScoreLedger({ speakers: ['Alice', 'Bob'] })
 */
export function createScoreLedger(options: ScoreLedgerOptions = {}): ScoreLedger {
  return new ScoreLedgerImpl(options)
}
