/**
 * ScoreLedger interface definition.
 *
 * The ledger owns every speaker's evaluation history for one debate session
 * and keeps each speaker's running average in step with that history.
 */

import type { SpeakerName } from '../../core/types.js'
import type { Evaluation } from '../evaluation/types.js'

/** A speaker's evaluation history and running average */
export interface SpeakerRecord {
  readonly name: SpeakerName
  /** Evaluations in the order they were recorded; append-only */
  readonly evaluations: readonly Evaluation[]
  /** Mean overall score rounded to one decimal, or 0 before the first evaluation */
  readonly total: number
}

/** One row of the final ranking */
export interface RankingEntry {
  name: SpeakerName
  total: number
  evaluationCount: number
}

export interface ScoreLedger {
  /**
   * Create an empty record for `name`. Registering an existing speaker is a no-op.
   */
  register(name: SpeakerName): void

  /**
   * Append `evaluation` to `name`'s history and recompute the running average.
   *
   * Unknown speakers are not an error: nothing is recorded, a warning is
   * logged, and false is returned. The same applies to an overall score that
   * is not a finite number in [1, 10].
   */
  record(name: SpeakerName, evaluation: Evaluation): boolean

  /** Whether `name` has been registered */
  has(name: SpeakerName): boolean

  /** A snapshot of `name`'s record, or undefined if unregistered */
  get(name: SpeakerName): SpeakerRecord | undefined

  /** Registered speaker names in registration order */
  speakers(): SpeakerName[]

  /**
   * All registered speakers sorted by total, highest first. Equal totals keep
   * registration order.
   */
  rankings(): RankingEntry[]

  /**
   * Name of the first entry of rankings(), or undefined when no speaker is
   * registered.
   */
  winner(): SpeakerName | undefined
}
