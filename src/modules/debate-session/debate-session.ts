/**
 * DebateSession interface: one debate's ledger, evaluation pipeline and
 * fact-check history, owned together and torn down together.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { SpeakerName, TurnNumber } from '../../core/types.js'
import type { Evaluation } from '../evaluation/types.js'
import type { FactCheckRecord } from '../fact-check/types.js'
import type { RankingEntry, SpeakerRecord } from '../score-ledger/score-ledger.js'

/** Final standings of a debate */
export interface DebateResults {
  topic: string
  /** null when no speaker is registered */
  winner: SpeakerName | null
  winnerScore: number
  rankings: RankingEntry[]
}

export interface DebateSession {
  readonly topic: string
  /** Bus carrying evaluation:*, ledger:* and fact-check:* events */
  readonly events: TypedEventBus

  /** Score one argument and record it under `speaker`. Never rejects. */
  evaluate(speaker: SpeakerName, argument: string, turn: TurnNumber): Promise<Evaluation>

  register(speaker: SpeakerName): void

  /** Record an evaluation directly, e.g. when replaying a stored debate */
  record(speaker: SpeakerName, evaluation: Evaluation): boolean

  rankings(): RankingEntry[]

  winner(): SpeakerName | undefined

  getSpeakerRecord(speaker: SpeakerName): SpeakerRecord | undefined

  /** Fact-check a statement; null when fact-checking is off. Never rejects. */
  factCheck(statement: string, turn: TurnNumber): Promise<string | null>

  /** Background research on the session topic, or '' without a search collaborator */
  researchContext(maxResults?: number): Promise<string>

  getFactChecks(): readonly FactCheckRecord[]

  results(): DebateResults
}
