/**
 * score-ledger module: per-speaker evaluation history and rankings
 */

export type { ScoreLedger, SpeakerRecord, RankingEntry } from './score-ledger.js'
export { ScoreLedgerImpl, createScoreLedger, roundedMean } from './score-ledger-impl.js'
export type { ScoreLedgerOptions } from './score-ledger-impl.js'
