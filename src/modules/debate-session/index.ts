/**
 * debate-session module: one debate's scoring state behind a single handle
 */

export type { DebateSession, DebateResults } from './debate-session.js'
export {
  DebateSessionImpl,
  createDebateSession,
  createDebateSessionFromConfig,
} from './debate-session-impl.js'
export type { DebateSessionOptions } from './debate-session-impl.js'
