/**
 * rostrum - Main module exports
 * Public API surface for the library
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export { maskSecrets } from './cli/utils/masking.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { DebateEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Evaluation
export * from './modules/evaluation/index.js'

// Score ledger
export * from './modules/score-ledger/index.js'

// LLM collaborators
export * from './modules/llm/index.js'

// Fact-checking
export * from './modules/fact-check/index.js'

// Debate session
export * from './modules/debate-session/index.js'

// Configuration
export * from './modules/config/index.js'
