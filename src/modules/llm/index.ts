/**
 * llm module: text-completion collaborators used for evaluation
 */

export type { LlmClient, CompletionParams, CompletionRequest } from './types.js'
export { DEFAULT_COMPLETION_PARAMS } from './types.js'
export { ChatCompletionsClient } from './chat-completions-client.js'
export type { ChatCompletionsClientOptions } from './chat-completions-client.js'
export { CliLlmClient, buildCliCommand } from './cli-llm-client.js'
export type { CliLlmClientOptions, CliProvider, CliCommand } from './cli-llm-client.js'
export { createLlmClient } from './llm-client-factory.js'
