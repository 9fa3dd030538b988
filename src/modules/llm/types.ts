/**
 * Type definitions for LLM collaborators.
 */

/** Sampling parameters for one completion */
export interface CompletionParams {
  temperature: number
  maxTokens: number
  topP: number
}

/** One completion request: a system prompt, a user prompt and sampling parameters */
export interface CompletionRequest extends CompletionParams {
  systemPrompt: string
  userPrompt: string
}

/**
 * A model that turns a prompt into text.
 *
 * Implementations reject with CollaboratorFailureError on network, auth,
 * timeout or process errors. Timeout and retry policy belongs to the
 * implementation, not to its callers.
 */
export interface LlmClient {
  /** Identifier used in logs, e.g. "openai-compatible:llama3-8b-8192" */
  readonly id: string
  complete(request: CompletionRequest): Promise<string>
}

/** Sampling parameters used for evaluation when none are configured */
export const DEFAULT_COMPLETION_PARAMS: CompletionParams = {
  temperature: 0.2,
  maxTokens: 1000,
  topP: 0.9,
}
