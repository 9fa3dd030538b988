/**
 * ChatCompletionsClient: LlmClient for OpenAI-compatible chat completion
 * endpoints (Groq, OpenAI, local gateways).
 */

import { z } from 'zod'
import { CollaboratorFailureError } from '../../core/errors.js'
import { postJson } from '../../utils/http.js'
import { createLogger } from '../../utils/logger.js'
import type { CompletionRequest, LlmClient } from './types.js'

const logger = createLogger('llm:chat-completions')

// ---------------------------------------------------------------------------
// Response schema
// ---------------------------------------------------------------------------

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
})

// ---------------------------------------------------------------------------
// ChatCompletionsClient
// ---------------------------------------------------------------------------

export interface ChatCompletionsClientOptions {
  /** API root, e.g. https://api.groq.com/openai/v1 */
  baseUrl: string
  model: string
  apiKey: string
  timeoutMs: number
}

export class ChatCompletionsClient implements LlmClient {
  readonly id: string
  private readonly _endpoint: string
  private readonly _model: string
  private readonly _apiKey: string
  private readonly _timeoutMs: number

  constructor(options: ChatCompletionsClientOptions) {
    this._endpoint = `${options.baseUrl.replace(/\/+$/, '')}/chat/completions`
    this._model = options.model
    this._apiKey = options.apiKey
    this._timeoutMs = options.timeoutMs
    this.id = `openai-compatible:${options.model}`
  }

  async complete(request: CompletionRequest): Promise<string> {
    const body = {
      model: this._model,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt },
      ],
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      top_p: request.topP,
    }

    logger.debug({ endpoint: this._endpoint, model: this._model }, 'Requesting chat completion')

    const data = await postJson(this._endpoint, body, {
      collaborator: this.id,
      timeoutMs: this._timeoutMs,
      headers: { Authorization: `Bearer ${this._apiKey}` },
    })

    const parsed = ChatCompletionResponseSchema.safeParse(data)
    if (!parsed.success) {
      throw new CollaboratorFailureError(`${this.id} returned an unexpected response shape`, {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      })
    }

    return parsed.data.choices[0]?.message.content ?? ''
  }
}
