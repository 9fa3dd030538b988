/**
 * Unit tests for chat-completions-client.ts and llm-client-factory.ts
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'

vi.mock('../../../utils/logger.js', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}))

vi.mock('../../../utils/http.js', () => ({
  postJson: vi.fn(),
}))

import { postJson } from '../../../utils/http.js'
import { ChatCompletionsClient } from '../chat-completions-client.js'
import { CliLlmClient } from '../cli-llm-client.js'
import { createLlmClient } from '../llm-client-factory.js'
import { CollaboratorFailureError } from '../../../core/errors.js'
import { DEFAULT_LLM_CONFIG } from '../../config/defaults.js'
import type { CompletionRequest } from '../types.js'

const mockPostJson = vi.mocked(postJson)

const REQUEST: CompletionRequest = {
  systemPrompt: 'You are a judge.',
  userPrompt: 'Score this.',
  temperature: 0.2,
  maxTokens: 500,
  topP: 0.9,
}

function client(): ChatCompletionsClient {
  return new ChatCompletionsClient({
    baseUrl: 'https://llm.example.test/v1/',
    model: 'test-model',
    apiKey: 'test-secret',
    timeoutMs: 2000,
  })
}

describe('ChatCompletionsClient', () => {
  beforeEach(() => {
    mockPostJson.mockReset()
  })

  it('posts both prompts with the sampling parameters', async () => {
    mockPostJson.mockResolvedValue({ choices: [{ message: { content: 'ok' } }] })

    await client().complete(REQUEST)

    expect(mockPostJson).toHaveBeenCalledWith(
      'https://llm.example.test/v1/chat/completions',
      {
        model: 'test-model',
        messages: [
          { role: 'system', content: 'You are a judge.' },
          { role: 'user', content: 'Score this.' },
        ],
        temperature: 0.2,
        max_tokens: 500,
        top_p: 0.9,
      },
      {
        collaborator: 'openai-compatible:test-model',
        timeoutMs: 2000,
        headers: { Authorization: 'Bearer test-secret' },
      }
    )
  })

  it('returns the first choice content', async () => {
    mockPostJson.mockResolvedValue({
      choices: [{ message: { content: 'first' } }, { message: { content: 'second' } }],
    })
    expect(await client().complete(REQUEST)).toBe('first')
  })

  it('returns an empty string for null content', async () => {
    mockPostJson.mockResolvedValue({ choices: [{ message: { content: null } }] })
    expect(await client().complete(REQUEST)).toBe('')
  })

  it('rejects a response without choices', async () => {
    mockPostJson.mockResolvedValue({ choices: [] })
    await expect(client().complete(REQUEST)).rejects.toThrow(
      'openai-compatible:test-model returned an unexpected response shape'
    )
  })

  it('propagates transport failures', async () => {
    mockPostJson.mockRejectedValue(new CollaboratorFailureError('timed out'))
    await expect(client().complete(REQUEST)).rejects.toBeInstanceOf(CollaboratorFailureError)
  })
})

describe('createLlmClient', () => {
  it('returns null for provider "none"', () => {
    expect(createLlmClient({ ...DEFAULT_LLM_CONFIG, provider: 'none' }, { GROQ_API_KEY: 'k' })).toBeNull()
  })

  it('returns null when the API key variable is unset or blank', () => {
    expect(createLlmClient(DEFAULT_LLM_CONFIG, {})).toBeNull()
    expect(createLlmClient(DEFAULT_LLM_CONFIG, { GROQ_API_KEY: '' })).toBeNull()
  })

  it('builds a chat-completions client when the key is set', () => {
    const llm = createLlmClient(DEFAULT_LLM_CONFIG, { GROQ_API_KEY: 'test-secret' })
    expect(llm).toBeInstanceOf(ChatCompletionsClient)
    expect(llm?.id).toBe('openai-compatible:llama3-8b-8192')
  })

  it('builds a CLI client without an API key', () => {
    const llm = createLlmClient({ ...DEFAULT_LLM_CONFIG, provider: 'claude-cli' }, {})
    expect(llm).toBeInstanceOf(CliLlmClient)
    expect(llm?.id).toBe('claude-cli')
  })
})
