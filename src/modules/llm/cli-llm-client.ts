/**
 * CliLlmClient: LlmClient that runs a locally installed agent CLI
 * (claude, gemini or codex) in one-shot print mode.
 *
 * stdout is the completion. Sampling parameters are not forwarded; none of
 * the CLIs accept them.
 */

import { spawn } from 'node:child_process'
import { CollaboratorFailureError } from '../../core/errors.js'
import { truncate } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { CompletionRequest, LlmClient } from './types.js'

const logger = createLogger('llm:cli')

// ---------------------------------------------------------------------------
// Command construction
// ---------------------------------------------------------------------------

export type CliProvider = 'claude-cli' | 'gemini-cli' | 'codex-cli'

export interface CliCommand {
  binary: string
  args: string[]
  /** Text written to the process's stdin */
  input: string
}

/** Default binary for each provider */
const DEFAULT_BINARIES: Record<CliProvider, string> = {
  'claude-cli': 'claude',
  'gemini-cli': 'gemini',
  'codex-cli': 'codex',
}

/**
 * Build the command line for one completion.
 *
 * claude takes the system prompt as a flag and the user prompt on stdin.
 * gemini takes both as its -p argument; codex reads both from stdin.
 */
export function buildCliCommand(
  provider: CliProvider,
  request: CompletionRequest,
  options: { binary?: string; model?: string } = {}
): CliCommand {
  const binary = options.binary ?? DEFAULT_BINARIES[provider]
  const combined = `${request.systemPrompt}\n\n${request.userPrompt}`

  switch (provider) {
    case 'claude-cli': {
      const args = ['-p', '--system-prompt', request.systemPrompt]
      if (options.model !== undefined) args.push('--model', options.model)
      return { binary, args, input: request.userPrompt }
    }
    case 'gemini-cli': {
      const args = ['-p', combined]
      if (options.model !== undefined) args.push('--model', options.model)
      return { binary, args, input: '' }
    }
    case 'codex-cli': {
      const args = ['exec']
      if (options.model !== undefined) args.push('--model', options.model)
      return { binary, args, input: combined }
    }
  }
}

// ---------------------------------------------------------------------------
// CliLlmClient
// ---------------------------------------------------------------------------

export interface CliLlmClientOptions {
  provider: CliProvider
  /** Override for the binary path */
  cliPath?: string
  model?: string
  timeoutMs: number
}

export class CliLlmClient implements LlmClient {
  readonly id: string
  private readonly _options: CliLlmClientOptions

  constructor(options: CliLlmClientOptions) {
    this._options = options
    this.id = options.model !== undefined ? `${options.provider}:${options.model}` : options.provider
  }

  complete(request: CompletionRequest): Promise<string> {
    const cmd = buildCliCommand(this._options.provider, request, {
      ...(this._options.cliPath !== undefined ? { binary: this._options.cliPath } : {}),
      ...(this._options.model !== undefined ? { model: this._options.model } : {}),
    })
    const timeoutMs = this._options.timeoutMs

    return new Promise<string>((resolve, reject) => {
      let settled = false
      const fail = (message: string, context: Record<string, unknown> = {}): void => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        reject(new CollaboratorFailureError(message, { collaborator: this.id, ...context }))
      }

      logger.debug({ binary: cmd.binary, args: cmd.args.slice(0, 1) }, 'Spawning agent CLI')

      const proc = spawn(cmd.binary, cmd.args, { stdio: ['pipe', 'pipe', 'pipe'] })

      const stdoutChunks: Buffer[] = []
      const stderrChunks: Buffer[] = []
      proc.stdout.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk)
      })
      proc.stderr.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk)
      })

      const timer = setTimeout(() => {
        proc.kill('SIGTERM')
        fail(`${this.id} timed out after ${String(timeoutMs)}ms`, { timeoutMs })
      }, timeoutMs)

      proc.on('error', (err) => {
        fail(`${this.id} could not be started: ${err.message}`)
      })

      proc.on('close', (exitCode) => {
        if (settled) return
        const code = exitCode ?? 1
        if (code !== 0) {
          const stderr = Buffer.concat(stderrChunks).toString('utf-8').trim()
          fail(`${this.id} exited with code ${String(code)}: ${truncate(stderr, 200)}`, { exitCode: code })
          return
        }
        settled = true
        clearTimeout(timer)
        resolve(Buffer.concat(stdoutChunks).toString('utf-8'))
      })

      // The process may exit before reading stdin; EPIPE is expected then
      proc.stdin.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code !== 'EPIPE') {
          logger.warn({ error: err.message }, 'stdin write error')
        }
      })
      proc.stdin.end(cmd.input)
    })
  }
}
