/**
 * Minimal JSON-over-HTTPS client for collaborator APIs.
 *
 * Uses Node.js built-in `https` (and `http` for local endpoints); no extra
 * HTTP dependency. Every failure rejects with CollaboratorFailureError.
 */

import http from 'http'
import https from 'https'
import { CollaboratorFailureError } from '../core/errors.js'
import { truncate } from './helpers.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PostJsonOptions {
  /** Extra request headers (Content-Type and Accept are always set) */
  headers?: Record<string, string>
  /** Abort the request after this many milliseconds */
  timeoutMs: number
  /** Collaborator name used in error messages, e.g. "tavily" */
  collaborator: string
}

type IncomingMessage = http.IncomingMessage

// ---------------------------------------------------------------------------
// postJson
// ---------------------------------------------------------------------------

/**
 * POST `body` as JSON to `url` and resolve with the decoded JSON response.
 *
 * @throws {CollaboratorFailureError} on timeout, network error, non-2xx
 *   status or an undecodable response body
 */
export function postJson(url: string, body: unknown, options: PostJsonOptions): Promise<unknown> {
  return new Promise<unknown>((resolve, reject) => {
    const { collaborator, timeoutMs } = options
    let settled = false

    const safeReject = (message: string, context: Record<string, unknown> = {}): void => {
      if (!settled) {
        settled = true
        clearTimeout(timer)
        reject(new CollaboratorFailureError(message, { collaborator, url, ...context }))
      }
    }

    const safeResolve = (value: unknown): void => {
      if (!settled) {
        settled = true
        clearTimeout(timer)
        resolve(value)
      }
    }

    let target: URL
    try {
      target = new URL(url)
    } catch {
      settled = true
      reject(new CollaboratorFailureError(`${collaborator} URL is invalid: ${url}`, { collaborator, url }))
      return
    }

    const payload = JSON.stringify(body)
    const requestOptions: https.RequestOptions = {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'Content-Length': Buffer.byteLength(payload),
        ...options.headers,
      },
    }

    const onResponse = (res: IncomingMessage): void => {
      collectBody(
        res,
        (status, text) => {
          if (status < 200 || status >= 300) {
            safeReject(`${collaborator} returned HTTP ${String(status)}: ${truncate(text, 200)}`, {
              status,
            })
            return
          }
          try {
            safeResolve(JSON.parse(text) as unknown)
          } catch {
            safeReject(`${collaborator} returned a response that is not JSON`, { status })
          }
        },
        (err) => {
          safeReject(`${collaborator} response stream error: ${err.message}`)
        }
      )
    }

    const req =
      target.protocol === 'http:'
        ? http.request(target, requestOptions, onResponse)
        : https.request(target, requestOptions, onResponse)

    // The request callback API takes no AbortSignal, so time out by hand
    const timer = setTimeout(() => {
      req.destroy()
      safeReject(`${collaborator} request timed out after ${String(timeoutMs)}ms`, { timeoutMs })
    }, timeoutMs)

    req.on('error', (err) => {
      safeReject(`${collaborator} network error: ${err.message}`)
    })

    req.write(payload)
    req.end()
  })
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function collectBody(
  res: IncomingMessage,
  onEnd: (status: number, text: string) => void,
  onError: (err: Error) => void
): void {
  const chunks: Buffer[] = []

  res.on('data', (chunk: Buffer) => {
    chunks.push(chunk)
  })

  res.on('end', () => {
    onEnd(res.statusCode ?? 0, Buffer.concat(chunks).toString('utf-8'))
  })

  res.on('error', onError)
}
