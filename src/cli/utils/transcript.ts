/**
 * Debate transcript files read by `rostrum score`.
 *
 * @example
 * topic: Cities should ban private cars
 * debaters: [Alice, Bob]
 * turns:
 *   - speaker: Alice
 *     argument: Car-free centres cut pollution...
 *   - speaker: Bob
 *     argument: Bans hurt people who cannot use transit...
 */

import { readFile } from 'fs/promises'
import yaml from 'js-yaml'
import { z } from 'zod'
import { TranscriptError } from '../../core/errors.js'
import { errorMessage } from '../../utils/helpers.js'

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const TranscriptTurnSchema = z
  .object({
    /** Defaults to the turn's 1-based position in the file */
    turn: z.number().int().positive().optional(),
    speaker: z.string().min(1),
    argument: z.string().min(1),
  })
  .strict()

export const TranscriptSchema = z
  .object({
    topic: z.string().min(1),
    debaters: z.array(z.string().min(1)).min(1),
    turns: z.array(TranscriptTurnSchema),
  })
  .strict()

export interface TranscriptTurn {
  turn: number
  speaker: string
  argument: string
}

export interface Transcript {
  topic: string
  debaters: string[]
  turns: TranscriptTurn[]
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/** Validate a decoded transcript document */
export function parseTranscript(raw: unknown, source = '<input>'): Transcript {
  const result = TranscriptSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  • ${i.path.join('.')}: ${i.message}`)
      .join('\n')
    throw new TranscriptError(`Invalid transcript ${source}:\n${issues}`, {
      source,
      issues: result.error.issues,
    })
  }

  const { topic, debaters, turns } = result.data
  return {
    topic,
    debaters,
    turns: turns.map((t, i) => ({ turn: t.turn ?? i + 1, speaker: t.speaker, argument: t.argument })),
  }
}

/**
 * Read a YAML (or JSON) transcript file.
 * @throws {TranscriptError} when the file cannot be read, decoded or validated
 */
export async function loadTranscript(filePath: string): Promise<Transcript> {
  let raw: unknown
  try {
    raw = yaml.load(await readFile(filePath, 'utf-8'))
  } catch (err) {
    throw new TranscriptError(`Cannot read transcript ${filePath}: ${errorMessage(err)}`, { filePath })
  }
  return parseTranscript(raw, filePath)
}
