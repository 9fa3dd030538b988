/**
 * Error hierarchy tests
 */

import { describe, it, expect } from 'vitest'
import {
  RostrumError,
  ConfigError,
  ConfigIncompatibleFormatError,
  CollaboratorFailureError,
  TranscriptError,
} from '../src/core/errors.js'

describe('RostrumError', () => {
  it('carries a code and context', () => {
    const error = new RostrumError('Something failed', 'SOMETHING', { speaker: 'Alice' })
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('RostrumError')
    expect(error.code).toBe('SOMETHING')
    expect(error.context.speaker).toBe('Alice')
  })

  it('defaults to an empty context', () => {
    expect(new RostrumError('x', 'X').context).toEqual({})
  })

  it('serializes to JSON', () => {
    const json = new RostrumError('Something failed', 'SOMETHING', { turn: 3 }).toJSON()
    expect(json.name).toBe('RostrumError')
    expect(json.message).toBe('Something failed')
    expect(json.code).toBe('SOMETHING')
    expect(json.context).toEqual({ turn: 3 })
    expect(typeof json.stack).toBe('string')
  })
})

describe('subclasses', () => {
  it.each([
    [new ConfigError('bad config'), 'ConfigError', 'CONFIG_ERROR'],
    [new ConfigIncompatibleFormatError('format 9'), 'ConfigIncompatibleFormatError', 'CONFIG_INCOMPATIBLE_FORMAT'],
    [new CollaboratorFailureError('HTTP 500'), 'CollaboratorFailureError', 'COLLABORATOR_FAILURE'],
    [new TranscriptError('no turns'), 'TranscriptError', 'TRANSCRIPT_ERROR'],
  ])('%s has its own name and code', (error, name, code) => {
    expect(error).toBeInstanceOf(RostrumError)
    expect(error.name).toBe(name)
    expect(error.code).toBe(code)
  })

  it('keeps the context passed in', () => {
    const error = new CollaboratorFailureError('timed out', { collaborator: 'tavily', timeoutMs: 100 })
    expect(error.context).toEqual({ collaborator: 'tavily', timeoutMs: 100 })
  })
})
