/**
 * Error definitions for rostrum
 * Provides the structured error hierarchy shared by every module
 */

/** Base error class for all rostrum errors */
export class RostrumError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'RostrumError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RostrumError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends RostrumError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a config file uses an incompatible format version */
export class ConfigIncompatibleFormatError extends RostrumError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_INCOMPATIBLE_FORMAT', context)
    this.name = 'ConfigIncompatibleFormatError'
  }
}

/**
 * Error thrown when a call to an external collaborator fails: network error,
 * non-2xx status, timeout, non-zero process exit or malformed response body.
 */
export class CollaboratorFailureError extends RostrumError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'COLLABORATOR_FAILURE', context)
    this.name = 'CollaboratorFailureError'
  }
}

/** Error thrown when a debate transcript file cannot be read or is malformed */
export class TranscriptError extends RostrumError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'TRANSCRIPT_ERROR', context)
    this.name = 'TranscriptError'
  }
}
