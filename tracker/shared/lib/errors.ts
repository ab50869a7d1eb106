export type DecodeErrorKind =
  | 'truncated-data'
  | 'malformed-string'
  | 'invalid-header'
  | 'invalid-value'

export type DecodeErrorOptions = {
  offset?: number
  cause?: unknown
}

/**
 * Raised by the binary decoders. A decode that throws produced no records at
 * all; callers must not treat it as an empty store.
 */
export class DecodeError extends Error {
  readonly kind: DecodeErrorKind
  readonly offset?: number
  readonly cause?: unknown

  constructor(kind: DecodeErrorKind, message: string, options: DecodeErrorOptions = {}) {
    super(message)
    this.name = 'DecodeError'
    this.kind = kind
    this.offset = options.offset
    this.cause = options.cause
  }
}

/** Programming error: a snapshot key that can never be valid */
export class InvalidKeyError extends Error {
  readonly key: string

  constructor(key: string, reason: string) {
    super(`Invalid score key '${key}': ${reason}`)
    this.name = 'InvalidKeyError'
    this.key = key
  }
}

export class StateFileError extends Error {
  readonly path?: string
  readonly cause?: unknown

  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message)
    this.name = 'StateFileError'
    this.path = options.path
    this.cause = options.cause
  }
}

export function isDecodeError(error: unknown, kind?: DecodeErrorKind): error is DecodeError {
  return error instanceof DecodeError && (kind === undefined || error.kind === kind)
}

export function ensureError(error: unknown, fallback: string = 'Unexpected error occurred'): Error {
  if (error instanceof Error) return error
  if (typeof error === 'string' && error.length > 0) return new Error(error)
  return new Error(fallback)
}

/** Short code for log payloads (errorCode field) */
export function errorCodeOf(error: unknown): string {
  if (error instanceof DecodeError) return error.kind
  if (error instanceof InvalidKeyError) return 'invalid-key'
  if (error instanceof StateFileError) return 'state-file'
  return 'unknown'
}
