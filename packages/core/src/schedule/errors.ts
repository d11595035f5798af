/**
 * Schedule Errors
 *
 * Every failure the schedule system surfaces carries a `kind` so callers
 * can switch on it without instanceof chains.
 */

export type ScheduleErrorKind = 'transport' | 'decode' | 'parse' | 'config' | 'conflict'

export class ScheduleError extends Error {
  readonly kind: ScheduleErrorKind

  constructor(kind: ScheduleErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ScheduleError'
    this.kind = kind
  }
}

/** The HTTP call to the store could not be completed */
export class TransportError extends ScheduleError {
  readonly url: string

  constructor(url: string, cause: unknown) {
    super('transport', `Request to ${url} failed: ${describeError(cause)}`, { cause })
    this.name = 'TransportError'
    this.url = url
  }
}

/** Stored content could not be decoded as UTF-8 CSV */
export class DecodeError extends ScheduleError {
  constructor(message: string, cause?: unknown) {
    super('decode', message, { cause })
    this.name = 'DecodeError'
  }
}

/** Free text did not match the event grammar */
export class ParseError extends ScheduleError {
  readonly input: string

  constructor(input: string, message: string) {
    super('parse', message)
    this.name = 'ParseError'
    this.input = input
  }
}

export class ConfigError extends ScheduleError {
  constructor(message: string, cause?: unknown) {
    super('config', message, { cause })
    this.name = 'ConfigError'
  }
}

export class MissingCredentialError extends ConfigError {
  constructor() {
    super('Missing store credential: set GITHUB_TOKEN or add credentials.json; cannot write.')
    this.name = 'MissingCredentialError'
  }
}

/** The store rejected a write because its version token was stale */
export class ConflictError extends ScheduleError {
  readonly status: number
  readonly body: string

  constructor(status: number, body: string) {
    super('conflict', `Store rejected write with status ${status}: version token is stale`)
    this.name = 'ConflictError'
    this.status = status
    this.body = body
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
