// error taxonomy for everything that talks to the riot api

export type ErrorCode =
  | 'UNAUTHORIZED'
  | 'RATE_LIMITED'
  | 'TRANSIENT'
  | 'PLATFORM_UNAVAILABLE'
  | 'PARSE_ERROR'
  | 'NOT_FOUND'
  | 'REQUEST_ERROR'
  | 'SEED_EXHAUSTION'
  | 'CANCELLED'

export type TransientKind = 'timeout' | 'network' | 'dns' | 'server'

export abstract class CollectorError extends Error {
  abstract readonly code: ErrorCode
  readonly platform: string | null

  constructor(message: string, platform: string | null = null, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.platform = platform
  }
}

/** 401/403 - the api key is missing, expired or revoked. Fatal for the whole run. */
export class UnauthorizedError extends CollectorError {
  readonly code = 'UNAUTHORIZED'

  constructor(
    readonly status: number,
    platform: string | null = null
  ) {
    super(`riot api rejected the credential (${status})`, platform)
  }
}

export class RateLimitedError extends CollectorError {
  readonly code = 'RATE_LIMITED'
  readonly status = 429

  constructor(
    readonly retryAfterMs: number | null,
    platform: string | null = null
  ) {
    super(retryAfterMs === null ? 'rate limited' : `rate limited, retry after ${retryAfterMs}ms`, platform)
  }
}

export class TransientError extends CollectorError {
  readonly code = 'TRANSIENT'

  constructor(
    readonly kind: TransientKind,
    message: string,
    platform: string | null = null,
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, platform, options)
  }
}

export class NotFoundError extends CollectorError {
  readonly code = 'NOT_FOUND'
  readonly status = 404

  constructor(path: string, platform: string | null = null) {
    super(`not found: ${path}`, platform)
  }
}

/** any other 4xx - the request itself is wrong, retrying will not help */
export class RequestError extends CollectorError {
  readonly code = 'REQUEST_ERROR'

  constructor(
    readonly status: number,
    path: string,
    platform: string | null = null
  ) {
    super(`request failed with ${status}: ${path}`, platform)
  }
}

/** raised without any network call while a platform's circuit is open */
export class PlatformUnavailableError extends CollectorError {
  readonly code = 'PLATFORM_UNAVAILABLE'

  constructor(
    platform: string,
    readonly retryInMs: number
  ) {
    super(`platform ${platform} unavailable (circuit open, retry in ${retryInMs}ms)`, platform)
  }
}

export class ParseError extends CollectorError {
  readonly code = 'PARSE_ERROR'

  constructor(message: string, platform: string | null = null, options?: { cause?: unknown }) {
    super(message, platform, options)
  }
}

export class SeedExhaustionError extends CollectorError {
  readonly code = 'SEED_EXHAUSTION'

  constructor(platform: string) {
    super(`no players left to expand on ${platform}`, platform)
  }
}

export class CancelledError extends CollectorError {
  readonly code = 'CANCELLED'

  constructor(message = 'operation cancelled') {
    super(message)
  }
}

// retried by the retry policy and counted as failures by the circuit breaker
export function isTransient(error: unknown): error is TransientError | RateLimitedError {
  return error instanceof TransientError || error instanceof RateLimitedError
}

// dns or connection level failure, where an alternate host may still answer
export function isConnectionFailure(error: unknown): error is TransientError {
  return error instanceof TransientError && (error.kind === 'dns' || error.kind === 'network')
}

export function errorForStatus(
  status: number,
  path: string,
  platform: string | null,
  retryAfterMs: number | null = null
): CollectorError {
  if (status === 401 || status === 403) return new UnauthorizedError(status, platform)
  if (status === 404) return new NotFoundError(path, platform)
  if (status === 429) return new RateLimitedError(retryAfterMs, platform)
  if (status >= 500) return new TransientError('server', `server error ${status}: ${path}`, platform, status)
  return new RequestError(status, path, platform)
}

/** Retry-After is in seconds. Returns null when absent or unreadable. */
export function parseRetryAfter(value: string | null): number | null {
  if (value === null || value.trim() === '') return null
  const seconds = Number(value)
  if (!Number.isFinite(seconds) || seconds < 0) return null
  return Math.round(seconds * 1000)
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
