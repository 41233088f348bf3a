import { systemClock, throwIfCancelled, type Clock } from '@/lib/clock'
import { isTransient, RateLimitedError } from '@/lib/riot/errors'

export interface RetryOptions {
  /** total attempts including the first one */
  attempts: number
  baseDelayMs: number
  factor: number
  maxDelayMs: number
  jitterMs: number
}

export const DEFAULT_RETRY: RetryOptions = {
  attempts: 4,
  baseDelayMs: 200,
  factor: 2,
  maxDelayMs: 10_000,
  jitterMs: 50,
}

// throttled without a Retry-After header: back off harder than for a 5xx
const RATE_LIMIT_MULTIPLIER = 1.5

export interface RetryHooks {
  signal?: AbortSignal
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void
}

export class RetryPolicy {
  readonly options: Readonly<RetryOptions>
  private readonly clock: Clock
  private readonly random: () => number

  constructor(options: Partial<RetryOptions> = {}, deps: { clock?: Clock; random?: () => number } = {}) {
    this.options = { ...DEFAULT_RETRY, ...options }
    this.clock = deps.clock ?? systemClock
    this.random = deps.random ?? Math.random
  }

  /** delay before the attempt following failed attempt `attempt` (1-based) */
  delayFor(attempt: number, error?: unknown): number {
    const { baseDelayMs, factor, maxDelayMs, jitterMs } = this.options
    let backoff = Math.min(maxDelayMs, baseDelayMs * factor ** (attempt - 1))
    if (error instanceof RateLimitedError && error.retryAfterMs === null) {
      backoff = Math.min(maxDelayMs, backoff * RATE_LIMIT_MULTIPLIER)
    }
    const delay = Math.round(backoff + Math.floor(this.random() * jitterMs))
    if (error instanceof RateLimitedError && error.retryAfterMs !== null) {
      return Math.max(delay, error.retryAfterMs)
    }
    return delay
  }

  shouldRetry(error: unknown, attempt: number): boolean {
    return attempt < this.options.attempts && isTransient(error)
  }

  async run<T>(operation: (attempt: number) => Promise<T>, hooks: RetryHooks = {}): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      throwIfCancelled(hooks.signal)
      try {
        return await operation(attempt)
      } catch (error) {
        if (!this.shouldRetry(error, attempt)) throw error
        const delayMs = this.delayFor(attempt, error)
        hooks.onRetry?.(error, attempt, delayMs)
        await this.clock.sleep(delayMs, hooks.signal)
      }
    }
  }
}
