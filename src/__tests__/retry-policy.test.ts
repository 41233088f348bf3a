import { describe, expect, it, vi } from 'vitest'
import { RetryPolicy } from '@/lib/health/retry-policy'
import {
  NotFoundError,
  RateLimitedError,
  TransientError,
  UnauthorizedError,
} from '@/lib/riot/errors'
import { FakeClock } from './helpers/fake-clock'

const options = { attempts: 4, baseDelayMs: 100, factor: 2, maxDelayMs: 1_000, jitterMs: 50 }

describe('RetryPolicy', () => {
  it('grows the delay exponentially up to the cap, plus jitter', () => {
    const policy = new RetryPolicy(options, { random: () => 0.5 })
    expect(policy.delayFor(1)).toBe(125)
    expect(policy.delayFor(2)).toBe(225)
    expect(policy.delayFor(3)).toBe(425)
    expect(policy.delayFor(5)).toBe(1_025)
  })

  it('waits at least as long as Retry-After asks', () => {
    const policy = new RetryPolicy(options, { random: () => 0 })
    expect(policy.delayFor(1, new RateLimitedError(2_000))).toBe(2_000)
    expect(policy.delayFor(3, new RateLimitedError(50))).toBe(400)
  })

  it('backs off harder on a 429 without Retry-After', () => {
    const policy = new RetryPolicy(options, { random: () => 0 })
    expect(policy.delayFor(2, new RateLimitedError(null))).toBe(300)
  })

  it('retries transient failures and returns the eventual result', async () => {
    const clock = new FakeClock()
    const policy = new RetryPolicy(options, { clock, random: () => 0 })
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TransientError('server', 'boom', 'euw1', 503))
      .mockRejectedValueOnce(new TransientError('timeout', 'slow', 'euw1'))
      .mockResolvedValue('ok')

    await expect(policy.run(operation)).resolves.toBe('ok')
    expect(operation).toHaveBeenCalledTimes(3)
    expect(clock.sleeps).toEqual([100, 200])
  })

  it('gives up after the configured attempts', async () => {
    const clock = new FakeClock()
    const policy = new RetryPolicy({ ...options, attempts: 3 }, { clock, random: () => 0 })
    const error = new TransientError('network', 'reset', 'kr')
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(error)

    await expect(policy.run(operation)).rejects.toBe(error)
    expect(operation).toHaveBeenCalledTimes(3)
    expect(clock.sleeps).toEqual([100, 200])
  })

  it.each([new NotFoundError('/x'), new UnauthorizedError(401)])('surfaces %s immediately', async error => {
    const clock = new FakeClock()
    const policy = new RetryPolicy(options, { clock })
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(error)

    await expect(policy.run(operation)).rejects.toBe(error)
    expect(operation).toHaveBeenCalledTimes(1)
    expect(clock.sleeps).toEqual([])
  })
})
