// Redis/memory rate limiter for Riot API calls
import { Redis } from '@upstash/redis'
import { systemClock, throwIfCancelled, type Clock } from '@/lib/clock'
import { createLogger, type Logger } from '@/lib/log'

// Riot API has TWO types of rate limits, both consumed by every request:
// 1. Application rate limit: per routing value, shared across ALL methods (20/sec, 100/2min)
// 2. Method rate limit: per routing value per method (varies by endpoint)
// Routing values are independent - euw1 and na1 (or europe and americas) never share counters.

export type EndpointClass = 'account' | 'summoner' | 'league' | 'match-list' | 'match-detail' | 'status'

export interface RateLimitRule {
  limit: number
  windowMs: number
}

export const APP_RULES: readonly RateLimitRule[] = [
  { limit: 20, windowMs: 1_000 },
  { limit: 100, windowMs: 120_000 },
]

export const METHOD_RULES: Readonly<Partial<Record<EndpointClass, readonly RateLimitRule[]>>> = {
  'match-list': [{ limit: 2000, windowMs: 10_000 }],
  'match-detail': [{ limit: 2000, windowMs: 10_000 }],
  summoner: [{ limit: 1600, windowMs: 60_000 }],
  account: [{ limit: 1000, windowMs: 60_000 }],
  league: [{ limit: 30, windowMs: 10_000 }],
}

export interface WindowKey {
  key: string
  rule: RateLimitRule
}

/**
 * Storage for window counters. tryReserve either takes one permit from every
 * key or none, returning 0 on success or how long to wait before retrying.
 */
export interface WindowStore {
  readonly kind: string
  tryReserve(keys: readonly WindowKey[], now: number): Promise<number>
}

// ============================================================================
// IN-MEMORY STORE - exact sliding log
// ============================================================================

export class MemoryWindowStore implements WindowStore {
  readonly kind = 'In-memory (local)'
  private readonly logs = new Map<string, number[]>()

  async tryReserve(keys: readonly WindowKey[], now: number): Promise<number> {
    let waitMs = 0
    const touched: number[][] = []

    for (const { key, rule } of keys) {
      const log = this.logFor(`${key}:${rule.windowMs}`)
      // a grant at t occupies [t, t + windowMs)
      while (log.length > 0 && log[0] <= now - rule.windowMs) log.shift()
      if (log.length >= rule.limit) {
        waitMs = Math.max(waitMs, log[log.length - rule.limit] + rule.windowMs - now)
      }
      touched.push(log)
    }

    if (waitMs > 0) return waitMs
    for (const log of touched) log.push(now)
    return 0
  }

  /** grants currently inside the window, for status output and tests */
  count(key: string, rule: RateLimitRule, now: number): number {
    const log = this.logs.get(`${key}:${rule.windowMs}`) ?? []
    return log.filter(t => t > now - rule.windowMs).length
  }

  private logFor(id: string): number[] {
    let log = this.logs.get(id)
    if (!log) {
      log = []
      this.logs.set(id, log)
    }
    return log
  }
}

// ============================================================================
// REDIS STORE - fixed windows shared between collector processes
// ============================================================================

export class RedisWindowStore implements WindowStore {
  readonly kind = 'Redis (shared)'

  constructor(private readonly redis: Redis) {}

  async tryReserve(keys: readonly WindowKey[]): Promise<number> {
    const redisKeys = keys.map(({ key, rule }) => `ratelimit:${key}:${rule.windowMs}`)

    const pipeline = this.redis.pipeline()
    for (const redisKey of redisKeys) {
      pipeline.incr(redisKey)
      pipeline.pttl(redisKey)
    }
    const results = await pipeline.exec()

    let waitMs = 0
    const fresh = this.redis.pipeline()
    let freshCount = 0
    keys.forEach(({ rule }, i) => {
      const count = Number(results[i * 2] ?? 0)
      const ttl = Number(results[i * 2 + 1] ?? -1)
      // first hit of a window, or a key that lost its expiry
      if (count === 1 || ttl < 0) {
        fresh.pexpire(redisKeys[i], rule.windowMs)
        freshCount++
      }
      if (count > rule.limit) {
        waitMs = Math.max(waitMs, ttl > 0 ? ttl : rule.windowMs)
      }
    })
    if (freshCount > 0) await fresh.exec()

    if (waitMs > 0) {
      // give the permits back, the request is not going out
      const undo = this.redis.pipeline()
      for (const redisKey of redisKeys) undo.decr(redisKey)
      await undo.exec()
    }
    return waitMs
  }
}

// ============================================================================
// PUBLIC API
// ============================================================================

export interface RateLimiterOptions {
  appRules?: readonly RateLimitRule[]
  methodRules?: Readonly<Partial<Record<EndpointClass, readonly RateLimitRule[]>>>
  /** percentage (10-100) of every limit to actually use */
  throttlePercent?: number
  store?: WindowStore
  clock?: Clock
  logger?: Logger
}

export class RateLimiter {
  private readonly appRules: readonly RateLimitRule[]
  private readonly methodRules: Readonly<Partial<Record<EndpointClass, readonly RateLimitRule[]>>>
  private readonly store: WindowStore
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly locks = new Map<string, Promise<void>>()

  constructor(options: RateLimiterOptions = {}) {
    const throttle = Math.min(100, Math.max(10, options.throttlePercent ?? 100))
    const scale = (rules: readonly RateLimitRule[]) =>
      rules.map(rule => ({ windowMs: rule.windowMs, limit: Math.max(1, Math.floor((rule.limit * throttle) / 100)) }))

    this.appRules = scale(options.appRules ?? APP_RULES)
    const methodRules: Partial<Record<EndpointClass, readonly RateLimitRule[]>> = {}
    for (const [endpoint, rules] of Object.entries(options.methodRules ?? METHOD_RULES)) {
      if (isEndpointClass(endpoint) && rules) methodRules[endpoint] = scale(rules)
    }
    this.methodRules = methodRules
    this.store = options.store ?? new MemoryWindowStore()
    this.clock = options.clock ?? systemClock
    this.logger = options.logger ?? createLogger('RATE LIMIT')

    this.logger.debug(`Mode: ${this.store.kind}, throttle ${throttle}%`)
  }

  keysFor(routing: string, endpoint: EndpointClass): WindowKey[] {
    const keys: WindowKey[] = this.appRules.map(rule => ({ key: routing, rule }))
    for (const rule of this.methodRules[endpoint] ?? []) {
      keys.push({ key: `${routing}:${endpoint}`, rule })
    }
    return keys
  }

  /**
   * Waits until both the application and the method limits for this routing
   * value have a free permit, then consumes one of each.
   */
  async acquire(routing: string, endpoint: EndpointClass, signal?: AbortSignal): Promise<void> {
    const keys = this.keysFor(routing, endpoint)
    for (;;) {
      throwIfCancelled(signal)
      const waitMs = await this.withLock(routing, () => this.store.tryReserve(keys, this.clock.now()))
      if (waitMs <= 0) return

      if (waitMs > 1000) {
        this.logger.info(`Limit reached for ${routing}:${endpoint}, waiting ${(waitMs / 1000).toFixed(1)}s`)
      }
      await this.clock.sleep(waitMs, signal)
    }
  }

  // lock on the routing value so check-and-consume is atomic even for async stores
  private async withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    while (this.locks.has(key)) {
      await this.locks.get(key)
    }

    let releaseLock = () => {}
    const lockPromise = new Promise<void>(resolve => {
      releaseLock = resolve
    })
    this.locks.set(key, lockPromise)

    try {
      return await task()
    } finally {
      this.locks.delete(key)
      releaseLock()
    }
  }
}

const ENDPOINT_CLASSES: readonly EndpointClass[] = ['account', 'summoner', 'league', 'match-list', 'match-detail', 'status']

function isEndpointClass(value: string): value is EndpointClass {
  return ENDPOINT_CLASSES.some(endpoint => endpoint === value)
}

export function createRateLimiter(options: {
  redis: { url: string; token: string } | null
  throttlePercent: number
  logger?: Logger
}): RateLimiter {
  const logger = options.logger ?? createLogger('RATE LIMIT')
  const store = options.redis
    ? new RedisWindowStore(new Redis({ url: options.redis.url, token: options.redis.token }))
    : new MemoryWindowStore()
  logger.info(`Mode: ${store.kind}`)
  logger.info(`Throttle: ${options.throttlePercent}%`)
  return new RateLimiter({ store, throttlePercent: options.throttlePercent, logger })
}
