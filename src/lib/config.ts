// runtime settings, parsed once from the environment (scripts/load-env.ts fills process.env)
import { z } from 'zod'
import { isValidPlatform, type PlatformCode } from '@/lib/game/regions'
import { DEFAULT_QUEUES } from '@/lib/game/queues'
import { isLogLevel, type LogLevel } from '@/lib/log'
import type { RetryOptions } from '@/lib/health/retry-policy'
import { DEFAULT_HEALTH_TIMEOUTS, type HealthTimeouts } from '@/lib/health/timeout-config'

const DAY_MS = 24 * 60 * 60 * 1000

export interface Settings {
  riotApiKey: string
  supabase: { url: string; secretKey: string } | null
  redis: { url: string; token: string } | null
  platforms: PlatformCode[]
  queues: number[]
  matchesPerRegion: number
  matchesTotal: number | null
  /** "latest", "any" or an explicit "16.3" - resolved by resolveTargetPatch */
  targetPatch: string
  /** epoch ms window applied to match history and to the final filter */
  window: { start: number | null; end: number | null }
  maxConcurrentRequests: number
  maxChunk: number
  discoveryBuffer: number
  idsPerPlayer: number
  seeds: { puuids: string[]; riotIds: string[] }
  retry: RetryOptions
  breaker: { failureThreshold: number; resetTimeoutMs: number }
  requestTimeoutMs: number
  throttlePercent: number
  health: { cacheTtlMs: number; path: string; timeouts: HealthTimeouts }
  logLevel: LogLevel
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`)
    this.name = 'ConfigError'
  }
}

const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value)

// strips the quotes some dashboards leave around pasted secrets
const unquote = (value: string) => value.trim().replace(/^["']|["']$/g, '')

const text = () => z.preprocess(blankToUndefined, z.string().transform(unquote).optional())

const int = (fallback: number, min = 1, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback))

const num = (fallback: number, min = 0) => z.preprocess(blankToUndefined, z.coerce.number().min(min).default(fallback))

const csv = (fallback = '') =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .default(fallback)
      .transform(value =>
        value
          .split(',')
          .map(item => item.trim())
          .filter(item => item.length > 0)
      )
  )

// the round trip catches days Date.parse would roll over into the next month
function isCalendarDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false
  const ms = Date.parse(`${value}T00:00:00Z`)
  return !Number.isNaN(ms) && new Date(ms).toISOString().slice(0, 10) === value
}

const isoDate = () =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .refine(isCalendarDate, 'expected a calendar date as YYYY-MM-DD')
      .transform(value => Date.parse(`${value}T00:00:00Z`))
      .optional()
  )

const flag = () => z.preprocess(blankToUndefined, z.enum(['true', 'false', '1', '0']).default('false'))

const envSchema = z.object({
  RIOT_API_KEY: z.preprocess(blankToUndefined, z.string({ required_error: 'RIOT_API_KEY is required' }).transform(unquote)),
  SUPABASE_URL: text(),
  SUPABASE_SECRET_KEY: text(),
  USE_REDIS_RATE_LIMIT: flag(),
  UPSTASH_REDIS_REST_URL: text(),
  UPSTASH_REDIS_REST_TOKEN: text(),
  SCRAPE_PLATFORMS: csv('euw1,eun1,na1,kr').transform((codes, ctx) => {
    const platforms: PlatformCode[] = []
    for (const raw of codes) {
      const code = raw.toLowerCase()
      if (!isValidPlatform(code)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown platform "${raw}"` })
        return z.NEVER
      }
      if (!platforms.includes(code)) platforms.push(code)
    }
    return platforms
  }),
  QUEUES: csv(DEFAULT_QUEUES.join(',')).pipe(z.array(z.coerce.number().int().positive()).min(1)),
  MATCHES_PER_REGION: int(500),
  MATCHES_TOTAL: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).optional()),
  TARGET_PATCH: z.preprocess(blankToUndefined, z.string().default('latest')),
  PATCH_START_DATE: isoDate(),
  PATCH_END_DATE: isoDate(),
  MAX_CONCURRENT_REQUESTS: int(10),
  MAX_CHUNK: int(20),
  DISCOVERY_BUFFER: int(5, 0),
  IDS_PER_PLAYER: int(100, 1, 100),
  SEED_PUUIDS: csv(),
  SEED_RIOT_IDS: csv().pipe(z.array(z.string().regex(/^[^#]+#[^#]+$/, 'riot ids look like name#tag'))),
  RETRY_ATTEMPTS: int(4),
  RETRY_BASE_MS: int(200, 0),
  RETRY_FACTOR: num(2, 1),
  RETRY_MAX_DELAY_MS: int(10_000, 0),
  RETRY_JITTER_MS: int(50, 0),
  BREAKER_THRESHOLD: int(5),
  BREAKER_RESET_MS: int(30_000),
  REQUEST_TIMEOUT_MS: int(10_000),
  SCRAPER_THROTTLE: int(100, 10, 100),
  HEALTH_CACHE_TTL_S: int(30, 0),
  HEALTH_PATH: z.preprocess(blankToUndefined, z.string().startsWith('/').default('/lol/status/v4/platform-data')),
  HEALTH_DNS_TIMEOUT_MS: int(DEFAULT_HEALTH_TIMEOUTS.dnsMs),
  HEALTH_HTTP_TIMEOUT_MS: int(DEFAULT_HEALTH_TIMEOUTS.httpMs),
  HEALTH_DEGRADED_MS: int(DEFAULT_HEALTH_TIMEOUTS.degradedMs),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z
      .string()
      .default('info')
      .transform(value => value.toLowerCase())
      .refine(isLogLevel, 'expected debug, info, warn, error or silent')
  ),
})

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`))
  }
  const e = parsed.data

  const issues: string[] = []
  const useRedis = e.USE_REDIS_RATE_LIMIT === 'true' || e.USE_REDIS_RATE_LIMIT === '1'
  if (useRedis && (!e.UPSTASH_REDIS_REST_URL || !e.UPSTASH_REDIS_REST_TOKEN)) {
    issues.push('USE_REDIS_RATE_LIMIT: UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN are required')
  }
  if (e.PATCH_START_DATE !== undefined && e.PATCH_END_DATE !== undefined && e.PATCH_END_DATE < e.PATCH_START_DATE) {
    issues.push('PATCH_END_DATE: must not be before PATCH_START_DATE')
  }
  if (issues.length > 0) throw new ConfigError(issues)

  const logLevel = isLogLevel(e.LOG_LEVEL) ? e.LOG_LEVEL : 'info'

  return {
    riotApiKey: e.RIOT_API_KEY,
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SECRET_KEY ? { url: e.SUPABASE_URL, secretKey: e.SUPABASE_SECRET_KEY } : null,
    redis:
      useRedis && e.UPSTASH_REDIS_REST_URL && e.UPSTASH_REDIS_REST_TOKEN
        ? { url: e.UPSTASH_REDIS_REST_URL, token: e.UPSTASH_REDIS_REST_TOKEN }
        : null,
    platforms: e.SCRAPE_PLATFORMS,
    queues: e.QUEUES,
    matchesPerRegion: e.MATCHES_PER_REGION,
    matchesTotal: e.MATCHES_TOTAL ?? null,
    targetPatch: e.TARGET_PATCH,
    // the end date is a whole day, inclusive
    window: {
      start: e.PATCH_START_DATE ?? null,
      end: e.PATCH_END_DATE === undefined ? null : e.PATCH_END_DATE + DAY_MS,
    },
    maxConcurrentRequests: e.MAX_CONCURRENT_REQUESTS,
    maxChunk: e.MAX_CHUNK,
    discoveryBuffer: e.DISCOVERY_BUFFER,
    idsPerPlayer: e.IDS_PER_PLAYER,
    seeds: { puuids: e.SEED_PUUIDS, riotIds: e.SEED_RIOT_IDS },
    retry: {
      attempts: e.RETRY_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_MS,
      factor: e.RETRY_FACTOR,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
      jitterMs: e.RETRY_JITTER_MS,
    },
    breaker: { failureThreshold: e.BREAKER_THRESHOLD, resetTimeoutMs: e.BREAKER_RESET_MS },
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    throttlePercent: e.SCRAPER_THROTTLE,
    health: {
      cacheTtlMs: e.HEALTH_CACHE_TTL_S * 1000,
      path: e.HEALTH_PATH,
      timeouts: {
        dnsMs: e.HEALTH_DNS_TIMEOUT_MS,
        httpMs: e.HEALTH_HTTP_TIMEOUT_MS,
        degradedMs: e.HEALTH_DEGRADED_MS,
      },
    },
    logLevel,
  }
}
