// wires settings into a ready-to-run orchestrator
import type { Settings } from '@/lib/config'
import { createAdminClient } from '@/lib/db/supabase'
import { MemoryMatchSink, SupabaseMatchSink, type MatchSink } from '@/lib/db/match-sink'
import { resolveTargetPatch } from '@/lib/game/patch'
import { getPlatform } from '@/lib/game/regions'
import { CircuitBreaker } from '@/lib/health/circuit-breaker'
import { RetryPolicy } from '@/lib/health/retry-policy'
import { createLogger } from '@/lib/log'
import { RiotGateway } from '@/lib/riot/api'
import { createRateLimiter } from '@/lib/riot/rate-limiter'
import type { Transport } from '@/lib/riot/transport'
import { ScrapeOrchestrator, type ProgressEvent } from './orchestrator'

export interface CollectorOverrides {
  dryRun?: boolean
  sink?: MatchSink
  transport?: Transport
  onProgress?: (event: ProgressEvent) => void
}

export function createGateway(settings: Settings, transport?: Transport): RiotGateway {
  const level = settings.logLevel
  return new RiotGateway({
    apiKey: settings.riotApiKey,
    limiter: createRateLimiter({
      redis: settings.redis,
      throttlePercent: settings.throttlePercent,
      logger: createLogger('RATE LIMIT', {}, level),
    }),
    breaker: new CircuitBreaker({ ...settings.breaker, logger: createLogger('CIRCUIT', {}, level) }),
    retry: new RetryPolicy(settings.retry),
    maxConcurrent: settings.maxConcurrentRequests,
    timeoutMs: settings.requestTimeoutMs,
    transport,
    logger: createLogger('RIOT API', {}, level),
  })
}

export function createSink(settings: Settings, dryRun: boolean): MatchSink {
  if (dryRun) return new MemoryMatchSink()
  if (!settings.supabase) {
    throw new Error('SUPABASE_URL and SUPABASE_SECRET_KEY are required unless running with --dry-run')
  }
  const client = createAdminClient(settings.supabase.url, settings.supabase.secretKey)
  return new SupabaseMatchSink(client, createLogger('DB', {}, settings.logLevel))
}

export async function createCollector(
  settings: Settings,
  overrides: CollectorOverrides = {}
): Promise<{ orchestrator: ScrapeOrchestrator; patch: string | null; sink: MatchSink }> {
  const sink = overrides.sink ?? createSink(settings, overrides.dryRun ?? false)
  const patch = await resolveTargetPatch(settings.targetPatch)

  const orchestrator = new ScrapeOrchestrator({
    gateway: createGateway(settings, overrides.transport),
    sink,
    platforms: settings.platforms.map(getPlatform),
    target: settings.matchesPerRegion,
    totalCap: settings.matchesTotal,
    patch,
    window: settings.window,
    queues: settings.queues,
    maxConcurrent: settings.maxConcurrentRequests,
    maxChunk: settings.maxChunk,
    buffer: settings.discoveryBuffer,
    idsPerPlayer: settings.idsPerPlayer,
    seeds: settings.seeds,
    onProgress: overrides.onProgress,
    logger: createLogger('SCRAPER', {}, settings.logLevel),
  })
  return { orchestrator, patch, sink }
}
