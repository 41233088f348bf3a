// per-region collection pipeline
// regions run one after another; inside a region candidate details are fetched
// by a bounded pool of workers and written through the sink exactly once
import { systemClock, type Clock } from '@/lib/clock'
import { inDateWindow, matchesPatch, type DateWindow } from '@/lib/game/patch'
import type { Platform, PlatformCode } from '@/lib/game/regions'
import { createLogger, type Logger } from '@/lib/log'
import type { MatchSink } from '@/lib/db/match-sink'
import type { RiotGateway } from '@/lib/riot/api'
import {
  CancelledError,
  errorMessage,
  isTransient,
  NotFoundError,
  ParseError,
  PlatformUnavailableError,
  RequestError,
  SeedExhaustionError,
  UnauthorizedError,
} from '@/lib/riot/errors'
import type { MatchCandidate, MatchRecord } from '@/types/match'
import { DiscoveryEngine, type DiscoveryGateway } from './discovery'

export type ScrapeGateway = DiscoveryGateway & Pick<RiotGateway, 'getMatch'>

export type RegionStatus =
  | 'complete' // target reached
  | 'capped' // global total cap reached
  | 'exhausted' // ran out of players to expand
  | 'unavailable' // circuit open for the platform
  | 'cancelled'
  | 'failed' // unauthorized or storage failure, run aborted
  | 'skipped' // never started because the run aborted earlier

export interface ProgressEvent {
  platform: PlatformCode
  current: number
  target: number
}

export interface RegionStats {
  fetched: number
  inserted: number
  duplicates: number
  filtered: number
  failed: number
}

export interface RegionSummary {
  platform: PlatformCode
  target: number
  /** persisted before this run started */
  initial: number
  /** persisted when the region finished */
  current: number
  status: RegionStatus
  reason: string | null
  stats: RegionStats
  startedAt: number
  finishedAt: number
  durationMs: number
}

export interface RunSummary {
  regions: RegionSummary[]
  inserted: number
  aborted: boolean
  error: string | null
  startedAt: number
  finishedAt: number
  durationMs: number
}

export interface OrchestratorOptions {
  gateway: ScrapeGateway
  sink: MatchSink
  platforms: readonly Platform[]
  /** per-region target */
  target: number
  /** cap on records inserted by this run across all regions */
  totalCap?: number | null
  /** null disables the patch filter */
  patch: string | null
  window: DateWindow
  queues: readonly number[]
  maxConcurrent: number
  maxChunk: number
  buffer: number
  idsPerPlayer: number
  seeds: { puuids: readonly string[]; riotIds: readonly string[] }
  onProgress?: (event: ProgressEvent) => void
  clock?: Clock
  logger?: Logger
}

// state shared by the workers of one region
interface RegionRun {
  platform: Platform
  discovery: DiscoveryEngine
  claimed: Set<string>
  current: number
  /** upserts in progress, counted against the target before they land */
  reserved: number
  stats: RegionStats
  stop: { status: RegionStatus; reason: string } | null
  fatal: Error | null
  log: Logger
}

export class ScrapeOrchestrator {
  private readonly clock: Clock
  private readonly logger: Logger
  private insertedTotal = 0

  constructor(private readonly options: OrchestratorOptions) {
    this.clock = options.clock ?? systemClock
    this.logger = options.logger ?? createLogger('SCRAPER')
  }

  async run(signal?: AbortSignal): Promise<RunSummary> {
    const startedAt = this.clock.now()
    const regions: RegionSummary[] = []
    let error: Error | null = null

    for (const platform of this.options.platforms) {
      if (error !== null || signal?.aborted) {
        regions.push(this.skipped(platform, error ? 'run aborted' : 'cancelled'))
        continue
      }
      const { summary, fatal } = await this.runRegion(platform, signal)
      regions.push(summary)
      if (fatal) error = fatal
    }

    const finishedAt = this.clock.now()
    return {
      regions,
      inserted: this.insertedTotal,
      aborted: error !== null,
      error: error ? errorMessage(error) : null,
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
    }
  }

  private get capReached(): boolean {
    const cap = this.options.totalCap ?? null
    return cap !== null && this.insertedTotal >= cap
  }

  private async runRegion(
    platform: Platform,
    signal?: AbortSignal
  ): Promise<{ summary: RegionSummary; fatal: Error | null }> {
    const { sink, target, patch, maxConcurrent, maxChunk, buffer } = this.options
    const startedAt = this.clock.now()
    const log = this.logger.child({ platform: platform.code })

    // reruns pick up where the last one stopped
    const initial = await sink.countForPlatform(platform.code, patch ?? undefined)

    const run: RegionRun = {
      platform,
      discovery: new DiscoveryEngine({
        platform,
        gateway: this.options.gateway,
        queues: this.options.queues,
        idsPerPlayer: this.options.idsPerPlayer,
        window: this.options.window,
        seeds: this.options.seeds,
        logger: createLogger('DISCOVERY', { platform: platform.code }, this.logger.level),
      }),
      claimed: new Set(),
      current: initial,
      reserved: 0,
      stats: { fetched: 0, inserted: 0, duplicates: 0, filtered: 0, failed: 0 },
      stop: null,
      fatal: null,
      log,
    }

    log.info(`starting at ${initial}/${target}${patch ? ` on patch ${patch}` : ''}`)
    this.emit(run)

    const inFlight = new Set<Promise<void>>()
    const pending: MatchCandidate[] = []

    while (run.stop === null && run.fatal === null) {
      if (signal?.aborted) {
        run.stop = { status: 'cancelled', reason: 'cancelled' }
        break
      }
      if (run.current >= target) break
      if (this.capReached) break

      const remaining = this.remaining(run)

      if (pending.length === 0) {
        const shortfall = remaining - inFlight.size
        // enough work in flight to finish, or nothing left to discover
        if ((shortfall <= 0 || run.discovery.exhausted) && inFlight.size > 0) {
          await Promise.race(inFlight)
          continue
        }
        try {
          pending.push(...(await run.discovery.take(Math.min(maxChunk, shortfall + buffer), signal)))
        } catch (error) {
          this.handleRegionError(run, error)
        }
        continue
      }

      if (inFlight.size >= maxConcurrent) {
        await Promise.race(inFlight)
        continue
      }

      const candidate = pending.shift()
      if (candidate === undefined) continue
      // claimed synchronously, so two workers never handle the same id
      if (run.claimed.has(candidate.matchId)) {
        run.stats.duplicates++
        continue
      }
      run.claimed.add(candidate.matchId)

      const task: Promise<void> = this.process(run, candidate, signal).finally(() => {
        inFlight.delete(task)
      })
      inFlight.add(task)
    }

    // let in-flight writes land; nothing new starts
    await Promise.all(inFlight)

    const finishedAt = this.clock.now()
    const { status, reason } = this.outcome(run)
    const summary: RegionSummary = {
      platform: platform.code,
      target,
      initial,
      current: run.current,
      status,
      reason,
      stats: run.stats,
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
    }

    const line = `${status}: ${run.current}/${target} (+${run.stats.inserted}) in ${(summary.durationMs / 1000).toFixed(1)}s`
    if (status === 'complete') log.info(line)
    else log.warn(`${line}${reason ? ` - ${reason}` : ''}`)

    return { summary, fatal: run.fatal }
  }

  private remaining(run: RegionRun): number {
    const toTarget = this.options.target - run.current - run.reserved
    const cap = this.options.totalCap ?? null
    if (cap === null) return toTarget
    return Math.min(toTarget, cap - this.insertedTotal - run.reserved)
  }

  private async process(run: RegionRun, candidate: MatchCandidate, signal?: AbortSignal): Promise<void> {
    const { gateway, sink, queues, patch, window } = this.options
    try {
      if (await sink.exists(candidate.matchId)) {
        run.stats.duplicates++
        return
      }
      if (run.stop !== null || run.fatal !== null || this.remaining(run) <= 0) return

      const record = await gateway.getMatch(run.platform, candidate.matchId, signal)
      run.stats.fetched++

      if (!this.accepts(record, queues, patch, window)) {
        run.stats.filtered++
        return
      }

      // reserve a slot before writing so concurrent workers never overshoot the target
      if (signal?.aborted || this.remaining(run) <= 0) return
      run.reserved++
      try {
        const result = await sink.upsert(record)
        if (result === 'inserted') {
          run.stats.inserted++
          this.insertedTotal++
          run.discovery.absorb(record)
          // stored under the platform the match was played on, so only those count towards this region
          if (record.platform === run.platform.code) {
            run.current++
            this.emit(run)
          } else {
            run.log.debug(`${record.matchId} belongs to ${record.platform}, not counted towards ${run.platform.code}`)
          }
        } else {
          run.stats.duplicates++
        }
      } finally {
        run.reserved--
      }
    } catch (error) {
      this.handleRegionError(run, error, candidate.matchId)
    }
  }

  private accepts(record: MatchRecord, queues: readonly number[], patch: string | null, window: DateWindow): boolean {
    return (
      queues.includes(record.queueId) &&
      matchesPatch(record.gameVersion, patch) &&
      inDateWindow(record.gameCreation, window)
    )
  }

  private handleRegionError(run: RegionRun, error: unknown, matchId?: string): void {
    if (error instanceof CancelledError) return
    if (error instanceof SeedExhaustionError) {
      run.stop ??= { status: 'exhausted', reason: error.message }
      return
    }
    if (error instanceof PlatformUnavailableError) {
      run.stop ??= { status: 'unavailable', reason: error.message }
      return
    }
    if (error instanceof NotFoundError || error instanceof RequestError || error instanceof ParseError || isTransient(error)) {
      run.stats.failed++
      run.log.warn(`${matchId ?? 'discovery'} dropped: ${errorMessage(error)}`)
      return
    }
    // unauthorized, storage failures and anything unexpected end the run
    if (run.fatal === null) {
      run.fatal = error instanceof Error ? error : new Error(String(error))
      run.log.error(
        error instanceof UnauthorizedError ? 'credential rejected, aborting run' : `aborting run: ${errorMessage(error)}`
      )
    }
  }

  private outcome(run: RegionRun): { status: RegionStatus; reason: string | null } {
    if (run.fatal !== null) return { status: 'failed', reason: errorMessage(run.fatal) }
    if (run.current >= this.options.target) return { status: 'complete', reason: null }
    if (this.capReached) return { status: 'capped', reason: `total cap of ${this.options.totalCap} reached` }
    if (run.stop !== null) return run.stop
    return { status: 'exhausted', reason: 'no players left to expand' }
  }

  private emit(run: RegionRun): void {
    this.options.onProgress?.({ platform: run.platform.code, current: run.current, target: this.options.target })
  }

  private skipped(platform: Platform, reason: string): RegionSummary {
    const now = this.clock.now()
    return {
      platform: platform.code,
      target: this.options.target,
      initial: 0,
      current: 0,
      status: reason === 'cancelled' ? 'cancelled' : 'skipped',
      reason,
      stats: { fetched: 0, inserted: 0, duplicates: 0, filtered: 0, failed: 0 },
      startedAt: now,
      finishedAt: now,
      durationMs: 0,
    }
  }
}
