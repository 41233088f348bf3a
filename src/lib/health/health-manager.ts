// standalone platform health checks (dns + http), cached per platform.
// read-only: never feeds the circuit breaker.
import { systemClock, type Clock } from '@/lib/clock'
import { getPlatform, type Platform, type PlatformCode } from '@/lib/game/regions'
import { createLogger, type Logger } from '@/lib/log'
import type { Transport } from '@/lib/riot/transport'
import { checkDns, type DnsResult, type Resolver } from './dns-checker'
import { checkHttp, type HttpResult } from './http-checker'
import { DEFAULT_HEALTH_TIMEOUTS, type HealthTimeouts } from './timeout-config'

export interface HealthReport {
  platform: PlatformCode
  host: string
  reachable: boolean
  latencyMs: number
  lastError: string | null
  dns: DnsResult
  /** null when dns already failed */
  http: HttpResult | null
  checkedAt: number
}

export interface HealthManagerOptions {
  apiKey: string
  path?: string
  cacheTtlMs?: number
  timeouts?: HealthTimeouts
  transport?: Transport
  resolver?: Resolver
  clock?: Clock
  logger?: Logger
}

export class HealthManager {
  private readonly cache = new Map<PlatformCode, HealthReport>()
  private readonly path: string
  private readonly cacheTtlMs: number
  private readonly timeouts: HealthTimeouts
  private readonly clock: Clock
  private readonly logger: Logger

  constructor(private readonly options: HealthManagerOptions) {
    this.path = options.path ?? '/lol/status/v4/platform-data'
    this.cacheTtlMs = options.cacheTtlMs ?? 30_000
    this.timeouts = options.timeouts ?? DEFAULT_HEALTH_TIMEOUTS
    this.clock = options.clock ?? systemClock
    this.logger = options.logger ?? createLogger('HEALTH')
  }

  async check(target: Platform | PlatformCode, { force = false }: { force?: boolean } = {}): Promise<HealthReport> {
    const platform = typeof target === 'string' ? getPlatform(target) : target
    const now = this.clock.now()
    const cached = this.cache.get(platform.code)
    if (!force && cached && now - cached.checkedAt < this.cacheTtlMs) {
      return cached
    }

    const log = this.logger.child({ platform: platform.code })
    const dns = await checkDns(platform.host, {
      timeoutMs: this.timeouts.dnsMs,
      resolver: this.options.resolver,
      clock: this.clock,
    })

    let http: HttpResult | null = null
    if (dns.ok) {
      http = await checkHttp(`https://${platform.host}${this.path}`, {
        apiKey: this.options.apiKey,
        timeoutMs: this.timeouts.httpMs,
        degradedMs: this.timeouts.degradedMs,
        platform: platform.code,
        transport: this.options.transport,
        clock: this.clock,
      })
    }

    const report: HealthReport = {
      platform: platform.code,
      host: platform.host,
      reachable: http?.ok ?? false,
      latencyMs: dns.latencyMs + (http?.latencyMs ?? 0),
      lastError: dns.ok ? (http?.error ?? null) : `dns: ${dns.error}`,
      dns,
      http,
      checkedAt: this.clock.now(),
    }

    if (report.reachable) {
      log.info(`ok in ${report.latencyMs}ms${http?.degraded ? ' (degraded)' : ''}`)
    } else {
      log.warn(`unreachable: ${report.lastError}`)
    }
    this.cache.set(platform.code, report)
    return report
  }

  /**
   * Checks several platforms. With failFast the checks run in order and
   * stop at the first unreachable platform.
   */
  async checkMany(
    platforms: ReadonlyArray<Platform | PlatformCode>,
    { failFast = false }: { failFast?: boolean } = {}
  ): Promise<HealthReport[]> {
    if (!failFast) return Promise.all(platforms.map(platform => this.check(platform)))

    const reports: HealthReport[] = []
    for (const platform of platforms) {
      const report = await this.check(platform)
      reports.push(report)
      if (!report.reachable) break
    }
    return reports
  }

  async firstHealthy(platforms: ReadonlyArray<Platform | PlatformCode>): Promise<HealthReport | null> {
    for (const platform of platforms) {
      const report = await this.check(platform)
      if (report.reachable) return report
    }
    return null
  }
}
