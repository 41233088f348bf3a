// Riot API gateway (server-only)
// every call: circuit admission -> retry loop of (concurrency slot -> rate-limit permit -> http) -> circuit verdict
import pLimit, { type LimitFunction } from 'p-limit'
import { deadline, systemClock, type Clock } from '@/lib/clock'
import { hostFor, type Platform, type RegionalCluster } from '@/lib/game/regions'
import type { LeagueQueue } from '@/lib/game/queues'
import { createLogger, type Logger } from '@/lib/log'
import type { CircuitBreaker } from '@/lib/health/circuit-breaker'
import type { RetryPolicy } from '@/lib/health/retry-policy'
import type { MatchRecord } from '@/types/match'
import {
  errorForStatus,
  errorMessage,
  isConnectionFailure,
  isTransient,
  NotFoundError,
  ParseError,
  parseRetryAfter,
  PlatformUnavailableError,
  RequestError,
} from './errors'
import { parseMatch, parsePayload } from './match-parser'
import type { EndpointClass, RateLimiter } from './rate-limiter'
import {
  accountSchema,
  leagueListSchema,
  matchIdsSchema,
  summonerSchema,
  type Account,
  type LeagueEntry,
  type Summoner,
} from './schemas'
import { fetchTransport, toTransportError, type Transport, type TransportResponse } from './transport'

export type LeagueTier = 'challenger' | 'grandmaster' | 'master'

// match-v5 and account-v1 live on the regional hosts, everything else on the platform host
const REGIONAL_ENDPOINTS: ReadonlySet<EndpointClass> = new Set<EndpointClass>(['match-list', 'match-detail', 'account'])

// account-v1 has no sea cluster
const ACCOUNT_ROUTING: Record<RegionalCluster, RegionalCluster> = {
  americas: 'americas',
  europe: 'europe',
  asia: 'asia',
  sea: 'asia',
}

export type Query = Record<string, string | number | undefined>

export interface RequestOptions {
  query?: Query
  signal?: AbortSignal
}

export interface MatchIdsQuery {
  /** a single queue id; omit to ask for all ranked queues */
  queue?: number
  type?: 'ranked'
  start?: number
  count?: number
  /** epoch ms, converted to the epoch seconds the api expects */
  startTime?: number | null
  endTime?: number | null
}

export interface GatewayOptions {
  apiKey: string
  limiter: RateLimiter
  breaker: CircuitBreaker
  retry: RetryPolicy
  /** process-wide ceiling on in-flight network operations */
  maxConcurrent: number
  timeoutMs: number
  transport?: Transport
  clock?: Clock
  logger?: Logger
}

export class RiotGateway {
  private readonly limit: LimitFunction
  private readonly transport: Transport
  private readonly clock: Clock
  private readonly logger: Logger
  private requestSeq = 0

  constructor(private readonly options: GatewayOptions) {
    this.limit = pLimit(Math.max(1, options.maxConcurrent))
    this.transport = options.transport ?? fetchTransport
    this.clock = options.clock ?? systemClock
    this.logger = options.logger ?? createLogger('RIOT API')
  }

  get inFlight(): number {
    return this.limit.activeCount
  }

  /**
   * Issues one logical request and hands the decoded body to `parse`.
   * ParseError from `parse` fails this request only and leaves the circuit as it was.
   */
  async request<T>(
    platform: Platform,
    endpoint: EndpointClass,
    path: string,
    parse: (body: unknown) => T,
    { query, signal }: RequestOptions = {}
  ): Promise<T> {
    const { breaker, retry } = this.options
    const admission = breaker.tryAcquire(platform.code)
    if (!admission.allowed) {
      throw new PlatformUnavailableError(platform.code, admission.retryInMs)
    }

    const { ticket } = admission
    const log = this.logger.child({ platform: platform.code, req: ++this.requestSeq })
    const startedAt = this.clock.now()

    let body: unknown
    try {
      body = await retry.run(() => this.limit(() => this.attempt(platform, endpoint, path, query, log, signal)), {
        signal,
        onRetry: (error, attempt, delayMs) =>
          log.warn(`${endpoint} attempt ${attempt} failed (${errorMessage(error)}), retrying in ${delayMs}ms`),
      })
    } catch (error) {
      if (isTransient(error)) {
        breaker.recordFailure(platform.code, ticket)
      } else if (error instanceof NotFoundError || error instanceof RequestError) {
        // the platform answered, it is healthy
        breaker.recordSuccess(platform.code, ticket)
      } else {
        breaker.release(platform.code, ticket)
      }
      log.debug(`${endpoint} ${path} failed after ${this.clock.now() - startedAt}ms: ${errorMessage(error)}`)
      throw error
    }

    try {
      const result = parse(body)
      breaker.recordSuccess(platform.code, ticket)
      log.debug(`${endpoint} ${path} ok in ${this.clock.now() - startedAt}ms`)
      return result
    } catch (error) {
      breaker.release(platform.code, ticket)
      throw error
    }
  }

  private hostsFor(platform: Platform, endpoint: EndpointClass): { routing: string; hosts: string[] } {
    if (endpoint === 'account') {
      const routing = ACCOUNT_ROUTING[platform.regional]
      return { routing, hosts: [hostFor(routing)] }
    }
    if (REGIONAL_ENDPOINTS.has(endpoint)) {
      return { routing: platform.regional, hosts: [platform.regionalHost] }
    }
    return { routing: platform.code, hosts: [platform.host, ...platform.fallbackHosts] }
  }

  // one attempt; platform-routed endpoints walk the fallback hosts on dns/connection failures
  private async attempt(
    platform: Platform,
    endpoint: EndpointClass,
    path: string,
    query: Query | undefined,
    log: Logger,
    signal?: AbortSignal
  ): Promise<unknown> {
    const { routing, hosts } = this.hostsFor(platform, endpoint)
    let lastError: unknown = null

    for (const [index, host] of hosts.entries()) {
      try {
        return await this.send(buildUrl(host, path, query), platform.code, routing, endpoint, log, signal)
      } catch (error) {
        if (!isConnectionFailure(error) || index === hosts.length - 1) throw error
        log.warn(`${host} unreachable (${errorMessage(error)}), trying ${hosts[index + 1]}`)
        lastError = error
      }
    }
    throw lastError
  }

  private async send(
    url: string,
    platformCode: string,
    routing: string,
    endpoint: EndpointClass,
    log: Logger,
    signal?: AbortSignal
  ): Promise<unknown> {
    await this.options.limiter.acquire(routing, endpoint, signal)

    // the deadline covers the body as well as the headers
    let response: TransportResponse
    try {
      response = await this.transport(url, {
        headers: { 'X-Riot-Token': this.options.apiKey, Accept: 'application/json' },
        signal: deadline(this.options.timeoutMs, signal),
      })
    } catch (error) {
      throw toTransportError(error, url, platformCode, signal)
    }

    if (response.status < 200 || response.status >= 300) {
      // drained so the keep-alive connection goes back to the pool
      await response.text().catch((error: unknown) => log.debug(`dropping ${response.status} body: ${errorMessage(error)}`))
      throw errorForStatus(response.status, url, platformCode, parseRetryAfter(response.headers.get('retry-after')))
    }

    let text: string
    try {
      text = await response.text()
    } catch (error) {
      // a deadline or socket error while streaming the body is as transient as one before the headers
      throw toTransportError(error, url, platformCode, signal)
    }
    try {
      const body: unknown = JSON.parse(text)
      return body
    } catch (error) {
      throw new ParseError(`invalid json from ${url}`, platformCode, { cause: error })
    }
  }

  // ══════════════════════════════════════════════════════════════════════════════
  // typed endpoints
  // ══════════════════════════════════════════════════════════════════════════════

  getMatchIds(platform: Platform, puuid: string, params: MatchIdsQuery = {}, signal?: AbortSignal): Promise<string[]> {
    const query: Query = {
      queue: params.queue,
      type: params.type,
      start: params.start ?? 0,
      count: Math.min(100, params.count ?? 100),
      startTime: toEpochSeconds(params.startTime),
      endTime: toEpochSeconds(params.endTime),
    }
    return this.request(
      platform,
      'match-list',
      `/lol/match/v5/matches/by-puuid/${encodeURIComponent(puuid)}/ids`,
      body => parsePayload(matchIdsSchema, body, 'match id list', platform.code),
      { query, signal }
    )
  }

  getMatch(platform: Platform, matchId: string, signal?: AbortSignal): Promise<MatchRecord> {
    return this.request(
      platform,
      'match-detail',
      `/lol/match/v5/matches/${encodeURIComponent(matchId)}`,
      body => parseMatch(body, platform.code),
      { signal }
    )
  }

  async getLeague(
    platform: Platform,
    tier: LeagueTier,
    queue: LeagueQueue,
    signal?: AbortSignal
  ): Promise<LeagueEntry[]> {
    const league = await this.request(
      platform,
      'league',
      `/lol/league/v4/${tier}leagues/by-queue/${queue}`,
      body => parsePayload(leagueListSchema, body, 'league list', platform.code),
      { signal }
    )
    return league.entries
  }

  getAccountByRiotId(platform: Platform, gameName: string, tagLine: string, signal?: AbortSignal): Promise<Account> {
    return this.request(
      platform,
      'account',
      `/riot/account/v1/accounts/by-riot-id/${encodeURIComponent(gameName)}/${encodeURIComponent(tagLine)}`,
      body => parsePayload(accountSchema, body, 'account', platform.code),
      { signal }
    )
  }

  getSummonerById(platform: Platform, summonerId: string, signal?: AbortSignal): Promise<Summoner> {
    return this.request(
      platform,
      'summoner',
      `/lol/summoner/v4/summoners/${encodeURIComponent(summonerId)}`,
      body => parsePayload(summonerSchema, body, 'summoner', platform.code),
      { signal }
    )
  }
}

export function buildUrl(host: string, path: string, query?: Query): string {
  const params = new URLSearchParams()
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) params.set(key, String(value))
  }
  const search = params.toString()
  return `https://${host}${path}${search ? `?${search}` : ''}`
}

function toEpochSeconds(ms: number | null | undefined): number | undefined {
  return ms === null || ms === undefined ? undefined : Math.floor(ms / 1000)
}
