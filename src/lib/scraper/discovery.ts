// player graph discovery for one region run.
// players are expanded breadth-first: each one at most once, only on demand.
import { throwIfCancelled } from '@/lib/clock'
import type { DateWindow } from '@/lib/game/patch'
import { leagueQueueFor } from '@/lib/game/queues'
import type { Platform } from '@/lib/game/regions'
import { createLogger, type Logger } from '@/lib/log'
import type { LeagueTier, RiotGateway } from '@/lib/riot/api'
import { errorMessage, isTransient, NotFoundError, ParseError, RequestError, SeedExhaustionError } from '@/lib/riot/errors'
import type { LeagueEntry } from '@/lib/riot/schemas'
import type { MatchCandidate, MatchRecord } from '@/types/match'

export type DiscoveryGateway = Pick<RiotGateway, 'getMatchIds' | 'getLeague' | 'getAccountByRiotId' | 'getSummonerById'>

const BOOTSTRAP_TIERS: readonly LeagueTier[] = ['challenger', 'grandmaster', 'master']

// league entries without a puuid cost one summoner lookup each
const MAX_BOOTSTRAP_LOOKUPS = 50

export interface DiscoveryOptions {
  platform: Platform
  gateway: DiscoveryGateway
  queues: readonly number[]
  idsPerPlayer: number
  window: DateWindow
  seeds: { puuids: readonly string[]; riotIds: readonly string[] }
  logger?: Logger
}

export interface DiscoveryStats {
  enqueued: number
  expanded: number
  pendingPlayers: number
  bufferedCandidates: number
  seenMatches: number
}

export class DiscoveryEngine {
  private readonly frontier: string[] = []
  private head = 0
  private readonly visited = new Set<string>()
  private readonly expanded = new Set<string>()
  private readonly seenMatchIds = new Set<string>()
  private candidates: MatchCandidate[] = []
  private seeded = false
  private readonly logger: Logger

  constructor(private readonly options: DiscoveryOptions) {
    this.logger = options.logger ?? createLogger('DISCOVERY', { platform: options.platform.code })
  }

  /** true once seeding ran and there is nothing left to expand or hand out */
  get exhausted(): boolean {
    return this.seeded && this.pendingPlayers === 0 && this.candidates.length === 0
  }

  get stats(): DiscoveryStats {
    return {
      enqueued: this.visited.size,
      expanded: this.expanded.size,
      pendingPlayers: this.pendingPlayers,
      bufferedCandidates: this.candidates.length,
      seenMatches: this.seenMatchIds.size,
    }
  }

  private get pendingPlayers(): number {
    return this.frontier.length - this.head
  }

  /** Adds a player to the frontier unless it was ever enqueued before. */
  enqueue(puuid: string): boolean {
    if (!puuid || this.visited.has(puuid)) return false
    this.visited.add(puuid)
    this.frontier.push(puuid)
    return true
  }

  /**
   * Seeds the frontier from configured puuids and riot ids, falling back to
   * the top of the ranked ladder. Runs once.
   */
  async seed(signal?: AbortSignal): Promise<number> {
    if (this.seeded) return 0
    const { seeds } = this.options
    let added = 0

    for (const puuid of seeds.puuids) {
      if (this.enqueue(puuid)) added++
    }
    for (const riotId of seeds.riotIds) {
      const puuid = await this.resolveRiotId(riotId, signal)
      if (puuid && this.enqueue(puuid)) added++
    }
    if (added === 0) {
      added = await this.bootstrapFromLeague(signal)
    }

    this.seeded = true
    this.logger.info(`seeded ${added} players`)
    return added
  }

  /**
   * Returns up to `count` unseen match candidates, expanding players until the
   * buffer covers the demand or the frontier runs dry.
   * Throws SeedExhaustionError when the frontier ran dry without a single candidate.
   */
  async take(count: number, signal?: AbortSignal): Promise<MatchCandidate[]> {
    await this.seed(signal)
    while (this.candidates.length < count) {
      throwIfCancelled(signal)
      const puuid = this.nextPlayer()
      if (puuid === null) break
      await this.expand(puuid, signal)
    }
    const batch = this.candidates.slice(0, count)
    this.candidates = this.candidates.slice(count)
    if (batch.length === 0 && this.exhausted) throw new SeedExhaustionError(this.options.platform.code)
    return batch
  }

  /** Feeds the other participants of an accepted match back into the frontier. */
  absorb(record: MatchRecord): number {
    let added = 0
    for (const participant of record.participants) {
      if (this.enqueue(participant.puuid)) added++
    }
    return added
  }

  private nextPlayer(): string | null {
    while (this.head < this.frontier.length) {
      const puuid = this.frontier[this.head++]
      if (!this.expanded.has(puuid)) return puuid
    }
    // drop consumed entries once the queue is drained
    this.frontier.length = 0
    this.head = 0
    return null
  }

  private async expand(puuid: string, signal?: AbortSignal): Promise<void> {
    const { gateway, platform, queues, idsPerPlayer, window } = this.options
    this.expanded.add(puuid)

    let ids: string[]
    try {
      // a single queue can be filtered server-side, several need the ranked type
      ids = await gateway.getMatchIds(
        platform,
        puuid,
        {
          queue: queues.length === 1 ? queues[0] : undefined,
          type: queues.length === 1 ? undefined : 'ranked',
          count: idsPerPlayer,
          startTime: window.start,
          endTime: window.end,
        },
        signal
      )
    } catch (error) {
      if (isSkippable(error)) {
        this.logger.warn(`skipping player ${puuid.slice(0, 8)}: ${errorMessage(error)}`)
        return
      }
      throw error
    }

    let fresh = 0
    for (const matchId of ids) {
      if (this.seenMatchIds.has(matchId)) continue
      this.seenMatchIds.add(matchId)
      this.candidates.push({ matchId, platform: platform.code })
      fresh++
    }
    this.logger.debug(`expanded ${puuid.slice(0, 8)}: ${ids.length} ids, ${fresh} new`)
  }

  private async resolveRiotId(riotId: string, signal?: AbortSignal): Promise<string | null> {
    const [gameName, tagLine] = riotId.split('#')
    if (!gameName || !tagLine) {
      this.logger.warn(`ignoring malformed riot id "${riotId}"`)
      return null
    }
    try {
      const account = await this.options.gateway.getAccountByRiotId(this.options.platform, gameName, tagLine, signal)
      return account.puuid
    } catch (error) {
      if (isSkippable(error)) {
        this.logger.warn(`could not resolve seed ${riotId}: ${errorMessage(error)}`)
        return null
      }
      throw error
    }
  }

  private async bootstrapFromLeague(signal?: AbortSignal): Promise<number> {
    const { gateway, platform, queues } = this.options
    let added = 0
    let lookups = 0

    for (const tier of BOOTSTRAP_TIERS) {
      for (const queueId of queues) {
        const queue = leagueQueueFor(queueId)
        if (queue === null) continue

        let entries: LeagueEntry[]
        try {
          entries = await gateway.getLeague(platform, tier, queue, signal)
        } catch (error) {
          if (isSkippable(error)) {
            this.logger.warn(`league ${tier}/${queue} unavailable: ${errorMessage(error)}`)
            continue
          }
          throw error
        }

        for (const entry of entries) {
          let puuid = entry.puuid ?? null
          if (puuid === null && entry.summonerId && lookups < MAX_BOOTSTRAP_LOOKUPS) {
            lookups++
            puuid = await this.resolveSummoner(entry.summonerId, signal)
          }
          if (puuid !== null && this.enqueue(puuid)) added++
        }
      }
      if (added > 0) {
        this.logger.info(`bootstrapped ${added} players from ${tier}`)
        break
      }
    }
    return added
  }

  private async resolveSummoner(summonerId: string, signal?: AbortSignal): Promise<string | null> {
    try {
      const summoner = await this.options.gateway.getSummonerById(this.options.platform, summonerId, signal)
      return summoner.puuid
    } catch (error) {
      if (isSkippable(error)) return null
      throw error
    }
  }
}

// failures local to one player or one lookup; anything else ends the region
function isSkippable(error: unknown): boolean {
  return (
    error instanceof NotFoundError ||
    error instanceof RequestError ||
    error instanceof ParseError ||
    isTransient(error)
  )
}
