// persistence contract for collected matches: one row per matchId, ever
import type { SupabaseClient } from '@supabase/supabase-js'
import { z } from 'zod'
import type { PlatformCode } from '@/lib/game/regions'
import { createLogger, type Logger } from '@/lib/log'
import type { MatchRecord } from '@/types/match'

export type UpsertResult = 'inserted' | 'already_exists'

export interface MatchSink {
  /** Idempotent: a second write of the same matchId changes nothing. Safe to call concurrently for distinct ids. */
  upsert(record: MatchRecord): Promise<UpsertResult>
  exists(matchId: string): Promise<boolean>
  countForPlatform(platform: PlatformCode, patch?: string): Promise<number>
}

export class SinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SinkError'
  }
}

// ============================================================================
// IN-MEMORY - dry runs and tests
// ============================================================================

export class MemoryMatchSink implements MatchSink {
  readonly records = new Map<string, MatchRecord>()
  writes = 0

  async upsert(record: MatchRecord): Promise<UpsertResult> {
    if (this.records.has(record.matchId)) return 'already_exists'
    this.records.set(record.matchId, record)
    this.writes++
    return 'inserted'
  }

  async exists(matchId: string): Promise<boolean> {
    return this.records.has(matchId)
  }

  async countForPlatform(platform: PlatformCode, patch?: string): Promise<number> {
    let count = 0
    for (const record of this.records.values()) {
      if (record.platform === platform && (patch === undefined || record.patch === patch)) count++
    }
    return count
  }
}

// ============================================================================
// SUPABASE
// ============================================================================

export function toMatchRow(record: MatchRecord) {
  return {
    match_id: record.matchId,
    platform: record.platform,
    game_id: record.gameId,
    queue_id: record.queueId,
    map_id: record.mapId,
    game_mode: record.gameMode,
    game_type: record.gameType,
    game_version: record.gameVersion,
    patch: record.patch,
    game_creation: new Date(record.gameCreation).toISOString(),
    game_start: new Date(record.gameStartTimestamp).toISOString(),
    game_end: record.gameEndTimestamp === null ? null : new Date(record.gameEndTimestamp).toISOString(),
    game_duration: record.gameDurationSec,
    teams: record.teams.map(team => ({
      team_id: team.teamId,
      win: team.win,
      bans: team.bans.map(ban => ({ champion_id: ban.championId, pick_turn: ban.pickTurn })),
      baron_kills: team.objectives.baron.kills,
      champion_kills: team.objectives.champion.kills,
      dragon_kills: team.objectives.dragon.kills,
      inhibitor_kills: team.objectives.inhibitor.kills,
      rift_herald_kills: team.objectives.riftHerald.kills,
      tower_kills: team.objectives.tower.kills,
      first_baron: team.objectives.baron.first,
      first_blood: team.objectives.champion.first,
      first_dragon: team.objectives.dragon.first,
      first_inhibitor: team.objectives.inhibitor.first,
      first_rift_herald: team.objectives.riftHerald.first,
      first_tower: team.objectives.tower.first,
    })),
    participants: record.participants.map(p => ({
      participant_id: p.participantId,
      puuid: p.puuid,
      riot_id_game_name: p.riotIdGameName,
      riot_id_tagline: p.riotIdTagline,
      summoner_id: p.summonerId,
      team_id: p.teamId,
      win: p.win,
      champion_id: p.championId,
      champion_name: p.championName,
      champ_level: p.champLevel,
      team_position: p.teamPosition,
      kills: p.kills,
      deaths: p.deaths,
      assists: p.assists,
      gold_earned: p.goldEarned,
      damage_to_champions: p.totalDamageDealtToChampions,
      vision_score: p.visionScore,
      minions_killed: p.totalMinionsKilled,
      neutral_minions_killed: p.neutralMinionsKilled,
      items: p.items,
      summoner_spells: p.summonerSpells,
    })),
  }
}

const insertedSchema = z.boolean()

export class SupabaseMatchSink implements MatchSink {
  private readonly logger: Logger

  constructor(
    private readonly client: SupabaseClient,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('DB')
  }

  // insert_match_record writes the match, teams, participants, items and spells
  // in one transaction and returns false when the match already existed
  async upsert(record: MatchRecord): Promise<UpsertResult> {
    const { data, error } = await this.client.rpc('insert_match_record', { payload: toMatchRow(record) })
    if (error) {
      this.logger.error(`insert ${record.matchId} failed: ${error.message}`)
      throw new SinkError(`insert ${record.matchId} failed: ${error.message}`, { cause: error })
    }
    return insertedSchema.parse(data) ? 'inserted' : 'already_exists'
  }

  async exists(matchId: string): Promise<boolean> {
    const { count, error } = await this.client
      .from('matches')
      .select('match_id', { count: 'exact', head: true })
      .eq('match_id', matchId)
    if (error) throw new SinkError(`exists ${matchId} failed: ${error.message}`, { cause: error })
    return (count ?? 0) > 0
  }

  async countForPlatform(platform: PlatformCode, patch?: string): Promise<number> {
    let query = this.client.from('matches').select('match_id', { count: 'exact', head: true }).eq('platform', platform)
    if (patch !== undefined) query = query.eq('patch', patch)
    const { count, error } = await query
    if (error) throw new SinkError(`count for ${platform} failed: ${error.message}`, { cause: error })
    return count ?? 0
  }
}
