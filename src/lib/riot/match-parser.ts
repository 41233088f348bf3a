// raw match-v5 payload -> MatchRecord
import type { z, ZodTypeAny } from 'zod'
import { extractPatch } from '@/lib/game/patch'
import { toPlatform, type PlatformCode } from '@/lib/game/regions'
import type { MatchRecord, ObjectiveName, ParticipantRecord, TeamRecord } from '@/types/match'
import { ParseError } from './errors'
import { matchDtoSchema, type ParticipantDto, type TeamDto } from './schemas'

/** Validates a payload against a schema, raising ParseError with the first few issues. */
export function parsePayload<S extends ZodTypeAny>(
  schema: S,
  payload: unknown,
  what: string,
  platform: string | null
): z.output<S> {
  const result = schema.safeParse(payload)
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ParseError(`malformed ${what}: ${issues}`, platform, { cause: result.error })
  }
  return result.data
}

function toTeam(team: TeamDto): TeamRecord {
  const objective = (name: ObjectiveName) => team.objectives[name] ?? { first: false, kills: 0 }
  return {
    teamId: team.teamId,
    win: team.win,
    bans: team.bans,
    objectives: {
      baron: objective('baron'),
      champion: objective('champion'),
      dragon: objective('dragon'),
      inhibitor: objective('inhibitor'),
      riftHerald: objective('riftHerald'),
      tower: objective('tower'),
    },
  }
}

function toParticipant(p: ParticipantDto): ParticipantRecord {
  return {
    participantId: p.participantId,
    puuid: p.puuid,
    riotIdGameName: p.riotIdGameName ?? null,
    riotIdTagline: p.riotIdTagline ?? null,
    summonerId: p.summonerId ?? null,
    teamId: p.teamId,
    win: p.win,
    championId: p.championId,
    championName: p.championName,
    champLevel: p.champLevel,
    teamPosition: p.teamPosition,
    summonerSpells: [p.summoner1Id, p.summoner2Id],
    items: [p.item0, p.item1, p.item2, p.item3, p.item4, p.item5, p.item6],
    kills: p.kills,
    deaths: p.deaths,
    assists: p.assists,
    goldEarned: p.goldEarned,
    totalDamageDealtToChampions: p.totalDamageDealtToChampions,
    visionScore: p.visionScore,
    totalMinionsKilled: p.totalMinionsKilled,
    neutralMinionsKilled: p.neutralMinionsKilled,
  }
}

export function parseMatch(payload: unknown, requestedFrom: PlatformCode): MatchRecord {
  const { metadata, info } = parsePayload(matchDtoSchema, payload, 'match', requestedFrom)
  return {
    matchId: metadata.matchId,
    platform: toPlatform(info.platformId) ?? requestedFrom,
    gameId: info.gameId,
    queueId: info.queueId,
    mapId: info.mapId,
    gameMode: info.gameMode,
    gameType: info.gameType,
    gameVersion: info.gameVersion,
    patch: extractPatch(info.gameVersion),
    gameCreation: info.gameCreation,
    gameStartTimestamp: info.gameStartTimestamp,
    gameEndTimestamp: info.gameEndTimestamp ?? null,
    // before gameEndTimestamp existed, gameDuration was reported in milliseconds
    gameDurationSec: info.gameEndTimestamp === undefined ? Math.round(info.gameDuration / 1000) : info.gameDuration,
    teams: info.teams.map(toTeam),
    participants: info.participants.map(toParticipant),
  }
}
