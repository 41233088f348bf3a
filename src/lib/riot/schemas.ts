// zod schemas for the raw riot api payloads we read.
// Unknown keys are stripped, missing optional stats default to 0.
import { z } from 'zod'

const stat = z.number().default(0)

const objectiveSchema = z.object({ first: z.boolean(), kills: z.number().int() })

export const participantDtoSchema = z.object({
  participantId: z.number().int(),
  puuid: z.string().min(1),
  riotIdGameName: z.string().optional(),
  riotIdTagline: z.string().optional(),
  summonerId: z.string().optional(),
  teamId: z.number().int(),
  win: z.boolean(),
  championId: z.number().int(),
  championName: z.string(),
  champLevel: stat,
  teamPosition: z.string().default(''),
  summoner1Id: z.number().int(),
  summoner2Id: z.number().int(),
  item0: stat,
  item1: stat,
  item2: stat,
  item3: stat,
  item4: stat,
  item5: stat,
  item6: stat,
  kills: z.number().int(),
  deaths: z.number().int(),
  assists: z.number().int(),
  goldEarned: stat,
  totalDamageDealtToChampions: stat,
  visionScore: stat,
  totalMinionsKilled: stat,
  neutralMinionsKilled: stat,
})

export const teamDtoSchema = z.object({
  teamId: z.number().int(),
  win: z.boolean(),
  bans: z.array(z.object({ championId: z.number().int(), pickTurn: z.number().int() })).default([]),
  objectives: z.record(objectiveSchema).default({}),
})

export const matchDtoSchema = z.object({
  metadata: z.object({
    matchId: z.string().min(1),
    participants: z.array(z.string()),
  }),
  info: z.object({
    gameId: z.number().int(),
    platformId: z.string(),
    queueId: z.number().int(),
    mapId: z.number().int(),
    gameMode: z.string(),
    gameType: z.string(),
    gameVersion: z.string(),
    gameCreation: z.number(),
    gameStartTimestamp: z.number(),
    gameEndTimestamp: z.number().optional(),
    gameDuration: z.number(),
    teams: z.array(teamDtoSchema),
    participants: z.array(participantDtoSchema).min(1),
  }),
})

export type MatchDto = z.infer<typeof matchDtoSchema>
export type ParticipantDto = z.infer<typeof participantDtoSchema>
export type TeamDto = z.infer<typeof teamDtoSchema>

export const matchIdsSchema = z.array(z.string())

export const leagueListSchema = z.object({
  tier: z.string(),
  queue: z.string(),
  entries: z.array(
    z.object({
      puuid: z.string().optional(),
      summonerId: z.string().optional(),
      leaguePoints: z.number().default(0),
    })
  ),
})

export type LeagueEntry = z.infer<typeof leagueListSchema>['entries'][number]

export const accountSchema = z.object({
  puuid: z.string().min(1),
  gameName: z.string().optional(),
  tagLine: z.string().optional(),
})

export type Account = z.infer<typeof accountSchema>

export const summonerSchema = z.object({
  puuid: z.string().min(1),
  id: z.string().optional(),
  summonerLevel: z.number().optional(),
})

export type Summoner = z.infer<typeof summonerSchema>
