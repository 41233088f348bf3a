// normalized match records, as persisted
import type { PlatformCode } from '@/lib/game/regions'

export interface MatchRecord {
  matchId: string
  platform: PlatformCode
  gameId: number
  queueId: number
  mapId: number
  gameMode: string
  gameType: string
  gameVersion: string
  patch: string
  gameCreation: number
  gameStartTimestamp: number
  gameEndTimestamp: number | null
  gameDurationSec: number
  teams: TeamRecord[]
  participants: ParticipantRecord[]
}

export interface TeamRecord {
  teamId: number
  win: boolean
  bans: Array<{ championId: number; pickTurn: number }>
  objectives: Record<ObjectiveName, { first: boolean; kills: number }>
}

export type ObjectiveName = 'baron' | 'champion' | 'dragon' | 'inhibitor' | 'riftHerald' | 'tower'

export interface ParticipantRecord {
  participantId: number
  puuid: string
  riotIdGameName: string | null
  riotIdTagline: string | null
  summonerId: string | null
  teamId: number
  win: boolean
  championId: number
  championName: string
  champLevel: number
  teamPosition: string
  /** [summoner1Id, summoner2Id] */
  summonerSpells: [number, number]
  /** item0..item6, 0 for an empty slot */
  items: number[]
  kills: number
  deaths: number
  assists: number
  goldEarned: number
  totalDamageDealtToChampions: number
  visionScore: number
  totalMinionsKilled: number
  neutralMinionsKilled: number
}

export interface MatchCandidate {
  matchId: string
  platform: PlatformCode
}
