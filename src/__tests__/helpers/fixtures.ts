// riot api shaped payloads for tests

export interface MatchFixture {
  matchId: string
  platformId?: string
  queueId?: number
  gameVersion?: string
  gameCreation?: number
  /** up to ten puuids; missing slots are filled with `${matchId}-p${slot}` */
  puuids?: string[]
}

export function matchPayload(fixture: MatchFixture) {
  const gameCreation = fixture.gameCreation ?? Date.UTC(2026, 1, 10)
  const puuids = Array.from({ length: 10 }, (_, slot) => fixture.puuids?.[slot] ?? `${fixture.matchId}-p${slot}`)
  return {
    metadata: { matchId: fixture.matchId, participants: puuids },
    info: {
      gameId: Number(fixture.matchId.replace(/\D/g, '')) || 1,
      platformId: fixture.platformId ?? 'EUW1',
      queueId: fixture.queueId ?? 420,
      mapId: 11,
      gameMode: 'CLASSIC',
      gameType: 'MATCHED_GAME',
      gameVersion: fixture.gameVersion ?? '16.3.512.1',
      gameCreation,
      gameStartTimestamp: gameCreation + 30_000,
      gameEndTimestamp: gameCreation + 30_000 + 1_800_000,
      gameDuration: 1800,
      teams: [100, 200].map(teamId => ({
        teamId,
        win: teamId === 100,
        bans: [{ championId: 157, pickTurn: teamId === 100 ? 1 : 6 }],
        objectives: {
          baron: { first: teamId === 100, kills: teamId === 100 ? 1 : 0 },
          champion: { first: teamId === 200, kills: 20 },
          dragon: { first: teamId === 100, kills: 3 },
          inhibitor: { first: teamId === 100, kills: teamId === 100 ? 2 : 0 },
          riftHerald: { first: false, kills: 0 },
          tower: { first: teamId === 100, kills: teamId === 100 ? 9 : 3 },
          horde: { first: false, kills: 3 },
        },
      })),
      participants: puuids.map((puuid, slot) => ({
        participantId: slot + 1,
        puuid,
        riotIdGameName: `player${slot}`,
        riotIdTagline: 'TEST',
        summonerId: `summoner-${puuid}`,
        teamId: slot < 5 ? 100 : 200,
        win: slot < 5,
        championId: 100 + slot,
        championName: `Champion${slot}`,
        champLevel: 16,
        teamPosition: ['TOP', 'JUNGLE', 'MIDDLE', 'BOTTOM', 'UTILITY'][slot % 5],
        summoner1Id: 4,
        summoner2Id: slot % 5 === 1 ? 11 : 14,
        item0: 3031,
        item1: 3006,
        item2: 0,
        item3: 0,
        item4: 0,
        item5: 0,
        item6: 3340,
        kills: slot,
        deaths: 2,
        assists: 5,
        goldEarned: 12000,
        totalDamageDealtToChampions: 20000,
        visionScore: 20,
        totalMinionsKilled: 180,
        neutralMinionsKilled: 10,
        // fields the collector does not keep
        pentaKills: 0,
        perks: { styles: [] },
      })),
    },
  }
}
