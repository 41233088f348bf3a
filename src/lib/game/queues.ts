// ranked queues we collect from, by queueId as reported in match-v5
export const RANKED_SOLO_QUEUE = 420
export const RANKED_FLEX_QUEUE = 440

export type LeagueQueue = 'RANKED_SOLO_5x5' | 'RANKED_FLEX_SR'

const LEAGUE_QUEUES: Record<number, LeagueQueue> = {
  [RANKED_SOLO_QUEUE]: 'RANKED_SOLO_5x5',
  [RANKED_FLEX_QUEUE]: 'RANKED_FLEX_SR',
}

export const DEFAULT_QUEUES: readonly number[] = [RANKED_SOLO_QUEUE, RANKED_FLEX_QUEUE]

export function leagueQueueFor(queueId: number): LeagueQueue | null {
  return LEAGUE_QUEUES[queueId] ?? null
}
