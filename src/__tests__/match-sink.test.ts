import { createClient } from '@supabase/supabase-js'
import { describe, expect, it } from 'vitest'
import { MemoryMatchSink, SinkError, SupabaseMatchSink, toMatchRow } from '@/lib/db/match-sink'
import { createLogger } from '@/lib/log'
import { parseMatch } from '@/lib/riot/match-parser'
import { matchPayload } from './helpers/fixtures'

const record = (matchId: string, gameVersion = '16.3.512.1') =>
  parseMatch(matchPayload({ matchId, gameVersion }), 'euw1')

describe('MemoryMatchSink', () => {
  it('writes each match id once', async () => {
    const sink = new MemoryMatchSink()

    expect(await sink.upsert(record('EUW1_1'))).toBe('inserted')
    expect(await sink.upsert(record('EUW1_1'))).toBe('already_exists')
    expect(sink.writes).toBe(1)
    expect(await sink.exists('EUW1_1')).toBe(true)
    expect(await sink.exists('EUW1_2')).toBe(false)
  })

  it('counts per platform and patch', async () => {
    const sink = new MemoryMatchSink()
    await sink.upsert(record('EUW1_1'))
    await sink.upsert(record('EUW1_2', '16.2.498.3'))

    expect(await sink.countForPlatform('euw1')).toBe(2)
    expect(await sink.countForPlatform('euw1', '16.3')).toBe(1)
    expect(await sink.countForPlatform('kr')).toBe(0)
  })
})

describe('toMatchRow', () => {
  it('flattens a record into the insert payload', () => {
    const row = toMatchRow(record('EUW1_42'))

    expect(row).toMatchObject({
      match_id: 'EUW1_42',
      platform: 'euw1',
      game_id: 142,
      patch: '16.3',
      game_creation: '2026-02-10T00:00:00.000Z',
      game_end: '2026-02-10T00:30:30.000Z',
      game_duration: 1800,
    })
    expect(row.teams[0]).toMatchObject({ team_id: 100, tower_kills: 9, first_tower: true, first_blood: false })
    expect(row.teams[0].bans).toEqual([{ champion_id: 157, pick_turn: 1 }])
    expect(row.participants[1]).toMatchObject({
      participant_id: 2,
      puuid: 'EUW1_42-p1',
      summoner_spells: [4, 11],
      items: [3031, 3006, 0, 0, 0, 0, 3340],
      damage_to_champions: 20000,
    })
  })
})

describe('SupabaseMatchSink', () => {
  interface Call {
    method: string
    url: URL
    body: unknown
  }

  // an in-process stand-in for postgrest, plugged in through the client's fetch option
  function connect(respond: (call: Call) => Response) {
    const calls: Call[] = []
    const fakeFetch: typeof fetch = async (input, init) => {
      const url = new URL(input instanceof Request ? input.url : String(input))
      const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : null
      const call = { method: init?.method ?? 'GET', url, body }
      calls.push(call)
      return respond(call)
    }
    const client = createClient('http://localhost:54321', 'test-secret', {
      auth: { persistSession: false, autoRefreshToken: false },
      global: { fetch: fakeFetch },
    })
    return { calls, sink: new SupabaseMatchSink(client, createLogger('DB', {}, 'silent')) }
  }

  const json = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } })

  it('inserts through the insert_match_record function', async () => {
    const { calls, sink } = connect(() => json(true))

    expect(await sink.upsert(record('EUW1_9'))).toBe('inserted')
    expect(calls).toHaveLength(1)
    expect(calls[0].method).toBe('POST')
    expect(calls[0].url.pathname).toBe('/rest/v1/rpc/insert_match_record')
    expect(calls[0].body).toMatchObject({ payload: { match_id: 'EUW1_9', platform: 'euw1' } })
  })

  it('reports an existing match', async () => {
    const { sink } = connect(() => json(false))

    expect(await sink.upsert(record('EUW1_9'))).toBe('already_exists')
  })

  it('raises SinkError when the database refuses the write', async () => {
    const { sink } = connect(() => json({ message: 'connection refused', code: '08006' }, 500))

    await expect(sink.upsert(record('EUW1_9'))).rejects.toThrow(SinkError)
  })

  it('counts rows with head requests', async () => {
    const { calls, sink } = connect(() => new Response(null, { status: 200, headers: { 'content-range': '*/7' } }))

    expect(await sink.countForPlatform('euw1', '16.3')).toBe(7)
    expect(calls[0].method).toBe('HEAD')
    expect(calls[0].url.searchParams.get('platform')).toBe('eq.euw1')
    expect(calls[0].url.searchParams.get('patch')).toBe('eq.16.3')
  })

  it('checks existence by match id', async () => {
    const { calls, sink } = connect(() => new Response(null, { status: 200, headers: { 'content-range': '*/0' } }))

    expect(await sink.exists('EUW1_404')).toBe(false)
    expect(calls[0].url.searchParams.get('match_id')).toBe('eq.EUW1_404')
  })
})
