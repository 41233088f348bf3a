import { describe, expect, it } from 'vitest'
import { MemoryMatchSink } from '@/lib/db/match-sink'
import { createLogger } from '@/lib/log'
import { UnauthorizedError } from '@/lib/riot/errors'
import { ScrapeOrchestrator, type OrchestratorOptions, type ProgressEvent } from '@/lib/scraper/orchestrator'
import type { FakeRiot } from './helpers/fake-riot'
import { matchPayload } from './helpers/fixtures'
import { createTestGateway, platform, type TestGatewayOptions } from './helpers/gateway'

const PLAYERS = 60

// 300 matches over 60 players, ten distinct players each; every third match is on 16.2
function populateWorld(riot: FakeRiot, prefix = 'EUW1', platformId = 'EUW1', host = 'europe.api.riotgames.com'): void {
  for (let k = 0; k < 300; k++) {
    const matchId = `${prefix}_${k}`
    const puuids = Array.from({ length: 10 }, (_, j) => `${prefix}-p${(k + j * 7) % PLAYERS}`)
    const gameVersion = k % 3 === 0 ? '16.2.498.3' : '16.3.512.1'
    riot.addMatch(matchId, matchPayload({ matchId, platformId, gameVersion, puuids }), puuids, host)
  }
}

function createOrchestrator(
  overrides: Partial<OrchestratorOptions> = {},
  gatewayOptions: TestGatewayOptions = {}
) {
  const harness = createTestGateway(gatewayOptions)
  const sink = new MemoryMatchSink()
  const progress: ProgressEvent[] = []
  const options: OrchestratorOptions = {
    gateway: harness.gateway,
    sink,
    platforms: [platform('euw1')],
    target: 50,
    patch: '16.3',
    window: { start: null, end: null },
    queues: [420, 440],
    maxConcurrent: 8,
    maxChunk: 20,
    buffer: 5,
    idsPerPlayer: 100,
    seeds: { puuids: ['EUW1-p0', 'EUW1-p1', 'EUW1-p2'], riotIds: [] },
    onProgress: event => progress.push(event),
    clock: harness.clock,
    logger: createLogger('SCRAPER', {}, 'silent'),
    ...overrides,
  }
  return { ...harness, sink, progress, options, orchestrator: new ScrapeOrchestrator(options) }
}

describe('ScrapeOrchestrator', () => {
  it('collects exactly the target on the requested patch', async () => {
    const { riot, sink, progress, orchestrator } = createOrchestrator()
    populateWorld(riot)

    const summary = await orchestrator.run()

    expect(sink.records.size).toBe(50)
    expect([...sink.records.values()].every(record => record.patch === '16.3')).toBe(true)
    expect(summary.inserted).toBe(50)
    expect(summary.regions).toHaveLength(1)
    expect(summary.regions[0]).toMatchObject({ platform: 'euw1', status: 'complete', initial: 0, current: 50, target: 50 })
    expect(progress[0]).toEqual({ platform: 'euw1', current: 0, target: 50 })
    expect(progress[progress.length - 1]).toEqual({ platform: 'euw1', current: 50, target: 50 })
    expect(progress.map(event => event.current)).toEqual(Array.from({ length: 51 }, (_, i) => i))
  })

  it('fetches each match detail at most once', async () => {
    const { riot, sink, orchestrator } = createOrchestrator({ target: 120, maxConcurrent: 10 })
    populateWorld(riot)

    await orchestrator.run()

    const detailPaths = riot.requests.map(r => r.path).filter(path => /\/matches\/EUW1_\d+$/.test(path))
    expect(new Set(detailPaths).size).toBe(detailPaths.length)
    expect(sink.writes).toBe(120)
    expect(sink.records.size).toBe(120)
  })

  it('writes nothing when the region already holds its target', async () => {
    const first = createOrchestrator()
    populateWorld(first.riot)
    await first.orchestrator.run()
    const writes = first.sink.writes

    const second = createOrchestrator({ sink: first.sink })
    populateWorld(second.riot)
    const summary = await second.orchestrator.run()

    expect(first.sink.writes).toBe(writes)
    expect(second.riot.requests).toHaveLength(0)
    expect(summary.regions[0]).toMatchObject({ status: 'complete', initial: 50, current: 50 })
    expect(summary.inserted).toBe(0)
  })

  it('tops up a partially filled region', async () => {
    const first = createOrchestrator({ target: 20 })
    populateWorld(first.riot)
    await first.orchestrator.run()

    const second = createOrchestrator({ sink: first.sink, target: 30 })
    populateWorld(second.riot)
    const summary = await second.orchestrator.run()

    expect(first.sink.records.size).toBe(30)
    expect(summary.regions[0]).toMatchObject({ status: 'complete', initial: 20, current: 30 })
    expect(summary.inserted).toBe(10)
  })

  it('drops matches outside the queue and date filters', async () => {
    const { riot, sink, orchestrator } = createOrchestrator({
      target: 5,
      patch: null,
      queues: [420],
      window: { start: Date.UTC(2026, 1, 1), end: Date.UTC(2026, 2, 1) },
      seeds: { puuids: ['solo'], riotIds: [] },
    })
    riot.addMatch('EUW1_1', matchPayload({ matchId: 'EUW1_1', queueId: 440 }), ['solo'])
    riot.addMatch('EUW1_2', matchPayload({ matchId: 'EUW1_2', gameCreation: Date.UTC(2026, 0, 15) }), ['solo'])
    riot.addMatch('EUW1_3', matchPayload({ matchId: 'EUW1_3' }), ['solo'])

    const summary = await orchestrator.run()

    expect([...sink.records.keys()]).toEqual(['EUW1_3'])
    expect(summary.regions[0]).toMatchObject({ status: 'exhausted', current: 1 })
    expect(summary.regions[0].stats).toMatchObject({ fetched: 3, filtered: 2, inserted: 1 })
  })

  it('ends the region as exhausted when there are no seeds and the ladder is empty', async () => {
    const { riot, sink, orchestrator } = createOrchestrator({ seeds: { puuids: [], riotIds: [] } })

    const summary = await orchestrator.run()

    expect(summary.regions[0]).toMatchObject({
      status: 'exhausted',
      reason: 'no players left to expand on euw1',
      current: 0,
    })
    expect(sink.records.size).toBe(0)
    expect(riot.count('leagues/by-queue')).toBe(6)
  })

  it('stores a match under the platform it was played on without counting it for the region', async () => {
    const { riot, sink, progress, orchestrator } = createOrchestrator({
      target: 5,
      seeds: { puuids: ['traveller'], riotIds: [] },
    })
    riot.addMatch('EUW1_1', matchPayload({ matchId: 'EUW1_1', puuids: ['traveller'] }), ['traveller'])
    riot.addMatch('EUN1_2', matchPayload({ matchId: 'EUN1_2', platformId: 'EUN1', puuids: ['traveller'] }), ['traveller'])
    riot.addMatch('EUW1_3', matchPayload({ matchId: 'EUW1_3', puuids: ['traveller'] }), ['traveller'])

    const summary = await orchestrator.run()

    expect(sink.records.get('EUN1_2')?.platform).toBe('eun1')
    expect(summary.inserted).toBe(3)
    expect(summary.regions[0]).toMatchObject({ status: 'exhausted', current: 2 })
    expect(summary.regions[0].stats.inserted).toBe(3)
    expect(await sink.countForPlatform('euw1')).toBe(summary.regions[0].current)
    expect(progress.map(event => event.current)).toEqual([0, 1, 2])
  })

  it('gives up on a platform once its circuit opens, and moves to the next one', async () => {
    const { riot, sink, orchestrator } = createOrchestrator(
      {
        platforms: [platform('euw1'), platform('kr')],
        target: 10,
        maxConcurrent: 1,
        seeds: { puuids: ['EUW1-p0', 'KR-p0'], riotIds: [] },
      },
      { failureThreshold: 5, retry: { attempts: 1 } }
    )
    populateWorld(riot)
    populateWorld(riot, 'KR', 'KR', 'asia.api.riotgames.com')
    riot.failAlways('/matches/EUW1_', 503)

    const summary = await orchestrator.run()

    expect(summary.regions.map(region => region.status)).toEqual(['unavailable', 'complete'])
    expect(riot.count('/matches/EUW1_')).toBe(5)
    expect(sink.records.size).toBe(10)
    expect([...sink.records.values()].every(record => record.platform === 'kr')).toBe(true)
  })

  it('aborts the run on a rejected credential', async () => {
    const { riot, orchestrator } = createOrchestrator({ platforms: [platform('euw1'), platform('eun1')] })
    populateWorld(riot)
    riot.failAlways('/matches/', 401)

    const summary = await orchestrator.run()

    expect(summary.aborted).toBe(true)
    expect(summary.error).toBe(new UnauthorizedError(401).message)
    expect(summary.regions.map(region => region.status)).toEqual(['failed', 'skipped'])
  })

  it('stops at the global cap', async () => {
    const { riot, sink, orchestrator } = createOrchestrator({
      platforms: [platform('euw1'), platform('eun1')],
      target: 40,
      totalCap: 25,
    })
    populateWorld(riot)

    const summary = await orchestrator.run()

    expect(sink.records.size).toBe(25)
    expect(summary.regions.map(region => region.status)).toEqual(['capped', 'capped'])
    expect(summary.regions[1].stats.inserted).toBe(0)
  })

  it('stops when cancelled and keeps what was written', async () => {
    const controller = new AbortController()
    const { riot, sink, orchestrator } = createOrchestrator({
      target: 50,
      onProgress: event => {
        if (event.current === 10) controller.abort()
      },
    })
    populateWorld(riot)

    const summary = await orchestrator.run(controller.signal)

    expect(summary.regions[0].status).toBe('cancelled')
    expect(sink.records.size).toBeGreaterThanOrEqual(10)
    expect(sink.records.size).toBeLessThan(50)
    for (const record of sink.records.values()) expect(record.participants).toHaveLength(10)
  })
})
