import { describe, expect, it } from 'vitest'
import { HealthManager } from '@/lib/health/health-manager'
import type { Resolver } from '@/lib/health/dns-checker'
import { createLogger } from '@/lib/log'
import type { Transport } from '@/lib/riot/transport'
import { FakeClock } from './helpers/fake-clock'
import { FakeRiot } from './helpers/fake-riot'

const STATUS = '/lol/status/v4/platform-data'

function setup(options: { unresolvable?: string[]; httpLatencyMs?: number } = {}) {
  const clock = new FakeClock(5_000)
  const riot = new FakeRiot()
  const lookups: string[] = []
  const resolver: Resolver = async host => {
    lookups.push(host)
    if (options.unresolvable?.includes(host)) {
      throw Object.assign(new Error(`getaddrinfo ENOTFOUND ${host}`), { code: 'ENOTFOUND' })
    }
    return ['10.0.0.1']
  }
  const transport: Transport = async (url, init) => {
    clock.advance(options.httpLatencyMs ?? 40)
    return riot.transport(url, init)
  }
  const health = new HealthManager({
    apiKey: 'test-secret',
    cacheTtlMs: 30_000,
    timeouts: { dnsMs: 1_000, httpMs: 3_000, degradedMs: 500 },
    transport,
    resolver,
    clock,
    logger: createLogger('HEALTH', {}, 'silent'),
  })
  return { clock, riot, lookups, health }
}

describe('HealthManager', () => {
  it('reports a reachable platform', async () => {
    const { riot, health } = setup()

    const report = await health.check('euw1')

    expect(report).toMatchObject({
      platform: 'euw1',
      host: 'euw1.api.riotgames.com',
      reachable: true,
      latencyMs: 40,
      lastError: null,
      checkedAt: 5_040,
    })
    expect(report.http).toMatchObject({ status: 200, degraded: false, rateLimited: false })
    expect(riot.requests).toEqual([
      expect.objectContaining({ host: 'euw1.api.riotgames.com', path: STATUS, token: 'test-secret' }),
    ])
  })

  it('serves cached reports until the ttl runs out', async () => {
    const { clock, riot, health } = setup()

    const first = await health.check('euw1')
    clock.advance(29_000)
    expect(await health.check('euw1')).toBe(first)
    expect(riot.count(STATUS)).toBe(1)

    await health.check('euw1', { force: true })
    expect(riot.count(STATUS)).toBe(2)

    clock.advance(31_000)
    await health.check('euw1')
    expect(riot.count(STATUS)).toBe(3)
  })

  it('skips the http probe when dns fails', async () => {
    const { riot, health } = setup({ unresolvable: ['na1.api.riotgames.com'] })

    const report = await health.check('na1')

    expect(report.reachable).toBe(false)
    expect(report.dns.error).toBe('nxdomain')
    expect(report.http).toBeNull()
    expect(report.lastError).toBe('dns: nxdomain')
    expect(riot.requests).toHaveLength(0)
  })

  it('classifies http failures', async () => {
    const { riot, health } = setup()
    riot.failHost('kr.api.riotgames.com', 503)
    riot.failHost('jp1.api.riotgames.com', { status: 429, retryAfter: '3' })

    const kr = await health.check('kr')
    const jp = await health.check('jp1')

    expect(kr.lastError).toBe('http 503')
    expect(kr.http).toMatchObject({ ok: false, status: 503, transient: true, rateLimited: false })
    expect(jp.http).toMatchObject({ ok: false, status: 429, transient: true, rateLimited: true })
  })

  it('reads the body of every answer it gets', async () => {
    const { riot, health } = setup()
    riot.failHost('kr.api.riotgames.com', 503)

    await health.checkMany(['euw1', 'kr'])

    expect(riot.requests).toHaveLength(2)
    expect(riot.undrainedBodies).toBe(0)
  })

  it('flags slow answers as degraded but reachable', async () => {
    const { health } = setup({ httpLatencyMs: 800 })

    const report = await health.check('euw1')

    expect(report.reachable).toBe(true)
    expect(report.http?.degraded).toBe(true)
  })

  it('stops at the first unreachable platform with failFast', async () => {
    const { lookups, health } = setup({ unresolvable: ['eun1.api.riotgames.com'] })

    const reports = await health.checkMany(['euw1', 'eun1', 'na1'], { failFast: true })

    expect(reports.map(r => [r.platform, r.reachable])).toEqual([
      ['euw1', true],
      ['eun1', false],
    ])
    expect(lookups).toEqual(['euw1.api.riotgames.com', 'eun1.api.riotgames.com'])
  })

  it('checks every platform without failFast', async () => {
    const { health } = setup({ unresolvable: ['eun1.api.riotgames.com'] })

    const reports = await health.checkMany(['euw1', 'eun1', 'na1'])

    expect(reports.map(r => r.reachable)).toEqual([true, false, true])
  })

  it('finds the first healthy platform', async () => {
    const { riot, health } = setup()
    riot.failHost('sg2.api.riotgames.com', 'network')

    const report = await health.firstHealthy(['sg2', 'ph2', 'th2'])

    expect(report?.platform).toBe('ph2')
  })

  it('returns null when nothing is healthy', async () => {
    const { health } = setup({ unresolvable: ['tw2.api.riotgames.com', 'vn2.api.riotgames.com'] })

    expect(await health.firstHealthy(['tw2', 'vn2'])).toBeNull()
  })
})
