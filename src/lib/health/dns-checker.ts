import { lookup } from 'node:dns/promises'
import { systemClock, type Clock } from '@/lib/clock'
import { errorMessage } from '@/lib/riot/errors'

export interface DnsResult {
  host: string
  ok: boolean
  latencyMs: number
  addresses: string[]
  /** 'nxdomain', 'timeout' or the resolver's message */
  error: string | null
}

export type Resolver = (host: string) => Promise<string[]>

export const systemResolver: Resolver = async host => {
  const records = await lookup(host, { all: true })
  return records.map(record => record.address)
}

const NXDOMAIN_CODES = new Set(['ENOTFOUND', 'EAI_NONAME'])

export async function checkDns(
  host: string,
  options: { timeoutMs: number; resolver?: Resolver; clock?: Clock }
): Promise<DnsResult> {
  const resolver = options.resolver ?? systemResolver
  const clock = options.clock ?? systemClock
  const startedAt = clock.now()

  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<'timeout'>(resolve => {
    timer = setTimeout(() => resolve('timeout'), options.timeoutMs)
  })

  try {
    const outcome = await Promise.race([resolver(host), timeout])
    const latencyMs = clock.now() - startedAt
    if (outcome === 'timeout') {
      return { host, ok: false, latencyMs, addresses: [], error: 'timeout' }
    }
    if (outcome.length === 0) {
      return { host, ok: false, latencyMs, addresses: [], error: 'nxdomain' }
    }
    return { host, ok: true, latencyMs, addresses: outcome, error: null }
  } catch (error) {
    const code = error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : null
    return {
      host,
      ok: false,
      latencyMs: clock.now() - startedAt,
      addresses: [],
      error: code !== null && NXDOMAIN_CODES.has(code) ? 'nxdomain' : errorMessage(error),
    }
  } finally {
    clearTimeout(timer)
  }
}
