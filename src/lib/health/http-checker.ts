import { deadline, systemClock, type Clock } from '@/lib/clock'
import { errorMessage } from '@/lib/riot/errors'
import { fetchTransport, toTransportError, type Transport } from '@/lib/riot/transport'

export interface HttpResult {
  url: string
  ok: boolean
  status: number | null
  latencyMs: number
  rateLimited: boolean
  degraded: boolean
  /** the failure is worth retrying later (timeout, network, 429, 5xx) */
  transient: boolean
  error: string | null
}

export async function checkHttp(
  url: string,
  options: {
    apiKey: string
    timeoutMs: number
    degradedMs: number
    platform: string
    transport?: Transport
    clock?: Clock
  }
): Promise<HttpResult> {
  const transport = options.transport ?? fetchTransport
  const clock = options.clock ?? systemClock
  const startedAt = clock.now()

  try {
    const response = await transport(url, {
      headers: { 'X-Riot-Token': options.apiKey, Accept: 'application/json' },
      signal: deadline(options.timeoutMs),
    })
    const latencyMs = clock.now() - startedAt
    // only the status matters, but the body is drained so the connection can be reused
    await response.text()
    const status = response.status
    const ok = status >= 200 && status < 300
    return {
      url,
      ok,
      status,
      latencyMs,
      rateLimited: status === 429 || response.headers.get('retry-after') !== null,
      degraded: latencyMs >= options.degradedMs,
      transient: status === 429 || status >= 500,
      error: ok ? null : `http ${status}`,
    }
  } catch (error) {
    const latencyMs = clock.now() - startedAt
    return {
      url,
      ok: false,
      status: null,
      latencyMs,
      rateLimited: false,
      degraded: latencyMs >= options.degradedMs,
      transient: true,
      error: errorMessage(toTransportError(error, url, options.platform)),
    }
  }
}
