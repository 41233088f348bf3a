// the one seam between the gateway and the network. Defaults to global fetch,
// whose pooled dispatcher keeps connections alive per host.
import { CancelledError, TransientError } from '@/lib/riot/errors'

export interface TransportResponse {
  readonly status: number
  readonly headers: { get(name: string): string | null }
  text(): Promise<string>
}

export interface TransportRequest {
  headers: Record<string, string>
  signal: AbortSignal
}

export type Transport = (url: string, init: TransportRequest) => Promise<TransportResponse>

export const fetchTransport: Transport = (url, init) => fetch(url, { method: 'GET', ...init })

const DNS_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME'])

function errorCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null) return null
  if ('code' in error && typeof error.code === 'string') return error.code
  // undici wraps the socket error: TypeError('fetch failed', { cause })
  if ('cause' in error) return errorCode(error.cause)
  return null
}

// fetch raises these when its signal fires, on the request or while the body streams
function isAbortLike(error: unknown): boolean {
  const name = error instanceof Error ? error.name : ''
  return name === 'TimeoutError' || name === 'AbortError'
}

/** Maps whatever the transport threw into the error taxonomy. */
export function toTransportError(error: unknown, url: string, platform: string, parent?: AbortSignal): Error {
  if (parent?.aborted) return new CancelledError()
  if (error instanceof TransientError || error instanceof CancelledError) return error

  if (isAbortLike(error)) {
    return new TransientError('timeout', `timed out: ${url}`, platform, null, { cause: error })
  }
  const code = errorCode(error)
  if (code !== null && DNS_CODES.has(code)) {
    return new TransientError('dns', `dns lookup failed (${code}): ${url}`, platform, null, { cause: error })
  }
  if (code === 'UND_ERR_CONNECT_TIMEOUT' || code === 'ETIMEDOUT') {
    return new TransientError('timeout', `connect timeout: ${url}`, platform, null, { cause: error })
  }
  return new TransientError('network', `network error${code ? ` (${code})` : ''}: ${url}`, platform, null, {
    cause: error,
  })
}
