// timeouts for the standalone health probes
export interface HealthTimeouts {
  dnsMs: number
  /** whole http probe, connect through body */
  httpMs: number
  /** a probe slower than this is reported as degraded */
  degradedMs: number
}

export const DEFAULT_HEALTH_TIMEOUTS: HealthTimeouts = {
  dnsMs: 1000,
  httpMs: 3000,
  degradedMs: 500,
}
