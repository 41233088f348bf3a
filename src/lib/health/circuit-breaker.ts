// per-platform circuit breaker
//
//   CLOSED --(failureThreshold consecutive failures)--> OPEN
//   OPEN --(resetTimeoutMs elapsed, one probe admitted)--> HALF_OPEN
//   HALF_OPEN --(probe succeeds)--> CLOSED
//   HALF_OPEN --(probe fails)--> OPEN, timeout restarts
//
// Every admission carries a ticket. Only the current probe's ticket can decide
// a HALF_OPEN circuit; requests admitted before the circuit last opened are
// ignored, however late they settle.
import { systemClock, type Clock } from '@/lib/clock'
import { createLogger, type Logger } from '@/lib/log'

export type CircuitStatus = 'CLOSED' | 'OPEN' | 'HALF_OPEN'

export interface CircuitState {
  state: CircuitStatus
  consecutiveFailures: number
  lastFailureAt: number | null
  openUntil: number | null
  halfOpenSuccesses: number
  probeInFlight: boolean
  /** bumped every time the circuit opens */
  generation: number
}

export interface Ticket {
  readonly probe: boolean
  readonly generation: number
}

export type Admission = { allowed: true; ticket: Ticket } | { allowed: false; retryInMs: number }

export interface CircuitBreakerOptions {
  failureThreshold: number
  resetTimeoutMs: number
  /** successful probes needed to close again */
  successThreshold?: number
  clock?: Clock
  logger?: Logger
}

export class CircuitBreaker {
  private readonly circuits = new Map<string, CircuitState>()
  private readonly failureThreshold: number
  private readonly resetTimeoutMs: number
  private readonly successThreshold: number
  private readonly clock: Clock
  private readonly logger: Logger

  constructor(options: CircuitBreakerOptions) {
    this.failureThreshold = Math.max(1, options.failureThreshold)
    this.resetTimeoutMs = options.resetTimeoutMs
    this.successThreshold = Math.max(1, options.successThreshold ?? 1)
    this.clock = options.clock ?? systemClock
    this.logger = options.logger ?? createLogger('CIRCUIT')
  }

  /** Decides whether a request to this platform may go out right now. */
  tryAcquire(platform: string): Admission {
    const circuit = this.circuitFor(platform)
    const now = this.clock.now()

    switch (circuit.state) {
      case 'CLOSED':
        return { allowed: true, ticket: { probe: false, generation: circuit.generation } }
      case 'OPEN': {
        const openUntil = circuit.openUntil ?? now
        if (now < openUntil) return { allowed: false, retryInMs: openUntil - now }
        circuit.state = 'HALF_OPEN'
        circuit.halfOpenSuccesses = 0
        circuit.probeInFlight = true
        this.logger.info(`[${platform}] half-open, sending probe`)
        return { allowed: true, ticket: { probe: true, generation: circuit.generation } }
      }
      case 'HALF_OPEN':
        if (circuit.probeInFlight) return { allowed: false, retryInMs: 0 }
        circuit.probeInFlight = true
        return { allowed: true, ticket: { probe: true, generation: circuit.generation } }
    }
  }

  recordSuccess(platform: string, ticket: Ticket): void {
    const circuit = this.circuitFor(platform)
    if (ticket.generation !== circuit.generation) return

    if (circuit.state === 'CLOSED') {
      circuit.consecutiveFailures = 0
      return
    }
    if (circuit.state === 'HALF_OPEN' && ticket.probe) {
      circuit.probeInFlight = false
      circuit.halfOpenSuccesses++
      if (circuit.halfOpenSuccesses >= this.successThreshold) {
        this.logger.info(`[${platform}] closed`)
        this.circuits.set(platform, closedCircuit(circuit.generation))
      }
    }
  }

  recordFailure(platform: string, ticket: Ticket): void {
    const circuit = this.circuitFor(platform)
    if (ticket.generation !== circuit.generation) return
    const now = this.clock.now()

    if (circuit.state === 'HALF_OPEN' && ticket.probe) {
      circuit.lastFailureAt = now
      this.open(platform, circuit, now)
      return
    }
    if (circuit.state === 'CLOSED') {
      circuit.lastFailureAt = now
      circuit.consecutiveFailures++
      if (circuit.consecutiveFailures >= this.failureThreshold) this.open(platform, circuit, now)
    }
  }

  /** Ends a probe that produced no verdict (parse error, cancellation) without changing state. */
  release(platform: string, ticket: Ticket): void {
    const circuit = this.circuits.get(platform)
    if (circuit?.state === 'HALF_OPEN' && ticket.probe && ticket.generation === circuit.generation) {
      circuit.probeInFlight = false
    }
  }

  snapshot(platform: string): Readonly<CircuitState> {
    return { ...this.circuitFor(platform) }
  }

  private open(platform: string, circuit: CircuitState, now: number): void {
    circuit.state = 'OPEN'
    circuit.generation++
    circuit.openUntil = now + this.resetTimeoutMs
    circuit.probeInFlight = false
    circuit.halfOpenSuccesses = 0
    this.logger.warn(
      `[${platform}] opened after ${circuit.consecutiveFailures} consecutive failures, retry in ${this.resetTimeoutMs}ms`
    )
  }

  private circuitFor(platform: string): CircuitState {
    let circuit = this.circuits.get(platform)
    if (!circuit) {
      circuit = closedCircuit()
      this.circuits.set(platform, circuit)
    }
    return circuit
  }
}

function closedCircuit(generation = 0): CircuitState {
  return {
    state: 'CLOSED',
    consecutiveFailures: 0,
    lastFailureAt: null,
    openUntil: null,
    halfOpenSuccesses: 0,
    probeInFlight: false,
    generation,
  }
}
