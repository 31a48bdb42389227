/**
 * Evidence Provider Circuit Breaker
 *
 * Tracks provider health and prevents cascading failures.
 * When a provider fails repeatedly, its circuit "opens" and the gatherer
 * skips it temporarily instead of paying its timeout on every query.
 *
 * States:
 * - CLOSED: Normal operation, provider is healthy
 * - OPEN: Provider is failing, skip it temporarily
 * - HALF_OPEN: Testing if provider has recovered
 *
 * @module provider-circuit-breaker
 */

import { DEFAULT_CIRCUIT_BREAKER_CONFIG, type CircuitBreakerConfig } from "./config-schemas";

export type CircuitState = "closed" | "open" | "half_open";

export type { CircuitBreakerConfig };

interface ProviderCircuitState {
  state: CircuitState;
  failures: number;
  lastFailureTime: number | null;
  lastSuccessTime: number | null;
  totalRequests: number;
  totalFailures: number;
  totalSuccesses: number;
  halfOpenProbeInFlight: boolean;
}

export interface ProviderStats {
  provider: string;
  state: CircuitState;
  consecutiveFailures: number;
  totalRequests: number;
  totalFailures: number;
  totalSuccesses: number;
  successRate: number;
  lastFailureTime: number | null;
  lastSuccessTime: number | null;
}

export class ProviderCircuitBreaker {
  private readonly circuits = new Map<string, ProviderCircuitState>();
  private readonly now: () => number;

  constructor(
    private readonly config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
    clock: () => number = Date.now,
  ) {
    this.now = clock;
  }

  private getCircuit(provider: string): ProviderCircuitState {
    let circuit = this.circuits.get(provider);
    if (!circuit) {
      circuit = {
        state: "closed",
        failures: 0,
        lastFailureTime: null,
        lastSuccessTime: null,
        totalRequests: 0,
        totalFailures: 0,
        totalSuccesses: 0,
        halfOpenProbeInFlight: false,
      };
      this.circuits.set(provider, circuit);
    }
    return circuit;
  }

  // ==========================================================================
  // CIRCUIT OPERATIONS
  // ==========================================================================

  /**
   * Check if a provider may be called. A half-open circuit lets exactly one
   * probe through at a time.
   */
  isAvailable(provider: string): boolean {
    if (!this.config.enabled) return true;

    const circuit = this.getCircuit(provider);

    if (circuit.state === "closed") return true;

    if (circuit.state === "half_open") {
      if (circuit.halfOpenProbeInFlight) {
        console.log(`[Circuit-Breaker] ${provider}: HALF_OPEN probe already in flight, skipping concurrent request`);
        return false;
      }
      circuit.halfOpenProbeInFlight = true;
      return true;
    }

    const sinceFailure = circuit.lastFailureTime !== null ? this.now() - circuit.lastFailureTime : Infinity;
    const resetTimeoutMs = this.config.resetTimeoutSec * 1000;

    if (sinceFailure >= resetTimeoutMs) {
      circuit.state = "half_open";
      circuit.halfOpenProbeInFlight = true;
      console.log(`[Circuit-Breaker] ${provider}: OPEN → HALF_OPEN (timeout elapsed, attempting recovery)`);
      return true;
    }

    const remainingSec = Math.ceil((resetTimeoutMs - sinceFailure) / 1000);
    console.log(`[Circuit-Breaker] ${provider}: Circuit OPEN, skipping (retry in ${remainingSec}s)`);
    return false;
  }

  recordSuccess(provider: string): void {
    if (!this.config.enabled) return;

    const circuit = this.getCircuit(provider);
    circuit.totalRequests++;
    circuit.totalSuccesses++;
    circuit.lastSuccessTime = this.now();
    circuit.failures = 0;

    if (circuit.state === "half_open") {
      circuit.state = "closed";
      circuit.halfOpenProbeInFlight = false;
      console.log(
        `[Circuit-Breaker] ${provider}: HALF_OPEN → CLOSED (recovery successful, ${circuit.totalSuccesses}/${circuit.totalRequests} success rate)`,
      );
    }
  }

  recordFailure(provider: string, error?: string): void {
    if (!this.config.enabled) return;

    const circuit = this.getCircuit(provider);
    circuit.totalRequests++;
    circuit.totalFailures++;
    circuit.failures++;
    circuit.lastFailureTime = this.now();

    console.warn(
      `[Circuit-Breaker] ${provider}: Failure recorded (${circuit.failures}/${this.config.failureThreshold}, error: ${error || "unknown"})`,
    );

    if (circuit.state === "half_open") {
      circuit.state = "open";
      circuit.halfOpenProbeInFlight = false;
      console.error(`[Circuit-Breaker] ${provider}: HALF_OPEN → OPEN (recovery failed, circuit reopened)`);
      return;
    }

    if (circuit.state === "closed" && circuit.failures >= this.config.failureThreshold) {
      circuit.state = "open";
      console.error(
        `[Circuit-Breaker] ${provider}: CLOSED → OPEN (threshold reached: ${circuit.failures} consecutive failures)`,
      );
    }
  }

  /**
   * Release a half-open probe that ended without a verdict (cancelled call),
   * so the next request can probe again.
   */
  releaseProbe(provider: string): void {
    const circuit = this.circuits.get(provider);
    if (circuit) circuit.halfOpenProbeInFlight = false;
  }

  reset(provider?: string): void {
    if (provider === undefined) {
      this.circuits.clear();
      return;
    }
    this.circuits.delete(provider);
  }

  // ==========================================================================
  // STATISTICS
  // ==========================================================================

  getStats(provider: string): ProviderStats | null {
    const circuit = this.circuits.get(provider);
    if (!circuit) return null;

    return {
      provider,
      state: circuit.state,
      consecutiveFailures: circuit.failures,
      totalRequests: circuit.totalRequests,
      totalFailures: circuit.totalFailures,
      totalSuccesses: circuit.totalSuccesses,
      successRate: circuit.totalRequests > 0 ? circuit.totalSuccesses / circuit.totalRequests : 0,
      lastFailureTime: circuit.lastFailureTime,
      lastSuccessTime: circuit.lastSuccessTime,
    };
  }

  getAllStats(): ProviderStats[] {
    const stats: ProviderStats[] = [];
    for (const provider of this.circuits.keys()) {
      const stat = this.getStats(provider);
      if (stat) stats.push(stat);
    }
    return stats;
  }
}
