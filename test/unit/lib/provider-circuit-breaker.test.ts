/**
 * Tests for the evidence provider circuit breaker.
 *
 * Validates state transitions (CLOSED → OPEN → HALF_OPEN → CLOSED),
 * failure threshold triggering, single-probe recovery, and statistics.
 * Uses an injected clock instead of real timers.
 */
import { beforeEach, describe, expect, it } from "vitest";
import { ProviderCircuitBreaker, type CircuitBreakerConfig } from "@/lib/provider-circuit-breaker";

const TEST_CONFIG: CircuitBreakerConfig = {
  enabled: true,
  failureThreshold: 3,
  resetTimeoutSec: 5,
};

describe("ProviderCircuitBreaker", () => {
  let clock: number;
  let breaker: ProviderCircuitBreaker;

  beforeEach(() => {
    clock = 1_000_000;
    breaker = new ProviderCircuitBreaker(TEST_CONFIG, () => clock);
  });

  function openCircuit(provider = "openfda"): void {
    breaker.recordFailure(provider, "Error 1");
    breaker.recordFailure(provider, "Error 2");
    breaker.recordFailure(provider, "Error 3");
  }

  it("starts CLOSED", () => {
    expect(breaker.isAvailable("openfda")).toBe(true);
  });

  it("opens after the failure threshold", () => {
    breaker.recordFailure("openfda", "Error 1");
    breaker.recordFailure("openfda", "Error 2");
    expect(breaker.isAvailable("openfda")).toBe(true);

    breaker.recordFailure("openfda", "Error 3");
    expect(breaker.isAvailable("openfda")).toBe(false);
    expect(breaker.getStats("openfda")?.state).toBe("open");
  });

  it("resets the consecutive count on success", () => {
    breaker.recordFailure("openfda", "Error 1");
    breaker.recordFailure("openfda", "Error 2");
    breaker.recordSuccess("openfda");
    breaker.recordFailure("openfda", "Error 3");
    breaker.recordFailure("openfda", "Error 4");
    expect(breaker.isAvailable("openfda")).toBe(true);
  });

  it("lets exactly one probe through once the reset timeout elapses", () => {
    openCircuit();
    clock += 4_999;
    expect(breaker.isAvailable("openfda")).toBe(false);

    clock += 1;
    expect(breaker.isAvailable("openfda")).toBe(true);
    expect(breaker.getStats("openfda")?.state).toBe("half_open");
    expect(breaker.isAvailable("openfda")).toBe(false);
  });

  it("closes after a successful probe", () => {
    openCircuit();
    clock += 5_000;
    expect(breaker.isAvailable("openfda")).toBe(true);
    breaker.recordSuccess("openfda");
    expect(breaker.getStats("openfda")?.state).toBe("closed");
    expect(breaker.isAvailable("openfda")).toBe(true);
  });

  it("reopens after a failed probe", () => {
    openCircuit();
    clock += 5_000;
    expect(breaker.isAvailable("openfda")).toBe(true);
    breaker.recordFailure("openfda", "still down");
    expect(breaker.getStats("openfda")?.state).toBe("open");
    expect(breaker.isAvailable("openfda")).toBe(false);
  });

  it("releases an unresolved probe so the next call can probe again", () => {
    openCircuit();
    clock += 5_000;
    expect(breaker.isAvailable("openfda")).toBe(true);
    breaker.releaseProbe("openfda");
    expect(breaker.isAvailable("openfda")).toBe(true);
  });

  it("tracks providers independently", () => {
    openCircuit("openfda");
    expect(breaker.isAvailable("openfda")).toBe(false);
    expect(breaker.isAvailable("search-scrape")).toBe(true);
  });

  it("always reports available when disabled", () => {
    const disabled = new ProviderCircuitBreaker({ ...TEST_CONFIG, enabled: false }, () => clock);
    for (let i = 0; i < 10; i++) disabled.recordFailure("openfda", "down");
    expect(disabled.isAvailable("openfda")).toBe(true);
    expect(disabled.getAllStats()).toEqual([]);
  });

  it("reports statistics", () => {
    breaker.recordSuccess("openfda");
    breaker.recordFailure("openfda", "Error 1");
    const stats = breaker.getStats("openfda");
    expect(stats).toEqual({
      provider: "openfda",
      state: "closed",
      consecutiveFailures: 1,
      totalRequests: 2,
      totalFailures: 1,
      totalSuccesses: 1,
      successRate: 0.5,
      lastFailureTime: 1_000_000,
      lastSuccessTime: 1_000_000,
    });
    expect(breaker.getStats("unknown")).toBeNull();
  });

  it("forgets a provider on reset", () => {
    openCircuit();
    breaker.reset("openfda");
    expect(breaker.isAvailable("openfda")).toBe(true);
  });
});
