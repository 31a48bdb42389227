/**
 * Tests for evidence gathering: query planning, provider fallback, caching,
 * failure isolation, circuit skipping and deadline truncation.
 */
import { beforeEach, describe, expect, it } from "vitest";
import { EvidenceGatherer, codeQueries, evidenceCacheKey, planQueries } from "@/lib/analyzer/evidence-gatherer";
import type { AgencyTarget } from "@/lib/analyzer/types";
import { TieredCache } from "@/lib/cache/tiered-cache";
import { ConcurrencyController } from "@/lib/concurrency/task-runner";
import { DEFAULT_CACHE_CONFIG } from "@/lib/config-schemas";
import { ProviderContractError, ProviderError } from "@/lib/errors";
import { ProviderCircuitBreaker } from "@/lib/provider-circuit-breaker";
import { ScriptedProvider, makeItem, makeRequest } from "@test/helpers/fakes";

const KEYWORDS = ["serum", "brightening", "ascorbic"];

const TARGET: AgencyTarget = {
  primaryAgencies: ["FDA", "CPSC"],
  secondaryAgencies: ["CBP"],
  confidence: 0.9,
  source: "rule",
  category: "Cosmetics",
  codePrefix: "3304",
};

describe("query planning", () => {
  it("adds the six-digit form of longer codes", () => {
    expect(codeQueries("3304.99.5000")).toEqual(["3304995000", "330499"]);
    expect(codeQueries("3304.99")).toEqual(["330499"]);
    expect(codeQueries("")).toEqual([]);
  });

  it("plans code, widening keyword and full-text queries per agency", () => {
    const plan = planQueries(["FDA", "CBP"], KEYWORDS, makeRequest());
    const fulltext = "Vitamin C Serum Brightening facial serum with ascorbic acid";
    expect(plan).toEqual([
      { agency: "FDA", strategy: "code", query: "330499", step: 0 },
      { agency: "FDA", strategy: "keyword", query: "serum", step: 0 },
      { agency: "FDA", strategy: "keyword", query: "serum brightening", step: 1 },
      { agency: "FDA", strategy: "keyword", query: "serum brightening ascorbic", step: 2 },
      { agency: "FDA", strategy: "fulltext", query: fulltext, step: 0 },
      { agency: "CBP", strategy: "code", query: "330499", step: 0 },
      { agency: "CBP", strategy: "keyword", query: "serum", step: 0 },
      { agency: "CBP", strategy: "keyword", query: "serum brightening", step: 1 },
      { agency: "CBP", strategy: "keyword", query: "serum brightening ascorbic", step: 2 },
      { agency: "CBP", strategy: "fulltext", query: fulltext, step: 0 },
    ]);
  });

  it("plans no keyword queries without keywords", () => {
    expect(planQueries(["FDA"], [], makeRequest()).map((q) => q.strategy)).toEqual(["code", "fulltext"]);
  });

  it("builds cache keys from agency, strategy, code digits and a query hash", () => {
    expect(evidenceCacheKey("FDA", "code", "3304.99", "330499")).toMatch(/^evidence:FDA:code:330499:[0-9a-f]{12}$/);
    expect(evidenceCacheKey("FDA", "keyword", "", "serum")).toMatch(/^evidence:FDA:keyword:none:/);
    expect(evidenceCacheKey("FDA", "keyword", "3304", "Serum")).toBe(evidenceCacheKey("FDA", "keyword", "3304", "serum"));
  });
});

describe("EvidenceGatherer", () => {
  let cache: TieredCache;
  let breaker: ProviderCircuitBreaker;

  beforeEach(() => {
    cache = new TieredCache({ memoryCapacity: 100, defaultTtlSec: 60 });
    breaker = new ProviderCircuitBreaker({ enabled: true, failureThreshold: 3, resetTimeoutSec: 300 });
  });

  function gatherer(...providers: ScriptedProvider[]): EvidenceGatherer {
    return new EvidenceGatherer({
      cache,
      controller: new ConcurrencyController({ maxConcurrent: 5 }),
      breaker,
      providers,
      ttl: DEFAULT_CACHE_CONFIG.ttl,
      retries: 0,
    });
  }

  it("falls back to search for pairs the structured provider leaves empty", async () => {
    const structured = new ScriptedProvider("openfda", "structured", ["FDA"], (q) => (q.strategy === "code" ? [makeItem()] : []));
    const search = new ScriptedProvider("search", "search", ["FDA", "CPSC", "CBP"], () => []);

    const result = await gatherer(structured, search).gather(TARGET, KEYWORDS, makeRequest());

    expect(result.items).toEqual([makeItem()]);
    expect(result.errors).toEqual([]);
    expect(result.truncated).toBe(false);
    expect(result.stats).toEqual({ pairs: 15, cacheHits: 0, structuredCalls: 5, searchCalls: 14, skippedByCircuit: 0 });
    expect(structured.queries[0]).toMatchObject({ agency: "FDA", strategy: "code", query: "330499", category: "Cosmetics" });
  });

  it("answers repeated gathers from the cache", async () => {
    const structured = new ScriptedProvider("openfda", "structured", ["FDA"], (q) => (q.strategy === "code" ? [makeItem()] : []));
    const search = new ScriptedProvider("search", "search", ["FDA", "CPSC", "CBP"], () => []);
    const g = gatherer(structured, search);

    await g.gather(TARGET, KEYWORDS, makeRequest());
    const second = await g.gather(TARGET, KEYWORDS, makeRequest());

    expect(second.items).toEqual([makeItem()]);
    expect(second.stats.cacheHits).toBe(15);
    expect(structured.queries).toHaveLength(5);
    expect(search.queries).toHaveLength(14);
  });

  it("widens the keyword query only while the narrower one finds nothing", async () => {
    const structured = new ScriptedProvider("openfda", "structured", ["FDA"], (q) =>
      q.query === "serum brightening" ? [makeItem({ title: "Found by two keywords" })] : [],
    );

    const result = await gatherer(structured).gather({ ...TARGET, primaryAgencies: ["FDA"], secondaryAgencies: [] }, KEYWORDS, makeRequest());

    expect(structured.queries.filter((q) => q.strategy === "keyword").map((q) => q.query)).toEqual(["serum", "serum brightening"]);
    expect(result.items.map((i) => i.title)).toEqual(["Found by two keywords"]);
    expect(result.stats.pairs).toBe(4);
  });

  it("records provider failures without failing the gather", async () => {
    const structured = new ScriptedProvider("openfda", "structured", ["FDA"], () => {
      throw new ProviderError("openfda", 503, false, "openFDA HTTP 503");
    });
    const search = new ScriptedProvider("search", "search", ["FDA"], (q) =>
      q.strategy === "code" ? [makeItem({ title: "Found by search" })] : [],
    );

    const result = await gatherer(structured, search).gather(TARGET, KEYWORDS, makeRequest());

    expect(result.items.map((i) => i.title)).toEqual(["Found by search"]);
    expect(result.errors).toHaveLength(3);
    expect(result.errors[0]).toEqual({
      agency: "FDA",
      strategy: "code",
      provider: "openfda",
      category: "transient",
      status: 503,
      message: "openFDA HTTP 503",
    });
    expect(breaker.getStats("openfda")?.state).toBe("open");
  });

  it("skips providers whose circuit is open", async () => {
    const structured = new ScriptedProvider("openfda", "structured", ["FDA"], () => [makeItem()]);
    for (let i = 0; i < 3; i++) breaker.recordFailure("openfda", "HTTP 503");

    const result = await gatherer(structured).gather(TARGET, KEYWORDS, makeRequest());

    expect(structured.queries).toEqual([]);
    expect(result.stats.skippedByCircuit).toBe(5);
    expect(result.warnings).toContain("Provider openfda skipped for FDA/code: circuit open");
  });

  it("drops malformed payloads with a warning and keeps the circuit closed", async () => {
    const structured = new ScriptedProvider("openfda", "structured", ["FDA"], (q) => {
      if (q.strategy === "code") throw new ProviderContractError("openfda", "Malformed openFDA payload");
      return [];
    });

    const result = await gatherer(structured).gather(TARGET, KEYWORDS, makeRequest());

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].category).toBe("parse");
    expect(result.warnings).toContain("Provider openfda returned malformed data for FDA/code; items dropped");
    expect(breaker.getStats("openfda")?.state).toBe("closed");
  });

  it("returns partial results when the deadline has passed", async () => {
    const structured = new ScriptedProvider("openfda", "structured", ["FDA"], () => [makeItem()]);
    const abort = new AbortController();
    abort.abort();

    const result = await gatherer(structured).gather(TARGET, KEYWORDS, makeRequest(), abort.signal);

    expect(result.truncated).toBe(true);
    expect(result.items).toEqual([]);
    expect(result.warnings).toContain("Evidence gathering was cut short by the pipeline deadline; results are partial");
  });
});
