/**
 * Tests for the analysis result cache: key normalization, save rules,
 * status reporting and invalidation.
 */
import { beforeEach, describe, expect, it } from "vitest";
import { AnalysisResultCache, analysisCacheKey, normalizeCode } from "@/lib/cache/analysis-cache";
import { TieredCache } from "@/lib/cache/tiered-cache";
import { makeResult } from "@test/helpers/fakes";

const WEEK_SEC = 7 * 86_400;

describe("analysisCacheKey", () => {
  it("normalizes the code and the product name", () => {
    expect(normalizeCode("3304.99-00")).toBe("33049900");
    expect(analysisCacheKey("3304.99", "Vitamin C Serum")).toBe(analysisCacheKey("3304-99", "  vitamin c serum "));
    expect(analysisCacheKey("3304.99", "Vitamin C Serum")).toMatch(/^analysis:330499:[0-9a-f]{32}$/);
  });

  it("separates different products under one code", () => {
    expect(analysisCacheKey("3304.99", "Serum")).not.toBe(analysisCacheKey("3304.99", "Cream"));
  });
});

describe("AnalysisResultCache", () => {
  let clock: number;
  let tiered: TieredCache;
  let cache: AnalysisResultCache;

  beforeEach(() => {
    clock = 1_700_000_000_000;
    tiered = new TieredCache({ memoryCapacity: 10, defaultTtlSec: 60, now: () => clock });
    cache = new AnalysisResultCache(tiered, WEEK_SEC, () => clock);
  });

  it("stores and returns a completed result", async () => {
    const result = makeResult();
    await cache.save(result);
    expect(await cache.get("3304.99", "Vitamin C Serum")).toEqual(result);
  });

  it("does not store failed results", async () => {
    await cache.save(makeResult({ status: "failed" }));
    expect(await cache.get("3304.99", "Vitamin C Serum")).toBeNull();
  });

  it("reports status for cached and uncached analyses", async () => {
    const missing = await cache.status("3304.99", "Vitamin C Serum");
    expect(missing.cached).toBe(false);
    expect(missing.tier).toBeNull();

    await cache.save(makeResult());
    clock += 60_000;
    const status = await cache.status("3304.99", "Vitamin C Serum");
    expect(status).toEqual({
      cached: true,
      cacheKey: analysisCacheKey("3304.99", "Vitamin C Serum"),
      tier: "memory",
      createdAt: new Date(1_700_000_000_000).toISOString(),
      expiresAt: new Date(1_700_000_000_000 + WEEK_SEC * 1000).toISOString(),
      ttlRemainingSec: WEEK_SEC - 60,
      accessCount: 0,
    });
  });

  it("invalidates one analysis or every analysis under a code", async () => {
    await cache.save(makeResult());
    await cache.save(makeResult({ productName: "Night Cream" }));
    await cache.save(makeResult({ classificationCode: "8471.30", productName: "Laptop" }));

    expect(await cache.invalidate("3304.99", "Vitamin C Serum")).toBe(true);
    expect(await cache.invalidateCode("3304.99")).toBe(1);
    expect(await cache.get("3304.99", "Night Cream")).toBeNull();
    expect(await cache.get("8471.30", "Laptop")).not.toBeNull();
  });
});
