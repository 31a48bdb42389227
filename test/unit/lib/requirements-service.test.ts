/**
 * Tests for the requirements service: request validation, result caching,
 * in-flight coalescing, code recommendation and statistics.
 */
import { beforeEach, describe, expect, it } from "vitest";
import type { CodeRecommender } from "@/lib/analyzer/types";
import { DEFAULT_ANALYZER_CONFIG, type AnalyzerConfig } from "@/lib/config-schemas";
import { createRequirementsService, type RequirementsService, type ServiceOverrides } from "@/lib/requirements-service";
import { InMemoryPersistentStore, ScriptedProvider, makeItem } from "@test/helpers/fakes";

const NOW = Date.parse("2026-06-01T00:00:00.000Z");

const CONFIG: AnalyzerConfig = {
  ...DEFAULT_ANALYZER_CONFIG,
  llm: { ...DEFAULT_ANALYZER_CONFIG.llm, enabled: false, embeddingsEnabled: false },
  cache: { ...DEFAULT_ANALYZER_CONFIG.cache, persistentEnabled: false, remoteEnabled: false },
};

const REQUEST = {
  classificationCode: "3304.99",
  productName: "Vitamin C Serum",
  productDescription: "Brightening facial serum with ascorbic acid",
};

describe("RequirementsService", () => {
  let fda: ScriptedProvider;

  beforeEach(() => {
    fda = new ScriptedProvider("openFDA", "structured", ["FDA"], (q) => (q.strategy === "code" ? [makeItem()] : []));
  });

  function service(overrides: ServiceOverrides = {}): RequirementsService {
    return createRequirementsService(CONFIG, { persistentStore: null, remoteStore: null, providers: [fda], now: () => NOW, ...overrides });
  }

  it("analyzes a request and scores it", async () => {
    const result = await service().analyzeRequirements(REQUEST);

    expect(result.status).toBe("completed");
    expect(result.certifications).toHaveLength(1);
    expect(result.confidence.score).toBe(0.53);
    expect(result.confidence.level).toBe("MEDIUM");
    expect(result.metadata.codeMappingConfidence).toBe(1);
    expect(result.metadata.fromCache).toBe(false);
  });

  it("rejects invalid requests with a failed result", async () => {
    const svc = service();
    const result = await svc.analyzeRequirements({ classificationCode: "3304.99", productName: "   " });

    expect(result.status).toBe("failed");
    expect(result.warnings).toEqual(["Invalid request: productName: String must contain at least 1 character(s)"]);
    expect(result.errorSummary.byCategory).toEqual({ validation: 1 });
    expect(result.classificationCode).toBe("3304.99");
    expect(svc.getStatistics().requests).toMatchObject({ total: 1, failed: 1 });
    expect(fda.queries).toEqual([]);
  });

  it("serves repeated requests from the analysis cache", async () => {
    const svc = service();
    await svc.analyzeRequirements(REQUEST);
    const queriesAfterFirst = fda.queries.length;

    const second = await svc.analyzeRequirements({ ...REQUEST, productName: "  vitamin c serum " });

    expect(second.metadata.fromCache).toBe(true);
    expect(second.confidence.score).toBe(0.53);
    expect(fda.queries).toHaveLength(queriesAfterFirst);
    expect(svc.getStatistics().requests).toMatchObject({ total: 2, fromCache: 1 });
  });

  it("bypasses the cache on force refresh and for new products", async () => {
    const svc = service();
    await svc.analyzeRequirements(REQUEST);

    expect((await svc.analyzeRequirements({ ...REQUEST, forceRefresh: true })).metadata.fromCache).toBe(false);
    expect((await svc.analyzeRequirements({ ...REQUEST, isNewProduct: true })).metadata.fromCache).toBe(false);
    expect((await svc.refreshAnalysis(REQUEST.classificationCode, REQUEST.productName)).metadata.fromCache).toBe(false);
  });

  it("shares one run between concurrent identical requests", async () => {
    const svc = service();
    const [a, b] = await Promise.all([svc.analyzeRequirements(REQUEST), svc.analyzeRequirements(REQUEST)]);

    expect(a).toBe(b);
    expect(svc.getStatistics().requests.coalesced).toBe(1);
  });

  it("uses a recommended code when none is given", async () => {
    const recommender: CodeRecommender = { recommend: async () => ({ code: "3304.99", confidence: 0.9 }) };
    const result = await service({ recommender }).analyzeRequirements({ ...REQUEST, classificationCode: "" });

    expect(result.classificationCode).toBe("3304.99");
    expect(result.warnings[0]).toBe("Classification code 3304.99 was recommended (confidence 0.90)");
    expect(result.metadata.codeMappingConfidence).toBe(0.9);
    expect(result.confidence.score).toBe(0.52);
  });

  it("runs with zero code confidence when no code can be recommended", async () => {
    const recommender: CodeRecommender = {
      recommend: async () => {
        throw new Error("recommender offline");
      },
    };
    const result = await service({ recommender }).analyzeRequirements({ ...REQUEST, classificationCode: "" });

    expect(result.warnings[0]).toBe("No classification code given and none could be recommended");
    expect(result.metadata.codeMappingConfidence).toBe(0);
    expect(result.recommendedAgencies.category).toBe("General");
  });

  it("reports cache status and invalidates by code", async () => {
    const svc = service();
    expect((await svc.getCacheStatus(REQUEST.classificationCode, REQUEST.productName)).cached).toBe(false);

    await svc.analyzeRequirements(REQUEST);
    const status = await svc.getCacheStatus(REQUEST.classificationCode, REQUEST.productName);
    expect(status).toMatchObject({ cached: true, tier: "memory", ttlRemainingSec: 7 * 86_400 });

    expect(await svc.invalidateCode("3304.99")).toBe(1);
    expect((await svc.getCacheStatus(REQUEST.classificationCode, REQUEST.productName)).cached).toBe(false);
  });

  it("collects statistics across collaborators", async () => {
    const svc = service();
    await svc.analyzeRequirements(REQUEST);

    const stats = svc.getStatistics();
    expect(stats.requests).toEqual({ total: 1, fromCache: 0, coalesced: 0, failed: 0, partial: 0 });
    expect(stats.agencyUsage.map((u) => [u.codePrefix, u.source, u.count])).toEqual([["3304", "rule", 1]]);
    expect(stats.stages.find((s) => s.stage === "score")?.completed).toBe(1);
    expect(stats.providers.map((p) => p.provider)).toEqual(["openFDA"]);
    expect(stats.controller.completedTasks).toBe(5);
  });

  it("closes the persistent tier", async () => {
    const store = new InMemoryPersistentStore();
    const svc = service({ persistentStore: store });
    await svc.analyzeRequirements(REQUEST);
    await svc.close();
    expect(store.closed).toBe(true);
    expect([...store.rows.keys()].some((k) => k.startsWith("analysis:330499:"))).toBe(true);
  });
});
