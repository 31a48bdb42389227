/**
 * Tests for precedent validation and the precedent corpora.
 */
import { afterEach, describe, expect, it, vi } from "vitest";
import { consolidate } from "@/lib/analyzer/consolidator";
import { HttpPrecedentCorpus, InMemoryPrecedentCorpus } from "@/lib/analyzer/precedent-corpus";
import {
  LlmRequirementExtractor,
  PrecedentValidator,
  assessSeverity,
  verdictFor,
  type RequirementExtractor,
} from "@/lib/analyzer/precedent-validator";
import type { PrecedentCase, RedFlag } from "@/lib/analyzer/types";
import { ProviderContractError, ProviderError } from "@/lib/errors";
import { jsonResponse, makeItem, scriptedModel } from "@test/helpers/fakes";

const serumCase: PrecedentCase = {
  id: "NY-N301234",
  text: "Cosmetic registration and labeling required; certificate of analysis on file.",
  source: "CBP",
  outcome: "success",
  classificationCode: "3304.99.00",
};

const requirements = consolidate([
  makeItem({ title: "FDA cosmetic registration" }),
  makeItem({ kind: "document", title: "Ingredient declaration", sourceUrl: "https://www.fda.gov/labeling" }),
]);

describe("PrecedentValidator", () => {
  it("returns the neutral result for an empty corpus", async () => {
    const result = await new PrecedentValidator().validate("3304.99", requirements, new InMemoryPrecedentCorpus(), "Vitamin C Serum");
    expect(result).toMatchObject({ score: 0.5, verdict: "NO_PRECEDENTS", casesAnalyzed: 0, source: "none" });
  });

  it("matches extracted precedent requirements against the analysis", async () => {
    const { model } = scriptedModel(
      '{"certifications": ["FDA cosmetic registration"], "documents": ["ingredient declaration"], "regulations": ["Labeling must follow 21 CFR 701"]}',
    );
    const validator = new PrecedentValidator({ extractor: new LlmRequirementExtractor(model) });
    const result = await validator.validate("3304.99", requirements, new InMemoryPrecedentCorpus([serumCase]), "Vitamin C Serum");

    expect(result.casesAnalyzed).toBe(1);
    expect(result.matched).toEqual([
      { ours: "FDA cosmetic registration", precedent: "FDA cosmetic registration", kind: "certification", similarity: 1 },
      { ours: "Ingredient declaration", precedent: "ingredient declaration", kind: "document", similarity: 1 },
    ]);
    expect(result.coverage).toBe(1);
    expect(result.score).toBeCloseTo(1);
    expect(result.missing).toEqual([{ text: "Labeling must follow 21 CFR 701", kind: "regulation", severity: "medium" }]);
    expect(result.extra).toEqual([]);
    expect(result.verdict).toBe("RELIABLE");
    expect(result.source).toBe("corpus");
  });

  it("scores neutrally when precedents name no certifications or documents", async () => {
    const { model } = scriptedModel('{"certifications": [], "documents": [], "regulations": ["Labeling must follow 21 CFR 701"]}');
    const validator = new PrecedentValidator({ extractor: new LlmRequirementExtractor(model) });
    const result = await validator.validate("3304.99", requirements, new InMemoryPrecedentCorpus([serumCase]), "Vitamin C Serum");

    expect(result.casesAnalyzed).toBe(1);
    expect(result.matched).toEqual([]);
    expect(result.score).toBe(0.5);
    expect(result.source).toBe("corpus");
  });

  it("counts each precedent requirement once toward coverage", async () => {
    const { model } = scriptedModel('{"certifications": ["FDA cosmetic registration"], "documents": [], "regulations": []}');
    const validator = new PrecedentValidator({ extractor: new LlmRequirementExtractor(model) });
    const twoWordings = consolidate([makeItem({ title: "FDA cosmetic registration" }), makeItem({ title: "Cosmetic registration FDA" })]);
    const result = await validator.validate("3304.99", twoWordings, new InMemoryPrecedentCorpus([serumCase]), "Vitamin C Serum");

    expect(result.matched).toEqual([
      { ours: "FDA cosmetic registration", precedent: "FDA cosmetic registration", kind: "certification", similarity: 1 },
    ]);
    expect(result.coverage).toBe(1);
    expect(result.score).toBeCloseTo(1);
    expect(result.extra).toEqual(["Cosmetic registration FDA"]);
  });

  it("falls back to the keyword heuristic when extraction fails", async () => {
    const broken: RequirementExtractor = {
      name: "broken",
      extract: async () => {
        throw new Error("model offline");
      },
    };
    const validator = new PrecedentValidator({ extractor: broken });
    const result = await validator.validate("3304.99", requirements, new InMemoryPrecedentCorpus([serumCase]), "Vitamin C Serum");

    expect(result.matched).toEqual([]);
    expect(result.score).toBe(0);
    expect(result.verdict).toBe("UNRELIABLE");
    expect(result.missing.map((m) => m.text)).toEqual(["CBP registration", "certificate required", "labeling compliance"]);
    expect(result.extra).toEqual(["FDA cosmetic registration", "Ingredient declaration"]);
  });
});

describe("verdictFor", () => {
  const high: RedFlag = { type: "missing_requirement", severity: "high", description: "" };

  it("applies the reliable and review thresholds", () => {
    expect(verdictFor(0.9, [])).toBe("RELIABLE");
    expect(verdictFor(0.9, [high])).toBe("NEEDS_REVIEW");
    expect(verdictFor(0.7, [])).toBe("NEEDS_REVIEW");
    expect(verdictFor(0.69, [])).toBe("UNRELIABLE");
  });
});

describe("assessSeverity", () => {
  it("grades by the terms a requirement uses", () => {
    expect(assessSeverity("Import of banned dyes")).toBe("high");
    expect(assessSeverity("Prior notice required")).toBe("medium");
    expect(assessSeverity("Country of origin marking")).toBe("low");
  });
});

describe("InMemoryPrecedentCorpus", () => {
  const corpus = new InMemoryPrecedentCorpus([
    serumCase,
    { id: "NY-N305555", text: "Laptop computers with lithium batteries", source: "CBP", outcome: "success", classificationCode: "8471.30" },
  ]);

  it("finds cases sharing the four-digit prefix", async () => {
    expect((await corpus.searchByCode("3304.10", 10)).map((c) => c.id)).toEqual(["NY-N301234"]);
    expect(await corpus.searchByCode("", 10)).toEqual([]);
  });

  it("finds lexically similar cases", async () => {
    const [hit] = await corpus.searchSimilar("laptop computers", 5);
    expect(hit.id).toBe("NY-N305555");
    expect(hit.similarity).toBeCloseTo(2 / 5);
  });
});

describe("HttpPrecedentCorpus", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("reads the case list", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ cases: [serumCase] }));
    vi.stubGlobal("fetch", fetchMock);

    const cases = await new HttpPrecedentCorpus("http://precedents.test/").searchByCode("3304.99", 3);
    expect(cases).toEqual([serumCase]);
    expect(fetchMock.mock.calls[0][0]).toBe("http://precedents.test/precedents/by-code/3304.99?limit=3");
  });

  it("treats 404 as no cases", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({}, 404)));
    expect(await new HttpPrecedentCorpus("http://precedents.test").searchSimilar("serum", 5)).toEqual([]);
  });

  it("raises provider errors for server failures and malformed payloads", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({}, 503)));
    await expect(new HttpPrecedentCorpus("http://precedents.test").searchSimilar("serum", 5)).rejects.toBeInstanceOf(ProviderError);

    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ cases: [{ id: 1 }] })));
    await expect(new HttpPrecedentCorpus("http://precedents.test").searchSimilar("serum", 5)).rejects.toBeInstanceOf(
      ProviderContractError,
    );
  });
});
