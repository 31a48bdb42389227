/**
 * Tests for keyword extraction: tokenizing, ranking, the heuristic, LLM and
 * embedding strategies, and the strategy chain.
 */
import { describe, expect, it } from "vitest";
import { MockEmbeddingModelV1 } from "ai/test";
import {
  ChainedKeywordExtractor,
  EmbeddingKeywordExtractor,
  HeuristicKeywordExtractor,
  LlmKeywordExtractor,
  cleanKeywords,
  keywordStrategies,
  rankTokens,
  tokenizeForKeywords,
  type KeywordExtractor,
} from "@/lib/analyzer/keyword-extractor";
import { failingModel, scriptedModel } from "@test/helpers/fakes";

const NO_RETRY = { maxRetries: 0, baseDelayMs: 0, backoffFactor: 1 };
const NAME = "Vitamin C Serum";
const DESCRIPTION = "Brightening facial serum with ascorbic acid";

describe("tokenizeForKeywords", () => {
  it("keeps lowercase ASCII tokens of three or more characters without stop words", () => {
    expect(tokenizeForKeywords("The Vitamin C Serum for 30ml bottles")).toEqual(["vitamin", "serum", "30ml", "bottles"]);
  });

  it("drops non-ASCII characters", () => {
    expect(tokenizeForKeywords("비타민 serum")).toEqual(["serum"]);
  });
});

describe("rankTokens", () => {
  it("ranks by frequency, then length, then first appearance", () => {
    expect(rankTokens(["acid", "serum", "facial", "serum", "cream"])).toEqual(["serum", "facial", "cream", "acid"]);
  });
});

describe("HeuristicKeywordExtractor", () => {
  const extractor = new HeuristicKeywordExtractor();

  it("returns the top ranked tokens", async () => {
    expect(await extractor.extract(NAME, DESCRIPTION, 3)).toEqual(["serum", "brightening", "ascorbic"]);
  });

  it("maps Hangul cosmetic terms when no ASCII token survives", () => {
    expect(extractor.rank("비타민C 세럼", "", 3)).toEqual(["cosmetic", "serum"]);
  });

  it("returns nothing for text without usable tokens", () => {
    expect(extractor.rank("비타민", "", 3)).toEqual([]);
  });
});

describe("cleanKeywords", () => {
  it("trims, lowercases, dedupes and caps the list", () => {
    expect(cleanKeywords([" Serum ", "serum", "Vitamin C", "", "acid"], 2)).toEqual(["serum", "vitamin c"]);
  });
});

describe("keywordStrategies", () => {
  it("builds escalating prefixes", () => {
    expect(keywordStrategies(["serum", "vitamin", "acid", "cream"])).toEqual([["serum"], ["serum", "vitamin"], ["serum", "vitamin", "acid"]]);
    expect(keywordStrategies([])).toEqual([]);
  });
});

describe("LlmKeywordExtractor", () => {
  it("parses the first JSON array in the reply", async () => {
    const { model, prompts } = scriptedModel('Keywords: ["Vitamin C serum", "Cosmetic", "cosmetic", 2024]');
    const extractor = new LlmKeywordExtractor(model, { retry: NO_RETRY });

    expect(await extractor.extract(NAME, DESCRIPTION, 3)).toEqual(["vitamin c serum", "cosmetic", "2024"]);
    expect(prompts[0]).toContain("up to 3 short English keywords");
  });

  it("returns an empty list when the reply holds no array", async () => {
    const { model } = scriptedModel("I cannot help with that.");
    expect(await new LlmKeywordExtractor(model, { retry: NO_RETRY }).extract(NAME, DESCRIPTION, 3)).toEqual([]);
  });
});

describe("EmbeddingKeywordExtractor", () => {
  it("ranks candidates by similarity to the full text", async () => {
    const vectors: Record<string, number[]> = { acid: [1, 0], facial: [0.8, 0.6] };
    const model = new MockEmbeddingModelV1<string>({
      maxEmbeddingsPerCall: 100,
      doEmbed: async ({ values }) => ({
        embeddings: values.map((v) => (v.includes(" ") ? [1, 0] : (vectors[v] ?? [0, 1]))),
      }),
    });

    const extractor = new EmbeddingKeywordExtractor(model);
    expect(await extractor.extract(NAME, DESCRIPTION, 3)).toEqual(["acid", "facial", "brightening"]);
  });

  it("skips the model when there are few candidates", async () => {
    const model = new MockEmbeddingModelV1<string>({
      doEmbed: async () => {
        throw new Error("should not be called");
      },
    });
    expect(await new EmbeddingKeywordExtractor(model).extract("Serum", "", 3)).toEqual(["serum"]);
  });
});

describe("ChainedKeywordExtractor", () => {
  const empty: KeywordExtractor = { name: "empty", extract: async () => [] };

  it("uses the first strategy that returns keywords", async () => {
    const chain = new ChainedKeywordExtractor([empty, new HeuristicKeywordExtractor()], 2);
    expect(await chain.extract(NAME, DESCRIPTION)).toEqual({ keywords: ["serum", "brightening"], strategy: "heuristic", failures: [] });
  });

  it("records failing strategies and falls through", async () => {
    const chain = new ChainedKeywordExtractor(
      [new LlmKeywordExtractor(failingModel("Malformed response from provider"), { retry: NO_RETRY }), new HeuristicKeywordExtractor()],
      3,
    );
    const result = await chain.extract(NAME, DESCRIPTION);
    expect(result.strategy).toBe("heuristic");
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].strategy).toBe("llm");
    expect(chain.strategyNames).toEqual(["llm", "heuristic"]);
  });

  it("reports strategy none when nothing yields keywords", async () => {
    const chain = new ChainedKeywordExtractor([empty], 3);
    expect(await chain.extract("비타민", "")).toEqual({ keywords: [], strategy: "none", failures: [] });
  });
});
