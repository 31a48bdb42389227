/**
 * Tests for requirement summaries: the deterministic stub and the LLM
 * summarizer's citation checks.
 */
import { describe, expect, it } from "vitest";
import { LlmSummarizer, citationsFor, stubSummary, toSummaryDocuments } from "@/lib/analyzer/summarizer";
import { makeItem, scriptedModel } from "@test/helpers/fakes";

const NO_RETRY = { maxRetries: 0, baseDelayMs: 0, backoffFactor: 1 };

const documents = toSummaryDocuments([
  makeItem({ title: "Cosmetic facility registration" }),
  makeItem({ kind: "document", title: "Ingredient declaration", sourceUrl: "https://www.fda.gov/labeling" }),
  makeItem({ kind: "notice", agency: "CPSC", title: "Child-resistant packaging recall", sourceUrl: "https://www.cpsc.gov/recalls" }),
]);

describe("citationsFor", () => {
  it("numbers citations from zero in document order", () => {
    expect(citationsFor(documents).map((c) => [c.index, c.agency])).toEqual([
      [0, "FDA"],
      [1, "FDA"],
      [2, "CPSC"],
    ]);
  });
});

describe("stubSummary", () => {
  it("lists documents by kind with their citation index", () => {
    const summary = stubSummary(documents);
    expect(summary.criticalRequirements).toEqual([
      { text: "Cosmetic facility registration", textKo: "Cosmetic facility registration", citations: [0] },
    ]);
    expect(summary.requiredDocuments.map((c) => c.citations)).toEqual([[1]]);
    expect(summary.riskFactors.map((c) => c.citations)).toEqual([[2]]);
    expect(summary.complianceSteps).toHaveLength(3);
    expect(summary.recommendations[0].text).toBe("Verify the requirements with CPSC, FDA before import");
    expect(summary.confidenceScore).toBe(0.3);
    expect(summary.generatedBy).toBe("stub");
  });

  it("recommends contacting agencies when there is no evidence", () => {
    const summary = stubSummary([]);
    expect(summary.citations).toEqual([]);
    expect(summary.complianceSteps).toEqual([]);
    expect(summary.confidenceScore).toBe(0);
    expect(summary.recommendations[0].citations).toEqual([]);
  });
});

describe("LlmSummarizer", () => {
  it("keeps valid citations and drops unsourced claims", async () => {
    const { model, prompts } = scriptedModel(
      JSON.stringify({
        critical_requirements: [
          { text_en: "Register the facility", text_ko: "시설을 등록하십시오", citations: [0, 0, 7] },
          { text_en: "Unsupported claim", citations: [9] },
        ],
        required_documents: [{ text_en: "Ingredient list", citations: [1] }],
        risk_factors: [],
        timeline: { text_en: "About two weeks", citations: [] },
        confidence: 0.8,
      }),
    );
    const summary = await new LlmSummarizer(model, { retry: NO_RETRY }).summarize(documents, {
      classificationCode: "3304.99",
      productName: "Vitamin C Serum",
    });

    expect(summary.criticalRequirements).toEqual([{ text: "Register the facility", textKo: "시설을 등록하십시오", citations: [0] }]);
    expect(summary.requiredDocuments).toEqual([{ text: "Ingredient list", textKo: "Ingredient list", citations: [1] }]);
    expect(summary.timeline).toBeNull();
    expect(summary.citations).toHaveLength(3);
    expect(summary.confidenceScore).toBe(0.8);
    expect(summary.generatedBy).toBe("llm");
    expect(prompts[0]).toContain("HS code: 3304.99");
  });

  it("throws on replies without a summary object", async () => {
    const { model } = scriptedModel("I cannot summarize this.");
    await expect(new LlmSummarizer(model, { retry: NO_RETRY }).summarize(documents)).rejects.toThrow("Summary output was malformed JSON");
  });

  it("returns the stub for an empty document list without calling the model", async () => {
    const { model, prompts } = scriptedModel("{}");
    const summary = await new LlmSummarizer(model).summarize([]);
    expect(summary.generatedBy).toBe("stub");
    expect(prompts).toEqual([]);
  });
});
