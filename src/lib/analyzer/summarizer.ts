/**
 * Requirement Summaries
 *
 * Turns the consolidated evidence into a structured, bilingual (English /
 * Korean) compliance summary. Every claim carries citation indices into the
 * summary's citation list, which mirrors the document list one to one.
 *
 * The LLM summarizer only keeps citations that point at a real document; a
 * claim left with no valid citation is dropped rather than shown unsourced.
 * `stubSummary` builds a deterministic summary from the documents alone and
 * is the fallback whenever the oracle is disabled or fails.
 *
 * @module analyzer/summarizer
 */

import type { LanguageModel } from "ai";
import { z } from "zod";
import type { RetryConfig } from "../config-schemas";
import { tryParseFirstJsonObject } from "../json";
import { generateWithRetry } from "../llm";
import type {
  Citation,
  EvidenceItem,
  StructuredSummary,
  SummarizationOracle,
  SummarizeOptions,
  SummaryClaim,
  SummaryDocument,
} from "./types";

const DEFAULT_MAX_DOCUMENTS = 12;
const DEFAULT_MAX_DOCUMENT_CHARS = 800;
const STUB_MAX_CLAIMS = 5;

// ============================================================================
// DOCUMENTS & CITATIONS
// ============================================================================

export function toSummaryDocuments(items: readonly EvidenceItem[]): SummaryDocument[] {
  return items.map((item) => ({
    title: item.title,
    url: item.sourceUrl,
    agency: item.agency,
    kind: item.kind,
    text: item.description,
  }));
}

export function citationsFor(documents: readonly SummaryDocument[]): Citation[] {
  return documents.map((doc, index) => ({ index, title: doc.title, url: doc.url, agency: doc.agency }));
}

// ============================================================================
// STUB
// ============================================================================

const STUB_STEPS: ReadonlyArray<{ text: string; textKo: string }> = [
  { text: "Confirm the classification code with a licensed customs broker", textKo: "관세사와 HS 코드를 확인하십시오" },
  { text: "Collect the listed documents before shipment", textKo: "선적 전에 필요 서류를 준비하십시오" },
  { text: "Complete agency registrations before the goods arrive", textKo: "물품 도착 전에 기관 등록을 완료하십시오" },
];

function claim(text: string, textKo: string, citations: number[]): SummaryClaim {
  return { text, textKo, citations };
}

/** Deterministic summary built from document titles; used when no oracle answers. */
export function stubSummary(documents: readonly SummaryDocument[]): StructuredSummary {
  const indexed = documents.map((doc, index) => ({ doc, index }));
  const certifications = indexed.filter((d) => d.doc.kind === "certification").slice(0, STUB_MAX_CLAIMS);
  const paperwork = indexed.filter((d) => d.doc.kind === "document").slice(0, STUB_MAX_CLAIMS);
  const notices = indexed.filter((d) => d.doc.kind === "notice").slice(0, STUB_MAX_CLAIMS);

  const agencies = [...new Set(documents.map((d) => d.agency))].sort();
  const recommendations =
    documents.length === 0
      ? [claim("No regulatory evidence was found; consult the regulating agencies directly", "규제 근거를 찾지 못했습니다. 관할 기관에 직접 문의하십시오", [])]
      : [
          claim(
            `Verify the requirements with ${agencies.join(", ")} before import`,
            `수입 전에 ${agencies.join(", ")}에 요건을 확인하십시오`,
            [],
          ),
        ];

  return {
    criticalRequirements: certifications.map(({ doc, index }) => claim(doc.title, doc.title, [index])),
    requiredDocuments: paperwork.map(({ doc, index }) => claim(doc.title, doc.title, [index])),
    complianceSteps: documents.length === 0 ? [] : STUB_STEPS.map((s) => claim(s.text, s.textKo, [])),
    riskFactors: notices.map(({ doc, index }) => claim(doc.title, doc.title, [index])),
    recommendations,
    estimatedCosts: null,
    timeline: null,
    citations: citationsFor(documents),
    confidenceScore: documents.length === 0 ? 0 : 0.3,
    generatedBy: "stub",
  };
}

// ============================================================================
// LLM
// ============================================================================

const LlmClaimSchema = z.object({
  text_en: z.string().min(1),
  text_ko: z.string().default(""),
  citations: z.array(z.number().int()).default([]),
});

const LlmSummarySchema = z.object({
  critical_requirements: z.array(LlmClaimSchema).default([]),
  required_documents: z.array(LlmClaimSchema).default([]),
  compliance_steps: z.array(LlmClaimSchema).default([]),
  risk_factors: z.array(LlmClaimSchema).default([]),
  recommendations: z.array(LlmClaimSchema).default([]),
  estimated_costs: LlmClaimSchema.nullable().default(null),
  timeline: LlmClaimSchema.nullable().default(null),
  confidence: z.number().min(0).max(1).default(0.5),
});

type LlmClaim = z.infer<typeof LlmClaimSchema>;

export function buildSummaryPrompt(documents: readonly SummaryDocument[], options: SummarizeOptions, maxChars: number): string {
  const docs = documents
    .map((d, i) => `[${i}] (${d.agency}, ${d.kind}) ${d.title}\n${d.text.slice(0, maxChars)}\nURL: ${d.url}`)
    .join("\n\n");
  return [
    "You summarize U.S. import regulatory requirements for an importer.",
    `HS code: ${options.classificationCode ?? "unknown"}`,
    `Product: ${options.productName ?? "unknown"}`,
    "",
    "DOCUMENTS:",
    docs,
    "",
    "Answer with ONE JSON object with keys critical_requirements, required_documents, compliance_steps,",
    "risk_factors, recommendations (arrays of claims), estimated_costs and timeline (a claim or null), confidence (0-1).",
    'A claim is {"text_en": "...", "text_ko": "...", "citations": [document numbers]}.',
    "Every claim must cite the documents it is based on. Do not state anything the documents do not support.",
  ].join("\n");
}

export interface LlmSummarizerOptions {
  maxDocuments?: number;
  maxDocumentChars?: number;
  temperature?: number;
  retry?: RetryConfig;
}

export class LlmSummarizer implements SummarizationOracle {
  constructor(
    private readonly model: LanguageModel,
    private readonly options: LlmSummarizerOptions = {},
  ) {}

  async summarize(documents: SummaryDocument[], options: SummarizeOptions = {}): Promise<StructuredSummary> {
    const docs = documents.slice(0, this.options.maxDocuments ?? DEFAULT_MAX_DOCUMENTS);
    if (docs.length === 0) return stubSummary(docs);

    const text = await generateWithRetry(
      this.model,
      [{ role: "user", content: buildSummaryPrompt(docs, options, this.options.maxDocumentChars ?? DEFAULT_MAX_DOCUMENT_CHARS) }],
      { temperature: this.options.temperature ?? 0.2, retry: this.options.retry, signal: options.signal },
    );

    const parsed = LlmSummarySchema.safeParse(tryParseFirstJsonObject(text));
    if (!parsed.success) {
      throw new Error(`Summary output was malformed JSON: ${parsed.error.issues[0]?.message ?? "no object found"}`);
    }

    const data = parsed.data;
    const cite = (claims: LlmClaim[]) => claims.map((c) => toClaim(c, docs.length)).filter((c): c is SummaryClaim => c !== null);
    const single = (c: LlmClaim | null) => (c ? toClaim(c, docs.length) : null);

    const summary: StructuredSummary = {
      criticalRequirements: cite(data.critical_requirements),
      requiredDocuments: cite(data.required_documents),
      complianceSteps: cite(data.compliance_steps),
      riskFactors: cite(data.risk_factors),
      recommendations: cite(data.recommendations),
      estimatedCosts: single(data.estimated_costs),
      timeline: single(data.timeline),
      citations: citationsFor(docs),
      confidenceScore: data.confidence,
      generatedBy: "llm",
    };
    console.log(
      `[Summarizer] ✅ Summary for ${options.classificationCode ?? "?"}: ${summary.criticalRequirements.length} critical, ${summary.requiredDocuments.length} documents`,
    );
    return summary;
  }
}

function toClaim(raw: LlmClaim, documentCount: number): SummaryClaim | null {
  const citations = [...new Set(raw.citations.filter((i) => i >= 0 && i < documentCount))];
  if (citations.length === 0) return null;
  return { text: raw.text_en, textKo: raw.text_ko || raw.text_en, citations };
}
