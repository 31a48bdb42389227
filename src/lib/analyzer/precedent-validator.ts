/**
 * Precedent Validation
 *
 * Checks the consolidated requirement set against historical cases for the
 * same classification code and similar products.
 *
 * Flow:
 *   cases (by code + similar text, deduped by id)
 *     → precedent requirements (LLM extractor, keyword heuristic fallback)
 *     → match ours against theirs (TextSimilarity, first match > threshold)
 *     → coverage/similarity score, missing/extra, red flags, verdict
 *
 * An empty corpus is not an error: score 0.5, verdict NO_PRECEDENTS.
 *
 * @module analyzer/precedent-validator
 */

import type { LanguageModel } from "ai";
import { z } from "zod";
import { DEFAULT_PRECEDENT_CONFIG, type PrecedentConfig } from "../config-schemas";
import { errorMessage } from "../errors";
import { tryParseFirstJsonObject } from "../json";
import { generateWithRetry } from "../llm";
import type {
  ConsolidatedRequirementSet,
  MissingRequirement,
  PrecedentCase,
  PrecedentCorpus,
  PrecedentItemKind,
  RedFlag,
  RequirementMatch,
  Severity,
  ValidationResult,
  ValidationVerdict,
} from "./types";

// ============================================================================
// STRATEGIES
// ============================================================================

export interface TextSimilarity {
  readonly name: string;
  similarity(a: string, b: string): number;
}

/** Jaccard over lowercase whitespace-separated words. */
export class WordJaccardSimilarity implements TextSimilarity {
  readonly name = "word-jaccard";

  similarity(a: string, b: string): number {
    const words1 = new Set(a.toLowerCase().split(/\s+/).filter(Boolean));
    const words2 = new Set(b.toLowerCase().split(/\s+/).filter(Boolean));
    if (words1.size === 0 || words2.size === 0) return 0;
    let intersection = 0;
    for (const w of words1) {
      if (words2.has(w)) intersection++;
    }
    return intersection / (words1.size + words2.size - intersection);
  }
}

export interface PrecedentRequirements {
  certifications: string[];
  documents: string[];
  regulations: string[];
}

export interface RequirementExtractor {
  readonly name: string;
  extract(cases: PrecedentCase[], classificationCode: string, productName: string, signal?: AbortSignal): Promise<PrecedentRequirements>;
}

const CERTIFICATION_KEYWORDS = ["registration", "certification", "approval", "license", "permit"];
const DOCUMENT_KEYWORDS = ["document", "report", "certificate", "declaration", "statement"];
const REGULATION_KEYWORDS = ["regulation", "requirement", "standard", "compliance", "labeling"];

export class HeuristicRequirementExtractor implements RequirementExtractor {
  readonly name = "heuristic";

  constructor(
    private readonly maxCases: number = DEFAULT_PRECEDENT_CONFIG.heuristicCases,
    private readonly maxPerKind = 10,
  ) {}

  async extract(cases: PrecedentCase[]): Promise<PrecedentRequirements> {
    const certifications = new Set<string>();
    const documents = new Set<string>();
    const regulations = new Set<string>();

    for (const c of cases.slice(0, this.maxCases)) {
      const text = c.text.toLowerCase();
      for (const kw of CERTIFICATION_KEYWORDS) {
        if (text.includes(kw)) certifications.add(`${c.source || "CBP"} ${kw}`);
      }
      for (const kw of DOCUMENT_KEYWORDS) {
        if (text.includes(kw)) documents.add(`${kw} required`);
      }
      for (const kw of REGULATION_KEYWORDS) {
        if (text.includes(kw)) regulations.add(`${kw} compliance`);
      }
    }

    return {
      certifications: [...certifications].slice(0, this.maxPerKind),
      documents: [...documents].slice(0, this.maxPerKind),
      regulations: [...regulations].slice(0, this.maxPerKind),
    };
  }
}

const ExtractedRequirementsSchema = z.object({
  certifications: z.array(z.string()).default([]),
  documents: z.array(z.string()).default([]),
  regulations: z.array(z.string()).default([]),
});

export class LlmRequirementExtractor implements RequirementExtractor {
  readonly name = "llm";

  constructor(
    private readonly model: LanguageModel,
    private readonly options: { maxCases: number; maxCaseChars: number } = {
      maxCases: DEFAULT_PRECEDENT_CONFIG.oracleCases,
      maxCaseChars: DEFAULT_PRECEDENT_CONFIG.oracleCaseChars,
    },
  ) {}

  async extract(cases: PrecedentCase[], classificationCode: string, productName: string, signal?: AbortSignal): Promise<PrecedentRequirements> {
    const caseTexts = cases
      .slice(0, this.options.maxCases)
      .map((c, i) => `Case ${i + 1}: ${c.text.slice(0, this.options.maxCaseChars)}`)
      .join("\n\n");

    const prompt = [
      `Extract the import requirements for HS code ${classificationCode} (${productName}) stated in these customs rulings.`,
      "",
      caseTexts,
      "",
      'Return JSON: {"certifications": [...], "documents": [...], "regulations": [...]}.',
      "Only include requirements the rulings state explicitly.",
    ].join("\n");

    const text = await generateWithRetry(this.model, [{ role: "user", content: prompt }], { temperature: 0.1, signal });
    const parsed = ExtractedRequirementsSchema.safeParse(tryParseFirstJsonObject(text));
    if (!parsed.success) {
      throw new Error("Precedent requirement extraction returned malformed JSON");
    }
    return parsed.data;
  }
}

// ============================================================================
// SEVERITY / VERDICT
// ============================================================================

const HIGH_SEVERITY_TERMS = ["prohibited", "banned", "illegal", "violation", "penalty"];
const MEDIUM_SEVERITY_TERMS = ["required", "mandatory", "must", "certification", "approval"];

export function assessSeverity(requirement: string): Severity {
  const lower = requirement.toLowerCase();
  if (HIGH_SEVERITY_TERMS.some((t) => lower.includes(t))) return "high";
  if (MEDIUM_SEVERITY_TERMS.some((t) => lower.includes(t))) return "medium";
  return "low";
}

export function verdictFor(score: number, redFlags: readonly RedFlag[], config: PrecedentConfig = DEFAULT_PRECEDENT_CONFIG): ValidationVerdict {
  const highFlags = redFlags.filter((f) => f.severity === "high").length;
  if (score >= config.reliableThreshold && highFlags === 0) return "RELIABLE";
  if (score >= config.reviewThreshold) return "NEEDS_REVIEW";
  return "UNRELIABLE";
}

export function neutralValidation(config: PrecedentConfig = DEFAULT_PRECEDENT_CONFIG): ValidationResult {
  return {
    score: config.neutralScore,
    verdict: "NO_PRECEDENTS",
    casesAnalyzed: 0,
    matched: [],
    missing: [],
    extra: [],
    redFlags: [],
    coverage: 0,
    averageSimilarity: 0,
    source: "none",
  };
}

// ============================================================================
// VALIDATOR
// ============================================================================

export interface PrecedentValidatorOptions {
  config?: PrecedentConfig;
  extractor?: RequirementExtractor | null;
  similarity?: TextSimilarity;
}

export class PrecedentValidator {
  private readonly config: PrecedentConfig;
  private readonly extractor: RequirementExtractor | null;
  private readonly heuristic: HeuristicRequirementExtractor;
  private readonly similarity: TextSimilarity;

  constructor(options: PrecedentValidatorOptions = {}) {
    this.config = options.config ?? DEFAULT_PRECEDENT_CONFIG;
    this.extractor = options.extractor ?? null;
    this.heuristic = new HeuristicRequirementExtractor(this.config.heuristicCases);
    this.similarity = options.similarity ?? new WordJaccardSimilarity();
  }

  /** Result used when no precedent evidence is available. */
  neutral(): ValidationResult {
    return neutralValidation(this.config);
  }

  async validate(
    classificationCode: string,
    requirements: ConsolidatedRequirementSet,
    corpus: PrecedentCorpus,
    productName = "",
    signal?: AbortSignal,
  ): Promise<ValidationResult> {
    const cases = await this.findCases(classificationCode, productName, corpus);
    if (cases.length === 0) {
      console.log(`[Precedent-Validator] No precedents for ${classificationCode}, neutral score ${this.config.neutralScore}`);
      return neutralValidation(this.config);
    }

    const precedent = await this.extractRequirements(cases, classificationCode, productName, signal);
    const ours = {
      certifications: requirements.certifications.map((i) => i.title),
      documents: requirements.documents.map((i) => i.title),
    };

    const matched = [
      ...this.match(ours.certifications, precedent.certifications, "certification"),
      ...this.match(ours.documents, precedent.documents, "document"),
    ];

    const precedentTotal = precedent.certifications.length + precedent.documents.length;
    const coverage = precedentTotal === 0 ? this.config.neutralScore : matched.length / precedentTotal;
    const averageSimilarity = matched.length > 0 ? matched.reduce((s, m) => s + m.similarity, 0) / matched.length : 0;
    // Precedents without certifications or documents give nothing to compare against.
    const score =
      precedentTotal === 0
        ? this.config.neutralScore
        : Math.min(1, this.config.coverageWeight * coverage + this.config.similarityWeight * averageSimilarity);

    const missing = this.findMissing(precedent, matched);
    const extra = this.findExtra(ours, matched);
    const redFlags: RedFlag[] = [
      ...missing.map((m) => ({
        type: "missing_requirement" as const,
        severity: m.severity,
        description: `Precedents mention "${m.text}" but the analysis did not find it`,
      })),
      ...extra.slice(0, 2).map((e) => ({
        type: "extra_requirement" as const,
        severity: "low" as const,
        description: `Requirement not seen in precedents: "${e}"`,
      })),
    ];
    const verdict = verdictFor(score, redFlags, this.config);

    console.log(
      `[Precedent-Validator] ${classificationCode}: ${cases.length} cases, ${matched.length} matched, score ${score.toFixed(2)} → ${verdict}`,
    );

    return {
      score,
      verdict,
      casesAnalyzed: cases.length,
      matched,
      missing,
      extra,
      redFlags,
      coverage,
      averageSimilarity,
      source: "corpus",
    };
  }

  private async findCases(classificationCode: string, productName: string, corpus: PrecedentCorpus): Promise<PrecedentCase[]> {
    const byCode = classificationCode ? await corpus.searchByCode(classificationCode, this.config.byCodeLimit) : [];
    const similar = await corpus.searchSimilar(`${productName} ${classificationCode}`.trim(), this.config.similarLimit);

    const seen = new Set<string>();
    const cases: PrecedentCase[] = [];
    for (const c of [...byCode, ...similar]) {
      if (seen.has(c.id)) continue;
      seen.add(c.id);
      cases.push(c);
    }
    return cases;
  }

  private async extractRequirements(
    cases: PrecedentCase[],
    classificationCode: string,
    productName: string,
    signal?: AbortSignal,
  ): Promise<PrecedentRequirements> {
    if (this.extractor) {
      try {
        return await this.extractor.extract(cases, classificationCode, productName, signal);
      } catch (err) {
        console.warn(`[Precedent-Validator] ${this.extractor.name} extraction failed, using keyword heuristic: ${errorMessage(err)}`);
      }
    }
    return this.heuristic.extract(cases);
  }

  private match(ours: string[], theirs: string[], kind: PrecedentItemKind): RequirementMatch[] {
    const matches: RequirementMatch[] = [];
    const taken = new Set<number>();
    for (const our of ours) {
      for (let i = 0; i < theirs.length; i++) {
        if (taken.has(i)) continue;
        const similarity = this.similarity.similarity(our, theirs[i]);
        if (similarity > this.config.matchThreshold) {
          taken.add(i);
          matches.push({ ours: our, precedent: theirs[i], kind, similarity });
          break;
        }
      }
    }
    return matches;
  }

  private findMissing(precedent: PrecedentRequirements, matched: RequirementMatch[]): MissingRequirement[] {
    const matchedTheirs = new Set(matched.map((m) => m.precedent));
    const all: Array<{ text: string; kind: PrecedentItemKind }> = [
      ...precedent.certifications.map((text) => ({ text, kind: "certification" as const })),
      ...precedent.documents.map((text) => ({ text, kind: "document" as const })),
      ...precedent.regulations.map((text) => ({ text, kind: "regulation" as const })),
    ];
    return all
      .filter((r) => !matchedTheirs.has(r.text))
      .slice(0, this.config.maxMissing)
      .map((r) => ({ ...r, severity: assessSeverity(r.text) }));
  }

  private findExtra(ours: { certifications: string[]; documents: string[] }, matched: RequirementMatch[]): string[] {
    const matchedOurs = new Set(matched.map((m) => m.ours));
    return [...ours.certifications, ...ours.documents].filter((r) => r && !matchedOurs.has(r)).slice(0, this.config.maxExtra);
  }
}
