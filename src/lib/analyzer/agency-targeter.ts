/**
 * Agency Targeting
 *
 * Maps a classification code (plus product keywords) to the regulatory
 * agencies whose requirements should be gathered.
 *
 * Resolution order:
 *   1. static rule table keyed by the 4-digit prefix        → source "rule"
 *   2. learned mapping (cache; optionally proposed by LLM)   → source "learned"
 *   3. chapter-level (2-digit) category band                 → source "inferred"
 *
 * The primary agency list is never empty.
 *
 * @module analyzer/agency-targeter
 */

import { z } from "zod";
import type { LanguageModel } from "ai";
import agencyRulesJson from "../../data/agency-rules.json";
import agencyDomainsJson from "../../data/agency-domains.json";
import type { TieredCache } from "../cache/tiered-cache";
import { errorMessage } from "../errors";
import { tryParseFirstJsonObject } from "../json";
import { generateWithRetry } from "../llm";
import type { AgencyTarget, TargetSource } from "./types";

// ============================================================================
// CONFIGURATION DATA
// ============================================================================

export const RULE_CONFIDENCE = 0.9;
export const INFERRED_CONFIDENCE = 0.4;

const AgencyRuleTableSchema = z.object({
  defaultAgencies: z.array(z.string()).min(1),
  secondaryAgencies: z.array(z.string()),
  rules: z.array(z.object({ prefix: z.string().regex(/^\d{4}$/), agencies: z.array(z.string()).min(1), category: z.string() })),
  chapterBands: z.array(z.object({ category: z.string(), chapters: z.array(z.string()), agencies: z.array(z.string()).min(1) })),
  generalBand: z.object({ category: z.string(), agencies: z.array(z.string()).min(1) }),
});

export type AgencyRuleTable = z.infer<typeof AgencyRuleTableSchema>;

const AgencyDirectorySchema = z.record(z.object({ name: z.string(), domains: z.array(z.string()).min(1) }));

export type AgencyDirectory = z.infer<typeof AgencyDirectorySchema>;

export const DEFAULT_AGENCY_RULES: AgencyRuleTable = AgencyRuleTableSchema.parse(agencyRulesJson);
export const DEFAULT_AGENCY_DIRECTORY: AgencyDirectory = AgencyDirectorySchema.parse(agencyDomainsJson);

export const LearnedAgencyMappingSchema = z.object({
  primaryAgencies: z.array(z.string()).min(1),
  secondaryAgencies: z.array(z.string()),
  confidence: z.number().min(0).max(1),
  category: z.string(),
  searchKeywords: z.array(z.string()).default([]),
  keyRequirements: z.array(z.string()).default([]),
  origin: z.enum(["llm", "manual"]),
  learnedAt: z.string(),
});

export type LearnedAgencyMapping = z.infer<typeof LearnedAgencyMappingSchema>;

// ============================================================================
// CODE NORMALIZATION
// ============================================================================

/** Digits of the code, at most four ("3304.99.50" → "3304"). */
export function normalizeCodePrefix(code: string): string {
  return code.replace(/\D/g, "").slice(0, 4);
}

export function chapterOf(code: string): string {
  return code.replace(/\D/g, "").slice(0, 2);
}

function productSlug(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9가-힣]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 80);
}

export function learnedMappingKey(prefix: string, productText: string): string {
  return `agency-mapping:${prefix}:${productSlug(productText)}`;
}

// ============================================================================
// LLM MAPPER
// ============================================================================

export interface AgencyMappingOracle {
  propose(
    classificationCode: string,
    productText: string,
    keywords: string[],
    signal?: AbortSignal,
  ): Promise<LearnedAgencyMapping | null>;
}

const LlmMappingSchema = z.object({
  product_category: z.string().default("General"),
  primary_agencies: z.array(z.string()),
  secondary_agencies: z.array(z.string()).default([]),
  search_keywords: z.array(z.string()).default([]),
  key_requirements: z.array(z.string()).default([]),
  confidence_score: z.number().min(0).max(1),
});

export class LlmAgencyMapper implements AgencyMappingOracle {
  private readonly knownAgencies: Set<string>;

  constructor(
    private readonly model: LanguageModel,
    directory: AgencyDirectory = DEFAULT_AGENCY_DIRECTORY,
  ) {
    this.knownAgencies = new Set(Object.keys(directory));
  }

  async propose(
    classificationCode: string,
    productText: string,
    keywords: string[],
    signal?: AbortSignal,
  ): Promise<LearnedAgencyMapping | null> {
    const agencies = [...this.knownAgencies].join(", ");
    const prompt = [
      "You map import products to the U.S. regulatory agencies that regulate them.",
      `Allowed agencies: ${agencies}.`,
      `HS code: ${classificationCode}`,
      `Product: ${productText}`,
      `Keywords: ${keywords.join(", ")}`,
      "Answer with one JSON object with keys: product_category, primary_agencies, secondary_agencies,",
      "search_keywords, key_requirements, confidence_score (0-1).",
    ].join("\n");

    const text = await generateWithRetry(this.model, [{ role: "user", content: prompt }], { signal });
    const parsed = LlmMappingSchema.safeParse(tryParseFirstJsonObject(text));
    if (!parsed.success) {
      console.warn(`[Agency-Targeter] LLM mapping for ${classificationCode} was not valid JSON`);
      return null;
    }

    const primary = this.filterKnown(parsed.data.primary_agencies);
    if (primary.length === 0) return null;

    return {
      primaryAgencies: primary,
      secondaryAgencies: this.filterKnown(parsed.data.secondary_agencies).filter((a) => !primary.includes(a)),
      confidence: parsed.data.confidence_score,
      category: parsed.data.product_category,
      searchKeywords: parsed.data.search_keywords,
      keyRequirements: parsed.data.key_requirements,
      origin: "llm",
      learnedAt: new Date().toISOString(),
    };
  }

  private filterKnown(agencies: string[]): string[] {
    const out: string[] = [];
    for (const agency of agencies) {
      const upper = agency.trim().toUpperCase();
      if (this.knownAgencies.has(upper) && !out.includes(upper)) out.push(upper);
    }
    return out;
  }
}

// ============================================================================
// TARGETER
// ============================================================================

export interface AgencyUsageStat {
  codePrefix: string;
  source: TargetSource;
  count: number;
  lastUsedAt: string;
}

export interface AgencyTargeterOptions {
  cache: TieredCache;
  learnedTtlSec: number;
  rules?: AgencyRuleTable;
  oracle?: AgencyMappingOracle | null;
}

export class AgencyTargeter {
  private readonly cache: TieredCache;
  private readonly learnedTtlSec: number;
  private readonly rules: AgencyRuleTable;
  private readonly oracle: AgencyMappingOracle | null;
  private readonly ruleIndex: Map<string, AgencyRuleTable["rules"][number]>;
  private readonly usage = new Map<string, AgencyUsageStat>();

  constructor(options: AgencyTargeterOptions) {
    this.cache = options.cache;
    this.learnedTtlSec = options.learnedTtlSec;
    this.rules = options.rules ?? DEFAULT_AGENCY_RULES;
    this.oracle = options.oracle ?? null;
    this.ruleIndex = new Map(this.rules.rules.map((r) => [r.prefix, r]));
  }

  async target(
    classificationCode: string,
    keywords: string[],
    productText: string = keywords.join(" "),
    signal?: AbortSignal,
  ): Promise<AgencyTarget> {
    const prefix = normalizeCodePrefix(classificationCode);

    const rule = this.ruleIndex.get(prefix);
    if (rule) {
      return this.finish({
        primaryAgencies: [...rule.agencies],
        secondaryAgencies: this.secondaryFor(rule.agencies),
        confidence: RULE_CONFIDENCE,
        source: "rule",
        category: rule.category,
        codePrefix: prefix,
      });
    }

    const learned = await this.lookupLearned(classificationCode, prefix, productText, keywords, signal);
    if (learned) {
      return this.finish({
        primaryAgencies: learned.primaryAgencies,
        secondaryAgencies: learned.secondaryAgencies.length > 0 ? learned.secondaryAgencies : this.secondaryFor(learned.primaryAgencies),
        confidence: learned.confidence,
        source: "learned",
        category: learned.category,
        codePrefix: prefix,
      });
    }

    return this.finish(this.infer(classificationCode, prefix));
  }

  /** Chapter-band inference; exposed for callers that need a target without I/O. */
  infer(classificationCode: string, prefix: string = normalizeCodePrefix(classificationCode)): AgencyTarget {
    const chapter = chapterOf(classificationCode);
    const band = this.rules.chapterBands.find((b) => b.chapters.includes(chapter)) ?? this.rules.generalBand;
    return {
      primaryAgencies: [...band.agencies],
      secondaryAgencies: this.secondaryFor(band.agencies),
      confidence: INFERRED_CONFIDENCE,
      source: "inferred",
      category: band.category,
      codePrefix: prefix,
    };
  }

  /** Store a mapping so later lookups for the same prefix and product resolve as "learned". */
  async learnMapping(classificationCode: string, productText: string, mapping: LearnedAgencyMapping): Promise<void> {
    const prefix = normalizeCodePrefix(classificationCode);
    const validated = LearnedAgencyMappingSchema.parse(mapping);
    await this.cache.set(learnedMappingKey(prefix, productText), validated, this.learnedTtlSec, {
      kind: "agency-mapping",
      origin: validated.origin,
    });
    console.log(`[Agency-Targeter] Learned mapping ${prefix} → ${validated.primaryAgencies.join(", ")} (${validated.origin})`);
  }

  getUsageStats(): AgencyUsageStat[] {
    return [...this.usage.values()].sort((a, b) => b.count - a.count || a.codePrefix.localeCompare(b.codePrefix));
  }

  private async lookupLearned(
    classificationCode: string,
    prefix: string,
    productText: string,
    keywords: string[],
    signal?: AbortSignal,
  ): Promise<LearnedAgencyMapping | null> {
    const key = learnedMappingKey(prefix, productText);
    const cached = await this.cache.getParsed(key, LearnedAgencyMappingSchema);
    if (cached) return cached;
    if (!this.oracle) return null;

    try {
      const proposed = await this.oracle.propose(classificationCode, productText, keywords, signal);
      if (!proposed) return null;
      await this.learnMapping(classificationCode, productText, proposed);
      return proposed;
    } catch (err) {
      console.warn(`[Agency-Targeter] Mapping oracle failed for ${classificationCode}: ${errorMessage(err)}`);
      return null;
    }
  }

  private secondaryFor(primary: string[]): string[] {
    return this.rules.secondaryAgencies.filter((a) => !primary.includes(a));
  }

  private finish(target: AgencyTarget): AgencyTarget {
    const primary = target.primaryAgencies.length > 0 ? target.primaryAgencies : [...this.rules.defaultAgencies];
    const key = `${target.codePrefix}:${target.source}`;
    const stat = this.usage.get(key);
    const now = new Date().toISOString();
    if (stat) {
      stat.count++;
      stat.lastUsedAt = now;
    } else {
      this.usage.set(key, { codePrefix: target.codePrefix, source: target.source, count: 1, lastUsedAt: now });
    }
    return { ...target, primaryAgencies: primary };
  }
}
