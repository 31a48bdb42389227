/**
 * Confidence Scoring
 *
 * Five weighted factors over the consolidated evidence:
 *
 *   source quality   official API host 1.0, official .gov page 0.8, other 0.5
 *   completeness     requirement and source counts against their targets
 *   agency match     share of target agencies that appear among sources
 *   recency          share of dated requirements inside the recency window
 *   consistency      dominance of the most common agency, scaled
 *
 * final = clamp(raw × (base + (1 − base) × codeMappingConfidence)), 2 decimals.
 *
 * @module analyzer/confidence-scorer
 */

import { DEFAULT_CONFIDENCE_CONFIG, type ConfidenceConfig } from "../config-schemas";
import { hostOf, normalizeUrl } from "./normalization";
import type { ConfidenceBreakdown, ConfidenceLevel, ConfidenceResult, EvidenceItem } from "./types";

const YEAR_MS = 365 * 24 * 60 * 60 * 1000;

export interface ConfidenceSource {
  url: string;
  agency: string;
}

type Factor = keyof ConfidenceBreakdown;

const FACTORS: readonly Factor[] = ["sourceQuality", "dataCompleteness", "agencyMatch", "recency", "consistency"];

const FACTOR_MESSAGES: Record<Factor, { threshold: number; text: string }> = {
  sourceQuality: { threshold: 0.8, text: "High-quality official sources used" },
  dataCompleteness: { threshold: 0.7, text: "Sufficient data collected" },
  agencyMatch: { threshold: 0.7, text: "Target agencies matched precisely" },
  recency: { threshold: 0.7, text: "Up-to-date regulatory information" },
  consistency: { threshold: 0.8, text: "High consistency across sources" },
};

const WARNING_MESSAGES: Record<Factor, { threshold: number; text: string }> = {
  sourceQuality: { threshold: 0.5, text: "Low source quality: additional verification needed" },
  dataCompleteness: { threshold: 0.4, text: "Insufficient data: expert consultation recommended" },
  agencyMatch: { threshold: 0.5, text: "Agency match uncertain: further research needed" },
  recency: { threshold: 0.5, text: "Some information may be outdated: check current regulations" },
  consistency: { threshold: 0.5, text: "Sources disagree: review carefully" },
};

const DEFAULT_FACTOR = "Basic analysis completed";

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** Distinct (normalized URL) sources of the given evidence, first seen wins. */
export function sourcesOf(items: readonly EvidenceItem[]): ConfidenceSource[] {
  const seen = new Set<string>();
  const sources: ConfidenceSource[] = [];
  for (const item of items) {
    const key = normalizeUrl(item.sourceUrl);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    sources.push({ url: item.sourceUrl, agency: item.agency });
  }
  return sources;
}

export function levelFor(score: number, bands: ConfidenceConfig["bands"] = DEFAULT_CONFIDENCE_CONFIG.bands): ConfidenceLevel {
  if (score >= bands.high) return "HIGH";
  if (score >= bands.mediumHigh) return "MEDIUM_HIGH";
  if (score >= bands.medium) return "MEDIUM";
  if (score >= bands.mediumLow) return "MEDIUM_LOW";
  return "LOW";
}

export class ConfidenceScorer {
  constructor(
    private readonly config: ConfidenceConfig = DEFAULT_CONFIDENCE_CONFIG,
    private readonly now: () => number = Date.now,
  ) {}

  score(
    sources: readonly ConfidenceSource[],
    requirements: readonly EvidenceItem[],
    targetAgencies: readonly string[],
    codeMappingConfidence: number,
  ): ConfidenceResult {
    const breakdown: ConfidenceBreakdown = {
      sourceQuality: this.sourceQuality(sources),
      dataCompleteness: this.dataCompleteness(requirements.length, sources.length),
      agencyMatch: this.agencyMatch(sources, targetAgencies),
      recency: this.recency(requirements),
      consistency: this.consistency(requirements),
    };

    const { weights } = this.config;
    const raw =
      weights.sourceQuality * breakdown.sourceQuality +
      weights.dataCompleteness * breakdown.dataCompleteness +
      weights.agencyMatch * breakdown.agencyMatch +
      weights.recency * breakdown.recency +
      weights.consistency * breakdown.consistency;

    const base = this.config.codeConfidenceBase;
    const score = round2(clamp01(raw * (base + (1 - base) * clamp01(codeMappingConfidence))));

    const factors = FACTORS
      .filter((f) => breakdown[f] >= FACTOR_MESSAGES[f].threshold)
      .map((f) => FACTOR_MESSAGES[f].text);
    const warnings = FACTORS
      .filter((f) => breakdown[f] < WARNING_MESSAGES[f].threshold)
      .map((f) => WARNING_MESSAGES[f].text);

    return {
      score,
      level: levelFor(score, this.config.bands),
      rawScore: round2(raw),
      breakdown: {
        sourceQuality: round2(breakdown.sourceQuality),
        dataCompleteness: round2(breakdown.dataCompleteness),
        agencyMatch: round2(breakdown.agencyMatch),
        recency: round2(breakdown.recency),
        consistency: round2(breakdown.consistency),
      },
      factors: factors.length > 0 ? factors : [DEFAULT_FACTOR],
      warnings,
    };
  }

  /** Result used when scoring itself could not run. */
  minimum(reason: string): ConfidenceResult {
    return {
      score: 0,
      level: "LOW",
      rawScore: 0,
      breakdown: { sourceQuality: 0, dataCompleteness: 0, agencyMatch: 0, recency: 0, consistency: 0 },
      factors: [DEFAULT_FACTOR],
      warnings: [reason],
    };
  }

  // ==========================================================================
  // FACTORS
  // ==========================================================================

  private sourceQuality(sources: readonly ConfidenceSource[]): number {
    if (sources.length === 0) return 0;
    const apiHosts = this.config.officialApiHosts.map((h) => h.toLowerCase());
    const total = sources.reduce((sum, source) => {
      const host = hostOf(source.url) ?? "";
      if (apiHosts.includes(host)) return sum + this.config.officialApiScore;
      if (host === "gov" || host.endsWith(".gov")) return sum + this.config.officialDomainScore;
      return sum + this.config.otherSourceScore;
    }, 0);
    return total / sources.length;
  }

  private dataCompleteness(requirementCount: number, sourceCount: number): number {
    const req = Math.min(1, requirementCount / this.config.requirementTarget) * 0.5;
    const src = Math.min(1, sourceCount / this.config.sourceTarget) * 0.5;
    return Math.min(1, req + src);
  }

  private agencyMatch(sources: readonly ConfidenceSource[], targetAgencies: readonly string[]): number {
    const targets = new Set(targetAgencies.map((a) => a.toUpperCase()).filter(Boolean));
    if (targets.size === 0 || sources.length === 0) return 0;
    const sourceAgencies = new Set(sources.map((s) => s.agency.toUpperCase()));
    let matched = 0;
    for (const agency of targets) {
      if (sourceAgencies.has(agency)) matched++;
    }
    return matched / targets.size;
  }

  private recency(requirements: readonly EvidenceItem[]): number {
    if (requirements.length === 0) return 0;
    const windowMs = this.config.recencyYears * YEAR_MS;
    const now = this.now();
    let dated = 0;
    let recent = 0;
    for (const req of requirements) {
      if (!req.effectiveDate) continue;
      const time = Date.parse(req.effectiveDate);
      if (Number.isNaN(time)) continue;
      dated++;
      if (now - time < windowMs) recent++;
    }
    return dated === 0 ? 0.5 : recent / dated;
  }

  private consistency(requirements: readonly EvidenceItem[]): number {
    if (requirements.length === 0) return 0;
    if (requirements.length === 1) return 1;
    const counts = new Map<string, number>();
    for (const req of requirements) {
      counts.set(req.agency, (counts.get(req.agency) ?? 0) + 1);
    }
    const mostCommon = Math.max(...counts.values());
    return Math.min(1, (mostCommon / requirements.length) * this.config.consistencyScale);
  }
}
