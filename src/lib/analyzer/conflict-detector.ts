/**
 * Conflict Detection
 *
 * Cross-checks requirement evidence for contradictions on known regulatory
 * themes (organic status, additives, pesticide residue, safety, labeling):
 *
 * - agency-vs-agency:          overlapping agencies disagree
 * - federal-vs-local:          an agency's federal and state evidence disagree
 * - domestic-vs-international: federal and international evidence disagree
 *
 * A pattern is checked for a pair only when both agencies are listed on the
 * pattern. Both directions are checked and results are keyed by
 * (kind, pattern, sorted agencies), so detection does not depend on the
 * order agencies arrive in.
 *
 * @module analyzer/conflict-detector
 */

import { z } from "zod";
import conflictPatternsJson from "../../data/conflict-patterns.json";
import { DEFAULT_CONFLICT_CONFIG, type ConflictConfig } from "../config-schemas";
import { evidenceKey, normalizeName } from "./normalization";
import { SeveritySchema, type Conflict, type ConflictKind, type EvidenceItem } from "./types";

// ============================================================================
// PATTERN TABLE
// ============================================================================

const ConflictPatternTableSchema = z.object({
  patterns: z.array(
    z.object({
      name: z.string(),
      positive: z.array(z.string()).min(1),
      contradicting: z.array(z.string()).min(1),
      agencies: z.array(z.string()).min(1),
      severity: SeveritySchema,
    }),
  ),
  agencyPairs: z.array(
    z.object({
      agencies: z.tuple([z.string(), z.string()]),
      resolution: z.string(),
    }),
  ),
  federalVsLocalResolution: z.string(),
  domesticVsInternationalResolution: z.string(),
});

export type ConflictPatternTable = z.infer<typeof ConflictPatternTableSchema>;
export type ConflictPattern = ConflictPatternTable["patterns"][number];

export const DEFAULT_CONFLICT_PATTERNS: ConflictPatternTable = ConflictPatternTableSchema.parse(conflictPatternsJson);

// ============================================================================
// KEYWORD MATCHING
// ============================================================================

/** Lowercased matching material for one body of evidence. */
export interface KeywordProfile {
  /** Titles (whole) plus description words. */
  keywords: Set<string>;
  /** Normalized titles and descriptions, space padded. */
  text: string;
}

export interface KeywordMatcher {
  readonly name: string;
  matches(term: string, profile: KeywordProfile): boolean;
}

export function buildProfile(items: readonly EvidenceItem[]): KeywordProfile {
  const keywords = new Set<string>();
  const parts: string[] = [];
  for (const item of items) {
    const title = item.title.toLowerCase().trim();
    if (title) keywords.add(title);
    for (const word of item.description.toLowerCase().split(/\s+/)) {
      if (word) keywords.add(word);
    }
    parts.push(normalizeName(item.title), normalizeName(item.description));
  }
  return { keywords, text: ` ${parts.filter(Boolean).join(" ")} ` };
}

/** Whole-word or whole-phrase match against the normalized text. */
export class PhraseKeywordMatcher implements KeywordMatcher {
  readonly name = "phrase";

  matches(term: string, profile: KeywordProfile): boolean {
    const normalized = normalizeName(term);
    return normalized.length > 0 && profile.text.includes(` ${normalized} `);
  }
}

/**
 * Substring containment in either direction between the term and any
 * keyword. Matches more loosely than the phrase matcher ("safe" matches
 * "safety", "required" matches "not required").
 */
export class BidirectionalSubstringMatcher implements KeywordMatcher {
  readonly name = "bidirectional-substring";

  matches(term: string, profile: KeywordProfile): boolean {
    const t = term.toLowerCase();
    for (const keyword of profile.keywords) {
      if (keyword.length < 3) continue;
      if (keyword.includes(t) || t.includes(keyword)) return true;
    }
    return false;
  }
}

// ============================================================================
// DETECTOR
// ============================================================================

interface SideMatch {
  positive: string;
  contradicting: string;
}

export interface ConflictDetectorOptions {
  patterns?: ConflictPatternTable;
  matcher?: KeywordMatcher;
  config?: ConflictConfig;
}

export class ConflictDetector {
  private readonly table: ConflictPatternTable;
  private readonly matcher: KeywordMatcher;
  private readonly config: ConflictConfig;

  constructor(options: ConflictDetectorOptions = {}) {
    this.table = options.patterns ?? DEFAULT_CONFLICT_PATTERNS;
    this.matcher = options.matcher ?? new PhraseKeywordMatcher();
    this.config = options.config ?? DEFAULT_CONFLICT_CONFIG;
  }

  detect(evidenceByAgency: ReadonlyMap<string, readonly EvidenceItem[]>): Conflict[] {
    const byKey = new Map<string, Conflict>();
    const add = (conflict: Conflict) => {
      const key = `${conflict.kind}|${conflict.pattern}|${conflict.agencies.join(",")}`;
      if (!byKey.has(key)) byKey.set(key, conflict);
    };

    this.detectAgencyPairs(evidenceByAgency).forEach(add);
    for (const agency of [...evidenceByAgency.keys()].sort()) {
      const items = evidenceByAgency.get(agency) ?? [];
      const federal = items.filter((i) => (i.jurisdiction ?? "federal") === "federal");
      const state = items.filter((i) => i.jurisdiction === "state");
      const international = items.filter((i) => i.jurisdiction === "international");
      this.detectJurisdictionSplit(agency, federal, state, "federal-vs-local").forEach(add);
      this.detectJurisdictionSplit(agency, federal, international, "domestic-vs-international").forEach(add);
    }

    const conflicts = [...byKey.values()];
    if (conflicts.length > 0) {
      console.log(
        `[Conflict-Detector] ${conflicts.length} conflicts: ${conflicts.map((c) => `${c.pattern}(${c.agencies.join("/")})`).join(", ")}`,
      );
    }
    return conflicts;
  }

  /** 1 − min(maxPenalty, Σ severity weight) / maxPenalty; 1.0 with no conflicts. */
  validationScore(conflicts: readonly Conflict[]): number {
    const penalty = conflicts.reduce((sum, c) => sum + this.config.severityWeights[c.severity], 0);
    return 1 - Math.min(this.config.maxPenalty, penalty) / this.config.maxPenalty;
  }

  recommendations(conflicts: readonly Conflict[]): string[] {
    const out: string[] = [];
    const kinds = new Set(conflicts.map((c) => c.kind));
    if (kinds.has("agency-vs-agency")) {
      const pairs = [...new Set(conflicts.filter((c) => c.kind === "agency-vs-agency").map((c) => c.agencies.join("/")))];
      out.push(`Resolve overlapping agency requirements (${pairs.join(", ")}) following the stated precedence before filing.`);
    }
    if (kinds.has("federal-vs-local")) {
      out.push(this.table.federalVsLocalResolution);
    }
    if (kinds.has("domestic-vs-international")) {
      out.push(this.table.domesticVsInternationalResolution);
    }
    if (conflicts.some((c) => c.severity === "critical")) {
      out.push("Critical conflicts found: consult a licensed customs broker or regulatory specialist before import.");
    }
    return out;
  }

  private detectAgencyPairs(evidenceByAgency: ReadonlyMap<string, readonly EvidenceItem[]>): Conflict[] {
    const conflicts: Conflict[] = [];
    for (const pair of this.table.agencyPairs) {
      const [a, b] = [...pair.agencies].sort();
      const itemsA = evidenceByAgency.get(a) ?? [];
      const itemsB = evidenceByAgency.get(b) ?? [];
      if (itemsA.length === 0 || itemsB.length === 0) continue;

      const profileA = buildProfile(itemsA);
      const profileB = buildProfile(itemsB);

      for (const pattern of this.table.patterns) {
        if (!pattern.agencies.includes(a) || !pattern.agencies.includes(b)) continue;

        const forward = this.matchSides(pattern, profileA, profileB);
        const backward = forward ? null : this.matchSides(pattern, profileB, profileA);
        const hit = forward ?? backward;
        if (!hit) continue;

        const [posAgency, contraAgency] = forward ? [a, b] : [b, a];
        conflicts.push({
          kind: "agency-vs-agency",
          pattern: pattern.name,
          agencies: [a, b],
          severity: pattern.severity,
          description: `${pattern.name}: ${posAgency} indicates "${hit.positive}" while ${contraAgency} indicates "${hit.contradicting}"`,
          resolution: pair.resolution,
          affectedKeys: this.affectedKeys(pattern, [...itemsA, ...itemsB]),
        });
      }
    }
    return conflicts;
  }

  private detectJurisdictionSplit(
    agency: string,
    federal: readonly EvidenceItem[],
    other: readonly EvidenceItem[],
    kind: Exclude<ConflictKind, "agency-vs-agency">,
  ): Conflict[] {
    if (federal.length === 0 || other.length === 0) return [];
    const federalProfile = buildProfile(federal);
    const otherProfile = buildProfile(other);
    const otherLabel = kind === "federal-vs-local" ? "state" : "international";
    const resolution =
      kind === "federal-vs-local" ? this.table.federalVsLocalResolution : this.table.domesticVsInternationalResolution;

    const conflicts: Conflict[] = [];
    for (const pattern of this.table.patterns) {
      if (!pattern.agencies.includes(agency)) continue;
      const forward = this.matchSides(pattern, federalProfile, otherProfile);
      const backward = forward ? null : this.matchSides(pattern, otherProfile, federalProfile);
      const hit = forward ?? backward;
      if (!hit) continue;

      const [posLabel, contraLabel] = forward ? ["federal", otherLabel] : [otherLabel, "federal"];
      conflicts.push({
        kind,
        pattern: pattern.name,
        agencies: [agency],
        severity: pattern.severity,
        description: `${pattern.name}: ${agency} ${posLabel} evidence indicates "${hit.positive}" while ${contraLabel} evidence indicates "${hit.contradicting}"`,
        resolution,
        affectedKeys: this.affectedKeys(pattern, [...federal, ...other]),
      });
    }
    return conflicts;
  }

  private matchSides(pattern: ConflictPattern, positiveSide: KeywordProfile, contradictingSide: KeywordProfile): SideMatch | null {
    const positive = pattern.positive.find((term) => this.matcher.matches(term, positiveSide));
    if (positive === undefined) return null;
    const contradicting = pattern.contradicting.find((term) => this.matcher.matches(term, contradictingSide));
    if (contradicting === undefined) return null;
    return { positive, contradicting };
  }

  private affectedKeys(pattern: ConflictPattern, items: readonly EvidenceItem[]): string[] {
    const terms = [...pattern.positive, ...pattern.contradicting];
    const keys: string[] = [];
    for (const item of items) {
      const profile = buildProfile([item]);
      if (terms.some((term) => this.matcher.matches(term, profile))) {
        const key = evidenceKey(item);
        if (!keys.includes(key)) keys.push(key);
      }
    }
    return keys;
  }
}
