/**
 * Evidence Provider contract and shared claim classification.
 *
 * A provider turns one (agency, strategy, query) into zero or more
 * EvidenceItems. Returning [] is a success; transport and HTTP failures
 * throw ProviderError, payload mismatches throw ProviderContractError.
 *
 * @module analyzer/providers/evidence-provider
 */

import type { ClaimKind, EvidenceItem, QueryStrategy } from "../types";

export type ProviderKind = "structured" | "search";

export interface EvidenceQuery {
  agency: string;
  strategy: QueryStrategy;
  /** Query text for this strategy (code, keyword prefix or full text). */
  query: string;
  classificationCode: string;
  productName: string;
  category: string;
  signal?: AbortSignal;
}

export interface EvidenceProvider {
  readonly name: string;
  readonly kind: ProviderKind;
  supports(agency: string): boolean;
  fetch(query: EvidenceQuery): Promise<EvidenceItem[]>;
}

// ============================================================================
// CLAIM CLASSIFICATION
// ============================================================================

const CERTIFICATION_TERMS = ["registration", "register", "certification", "certificate of", "approval", "license", "permit", "listing", "clearance"];
const DOCUMENT_TERMS = ["document", "form ", "invoice", "declaration", "labeling", "label", "report", "record", "manifest"];
const NOTICE_TERMS = ["warning", "alert", "recall", "notice", "prohibited", "banned", "detention", "refused"];

const REQUIRED_PATTERN = /\b(required|must|mandatory|shall|needs? to)\b/i;
const NOT_REQUIRED_PATTERN = /\b(not required|optional|voluntary|exempt)\b/i;

/**
 * Claim kind of a sentence, or null when it carries no requirement signal.
 * Certification terms win over document terms, which win over notices.
 */
export function classifyClaim(text: string): ClaimKind | null {
  const lower = text.toLowerCase();
  if (CERTIFICATION_TERMS.some((t) => lower.includes(t))) return "certification";
  if (DOCUMENT_TERMS.some((t) => lower.includes(t))) return "document";
  if (NOTICE_TERMS.some((t) => lower.includes(t))) return "notice";
  return null;
}

export function isRequiredClaim(text: string): boolean {
  return REQUIRED_PATTERN.test(text) && !NOT_REQUIRED_PATTERN.test(text);
}

/** Split prose into sentences of a useful length. */
export function splitSentences(text: string, minChars = 25, maxChars = 400): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length >= minChars)
    .map((s) => (s.length > maxChars ? `${s.slice(0, maxChars - 1)}…` : s));
}

/** openFDA and FoodData dates (YYYYMMDD or ISO) → ISO date, or null. */
export function toIsoDate(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const compact = /^(\d{4})(\d{2})(\d{2})$/.exec(raw.trim());
  const candidate = compact ? `${compact[1]}-${compact[2]}-${compact[3]}` : raw.trim();
  const time = Date.parse(candidate);
  return Number.isNaN(time) ? null : new Date(time).toISOString().slice(0, 10);
}
