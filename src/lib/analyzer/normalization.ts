/**
 * Evidence identity normalization.
 *
 * @module analyzer/normalization
 */

import type { EvidenceItem } from "./types";

const TRACKING_PARAMS = ["ref", "source", "fbclid", "gclid"];

/** Lowercase, punctuation to space, whitespace collapsed. */
export function normalizeName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Canonical URL for identity comparison. Unparseable input is lowercased
 * and trimmed.
 */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  if (!trimmed) return "";
  try {
    const parsed = new URL(trimmed);
    for (const param of [...parsed.searchParams.keys()]) {
      if (param.toLowerCase().startsWith("utm_") || TRACKING_PARAMS.includes(param.toLowerCase())) {
        parsed.searchParams.delete(param);
      }
    }
    parsed.hash = "";
    parsed.hostname = parsed.hostname.toLowerCase().replace(/^www\./, "");
    let normalized = parsed.toString().toLowerCase();
    if (normalized.endsWith("/")) normalized = normalized.slice(0, -1);
    return normalized;
  } catch {
    return trimmed.toLowerCase().replace(/\/+$/, "");
  }
}

/** Identity key: (agency, normalized name, normalized url, required). */
export function evidenceKey(item: Pick<EvidenceItem, "agency" | "title" | "sourceUrl" | "required">): string {
  return [item.agency.toUpperCase(), normalizeName(item.title), normalizeUrl(item.sourceUrl), item.required ? "1" : "0"].join("|");
}

/** Lowercased word set, words of 3+ characters. */
export function wordSet(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .replace(/[^\w\s]/g, " ")
      .split(/\s+/)
      .filter((w) => w.length > 2),
  );
}

export function jaccardSimilarity(text1: string, text2: string): number {
  const words1 = wordSet(text1);
  const words2 = wordSet(text2);
  if (words1.size === 0 || words2.size === 0) return 0;
  let intersection = 0;
  for (const w of words1) {
    if (words2.has(w)) intersection++;
  }
  return intersection / (words1.size + words2.size - intersection);
}

export function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, "");
  } catch {
    return null;
  }
}

/** True when `host` is `domain` or a subdomain of it. */
export function hostMatchesDomain(host: string, domain: string): boolean {
  const d = domain.toLowerCase().replace(/^www\./, "");
  return host === d || host.endsWith(`.${d}`);
}
