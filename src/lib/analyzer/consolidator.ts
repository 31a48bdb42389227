/**
 * Evidence consolidation: identity-key deduplication and per-kind views.
 *
 * @module analyzer/consolidator
 */

import { evidenceKey } from "./normalization";
import type { ConsolidatedRequirementSet, EvidenceItem } from "./types";

/**
 * Keep the first-seen item per identity key. Output order is first-seen
 * order, so consolidating `result.items` again returns the same items.
 */
export function consolidate(rawItems: readonly EvidenceItem[]): ConsolidatedRequirementSet {
  const seen = new Set<string>();
  const items: EvidenceItem[] = [];

  for (const item of rawItems) {
    const key = evidenceKey(item);
    if (seen.has(key)) continue;
    seen.add(key);
    items.push(item);
  }

  const countsByAgency: Record<string, number> = {};
  for (const item of items) {
    countsByAgency[item.agency] = (countsByAgency[item.agency] ?? 0) + 1;
  }

  const duplicatesRemoved = rawItems.length - items.length;
  if (duplicatesRemoved > 0) {
    console.log(`[Consolidator] Removed ${duplicatesRemoved} duplicate evidence items (${items.length} unique)`);
  }

  return {
    items,
    certifications: items.filter((i) => i.kind === "certification"),
    documents: items.filter((i) => i.kind === "document"),
    notices: items.filter((i) => i.kind === "notice"),
    countsByAgency,
    totalCount: items.length,
    duplicatesRemoved,
  };
}

/** Items grouped by agency, first-seen order within each agency. */
export function groupByAgency(items: readonly EvidenceItem[]): Map<string, EvidenceItem[]> {
  const grouped = new Map<string, EvidenceItem[]>();
  for (const item of items) {
    const list = grouped.get(item.agency);
    if (list) list.push(item);
    else grouped.set(item.agency, [item]);
  }
  return grouped;
}
