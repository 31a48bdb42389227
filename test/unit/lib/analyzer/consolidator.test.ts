/**
 * Tests for evidence consolidation.
 */
import { describe, expect, it } from "vitest";
import { consolidate, groupByAgency } from "@/lib/analyzer/consolidator";
import { makeItem } from "@test/helpers/fakes";

const listing = makeItem({ title: "Product listing", sourceUrl: "https://www.fda.gov/listing" });
const listingCopy = makeItem({ title: "Product Listing.", sourceUrl: "https://fda.gov/listing/" });
const notice = makeItem({ kind: "notice", agency: "CPSC", title: "Recall notice", sourceUrl: "https://www.cpsc.gov/recalls/1" });
const document = makeItem({ kind: "document", agency: "CBP", title: "Entry documents", sourceUrl: "https://www.cbp.gov/trade" });

describe("consolidate", () => {
  it("keeps the first item per identity key in first-seen order", () => {
    const result = consolidate([listing, notice, listingCopy, document]);
    expect(result.items).toEqual([listing, notice, document]);
    expect(result.duplicatesRemoved).toBe(1);
    expect(result.totalCount).toBe(3);
    expect(result.certifications).toEqual([listing]);
    expect(result.notices).toEqual([notice]);
    expect(result.documents).toEqual([document]);
    expect(result.countsByAgency).toEqual({ FDA: 1, CPSC: 1, CBP: 1 });
  });

  it("is idempotent", () => {
    const once = consolidate([listing, listingCopy, notice, notice]);
    const twice = consolidate(once.items);
    expect(twice.items).toEqual(once.items);
    expect(twice.duplicatesRemoved).toBe(0);
  });

  it("handles empty input", () => {
    expect(consolidate([])).toMatchObject({ items: [], totalCount: 0, duplicatesRemoved: 0, countsByAgency: {} });
  });
});

describe("groupByAgency", () => {
  it("groups items in first-seen order", () => {
    const grouped = groupByAgency([listing, notice, listingCopy]);
    expect([...grouped.keys()]).toEqual(["FDA", "CPSC"]);
    expect(grouped.get("FDA")).toEqual([listing, listingCopy]);
  });
});
