/**
 * Tests for evidence identity normalization.
 */
import { describe, expect, it } from "vitest";
import {
  evidenceKey,
  hostMatchesDomain,
  hostOf,
  jaccardSimilarity,
  normalizeName,
  normalizeUrl,
} from "@/lib/analyzer/normalization";
import { makeItem } from "@test/helpers/fakes";

describe("normalizeName", () => {
  it("lowercases and replaces punctuation with single spaces", () => {
    expect(normalizeName("  Prior Notice -- Food   Imports! ")).toBe("prior notice food imports");
  });
});

describe("normalizeUrl", () => {
  it("drops tracking parameters, fragments, www and trailing slashes", () => {
    expect(normalizeUrl("https://WWW.FDA.gov/Cosmetics?utm_source=news&id=5#section")).toBe("https://fda.gov/cosmetics?id=5");
    expect(normalizeUrl("https://www.fda.gov/cosmetics/")).toBe("https://fda.gov/cosmetics");
  });

  it("lowercases unparseable input", () => {
    expect(normalizeUrl(" FDA.gov/Page/ ")).toBe("fda.gov/page");
    expect(normalizeUrl("   ")).toBe("");
  });
});

describe("evidenceKey", () => {
  it("treats cosmetic differences as the same item", () => {
    const a = makeItem({ title: "Cosmetic Product Listing", sourceUrl: "https://www.fda.gov/listing/" });
    const b = makeItem({ title: "cosmetic product listing!", sourceUrl: "https://fda.gov/listing", agency: "fda" });
    expect(evidenceKey(a)).toBe(evidenceKey(b));
  });

  it("separates required from optional items", () => {
    expect(evidenceKey(makeItem({ required: true }))).not.toBe(evidenceKey(makeItem({ required: false })));
  });
});

describe("jaccardSimilarity", () => {
  it("compares word sets of three or more characters", () => {
    expect(jaccardSimilarity("registration required for cosmetics", "registration required for food")).toBe(0.6);
    expect(jaccardSimilarity("", "anything")).toBe(0);
  });
});

describe("host helpers", () => {
  it("extracts hosts and matches subdomains", () => {
    expect(hostOf("https://www.accessdata.fda.gov/scripts")).toBe("accessdata.fda.gov");
    expect(hostOf("not a url")).toBeNull();
    expect(hostMatchesDomain("accessdata.fda.gov", "fda.gov")).toBe(true);
    expect(hostMatchesDomain("notfda.gov", "fda.gov")).toBe(false);
  });
});
