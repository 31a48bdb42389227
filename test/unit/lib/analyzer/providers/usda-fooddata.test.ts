/**
 * Tests for the USDA FoodData Central provider (fetch stubbed).
 */
import { afterEach, describe, expect, it, vi } from "vitest";
import { UsdaFoodDataProvider } from "@/lib/analyzer/providers/usda-fooddata";
import type { EvidenceQuery } from "@/lib/analyzer/providers/evidence-provider";
import { DEFAULT_STRUCTURED_PROVIDERS_CONFIG } from "@/lib/config-schemas";
import { ProviderContractError } from "@/lib/errors";
import { jsonResponse } from "@test/helpers/fakes";

const QUERY: EvidenceQuery = {
  agency: "USDA",
  strategy: "keyword",
  query: "rice wine",
  classificationCode: "2206.00",
  productName: "Rice Wine",
  category: "Food",
};

function provider(): UsdaFoodDataProvider {
  return new UsdaFoodDataProvider(DEFAULT_STRUCTURED_PROVIDERS_CONFIG.usdaFoodData, 5_000);
}

describe("UsdaFoodDataProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
  });

  it("returns no results without an API key", async () => {
    vi.stubEnv("USDA_API_KEY", "");
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    expect(await provider().fetch(QUERY)).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("maps food records to documents", async () => {
    vi.stubEnv("USDA_API_KEY", "test-key");
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({
        foods: [{ fdcId: 123, description: "Rice wine", dataType: "Branded", brandOwner: "Example Brewery", publishedDate: "2024-04-01" }],
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const items = await provider().fetch(QUERY);

    const requested = new URL(String(fetchMock.mock.calls[0][0]));
    expect(requested.pathname).toBe("/fdc/v1/foods/search");
    expect(requested.searchParams.get("query")).toBe("rice wine");
    expect(requested.searchParams.get("api_key")).toBe("test-key");
    expect(items).toEqual([
      expect.objectContaining({
        kind: "document",
        agency: "USDA",
        title: "USDA FoodData record: Rice wine",
        description: "Branded, Example Brewery",
        sourceUrl: "https://api.nal.usda.gov/fdc/v1/food/123",
        effectiveDate: "2024-04-01",
      }),
    ]);
  });

  it("rejects payloads that break the contract", async () => {
    vi.stubEnv("USDA_API_KEY", "test-key");
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ foods: [{ description: "no id" }] })));
    await expect(provider().fetch(QUERY)).rejects.toBeInstanceOf(ProviderContractError);
  });

  it("only serves USDA", () => {
    expect(provider().supports("USDA")).toBe(true);
    expect(provider().supports("FDA")).toBe(false);
  });
});
