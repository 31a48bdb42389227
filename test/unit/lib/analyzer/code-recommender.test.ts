/**
 * Tests for the classification-code recommender client (fetch stubbed).
 */
import { afterEach, describe, expect, it, vi } from "vitest";
import { HttpCodeRecommender } from "@/lib/analyzer/code-recommender";
import { ProviderContractError, ProviderError } from "@/lib/errors";
import { jsonResponse } from "@test/helpers/fakes";

describe("HttpCodeRecommender", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the product and returns the most confident code", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({
        recommended_codes: [
          { code: "3304.10", confidence: 0.4 },
          { code: "3304.99", description: "Other beauty preparations", confidence: 0.82 },
        ],
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await new HttpCodeRecommender("http://recommender.test/").recommend("Vitamin C Serum", "facial serum");

    expect(result).toEqual({ code: "3304.99", confidence: 0.82 });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://recommender.test/recommend");
    expect(JSON.parse(String(init.body))).toEqual({ product_name: "Vitamin C Serum", description: "facial serum" });
  });

  it("returns null when nothing is recommended", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ recommended_codes: [] })));
    expect(await new HttpCodeRecommender("http://recommender.test").recommend("Widget", "")).toBeNull();
  });

  it("raises provider errors for failures", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({}, 502)));
    await expect(new HttpCodeRecommender("http://recommender.test").recommend("Widget", "")).rejects.toBeInstanceOf(ProviderError);

    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ codes: [] })));
    await expect(new HttpCodeRecommender("http://recommender.test").recommend("Widget", "")).rejects.toBeInstanceOf(ProviderContractError);
  });
});
