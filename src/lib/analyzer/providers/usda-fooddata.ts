/**
 * USDA FoodData Central provider.
 *
 * Needs USDA_API_KEY; without it the provider reports zero results.
 *
 * @module analyzer/providers/usda-fooddata
 */

import { z } from "zod";
import { ProviderContractError, ProviderError, errorMessage } from "../../errors";
import type { StructuredProvidersConfig } from "../../config-schemas";
import { timeoutSignal } from "../../web-search";
import type { EvidenceItem } from "../types";
import { toIsoDate, type EvidenceProvider, type EvidenceQuery } from "./evidence-provider";

const PROVIDER = "USDA FoodData";

const FoodSearchResponseSchema = z.object({
  foods: z
    .array(
      z.object({
        fdcId: z.number(),
        description: z.string(),
        dataType: z.string().optional(),
        brandOwner: z.string().optional(),
        publishedDate: z.string().optional(),
      }),
    )
    .default([]),
});

let missingKeyReported = false;

export class UsdaFoodDataProvider implements EvidenceProvider {
  readonly name = PROVIDER;
  readonly kind = "structured" as const;

  constructor(
    private readonly config: StructuredProvidersConfig["usdaFoodData"],
    private readonly timeoutMs: number,
  ) {}

  supports(agency: string): boolean {
    return this.config.enabled && agency === "USDA";
  }

  async fetch(query: EvidenceQuery): Promise<EvidenceItem[]> {
    const apiKey = process.env.USDA_API_KEY;
    if (!apiKey) {
      if (!missingKeyReported) {
        console.warn("[USDA-FoodData] USDA_API_KEY not set, provider returns no results");
        missingKeyReported = true;
      }
      return [];
    }
    if (!query.query.trim()) return [];

    const baseUrl = this.config.baseUrl.replace(/\/+$/, "");
    const params = new URLSearchParams({
      api_key: apiKey,
      query: query.query,
      pageSize: String(this.config.maxResults),
    });

    let res: Response;
    try {
      res = await fetch(`${baseUrl}/foods/search?${params.toString()}`, {
        signal: timeoutSignal(this.timeoutMs, query.signal),
      });
    } catch (err) {
      if (query.signal?.aborted) throw err;
      throw new ProviderError(PROVIDER, undefined, false, `FoodData Central request failed: ${errorMessage(err)}`);
    }

    if (res.status === 404) return [];
    if (!res.ok) {
      throw new ProviderError(PROVIDER, res.status, res.status === 429 || res.status === 403, `FoodData Central HTTP ${res.status}`);
    }

    const parsed = FoodSearchResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ProviderContractError(PROVIDER, "Unexpected FoodData Central search payload");
    }

    const retrievedAt = new Date().toISOString();
    return parsed.data.foods.map((food) => ({
      kind: "document" as const,
      agency: "USDA",
      title: `USDA FoodData record: ${food.description}`,
      description: [food.dataType, food.brandOwner].filter(Boolean).join(", ") || food.description,
      sourceUrl: `${baseUrl}/food/${food.fdcId}`,
      required: false,
      rawPayload: food,
      provenance: { provider: PROVIDER, query: query.query, strategy: query.strategy, retrievedAt },
      effectiveDate: toIsoDate(food.publishedDate),
      jurisdiction: "federal" as const,
    }));
  }
}
