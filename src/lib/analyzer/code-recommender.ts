/**
 * HTTP client for the classification-code recommender.
 *
 *   POST {baseUrl}/recommend  { product_name, description }
 *     → { recommended_codes: [{ code, description?, confidence }], confidence?, reasoning? }
 *
 * The highest-confidence candidate wins; an empty candidate list is `null`.
 *
 * @module analyzer/code-recommender
 */

import { z } from "zod";
import { ProviderContractError, ProviderError, errorMessage } from "../errors";
import type { CodeRecommendation, CodeRecommender } from "./types";

const RecommendationResponseSchema = z.object({
  recommended_codes: z.array(
    z.object({
      code: z.string().min(1),
      description: z.string().optional(),
      confidence: z.number().min(0).max(1).default(0.5),
    }),
  ),
  confidence: z.number().optional(),
  reasoning: z.string().optional(),
});

export class HttpCodeRecommender implements CodeRecommender {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly timeoutMs: number = 10_000,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async recommend(productName: string, description: string): Promise<CodeRecommendation | null> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/recommend`, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify({ product_name: productName, description }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ProviderError("code-recommender", undefined, false, `Code recommender request failed: ${errorMessage(err)}`);
    }

    if (!res.ok) {
      throw new ProviderError("code-recommender", res.status, res.status >= 500, `Code recommender HTTP ${res.status}`);
    }

    const parsed = RecommendationResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ProviderContractError("code-recommender", "Malformed code recommendation response");
    }

    const best = [...parsed.data.recommended_codes].sort((a, b) => b.confidence - a.confidence)[0];
    if (!best) return null;
    console.log(`[Code-Recommender] "${productName.substring(0, 50)}" → ${best.code} (${best.confidence.toFixed(2)})`);
    return { code: best.code, confidence: best.confidence };
  }
}
