/**
 * Brave Search API Provider
 *
 * https://brave.com/search/api/
 */

import { z } from "zod";
import { ProviderContractError, ProviderError, errorMessage } from "./errors";
import { timeoutSignal, type WebSearchOptions, type WebSearchResult } from "./web-search";

const BraveSearchResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().optional(),
            url: z.string().optional(),
            description: z.string().optional(),
          }),
        )
        .optional(),
    })
    .optional(),
});

const BRAVE_API_BASE = "https://api.search.brave.com/res/v1/web/search";
const DEFAULT_TIMEOUT_MS = 12_000;

export async function searchBrave(options: WebSearchOptions): Promise<WebSearchResult[]> {
  const apiKey = process.env.BRAVE_API_KEY;
  console.log(`[Search] Brave: Starting search for query: "${options.query.substring(0, 50)}..."`);

  if (!apiKey) {
    console.error("[Search] Brave: ❌ API key not configured");
    return [];
  }

  const params = new URLSearchParams({
    q: options.query,
    count: String(Math.min(options.maxResults, 20)),
  });

  let res: Response;
  try {
    const startTime = Date.now();
    res = await fetch(`${BRAVE_API_BASE}?${params.toString()}`, {
      headers: {
        Accept: "application/json",
        "Accept-Encoding": "gzip",
        "X-Subscription-Token": apiKey,
      },
      signal: timeoutSignal(options.timeoutMs ?? DEFAULT_TIMEOUT_MS, options.signal),
    });
    console.log(`[Search] Brave: Response received in ${Date.now() - startTime}ms - Status: ${res.status}`);
  } catch (error) {
    if (options.signal?.aborted) throw error;
    console.error(`[Search] Brave: ❌ Fetch failed: ${errorMessage(error)}`);
    throw new ProviderError("Brave", undefined, false, `Brave Search request failed: ${errorMessage(error)}`);
  }

  if (!res.ok) {
    const errorBody = await res.text().catch(() => "");
    console.error(`[Search] Brave: ❌ HTTP error: ${res.status} ${errorBody.substring(0, 200)}`);
    const fatal = res.status === 429 || res.status === 403 || errorBody.includes("quota") || errorBody.includes("rate limit");
    throw new ProviderError(
      "Brave",
      res.status,
      fatal,
      `Brave Search API HTTP ${res.status}: ${errorBody.substring(0, 200) || res.statusText}`,
    );
  }

  const parsed = BraveSearchResponseSchema.safeParse(await res.json());
  if (!parsed.success) {
    throw new ProviderContractError("Brave", "Unexpected Brave Search response shape");
  }

  const out: WebSearchResult[] = [];
  for (const r of parsed.data.web?.results ?? []) {
    if (!r.url || !r.title) continue;
    out.push({ url: r.url, title: r.title, snippet: r.description ?? null });
  }

  console.log(`[Search] Brave: ✅ Returning ${Math.min(out.length, options.maxResults)} results`);
  return out.slice(0, options.maxResults);
}
