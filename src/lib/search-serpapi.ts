import { z } from "zod";
import { ProviderContractError, ProviderError, errorMessage } from "./errors";
import { timeoutSignal, type WebSearchOptions, type WebSearchResult } from "./web-search";

const SerpApiResponseSchema = z.object({
  organic_results: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional(),
      }),
    )
    .optional(),
});

const SERPAPI_BASE = "https://serpapi.com/search.json";
const DEFAULT_TIMEOUT_MS = 12_000;

export async function searchSerpApi(options: WebSearchOptions): Promise<WebSearchResult[]> {
  const apiKey = process.env.SERPAPI_API_KEY;
  if (!apiKey) return [];

  const params = new URLSearchParams({
    engine: "google",
    q: options.query,
    num: String(Math.min(options.maxResults, 10)),
    api_key: apiKey,
  });

  let res: Response;
  try {
    res = await fetch(`${SERPAPI_BASE}?${params.toString()}`, {
      signal: timeoutSignal(options.timeoutMs ?? DEFAULT_TIMEOUT_MS, options.signal),
    });
  } catch (error) {
    if (options.signal?.aborted) throw error;
    throw new ProviderError("SerpAPI", undefined, false, `SerpAPI request failed: ${errorMessage(error)}`);
  }

  if (!res.ok) {
    throw new ProviderError("SerpAPI", res.status, res.status === 429 || res.status === 401, `SerpAPI HTTP ${res.status}`);
  }

  const parsed = SerpApiResponseSchema.safeParse(await res.json());
  if (!parsed.success) {
    throw new ProviderContractError("SerpAPI", "Unexpected SerpAPI response shape");
  }

  const out: WebSearchResult[] = [];
  for (const r of parsed.data.organic_results ?? []) {
    if (!r.link || !r.title) continue;
    out.push({ url: r.link, title: r.title, snippet: r.snippet ?? null });
  }
  return out;
}
