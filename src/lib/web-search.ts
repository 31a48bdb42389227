/**
 * Web search facade over the configured search providers.
 *
 * "auto" queries Brave first (BRAVE_API_KEY) and tops up from SerpAPI
 * (SERPAPI_API_KEY) when Brave returned fewer than maxResults.
 *
 * @module web-search
 */

import { hostMatchesDomain, hostOf } from "./analyzer/normalization";
import type { SearchConfig } from "./config-schemas";

export type WebSearchResult = {
  url: string;
  title: string;
  snippet: string | null;
};

export type WebSearchOptions = {
  query: string;
  maxResults: number;
  domainWhitelist?: string[];
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type SearchProviderName = SearchConfig["provider"];

/** Timeout signal, linked to the caller's signal when there is one. */
export function timeoutSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

export function isSearchConfigured(provider: SearchProviderName = "auto"): boolean {
  if (provider === "brave") return Boolean(process.env.BRAVE_API_KEY);
  if (provider === "serpapi") return Boolean(process.env.SERPAPI_API_KEY);
  return Boolean(process.env.BRAVE_API_KEY || process.env.SERPAPI_API_KEY);
}

export async function searchWeb(options: WebSearchOptions, provider: SearchProviderName = "auto"): Promise<WebSearchResult[]> {
  if (provider === "brave") {
    const { searchBrave } = await import("./search-brave");
    return applyWhitelist(await searchBrave(options), options);
  }
  if (provider === "serpapi") {
    const { searchSerpApi } = await import("./search-serpapi");
    return applyWhitelist(await searchSerpApi(options), options);
  }

  const results: WebSearchResult[] = [];
  if (process.env.BRAVE_API_KEY) {
    const { searchBrave } = await import("./search-brave");
    results.push(...(await searchBrave(options)));
  }
  if (results.length < options.maxResults && process.env.SERPAPI_API_KEY) {
    const { searchSerpApi } = await import("./search-serpapi");
    const more = await searchSerpApi({ ...options, maxResults: options.maxResults - results.length });
    const seen = new Set(results.map((r) => r.url));
    results.push(...more.filter((r) => !seen.has(r.url)));
  }
  return applyWhitelist(results, options);
}

function applyWhitelist(results: WebSearchResult[], options: WebSearchOptions): WebSearchResult[] {
  const whitelist = options.domainWhitelist;
  if (!whitelist || whitelist.length === 0) return results.slice(0, options.maxResults);
  return results
    .filter((r) => {
      const host = hostOf(r.url);
      return host !== null && whitelist.some((domain) => hostMatchesDomain(host, domain));
    })
    .slice(0, options.maxResults);
}

/** `site:` restriction for one or more domains. */
export function siteRestriction(domains: string[]): string {
  if (domains.length === 0) return "";
  if (domains.length === 1) return `site:${domains[0]}`;
  return `(${domains.map((d) => `site:${d}`).join(" OR ")})`;
}
