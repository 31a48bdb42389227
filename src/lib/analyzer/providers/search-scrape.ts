/**
 * Search-and-scrape provider.
 *
 * Web search restricted to the agency's official domains, then the top
 * pages are fetched and their sentences classified into certification,
 * document and notice claims. When a page cannot be fetched its search
 * snippet stands in for the page text.
 *
 * @module analyzer/providers/search-scrape
 */

import type { SearchConfig } from "../../config-schemas";
import { errorMessage } from "../../errors";
import { extractTextFromUrl, type PageTextFetcher } from "../../retrieval";
import { searchWeb, siteRestriction, type WebSearchOptions, type WebSearchResult } from "../../web-search";
import type { AgencyDirectory } from "../agency-targeter";
import type { EvidenceItem, Jurisdiction } from "../types";
import { classifyClaim, isRequiredClaim, splitSentences, type EvidenceProvider, type EvidenceQuery } from "./evidence-provider";

const PROVIDER = "web-search";
const MAX_CLAIMS_PER_PAGE = 5;
const TITLE_MAX_CHARS = 120;

const STATE_PATTERN = /\b(state law|state requirements?|california|prop(?:osition)? 65)\b/i;
const INTERNATIONAL_PATTERN = /\b(codex|international standards?|iso \d+|european union|eu regulation)\b/i;

export type WebSearchFn = (options: WebSearchOptions, provider: SearchConfig["provider"]) => Promise<WebSearchResult[]>;

export function jurisdictionOf(text: string): Jurisdiction {
  if (STATE_PATTERN.test(text)) return "state";
  if (INTERNATIONAL_PATTERN.test(text)) return "international";
  return "federal";
}

function shorten(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

export class SearchScrapeProvider implements EvidenceProvider {
  readonly name = PROVIDER;
  readonly kind = "search" as const;

  constructor(
    private readonly config: SearchConfig,
    private readonly directory: AgencyDirectory,
    private readonly search: WebSearchFn = searchWeb,
    private readonly fetchPage: PageTextFetcher = extractTextFromUrl,
  ) {}

  supports(agency: string): boolean {
    return this.config.enabled && agency in this.directory;
  }

  async fetch(query: EvidenceQuery): Promise<EvidenceItem[]> {
    const domains = this.directory[query.agency]?.domains ?? [];
    if (domains.length === 0 || !query.query.trim()) return [];

    const searchQuery = `${query.query} import requirements ${siteRestriction(domains)}`.trim();
    const results = await this.search(
      {
        query: searchQuery,
        maxResults: this.config.maxResults,
        domainWhitelist: domains,
        timeoutMs: this.config.timeoutMs,
        signal: query.signal,
      },
      this.config.provider,
    );

    const retrievedAt = new Date().toISOString();
    const items: EvidenceItem[] = [];
    for (const [index, result] of results.entries()) {
      const text = index < this.config.scrapeMaxPages ? await this.pageText(result, query.signal) : result.snippet ?? "";
      items.push(...this.claimsFrom(result, text, query, retrievedAt));
    }

    console.log(`[Search-Scrape] ${query.agency}/${query.strategy}: ${results.length} results → ${items.length} claims`);
    return items;
  }

  private async pageText(result: WebSearchResult, signal?: AbortSignal): Promise<string> {
    try {
      return await this.fetchPage(result.url, {
        timeoutMs: this.config.scrapeTimeoutMs,
        maxChars: this.config.scrapeMaxChars,
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      console.warn(`[Search-Scrape] Page fetch failed for ${result.url}, using snippet: ${errorMessage(err)}`);
      return result.snippet ?? "";
    }
  }

  private claimsFrom(result: WebSearchResult, text: string, query: EvidenceQuery, retrievedAt: string): EvidenceItem[] {
    const claims: EvidenceItem[] = [];
    for (const sentence of splitSentences(text)) {
      const kind = classifyClaim(sentence);
      if (!kind) continue;
      claims.push({
        kind,
        agency: query.agency,
        title: shorten(sentence, TITLE_MAX_CHARS),
        description: sentence,
        sourceUrl: result.url,
        required: isRequiredClaim(sentence),
        rawPayload: { title: result.title, snippet: result.snippet },
        provenance: { provider: PROVIDER, query: query.query, strategy: query.strategy, retrievedAt },
        effectiveDate: null,
        jurisdiction: jurisdictionOf(sentence),
      });
      if (claims.length >= MAX_CLAIMS_PER_PAGE) break;
    }

    if (claims.length === 0) {
      const fallback = `${result.title}. ${result.snippet ?? ""}`.trim();
      const kind = classifyClaim(fallback);
      if (kind) {
        claims.push({
          kind,
          agency: query.agency,
          title: shorten(result.title, TITLE_MAX_CHARS),
          description: result.snippet ?? result.title,
          sourceUrl: result.url,
          required: isRequiredClaim(fallback),
          rawPayload: { title: result.title, snippet: result.snippet },
          provenance: { provider: PROVIDER, query: query.query, strategy: query.strategy, retrievedAt },
          effectiveDate: null,
          jurisdiction: jurisdictionOf(fallback),
        });
      }
    }
    return claims;
  }
}
