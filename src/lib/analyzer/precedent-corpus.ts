/**
 * Precedent corpora: an in-process corpus over a loaded case list and an
 * HTTP client for an external precedent service.
 *
 * HTTP endpoints (relative to baseUrl):
 *   GET /precedents/by-code/:code?limit=n → { cases: PrecedentCase[] }
 *   GET /precedents/search?q=text&limit=n → { cases: PrecedentCase[] }
 *
 * @module analyzer/precedent-corpus
 */

import { z } from "zod";
import { ProviderContractError, ProviderError, errorMessage } from "../errors";
import { jaccardSimilarity } from "./normalization";
import { PrecedentCaseSchema, type PrecedentCase, type PrecedentCorpus } from "./types";

const CODE_PREFIX_DIGITS = 4;

function digitsOf(code: string | undefined): string {
  return (code ?? "").replace(/\D/g, "");
}

function commonPrefixLength(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length && a[i] === b[i]) i++;
  return i;
}

export class InMemoryPrecedentCorpus implements PrecedentCorpus {
  private readonly cases: PrecedentCase[];

  constructor(cases: readonly PrecedentCase[] = []) {
    this.cases = cases.map((c) => PrecedentCaseSchema.parse(c));
  }

  get size(): number {
    return this.cases.length;
  }

  /** Cases sharing the code's 4-digit prefix, longest shared prefix first. */
  async searchByCode(code: string, limit: number): Promise<PrecedentCase[]> {
    const query = digitsOf(code);
    if (!query) return [];
    const required = Math.min(CODE_PREFIX_DIGITS, query.length);

    return this.cases
      .map((c, index) => ({ c, index, shared: commonPrefixLength(query, digitsOf(c.classificationCode)) }))
      .filter((r) => r.shared >= required)
      .sort((a, b) => b.shared - a.shared || a.index - b.index)
      .slice(0, limit)
      .map((r) => r.c);
  }

  /** Lexical (word Jaccard) search; similarity is set on returned cases. */
  async searchSimilar(text: string, limit: number): Promise<PrecedentCase[]> {
    return this.cases
      .map((c, index) => ({ c, index, similarity: jaccardSimilarity(text, c.text) }))
      .filter((r) => r.similarity > 0)
      .sort((a, b) => b.similarity - a.similarity || a.index - b.index)
      .slice(0, limit)
      .map((r) => ({ ...r.c, similarity: r.similarity }));
  }
}

const CaseListSchema = z.object({ cases: z.array(PrecedentCaseSchema) });

export class HttpPrecedentCorpus implements PrecedentCorpus {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly timeoutMs: number = 10_000,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async searchByCode(code: string, limit: number): Promise<PrecedentCase[]> {
    return this.getCases(`/precedents/by-code/${encodeURIComponent(code)}?${new URLSearchParams({ limit: String(limit) }).toString()}`);
  }

  async searchSimilar(text: string, limit: number): Promise<PrecedentCase[]> {
    return this.getCases(`/precedents/search?${new URLSearchParams({ q: text, limit: String(limit) }).toString()}`);
  }

  private async getCases(path: string): Promise<PrecedentCase[]> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${path}`, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      throw new ProviderError("precedent-service", undefined, false, `Precedent service request failed: ${errorMessage(err)}`);
    }
    if (res.status === 404) return [];
    if (!res.ok) {
      throw new ProviderError("precedent-service", res.status, res.status >= 500, `Precedent service HTTP ${res.status}`);
    }
    const parsed = CaseListSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ProviderContractError("precedent-service", "Malformed precedent case list");
    }
    return parsed.data.cases;
  }
}
