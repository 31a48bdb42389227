/**
 * Keyword Extraction
 *
 * Derives a short ranked list of search terms from a product name and
 * description. Strategies are tried in order and the first non-empty result
 * wins:
 *   1. LLM extractor (JSON array of short English keywords)
 *   2. Embedding-ranked extractor (candidates ranked by similarity to the text)
 *   3. Deterministic heuristic
 *
 * @module analyzer/keyword-extractor
 */

import { cosineSimilarity, embedMany, type EmbeddingModel, type LanguageModel } from "ai";
import { z } from "zod";
import stopWordList from "../../data/stop-words.json";
import { errorMessage } from "../errors";
import { tryParseFirstJsonArray } from "../json";
import { generateWithRetry } from "../llm";
import type { RetryConfig } from "../config-schemas";

export const DEFAULT_MAX_KEYWORDS = 3;
const MAX_KEYWORD_CHARS = 32;
const MIN_TOKEN_LENGTH = 3;

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

/** Hangul product terms that map onto English search terms when no ASCII token survives. */
const HANGUL_FALLBACKS: ReadonlyArray<{ terms: string[]; keywords: string[] }> = [
  { terms: ["세럼", "화장품"], keywords: ["cosmetic", "serum"] },
];

export interface KeywordExtractor {
  readonly name: string;
  extract(productName: string, description: string, maxKeywords: number, signal?: AbortSignal): Promise<string[]>;
}

// ============================================================================
// HEURISTIC
// ============================================================================

/**
 * ASCII alphanumeric tokens, lowercased, stop-words and short tokens removed.
 * Order of first appearance, duplicates kept (frequency matters to ranking).
 */
export function tokenizeForKeywords(text: string): string[] {
  const asciiText = Array.from(text)
    .map((ch) => (ch.charCodeAt(0) < 128 && /[A-Za-z0-9\s]/.test(ch) ? ch : " "))
    .join("");
  return asciiText
    .toLowerCase()
    .split(/\s+/)
    .filter((t) => t.length >= MIN_TOKEN_LENGTH && !STOP_WORDS.has(t));
}

/**
 * Rank by frequency, then length (longer is more specific), then first
 * appearance.
 */
export function rankTokens(tokens: string[]): string[] {
  const stats = new Map<string, { count: number; firstIndex: number }>();
  tokens.forEach((token, index) => {
    const existing = stats.get(token);
    if (existing) existing.count++;
    else stats.set(token, { count: 1, firstIndex: index });
  });

  return [...stats.entries()]
    .sort(([a, sa], [b, sb]) => sb.count - sa.count || b.length - a.length || sa.firstIndex - sb.firstIndex)
    .map(([token]) => token);
}

export class HeuristicKeywordExtractor implements KeywordExtractor {
  readonly name = "heuristic";

  async extract(productName: string, description: string, maxKeywords: number): Promise<string[]> {
    return this.rank(productName, description, maxKeywords);
  }

  rank(productName: string, description: string, maxKeywords: number): string[] {
    const text = `${productName} ${description}`.trim();
    const ranked = rankTokens(tokenizeForKeywords(text));
    if (ranked.length > 0) return ranked.slice(0, maxKeywords);

    for (const fallback of HANGUL_FALLBACKS) {
      if (fallback.terms.some((term) => text.includes(term))) {
        return fallback.keywords.slice(0, maxKeywords);
      }
    }
    return [];
  }
}

// ============================================================================
// EMBEDDING-RANKED
// ============================================================================

export class EmbeddingKeywordExtractor implements KeywordExtractor {
  readonly name = "embedding";

  constructor(private readonly model: EmbeddingModel<string>) {}

  async extract(productName: string, description: string, maxKeywords: number, signal?: AbortSignal): Promise<string[]> {
    const text = `${productName} ${description}`.trim();
    const candidates = rankTokens(tokenizeForKeywords(text)).slice(0, 20);
    if (candidates.length <= maxKeywords) return candidates;

    const { embeddings } = await embedMany({
      model: this.model,
      values: [text, ...candidates],
      abortSignal: signal,
    });
    const [textEmbedding, ...candidateEmbeddings] = embeddings;
    if (!textEmbedding || candidateEmbeddings.length !== candidates.length) return [];

    return candidates
      .map((candidate, i) => ({ candidate, score: cosineSimilarity(textEmbedding, candidateEmbeddings[i]) }))
      .sort((a, b) => b.score - a.score || b.candidate.length - a.candidate.length)
      .slice(0, maxKeywords)
      .map((r) => r.candidate);
  }
}

// ============================================================================
// LLM
// ============================================================================

const KeywordArraySchema = z.array(z.union([z.string(), z.number()]).transform(String));

export function buildKeywordPrompt(productName: string, description: string, maxKeywords: number): string {
  return [
    "You are a domain keyword extractor for trade and import compliance.",
    `Return ONLY a JSON array of up to ${maxKeywords} short English keywords, most specific first.`,
    "TEXT:",
    `${productName}\n${description}`.trim(),
  ].join("\n");
}

export function cleanKeywords(raw: string[], maxKeywords: number): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const kw of raw) {
    const cleaned = kw.trim().toLowerCase().slice(0, MAX_KEYWORD_CHARS).trim();
    if (!cleaned || seen.has(cleaned)) continue;
    seen.add(cleaned);
    out.push(cleaned);
    if (out.length >= maxKeywords) break;
  }
  return out;
}

export class LlmKeywordExtractor implements KeywordExtractor {
  readonly name = "llm";

  constructor(
    private readonly model: LanguageModel,
    private readonly options: { temperature?: number; retry?: RetryConfig } = {},
  ) {}

  async extract(productName: string, description: string, maxKeywords: number, signal?: AbortSignal): Promise<string[]> {
    const text = await generateWithRetry(
      this.model,
      [
        { role: "system", content: "Extract core keywords for regulatory search." },
        { role: "user", content: buildKeywordPrompt(productName, description, maxKeywords) },
      ],
      { temperature: this.options.temperature ?? 0.2, retry: this.options.retry, signal },
    );

    const parsed = KeywordArraySchema.safeParse(tryParseFirstJsonArray(text));
    if (!parsed.success) {
      console.warn(`[Keyword-Extractor] LLM returned no keyword array: "${text.substring(0, 80)}"`);
      return [];
    }
    return cleanKeywords(parsed.data, maxKeywords);
  }
}

// ============================================================================
// CHAIN
// ============================================================================

export interface KeywordExtractionResult {
  keywords: string[];
  strategy: string;
  failures: Array<{ strategy: string; error: string }>;
}

export class ChainedKeywordExtractor {
  constructor(
    private readonly strategies: KeywordExtractor[],
    private readonly maxKeywords: number = DEFAULT_MAX_KEYWORDS,
  ) {}

  get strategyNames(): string[] {
    return this.strategies.map((s) => s.name);
  }

  async extract(productName: string, description: string, signal?: AbortSignal): Promise<KeywordExtractionResult> {
    const failures: KeywordExtractionResult["failures"] = [];

    for (const strategy of this.strategies) {
      try {
        const keywords = await strategy.extract(productName, description, this.maxKeywords, signal);
        if (keywords.length > 0) {
          return { keywords: keywords.slice(0, this.maxKeywords), strategy: strategy.name, failures };
        }
      } catch (err) {
        console.warn(`[Keyword-Extractor] ${strategy.name} strategy failed: ${errorMessage(err)}`);
        failures.push({ strategy: strategy.name, error: errorMessage(err) });
      }
    }

    return { keywords: [], strategy: "none", failures };
  }
}

/**
 * Escalating prefixes used as successive broadening search strategies:
 * [k1], [k1, k2], [k1, k2, k3].
 */
export function keywordStrategies(keywords: string[], maxDepth: number = DEFAULT_MAX_KEYWORDS): string[][] {
  const out: string[][] = [];
  for (let i = 1; i <= Math.min(keywords.length, maxDepth); i++) {
    out.push(keywords.slice(0, i));
  }
  return out;
}
