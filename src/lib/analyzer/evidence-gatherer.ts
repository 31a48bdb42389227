/**
 * Evidence Gathering
 *
 * Fans out (agency × strategy) queries across the evidence providers under
 * the concurrency controller and collects whatever comes back.
 *
 * Per (agency, strategy) pair:
 *   1. cache read at `evidence:{agency}:{strategy}:{code}:{queryHash}`
 *   2. the structured provider registered for the agency, if any
 *   3. search-and-scrape restricted to the agency's domains, when step 2
 *      was unavailable, empty or failed
 *   4. cache write (structured TTL or search TTL, by the provider that answered)
 *
 * Keyword queries widen step by step: the top-2 keyword query for an agency
 * runs only when its top-1 query came back empty, and so on up to top-3.
 *
 * Provider failures never fail the gather: they land in `errors` and the
 * other pairs carry on. A deadline abort returns what was collected with
 * `truncated = true`.
 *
 * @module analyzer/evidence-gatherer
 */

import crypto from "crypto";
import { z } from "zod";
import type { TieredCache } from "../cache/tiered-cache";
import type { CacheConfig } from "../config-schemas";
import type { ConcurrencyController, Task, TaskResult } from "../concurrency/task-runner";
import { isRetriableError } from "../concurrency/task-runner";
import { classifyError, type ErrorCategory } from "../error-classification";
import type { ProviderCircuitBreaker } from "../provider-circuit-breaker";
import { debugLog } from "../debug";
import { keywordStrategies } from "./keyword-extractor";
import type { EvidenceProvider, EvidenceQuery } from "./providers/evidence-provider";
import { EvidenceItemSchema, type AgencyTarget, type AnalysisRequest, type EvidenceItem, type QueryStrategy } from "./types";

const EvidenceListSchema = z.array(EvidenceItemSchema);

const FULLTEXT_MAX_CHARS = 200;

// ============================================================================
// TYPES
// ============================================================================

export interface EvidenceGatherError {
  agency: string;
  strategy: QueryStrategy;
  provider: string;
  category: ErrorCategory;
  status: number | null;
  message: string;
}

export interface GatherStats {
  pairs: number;
  cacheHits: number;
  structuredCalls: number;
  searchCalls: number;
  skippedByCircuit: number;
}

export interface GatherResult {
  items: EvidenceItem[];
  errors: EvidenceGatherError[];
  warnings: string[];
  truncated: boolean;
  stats: GatherStats;
}

export interface PlannedQuery {
  agency: string;
  strategy: QueryStrategy;
  query: string;
  /** Widening step; queries past step 0 run only when the previous step found nothing. */
  step: number;
}

export interface EvidenceGathererOptions {
  cache: TieredCache;
  controller: ConcurrencyController;
  breaker: ProviderCircuitBreaker;
  providers: EvidenceProvider[];
  ttl: CacheConfig["ttl"];
  /** Retry budget per provider call on top of the first attempt. */
  retries: number;
}

interface PairState {
  plan: PlannedQuery;
  cacheKey: string;
  items: EvidenceItem[];
  answeredBy: EvidenceProvider | null;
  failed: boolean;
  resolved: boolean;
  attempted: boolean;
}

// ============================================================================
// QUERY PLANNING
// ============================================================================

/** Digits-only code; codes of 6+ digits also yield their HS 6-digit form. */
export function codeQueries(classificationCode: string): string[] {
  const digits = classificationCode.replace(/\D/g, "");
  if (!digits) return [];
  if (digits.length > 6) return [digits, digits.slice(0, 6)];
  return [digits];
}

/** Queries per agency, most specific strategy first, with the keyword ladder top-1 → top-3. */
export function planQueries(agencies: string[], keywords: string[], request: AnalysisRequest): PlannedQuery[] {
  const ladder = keywordStrategies(keywords);
  const fulltext = `${request.productName} ${request.productDescription}`.trim().slice(0, FULLTEXT_MAX_CHARS).trim();

  const plan: PlannedQuery[] = [];
  for (const agency of agencies) {
    for (const code of codeQueries(request.classificationCode)) {
      plan.push({ agency, strategy: "code", query: code, step: 0 });
    }
    ladder.forEach((prefix, step) => {
      plan.push({ agency, strategy: "keyword", query: prefix.join(" "), step });
    });
    if (fulltext) {
      plan.push({ agency, strategy: "fulltext", query: fulltext, step: 0 });
    }
  }
  return plan;
}

/** A keyword query widens once the previous, narrower step ran and found nothing. */
function needsWidening(pairs: readonly PairState[], pair: PairState): boolean {
  const previous = pairs.find(
    (p) => p.plan.agency === pair.plan.agency && p.plan.strategy === pair.plan.strategy && p.plan.step === pair.plan.step - 1,
  );
  return previous !== undefined && previous.attempted && previous.items.length === 0;
}

export function evidenceCacheKey(agency: string, strategy: QueryStrategy, classificationCode: string, query: string): string {
  const code = classificationCode.replace(/\D/g, "") || "none";
  const queryHash = crypto.createHash("md5").update(query.toLowerCase()).digest("hex").slice(0, 12);
  return `evidence:${agency}:${strategy}:${code}:${queryHash}`;
}

// ============================================================================
// GATHERER
// ============================================================================

export class EvidenceGatherer {
  private readonly cache: TieredCache;
  private readonly controller: ConcurrencyController;
  private readonly breaker: ProviderCircuitBreaker;
  private readonly providers: EvidenceProvider[];
  private readonly ttl: CacheConfig["ttl"];
  private readonly retries: number;

  constructor(options: EvidenceGathererOptions) {
    this.cache = options.cache;
    this.controller = options.controller;
    this.breaker = options.breaker;
    this.providers = options.providers;
    this.ttl = options.ttl;
    this.retries = options.retries;
  }

  async gather(target: AgencyTarget, keywords: string[], request: AnalysisRequest, signal?: AbortSignal): Promise<GatherResult> {
    const agencies = [...new Set([...target.primaryAgencies, ...target.secondaryAgencies])];
    const plan = planQueries(agencies, keywords, request);
    const errors: EvidenceGatherError[] = [];
    const warnings: string[] = [];
    const stats: GatherStats = { pairs: 0, cacheHits: 0, structuredCalls: 0, searchCalls: 0, skippedByCircuit: 0 };

    const pairs: PairState[] = plan.map((p) => ({
      plan: p,
      cacheKey: evidenceCacheKey(p.agency, p.strategy, request.classificationCode, p.query),
      items: [],
      answeredBy: null,
      failed: false,
      resolved: false,
      attempted: false,
    }));

    const lastStep = plan.reduce((max, p) => Math.max(max, p.step), 0);
    let truncated = false;

    for (let step = 0; step <= lastStep && !truncated; step++) {
      const wave = pairs.filter((pair) => pair.plan.step === step && (step === 0 || needsWidening(pairs, pair)));
      if (wave.length === 0) break;
      stats.pairs += wave.length;

      // 1. Cache
      for (const pair of wave) {
        pair.attempted = true;
        const cached = await this.cache.getParsed(pair.cacheKey, EvidenceListSchema);
        if (cached) {
          pair.items = cached;
          pair.resolved = true;
          stats.cacheHits++;
        }
      }

      // 2. Structured providers
      const structuredRound = await this.runRound(wave, "structured", target, request, signal, errors, warnings, stats);

      // 3. Search fallback for pairs still empty or failed
      truncated = structuredRound.cancelled || Boolean(signal?.aborted && wave.some((p) => !p.resolved));
      if (!truncated) {
        const searchRound = await this.runRound(wave, "search", target, request, signal, errors, warnings, stats);
        truncated = searchRound.cancelled;
      }
    }

    // 4. Cache write
    for (const pair of pairs) {
      if (!pair.answeredBy || pair.failed) continue;
      const ttlSec = pair.answeredBy.kind === "structured" ? this.ttl.structuredSec : this.ttl.searchSec;
      await this.cache.set(pair.cacheKey, pair.items, ttlSec, {
        kind: "evidence",
        agency: pair.plan.agency,
        strategy: pair.plan.strategy,
        provider: pair.answeredBy.name,
      });
    }

    if (truncated) {
      warnings.push("Evidence gathering was cut short by the pipeline deadline; results are partial");
    }

    const items = pairs.flatMap((p) => p.items);
    console.log(
      `[Evidence-Gatherer] ${items.length} items from ${plan.length} queries (${stats.cacheHits} cached, ${errors.length} errors${truncated ? ", truncated" : ""})`,
    );
    debugLog("[Evidence-Gatherer] gather complete", { code: request.classificationCode, agencies, stats, errors });

    return { items, errors, warnings, truncated, stats };
  }

  private async runRound(
    pairs: PairState[],
    kind: EvidenceProvider["kind"],
    target: AgencyTarget,
    request: AnalysisRequest,
    signal: AbortSignal | undefined,
    errors: EvidenceGatherError[],
    warnings: string[],
    stats: GatherStats,
  ): Promise<{ cancelled: boolean }> {
    const scheduled: Array<{ pair: PairState; provider: EvidenceProvider }> = [];

    for (const pair of pairs) {
      if (pair.resolved) continue;
      const provider = this.providers.find((p) => p.kind === kind && p.supports(pair.plan.agency));
      if (!provider) continue;
      if (!this.breaker.isAvailable(provider.name)) {
        stats.skippedByCircuit++;
        const warning = `Provider ${provider.name} skipped for ${pair.plan.agency}/${pair.plan.strategy}: circuit open`;
        if (!warnings.includes(warning)) warnings.push(warning);
        continue;
      }
      scheduled.push({ pair, provider });
    }
    if (scheduled.length === 0) return { cancelled: false };

    if (kind === "structured") stats.structuredCalls += scheduled.length;
    else stats.searchCalls += scheduled.length;

    const tasks: Task<EvidenceItem[]>[] = scheduled.map(({ pair, provider }) => ({
      id: `${provider.name}:${pair.plan.agency}:${pair.plan.strategy}:${pair.plan.query.substring(0, 40)}`,
      retries: this.retries,
      shouldRetry: isRetriableError,
      run: (taskSignal) => provider.fetch(this.toQuery(pair.plan, target, request, taskSignal)),
    }));

    const results = await this.controller.runAll(tasks, "parallel", { signal });
    let cancelled = false;

    results.forEach((result, i) => {
      const { pair, provider } = scheduled[i];
      cancelled = this.applyResult(pair, provider, result, errors, warnings) || cancelled;
    });

    return { cancelled };
  }

  /** Returns true when the task was cancelled by the caller's signal. */
  private applyResult(
    pair: PairState,
    provider: EvidenceProvider,
    result: TaskResult<EvidenceItem[]>,
    errors: EvidenceGatherError[],
    warnings: string[],
  ): boolean {
    if (result.success) {
      this.breaker.recordSuccess(provider.name);
      const items = result.value ?? [];
      pair.failed = false;
      if (items.length > 0 || provider.kind === "search") {
        pair.items = items;
        pair.answeredBy = provider;
        pair.resolved = items.length > 0;
      }
      return false;
    }

    if (result.cancelled) {
      this.breaker.releaseProbe(provider.name);
      return true;
    }

    const classified = classifyError(result.cause ?? result.error);
    if (classified.shouldCountAsProviderFailure || result.timedOut) {
      this.breaker.recordFailure(provider.name, result.error);
    } else {
      this.breaker.releaseProbe(provider.name);
    }

    pair.failed = true;
    errors.push({
      agency: pair.plan.agency,
      strategy: pair.plan.strategy,
      provider: provider.name,
      category: classified.category,
      status: classified.status,
      message: result.error ?? classified.message,
    });
    if (classified.category === "parse") {
      warnings.push(`Provider ${provider.name} returned malformed data for ${pair.plan.agency}/${pair.plan.strategy}; items dropped`);
    }
    console.warn(
      `[Evidence-Gatherer] ${provider.name} failed for ${pair.plan.agency}/${pair.plan.strategy} (${classified.category}): ${result.error}`,
    );
    return false;
  }

  private toQuery(plan: PlannedQuery, target: AgencyTarget, request: AnalysisRequest, signal: AbortSignal): EvidenceQuery {
    return {
      agency: plan.agency,
      strategy: plan.strategy,
      query: plan.query,
      classificationCode: request.classificationCode,
      productName: request.productName,
      category: target.category,
      signal,
    };
  }
}
