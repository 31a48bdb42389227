/**
 * Requirements Service
 *
 * Public entry point of the analyzer:
 *
 *   analyzeRequirements(request)   full analysis (cached per code + product)
 *   getCacheStatus(code, name)     cache state of one analysis
 *   refreshAnalysis(code, name, d) invalidate and re-run
 *   getStatistics()                cache, stage, agency, controller, provider stats
 *
 * `createRequirementsService(config, overrides)` builds every collaborator
 * once and injects it; tests replace any of them through `overrides`.
 *
 * The service never rejects: invalid requests and unexpected errors come
 * back as a result with status "failed".
 *
 * @module requirements-service
 */

import { ZodError } from "zod";
import { AnalysisResultCache, analysisCacheKey, type AnalysisCacheStatus } from "./cache/analysis-cache";
import type { CacheMetrics, PersistentCacheStore, RemoteCacheStore } from "./cache/cache-types";
import { HttpRemoteCacheStore } from "./cache/remote-cache-store";
import { SqliteCacheStore } from "./cache/sqlite-cache-store";
import { TieredCache } from "./cache/tiered-cache";
import { ConcurrencyController, type ControllerMetrics } from "./concurrency/task-runner";
import { DEFAULT_ANALYZER_CONFIG, type AnalyzerConfig } from "./config-schemas";
import { errorMessage } from "./errors";
import { getEmbeddingModel, getModel } from "./llm";
import { ProviderCircuitBreaker, type ProviderStats } from "./provider-circuit-breaker";
import {
  AgencyTargeter,
  DEFAULT_AGENCY_DIRECTORY,
  LlmAgencyMapper,
  type AgencyMappingOracle,
  type AgencyUsageStat,
} from "./analyzer/agency-targeter";
import { HttpCodeRecommender } from "./analyzer/code-recommender";
import { ConfidenceScorer } from "./analyzer/confidence-scorer";
import { ConflictDetector } from "./analyzer/conflict-detector";
import { EvidenceGatherer } from "./analyzer/evidence-gatherer";
import {
  ChainedKeywordExtractor,
  EmbeddingKeywordExtractor,
  HeuristicKeywordExtractor,
  LlmKeywordExtractor,
  type KeywordExtractor,
} from "./analyzer/keyword-extractor";
import { RequirementsPipeline, type StageCounts } from "./analyzer/pipeline";
import { HttpPrecedentCorpus, InMemoryPrecedentCorpus } from "./analyzer/precedent-corpus";
import { LlmRequirementExtractor, PrecedentValidator, neutralValidation, type RequirementExtractor } from "./analyzer/precedent-validator";
import type { EvidenceProvider } from "./analyzer/providers/evidence-provider";
import { OpenFdaProvider } from "./analyzer/providers/openfda";
import { SearchScrapeProvider } from "./analyzer/providers/search-scrape";
import { UsdaFoodDataProvider } from "./analyzer/providers/usda-fooddata";
import { LlmSummarizer } from "./analyzer/summarizer";
import {
  AnalysisRequestSchema,
  type AnalysisRequest,
  type AnalysisRequestInput,
  type CodeRecommender,
  type PipelineStage,
  type PrecedentCorpus,
  type RequirementsAnalysisResult,
  type SummarizationOracle,
} from "./analyzer/types";

// ============================================================================
// TYPES
// ============================================================================

export interface AnalyzeOptions {
  signal?: AbortSignal;
}

export interface ServiceStatistics {
  requests: { total: number; fromCache: number; coalesced: number; failed: number; partial: number };
  cache: CacheMetrics;
  stages: Array<{ stage: PipelineStage } & StageCounts>;
  agencyUsage: AgencyUsageStat[];
  controller: ControllerMetrics;
  providers: ProviderStats[];
}

export interface RequirementsServiceDependencies {
  config: AnalyzerConfig;
  cache: TieredCache;
  pipeline: RequirementsPipeline;
  targeter: AgencyTargeter;
  controller: ConcurrencyController;
  breaker: ProviderCircuitBreaker;
  recommender?: CodeRecommender | null;
  now?: () => number;
}

// ============================================================================
// SERVICE
// ============================================================================

export class RequirementsService {
  private readonly config: AnalyzerConfig;
  private readonly cache: TieredCache;
  private readonly analysisCache: AnalysisResultCache;
  private readonly pipeline: RequirementsPipeline;
  private readonly targeter: AgencyTargeter;
  private readonly controller: ConcurrencyController;
  private readonly breaker: ProviderCircuitBreaker;
  private readonly recommender: CodeRecommender | null;
  private readonly now: () => number;
  private readonly inFlight = new Map<string, Promise<RequirementsAnalysisResult>>();
  private readonly counters = { total: 0, fromCache: 0, coalesced: 0, failed: 0, partial: 0 };

  constructor(deps: RequirementsServiceDependencies) {
    this.config = deps.config;
    this.cache = deps.cache;
    this.pipeline = deps.pipeline;
    this.targeter = deps.targeter;
    this.controller = deps.controller;
    this.breaker = deps.breaker;
    this.recommender = deps.recommender ?? null;
    this.now = deps.now ?? Date.now;
    this.analysisCache = new AnalysisResultCache(this.cache, this.config.cache.ttl.analysisSec, this.now);
  }

  async analyzeRequirements(input: AnalysisRequestInput, options: AnalyzeOptions = {}): Promise<RequirementsAnalysisResult> {
    this.counters.total++;
    const parsed = AnalysisRequestSchema.safeParse(input);
    if (!parsed.success) {
      const message = `Invalid request: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`;
      console.warn(`[Requirements-Service] ${message}`);
      return this.count(this.rejected(input, message));
    }
    const request = parsed.data;

    const key = analysisCacheKey(request.classificationCode, request.productName);
    const existing = this.config.pipeline.coalesceInFlight ? this.inFlight.get(key) : undefined;
    if (existing) {
      this.counters.coalesced++;
      console.log(`[Requirements-Service] Joining in-flight analysis for ${request.classificationCode || "(no code)"}`);
      return existing;
    }

    const run = this.analyze(request, options.signal)
      .catch((err: unknown) => this.rejected(request, `Analysis failed: ${errorMessage(err)}`, err))
      .then((result) => this.count(result))
      .finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, run);
    return run;
  }

  async getCacheStatus(classificationCode: string, productName: string): Promise<AnalysisCacheStatus> {
    return this.analysisCache.status(classificationCode, productName);
  }

  async refreshAnalysis(classificationCode: string, productName: string, productDescription = ""): Promise<RequirementsAnalysisResult> {
    const removed = await this.analysisCache.invalidate(classificationCode, productName);
    console.log(`[Requirements-Service] Refresh ${classificationCode} "${productName.substring(0, 50)}" (cache entry ${removed ? "removed" : "absent"})`);
    return this.analyzeRequirements({ classificationCode, productName, productDescription, forceRefresh: true });
  }

  /** Drop every cached analysis under one classification code. */
  async invalidateCode(classificationCode: string): Promise<number> {
    return this.analysisCache.invalidateCode(classificationCode);
  }

  getStatistics(): ServiceStatistics {
    return {
      requests: { ...this.counters },
      cache: this.cache.getMetrics(),
      stages: this.pipeline.getStageStats(),
      agencyUsage: this.targeter.getUsageStats(),
      controller: this.controller.getMetrics(),
      providers: this.breaker.getAllStats(),
    };
  }

  async close(): Promise<void> {
    await this.cache.close();
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private async analyze(request: AnalysisRequest, signal?: AbortSignal): Promise<RequirementsAnalysisResult> {
    let classificationCode = request.classificationCode;
    let codeMappingConfidence = 1;
    const extraWarnings: string[] = [];

    if (!classificationCode) {
      const recommended = await this.recommendCode(request.productName, request.productDescription);
      if (recommended) {
        classificationCode = recommended.code;
        codeMappingConfidence = recommended.confidence;
        extraWarnings.push(`Classification code ${recommended.code} was recommended (confidence ${recommended.confidence.toFixed(2)})`);
      } else {
        codeMappingConfidence = 0;
        extraWarnings.push("No classification code given and none could be recommended");
      }
    }

    const resolved = { ...request, classificationCode };

    if (!resolved.forceRefresh && !resolved.isNewProduct) {
      const cached = await this.readCache(resolved.classificationCode, resolved.productName);
      if (cached) {
        this.counters.fromCache++;
        return { ...cached, metadata: { ...cached.metadata, fromCache: true } };
      }
    }

    const result = await this.pipeline.run(resolved, { codeMappingConfidence, signal });
    const withWarnings = extraWarnings.length > 0 ? { ...result, warnings: [...extraWarnings, ...result.warnings] } : result;

    if (withWarnings.status !== "failed" && !withWarnings.metadata.evidenceTruncated) {
      try {
        await this.analysisCache.save(withWarnings);
      } catch (err) {
        console.warn(`[Requirements-Service] Could not cache analysis for ${classificationCode}: ${errorMessage(err)}`);
      }
    }
    return withWarnings;
  }

  private async recommendCode(productName: string, description: string): Promise<{ code: string; confidence: number } | null> {
    if (!this.recommender) return null;
    try {
      return await this.recommender.recommend(productName, description);
    } catch (err) {
      console.warn(`[Requirements-Service] Code recommender failed: ${errorMessage(err)}`);
      return null;
    }
  }

  private async readCache(classificationCode: string, productName: string): Promise<RequirementsAnalysisResult | null> {
    try {
      return await this.analysisCache.get(classificationCode, productName);
    } catch (err) {
      console.warn(`[Requirements-Service] Cache read failed, analyzing fresh: ${errorMessage(err)}`);
      return null;
    }
  }

  private count(result: RequirementsAnalysisResult): RequirementsAnalysisResult {
    if (result.status === "failed") this.counters.failed++;
    else if (result.status === "partial") this.counters.partial++;
    return result;
  }

  private rejected(input: unknown, message: string, cause?: unknown): RequirementsAnalysisResult {
    const fields = typeof input === "object" && input !== null ? input : {};
    const field = (name: string) => {
      const value: unknown = name in fields ? Reflect.get(fields, name) : undefined;
      return typeof value === "string" ? value : "";
    };
    if (cause !== undefined && !(cause instanceof ZodError)) {
      console.error(`[Requirements-Service] ❌ ${message}`, cause);
    }

    const now = this.now();
    return {
      status: "failed",
      classificationCode: field("classificationCode"),
      productName: field("productName"),
      keywords: [],
      recommendedAgencies: { primary: [], secondary: [], confidence: 0, source: "inferred", category: "General" },
      certifications: [],
      documents: [],
      notices: [],
      summary: null,
      confidence: new ConfidenceScorer(this.config.confidence).minimum(message),
      validation: neutralValidation(this.config.precedent),
      conflicts: [],
      conflictScore: 1,
      conflictRecommendations: [],
      warnings: [message],
      errorSummary: {
        totalErrors: 1,
        byCategory: { [cause instanceof ZodError || cause === undefined ? "validation" : "unknown"]: 1 },
        bySeverity: { high: 1 },
        byRecovery: { fail: 1 },
        byStage: { pipeline: 1 },
        lastError: {
          stage: null,
          message,
          category: cause instanceof ZodError || cause === undefined ? "validation" : "unknown",
          severity: "high",
          timestamp: new Date(now).toISOString(),
        },
      },
      stages: [],
      metadata: {
        processingTimeMs: 0,
        analyzedAt: new Date(now).toISOString(),
        fromCache: false,
        evidenceTruncated: false,
        rawEvidenceCount: 0,
        codeMappingConfidence: 0,
        isNewProduct: false,
      },
    };
  }
}

// ============================================================================
// FACTORY
// ============================================================================

export interface ServiceOverrides {
  persistentStore?: PersistentCacheStore | null;
  remoteStore?: RemoteCacheStore | null;
  providers?: EvidenceProvider[];
  corpus?: PrecedentCorpus;
  recommender?: CodeRecommender | null;
  summarizer?: SummarizationOracle | null;
  keywordExtractors?: KeywordExtractor[];
  mappingOracle?: AgencyMappingOracle | null;
  requirementExtractor?: RequirementExtractor | null;
  now?: () => number;
}

function pick<T>(override: T | undefined, build: () => T): T {
  return override === undefined ? build() : override;
}

/**
 * Wire every collaborator from config. LLM-backed strategies are only built
 * when `llm.enabled`; without them the heuristic paths run.
 */
export function createRequirementsService(
  config: AnalyzerConfig = DEFAULT_ANALYZER_CONFIG,
  overrides: ServiceOverrides = {},
): RequirementsService {
  const now = overrides.now ?? Date.now;
  const llm = config.llm.enabled ? getModel(config.llm) : null;
  const retry = { ...config.concurrency.retry, maxRetries: config.llm.maxRetries };

  const cache = new TieredCache({
    memoryCapacity: config.cache.memoryCapacity,
    defaultTtlSec: config.cache.defaultTtlSec,
    persistent: pick(overrides.persistentStore, () => (config.cache.persistentEnabled ? new SqliteCacheStore(config.cache.dbPath) : null)),
    remote: pick(overrides.remoteStore, () =>
      config.cache.remoteEnabled && config.cache.remoteBaseUrl
        ? new HttpRemoteCacheStore(config.cache.remoteBaseUrl, config.cache.remoteTimeoutMs)
        : null,
    ),
    now,
  });

  const controller = new ConcurrencyController(config.concurrency);
  const breaker = new ProviderCircuitBreaker(config.circuitBreaker, now);

  const keywordExtractors = pick(overrides.keywordExtractors, () => {
    const strategies: KeywordExtractor[] = [];
    if (llm) strategies.push(new LlmKeywordExtractor(llm.model, { temperature: config.llm.temperature, retry }));
    if (config.llm.embeddingsEnabled) strategies.push(new EmbeddingKeywordExtractor(getEmbeddingModel(config.llm)));
    strategies.push(new HeuristicKeywordExtractor());
    return strategies;
  });

  const targeter = new AgencyTargeter({
    cache,
    learnedTtlSec: config.cache.ttl.agencyMappingSec,
    oracle: pick(overrides.mappingOracle, () => (llm ? new LlmAgencyMapper(llm.model, DEFAULT_AGENCY_DIRECTORY) : null)),
  });

  const providers = pick(overrides.providers, () => {
    const list: EvidenceProvider[] = [
      new OpenFdaProvider(config.structuredProviders.openFda, config.structuredProviders.timeoutMs),
      new UsdaFoodDataProvider(config.structuredProviders.usdaFoodData, config.structuredProviders.timeoutMs),
    ];
    if (config.search.enabled) list.push(new SearchScrapeProvider(config.search, DEFAULT_AGENCY_DIRECTORY));
    return list;
  });

  const gatherer = new EvidenceGatherer({
    cache,
    controller,
    breaker,
    providers,
    ttl: config.cache.ttl,
    retries: config.concurrency.retry.maxRetries,
  });

  const corpus = pick(overrides.corpus, () =>
    config.pipeline.precedentServiceUrl ? new HttpPrecedentCorpus(config.pipeline.precedentServiceUrl) : new InMemoryPrecedentCorpus(),
  );

  const validator = new PrecedentValidator({
    config: config.precedent,
    extractor: pick(overrides.requirementExtractor, () =>
      llm
        ? new LlmRequirementExtractor(llm.model, { maxCases: config.precedent.oracleCases, maxCaseChars: config.precedent.oracleCaseChars })
        : null,
    ),
  });

  const summarizer = pick(overrides.summarizer, () => (llm ? new LlmSummarizer(llm.model, { temperature: config.llm.temperature, retry }) : null));

  const pipeline = new RequirementsPipeline({
    keywordExtractor: new ChainedKeywordExtractor(keywordExtractors, config.pipeline.maxKeywords),
    targeter,
    gatherer,
    conflictDetector: new ConflictDetector({ config: config.conflicts }),
    validator,
    corpus,
    scorer: new ConfidenceScorer(config.confidence, now),
    summarizer,
    settings: config.pipeline,
    now,
  });

  const recommender = pick(overrides.recommender, () =>
    config.pipeline.recommenderUrl ? new HttpCodeRecommender(config.pipeline.recommenderUrl) : null,
  );

  console.log(
    `[Requirements-Service] Ready: ${providers.map((p) => p.name).join(", ")}; keywords via ${keywordExtractors.map((k) => k.name).join(" → ")}` +
      (llm ? `; LLM ${llm.provider}/${llm.modelName}` : "; LLM disabled"),
  );

  return new RequirementsService({ config, cache, pipeline, targeter, controller, breaker, recommender, now });
}
