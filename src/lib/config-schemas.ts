/**
 * Configuration Schemas
 *
 * Zod schemas for validating the analysis pipeline configuration.
 * Every weight, threshold and TTL used by the scorers lives here as a named
 * constant so it can be tuned without code changes.
 *
 * @module config-schemas
 */

import { z } from "zod";

export const SCHEMA_VERSION = "1.0.0" as const;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// ============================================================================
// LLM CONFIG
// ============================================================================

export const LlmConfigSchema = z.object({
  enabled: z.boolean().describe("Use LLM-backed keyword extraction, agency mapping and summaries"),
  provider: z.enum(["openai", "anthropic", "google", "mistral"]),
  model: z.string().min(1).nullable().describe("Model name override; null selects the provider default"),
  embeddingModel: z.string().min(1).describe("OpenAI embedding model used by the embedding-ranked keyword extractor"),
  embeddingsEnabled: z.boolean(),
  temperature: z.number().min(0).max(1),
  maxRetries: z.number().int().min(0).max(5),
});

export type LlmConfig = z.infer<typeof LlmConfigSchema>;

export const DEFAULT_LLM_CONFIG: LlmConfig = {
  enabled: false,
  provider: "openai",
  model: null,
  embeddingModel: "text-embedding-3-small",
  embeddingsEnabled: false,
  temperature: 0.1,
  maxRetries: 1,
};

// ============================================================================
// CACHE CONFIG
// ============================================================================

export const CacheTtlSchema = z.object({
  searchSec: z.number().int().min(1).describe("Live web search results"),
  structuredSec: z.number().int().min(1).describe("Structured agency API responses"),
  agencyMappingSec: z.number().int().min(1).describe("Learned classification-code to agency mappings"),
  analysisSec: z.number().int().min(1).describe("Complete analysis results"),
});

export const CacheConfigSchema = z.object({
  memoryCapacity: z.number().int().min(1).max(100_000),
  defaultTtlSec: z.number().int().min(1),
  persistentEnabled: z.boolean(),
  dbPath: z.string().min(1),
  remoteEnabled: z.boolean(),
  remoteBaseUrl: z.string().url().nullable(),
  remoteTimeoutMs: z.number().int().min(100).max(60_000),
  ttl: CacheTtlSchema,
});

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  memoryCapacity: 1000,
  defaultTtlSec: 3600,
  persistentEnabled: true,
  dbPath: "./requirements-cache.db",
  remoteEnabled: false,
  remoteBaseUrl: null,
  remoteTimeoutMs: 5000,
  ttl: {
    searchSec: 3600,
    structuredSec: 86_400,
    agencyMappingSec: 30 * 86_400,
    analysisSec: 7 * 86_400,
  },
};

// ============================================================================
// CONCURRENCY CONFIG
// ============================================================================

export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).max(10),
  baseDelayMs: z.number().int().min(0).max(60_000),
  backoffFactor: z.number().min(1).max(10),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const ConcurrencyConfigSchema = z.object({
  maxConcurrent: z.number().int().min(1).max(200),
  taskTimeoutMs: z.number().int().min(100).max(600_000),
  batchDelayMs: z.number().int().min(0).max(10_000),
  retry: RetryConfigSchema,
});

export type ConcurrencyConfig = z.infer<typeof ConcurrencyConfigSchema>;

export const DEFAULT_CONCURRENCY_CONFIG: ConcurrencyConfig = {
  maxConcurrent: 20,
  taskTimeoutMs: 30_000,
  batchDelayMs: 100,
  retry: {
    maxRetries: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
  },
};

// ============================================================================
// SEARCH / PROVIDER CONFIG
// ============================================================================

export const SearchConfigSchema = z.object({
  enabled: z.boolean(),
  provider: z.enum(["auto", "brave", "serpapi"]),
  maxResults: z.number().int().min(1).max(20),
  timeoutMs: z.number().int().min(1000).max(60_000),
  scrapeMaxPages: z.number().int().min(0).max(10),
  scrapeTimeoutMs: z.number().int().min(1000).max(60_000),
  scrapeMaxChars: z.number().int().min(500).max(200_000),
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  enabled: true,
  provider: "auto",
  maxResults: 5,
  timeoutMs: 12_000,
  scrapeMaxPages: 3,
  scrapeTimeoutMs: 10_000,
  scrapeMaxChars: 20_000,
};

export const StructuredProvidersConfigSchema = z.object({
  openFda: z.object({
    enabled: z.boolean(),
    baseUrl: z.string().url(),
    maxResults: z.number().int().min(1).max(100),
  }),
  usdaFoodData: z.object({
    enabled: z.boolean(),
    baseUrl: z.string().url(),
    maxResults: z.number().int().min(1).max(100),
  }),
  timeoutMs: z.number().int().min(1000).max(60_000),
});

export type StructuredProvidersConfig = z.infer<typeof StructuredProvidersConfigSchema>;

export const DEFAULT_STRUCTURED_PROVIDERS_CONFIG: StructuredProvidersConfig = {
  openFda: {
    enabled: true,
    baseUrl: "https://api.fda.gov",
    maxResults: 10,
  },
  usdaFoodData: {
    enabled: true,
    baseUrl: "https://api.nal.usda.gov/fdc/v1",
    maxResults: 10,
  },
  timeoutMs: 15_000,
};

export const CircuitBreakerConfigSchema = z.object({
  enabled: z.boolean(),
  failureThreshold: z.number().int().min(1).max(50),
  resetTimeoutSec: z.number().int().min(1).max(3600),
});

export type CircuitBreakerConfig = z.infer<typeof CircuitBreakerConfigSchema>;

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  enabled: true,
  failureThreshold: 3,
  resetTimeoutSec: 300,
};

// ============================================================================
// SCORING CONFIG
// ============================================================================

export const ConfidenceWeightsSchema = z.object({
  sourceQuality: z.number().min(0).max(1),
  dataCompleteness: z.number().min(0).max(1),
  agencyMatch: z.number().min(0).max(1),
  recency: z.number().min(0).max(1),
  consistency: z.number().min(0).max(1),
});

export type ConfidenceWeights = z.infer<typeof ConfidenceWeightsSchema>;

export const ConfidenceConfigSchema = z.object({
  weights: ConfidenceWeightsSchema,
  bands: z.object({
    high: z.number().min(0).max(1),
    mediumHigh: z.number().min(0).max(1),
    medium: z.number().min(0).max(1),
    mediumLow: z.number().min(0).max(1),
  }),
  officialApiHosts: z.array(z.string().min(1)),
  officialApiScore: z.number().min(0).max(1),
  officialDomainScore: z.number().min(0).max(1),
  otherSourceScore: z.number().min(0).max(1),
  requirementTarget: z.number().int().min(1),
  sourceTarget: z.number().int().min(1),
  recencyYears: z.number().min(0.1).max(50),
  consistencyScale: z.number().min(1).max(5),
  codeConfidenceBase: z.number().min(0).max(1).describe("Share of the raw score kept regardless of code-mapping confidence"),
});

export type ConfidenceConfig = z.infer<typeof ConfidenceConfigSchema>;

export const DEFAULT_CONFIDENCE_CONFIG: ConfidenceConfig = {
  weights: {
    sourceQuality: 0.3,
    dataCompleteness: 0.25,
    agencyMatch: 0.2,
    recency: 0.15,
    consistency: 0.1,
  },
  bands: {
    high: 0.8,
    mediumHigh: 0.6,
    medium: 0.4,
    mediumLow: 0.2,
  },
  officialApiHosts: ["api.fda.gov", "api.census.gov", "api.nal.usda.gov"],
  officialApiScore: 1.0,
  officialDomainScore: 0.8,
  otherSourceScore: 0.5,
  requirementTarget: 20,
  sourceTarget: 10,
  recencyYears: 3,
  consistencyScale: 1.5,
  codeConfidenceBase: 0.7,
};

export const SeverityWeightsSchema = z.object({
  low: z.number().min(0),
  medium: z.number().min(0),
  high: z.number().min(0),
  critical: z.number().min(0),
});

export const ConflictConfigSchema = z.object({
  severityWeights: SeverityWeightsSchema,
  maxPenalty: z.number().min(0.1),
});

export type ConflictConfig = z.infer<typeof ConflictConfigSchema>;

export const DEFAULT_CONFLICT_CONFIG: ConflictConfig = {
  severityWeights: { low: 0.1, medium: 0.3, high: 0.6, critical: 1.0 },
  maxPenalty: 2.0,
};

export const PrecedentConfigSchema = z.object({
  byCodeLimit: z.number().int().min(1).max(100),
  similarLimit: z.number().int().min(1).max(100),
  matchThreshold: z.number().min(0).max(1),
  reliableThreshold: z.number().min(0).max(1),
  reviewThreshold: z.number().min(0).max(1),
  oracleCases: z.number().int().min(1).max(20),
  oracleCaseChars: z.number().int().min(50).max(5000),
  heuristicCases: z.number().int().min(1).max(50),
  maxMissing: z.number().int().min(1).max(50),
  maxExtra: z.number().int().min(1).max(50),
  coverageWeight: z.number().min(0).max(1),
  similarityWeight: z.number().min(0).max(1),
  neutralScore: z.number().min(0).max(1),
});

export type PrecedentConfig = z.infer<typeof PrecedentConfigSchema>;

export const DEFAULT_PRECEDENT_CONFIG: PrecedentConfig = {
  byCodeLimit: 10,
  similarLimit: 5,
  matchThreshold: 0.5,
  reliableThreshold: 0.85,
  reviewThreshold: 0.7,
  oracleCases: 5,
  oracleCaseChars: 500,
  heuristicCases: 10,
  maxMissing: 5,
  maxExtra: 5,
  coverageWeight: 0.7,
  similarityWeight: 0.3,
  neutralScore: 0.5,
};

// ============================================================================
// PIPELINE CONFIG
// ============================================================================

export const RecoveryStrategySchema = z.enum(["ignore", "retry", "fallback", "skip", "fail"]);

export const RecoveryPolicySchema = z.object({
  extract_keywords: RecoveryStrategySchema,
  target_agencies: RecoveryStrategySchema,
  gather_evidence: RecoveryStrategySchema,
  consolidate: RecoveryStrategySchema,
  detect_conflicts: RecoveryStrategySchema,
  validate_precedent: RecoveryStrategySchema,
  score: RecoveryStrategySchema,
  finalize: RecoveryStrategySchema,
});

export type RecoveryPolicy = z.infer<typeof RecoveryPolicySchema>;

export const DEFAULT_RECOVERY_POLICY: RecoveryPolicy = {
  extract_keywords: "fallback",
  target_agencies: "fallback",
  gather_evidence: "fallback",
  consolidate: "fail",
  detect_conflicts: "fallback",
  validate_precedent: "fallback",
  score: "fallback",
  finalize: "fallback",
};

export const PipelineSettingsSchema = z.object({
  deadlineMs: z.number().int().min(1000).nullable().describe("Overall pipeline deadline; null disables it"),
  maxKeywords: z.number().int().min(1).max(10),
  coalesceInFlight: z.boolean().describe("Share one run between concurrent identical requests"),
  summaryEnabled: z.boolean(),
  recommenderUrl: z.string().url().nullable(),
  precedentServiceUrl: z.string().url().nullable(),
  recovery: RecoveryPolicySchema.describe("Recovery strategy per stage; critical errors always fail"),
});

export type PipelineSettings = z.infer<typeof PipelineSettingsSchema>;

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  deadlineMs: 120_000,
  maxKeywords: 3,
  coalesceInFlight: true,
  summaryEnabled: true,
  recommenderUrl: null,
  precedentServiceUrl: null,
  recovery: DEFAULT_RECOVERY_POLICY,
};

export const AnalyzerConfigSchema = z.object({
  schemaVersion: z.literal(SCHEMA_VERSION),
  pipeline: PipelineSettingsSchema,
  llm: LlmConfigSchema,
  cache: CacheConfigSchema,
  concurrency: ConcurrencyConfigSchema,
  search: SearchConfigSchema,
  structuredProviders: StructuredProvidersConfigSchema,
  circuitBreaker: CircuitBreakerConfigSchema,
  confidence: ConfidenceConfigSchema,
  conflicts: ConflictConfigSchema,
  precedent: PrecedentConfigSchema,
});

export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;

export const DEFAULT_ANALYZER_CONFIG: AnalyzerConfig = {
  schemaVersion: SCHEMA_VERSION,
  pipeline: DEFAULT_PIPELINE_SETTINGS,
  llm: DEFAULT_LLM_CONFIG,
  cache: DEFAULT_CACHE_CONFIG,
  concurrency: DEFAULT_CONCURRENCY_CONFIG,
  search: DEFAULT_SEARCH_CONFIG,
  structuredProviders: DEFAULT_STRUCTURED_PROVIDERS_CONFIG,
  circuitBreaker: DEFAULT_CIRCUIT_BREAKER_CONFIG,
  confidence: DEFAULT_CONFIDENCE_CONFIG,
  conflicts: DEFAULT_CONFLICT_CONFIG,
  precedent: DEFAULT_PRECEDENT_CONFIG,
};

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Validate a config candidate and report semantic warnings the schema
 * cannot express (weights not summing to 1, inverted band thresholds).
 */
export function validateAnalyzerConfig(candidate: unknown): ValidationResult {
  const parsed = AnalyzerConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      warnings: [],
    };
  }

  const warnings: string[] = [];
  const { weights, bands } = parsed.data.confidence;
  const weightSum =
    weights.sourceQuality + weights.dataCompleteness + weights.agencyMatch + weights.recency + weights.consistency;
  if (Math.abs(weightSum - 1) > 0.001) {
    warnings.push(`confidence.weights sum to ${weightSum.toFixed(3)} instead of 1.0`);
  }
  if (!(bands.high > bands.mediumHigh && bands.mediumHigh > bands.medium && bands.medium > bands.mediumLow)) {
    warnings.push("confidence.bands thresholds are not strictly descending");
  }
  if (parsed.data.precedent.reviewThreshold > parsed.data.precedent.reliableThreshold) {
    warnings.push("precedent.reviewThreshold is above precedent.reliableThreshold");
  }

  return { valid: true, errors: [], warnings };
}
