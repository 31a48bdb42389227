/**
 * Regulatory requirements analyzer: public API.
 *
 * @module index
 */

export { RequirementsService, createRequirementsService } from "./lib/requirements-service";
export type { AnalyzeOptions, ServiceOverrides, ServiceStatistics } from "./lib/requirements-service";

export { loadAnalyzerConfig } from "./lib/config-loader";
export { AnalyzerConfigSchema, DEFAULT_ANALYZER_CONFIG } from "./lib/config-schemas";
export type { AnalyzerConfig, RecoveryPolicy } from "./lib/config-schemas";

export { PipelineError, ProviderError, ProviderContractError } from "./lib/errors";
export { classifyError } from "./lib/error-classification";

export { RequirementsPipeline } from "./lib/analyzer/pipeline";
export { InMemoryPrecedentCorpus, HttpPrecedentCorpus } from "./lib/analyzer/precedent-corpus";
export { HttpCodeRecommender } from "./lib/analyzer/code-recommender";
export { LlmSummarizer, stubSummary } from "./lib/analyzer/summarizer";
export type { EvidenceProvider, EvidenceQuery } from "./lib/analyzer/providers/evidence-provider";
export type { PersistentCacheStore, RemoteCacheStore } from "./lib/cache/cache-types";

export {
  AnalysisRequestSchema,
  RequirementsAnalysisResultSchema,
} from "./lib/analyzer/types";
export type {
  AnalysisRequestInput,
  AnalysisStatus,
  CodeRecommender,
  ConfidenceResult,
  Conflict,
  PrecedentCase,
  PrecedentCorpus,
  RequirementsAnalysisResult,
  StructuredSummary,
  SummarizationOracle,
  ValidationResult,
} from "./lib/analyzer/types";
