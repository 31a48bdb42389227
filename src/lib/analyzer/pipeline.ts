/**
 * Requirements Analysis Pipeline
 *
 * Stage order:
 *
 *   extract_keywords → target_agencies → gather_evidence → consolidate
 *     → (detect_conflicts ‖ validate_precedent) → score → finalize
 *
 * Each stage runs against an immutable PipelineState and yields an outcome
 * that is attached to a new state. A failing stage is handled by its
 * recovery strategy (see error-ledger.ts):
 *
 *   ignore    fallback output, no warning
 *   retry     run once more, then fallback
 *   fallback  fallback output, stage degraded
 *   skip      fallback output, stage skipped
 *   fail      analysis stops with status "failed"
 *
 * The deadline only cancels evidence gathering; later stages run on the
 * evidence collected so far.
 *
 * @module analyzer/pipeline
 */

import { DEFAULT_PIPELINE_SETTINGS, type PipelineSettings } from "../config-schemas";
import { debugLog } from "../debug";
import type { ErrorCategory } from "../error-classification";
import { errorMessage, type RecoveryStrategy } from "../errors";
import { timeoutSignal } from "../web-search";
import { DEFAULT_AGENCY_RULES, normalizeCodePrefix, INFERRED_CONFIDENCE, type AgencyTargeter } from "./agency-targeter";
import { sourcesOf, type ConfidenceScorer } from "./confidence-scorer";
import type { ConflictDetector } from "./conflict-detector";
import { consolidate, groupByAgency } from "./consolidator";
import { ErrorLedger, resolveRecovery } from "./error-ledger";
import type { EvidenceGatherError, EvidenceGatherer, GatherResult } from "./evidence-gatherer";
import { HeuristicKeywordExtractor, type ChainedKeywordExtractor } from "./keyword-extractor";
import { PipelineState, type StageOutputs } from "./pipeline-state";
import type { PrecedentValidator } from "./precedent-validator";
import { stubSummary, toSummaryDocuments } from "./summarizer";
import type {
  AnalysisRequest,
  AnalysisStatus,
  EvidenceItem,
  PipelineStage,
  PrecedentCorpus,
  RequirementCitation,
  RequirementsAnalysisResult,
  Severity,
  StageRecord,
  StageStatus,
  SummarizationOracle,
} from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface PipelineDependencies {
  keywordExtractor: ChainedKeywordExtractor;
  targeter: AgencyTargeter;
  gatherer: EvidenceGatherer;
  conflictDetector: ConflictDetector;
  validator: PrecedentValidator;
  corpus: PrecedentCorpus;
  scorer: ConfidenceScorer;
  summarizer?: SummarizationOracle | null;
  settings?: PipelineSettings;
  now?: () => number;
}

export interface RunOptions {
  codeMappingConfidence: number;
  signal?: AbortSignal;
}

export type StageCounts = Record<StageStatus, number>;

interface StageAttempt<S extends PipelineStage> {
  output: StageOutputs[S];
  warnings?: string[];
  degraded?: boolean;
}

interface StageOutcome<S extends PipelineStage> {
  stage: S;
  output: StageOutputs[S] | undefined;
  record: StageRecord;
  warnings: string[];
}

const EMPTY_GATHER: GatherResult = {
  items: [],
  errors: [],
  warnings: [],
  truncated: false,
  stats: { pairs: 0, cacheHits: 0, structuredCalls: 0, searchCalls: 0, skippedByCircuit: 0 },
};

const GATHER_ERROR_SEVERITY: Record<ErrorCategory, Severity> = {
  transient: "medium",
  not_found: "low",
  parse: "medium",
  validation: "medium",
  provider_outage: "high",
  fatal: "critical",
  cancelled: "low",
  unknown: "medium",
};

const STAGES: readonly PipelineStage[] = [
  "extract_keywords",
  "target_agencies",
  "gather_evidence",
  "consolidate",
  "detect_conflicts",
  "validate_precedent",
  "score",
  "finalize",
];

export function toCitation(item: EvidenceItem): RequirementCitation {
  return {
    title: item.title,
    description: item.description,
    agency: item.agency,
    required: item.required,
    sourceUrl: item.sourceUrl,
    provider: item.provenance.provider,
    effectiveDate: item.effectiveDate ?? null,
  };
}

// ============================================================================
// PIPELINE
// ============================================================================

export class RequirementsPipeline {
  private readonly deps: PipelineDependencies;
  private readonly settings: PipelineSettings;
  private readonly now: () => number;
  private readonly heuristicKeywords = new HeuristicKeywordExtractor();
  private readonly stageCounts = new Map<PipelineStage, StageCounts>();

  constructor(deps: PipelineDependencies) {
    this.deps = deps;
    this.settings = deps.settings ?? DEFAULT_PIPELINE_SETTINGS;
    this.now = deps.now ?? Date.now;
  }

  async run(request: AnalysisRequest, options: RunOptions): Promise<RequirementsAnalysisResult> {
    const startedAt = this.now();
    const ledger = new ErrorLedger(this.now);
    const signal = options.signal;
    const deadlineMs = request.deadlineMs ?? this.settings.deadlineMs;
    const gatherSignal = deadlineMs ? timeoutSignal(deadlineMs, signal) : signal;

    let state = PipelineState.start(request, options.codeMappingConfidence);
    console.log(`[Pipeline] Analyzing ${request.classificationCode || "(no code)"} "${request.productName.substring(0, 60)}"`);

    const sequential: Array<(s: PipelineState) => Promise<StageOutcome<PipelineStage>>> = [
      (s) => this.execute(s, ledger, "extract_keywords", () => this.extractKeywords(s, signal), () => this.fallbackKeywords(s)),
      (s) => this.execute(s, ledger, "target_agencies", () => this.targetAgencies(s, signal), () => this.fallbackTarget(s)),
      (s) => this.execute(s, ledger, "gather_evidence", () => this.gatherEvidence(s, ledger, gatherSignal), () => EMPTY_GATHER),
      (s) => this.execute(s, ledger, "consolidate", async () => ({ output: consolidate(s.require("gather_evidence").items) }), () => consolidate([])),
    ];

    for (const step of sequential) {
      const outcome = await step(state);
      state = attach(state, outcome);
      if (outcome.record.status === "failed") return this.finish(state, ledger, startedAt, "failed");
    }

    const [conflictOutcome, precedentOutcome] = await Promise.all([
      this.execute(state, ledger, "detect_conflicts", async () => this.detectConflicts(state), () => ({ conflicts: [], score: 1, recommendations: [] })),
      this.execute(state, ledger, "validate_precedent", () => this.validatePrecedent(state, signal), () => this.deps.validator.neutral()),
    ]);
    state = attach(attach(state, conflictOutcome), precedentOutcome);
    if (conflictOutcome.record.status === "failed" || precedentOutcome.record.status === "failed") {
      return this.finish(state, ledger, startedAt, "failed");
    }

    const closing: Array<(s: PipelineState) => Promise<StageOutcome<PipelineStage>>> = [
      (s) => this.execute(s, ledger, "score", async () => this.score(s), () => this.deps.scorer.minimum("Confidence scoring failed; minimum confidence reported")),
      (s) => this.execute(s, ledger, "finalize", () => this.summarize(s, signal), () => stubSummary(toSummaryDocuments(s.require("consolidate").items))),
    ];

    for (const step of closing) {
      const outcome = await step(state);
      state = attach(state, outcome);
      if (outcome.record.status === "failed") return this.finish(state, ledger, startedAt, "failed");
    }

    const gather = state.require("gather_evidence");
    const degraded =
      state.history.some((r) => r.status !== "completed") || gather.truncated || gather.errors.length > 0 || ledger.size > 0;
    return this.finish(state, ledger, startedAt, degraded ? "partial" : "completed");
  }

  /** Success/degraded/skipped/failed counts per stage since start-up. */
  getStageStats(): Array<{ stage: PipelineStage } & StageCounts> {
    return STAGES.map((stage) => ({ stage, ...(this.stageCounts.get(stage) ?? emptyCounts()) }));
  }

  // ==========================================================================
  // STAGE EXECUTION
  // ==========================================================================

  private async execute<S extends PipelineStage>(
    state: PipelineState,
    ledger: ErrorLedger,
    stage: S,
    run: () => Promise<StageAttempt<S>>,
    fallback: () => StageOutputs[S],
  ): Promise<StageOutcome<S>> {
    const started = this.now();
    const record = (status: StageStatus, recovery: RecoveryStrategy | null, error: string | null): StageRecord => ({
      stage,
      status,
      durationMs: this.now() - started,
      recovery,
      error,
    });

    let attempt = 0;
    for (;;) {
      try {
        const result = await run();
        const warnings = result.warnings ?? [];
        const status: StageStatus = result.degraded ? "degraded" : "completed";
        return { stage, output: result.output, record: record(status, attempt > 0 ? "retry" : null, null), warnings };
      } catch (err) {
        const { recovery, classified } = resolveRecovery(stage, err, this.settings.recovery);
        const message = errorMessage(err);
        const retrying = recovery === "retry" && attempt === 0;
        ledger.record(stage, classified, retrying ? "retry" : recovery === "retry" ? "fallback" : recovery, {
          code: state.request.classificationCode,
          attempt,
        });
        debugLog(`[Pipeline] ${stage} failed`, { message, category: classified.category, recovery });

        if (retrying) {
          attempt++;
          continue;
        }

        switch (recovery) {
          case "fail":
            return { stage, output: undefined, record: record("failed", "fail", message), warnings: [`${stage} failed: ${message}`] };
          case "ignore":
            return { stage, output: fallback(), record: record("completed", "ignore", message), warnings: [] };
          case "skip":
            return { stage, output: fallback(), record: record("skipped", "skip", message), warnings: [`${stage} skipped: ${message}`] };
          default:
            return {
              stage,
              output: fallback(),
              record: record("degraded", "fallback", message),
              warnings: [`${stage} degraded, fallback used: ${message}`],
            };
        }
      }
    }
  }

  // ==========================================================================
  // STAGES
  // ==========================================================================

  private async extractKeywords(state: PipelineState, signal?: AbortSignal): Promise<StageAttempt<"extract_keywords">> {
    const { productName, productDescription } = state.request;
    const result = await this.deps.keywordExtractor.extract(productName, productDescription, signal);
    if (result.keywords.length === 0) {
      return {
        output: { keywords: [productName.toLowerCase()], strategy: "product-name" },
        warnings: ["No keywords could be extracted; searching by product name"],
        degraded: true,
      };
    }
    if (result.failures.length > 0) {
      return {
        output: { keywords: result.keywords, strategy: result.strategy },
        warnings: [`Keyword extraction fell back to the ${result.strategy} strategy`],
        degraded: true,
      };
    }
    return { output: { keywords: result.keywords, strategy: result.strategy } };
  }

  private fallbackKeywords(state: PipelineState): StageOutputs["extract_keywords"] {
    const { productName, productDescription } = state.request;
    const keywords = this.heuristicKeywords.rank(productName, productDescription, this.settings.maxKeywords);
    return keywords.length > 0
      ? { keywords, strategy: this.heuristicKeywords.name }
      : { keywords: [productName.toLowerCase()], strategy: "product-name" };
  }

  private async targetAgencies(state: PipelineState, signal?: AbortSignal): Promise<StageAttempt<"target_agencies">> {
    const { classificationCode, productName, productDescription } = state.request;
    const { keywords } = state.require("extract_keywords");
    const target = await this.deps.targeter.target(classificationCode, keywords, `${productName} ${productDescription}`.trim(), signal);
    const warnings = target.source === "inferred" ? [`No agency rule for code "${classificationCode}"; agencies inferred from the chapter`] : [];
    return { output: target, warnings };
  }

  private fallbackTarget(state: PipelineState): StageOutputs["target_agencies"] {
    return {
      primaryAgencies: [...DEFAULT_AGENCY_RULES.defaultAgencies],
      secondaryAgencies: [],
      confidence: INFERRED_CONFIDENCE,
      source: "inferred",
      category: "General",
      codePrefix: normalizeCodePrefix(state.request.classificationCode),
    };
  }

  private async gatherEvidence(state: PipelineState, ledger: ErrorLedger, signal?: AbortSignal): Promise<StageAttempt<"gather_evidence">> {
    const target = state.require("target_agencies");
    const { keywords } = state.require("extract_keywords");
    const result = await this.deps.gatherer.gather(target, keywords, state.request, signal);

    for (const e of result.errors) {
      ledger.record("gather_evidence", gatherErrorInfo(e), "fallback", { agency: e.agency, strategy: e.strategy, provider: e.provider });
    }
    const warnings = [...result.warnings];
    if (result.errors.length > 0) {
      warnings.push(`${result.errors.length} provider calls failed; evidence may be incomplete`);
    }
    return { output: result, warnings, degraded: result.truncated || result.errors.length > 0 };
  }

  private detectConflicts(state: PipelineState): StageAttempt<"detect_conflicts"> {
    const consolidated = state.require("consolidate");
    const detector = this.deps.conflictDetector;
    const conflicts = detector.detect(groupByAgency(consolidated.items));
    const warnings = conflicts.some((c) => c.severity === "critical" || c.severity === "high")
      ? [`${conflicts.length} conflicting requirements detected across sources`]
      : [];
    return {
      output: { conflicts, score: detector.validationScore(conflicts), recommendations: detector.recommendations(conflicts) },
      warnings,
    };
  }

  private async validatePrecedent(state: PipelineState, signal?: AbortSignal): Promise<StageAttempt<"validate_precedent">> {
    const { classificationCode, productName, isNewProduct } = state.request;
    const result = await this.deps.validator.validate(classificationCode, state.require("consolidate"), this.deps.corpus, productName, signal);
    const warnings: string[] = [];
    if (result.verdict === "UNRELIABLE") {
      warnings.push("Requirements differ from precedent cases; review before relying on them");
    } else if (result.verdict === "NO_PRECEDENTS" && !isNewProduct) {
      warnings.push("No precedent cases found for this product");
    }
    return { output: result, warnings };
  }

  private score(state: PipelineState): StageAttempt<"score"> {
    const consolidated = state.require("consolidate");
    const target = state.require("target_agencies");
    const result = this.deps.scorer.score(sourcesOf(consolidated.items), consolidated.items, target.primaryAgencies, state.codeMappingConfidence);
    return { output: result };
  }

  private async summarize(state: PipelineState, signal?: AbortSignal): Promise<StageAttempt<"finalize">> {
    const documents = toSummaryDocuments(state.require("consolidate").items);
    const summarizer = this.deps.summarizer;
    if (!this.settings.summaryEnabled || !summarizer) {
      return { output: stubSummary(documents) };
    }
    const summary = await summarizer.summarize(documents, {
      classificationCode: state.request.classificationCode,
      productName: state.request.productName,
      signal,
    });
    return { output: summary };
  }

  // ==========================================================================
  // RESULT
  // ==========================================================================

  private finish(state: PipelineState, ledger: ErrorLedger, startedAt: number, status: AnalysisStatus): RequirementsAnalysisResult {
    for (const record of state.history) {
      const counts = this.stageCounts.get(record.stage) ?? emptyCounts();
      counts[record.status]++;
      this.stageCounts.set(record.stage, counts);
    }

    const request = state.request;
    const target = state.get("target_agencies") ?? this.fallbackTarget(state);
    const gather = state.get("gather_evidence");
    const consolidated = state.get("consolidate");
    const conflicts = state.get("detect_conflicts");
    const processingTimeMs = this.now() - startedAt;

    const result: RequirementsAnalysisResult = {
      status,
      classificationCode: request.classificationCode,
      productName: request.productName,
      keywords: state.get("extract_keywords")?.keywords ?? [],
      recommendedAgencies: {
        primary: target.primaryAgencies,
        secondary: target.secondaryAgencies,
        confidence: target.confidence,
        source: target.source,
        category: target.category,
      },
      certifications: (consolidated?.certifications ?? []).map(toCitation),
      documents: (consolidated?.documents ?? []).map(toCitation),
      notices: (consolidated?.notices ?? []).map(toCitation),
      summary: state.get("finalize") ?? null,
      confidence: state.get("score") ?? this.deps.scorer.minimum(status === "failed" ? "Analysis failed" : "Confidence not computed"),
      validation: state.get("validate_precedent") ?? this.deps.validator.neutral(),
      conflicts: conflicts?.conflicts ?? [],
      conflictScore: conflicts?.score ?? 1,
      conflictRecommendations: conflicts?.recommendations ?? [],
      warnings: [...new Set(state.warnings)],
      errorSummary: ledger.summary(),
      stages: [...state.history],
      metadata: {
        processingTimeMs,
        analyzedAt: new Date(this.now()).toISOString(),
        fromCache: false,
        evidenceTruncated: gather?.truncated ?? false,
        rawEvidenceCount: gather?.items.length ?? 0,
        codeMappingConfidence: state.codeMappingConfidence,
        isNewProduct: request.isNewProduct,
      },
    };

    const log = status === "failed" ? console.error : console.log;
    log(
      `[Pipeline] ${status === "failed" ? "❌" : "✅"} ${request.classificationCode || "(no code)"} ${status} in ${processingTimeMs}ms ` +
        `(${result.certifications.length} certifications, ${result.documents.length} documents, confidence ${result.confidence.score} ${result.confidence.level})`,
    );
    return result;
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function attach<S extends PipelineStage>(state: PipelineState, outcome: StageOutcome<S>): PipelineState {
  if (outcome.output === undefined) return state.withRecord(outcome.record, outcome.warnings);
  return state.withOutput(outcome.stage, outcome.output, outcome.record, outcome.warnings);
}

function emptyCounts(): StageCounts {
  return { completed: 0, degraded: 0, skipped: 0, failed: 0 };
}

function gatherErrorInfo(e: EvidenceGatherError): { message: string; category: ErrorCategory; severity: Severity } {
  return {
    message: `${e.provider} (${e.agency}/${e.strategy}): ${e.message}`,
    category: e.category,
    severity: GATHER_ERROR_SEVERITY[e.category],
  };
}
