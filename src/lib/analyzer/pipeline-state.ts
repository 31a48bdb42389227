/**
 * Pipeline State
 *
 * Immutable per-request snapshot. Every stage returns a new state with its
 * output attached; attaching an output twice for the same stage is a
 * programming error and throws.
 *
 * @module analyzer/pipeline-state
 */

import { PipelineError } from "../errors";
import type { GatherResult } from "./evidence-gatherer";
import type {
  AgencyTarget,
  AnalysisRequest,
  ConfidenceResult,
  Conflict,
  ConsolidatedRequirementSet,
  PipelineStage,
  StageRecord,
  StructuredSummary,
  ValidationResult,
} from "./types";

export interface KeywordStageOutput {
  keywords: string[];
  strategy: string;
}

export interface ConflictStageOutput {
  conflicts: Conflict[];
  score: number;
  recommendations: string[];
}

export interface StageOutputs {
  extract_keywords: KeywordStageOutput;
  target_agencies: AgencyTarget;
  gather_evidence: GatherResult;
  consolidate: ConsolidatedRequirementSet;
  detect_conflicts: ConflictStageOutput;
  validate_precedent: ValidationResult;
  score: ConfidenceResult;
  finalize: StructuredSummary | null;
}

export class PipelineState {
  private constructor(
    readonly request: AnalysisRequest,
    readonly codeMappingConfidence: number,
    private readonly outputs: Readonly<Partial<StageOutputs>>,
    readonly history: readonly StageRecord[],
    readonly warnings: readonly string[],
  ) {}

  static start(request: AnalysisRequest, codeMappingConfidence: number): PipelineState {
    return new PipelineState(Object.freeze({ ...request }), codeMappingConfidence, Object.freeze({}), Object.freeze([]), Object.freeze([]));
  }

  has(stage: PipelineStage): boolean {
    return this.outputs[stage] !== undefined;
  }

  get<S extends PipelineStage>(stage: S): StageOutputs[S] | undefined {
    return this.outputs[stage];
  }

  /** Output of a stage that must already have run. */
  require<S extends PipelineStage>(stage: S): StageOutputs[S] {
    const output = this.outputs[stage];
    if (output === undefined) {
      throw new PipelineError(`Stage ${stage} has no output yet`, { severity: "critical", stage });
    }
    return output;
  }

  withOutput<S extends PipelineStage>(stage: S, output: StageOutputs[S], record: StageRecord, warnings: readonly string[] = []): PipelineState {
    if (this.has(stage)) {
      throw new PipelineError(`Stage ${stage} output is already attached`, { severity: "critical", stage });
    }
    const next: Partial<StageOutputs> = { ...this.outputs };
    next[stage] = output;
    return new PipelineState(
      this.request,
      this.codeMappingConfidence,
      Object.freeze(next),
      Object.freeze([...this.history, record]),
      Object.freeze([...this.warnings, ...warnings]),
    );
  }

  /** Record a stage that produced no output (failed). */
  withRecord(record: StageRecord, warnings: readonly string[] = []): PipelineState {
    return new PipelineState(
      this.request,
      this.codeMappingConfidence,
      this.outputs,
      Object.freeze([...this.history, record]),
      Object.freeze([...this.warnings, ...warnings]),
    );
  }

  withWarnings(warnings: readonly string[]): PipelineState {
    if (warnings.length === 0) return this;
    return new PipelineState(this.request, this.codeMappingConfidence, this.outputs, this.history, Object.freeze([...this.warnings, ...warnings]));
  }
}
