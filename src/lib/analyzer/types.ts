/**
 * Requirements Analyzer - Data Model
 *
 * Value types that cross stage boundaries or get cached are defined as zod
 * schemas (cached values are re-validated on read); collaborator contracts
 * are plain interfaces.
 *
 * @module analyzer/types
 */

import { z } from "zod";

// ============================================================================
// REQUEST
// ============================================================================

export const AnalysisRequestSchema = z.object({
  classificationCode: z.string().trim().max(32),
  productName: z.string().trim().min(1).max(500),
  productDescription: z.string().max(10_000).default(""),
  forceRefresh: z.boolean().default(false),
  isNewProduct: z.boolean().default(false),
  deadlineMs: z.number().int().positive().nullable().optional(),
});

export type AnalysisRequestInput = z.input<typeof AnalysisRequestSchema>;

export type AnalysisRequest = Readonly<z.output<typeof AnalysisRequestSchema>>;

// ============================================================================
// EVIDENCE
// ============================================================================

export const ClaimKindSchema = z.enum(["certification", "document", "notice"]);
export type ClaimKind = z.infer<typeof ClaimKindSchema>;

export const QueryStrategySchema = z.enum(["code", "keyword", "fulltext"]);
export type QueryStrategy = z.infer<typeof QueryStrategySchema>;

export const JurisdictionSchema = z.enum(["federal", "state", "international"]);
export type Jurisdiction = z.infer<typeof JurisdictionSchema>;

export const EvidenceProvenanceSchema = z.object({
  provider: z.string(),
  query: z.string(),
  strategy: QueryStrategySchema,
  retrievedAt: z.string(),
});

export const EvidenceItemSchema = z.object({
  kind: ClaimKindSchema,
  agency: z.string(),
  title: z.string(),
  description: z.string(),
  sourceUrl: z.string(),
  required: z.boolean(),
  rawPayload: z.unknown().optional(),
  provenance: EvidenceProvenanceSchema,
  effectiveDate: z.string().nullable().optional(),
  jurisdiction: JurisdictionSchema.optional(),
});

export type EvidenceItem = z.infer<typeof EvidenceItemSchema>;

export const ConsolidatedRequirementSetSchema = z.object({
  items: z.array(EvidenceItemSchema),
  certifications: z.array(EvidenceItemSchema),
  documents: z.array(EvidenceItemSchema),
  notices: z.array(EvidenceItemSchema),
  countsByAgency: z.record(z.number()),
  totalCount: z.number(),
  duplicatesRemoved: z.number(),
});

export type ConsolidatedRequirementSet = z.infer<typeof ConsolidatedRequirementSetSchema>;

// ============================================================================
// AGENCY TARGETING
// ============================================================================

export const TargetSourceSchema = z.enum(["rule", "learned", "inferred"]);
export type TargetSource = z.infer<typeof TargetSourceSchema>;

export const AgencyTargetSchema = z.object({
  primaryAgencies: z.array(z.string()).min(1),
  secondaryAgencies: z.array(z.string()),
  confidence: z.number().min(0).max(1),
  source: TargetSourceSchema,
  category: z.string(),
  codePrefix: z.string(),
});

export type AgencyTarget = z.infer<typeof AgencyTargetSchema>;

// ============================================================================
// CONFLICTS
// ============================================================================

export const SeveritySchema = z.enum(["low", "medium", "high", "critical"]);
export type Severity = z.infer<typeof SeveritySchema>;

export const ConflictKindSchema = z.enum(["agency-vs-agency", "federal-vs-local", "domestic-vs-international"]);
export type ConflictKind = z.infer<typeof ConflictKindSchema>;

export const ConflictSchema = z.object({
  kind: ConflictKindSchema,
  pattern: z.string(),
  agencies: z.array(z.string()),
  severity: SeveritySchema,
  description: z.string(),
  resolution: z.string(),
  affectedKeys: z.array(z.string()),
});

export type Conflict = z.infer<typeof ConflictSchema>;

// ============================================================================
// PRECEDENT VALIDATION
// ============================================================================

export const PrecedentOutcomeSchema = z.enum(["success", "failure", "review"]);

export const PrecedentCaseSchema = z.object({
  id: z.string(),
  text: z.string(),
  source: z.string(),
  outcome: PrecedentOutcomeSchema,
  classificationCode: z.string().optional(),
  similarity: z.number().optional(),
});

export type PrecedentCase = z.infer<typeof PrecedentCaseSchema>;

export const PrecedentItemKindSchema = z.enum(["certification", "document", "regulation"]);
export type PrecedentItemKind = z.infer<typeof PrecedentItemKindSchema>;

export const RequirementMatchSchema = z.object({
  ours: z.string(),
  precedent: z.string(),
  kind: PrecedentItemKindSchema,
  similarity: z.number(),
});

export type RequirementMatch = z.infer<typeof RequirementMatchSchema>;

export const MissingRequirementSchema = z.object({
  text: z.string(),
  kind: PrecedentItemKindSchema,
  severity: SeveritySchema,
});

export type MissingRequirement = z.infer<typeof MissingRequirementSchema>;

export const RedFlagSchema = z.object({
  type: z.enum(["missing_requirement", "extra_requirement"]),
  severity: SeveritySchema,
  description: z.string(),
});

export type RedFlag = z.infer<typeof RedFlagSchema>;

export const ValidationVerdictSchema = z.enum(["RELIABLE", "NEEDS_REVIEW", "UNRELIABLE", "NO_PRECEDENTS"]);
export type ValidationVerdict = z.infer<typeof ValidationVerdictSchema>;

export const ValidationResultSchema = z.object({
  score: z.number().min(0).max(1),
  verdict: ValidationVerdictSchema,
  casesAnalyzed: z.number(),
  matched: z.array(RequirementMatchSchema),
  missing: z.array(MissingRequirementSchema),
  extra: z.array(z.string()),
  redFlags: z.array(RedFlagSchema),
  coverage: z.number(),
  averageSimilarity: z.number(),
  source: z.enum(["corpus", "none"]),
});

export type ValidationResult = z.infer<typeof ValidationResultSchema>;

// ============================================================================
// CONFIDENCE
// ============================================================================

export const ConfidenceLevelSchema = z.enum(["HIGH", "MEDIUM_HIGH", "MEDIUM", "MEDIUM_LOW", "LOW"]);
export type ConfidenceLevel = z.infer<typeof ConfidenceLevelSchema>;

export const ConfidenceBreakdownSchema = z.object({
  sourceQuality: z.number(),
  dataCompleteness: z.number(),
  agencyMatch: z.number(),
  recency: z.number(),
  consistency: z.number(),
});

export type ConfidenceBreakdown = z.infer<typeof ConfidenceBreakdownSchema>;

export const ConfidenceResultSchema = z.object({
  score: z.number().min(0).max(1),
  level: ConfidenceLevelSchema,
  rawScore: z.number(),
  breakdown: ConfidenceBreakdownSchema,
  factors: z.array(z.string()),
  warnings: z.array(z.string()),
});

export type ConfidenceResult = z.infer<typeof ConfidenceResultSchema>;

// ============================================================================
// SUMMARY
// ============================================================================

export const CitationSchema = z.object({
  index: z.number().int(),
  title: z.string(),
  url: z.string(),
  agency: z.string(),
});

export type Citation = z.infer<typeof CitationSchema>;

/** One bilingual claim; `citations` index into the summary's citation list. */
export const SummaryClaimSchema = z.object({
  text: z.string(),
  textKo: z.string(),
  citations: z.array(z.number().int()),
});

export type SummaryClaim = z.infer<typeof SummaryClaimSchema>;

export const StructuredSummarySchema = z.object({
  criticalRequirements: z.array(SummaryClaimSchema),
  requiredDocuments: z.array(SummaryClaimSchema),
  complianceSteps: z.array(SummaryClaimSchema),
  riskFactors: z.array(SummaryClaimSchema),
  recommendations: z.array(SummaryClaimSchema),
  estimatedCosts: SummaryClaimSchema.nullable(),
  timeline: SummaryClaimSchema.nullable(),
  citations: z.array(CitationSchema),
  confidenceScore: z.number().min(0).max(1),
  generatedBy: z.enum(["llm", "stub"]),
});

export type StructuredSummary = z.infer<typeof StructuredSummarySchema>;

export interface SummaryDocument {
  title: string;
  url: string;
  agency: string;
  kind: ClaimKind;
  text: string;
}

// ============================================================================
// PIPELINE RESULT
// ============================================================================

export const PipelineStageSchema = z.enum([
  "extract_keywords",
  "target_agencies",
  "gather_evidence",
  "consolidate",
  "detect_conflicts",
  "validate_precedent",
  "score",
  "finalize",
]);

export type PipelineStage = z.infer<typeof PipelineStageSchema>;

export const StageStatusSchema = z.enum(["completed", "degraded", "skipped", "failed"]);
export type StageStatus = z.infer<typeof StageStatusSchema>;

export const StageRecordSchema = z.object({
  stage: PipelineStageSchema,
  status: StageStatusSchema,
  durationMs: z.number(),
  recovery: z.enum(["ignore", "retry", "fallback", "skip", "fail"]).nullable(),
  error: z.string().nullable(),
});

export type StageRecord = z.infer<typeof StageRecordSchema>;

export const ErrorSummarySchema = z.object({
  totalErrors: z.number(),
  byCategory: z.record(z.number()),
  bySeverity: z.record(z.number()),
  byRecovery: z.record(z.number()),
  byStage: z.record(z.number()),
  lastError: z
    .object({
      stage: z.string().nullable(),
      message: z.string(),
      category: z.string(),
      severity: SeveritySchema,
      timestamp: z.string(),
    })
    .nullable(),
});

export type ErrorSummary = z.infer<typeof ErrorSummarySchema>;

export const RequirementCitationSchema = z.object({
  title: z.string(),
  description: z.string(),
  agency: z.string(),
  required: z.boolean(),
  sourceUrl: z.string(),
  provider: z.string(),
  effectiveDate: z.string().nullable(),
});

export type RequirementCitation = z.infer<typeof RequirementCitationSchema>;

export const AnalysisStatusSchema = z.enum(["completed", "partial", "failed"]);
export type AnalysisStatus = z.infer<typeof AnalysisStatusSchema>;

export const RequirementsAnalysisResultSchema = z.object({
  status: AnalysisStatusSchema,
  classificationCode: z.string(),
  productName: z.string(),
  keywords: z.array(z.string()),
  recommendedAgencies: z.object({
    primary: z.array(z.string()),
    secondary: z.array(z.string()),
    confidence: z.number(),
    source: TargetSourceSchema,
    category: z.string(),
  }),
  certifications: z.array(RequirementCitationSchema),
  documents: z.array(RequirementCitationSchema),
  notices: z.array(RequirementCitationSchema),
  summary: StructuredSummarySchema.nullable(),
  confidence: ConfidenceResultSchema,
  validation: ValidationResultSchema,
  conflicts: z.array(ConflictSchema),
  conflictScore: z.number(),
  conflictRecommendations: z.array(z.string()),
  warnings: z.array(z.string()),
  errorSummary: ErrorSummarySchema,
  stages: z.array(StageRecordSchema),
  metadata: z.object({
    processingTimeMs: z.number(),
    analyzedAt: z.string(),
    fromCache: z.boolean(),
    evidenceTruncated: z.boolean(),
    rawEvidenceCount: z.number(),
    codeMappingConfidence: z.number(),
    isNewProduct: z.boolean(),
  }),
});

export type RequirementsAnalysisResult = z.infer<typeof RequirementsAnalysisResultSchema>;

// ============================================================================
// COLLABORATORS
// ============================================================================

export interface CodeRecommendation {
  code: string;
  confidence: number;
}

/** Classification-code recommender (external nearest-neighbour service). */
export interface CodeRecommender {
  recommend(productName: string, description: string): Promise<CodeRecommendation | null>;
}

export interface SummarizeOptions {
  classificationCode?: string;
  productName?: string;
  signal?: AbortSignal;
}

/** Natural-language summarization oracle. */
export interface SummarizationOracle {
  summarize(documents: SummaryDocument[], options?: SummarizeOptions): Promise<StructuredSummary>;
}

export interface PrecedentCorpus {
  searchByCode(code: string, limit: number): Promise<PrecedentCase[]>;
  searchSimilar(text: string, limit: number): Promise<PrecedentCase[]>;
}
