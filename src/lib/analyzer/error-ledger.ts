/**
 * Error Ledger
 *
 * Per-request record of every error the pipeline handled, with the recovery
 * applied to it. Produces the `errorSummary` block of the analysis result.
 *
 * @module analyzer/error-ledger
 */

import { DEFAULT_RECOVERY_POLICY, type RecoveryPolicy } from "../config-schemas";
import { classifyError, type ClassifiedError } from "../error-classification";
import { PipelineError, type RecoveryStrategy } from "../errors";
import type { ErrorSummary, PipelineStage, Severity } from "./types";

export interface LedgerEntry {
  stage: PipelineStage | null;
  message: string;
  category: ClassifiedError["category"];
  severity: Severity;
  recovery: RecoveryStrategy;
  timestamp: string;
  context: Record<string, unknown>;
}

/**
 * Strategy for a failed stage: critical errors always fail, an explicit
 * recovery on a PipelineError wins over the stage policy.
 */
export function resolveRecovery(
  stage: PipelineStage,
  error: unknown,
  policy: RecoveryPolicy = DEFAULT_RECOVERY_POLICY,
): { recovery: RecoveryStrategy; classified: ClassifiedError } {
  const classified = classifyError(error);
  if (classified.severity === "critical") return { recovery: "fail", classified };
  if (error instanceof PipelineError && error.recovery) return { recovery: error.recovery, classified };
  return { recovery: policy[stage], classified };
}

export class ErrorLedger {
  private readonly entries: LedgerEntry[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  record(
    stage: PipelineStage | null,
    classified: Pick<ClassifiedError, "message" | "category" | "severity">,
    recovery: RecoveryStrategy,
    context: Record<string, unknown> = {},
  ): LedgerEntry {
    const entry: LedgerEntry = {
      stage,
      message: classified.message,
      category: classified.category,
      severity: classified.severity,
      recovery,
      timestamp: new Date(this.now()).toISOString(),
      context,
    };
    this.entries.push(entry);

    const line = `[Error-Ledger] ${stage ?? "pipeline"} ${classified.category}/${classified.severity} → ${recovery}: ${classified.message}`;
    if (classified.severity === "critical" || recovery === "fail") console.error(line);
    else console.warn(line);
    return entry;
  }

  get size(): number {
    return this.entries.length;
  }

  list(): readonly LedgerEntry[] {
    return this.entries;
  }

  summary(): ErrorSummary {
    const byCategory: Record<string, number> = {};
    const bySeverity: Record<string, number> = {};
    const byRecovery: Record<string, number> = {};
    const byStage: Record<string, number> = {};

    for (const e of this.entries) {
      byCategory[e.category] = (byCategory[e.category] ?? 0) + 1;
      bySeverity[e.severity] = (bySeverity[e.severity] ?? 0) + 1;
      byRecovery[e.recovery] = (byRecovery[e.recovery] ?? 0) + 1;
      const stage = e.stage ?? "pipeline";
      byStage[stage] = (byStage[stage] ?? 0) + 1;
    }

    const last = this.entries.at(-1);
    return {
      totalErrors: this.entries.length,
      byCategory,
      bySeverity,
      byRecovery,
      byStage,
      lastError: last
        ? { stage: last.stage, message: last.message, category: last.category, severity: last.severity, timestamp: last.timestamp }
        : null,
    };
  }
}
