/**
 * Tests for recovery resolution and the per-request error ledger.
 */
import { describe, expect, it } from "vitest";
import { ErrorLedger, resolveRecovery } from "@/lib/analyzer/error-ledger";
import { DEFAULT_RECOVERY_POLICY } from "@/lib/config-schemas";
import { classifyError } from "@/lib/error-classification";
import { PipelineError } from "@/lib/errors";

describe("resolveRecovery", () => {
  it("follows the stage policy", () => {
    expect(resolveRecovery("consolidate", new Error("boom")).recovery).toBe("fail");
    expect(resolveRecovery("gather_evidence", new Error("boom")).recovery).toBe("fallback");
    expect(resolveRecovery("consolidate", new Error("boom"), { ...DEFAULT_RECOVERY_POLICY, consolidate: "skip" }).recovery).toBe("skip");
  });

  it("always fails critical errors", () => {
    const error = new PipelineError("state corrupted", { severity: "critical", recovery: "ignore" });
    expect(resolveRecovery("finalize", error).recovery).toBe("fail");
  });

  it("lets an explicit recovery win over the policy", () => {
    expect(resolveRecovery("consolidate", new PipelineError("skippable", { recovery: "skip" })).recovery).toBe("skip");
  });
});

describe("ErrorLedger", () => {
  it("summarizes entries by category, severity, recovery and stage", () => {
    const ledger = new ErrorLedger(() => Date.parse("2026-03-01T12:00:00.000Z"));
    ledger.record("gather_evidence", classifyError(new Error("socket timeout")), "fallback", { provider: "openFDA" });
    ledger.record("score", classifyError(new Error("boom")), "fallback");
    ledger.record(null, { message: "late failure", category: "unknown", severity: "high" }, "fail");

    expect(ledger.size).toBe(3);
    expect(ledger.list()[0].context).toEqual({ provider: "openFDA" });
    expect(ledger.summary()).toEqual({
      totalErrors: 3,
      byCategory: { transient: 1, unknown: 2 },
      bySeverity: { medium: 2, high: 1 },
      byRecovery: { fallback: 2, fail: 1 },
      byStage: { gather_evidence: 1, score: 1, pipeline: 1 },
      lastError: {
        stage: null,
        message: "late failure",
        category: "unknown",
        severity: "high",
        timestamp: "2026-03-01T12:00:00.000Z",
      },
    });
  });

  it("reports an empty summary", () => {
    expect(new ErrorLedger().summary()).toMatchObject({ totalErrors: 0, lastError: null });
  });
});
