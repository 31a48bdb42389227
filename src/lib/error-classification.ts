/**
 * Error Classification
 *
 * Maps anything thrown inside the pipeline onto the analyzer's error
 * taxonomy, which decides whether a failure is retried, counted against a
 * provider's circuit, or degrades the stage.
 *
 * @module error-classification
 */

import { ZodError } from "zod";
import { PipelineError, ProviderContractError, ProviderError, type ErrorSeverity } from "./errors";

export type ErrorCategory =
  | "transient"
  | "not_found"
  | "parse"
  | "validation"
  | "provider_outage"
  | "fatal"
  | "cancelled"
  | "unknown";

export type ClassifiedError = {
  category: ErrorCategory;
  provider: string | null;
  status: number | null;
  message: string;
  severity: ErrorSeverity;
  retriable: boolean;
  shouldCountAsProviderFailure: boolean;
};

const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /quota/i,
];

const TIMEOUT_PATTERNS = [/timeout/i, /timed?\s*out/i, /ETIMEDOUT/i, /ECONNRESET/i, /ECONNREFUSED/i, /fetch failed/i];

const PARSE_PATTERNS = [/unexpected token/i, /json/i, /malformed/i];

/**
 * Classify an error to determine its category and whether it should
 * count against provider health.
 */
export function classifyError(error: unknown): ClassifiedError {
  const msg = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";

  if (error instanceof PipelineError && error.severity === "critical") {
    return build("fatal", msg, { severity: "critical" });
  }

  if (error instanceof ProviderContractError) {
    return build("parse", msg, { provider: error.provider, shouldCountAsProviderFailure: false });
  }

  if (error instanceof ProviderError) {
    const status = error.status ?? null;
    if (status === 404) {
      return build("not_found", msg, { provider: error.provider, status, severity: "low" });
    }
    const transient = status === null || status === 408 || status === 429 || status >= 500;
    return build(transient ? "transient" : "provider_outage", msg, {
      provider: error.provider,
      status,
      severity: transient ? "medium" : "high",
      retriable: transient && !error.fatal,
      shouldCountAsProviderFailure: error.fatal || transient,
    });
  }

  if (error instanceof ZodError) {
    return build("validation", msg, {});
  }

  if (name === "AbortError") {
    return build("cancelled", msg, { severity: "low" });
  }

  if (name === "TimeoutError" || TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
    return build("transient", msg, { retriable: true });
  }

  if (RATE_LIMIT_PATTERNS.some((p) => p.test(msg))) {
    return build("transient", msg, { retriable: true, shouldCountAsProviderFailure: true });
  }

  if (error instanceof SyntaxError || PARSE_PATTERNS.some((p) => p.test(msg))) {
    return build("parse", msg, {});
  }

  if (error instanceof PipelineError) {
    return build("unknown", msg, { severity: error.severity });
  }

  return build("unknown", msg, {});
}

function build(
  category: ErrorCategory,
  message: string,
  overrides: Partial<Omit<ClassifiedError, "category" | "message">>,
): ClassifiedError {
  return {
    category,
    provider: null,
    status: null,
    message,
    severity: "medium",
    retriable: false,
    shouldCountAsProviderFailure: false,
    ...overrides,
  };
}
