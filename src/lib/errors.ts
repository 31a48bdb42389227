/**
 * Error types shared across the analyzer.
 *
 * @module errors
 */

export type ErrorSeverity = "low" | "medium" | "high" | "critical";

/** How a stage reacts when it fails. */
export type RecoveryStrategy = "ignore" | "retry" | "fallback" | "skip" | "fail";

/**
 * Raised (or produced by wrapping) inside a pipeline stage. Carries the
 * severity used to pick a recovery strategy and free-form context that ends
 * up in the error ledger.
 */
export class PipelineError extends Error {
  readonly severity: ErrorSeverity;
  readonly recovery: RecoveryStrategy | null;
  readonly stage: string | null;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      severity?: ErrorSeverity;
      recovery?: RecoveryStrategy | null;
      stage?: string | null;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PipelineError";
    this.severity = options.severity ?? "medium";
    this.recovery = options.recovery ?? null;
    this.stage = options.stage ?? null;
    this.context = options.context ?? {};
  }
}

/**
 * Transport or HTTP failure from an evidence provider (structured API,
 * search engine, page fetch). `fatal` marks failures that should count
 * against the provider's circuit (quota, auth, outage).
 */
export class ProviderError extends Error {
  constructor(
    public readonly provider: string,
    public readonly status: number | undefined,
    public readonly fatal: boolean,
    message: string,
  ) {
    super(message);
    this.name = "ProviderError";
  }
}

/** Provider answered, but the payload did not match its contract. */
export class ProviderContractError extends Error {
  constructor(
    public readonly provider: string,
    message: string,
  ) {
    super(message);
    this.name = "ProviderContractError";
  }
}

export interface ProviderErrorInfo {
  provider: string;
  status?: number;
  message: string;
  fatal: boolean;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
