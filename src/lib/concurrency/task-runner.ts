/**
 * Concurrency Controller
 *
 * Runs batches of async tasks with a bounded number in flight, a per-task
 * timeout, optional retry with exponential backoff, and cancellation through
 * an AbortSignal. Partial failure is the normal case: every input task yields
 * exactly one TaskResult and the controller never rejects because a task did.
 *
 * One p-limit semaphore per controller bounds every run in flight at once,
 * so concurrent `runAll` calls on a shared controller share maxConcurrent.
 *
 * Modes:
 * - sequential: one task at a time, input order
 * - parallel:   all tasks behind a p-limit semaphore, input order
 * - batched:    chunks of maxConcurrent with a pause between chunks
 * - streamed:   completion order (see also `stream()`)
 *
 * @module concurrency/task-runner
 */

import pLimit from "p-limit";
import { classifyError } from "../error-classification";
import { errorMessage } from "../errors";
import { DEFAULT_CONCURRENCY_CONFIG, type ConcurrencyConfig, type RetryConfig } from "../config-schemas";

// ============================================================================
// TYPES
// ============================================================================

export type ExecutionMode = "sequential" | "parallel" | "batched" | "streamed";

export interface Task<T> {
  id: string;
  run: (signal: AbortSignal) => Promise<T>;
  timeoutMs?: number;
  /** Retry budget on top of the first attempt. */
  retries?: number;
  shouldRetry?: (error: unknown) => boolean;
}

export interface TaskResult<T> {
  taskId: string;
  success: boolean;
  value?: T;
  error?: string;
  cause?: unknown;
  durationMs: number;
  retryCount: number;
  timedOut: boolean;
  cancelled: boolean;
}

export interface RunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ControllerMetrics {
  totalTasks: number;
  completedTasks: number;
  failedTasks: number;
  timedOutTasks: number;
  cancelledTasks: number;
  totalRetries: number;
  averageDurationMs: number;
  peakConcurrency: number;
  activeTasks: number;
}

export class TaskTimeoutError extends Error {
  constructor(
    public readonly taskId: string,
    public readonly timeoutMs: number,
  ) {
    super(`Task ${taskId} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class TaskCancelledError extends Error {
  constructor(public readonly taskId: string) {
    super(`Task ${taskId} was cancelled`);
    this.name = "AbortError";
  }
}

// ============================================================================
// PRIMITIVES
// ============================================================================

/**
 * Resolve after `ms`, or immediately once `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface RetryOptions extends RetryConfig {
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

/**
 * Call `fn` until it succeeds or the retry budget is spent.
 * Attempt n (0-based) that fails waits baseDelayMs × backoffFactor^n before
 * the next one; the last error is rethrown.
 */
export async function retryWithBackoff<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxRetries, baseDelayMs, backoffFactor, signal, shouldRetry, onRetry } = options;
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      const retryable = shouldRetry ? shouldRetry(err) : true;
      if (!retryable || attempt === maxRetries || signal?.aborted) break;

      const delayMs = baseDelayMs * Math.pow(backoffFactor, attempt);
      onRetry?.(attempt + 1, err, delayMs);
      await sleep(delayMs, signal);
      if (signal?.aborted) break;
    }
  }

  throw lastError;
}

/** Default retry predicate: transient and unclassified failures only. */
export function isRetriableError(error: unknown): boolean {
  const classified = classifyError(error);
  return classified.retriable || classified.category === "unknown";
}

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

// ============================================================================
// CONTROLLER
// ============================================================================

export class ConcurrencyController {
  private readonly config: ConcurrencyConfig;
  private readonly limit: ReturnType<typeof pLimit>;
  private activeTasks = 0;
  private peakConcurrency = 0;
  private totals = {
    totalTasks: 0,
    completedTasks: 0,
    failedTasks: 0,
    timedOutTasks: 0,
    cancelledTasks: 0,
    totalRetries: 0,
    totalDurationMs: 0,
  };

  constructor(config: Partial<ConcurrencyConfig> = {}) {
    this.config = { ...DEFAULT_CONCURRENCY_CONFIG, ...config };
    this.limit = pLimit(this.config.maxConcurrent);
  }

  get maxConcurrent(): number {
    return this.config.maxConcurrent;
  }

  /**
   * Run every task and return one result per task. Order follows the input
   * except in streamed mode, which reports completion order.
   */
  async runAll<T>(tasks: Task<T>[], mode: ExecutionMode = "parallel", options: RunOptions = {}): Promise<TaskResult<T>[]> {
    if (tasks.length === 0) return [];

    switch (mode) {
      case "sequential": {
        const results: TaskResult<T>[] = [];
        for (const task of tasks) {
          results.push(await this.limit(() => this.execute(task, options)));
        }
        return results;
      }
      case "parallel": {
        return Promise.all(tasks.map((task) => this.limit(() => this.execute(task, options))));
      }
      case "batched": {
        const batchSize = Math.min(tasks.length, this.config.maxConcurrent);
        const results: TaskResult<T>[] = [];
        for (let i = 0; i < tasks.length; i += batchSize) {
          const batch = tasks.slice(i, i + batchSize);
          results.push(...(await Promise.all(batch.map((task) => this.limit(() => this.execute(task, options))))));
          if (i + batchSize < tasks.length) {
            await sleep(this.config.batchDelayMs, options.signal);
          }
        }
        return results;
      }
      case "streamed": {
        const results: TaskResult<T>[] = [];
        for await (const result of this.stream(tasks, options)) {
          results.push(result);
        }
        return results;
      }
    }
  }

  /**
   * Yield results as tasks finish, with at most maxConcurrent in flight.
   */
  async *stream<T>(tasks: Task<T>[], options: RunOptions = {}): AsyncGenerator<TaskResult<T>> {
    const pending = new Map<number, Promise<{ index: number; result: TaskResult<T> }>>();

    tasks.forEach((task, index) => {
      pending.set(
        index,
        this.limit(() => this.execute(task, options)).then((result) => ({ index, result })),
      );
    });

    while (pending.size > 0) {
      const next = await Promise.race(pending.values());
      pending.delete(next.index);
      yield next.result;
    }
  }

  private async execute<T>(task: Task<T>, options: RunOptions): Promise<TaskResult<T>> {
    const startedAt = Date.now();
    const parent = options.signal;
    this.totals.totalTasks++;

    if (parent?.aborted) {
      this.totals.cancelledTasks++;
      this.totals.failedTasks++;
      return {
        taskId: task.id,
        success: false,
        error: "cancelled before start",
        cause: new TaskCancelledError(task.id),
        durationMs: 0,
        retryCount: 0,
        timedOut: false,
        cancelled: true,
      };
    }

    const controller = new AbortController();
    const onParentAbort = () => controller.abort(new TaskCancelledError(task.id));
    parent?.addEventListener("abort", onParentAbort, { once: true });

    const timeoutMs = task.timeoutMs ?? options.timeoutMs ?? this.config.taskTimeoutMs;
    const timer = setTimeout(() => controller.abort(new TaskTimeoutError(task.id, timeoutMs)), timeoutMs);

    let retryCount = 0;
    this.activeTasks++;
    this.peakConcurrency = Math.max(this.peakConcurrency, this.activeTasks);

    try {
      const attempt = retryWithBackoff(() => task.run(controller.signal), {
        ...this.config.retry,
        maxRetries: task.retries ?? 0,
        signal: controller.signal,
        shouldRetry: task.shouldRetry ?? isRetriableError,
        onRetry: (n, err, delayMs) => {
          retryCount = n;
          console.warn(`[Task-Runner] ${task.id}: retry ${n} in ${delayMs}ms (${errorMessage(err)})`);
        },
      });
      const value = await raceAbort(attempt, controller.signal);
      const durationMs = Date.now() - startedAt;
      this.totals.completedTasks++;
      this.totals.totalRetries += retryCount;
      this.totals.totalDurationMs += durationMs;
      return { taskId: task.id, success: true, value, durationMs, retryCount, timedOut: false, cancelled: false };
    } catch (err) {
      const durationMs = Date.now() - startedAt;
      const timedOut = err instanceof TaskTimeoutError;
      const cancelled = err instanceof TaskCancelledError;
      this.totals.failedTasks++;
      this.totals.totalRetries += retryCount;
      this.totals.totalDurationMs += durationMs;
      if (timedOut) this.totals.timedOutTasks++;
      if (cancelled) this.totals.cancelledTasks++;
      return {
        taskId: task.id,
        success: false,
        error: errorMessage(err),
        cause: err,
        durationMs,
        retryCount,
        timedOut,
        cancelled,
      };
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
      this.activeTasks--;
    }
  }

  // ==========================================================================
  // METRICS
  // ==========================================================================

  getMetrics(): ControllerMetrics {
    const finished = this.totals.completedTasks + this.totals.failedTasks;
    return {
      totalTasks: this.totals.totalTasks,
      completedTasks: this.totals.completedTasks,
      failedTasks: this.totals.failedTasks,
      timedOutTasks: this.totals.timedOutTasks,
      cancelledTasks: this.totals.cancelledTasks,
      totalRetries: this.totals.totalRetries,
      averageDurationMs: finished > 0 ? this.totals.totalDurationMs / finished : 0,
      peakConcurrency: this.peakConcurrency,
      activeTasks: this.activeTasks,
    };
  }

  resetMetrics(): void {
    this.peakConcurrency = this.activeTasks;
    this.totals = {
      totalTasks: 0,
      completedTasks: 0,
      failedTasks: 0,
      timedOutTasks: 0,
      cancelledTasks: 0,
      totalRetries: 0,
      totalDurationMs: 0,
    };
  }
}
