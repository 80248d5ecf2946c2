import {
  AnalysisCancelledError,
  AnalysisTimeoutError,
  AnalyticsError
} from "../errors.js";
import { logger } from "../utils/logger.js";

export interface AnalysisExecutorConfig {
  maxConcurrent: number;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface AnalysisHandle<T> {
  readonly result: Promise<T>;
  cancel(reason?: string): void;
}

export interface SubmitOptions {
  /** Cancels the analysis when aborted, whether it is queued or running. */
  signal?: AbortSignal;
}

export type AnalysisTask<T> = (signal: AbortSignal) => Promise<T>;

interface PendingAnalysis {
  label: string;
  controller: AbortController;
  settled: boolean;
  /** Runs the task and returns the step that settles the caller's promise. */
  execute(): Promise<() => void>;
  fail(error: unknown): void;
}

/**
 * Bounded worker pool for graph algorithm calls. Each task gets its own
 * AbortSignal, which fires on timeout or cancellation.
 */
export class AnalysisExecutor {
  private readonly config: AnalysisExecutorConfig;
  private activeCount = 0;
  private readonly queue: PendingAnalysis[] = [];

  constructor(config: Partial<AnalysisExecutorConfig> = {}) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 4,
      timeoutMs: config.timeoutMs ?? 60_000,
      maxRetries: config.maxRetries ?? 1,
      retryDelayMs: config.retryDelayMs ?? 500
    };
  }

  get stats(): { active: number; queued: number } {
    return { active: this.activeCount, queued: this.queue.length };
  }

  run<T>(label: string, task: AnalysisTask<T>, options: SubmitOptions = {}): Promise<T> {
    return this.submit(label, task, options).result;
  }

  submit<T>(label: string, task: AnalysisTask<T>, options: SubmitOptions = {}): AnalysisHandle<T> {
    const controller = new AbortController();
    let resolveResult: (value: T) => void = () => undefined;
    let rejectResult: (reason: unknown) => void = () => undefined;
    const result = new Promise<T>((resolve, reject) => {
      resolveResult = resolve;
      rejectResult = reject;
    });

    const callerSignal = options.signal;
    const onCallerAbort = (): void => {
      this.cancel(item, "caller aborted");
    };
    const settle = (finish: () => void): void => {
      if (item.settled) {
        return;
      }
      item.settled = true;
      callerSignal?.removeEventListener("abort", onCallerAbort);
      finish();
    };

    const item: PendingAnalysis = {
      label,
      controller,
      settled: false,
      execute: async () => {
        try {
          const value = await this.attempt(label, task, controller.signal);
          return () => settle(() => resolveResult(value));
        } catch (error) {
          return () => item.fail(error);
        }
      },
      fail: (error) => {
        settle(() => rejectResult(error));
      }
    };

    const cancel = (reason?: string): void => {
      this.cancel(item, reason);
    };

    if (callerSignal?.aborted) {
      cancel("caller aborted before start");
    } else {
      callerSignal?.addEventListener("abort", onCallerAbort, { once: true });
      this.queue.push(item);
      this.drainQueue();
    }

    return { result, cancel };
  }

  private cancel(item: PendingAnalysis, reason = "cancelled by caller"): void {
    if (item.settled) {
      return;
    }

    const queuedAt = this.queue.indexOf(item);
    if (queuedAt >= 0) {
      this.queue.splice(queuedAt, 1);
    }

    const error = new AnalysisCancelledError(item.label, reason);
    item.controller.abort(error);
    item.fail(error);
    logger.debug({ analysis: item.label, reason }, "Analysis cancelled");
  }

  private drainQueue(): void {
    while (this.activeCount < this.config.maxConcurrent && this.queue.length > 0) {
      const item = this.queue.shift();
      if (!item) {
        return;
      }

      this.activeCount += 1;
      void this.runInSlot(item);
    }
  }

  // The slot is released before the caller's promise settles.
  private async runInSlot(item: PendingAnalysis): Promise<void> {
    const settle = await this.executeWithTimeout(item).finally(() => {
      this.activeCount -= 1;
      this.drainQueue();
    });
    settle();
  }

  private async executeWithTimeout(item: PendingAnalysis): Promise<() => void> {
    const startedAt = Date.now();
    logger.debug({ analysis: item.label }, "Analysis started");

    const timer = setTimeout(() => {
      const error = new AnalysisTimeoutError(item.label, this.config.timeoutMs);
      item.controller.abort(error);
      item.fail(error);
      logger.warn({ analysis: item.label, timeoutMs: this.config.timeoutMs }, "Analysis timed out");
    }, this.config.timeoutMs);

    try {
      return await item.execute();
    } finally {
      clearTimeout(timer);
      logger.debug(
        { analysis: item.label, durationMs: Date.now() - startedAt },
        "Analysis finished"
      );
    }
  }

  private async attempt<T>(label: string, task: AnalysisTask<T>, signal: AbortSignal): Promise<T> {
    let attempt = 0;

    while (true) {
      try {
        return await this.untilAborted(task(signal), signal);
      } catch (error) {
        const shouldRetry =
          !signal.aborted && this.isRetryableError(error) && attempt < this.config.maxRetries;
        if (!shouldRetry) {
          throw error;
        }

        attempt += 1;
        logger.warn({ err: error, analysis: label, attempt }, "Retrying analysis after transient failure");
        await this.sleep(this.config.retryDelayMs * 2 ** (attempt - 1));
      }
    }
  }

  private untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        reject(signal.reason);
      };
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener("abort", onAbort, { once: true });
      }

      promise
        .then((value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        })
        .catch((error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        });
    });
  }

  private isRetryableError(error: unknown): boolean {
    return error instanceof AnalyticsError && error.retryable;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
