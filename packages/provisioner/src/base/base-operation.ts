/**
 * Base Operation
 *
 * Abstract base class for long-running provisioning operations.
 * Provides logging, cancellable sleeps and retry with backoff.
 */

import { formatFields, type FieldValue } from "../utils/format-fields";

export type LogCallback = (line: string, stream: "stdout" | "stderr") => void;

/** Sleep that rejects with OperationCancelledError when the signal aborts */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Injectable timing primitives, overridden in tests */
export interface OperationRuntime {
  sleep?: SleepFn;
  now?: () => number;
}

export interface RetryOptions {
  maxAttempts?: number;
  delayMs?: number;
  backoffMultiplier?: number;
  description?: string;
  shouldRetry?: (error: Error) => boolean;
  signal?: AbortSignal;
}

/** Raised when an AbortSignal interrupts a wait */
export class OperationCancelledError extends Error {
  constructor(message = "Operation cancelled") {
    super(message);
    this.name = "OperationCancelledError";
  }
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Abstract base class for provisioning operations.
 */
export abstract class BaseOperation {
  protected logCallback?: LogCallback;

  private readonly sleepFn: SleepFn;
  protected readonly now: () => number;

  constructor(runtime: OperationRuntime = {}) {
    this.sleepFn = runtime.sleep ?? abortableSleep;
    this.now = runtime.now ?? Date.now;
  }

  /**
   * Set a callback to receive log output during operations.
   */
  setLogCallback(cb: LogCallback): void {
    this.logCallback = cb;
  }

  /**
   * Emit a log line to the registered callback.
   */
  protected log(message: string, stream: "stdout" | "stderr" = "stdout"): void {
    if (this.logCallback) {
      this.logCallback(message, stream);
    }
  }

  /**
   * Emit a structured `[tag] key=value` line.
   */
  protected logFields(
    tag: string,
    fields: Record<string, FieldValue>,
    stream: "stdout" | "stderr" = "stdout"
  ): void {
    this.log(formatFields(tag, fields), stream);
  }

  /**
   * Sleep for specified milliseconds; rejects early if the signal aborts.
   */
  protected sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return this.sleepFn(ms, signal);
  }

  /**
   * Execute an operation with retry logic.
   *
   * @param operation - Async function to execute
   * @param options - Retry options
   * @returns Result of the operation
   * @throws Last error if all retries fail or shouldRetry declines
   */
  protected async withRetry<T>(
    operation: () => Promise<T>,
    options: RetryOptions = {}
  ): Promise<T> {
    const {
      maxAttempts = 3,
      delayMs = 1000,
      backoffMultiplier = 2,
      description = "operation",
      shouldRetry = () => true,
      signal,
    } = options;

    let currentDelay = delayMs;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt >= maxAttempts || !shouldRetry(lastError)) {
          throw lastError;
        }

        this.log(
          `${description} failed (attempt ${attempt}/${maxAttempts}): ${lastError.message}. Retrying in ${currentDelay}ms...`,
          "stderr"
        );

        await this.sleep(currentDelay, signal);
        currentDelay *= backoffMultiplier;
      }
    }
  }
}
