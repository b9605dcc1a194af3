import { setTimeout as delay } from "node:timers/promises";
import { RetryExhaustedError } from "../errors/app.errors.js";

export interface RetryOptions {
  maxAttempts: number;
  delayMs: number;
  /** Errors for which this returns false are rethrown without retrying. */
  isRetryable: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<unknown>;
  onRetry?: (attempt: number, error: unknown) => void;
}

/**
 * Runs `operation` until it succeeds or `maxAttempts` retryable failures have
 * happened, waiting a fixed `delayMs` between consecutive attempts.
 * Throws `RetryExhaustedError` with the last failure as its cause.
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
    throw new RangeError("maxAttempts must be a positive integer");
  }
  const sleep = options.sleep ?? delay;

  let lastError: unknown;
  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!options.isRetryable(error)) {
        throw error;
      }
      lastError = error;
      if (attempt < options.maxAttempts) {
        options.onRetry?.(attempt, error);
        await sleep(options.delayMs);
      }
    }
  }

  throw new RetryExhaustedError(options.maxAttempts, lastError);
}
