/**
 * Reusable retry logic utility
 */

import { toError } from "./logger";

export type Sleep = (ms: number) => Promise<void>;

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  backoffMultiplier?: number;
  jitterMs?: number;
  retryCondition?: (error: Error) => boolean;
  /** Called before each wait, with the 1-based number of the failed attempt */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  sleep?: Sleep;
}

export class RetryError extends Error {
  constructor(
    message: string,
    public originalError: Error,
    public attempt: number,
  ) {
    super(message);
    this.name = "RetryError";
  }
}

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retry number `attempt` (0-based), without jitter
 */
export function backoffDelay(
  baseDelayMs: number,
  attempt: number,
  backoffMultiplier = 2,
): number {
  return baseDelayMs * Math.pow(backoffMultiplier, attempt);
}

/**
 * Executes an operation with retry logic
 * @param operation - The operation to retry
 * @param options - Retry configuration
 * @returns Promise that resolves with the operation result
 * @throws RetryError if all retries are exhausted; the original error if
 * `retryCondition` rejects it
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    baseDelayMs,
    backoffMultiplier = 2,
    jitterMs = 250,
    retryCondition = () => true,
    onRetry,
    sleep: wait = sleep,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const lastError = toError(error);

      if (!retryCondition(lastError)) {
        throw lastError;
      }

      if (attempt >= maxRetries) {
        throw new RetryError(
          `Operation failed after ${attempt + 1} attempts`,
          lastError,
          attempt + 1,
        );
      }

      const jitter = jitterMs > 0 ? Math.floor(Math.random() * jitterMs) : 0;
      const delay = backoffDelay(baseDelayMs, attempt, backoffMultiplier) + jitter;

      onRetry?.(lastError, attempt + 1, delay);
      await wait(delay);
    }
  }
}

/**
 * Default retry options for database operations
 */
export const DB_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 2,
  baseDelayMs: 100,
  backoffMultiplier: 2,
  jitterMs: 50,
  retryCondition: (error) => {
    // SQLITE_BUSY / SQLITE_LOCKED
    const message = error.message.toLowerCase();
    return message.includes("locked") || message.includes("busy");
  },
};
