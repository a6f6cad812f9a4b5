/**
 * Transport-level retry and timeout helpers.
 *
 * Used for remote calls whose SDK has no retry policy of its own (Gemini) and
 * as a client-side guard around data store calls. Semantic retries of the SQL
 * pipeline live in the query executor, not here.
 */

import { BACKOFF_CONSTANTS } from "../config/constants";
import { logWarn } from "./logger";

export interface RetryOptions {
  maxAttempts?: number;
  initialDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
  timeout?: number;
  isRetryable?: (error: Error) => boolean;
}

export class TimeoutError extends Error {
  timeoutMs: number;
  constructor(message: string, timeoutMs: number) {
    super(`${message} (after ${timeoutMs}ms)`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage = "Operation timed out",
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(errorMessage, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export function isRetryableError(error: Error): boolean {
  if (error instanceof TimeoutError) return true;
  const message = error.message.toLowerCase();

  if (
    message.includes("network") ||
    message.includes("timeout") ||
    message.includes("econnreset") ||
    message.includes("econnrefused") ||
    message.includes("fetch failed")
  ) {
    return true;
  }

  if (message.includes("rate limit") || message.includes("429") || message.includes("too many requests")) {
    return true;
  }

  if (
    message.includes("500") ||
    message.includes("502") ||
    message.includes("503") ||
    message.includes("504") ||
    message.includes("unavailable") ||
    message.includes("overloaded")
  ) {
    return true;
  }

  return false;
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  operation: string,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelay = BACKOFF_CONSTANTS.INITIAL_DELAY_MS,
    maxDelay = BACKOFF_CONSTANTS.MAX_DELAY_MS,
    backoffMultiplier = BACKOFF_CONSTANTS.MULTIPLIER,
    timeout,
    isRetryable = isRetryableError,
  } = options;

  let delay = initialDelay;

  for (let attempt = 1; ; attempt++) {
    try {
      const pending = fn();
      return timeout === undefined
        ? await pending
        : await withTimeout(pending, timeout, `${operation} timed out`);
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= maxAttempts || !isRetryable(lastError)) {
        throw lastError;
      }

      logWarn(`[Retry] ${operation} failed, retrying in ${delay}ms`, {
        attempt,
        maxAttempts,
        error: lastError.message,
      });
      await sleep(delay);
      delay = Math.min(delay * backoffMultiplier, maxDelay);
    }
  }
}
