/**
 * Retry Utilities
 *
 * Exponential backoff shared by the orchestrator's staffing retries and
 * checkpoint conflict handling.
 */

import type { BackoffConfig } from "./config";
import { DEFAULT_BACKOFF_CONFIG } from "./config";

// ============================================================================
// Retry Types
// ============================================================================

export interface RetryOptions {
  /** Maximum number of attempts (including first try) */
  maxAttempts?: number;

  backoff?: Partial<BackoffConfig>;

  /** Predicate to determine if error is retryable */
  isRetryable?: (error: unknown) => boolean;

  /** Callback on each retry attempt */
  onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;

  signal?: AbortSignal;
}

export interface RetryResult<T> {
  success: boolean;
  result?: T;
  /** The final error if all attempts failed */
  error?: unknown;
  attempts: number;
  totalTimeMs: number;
}

// ============================================================================
// Backoff
// ============================================================================

/**
 * Delay before retry number `attempt` (1-based): initial * multiplier^(attempt-1),
 * capped at maxDelayMs.
 */
export function computeBackoffDelay(
  attempt: number,
  config: Partial<BackoffConfig> = {},
  random: () => number = Math.random
): number {
  const { initialDelayMs, maxDelayMs, multiplier, jitter } = {
    ...DEFAULT_BACKOFF_CONFIG,
    ...config,
  };
  const exponent = Math.max(0, attempt - 1);
  const delay = Math.min(initialDelayMs * multiplier ** exponent, maxDelayMs);
  if (!jitter) {
    return delay;
  }
  return delay + random() * delay * 0.25;
}

// ============================================================================
// Retry Implementation
// ============================================================================

/**
 * Execute a function with retry logic and exponential backoff.
 *
 * @example
 * ```typescript
 * const result = await retry(() => writeCheckpoint(), {
 *   maxAttempts: 5,
 *   isRetryable: (error) => error instanceof VersionConflictError,
 * });
 * ```
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const { maxAttempts = 3, backoff, isRetryable = () => true, onRetry, signal } = options;

  const startTime = Date.now();
  let lastError: unknown;
  let attempts = 0;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      return {
        success: false,
        error: new Error("Aborted"),
        attempts,
        totalTimeMs: Date.now() - startTime,
      };
    }

    attempts = attempt;
    try {
      const result = await fn(attempt);
      return { success: true, result, attempts, totalTimeMs: Date.now() - startTime };
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts || !isRetryable(error)) {
        break;
      }

      const delay = computeBackoffDelay(attempt, backoff);
      onRetry?.(attempt, error, delay);
      await sleep(delay, signal);
    }
  }

  return {
    success: false,
    error: lastError,
    attempts,
    totalTimeMs: Date.now() - startTime,
  };
}

/**
 * Sleep for a duration, respecting abort signal.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (ms <= 0) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timeout);
      reject(new Error("Aborted"));
    };
    const timeout = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
