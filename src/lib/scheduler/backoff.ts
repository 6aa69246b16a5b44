import { CaptureExhaustedError } from '../errors';
import { Sleep } from '../runtime';

export interface BackoffParams {
  maxRetries: number;   // Attempts per acquisition cycle (default 5)
  backoffBase: number;  // Delay after attempt n is base^n seconds (default 2)
  maxBackoffMs: number; // Cap on a single delay (default 60000)
}

export function backoffDelayMs(attempt: number, params: BackoffParams): number {
  return Math.min(params.backoffBase ** attempt * 1000, params.maxBackoffMs);
}

export interface RetryOptions {
  sleep: Sleep;
  signal?: AbortSignal;
  onFailure?: (attempt: number, error: unknown, delayMs: number) => void;
}

/**
 * Run `operation` until it succeeds, waiting `backoffDelayMs(n)` after the
 * n-th failure. Resolves `null` if the signal aborts first; throws
 * `CaptureExhaustedError` once `maxRetries` attempts have failed.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  params: BackoffParams,
  options: RetryOptions
): Promise<T | null> {
  let totalDelayMs = 0;
  let lastError: unknown;

  for (let attempt = 1; attempt <= params.maxRetries; attempt++) {
    if (options.signal?.aborted) {
      return null;
    }
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      const delayMs = backoffDelayMs(attempt, params);
      options.onFailure?.(attempt, error, delayMs);
      totalDelayMs += delayMs;
      await options.sleep(delayMs, options.signal);
    }
  }

  if (options.signal?.aborted) {
    return null;
  }
  throw new CaptureExhaustedError(params.maxRetries, totalDelayMs, { cause: lastError });
}
