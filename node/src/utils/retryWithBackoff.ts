// Retry with exponential backoff and jitter, shared by every external-call wrapper.
import { logger } from '@/services/logger';
import { sleep } from './withTimeout';

export interface RetryOptions {
  /** Total attempts, including the first call. */
  maxAttempts?: number;
  initialDelay?: number;
  maxDelay?: number;
  jitter?: boolean;
  exponentialBase?: number;
  /** Decide whether a failure is worth another attempt. Defaults to always. */
  shouldRetry?: (error: unknown) => boolean;
  signal?: AbortSignal;
  label?: string;
}

/**
 * True for HTTP 429 responses and errors whose message mentions a rate limit.
 */
export function isRateLimitError(error: unknown): boolean {
  if (typeof error === 'object' && error !== null) {
    const status =
      'status' in error && typeof error.status === 'number'
        ? error.status
        : 'response' in error &&
            typeof error.response === 'object' &&
            error.response !== null &&
            'status' in error.response &&
            typeof error.response.status === 'number'
          ? error.response.status
          : undefined;
    if (status === 429) return true;
  }
  const message = error instanceof Error ? error.message : String(error);
  return /\b429\b|rate.?limit/i.test(message);
}

/**
 * Retry function with exponential backoff and jitter
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelay = 1000,
    maxDelay = 8000,
    jitter = true,
    exponentialBase = 2,
    shouldRetry = () => true,
    signal,
    label = 'call',
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error) || signal?.aborted) {
        throw error;
      }

      const exponentialDelay = initialDelay * Math.pow(exponentialBase, attempt - 1);
      // random 0-25% of delay
      const jitterAmount = jitter ? Math.random() * 0.25 * exponentialDelay : 0;
      const delay = Math.min(exponentialDelay + jitterAmount, maxDelay);

      logger.warn('retry:backoff', {
        label,
        attempt,
        maxAttempts,
        delayMs: Math.round(delay),
        error: error instanceof Error ? error.message : String(error),
      });
      await sleep(delay, signal);
    }
  }
}
