/**
 * Exponential Backoff with Jitter
 *
 * Base delay doubles each attempt: 500ms, 1s, 2s, ... capped at maxDelayMs.
 * Jitter adds +/-25% randomness to prevent thundering herd.
 *
 * Used for the generative metadata service only. Document AI calls and the
 * batch driver make a single attempt per item.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 10000) */
  maxDelayMs: number;
  /** Maximum number of attempts, first one included (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25 = +/-25%) */
  jitterFraction: number;
}

export interface RetryHooks {
  /** Called before each wait with the failed attempt (0-indexed) */
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
  /** Replaces the timer-based sleep */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 500,
  maxDelayMs: 10000,
  maxAttempts: 3,
  jitterFraction: 0.25,
};

/**
 * Calculate delay for a given attempt (0-indexed) with jitter.
 *
 * Formula: min(baseDelay * 2^attempt, maxDelay) +/- jitter
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const cappedDelay = Math.min(cfg.baseDelayMs * Math.pow(2, attempt), cfg.maxDelayMs);

  const jitterRange = cappedDelay * cfg.jitterFraction;
  const jitter = (Math.random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

function sleepMs(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with automatic retry and exponential backoff.
 *
 * Non-retryable errors are re-thrown immediately; after the last attempt the
 * last error is re-thrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig> & RetryHooks
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const sleep = config?.sleep ?? sleepMs;
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) throw error;
      if (attempt < cfg.maxAttempts - 1) {
        const delay = calculateBackoffDelay(attempt, cfg);
        config?.onRetry?.(attempt, delay, error);
        await sleep(delay);
      }
    }
  }

  throw lastError;
}
