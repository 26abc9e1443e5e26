/**
 * Exponential Backoff with Jitter
 *
 * Base delay doubles each attempt: 1s, 2s, 4s, 8s, 16s (capped at 30s).
 * Jitter adds +/-25% randomness so concurrent workers do not retry in step.
 *
 * Logs go to stderr; stdout carries the MCP JSON-RPC stream.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Maximum number of attempts, the first call included (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25) */
  jitterFraction: number;
  /** Log tag for retry messages */
  label: string;
}

const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 3,
  jitterFraction: 0.25,
  label: 'Backoff',
};

/**
 * Delay for a zero-indexed attempt: min(baseDelay * 2^attempt, maxDelay) +/- jitter
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const cappedDelay = Math.min(cfg.baseDelayMs * Math.pow(2, attempt), cfg.maxDelayMs);
  const jitter = (Math.random() * 2 - 1) * cappedDelay * cfg.jitterFraction;
  return Math.max(0, Math.round(cappedDelay + jitter));
}

export function backoffSleep(attempt: number, config?: Partial<BackoffConfig>): Promise<void> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const delay = calculateBackoffDelay(attempt, cfg);
  console.error(`[${cfg.label}] Attempt ${attempt + 1} failed, waiting ${delay}ms`);
  return new Promise((resolve) => setTimeout(resolve, delay));
}

/**
 * Execute a function with retry and exponential backoff.
 *
 * Errors rejected by `shouldRetry` are re-thrown immediately.
 *
 * @throws The last error if all attempts fail
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig>
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) throw error;
      if (attempt < cfg.maxAttempts - 1) {
        await backoffSleep(attempt, cfg);
      }
    }
  }

  throw lastError;
}
