export interface RetryOptions {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  retryable?: (error: unknown) => boolean;
  /** Called before each wait; `attempt` is the 1-based attempt that just failed. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Transient failures worth another attempt: HTTP 408/429/5xx carried in
 * the message, socket-level errors and timeouts.
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === "TimeoutError" || error.name === "AbortError") return true;
  const msg = error.message;
  if (/\b(408|429|500|502|503|504)\b/.test(msg)) return true;
  if (/ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|EAI_AGAIN|fetch failed/i.test(msg)) return true;
  return false;
}

/**
 * Full-jitter exponential backoff: random delay in [0, min(cap, base * 2^attempt)]
 */
function fullJitterDelay(attempt: number, minMs: number, maxMs: number): number {
  const exponential = Math.min(maxMs, minMs * Math.pow(2, attempt));
  return Math.random() * exponential;
}

/**
 * Retry an async function with full-jitter exponential backoff.
 * Defaults: 5 attempts, 1s–30s delay range.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 5,
    minDelayMs = 1000,
    maxDelayMs = 30000,
    retryable = isTransientError,
    onRetry,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn(attempt + 1);
    } catch (error) {
      lastError = error;

      const isLast = attempt === maxAttempts - 1;
      if (isLast || !retryable(error)) {
        throw error;
      }

      const delay = fullJitterDelay(attempt, minDelayMs, maxDelayMs);
      onRetry?.(error, attempt + 1, delay);
      await new Promise<void>((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}
