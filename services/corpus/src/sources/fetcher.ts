import { NetworkFetchError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { isTransientError, withRetry } from "../utils/retry.js";
import type { FetchedResource } from "./types.js";

export interface FetchOptions {
  timeoutMs: number;
  maxAttempts: number;
  minDelayMs: number;
  maxDelayMs: number;
  logger?: Logger;
}

const RETRYABLE_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);

function isRetryableFetchError(error: unknown): boolean {
  if (error instanceof NetworkFetchError && error.status !== undefined) {
    return RETRYABLE_STATUS.has(error.status);
  }
  return isTransientError(error) || isTransientError(error instanceof Error ? error.cause : undefined);
}

/**
 * GET a remote source. Each attempt is bounded by `timeoutMs`; transient
 * failures are retried with backoff. Resolves only with a complete body.
 */
export async function fetchResource(url: string, options: FetchOptions): Promise<FetchedResource> {
  const { timeoutMs, maxAttempts, minDelayMs, maxDelayMs, logger = silentLogger } = options;

  try {
    return await withRetry(
      async (attempt) => {
        logger.debug("Fetching", { url, attempt });
        const response = await fetch(url, {
          redirect: "follow",
          signal: AbortSignal.timeout(timeoutMs),
          headers: {
            "User-Agent": "corpus-prep/0.1",
            Accept: "text/html,application/xhtml+xml,application/pdf,text/markdown,text/plain;q=0.9,*/*;q=0.8",
          },
        });

        if (!response.ok) {
          throw new NetworkFetchError(url, `HTTP ${response.status} ${response.statusText}`.trim(), response.status);
        }

        const data = new Uint8Array(await response.arrayBuffer());
        return {
          url,
          finalUrl: response.url || url,
          contentType: response.headers.get("content-type") ?? undefined,
          data,
        };
      },
      {
        maxAttempts,
        minDelayMs,
        maxDelayMs,
        retryable: isRetryableFetchError,
        onRetry: (error, attempt, delayMs) =>
          logger.warn("Fetch attempt failed, retrying", {
            url,
            attempt,
            delayMs: Math.round(delayMs),
            error: errorMessage(error),
          }),
      },
    );
  } catch (error) {
    if (error instanceof NetworkFetchError) throw error;
    throw new NetworkFetchError(url, errorMessage(error), undefined, { cause: error });
  }
}
