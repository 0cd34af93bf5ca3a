import { AbortError, ProviderError } from '../types/error.js';
import type { RetryPolicy } from '../types/config.js';

export type RetryOptions = {
  readonly policy: RetryPolicy;
  readonly signal?: AbortSignal;
  readonly onRetry?: (error: ProviderError, attempt: number, delayMs: number) => void;
  readonly random?: () => number;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export function calculateBackoff(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
): number {
  const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
  return Math.min(exponentialDelay, maxDelayMs);
}

/**
 * Retries one model request with exponential backoff.
 *
 * Only retryable ProviderErrors (rate limits, 5xx) are retried. A Retry-After
 * longer than the policy's maxDelayMs ends the retries. Wrap a single request,
 * never a sequence of steps.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { policy, signal, onRetry, random = Math.random, sleep = delay } = options;
  const { maxRetries, initialDelayMs, maxDelayMs, backoffMultiplier } = policy;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof ProviderError) || !error.retryable || attempt >= maxRetries) {
        throw error;
      }

      let delayMs = calculateBackoff(attempt, initialDelayMs, maxDelayMs, backoffMultiplier);

      if (error.retryAfter !== null) {
        if (error.retryAfter > maxDelayMs) {
          throw error;
        }
        delayMs = error.retryAfter;
      }

      // 0-25% jitter
      const finalDelayMs = delayMs + random() * 0.25 * delayMs;

      onRetry?.(error, attempt + 1, finalDelayMs);

      await sleep(finalDelayMs, signal);
    }
  }
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortError('Retry was aborted'));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortError('Retry was aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
