import type { ProviderAdapter, RetryPolicy } from '../types/index.js';

export type ClientConfig = {
  readonly providers: Record<string, ProviderAdapter>;
  readonly defaultProvider?: string;
  readonly retryPolicy?: RetryPolicy;
};

/**
 * Default retry policy for client.complete().
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialDelayMs: 250,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
};
