import type { LLMRequest, LLMResponse, ProviderAdapter, RetryPolicy } from '../types/index.js';
import { ConfigurationError } from '../types/index.js';
import { retry } from '../utils/retry.js';
import { DEFAULT_RETRY_POLICY, type ClientConfig } from './config.js';

export class Client {
  private readonly providers: Record<string, ProviderAdapter>;
  private readonly defaultProvider: string | null;
  private readonly retryPolicy: RetryPolicy;

  constructor(config: ClientConfig) {
    this.providers = config.providers;
    this.retryPolicy = config.retryPolicy ?? DEFAULT_RETRY_POLICY;

    // With exactly one provider registered, it is the default
    if (config.defaultProvider === undefined) {
      const providerNames = Object.keys(config.providers);
      this.defaultProvider = providerNames.length === 1 ? providerNames[0] ?? null : null;
    } else {
      this.defaultProvider = config.defaultProvider;
    }
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const provider = this.resolveProvider(request);
    const adapter = this.providers[provider];

    if (!adapter) {
      throw new ConfigurationError(`provider '${provider}' not configured`);
    }

    return retry(() => adapter.complete(request), {
      policy: this.retryPolicy,
      signal: request.signal,
    });
  }

  async close(): Promise<void> {
    const closePromises = Object.values(this.providers)
      .filter((adapter) => adapter.close !== undefined)
      .map((adapter) => adapter.close?.());

    await Promise.allSettled(closePromises);
  }

  private resolveProvider(request: LLMRequest): string {
    if (request.provider) {
      return request.provider;
    }

    if (this.defaultProvider) {
      return this.defaultProvider;
    }

    throw new ConfigurationError('no provider configured and no default set');
  }
}
