import type { ProviderAdapter, LLMRequest, LLMResponse } from '../../types/index.js';
import { fetchWithTimeout } from '../../utils/http.js';
import { translateRequest } from './request.js';
import { translateResponse } from './response.js';

export const ANTHROPIC_BASE_URL = 'https://api.anthropic.com';

export class AnthropicAdapter implements ProviderAdapter {
  readonly name = 'anthropic';
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(apiKey: string, options?: { readonly baseUrl?: string }) {
    this.apiKey = apiKey;
    this.baseUrl = options?.baseUrl || ANTHROPIC_BASE_URL;
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const { url, headers, body } = translateRequest(request, this.apiKey, this.baseUrl);

    const result = await fetchWithTimeout({
      url,
      method: 'POST',
      headers,
      body,
      timeout: request.timeout,
      signal: request.signal,
      provider: this.name,
    });

    return translateResponse(result.body);
  }
}

export { translateRequest, translateResponse };
