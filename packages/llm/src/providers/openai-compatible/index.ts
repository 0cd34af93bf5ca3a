import type { ProviderAdapter, LLMRequest, LLMResponse } from '../../types/index.js';
import { fetchWithTimeout } from '../../utils/http.js';
import { translateRequest } from './request.js';
import { translateResponse } from './response.js';

export type OpenAICompatibleOptions = {
  readonly name?: string;
  readonly apiKey?: string;
};

/**
 * Adapter for servers speaking the Chat Completions wire format, such as a
 * local Ollama instance (`http://localhost:11434`).
 */
export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly name: string;
  private readonly apiKey: string | null;
  private readonly baseUrl: string;

  constructor(baseUrl: string, options?: OpenAICompatibleOptions) {
    this.baseUrl = baseUrl;
    this.apiKey = options?.apiKey || null;
    this.name = options?.name || 'openai-compatible';
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
