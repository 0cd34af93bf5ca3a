// @filewright/llm: provider-neutral model client

export * from './types/index.js';
export * from './client/index.js';
export { AnthropicAdapter, ANTHROPIC_BASE_URL } from './providers/anthropic/index.js';
export { OpenAICompatibleAdapter, type OpenAICompatibleOptions } from './providers/openai-compatible/index.js';
export { fetchWithTimeout, type FetchOptions, type FetchResult } from './utils/http.js';
export { mapHttpError, parseRetryAfter } from './utils/error-mapping.js';
export { retry, calculateBackoff, type RetryOptions } from './utils/retry.js';
