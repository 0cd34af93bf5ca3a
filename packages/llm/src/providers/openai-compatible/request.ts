import type { LLMRequest } from '../../types/index.js';

type RequestOutput = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
};

export function translateRequest(
  request: Readonly<LLMRequest>,
  apiKey: string | null,
  baseUrl: string,
): RequestOutput {
  const url = `${baseUrl.replace(/\/+$/, '')}/v1/chat/completions`;
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
  };
  // Local servers such as Ollama accept requests without a key
  if (apiKey) {
    headers['Authorization'] = `Bearer ${apiKey}`;
  }

  const messages: Array<Record<string, unknown>> = [];

  if (request.system) {
    messages.push({
      role: 'system',
      content: request.system,
    });
  }

  for (const message of request.messages) {
    messages.push({
      role: message.role,
      content: message.content,
    });
  }

  const body: Record<string, unknown> = {
    model: request.model,
    messages,
    stream: false,
  };

  if (request.maxTokens !== undefined) {
    body['max_tokens'] = request.maxTokens;
  }
  if (request.temperature !== undefined) {
    body['temperature'] = request.temperature;
  }

  return { url, headers, body };
}
