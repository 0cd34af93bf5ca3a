import type { LLMRequest } from '../../types/index.js';

type RequestOutput = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
};

type AnthropicMessage = {
  readonly role: 'user' | 'assistant';
  readonly content: Array<{ readonly type: 'text'; readonly text: string }>;
};

export const ANTHROPIC_VERSION = '2023-06-01';

export function translateRequest(
  request: Readonly<LLMRequest>,
  apiKey: string,
  baseUrl: string,
): RequestOutput {
  const url = `${baseUrl.replace(/\/+$/, '')}/v1/messages`;
  const headers: Record<string, string> = {
    'x-api-key': apiKey,
    'anthropic-version': ANTHROPIC_VERSION,
    'Content-Type': 'application/json',
  };

  const body: Record<string, unknown> = {
    model: request.model,
    max_tokens: request.maxTokens || 4096,
  };

  if (request.system) {
    body['system'] = [{ type: 'text', text: request.system }];
  }

  // The Messages API requires alternating roles: adjacent same-role
  // messages are merged into one message with several text blocks.
  const messages: Array<AnthropicMessage> = [];
  for (const message of request.messages) {
    if (message.content.length === 0) {
      continue;
    }

    const block = { type: 'text' as const, text: message.content };
    const lastMessage = messages[messages.length - 1];
    if (lastMessage && lastMessage.role === message.role) {
      lastMessage.content.push(block);
    } else {
      messages.push({ role: message.role, content: [block] });
    }
  }
  body['messages'] = messages;

  if (request.temperature !== undefined) {
    body['temperature'] = request.temperature;
  }

  return { url, headers, body };
}
