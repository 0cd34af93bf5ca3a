import type { LLMResponse, FinishReason } from '../../types/index.js';
import { isRecord, numberField, recordArrayField, recordField, stringField } from '../../utils/json.js';

export function translateResponse(raw: unknown): LLMResponse {
  const record = isRecord(raw) ? raw : {};

  // Only text blocks carry the reply; tool calls travel inside the text
  const text = recordArrayField(record, 'content')
    .filter((item) => item['type'] === 'text')
    .map((item) => stringField(item, 'text'))
    .join('');

  const rawUsage = recordField(record, 'usage');
  const inputTokens = numberField(rawUsage, 'input_tokens');
  const outputTokens = numberField(rawUsage, 'output_tokens');

  const stopReason = stringField(record, 'stop_reason');
  let finishReason: FinishReason = 'stop';
  if (stopReason === 'max_tokens') {
    finishReason = 'length';
  } else if (stopReason === 'refusal') {
    finishReason = 'content_filter';
  }

  return {
    id: stringField(record, 'id'),
    model: stringField(record, 'model'),
    text,
    finishReason,
    usage: {
      inputTokens,
      outputTokens,
      totalTokens: inputTokens + outputTokens,
    },
  };
}
