import type { LLMResponse, FinishReason } from '../../types/index.js';
import { isRecord, numberField, recordArrayField, recordField, stringField } from '../../utils/json.js';

export function translateResponse(raw: unknown): LLMResponse {
  const record = isRecord(raw) ? raw : {};

  const firstChoice = recordArrayField(record, 'choices')[0];
  const message = recordField(firstChoice, 'message');

  const rawUsage = recordField(record, 'usage');
  const inputTokens = numberField(rawUsage, 'prompt_tokens');
  const outputTokens = numberField(rawUsage, 'completion_tokens');

  let finishReason: FinishReason = 'stop';
  const rawFinishReason = stringField(firstChoice, 'finish_reason');
  if (rawFinishReason === 'length') {
    finishReason = 'length';
  } else if (rawFinishReason === 'content_filter') {
    finishReason = 'content_filter';
  }

  return {
    id: stringField(record, 'id'),
    model: stringField(record, 'model'),
    text: stringField(message, 'content'),
    finishReason,
    usage: {
      inputTokens,
      outputTokens,
      totalTokens: numberField(rawUsage, 'total_tokens') || inputTokens + outputTokens,
    },
  };
}
