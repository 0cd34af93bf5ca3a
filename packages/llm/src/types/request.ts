import type { Message } from './message.js';
import type { TimeoutConfig } from './config.js';

export type LLMRequest = {
  readonly model: string;
  readonly provider?: string;
  readonly system?: string;
  readonly messages: ReadonlyArray<Message>;
  readonly maxTokens?: number;
  readonly temperature?: number;
  readonly timeout?: TimeoutConfig;
  readonly signal?: AbortSignal;
};
