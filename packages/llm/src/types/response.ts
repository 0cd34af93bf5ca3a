export type FinishReason = 'stop' | 'length' | 'content_filter' | 'error';

export type Usage = {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
};

export function usageAdd(a: Readonly<Usage>, b: Readonly<Usage>): Usage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}

export function emptyUsage(): Usage {
  return {
    inputTokens: 0,
    outputTokens: 0,
    totalTokens: 0,
  };
}

export type LLMResponse = {
  readonly id: string;
  readonly model: string;
  /** Concatenated text blocks of the reply, in the order the provider sent them. */
  readonly text: string;
  readonly finishReason: FinishReason;
  readonly usage: Usage;
};
