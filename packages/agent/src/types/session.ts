import type { TransportError } from './error.js';

export type LoopState =
  | 'AWAITING_USER_INPUT'
  | 'REQUESTING_MODEL'
  | 'DISPATCHING_TOOLS'
  | 'PRESENTING_RESPONSE'
  | 'CLOSED';

export type SessionConfig = {
  readonly model: string;
  readonly provider?: string;
  /** Tool rounds allowed per user input before the latest text is presented as-is. */
  readonly maxToolRounds?: number;
  readonly requestTimeoutMs?: number;
  readonly maxTokens?: number;
  readonly temperature?: number;
  /** Replaces the generated system prompt. */
  readonly systemPrompt?: string;
};

export type SubmitResult =
  | { readonly kind: 'response'; readonly text: string }
  | { readonly kind: 'error'; readonly error: TransportError }
  | { readonly kind: 'cancelled' };
