import type { ToolOutcome } from './outcome.js';
import type { ToolArgs } from './tool.js';

export type UserTurn = {
  readonly kind: 'user';
  readonly ordinal: number;
  readonly content: string;
};

/** Raw model text, directives included. */
export type AssistantTurn = {
  readonly kind: 'assistant';
  readonly ordinal: number;
  readonly content: string;
};

/**
 * `toolName` and `args` are null when the directive could not be parsed
 * far enough to recover them.
 */
export type ToolResultTurn = {
  readonly kind: 'tool_result';
  readonly ordinal: number;
  readonly toolName: string | null;
  readonly args: ToolArgs | null;
  readonly outcome: ToolOutcome;
};

export type Turn = UserTurn | AssistantTurn | ToolResultTurn;
