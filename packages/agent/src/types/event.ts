import type { LoopState } from './session.js';
import type { ToolOutcome } from './outcome.js';
import type { ToolArgs } from './tool.js';

export type EventKind =
  | 'SESSION_START'
  | 'SESSION_END'
  | 'STATE_CHANGE'
  | 'ASSISTANT_TURN'
  | 'TOOL_CALL_START'
  | 'TOOL_CALL_END'
  | 'TURN_LIMIT'
  | 'ERROR';

export type SessionEvent =
  | { readonly kind: 'SESSION_START'; readonly sessionId: string }
  | { readonly kind: 'SESSION_END'; readonly sessionId: string }
  | { readonly kind: 'STATE_CHANGE'; readonly from: LoopState; readonly to: LoopState }
  | { readonly kind: 'ASSISTANT_TURN'; readonly ordinal: number; readonly text: string }
  | { readonly kind: 'TOOL_CALL_START'; readonly toolName: string; readonly args: ToolArgs }
  | {
      readonly kind: 'TOOL_CALL_END';
      readonly toolName: string | null;
      readonly outcome: ToolOutcome;
    }
  | { readonly kind: 'TURN_LIMIT'; readonly rounds: number }
  | { readonly kind: 'ERROR'; readonly error: Error };
