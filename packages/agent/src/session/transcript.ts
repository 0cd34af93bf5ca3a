import type {
  AssistantTurn,
  ToolArgs,
  ToolOutcome,
  ToolResultTurn,
  Turn,
  UserTurn,
} from '../types/index.js';
import { AgentError } from '../types/index.js';

/**
 * Append-only turn log owned by one session. Ordinals come from a counter
 * that never goes back, so a turn dropped by truncate() leaves a gap.
 */
export type Transcript = {
  readonly appendUser: (content: string) => UserTurn;
  readonly appendAssistant: (content: string) => AssistantTurn;
  readonly appendToolResult: (
    toolName: string | null,
    args: ToolArgs | null,
    outcome: ToolOutcome,
  ) => ToolResultTurn;
  readonly turns: () => ReadonlyArray<Turn>;
  readonly length: () => number;
  /** Drops every turn from index `length` on. */
  readonly truncate: (length: number) => void;
};

export function createTranscript(): Transcript {
  const turns: Array<Turn> = [];
  let nextOrdinal = 1;

  const take = (): number => nextOrdinal++;

  return {
    appendUser(content: string): UserTurn {
      const last = turns[turns.length - 1];
      if (last?.kind === 'user') {
        throw new AgentError('A user turn must be followed by an assistant turn before the next user turn');
      }
      const turn: UserTurn = { kind: 'user', ordinal: take(), content };
      turns.push(turn);
      return turn;
    },
    appendAssistant(content: string): AssistantTurn {
      const turn: AssistantTurn = { kind: 'assistant', ordinal: take(), content };
      turns.push(turn);
      return turn;
    },
    appendToolResult(toolName, args, outcome): ToolResultTurn {
      const turn: ToolResultTurn = { kind: 'tool_result', ordinal: take(), toolName, args, outcome };
      turns.push(turn);
      return turn;
    },
    turns(): ReadonlyArray<Turn> {
      return turns.slice();
    },
    length(): number {
      return turns.length;
    },
    truncate(length: number): void {
      turns.length = Math.min(turns.length, Math.max(0, length));
    },
  };
}
