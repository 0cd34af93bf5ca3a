import type { Message } from '@filewright/llm';
import { assistantMessage, userMessage } from '@filewright/llm';
import type { ToolResultTurn, Turn } from '../types/index.js';

export function formatToolResult(turn: ToolResultTurn): string {
  return `tool_result(${turn.toolName ?? 'unparsed'}): ${JSON.stringify(turn.outcome)}`;
}

/**
 * Replays the transcript as chat messages. Tool results go back to the
 * model as user messages; consecutive results share one message.
 */
export function transcriptToMessages(turns: ReadonlyArray<Turn>): ReadonlyArray<Message> {
  const messages: Array<Message> = [];
  let pendingResults: Array<string> = [];

  const flushResults = (): void => {
    if (pendingResults.length > 0) {
      messages.push(userMessage(pendingResults.join('\n')));
      pendingResults = [];
    }
  };

  for (const turn of turns) {
    switch (turn.kind) {
      case 'tool_result':
        pendingResults.push(formatToolResult(turn));
        break;
      case 'user':
        flushResults();
        messages.push(userMessage(turn.content));
        break;
      case 'assistant':
        flushResults();
        messages.push(assistantMessage(turn.content));
        break;
    }
  }

  flushResults();
  return messages;
}
