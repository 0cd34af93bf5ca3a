import type { LLMRequest, LLMResponse } from '@filewright/llm';
import { AbortError } from '@filewright/llm';
import type {
  ExecutionEnvironment,
  LoopState,
  SessionConfig,
  SubmitResult,
  ToolOutcome,
  ToolRegistry,
} from '../types/index.js';
import { TransportError, failure } from '../types/index.js';
import { parseAssistantTurn } from '../parsing/directives.js';
import { dispatchToolCall } from '../tools/dispatch.js';
import type { SessionEventEmitter } from './events.js';
import { transcriptToMessages } from './messages.js';
import type { Transcript } from './transcript.js';

export const DEFAULT_MAX_TOOL_ROUNDS = 10;

/** The part of the llm Client the loop needs. */
export type ModelClient = {
  readonly complete: (request: LLMRequest) => Promise<LLMResponse>;
};

export type LoopContext = {
  readonly client: ModelClient;
  readonly registry: ToolRegistry;
  readonly environment: ExecutionEnvironment;
  readonly config: SessionConfig;
  readonly transcript: Transcript;
  readonly eventEmitter: SessionEventEmitter;
  readonly systemPrompt: string;
  readonly signal: AbortSignal;
  readonly setState: (state: LoopState) => void;
  readonly onResponse: (response: LLMResponse) => void;
};

export function isExitCommand(input: string): boolean {
  const command = input.trim().toLowerCase();
  return command === 'exit' || command === 'quit';
}

/**
 * Runs one user input to completion: request, dispatch every directive in
 * the reply, feed the outcomes back, repeat until a reply has no directives.
 *
 * On a transport failure or an interrupt the transcript is cut back to the
 * end of the last completed tool round, or to before `input` when no round
 * completed. Rounds whose tools already ran stay recorded.
 */
export async function processInput(context: LoopContext, input: string): Promise<SubmitResult> {
  const { transcript, eventEmitter, signal } = context;
  let mark = transcript.length();
  const maxToolRounds = context.config.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;

  const cancel = (): SubmitResult => {
    transcript.truncate(mark);
    return { kind: 'cancelled' };
  };

  transcript.appendUser(input);
  let toolRounds = 0;

  while (true) {
    if (signal.aborted) {
      return cancel();
    }

    context.setState('REQUESTING_MODEL');

    const request: LLMRequest = {
      model: context.config.model,
      provider: context.config.provider,
      system: context.systemPrompt,
      messages: transcriptToMessages(transcript.turns()),
      maxTokens: context.config.maxTokens,
      temperature: context.config.temperature,
      timeout: context.config.requestTimeoutMs ? { requestMs: context.config.requestTimeoutMs } : undefined,
      signal,
    };

    let response: LLMResponse;
    try {
      response = await context.client.complete(request);
    } catch (error: unknown) {
      if (signal.aborted || error instanceof AbortError) {
        return cancel();
      }

      const cause = error instanceof Error ? error : new Error(String(error));
      const transportError = new TransportError(`Model request failed: ${cause.message}`, cause);
      eventEmitter.emit({ kind: 'ERROR', error: transportError });
      transcript.truncate(mark);
      return { kind: 'error', error: transportError };
    }

    context.onResponse(response);
    const assistantTurn = transcript.appendAssistant(response.text);
    eventEmitter.emit({ kind: 'ASSISTANT_TURN', ordinal: assistantTurn.ordinal, text: response.text });

    context.setState('DISPATCHING_TOOLS');
    const { items, residualText } = parseAssistantTurn(response.text);

    if (items.length === 0) {
      context.setState('PRESENTING_RESPONSE');
      return { kind: 'response', text: residualText };
    }

    if (toolRounds >= maxToolRounds) {
      eventEmitter.emit({ kind: 'TURN_LIMIT', rounds: toolRounds });
      context.setState('PRESENTING_RESPONSE');
      return { kind: 'response', text: residualText };
    }
    toolRounds++;

    for (const item of items) {
      if (signal.aborted) {
        return cancel();
      }

      if (item.kind === 'malformed') {
        const outcome = failure('ParseError', item.error.message);
        eventEmitter.emit({ kind: 'TOOL_CALL_END', toolName: item.error.toolName, outcome });
        transcript.appendToolResult(item.error.toolName, null, outcome);
        continue;
      }

      const { invocation } = item;
      eventEmitter.emit({ kind: 'TOOL_CALL_START', toolName: invocation.toolName, args: invocation.args });
      const outcome: ToolOutcome = await dispatchToolCall(invocation, context.registry, context.environment);
      eventEmitter.emit({ kind: 'TOOL_CALL_END', toolName: invocation.toolName, outcome });
      transcript.appendToolResult(invocation.toolName, invocation.args, outcome);
    }

    if (signal.aborted) {
      return cancel();
    }
    mark = transcript.length();
  }
}
