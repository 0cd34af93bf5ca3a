import { nanoid } from 'nanoid';
import type { LLMResponse, Usage } from '@filewright/llm';
import { emptyUsage, usageAdd } from '@filewright/llm';
import type {
  ExecutionEnvironment,
  LoopState,
  SessionConfig,
  SessionEvent,
  SubmitResult,
  ToolRegistry,
  Turn,
} from '../types/index.js';
import { SessionBusyError, SessionClosedError } from '../types/index.js';
import { buildSystemPrompt } from '../prompts/builder.js';
import { createSessionEventEmitter } from './events.js';
import { createTranscript } from './transcript.js';
import { processInput, type LoopContext, type ModelClient } from './loop.js';

export type SessionOptions = {
  readonly client: ModelClient;
  readonly registry: ToolRegistry;
  readonly environment: ExecutionEnvironment;
  readonly config: SessionConfig;
};

export type Session = {
  readonly id: string;
  readonly submit: (input: string) => Promise<SubmitResult>;
  /** Cancels the current cycle, if any. */
  readonly interrupt: () => void;
  readonly close: () => Promise<void>;
  readonly events: () => AsyncIterable<SessionEvent>;
  readonly state: () => LoopState;
  readonly history: () => ReadonlyArray<Turn>;
  readonly usage: () => Usage;
};

/**
 * Owns one conversation: its transcript, state and event stream. Sessions
 * share nothing, so several may run side by side over the same registry.
 * The registry is sealed on creation.
 */
export function createSession(options: SessionOptions): Session {
  const sessionId = nanoid();
  const transcript = createTranscript();
  const eventEmitter = createSessionEventEmitter();
  let currentState: LoopState = 'AWAITING_USER_INPUT';
  let abortController: AbortController | null = null;
  let totalUsage = emptyUsage();

  options.registry.seal();

  const systemPrompt =
    options.config.systemPrompt ??
    buildSystemPrompt({
      declarations: options.registry.declarations(),
      workingDirectory: options.environment.workingDirectory(),
      date: new Date().toISOString().slice(0, 10),
    });

  const setState = (next: LoopState): void => {
    if (next === currentState) {
      return;
    }
    const from = currentState;
    currentState = next;
    eventEmitter.emit({ kind: 'STATE_CHANGE', from, to: next });
  };

  eventEmitter.emit({ kind: 'SESSION_START', sessionId });

  const submit = async (input: string): Promise<SubmitResult> => {
    if (currentState === 'CLOSED') {
      throw new SessionClosedError();
    }
    if (currentState !== 'AWAITING_USER_INPUT') {
      throw new SessionBusyError(currentState);
    }

    const controller = new AbortController();
    abortController = controller;

    const context: LoopContext = {
      client: options.client,
      registry: options.registry,
      environment: options.environment,
      config: options.config,
      transcript,
      eventEmitter,
      systemPrompt,
      signal: controller.signal,
      setState: (next) => {
        if (currentState !== 'CLOSED') {
          setState(next);
        }
      },
      onResponse: (response: LLMResponse) => {
        totalUsage = usageAdd(totalUsage, response.usage);
      },
    };

    try {
      return await processInput(context, input);
    } finally {
      abortController = null;
      if (currentState !== 'CLOSED') {
        setState('AWAITING_USER_INPUT');
      }
    }
  };

  const interrupt = (): void => {
    abortController?.abort();
  };

  const close = async (): Promise<void> => {
    if (currentState === 'CLOSED') {
      return;
    }
    interrupt();
    setState('CLOSED');
    eventEmitter.emit({ kind: 'SESSION_END', sessionId });
    eventEmitter.complete();
  };

  return {
    id: sessionId,
    submit,
    interrupt,
    close,
    events: () => eventEmitter.iterator(),
    state: () => currentState,
    history: () => transcript.turns(),
    usage: () => totalUsage,
  };
}
