import type { SessionEvent } from '../types/index.js';

export type SessionEventEmitter = {
  readonly emit: (event: SessionEvent) => void;
  readonly complete: () => void;
  readonly iterator: () => AsyncIterable<SessionEvent>;
};

/**
 * Single-consumer event queue. Events emitted before anyone iterates are
 * buffered; emits after complete() are dropped.
 */
export function createSessionEventEmitter(): SessionEventEmitter {
  const buffer: SessionEvent[] = [];
  let waiter: ((result: IteratorResult<SessionEvent>) => void) | null = null;
  let done = false;

  const asyncIterator: AsyncIterator<SessionEvent> = {
    next: async (): Promise<IteratorResult<SessionEvent>> => {
      const next = buffer.shift();
      if (next !== undefined) {
        return { value: next, done: false };
      }

      if (done) {
        return { done: true, value: undefined };
      }

      return new Promise<IteratorResult<SessionEvent>>((resolve) => {
        waiter = resolve;
      });
    },
  };

  return {
    emit: (event: SessionEvent) => {
      if (done) {
        return;
      }
      if (waiter) {
        const w = waiter;
        waiter = null;
        w({ value: event, done: false });
      } else {
        buffer.push(event);
      }
    },

    complete: () => {
      done = true;
      if (waiter) {
        const w = waiter;
        waiter = null;
        w({ done: true, value: undefined });
      }
    },

    iterator: () => ({
      [Symbol.asyncIterator]: () => asyncIterator,
    }),
  };
}
