import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { LLMRequest, LLMResponse } from '@filewright/llm';
import { renderResult, runRepl } from './repl.js';
import { createSession, type Session } from '../session/session.js';
import { createToolRegistry } from '../tools/registry.js';
import { createBuiltinTools } from '../tools/builtin.js';
import { createLocalExecutionEnvironment } from '../execution/local.js';
import { TransportError } from '../types/index.js';

function createSessionWithReplies(dir: string, replies: Array<string | Error>): {
  session: Session;
  requests: Array<LLMRequest>;
} {
  const requests: Array<LLMRequest> = [];
  let index = 0;
  const session = createSession({
    client: {
      complete: async (request): Promise<LLMResponse> => {
        requests.push(request);
        const reply = replies[index++];
        if (reply instanceof Error) {
          throw reply;
        }
        return {
          id: 'r',
          model: 'm',
          text: reply ?? '',
          finishReason: 'stop',
          usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
        };
      },
    },
    registry: createToolRegistry(createBuiltinTools()),
    environment: createLocalExecutionEnvironment(dir),
    config: { model: 'm' },
  });
  return { session, requests };
}

async function drive(session: Session, lines: ReadonlyArray<string>, end = true): Promise<string> {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = '';
  output.on('data', (chunk: Buffer) => {
    written += chunk.toString('utf-8');
  });

  const done = runRepl({ session, input, output });
  for (const line of lines) {
    input.write(`${line}\n`);
  }
  if (end) {
    input.end();
  }
  await done;
  // let the output stream flush its last chunk
  await new Promise((resolve) => setImmediate(resolve));
  return written;
}

describe('runRepl', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'filewright-repl-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should print each answer and stop at exit', async () => {
    const { session, requests } = createSessionWithReplies(testDir, ['Hello!', 'never sent']);

    const written = await drive(session, ['hi', 'exit', 'ignored'], false);

    expect(written).toContain('Hello!\n\n');
    expect(requests).toHaveLength(1);
    expect(session.history().map((t) => t.kind)).toEqual(['user', 'assistant']);
  });

  it('should skip blank lines', async () => {
    const { session, requests } = createSessionWithReplies(testDir, ['ok']);

    await drive(session, ['', '   ', 'go']);

    expect(requests).toHaveLength(1);
    expect(requests[0]?.messages).toEqual([{ role: 'user', content: 'go' }]);
  });

  it('should report transport failures and keep going', async () => {
    const { session } = createSessionWithReplies(testDir, [new Error('connection refused'), 'recovered']);

    const written = await drive(session, ['first', 'second']);

    expect(written).toContain('error: Model request failed: connection refused\n\n');
    expect(written).toContain('recovered\n\n');
  });

  it('should end at end of input', async () => {
    const { session } = createSessionWithReplies(testDir, []);

    const written = await drive(session, []);

    expect(written).toBe('you> ');
  });
});

describe('renderResult', () => {
  it('should render each result kind', () => {
    expect(renderResult({ kind: 'response', text: 'done' })).toBe('done\n\n');
    expect(renderResult({ kind: 'cancelled' })).toBe('(interrupted)\n\n');
    expect(renderResult({ kind: 'error', error: new TransportError('Model request failed: x') })).toBe(
      'error: Model request failed: x\n\n',
    );
  });
});
