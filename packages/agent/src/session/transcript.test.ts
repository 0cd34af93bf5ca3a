import { describe, it, expect } from 'vitest';
import { createTranscript } from './transcript.js';
import { AgentError } from '../types/index.js';

describe('Transcript', () => {
  it('should number turns with increasing ordinals', () => {
    const transcript = createTranscript();

    transcript.appendUser('hi');
    transcript.appendAssistant('tool: list_files({})');
    transcript.appendToolResult('list_files', {}, { ok: true, value: ['a.txt'] });
    transcript.appendAssistant('There is one file.');

    expect(transcript.turns().map((t) => [t.kind, t.ordinal])).toEqual([
      ['user', 1],
      ['assistant', 2],
      ['tool_result', 3],
      ['assistant', 4],
    ]);
  });

  it('should refuse two user turns in a row', () => {
    const transcript = createTranscript();
    transcript.appendUser('first');

    expect(() => transcript.appendUser('second')).toThrow(AgentError);
    expect(transcript.length()).toBe(1);
  });

  it('should not reuse ordinals after truncation', () => {
    const transcript = createTranscript();
    transcript.appendUser('first');
    transcript.appendAssistant('reply');
    transcript.appendUser('second');

    transcript.truncate(2);
    const turn = transcript.appendUser('third');

    expect(turn.ordinal).toBe(4);
    expect(transcript.turns().map((t) => t.ordinal)).toEqual([1, 2, 4]);
  });

  it('should return a copy of the turns', () => {
    const transcript = createTranscript();
    const snapshot = transcript.turns();

    transcript.appendUser('later');

    expect(snapshot).toEqual([]);
  });

  it('should ignore truncation beyond the current length', () => {
    const transcript = createTranscript();
    transcript.appendUser('only');

    transcript.truncate(5);

    expect(transcript.length()).toBe(1);
  });
});
