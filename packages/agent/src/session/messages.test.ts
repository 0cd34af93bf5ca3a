import { describe, it, expect } from 'vitest';
import { formatToolResult, transcriptToMessages } from './messages.js';
import { createTranscript } from './transcript.js';

describe('transcriptToMessages', () => {
  it('should replay turns in order, sending tool results as user messages', () => {
    const transcript = createTranscript();
    transcript.appendUser('what is in a.txt?');
    transcript.appendAssistant('tool: read_file({"path":"a.txt"})');
    transcript.appendToolResult('read_file', { path: 'a.txt' }, { ok: true, value: 'alpha' });
    transcript.appendAssistant('It says alpha.');

    expect(transcriptToMessages(transcript.turns())).toEqual([
      { role: 'user', content: 'what is in a.txt?' },
      { role: 'assistant', content: 'tool: read_file({"path":"a.txt"})' },
      { role: 'user', content: 'tool_result(read_file): {"ok":true,"value":"alpha"}' },
      { role: 'assistant', content: 'It says alpha.' },
    ]);
  });

  it('should merge consecutive tool results into one message', () => {
    const transcript = createTranscript();
    transcript.appendUser('go');
    transcript.appendAssistant('two calls');
    transcript.appendToolResult('delete_file', { path: 'a' }, {
      ok: false,
      kind: 'UnknownTool',
      message: 'Unknown tool: delete_file',
    });
    transcript.appendToolResult('read_file', { path: 'a' }, { ok: true, value: 'x' });

    const messages = transcriptToMessages(transcript.turns());

    expect(messages).toHaveLength(3);
    expect(messages[2]).toEqual({
      role: 'user',
      content:
        'tool_result(delete_file): {"ok":false,"kind":"UnknownTool","message":"Unknown tool: delete_file"}\n' +
        'tool_result(read_file): {"ok":true,"value":"x"}',
    });
  });
});

describe('formatToolResult', () => {
  it('should label results whose directive could not be parsed', () => {
    expect(
      formatToolResult({
        kind: 'tool_result',
        ordinal: 3,
        toolName: null,
        args: null,
        outcome: { ok: false, kind: 'ParseError', message: 'bad line' },
      }),
    ).toBe('tool_result(unparsed): {"ok":false,"kind":"ParseError","message":"bad line"}');
  });
});
