import { describe, it, expect } from 'vitest';
import { formatDirective, parseAssistantTurn, scanDirectives } from './directives.js';
import type { ToolInvocation } from '../types/index.js';
import { ParseError } from '../types/index.js';

describe('scanDirectives', () => {
  it('should yield text and directives in order', () => {
    const text = [
      'Let me look around first.',
      'tool: list_files({"path": "."})',
      'Then the readme:',
      'tool: read_file({"path": "README.md"})',
    ].join('\n');

    expect(Array.from(scanDirectives(text))).toEqual([
      { kind: 'text', text: 'Let me look around first.' },
      { kind: 'directive', invocation: { toolName: 'list_files', args: { path: '.' } } },
      { kind: 'text', text: 'Then the readme:' },
      { kind: 'directive', invocation: { toolName: 'read_file', args: { path: 'README.md' } } },
    ]);
  });

  it('should be lazy', () => {
    const scan = scanDirectives('tool: a({})\ntool: b({})');

    expect(scan.next().value).toEqual({ kind: 'directive', invocation: { toolName: 'a', args: {} } });
    expect(scan.next().value).toEqual({ kind: 'directive', invocation: { toolName: 'b', args: {} } });
    expect(scan.next().done).toBe(true);
  });

  it('should accept empty parentheses', () => {
    expect(Array.from(scanDirectives('tool: list_files()'))).toEqual([
      { kind: 'directive', invocation: { toolName: 'list_files', args: {} } },
    ]);
  });

  it('should accept the JSON object form', () => {
    const segments = Array.from(scanDirectives('{"tool": "read_file", "args": {"path": "a.txt"}}'));

    expect(segments).toEqual([
      { kind: 'directive', invocation: { toolName: 'read_file', args: { path: 'a.txt' } } },
    ]);
  });

  it('should default missing args in the JSON object form', () => {
    const segments = Array.from(scanDirectives('{"tool": "list_files"}'));

    expect(segments).toEqual([{ kind: 'directive', invocation: { toolName: 'list_files', args: {} } }]);
  });

  it('should leave other JSON objects as text', () => {
    const segments = Array.from(scanDirectives('{"name": "demo", "version": "1.0.0"}'));

    expect(segments).toEqual([{ kind: 'text', text: '{"name": "demo", "version": "1.0.0"}' }]);
  });

  it('should accept a JSON object call spread over several lines', () => {
    const text = ['Let me look.', '{', '  "tool": "list_files",', '  "args": {}', '}', 'One moment.'].join('\n');

    expect(Array.from(scanDirectives(text))).toEqual([
      { kind: 'text', text: 'Let me look.' },
      { kind: 'directive', invocation: { toolName: 'list_files', args: {} } },
      { kind: 'text', text: 'One moment.' },
    ]);
  });

  it('should report a pretty-printed call with a bad tool field as malformed', () => {
    const [segment] = Array.from(scanDirectives('{\n  "tool": 7\n}'));

    expect(segment?.kind).toBe('malformed');
    if (segment?.kind === 'malformed') {
      expect(segment.error.line).toBe('{\n  "tool": 7\n}');
      expect(segment.error.toolName).toBeNull();
    }
  });

  it('should leave multi-line JSON that is not a call as text', () => {
    expect(Array.from(scanDirectives('{\n  "name": "demo"\n}'))).toEqual([
      { kind: 'text', text: '{\n  "name": "demo"\n}' },
    ]);
  });

  it('should leave an unclosed object as text', () => {
    expect(Array.from(scanDirectives('{\n  "tool": "read_file",'))).toEqual([
      { kind: 'text', text: '{\n  "tool": "read_file",' },
    ]);
  });

  it('should only treat a lowercase tool: prefix as a directive', () => {
    expect(Array.from(scanDirectives('Tool: none needed, the answer is 42.'))).toEqual([
      { kind: 'text', text: 'Tool: none needed, the answer is 42.' },
    ]);
  });

  it('should find directives inside fenced blocks', () => {
    const text = ['```', 'tool: read_file({"path": "a.txt"})', '```'].join('\n');

    expect(Array.from(scanDirectives(text)).map((s) => s.kind)).toEqual(['text', 'directive', 'text']);
  });

  it('should report invalid JSON arguments as malformed, keeping the name', () => {
    const [segment] = Array.from(scanDirectives('tool: read_file({path: a.txt})'));

    expect(segment?.kind).toBe('malformed');
    if (segment?.kind === 'malformed') {
      expect(segment.error).toBeInstanceOf(ParseError);
      expect(segment.error.toolName).toBe('read_file');
      expect(segment.error.line).toBe('tool: read_file({path: a.txt})');
    }
  });

  it('should report nested argument values as malformed', () => {
    const [segment] = Array.from(scanDirectives('tool: edit_file({"path": {"nested": true}})'));

    expect(segment?.kind).toBe('malformed');
  });

  it('should report a non-string tool field as malformed', () => {
    const [segment] = Array.from(scanDirectives('{"tool": 7, "args": {}}'));

    expect(segment?.kind).toBe('malformed');
    if (segment?.kind === 'malformed') {
      expect(segment.error.toolName).toBeNull();
    }
  });

  it('should report a tool line without parentheses as malformed', () => {
    const [segment] = Array.from(scanDirectives('tool: read_file'));

    expect(segment?.kind).toBe('malformed');
    if (segment?.kind === 'malformed') {
      expect(segment.error.toolName).toBe('read_file');
    }
  });
});

describe('parseAssistantTurn', () => {
  it('should keep directives and malformed items in order', () => {
    const parsed = parseAssistantTurn(
      ['tool: read_file({"path": "a"})', 'tool: broken(', 'tool: list_files({})'].join('\n'),
    );

    expect(parsed.items.map((item) => item.kind)).toEqual(['directive', 'malformed', 'directive']);
    expect(parsed.residualText).toBe('');
  });

  it('should treat a whole reply of pretty-printed JSON as a call', () => {
    const parsed = parseAssistantTurn('{\n  "tool": "read_file",\n  "args": {"path": "a.txt"}\n}');

    expect(parsed.items).toEqual([
      { kind: 'directive', invocation: { toolName: 'read_file', args: { path: 'a.txt' } } },
    ]);
    expect(parsed.residualText).toBe('');
  });

  it('should return only text for a plain answer', () => {
    const parsed = parseAssistantTurn('  The file defines two functions.\n');

    expect(parsed.items).toEqual([]);
    expect(parsed.residualText).toBe('The file defines two functions.');
  });

  it('should strip directives from the residual text', () => {
    const parsed = parseAssistantTurn('Checking.\n\ntool: list_files({})\n\nDone soon.');

    expect(parsed.residualText).toBe('Checking.\n\nDone soon.');
  });
});

describe('formatDirective', () => {
  it('should render the canonical line', () => {
    expect(formatDirective({ toolName: 'read_file', args: { path: 'a.txt' } })).toBe(
      'tool: read_file({"path":"a.txt"})',
    );
  });

  it.each<ToolInvocation>([
    { toolName: 'list_files', args: {} },
    { toolName: 'read_file', args: { path: 'src/main.ts' } },
    { toolName: 'edit_file', args: { path: 'a.txt', old_str: 'f(x)', new_str: 'line one\nline "two"' } },
    { toolName: 'custom_tool', args: { count: 3, ratio: 0.5, force: false, note: null } },
  ])('should parse back to the same invocation for $toolName', (invocation) => {
    const parsed = parseAssistantTurn(formatDirective(invocation));

    expect(parsed.items).toEqual([{ kind: 'directive', invocation }]);
  });
});
