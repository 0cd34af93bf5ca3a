import type { ToolInvocation } from '../types/index.js';
import { ParseError } from '../types/index.js';
import { isPlainObject, toToolArgs } from '../tools/args.js';

export type TextSegment = { readonly kind: 'text'; readonly text: string };
export type DirectiveSegment = { readonly kind: 'directive'; readonly invocation: ToolInvocation };
export type MalformedSegment = { readonly kind: 'malformed'; readonly error: ParseError };

export type Segment = TextSegment | DirectiveSegment | MalformedSegment;

export type ParsedItem = DirectiveSegment | MalformedSegment;

export type ParsedTurn = {
  readonly items: ReadonlyArray<ParsedItem>;
  /** What the user sees: the text segments joined and trimmed. */
  readonly residualText: string;
};

const DIRECTIVE_PREFIX = /^tool\s*:/;
const CALL_FORM = /^tool\s*:\s*([A-Za-z_][\w.-]*)\s*\((.*)\)\s*;?$/s;
const NAME_ONLY = /^tool\s*:\s*([A-Za-z_][\w.-]*)/;

function parseJson(text: string): { readonly ok: true; readonly value: unknown } | { readonly ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function parseCallForm(line: string): DirectiveSegment | MalformedSegment {
  const match = CALL_FORM.exec(line);
  if (!match) {
    const name = NAME_ONLY.exec(line)?.[1] ?? null;
    return malformed(`Expected tool: NAME({...}), got: ${line}`, line, name);
  }

  const toolName = match[1] ?? '';
  const rawArgs = (match[2] ?? '').trim();
  if (rawArgs === '') {
    return { kind: 'directive', invocation: { toolName, args: {} } };
  }

  const parsed = parseJson(rawArgs);
  if (!parsed.ok) {
    return malformed(`Arguments for ${toolName} are not valid JSON: ${rawArgs}`, line, toolName);
  }

  const args = toToolArgs(parsed.value);
  if (!args) {
    return malformed(
      `Arguments for ${toolName} must be a JSON object of strings, numbers, booleans or null`,
      line,
      toolName,
    );
  }

  return { kind: 'directive', invocation: { toolName, args } };
}

/**
 * A block holding only `{"tool": NAME, "args": {...}}`, on one line or
 * pretty-printed over several. Returns null when the block is some other
 * JSON object (or not JSON at all) so it stays text.
 */
function parseObjectForm(block: string): DirectiveSegment | MalformedSegment | null {
  const parsed = parseJson(block);
  if (!parsed.ok || !isPlainObject(parsed.value) || !('tool' in parsed.value)) {
    return null;
  }

  const { tool, args: rawArgs = {} } = parsed.value;
  if (typeof tool !== 'string' || tool === '') {
    return malformed('The "tool" field must be a non-empty string', block, null);
  }

  const args = toToolArgs(rawArgs);
  if (!args) {
    return malformed(
      `Arguments for ${tool} must be a JSON object of strings, numbers, booleans or null`,
      block,
      tool,
    );
  }

  return { kind: 'directive', invocation: { toolName: tool, args } };
}

function malformed(message: string, line: string, toolName: string | null): MalformedSegment {
  return { kind: 'malformed', error: new ParseError(message, line, toolName) };
}

/**
 * Index of the line on which the object opened at `lines[start]` closes,
 * or null when its braces never balance.
 */
function findObjectEnd(lines: ReadonlyArray<string>, start: number): number | null {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < lines.length; index++) {
    for (const char of lines[index] ?? '') {
      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (char === '\\') {
          escaped = true;
        } else if (char === '"') {
          inString = false;
        }
        continue;
      }

      if (char === '"') {
        inString = true;
      } else if (char === '{') {
        depth++;
      } else if (char === '}') {
        depth--;
        if (depth === 0) {
          return index;
        }
      }
    }
  }

  return null;
}

/**
 * Splits one assistant turn into text, directive and malformed segments,
 * in the order they appear. `tool:` directives are recognised line by line,
 * so any number may appear in one turn, fenced or not. A JSON-object call
 * may span several lines.
 */
export function* scanDirectives(text: string): Generator<Segment, void, undefined> {
  const lines = text.split(/\r?\n/);
  let pending: Array<string> = [];

  const flush = function* (): Generator<TextSegment, void, undefined> {
    if (pending.length > 0) {
      yield { kind: 'text', text: pending.join('\n') };
      pending = [];
    }
  };

  let index = 0;
  while (index < lines.length) {
    const line = lines[index] ?? '';
    const trimmed = line.trim();
    let next = index + 1;

    let segment: DirectiveSegment | MalformedSegment | null = null;
    if (DIRECTIVE_PREFIX.test(trimmed)) {
      segment = parseCallForm(trimmed);
    } else if (trimmed.startsWith('{')) {
      const end = findObjectEnd(lines, index);
      if (end !== null) {
        segment = parseObjectForm(lines.slice(index, end + 1).join('\n').trim());
        next = end + 1;
      }
    }

    if (segment === null) {
      pending.push(line);
      index++;
      continue;
    }

    yield* flush();
    yield segment;
    index = next;
  }

  yield* flush();
}

export function parseAssistantTurn(text: string): ParsedTurn {
  const items: Array<ParsedItem> = [];
  const textParts: Array<string> = [];

  for (const segment of scanDirectives(text)) {
    if (segment.kind === 'text') {
      textParts.push(segment.text);
    } else {
      items.push(segment);
    }
  }

  return {
    items,
    residualText: textParts.join('\n').replace(/\n{3,}/g, '\n\n').trim(),
  };
}

/** Renders the canonical single-line directive for an invocation. */
export function formatDirective(invocation: ToolInvocation): string {
  return `tool: ${invocation.toolName}(${JSON.stringify(invocation.args)})`;
}
