import type { ToolDeclaration } from '../types/index.js';
import { formatDirective } from '../parsing/directives.js';

export type SystemPromptContext = {
  readonly declarations: ReadonlyArray<ToolDeclaration>;
  readonly workingDirectory: string;
  readonly date?: string;
  /** Appended last; takes precedence over everything above it. */
  readonly userInstruction?: string;
};

const BASE_INSTRUCTIONS = [
  'You are a coding assistant that helps the user understand and change the files in their project.',
  'Read files before you edit them, keep edits small, and explain what you changed.',
].join('\n');

export function buildSystemPrompt(context: SystemPromptContext): string {
  const sections: Array<string> = [];

  // Layer 1: Base instructions
  sections.push(BASE_INSTRUCTIONS);

  // Layer 2: Environment context (XML block)
  sections.push(buildEnvironmentContext(context));

  // Layer 3: How to call tools
  if (context.declarations.length > 0) {
    sections.push(buildDirectiveProtocol());
  }

  // Layer 4: Tool descriptions
  sections.push(buildToolDescriptions(context.declarations));

  // Layer 5: User instruction override (highest priority)
  if (context.userInstruction) {
    sections.push(context.userInstruction);
  }

  return sections.filter(Boolean).join('\n\n');
}

function buildEnvironmentContext(context: SystemPromptContext): string {
  const lines = ['<environment>', `Working directory: ${context.workingDirectory}`];

  if (context.date) {
    lines.push(`Today's date: ${context.date}`);
  }

  lines.push('</environment>');
  return lines.join('\n');
}

function buildDirectiveProtocol(): string {
  const example = formatDirective({ toolName: 'read_file', args: { path: 'src/main.ts' } });

  return [
    '# Calling tools',
    '',
    'To call a tool, write a line on its own with exactly this shape:',
    '',
    example,
    '',
    'The arguments are a single-line JSON object whose values are strings, numbers or booleans.',
    'You may call several tools in one reply, one per line; they run in the order written.',
    'Then stop and wait. Each result comes back in a user message starting with tool_result(NAME):',
    'followed by JSON: {"ok":true,"value":...} on success or {"ok":false,"kind":...,"message":...} on failure.',
    'When you have what you need, answer in plain text without any tool lines.',
  ].join('\n');
}

function buildToolDescriptions(declarations: ReadonlyArray<ToolDeclaration>): string {
  if (declarations.length === 0) return '';

  const lines = ['# Available Tools', ''];
  for (const declaration of declarations) {
    lines.push(`## ${declaration.name}`);
    lines.push(declaration.description);
    lines.push(`Parameters: ${JSON.stringify(declaration.parameters)}`);
    lines.push('');
  }
  return lines.join('\n').trimEnd();
}
