import { describe, it, expect } from 'vitest';
import { buildSystemPrompt } from './builder.js';
import { createToolRegistry } from '../tools/registry.js';
import { createBuiltinTools } from '../tools/builtin.js';

describe('buildSystemPrompt', () => {
  const declarations = createToolRegistry(createBuiltinTools()).declarations();

  it('should describe the environment', () => {
    const prompt = buildSystemPrompt({ declarations, workingDirectory: '/work/project', date: '2024-05-01' });

    expect(prompt).toContain('<environment>\nWorking directory: /work/project\nToday\'s date: 2024-05-01\n</environment>');
  });

  it('should teach the directive format with a parseable example', () => {
    const prompt = buildSystemPrompt({ declarations, workingDirectory: '/work' });

    expect(prompt).toContain('# Calling tools');
    expect(prompt).toContain('\ntool: read_file({"path":"src/main.ts"})\n');
  });

  it('should list every tool with its schema', () => {
    const prompt = buildSystemPrompt({ declarations, workingDirectory: '/work' });

    expect(prompt).toContain('## read_file');
    expect(prompt).toContain('## list_files');
    expect(prompt).toContain('## edit_file');
    expect(prompt).toContain(
      'Parameters: {"type":"object","properties":{"path":{"type":"string","description":"Relative path of the file in the working directory"}},"required":["path"],"additionalProperties":false}',
    );
  });

  it('should leave out tool sections when no tools are registered', () => {
    const prompt = buildSystemPrompt({ declarations: [], workingDirectory: '/work' });

    expect(prompt).not.toContain('# Calling tools');
    expect(prompt).not.toContain('# Available Tools');
  });

  it('should put the user instruction last', () => {
    const prompt = buildSystemPrompt({
      declarations,
      workingDirectory: '/work',
      userInstruction: 'Answer in French.',
    });

    expect(prompt.endsWith('\n\nAnswer in French.')).toBe(true);
  });
});
