import { describe, it, expect } from 'vitest';
import { isExitCommand } from './loop.js';

describe('isExitCommand', () => {
  it.each(['exit', 'quit', '  EXIT ', 'Quit'])('should accept %j', (input) => {
    expect(isExitCommand(input)).toBe(true);
  });

  it.each(['', 'exit now', 'q', 'please quit'])('should reject %j', (input) => {
    expect(isExitCommand(input)).toBe(false);
  });
});
