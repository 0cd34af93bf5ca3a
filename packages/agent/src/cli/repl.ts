import { createInterface } from 'node:readline';
import type { SubmitResult } from '../types/index.js';
import type { Session } from '../session/session.js';
import { isExitCommand } from '../session/loop.js';

export type ReplOptions = {
  readonly session: Session;
  readonly input: NodeJS.ReadableStream;
  readonly output: NodeJS.WritableStream;
  readonly prompt?: string;
};

export function renderResult(result: SubmitResult): string {
  switch (result.kind) {
    case 'response':
      return `${result.text}\n\n`;
    case 'error':
      return `error: ${result.error.message}\n\n`;
    case 'cancelled':
      return '(interrupted)\n\n';
  }
}

/**
 * Reads one input per line until `exit`, `quit` or end of input.
 * Ctrl-C interrupts a running cycle, or ends the REPL at the prompt.
 */
export async function runRepl(options: ReplOptions): Promise<void> {
  const { session, input, output } = options;
  const rl = createInterface({ input, output });
  rl.setPrompt(options.prompt ?? 'you> ');

  rl.on('SIGINT', () => {
    if (session.state() === 'AWAITING_USER_INPUT') {
      rl.close();
    } else {
      session.interrupt();
    }
  });

  try {
    rl.prompt();
    for await (const line of rl) {
      const text = line.trim();
      if (text === '') {
        rl.prompt();
        continue;
      }
      if (isExitCommand(text)) {
        break;
      }

      const result = await session.submit(text);
      output.write(renderResult(result));
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
