import type { SessionEvent } from '../types/index.js';

export type LogLevel = 'silent' | 'error' | 'info' | 'debug';

export const LOG_LEVELS: ReadonlyArray<LogLevel> = ['silent', 'error', 'info', 'debug'];

export type LogFields = Readonly<Record<string, unknown>>;

export type Logger = {
  readonly error: (message: string, fields?: LogFields) => void;
  readonly info: (message: string, fields?: LogFields) => void;
  readonly debug: (message: string, fields?: LogFields) => void;
};

export type LoggerOptions = {
  readonly level?: LogLevel;
  readonly write?: (line: string) => void;
  readonly now?: () => Date;
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** One JSON object per line on stderr, so it stays out of the conversation on stdout. */
export function createConsoleLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', write = (line: string) => console.error(line), now = () => new Date() } = options;
  const threshold = LOG_LEVELS.indexOf(level);

  const log = (entryLevel: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void => {
    if (LOG_LEVELS.indexOf(entryLevel) > threshold) {
      return;
    }
    write(JSON.stringify({ time: now().toISOString(), level: entryLevel, msg: message, ...fields }));
  };

  return {
    error: (message, fields) => log('error', message, fields),
    info: (message, fields) => log('info', message, fields),
    debug: (message, fields) => log('debug', message, fields),
  };
}

export function logSessionEvent(event: SessionEvent, logger: Logger): void {
  switch (event.kind) {
    case 'SESSION_START':
    case 'SESSION_END':
      logger.debug(event.kind === 'SESSION_START' ? 'session started' : 'session ended', {
        sessionId: event.sessionId,
      });
      break;
    case 'STATE_CHANGE':
      logger.debug('state change', { from: event.from, to: event.to });
      break;
    case 'ASSISTANT_TURN':
      logger.debug('assistant turn', { ordinal: event.ordinal, chars: event.text.length });
      break;
    case 'TOOL_CALL_START':
      logger.info('tool call', { tool: event.toolName, args: event.args });
      break;
    case 'TOOL_CALL_END':
      if (event.outcome.ok) {
        logger.info('tool result', { tool: event.toolName, ok: true });
      } else {
        logger.info('tool failed', { tool: event.toolName, kind: event.outcome.kind, reason: event.outcome.message });
      }
      break;
    case 'TURN_LIMIT':
      logger.info('tool round limit reached', { rounds: event.rounds });
      break;
    case 'ERROR':
      logger.error(event.error.message, { error: event.error.name });
      break;
  }
}

/** Logs every event until the stream completes. */
export async function logSessionEvents(events: AsyncIterable<SessionEvent>, logger: Logger): Promise<void> {
  for await (const event of events) {
    logSessionEvent(event, logger);
  }
}
