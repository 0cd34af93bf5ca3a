import type { FailureKind } from './outcome.js';

export class AgentError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

export class DuplicateToolError extends AgentError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool already registered: ${toolName}`);
    this.toolName = toolName;
  }
}

export class UnknownToolError extends AgentError {
  readonly toolName: string;
  readonly available: ReadonlyArray<string>;

  constructor(toolName: string, available: ReadonlyArray<string>) {
    super(`Unknown tool: ${toolName}. Available tools: ${available.join(', ') || '(none)'}`);
    this.toolName = toolName;
    this.available = available;
  }
}

export class RegistrySealedError extends AgentError {
  constructor(toolName: string) {
    super(`Cannot register ${toolName}: the tool registry is sealed`);
  }
}

/**
 * A tool directive that could not be read. `toolName` is set when the
 * name was recoverable from the malformed line.
 */
export class ParseError extends AgentError {
  readonly line: string;
  readonly toolName: string | null;

  constructor(message: string, line: string, toolName: string | null = null) {
    super(message);
    this.line = line;
    this.toolName = toolName;
  }
}

/**
 * Thrown by tool executors and the execution environment; the dispatcher
 * turns it into a failed outcome of the same kind.
 */
export class ToolFailure extends AgentError {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, cause?: Error) {
    super(message, cause);
    this.kind = kind;
  }
}

export class TransportError extends AgentError {}

export class SessionBusyError extends AgentError {
  constructor(state: string) {
    super(`Session is busy (${state}); wait for the current input to finish`);
  }
}

export class SessionClosedError extends AgentError {
  constructor() {
    super('Session is closed');
  }
}
