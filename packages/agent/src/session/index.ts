export { createSession, type Session, type SessionOptions } from './session.js';
export {
  processInput,
  isExitCommand,
  DEFAULT_MAX_TOOL_ROUNDS,
  type LoopContext,
  type ModelClient,
} from './loop.js';
export { createTranscript, type Transcript } from './transcript.js';
export { transcriptToMessages, formatToolResult } from './messages.js';
export { createSessionEventEmitter, type SessionEventEmitter } from './events.js';
