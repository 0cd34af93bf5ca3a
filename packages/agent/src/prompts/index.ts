export { buildSystemPrompt, type SystemPromptContext } from './builder.js';
