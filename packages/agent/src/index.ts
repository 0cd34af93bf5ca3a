// @filewright/agent: tool-calling agent loop over a local working directory

export * from './types/index.js';
export * from './execution/index.js';
export * from './tools/index.js';
export * from './parsing/index.js';
export * from './prompts/index.js';
export * from './session/index.js';
export * from './mcp/index.js';
export * from './cli/index.js';
