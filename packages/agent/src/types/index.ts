export * from './error.js';
export * from './outcome.js';
export * from './tool.js';
export * from './environment.js';
export * from './turn.js';
export * from './event.js';
export * from './session.js';
