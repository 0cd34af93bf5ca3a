export {
  loadConfig,
  loadServerConfig,
  createModelClient,
  DEFAULT_MODELS,
  DEFAULT_OLLAMA_BASE_URL,
  DEFAULT_TEMPERATURES,
} from './config.js';
export type { AppConfig, LoadConfigOptions, ProviderName, ServerConfig } from './config.js';
export { createConsoleLogger, logSessionEvent, logSessionEvents, isLogLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LoggerOptions, LogLevel, LogFields } from './logger.js';
export { runRepl, renderResult, type ReplOptions } from './repl.js';
