export { Client } from './client.js';
export { DEFAULT_RETRY_POLICY, type ClientConfig } from './config.js';
