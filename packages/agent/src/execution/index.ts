export { createLocalExecutionEnvironment } from './local.js';
