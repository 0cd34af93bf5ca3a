#!/usr/bin/env node
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createLocalExecutionEnvironment } from '../execution/local.js';
import { createMcpToolServer } from '../mcp/server.js';
import { createBuiltinTools } from '../tools/builtin.js';
import { createToolRegistry } from '../tools/registry.js';
import { loadServerConfig } from './config.js';
import { createConsoleLogger } from './logger.js';

// stdout carries the protocol; everything else goes to stderr
async function main(): Promise<void> {
  const config = loadServerConfig();
  const logger = createConsoleLogger({ level: config.logLevel });

  const environment = createLocalExecutionEnvironment(config.rootDir);
  await environment.initialize();

  const registry = createToolRegistry(createBuiltinTools());
  registry.seal();

  const server = createMcpToolServer({ registry, environment, logger });
  await server.connect(new StdioServerTransport());
  logger.info('mcp server ready', { root: environment.workingDirectory() });
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`filewright-mcp: ${message}\n`);
  process.exitCode = 1;
});
