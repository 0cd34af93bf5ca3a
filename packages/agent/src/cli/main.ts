#!/usr/bin/env node
import 'dotenv/config';
import { createLocalExecutionEnvironment } from '../execution/local.js';
import { connectMcpServer, type McpConnection } from '../mcp/connect.js';
import { createSession } from '../session/session.js';
import { createBuiltinTools } from '../tools/builtin.js';
import { createToolRegistry } from '../tools/registry.js';
import { createModelClient, loadConfig } from './config.js';
import { createConsoleLogger, logSessionEvents } from './logger.js';
import { runRepl } from './repl.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createConsoleLogger({ level: config.logLevel });

  const environment = createLocalExecutionEnvironment(config.rootDir);
  await environment.initialize();

  const client = createModelClient(config);
  const mcp: McpConnection | null = config.mcpCommand
    ? await connectMcpServer(config.mcpCommand, environment.workingDirectory())
    : null;
  const tools = mcp ? mcp.tools : createBuiltinTools();
  logger.info('tools loaded', { source: mcp ? 'mcp' : 'builtin', tools: tools.map((tool) => tool.name) });

  const session = createSession({
    client,
    registry: createToolRegistry(tools),
    environment,
    config: {
      model: config.model,
      provider: config.provider,
      maxToolRounds: config.maxToolRounds,
      requestTimeoutMs: config.requestTimeoutMs,
      maxTokens: config.maxTokens,
      temperature: config.temperature ?? undefined,
    },
  });
  const logging = logSessionEvents(session.events(), logger);

  process.stdout.write(
    `filewright: ${config.provider}/${config.model} in ${environment.workingDirectory()} (type exit to quit)\n`,
  );

  try {
    await runRepl({ session, input: process.stdin, output: process.stdout });
  } finally {
    await session.close();
    await logging;
    await client.close();
    await mcp?.close();
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`filewright: ${message}\n`);
  process.exitCode = 1;
});
