import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { ConfigurationError } from '@filewright/llm';
import type { ToolSpec } from '../types/index.js';
import { loadMcpTools } from './client.js';
import { MCP_SERVER_INFO } from './server.js';

export type McpConnection = {
  readonly tools: ReadonlyArray<ToolSpec>;
  readonly close: () => Promise<void>;
};

/**
 * Starts an MCP server as a child process speaking stdio and loads its
 * tools. The child gets `FILEWRIGHT_ROOT` so a filewright server works on
 * the same directory as the host.
 */
export async function connectMcpServer(command: ReadonlyArray<string>, rootDir: string): Promise<McpConnection> {
  const [program, ...args] = command;
  if (program === undefined) {
    throw new ConfigurationError('FILEWRIGHT_MCP_COMMAND is empty');
  }

  const transport = new StdioClientTransport({
    command: program,
    args,
    env: { ...getDefaultEnvironment(), FILEWRIGHT_ROOT: rootDir },
  });
  const client = new Client({ name: `${MCP_SERVER_INFO.name}-host`, version: MCP_SERVER_INFO.version });
  await client.connect(transport);

  try {
    const tools = await loadMcpTools(client);
    return { tools, close: () => client.close() };
  } catch (error) {
    await client.close();
    throw error;
  }
}
