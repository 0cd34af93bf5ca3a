import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import type { ExecutionEnvironment, ToolDeclaration, ToolOutcome, ToolRegistry } from '../types/index.js';
import { failure } from '../types/index.js';
import { toToolArgs } from '../tools/args.js';
import { dispatchToolCall } from '../tools/dispatch.js';
import type { Logger } from '../cli/logger.js';

export const MCP_SERVER_INFO = { name: 'filewright', version: '0.1.0' } as const;

export type McpToolServerOptions = {
  readonly registry: ToolRegistry;
  readonly environment: ExecutionEnvironment;
  readonly logger?: Logger;
};

export function toMcpTool(declaration: ToolDeclaration): Tool {
  return {
    name: declaration.name,
    description: declaration.description,
    inputSchema: {
      type: 'object',
      properties: { ...declaration.parameters.properties },
      required: [...declaration.parameters.required],
    },
  };
}

/**
 * Successful values travel as text (JSON for anything that is not a string);
 * failures are flagged `isError` with a `Kind: message` line so a client can
 * recover the failure kind.
 */
export function outcomeToCallResult(outcome: ToolOutcome): CallToolResult {
  if (outcome.ok) {
    const text = typeof outcome.value === 'string' ? outcome.value : JSON.stringify(outcome.value);
    return { content: [{ type: 'text', text }] };
  }
  return { content: [{ type: 'text', text: `${outcome.kind}: ${outcome.message}` }], isError: true };
}

/**
 * Publishes the registry's tools over MCP. Calls go through the same
 * dispatcher the agent loop uses, so validation and failure kinds match.
 */
export function createMcpToolServer(options: McpToolServerOptions): Server {
  const { registry, environment, logger } = options;
  const server = new Server(MCP_SERVER_INFO, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.declarations().map(toMcpTool),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name, arguments: rawArgs } = request.params;
    const args = toToolArgs(rawArgs ?? {});
    if (!args) {
      return outcomeToCallResult(
        failure('InvalidArgument', `${name}: arguments must be strings, numbers, booleans or null`),
      );
    }

    logger?.info('tool call', { tool: name, args });
    const outcome = await dispatchToolCall({ toolName: name, args }, registry, environment);
    if (!outcome.ok) {
      logger?.info('tool failed', { tool: name, kind: outcome.kind, message: outcome.message });
    }
    return outcomeToCallResult(outcome);
  });

  return server;
}
