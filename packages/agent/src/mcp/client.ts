import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { ParameterSpec, ParameterType, ToolArgs, ToolSpec } from '../types/index.js';
import { ToolFailure, isFailureKind } from '../types/index.js';
import { isPlainObject } from '../tools/args.js';

/** The part of an MCP client the tool bridge needs. */
export type McpToolSource = Pick<Client, 'listTools' | 'callTool'>;

function parameterType(value: unknown): ParameterType | null {
  if (value === 'string' || value === 'number' || value === 'boolean') {
    return value;
  }
  return value === 'integer' ? 'number' : null;
}

/**
 * Reads the flat parameters out of an MCP input schema. Properties whose
 * type cannot be written as a directive argument are left out.
 */
export function schemaToParameters(schema: unknown): Record<string, ParameterSpec> {
  const parameters: Record<string, ParameterSpec> = {};
  if (!isPlainObject(schema)) {
    return parameters;
  }
  const properties = schema['properties'];
  if (!isPlainObject(properties)) {
    return parameters;
  }

  const rawRequired = schema['required'];
  const required: ReadonlyArray<unknown> = Array.isArray(rawRequired) ? rawRequired : [];
  for (const [name, property] of Object.entries(properties)) {
    if (!isPlainObject(property)) {
      continue;
    }
    const type = parameterType(property['type']);
    if (type === null) {
      continue;
    }
    const rawDescription = property['description'];
    const description = typeof rawDescription === 'string' ? rawDescription : '';
    parameters[name] = required.includes(name) ? { type, description, required: true } : { type, description };
  }

  return parameters;
}

function resultText(result: unknown): string {
  if (!isPlainObject(result)) {
    return '';
  }
  const rawContent = result['content'];
  const content: ReadonlyArray<unknown> = Array.isArray(rawContent) ? rawContent : [];

  const parts: Array<string> = [];
  for (const item of content) {
    if (!isPlainObject(item) || item['type'] !== 'text') {
      continue;
    }
    const text = item['text'];
    if (typeof text === 'string') {
      parts.push(text);
    }
  }
  return parts.join('\n');
}

function remoteFailure(toolName: string, text: string): ToolFailure {
  const match = /^([A-Za-z]+): ([\s\S]*)$/.exec(text);
  const kind = match?.[1];
  if (kind !== undefined && isFailureKind(kind)) {
    return new ToolFailure(kind, match?.[2] ?? '');
  }
  return new ToolFailure('ToolExecutionError', `Tool error in ${toolName}: ${text || 'remote tool failed'}`);
}

async function callRemoteTool(source: McpToolSource, toolName: string, args: ToolArgs): Promise<string> {
  const result: unknown = await source.callTool({ name: toolName, arguments: { ...args } });
  const text = resultText(result);
  if (isPlainObject(result) && result['isError'] === true) {
    throw remoteFailure(toolName, text);
  }
  return text;
}

/**
 * Lists the tools an MCP server offers and wraps each as a ToolSpec whose
 * executor forwards the call. The remote server works on its own root, so
 * the local execution environment is not used.
 */
export async function loadMcpTools(source: McpToolSource): Promise<Array<ToolSpec>> {
  const { tools } = await source.listTools();

  return tools.map((tool): ToolSpec => ({
    name: tool.name,
    description: tool.description ?? '',
    parameters: schemaToParameters(tool.inputSchema),
    executor: (args) => callRemoteTool(source, tool.name, args),
  }));
}
