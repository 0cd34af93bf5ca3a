export { createMcpToolServer, outcomeToCallResult, toMcpTool, MCP_SERVER_INFO } from './server.js';
export type { McpToolServerOptions } from './server.js';
export { loadMcpTools, schemaToParameters, type McpToolSource } from './client.js';
export { connectMcpServer, type McpConnection } from './connect.js';
