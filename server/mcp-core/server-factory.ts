/**
 * MCP Server Factory
 *
 * Creates an MCP server instance that exposes every catalogue operation as a
 * tool. The tool handlers are installed on the low-level protocol server so
 * tool arguments reach the parameter binder exactly as the client sent them.
 *
 * Each HTTP session gets its own instance; all instances share one dispatcher.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Dispatcher } from '../dispatcher/dispatcher.js';
import { logger } from '../observability/logger.js';
import { callTool, listTools } from './tool-handlers.js';

export const SERVER_INFO = {
  name: 'jira-operations-mcp',
  version: '1.0.0',
} as const;

export function createMcpServer(dispatcher: Dispatcher): McpServer {
  const mcp = new McpServer(SERVER_INFO, {
    capabilities: {
      tools: {},
      logging: {},
    },
  });

  const tools = listTools(dispatcher);

  mcp.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));
  mcp.server.setRequestHandler(CallToolRequestSchema, async (request, extra) =>
    callTool(dispatcher, request.params.name, request.params.arguments, extra.signal),
  );

  logger.info('MCP server created', { tools: tools.length });
  return mcp;
}
