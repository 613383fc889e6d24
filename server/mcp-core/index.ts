/**
 * MCP Core Module
 *
 * Tool listing, tool calls and per-session server creation on top of the
 * operation dispatcher.
 */

export { createMcpServer, SERVER_INFO } from './server-factory.js';
export { callTool, listTools, renderEnvelope } from './tool-handlers.js';
export { CONTROL_ARGS, toToolDefinition } from './tool-schema.js';
