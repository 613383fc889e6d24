/**
 * MCP Service Module
 *
 * HTTP transport layer for the MCP server. Bridges express requests to
 * per-session StreamableHTTPServerTransport instances:
 *
 * - POST /mcp     initialize a session, or deliver a message to an existing one
 * - GET /mcp      open the server-to-client SSE stream of a session
 * - DELETE /mcp   terminate a session
 *
 * Sessions that stay idle past SESSION_IDLE_THRESHOLD_MS are reaped.
 */

import { randomUUID } from 'node:crypto';
import type { Request, Response } from 'express';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { Dispatcher } from './dispatcher/dispatcher.js';
import { isRecord } from './dispatcher/response-normalizer.js';
import { createMcpServer } from './mcp-core/server-factory.js';
import { logger } from './observability/logger.js';

interface SessionData {
  transport: StreamableHTTPServerTransport;
  mcpServer: McpServer;
  lastActivityAt: number;
}

export interface McpService {
  handleMcpPost(req: Request, res: Response): Promise<void>;
  handleSessionRequest(req: Request, res: Response): Promise<void>;
  /** Close every open session and stop the reaper */
  close(): Promise<void>;
  readonly sessionCount: number;
}

const SESSION_IDLE_THRESHOLD_MS = 10 * 60 * 1000;
const SESSION_REAPER_INTERVAL_MS = 60 * 1000;

export function createMcpService(dispatcher: Dispatcher): McpService {
  const sessions = new Map<string, SessionData>();

  const reaper = setInterval(() => {
    const now = Date.now();
    for (const [sessionId, session] of sessions) {
      const idleMs = now - session.lastActivityAt;
      if (idleMs > SESSION_IDLE_THRESHOLD_MS) {
        logger.info('Reaping idle MCP session', { sessionId, idleSeconds: Math.round(idleMs / 1000) });
        sessions.delete(sessionId);
        session.transport.close().catch((error: unknown) => {
          logger.warn('Closing idle transport failed', { sessionId, error: String(error) });
        });
      }
    }
  }, SESSION_REAPER_INTERVAL_MS);
  reaper.unref();

  /**
   * Create a session's server and transport and connect them. The session is
   * registered once the transport has answered the initialize request.
   */
  async function openSession(): Promise<StreamableHTTPServerTransport> {
    const mcpServer = createMcpServer(dispatcher);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sessionId: string) => {
        logger.info('MCP session initialized', { sessionId });
        sessions.set(sessionId, { transport, mcpServer, lastActivityAt: Date.now() });
      },
    });

    transport.onclose = () => {
      if (transport.sessionId) {
        logger.info('MCP session closed', { sessionId: transport.sessionId });
        sessions.delete(transport.sessionId);
      }
    };

    await mcpServer.connect(transport);
    return transport;
  }

  async function handleMcpPost(req: Request, res: Response): Promise<void> {
    const sessionId = req.get('mcp-session-id');
    const body: unknown = req.body;
    const isInitialize = isRecord(body) && body.method === 'initialize';

    const existing = sessionId ? sessions.get(sessionId) : undefined;
    let transport: StreamableHTTPServerTransport;

    if (existing) {
      existing.lastActivityAt = Date.now();
      transport = existing.transport;
    } else if (!sessionId && isInitialize) {
      logger.info('New MCP initialization request');
      transport = await openSession();
    } else {
      logger.warn('Rejected MCP request without a valid session', { sessionId: sessionId ?? null });
      sendJsonRpcError(res, 400, -32000, 'Bad Request: No valid session ID provided');
      return;
    }

    await transport.handleRequest(req, res, body);
  }

  async function handleSessionRequest(req: Request, res: Response): Promise<void> {
    const sessionId = req.get('mcp-session-id');
    const session = sessionId ? sessions.get(sessionId) : undefined;
    if (!session) {
      logger.warn('Unknown MCP session', { method: req.method, sessionId: sessionId ?? null });
      res.status(400).send('Invalid or missing session ID');
      return;
    }

    session.lastActivityAt = Date.now();
    await session.transport.handleRequest(req, res);
  }

  async function close(): Promise<void> {
    clearInterval(reaper);
    const open = Array.from(sessions.values());
    sessions.clear();
    await Promise.all(open.map((session) => session.mcpServer.close()));
  }

  return {
    handleMcpPost,
    handleSessionRequest,
    close,
    get sessionCount() {
      return sessions.size;
    },
  };
}

function sendJsonRpcError(res: Response, status: number, code: number, message: string): void {
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code, message },
    id: null,
  });
}
