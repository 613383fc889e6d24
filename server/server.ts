import dotenv from 'dotenv';
import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadRegistry, selectCatalogueSource } from './catalogue/load-catalogue.js';
import { type ServerConfig, loadConfig } from './config.js';
import { createDispatcher, createRequestExecutor, type Dispatcher } from './dispatcher/index.js';
import { createMcpServer } from './mcp-core/index.js';
import { createMcpService } from './mcp-service.js';
import { logger } from './observability/logger.js';
import { handleUncaughtException, handleUnhandledRejection } from './observability/process-errors.js';
import {
  type AtlassianCredentialProvider,
  createApiTokenCredentialProvider,
  createOAuthCredentialProvider,
} from './providers/atlassian/atlassian-api-client.js';
import { resolveJiraBaseUrl } from './providers/atlassian/atlassian-helpers.js';

// configurations
dotenv.config();

function createCredentials(config: ServerConfig): AtlassianCredentialProvider {
  if (config.JIRA_EMAIL && config.JIRA_API_TOKEN) {
    return createApiTokenCredentialProvider(config.JIRA_EMAIL, config.JIRA_API_TOKEN);
  }
  const accessToken = config.JIRA_ACCESS_TOKEN ?? '';
  return createOAuthCredentialProvider(() => accessToken);
}

async function buildDispatcher(config: ServerConfig): Promise<Dispatcher> {
  const registry = await loadRegistry(selectCatalogueSource(config));
  const credentials = createCredentials(config);
  const baseUrl = await resolveJiraBaseUrl(credentials, {
    baseUrl: config.JIRA_BASE_URL,
    cloudId: config.JIRA_CLOUD_ID,
    siteName: config.JIRA_SITE_NAME,
  });

  logger.info('Jira connection configured', { baseUrl, authType: credentials.authType });

  const executor = createRequestExecutor({
    baseUrl,
    credentials,
    requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
    maxRetries: config.MAX_RETRIES,
  });

  return createDispatcher({
    registry,
    executor,
    defaultPollIntervalMs: config.DEFAULT_POLL_INTERVAL_MS,
    defaultMaxWaitMs: config.DEFAULT_MAX_WAIT_MS,
  });
}

async function startStdio(dispatcher: Dispatcher): Promise<void> {
  const mcp = createMcpServer(dispatcher);
  await mcp.connect(new StdioServerTransport());
  logger.info('MCP server listening on stdio');
}

function startHttp(dispatcher: Dispatcher, port: number): void {
  const service = createMcpService(dispatcher);
  const app = express();

  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'OPTIONS', 'DELETE'],
    allowedHeaders: ['Content-Type', 'mcp-session-id', 'mcp-protocol-version', 'last-event-id'],
    exposedHeaders: ['mcp-session-id'],
    maxAge: 86400,
  }));

  // HTTP request logging middleware
  app.use(morgan('common', {
    stream: {
      write: (message: string) => logger.info(message.trim()),
    },
  }));

  app.use(express.json({ limit: '4mb' }));

  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      tools: dispatcher.registry.size,
      sessions: service.sessionCount,
      timestamp: new Date().toISOString(),
    });
  });

  // --- MCP HTTP Endpoints ---
  app.post('/mcp', (req, res, next) => {
    service.handleMcpPost(req, res).catch(next);
  });
  app.get('/mcp', (req, res, next) => {
    service.handleSessionRequest(req, res).catch(next);
  });
  app.delete('/mcp', (req, res, next) => {
    service.handleSessionRequest(req, res).catch(next);
  });

  // Error handler middleware
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    logger.error('Unhandled HTTP error', { method: req.method, url: req.originalUrl, error: err.message, stack: err.stack });
    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(500).json({
      jsonrpc: '2.0',
      error: { code: -32603, message: 'Internal server error' },
      id: null,
    });
  });

  const server = app.listen(port, () => {
    logger.info('MCP server listening on HTTP', { port, endpoint: '/mcp' });
  });

  const shutdown = () => {
    logger.info('Shutting down HTTP server');
    server.close();
    service.close().catch((error: unknown) => {
      logger.error('Closing MCP sessions failed', { error: String(error) });
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

async function main(): Promise<void> {
  const config = loadConfig();
  const dispatcher = await buildDispatcher(config);

  if (config.MCP_TRANSPORT === 'http') {
    startHttp(dispatcher, config.PORT);
  } else {
    await startStdio(dispatcher);
  }
}

// Handle unhandled promise rejections and exceptions
process.on('unhandledRejection', handleUnhandledRejection);
process.on('uncaughtException', (err: Error) => handleUncaughtException(err));

main().catch((error: unknown) => {
  logger.error('Startup failed', { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
