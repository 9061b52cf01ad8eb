#!/usr/bin/env node
// src/index.ts
import { createGoogleClientsProvider } from './clients.js';
import { loadConfig } from './config.js';
import { logger, setLogLevel } from './logger.js';
import { createServer } from './server.js';

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', error);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', reason);
});

async function startServer(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const getClients = createGoogleClientsProvider(config.tokenPath);
  await getClients(); // Authorize before accepting connections.

  const server = createServer({ getClients });
  logger.info('Starting Google Slides MCP server...');
  if (config.transport === 'httpStream') {
    await server.start({ transportType: 'httpStream', httpStream: { endpoint: '/mcp', port: config.port } });
    logger.info(`MCP server listening on http://localhost:${config.port}/mcp`);
  } else {
    await server.start({ transportType: 'stdio' });
    logger.info('MCP server running on stdio. Awaiting client connection...');
  }
}

startServer().catch((error: unknown) => {
  logger.error('FATAL: server failed to start', error);
  process.exit(1);
});
