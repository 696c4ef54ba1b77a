#!/usr/bin/env node
/**
 * Expedition Selector MCP Server
 *
 * Exposes the selector to an LLM game master as one consolidated tool
 * (expedition_manage) over stdio.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';

import { loadConfig } from '../config.js';
import { getExpeditionData } from '../data/index.js';
import { createLogger, logError, setLogLevel } from '../utils/logger.js';
import { ExpeditionManageTool, handleExpeditionManage } from './consolidated/expedition-manage.js';
import { withSession } from './types.js';

const log = createLogger('Server');

/**
 * Setup graceful shutdown handlers.
 */
function setupShutdownHandlers(server: McpServer): void {
  let isShuttingDown = false;

  const shutdown = (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    log.info(`Received ${signal}, shutting down gracefully...`);

    server.close().then(
      () => {
        log.info('Shutdown complete');
        process.exit(0);
      },
      (error: unknown) => {
        logError(log, 'Error during shutdown', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGHUP', () => shutdown('SIGHUP'));

  process.on('uncaughtException', (error) => {
    logError(log, 'Uncaught exception', error);
    shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logError(log, 'Unhandled rejection', reason);
    shutdown('unhandledRejection');
  });
}

async function main() {
  const config = loadConfig();
  if (config.logLevel) {
    setLogLevel(config.logLevel);
  }

  // Datasets load at startup; a broken one stops the server
  const pools = getExpeditionData(config.dataDir);
  log.info(`Datasets ready: ${pools.waves.length} waves from ${config.dataDir}`);

  const server = new McpServer({
    name: 'expedition-selector',
    version: '1.0.0'
  });

  setupShutdownHandlers(server);

  server.tool(
    ExpeditionManageTool.name,
    ExpeditionManageTool.description,
    ExpeditionManageTool.inputSchema.extend({ sessionId: z.string().optional() }).shape,
    withSession(ExpeditionManageTool.inputSchema, handleExpeditionManage)
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('Expedition MCP Server running on stdio');
}

main().catch((error: unknown) => {
  logError(log, 'Server error', error);
  process.exit(1);
});
