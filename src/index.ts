#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { getConfig } from './config.js';
import { server, SERVER_NAME } from './server.js';
import { VERSION } from './version.js';
import { logToStderr, setLogLevel } from './utils/logger.js';

async function runServer() {
  const config = getConfig();
  setLogLevel(config.logLevel);

  process.on('uncaughtException', (error) => {
    logToStderr('error', `Uncaught exception: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logToStderr('error', `Unhandled rejection: ${reason instanceof Error ? reason.message : String(reason)}`);
    process.exit(1);
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logToStderr('info', `${SERVER_NAME} v${VERSION} running on stdio`);
}

runServer().catch((error) => {
  logToStderr('error', `Fatal error running server: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
