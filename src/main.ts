#!/usr/bin/env node
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { scoped } from './logging.js';
import { createServer } from './server/app.js';
import { createAppContextOrExit } from './server/context.js';

const log = scoped('main');

const server = createServer(createAppContextOrExit());

process.on('SIGINT', () => {
  server
    .close()
    .catch((err: unknown) => log.error({ err }, 'close failed'))
    .finally(() => process.exit(0));
});

const transport = new StdioServerTransport();
server.connect(transport).catch((err: unknown) => {
  log.error({ err }, 'Failed to start MCP stdio server');
  process.exit(1);
});
