#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './server.js';
import { CONFIG_ENV_VAR } from './security/config.js';

async function main() {
  const configPath = process.env[CONFIG_ENV_VAR];

  const { server, logger, dispose } = createServer({ configPath });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('permterm MCP server running on stdio');

  const shutdown = async () => {
    logger.info('Shutting down server...');

    // Kill session processes before the transport goes away
    dispose();

    await server.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
