#!/usr/bin/env node
/**
 * Entry point: STDIO transport.
 */
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { createRuntime } from './runtime.js';
import { createServer } from './server.js';

async function main(): Promise<void> {
  loadConfig();
  const runtime = createRuntime();
  const server = createServer(runtime);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ agents: runtime.registry.size }, 'Consultation server listening on stdio');

  const shutdown = async () => {
    runtime.stop();
    await server.close();
    process.exit(0);
  };
  process.on('SIGINT', () => { void shutdown(); });
  process.on('SIGTERM', () => { void shutdown(); });
}

main().catch((err) => {
  logger.fatal({ err }, 'Consultation server failed');
  process.exit(1);
});
