#!/usr/bin/env node
// strata-rag server entry point
import { createLogger } from '@strata-rag/core';
import { loadConfig } from '@strata-rag/shared';
import { HTTPTransport } from './http.js';
import { SharedResources } from './shared-resources.js';

const DEFAULT_PORT = 3000;
const logger = createLogger('main');

async function main(): Promise<void> {
  const config = loadConfig();

  const portArg = process.argv.find((arg) => arg.startsWith('--port='));
  const port = portArg
    ? Number.parseInt(portArg.split('=')[1], 10)
    : Number.parseInt(process.env.PORT ?? String(DEFAULT_PORT), 10);

  const resources = new SharedResources(config);
  const transport = new HTTPTransport({ port, host: process.env.HOST || undefined });
  transport.attachResources(resources);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info('Shutting down', { signal });
    try {
      await transport.stop();
      await resources.stop();
      logger.info('Server stopped gracefully');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    logger.info('Connecting graph storage', { backend: config.storage.graphBackend });
    await resources.start();

    await transport.start();

    const address = transport.getAddress();
    logger.info('strata-rag server running', {
      mcp: `http://${address?.host}:${address?.port}/mcp`,
      health: `http://${address?.host}:${address?.port}/health`,
    });
  } catch (error) {
    logger.error('Failed to start server', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
