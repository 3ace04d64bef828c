/**
 * Entry point: COOKIE_SECRET=... node --import tsx apps/server/src/index.ts
 */

import type { FastifyInstance } from 'fastify';
import { createLogger, errorMessage } from '@cookie-vault/crypto';
import { loadServerConfig } from './config.js';
import { buildServer } from './server.js';

const log = createLogger('server');

let server: FastifyInstance | null = null;

async function start(): Promise<void> {
  // A ConfigError rejects start() and the process exits
  const config = loadServerConfig();
  server = await buildServer(config);
  await server.listen({ port: config.port, host: config.host });
}

async function shutdown(): Promise<void> {
  log.info('Shutting down...');
  if (server) {
    await server.close();
  }
  log.info('Shutdown complete');
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown().catch((err: unknown) => {
    log.error({ err }, 'Error during shutdown');
    process.exit(1);
  });
});
process.on('SIGINT', () => {
  shutdown().catch((err: unknown) => {
    log.error({ err }, 'Error during shutdown');
    process.exit(1);
  });
});

start().catch((err: unknown) => {
  log.fatal({ err: errorMessage(err) }, 'Failed to start server');
  process.exit(1);
});
