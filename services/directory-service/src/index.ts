/**
 * Directory Service Entry Point
 */

import '@campus-portal/shared/config';
import type { Server } from 'http';
import { loadServiceConfig } from '@campus-portal/shared/config/configLoader';
import logger, { logServiceStart, logServiceStop } from '@campus-portal/shared/config/logger';
import { createApp, createPostgresStores } from './app';
import { closeDatabase, getPool, initDatabase } from './config/database';

const SERVICE_NAME = 'directory-service';

let server: Server | null = null;

async function start(): Promise<void> {
  const config = loadServiceConfig(SERVICE_NAME, {
    defaultPort: 3102,
    requirePostgres: true,
    requireJWT: true,
  });

  const pool = await initDatabase();
  const app = createApp({ stores: createPostgresStores(pool), getPool });

  server = app.listen(config.PORT, () => {
    logServiceStart(SERVICE_NAME, config.PORT);
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    logger.error(err.code === 'EADDRINUSE' ? `Port ${config.PORT} is already in use` : 'Server error', {
      service: SERVICE_NAME,
      port: config.PORT,
      error: err.message,
      code: err.code,
    });
    process.exit(1);
  });

  // Graceful shutdown handler
  const gracefulShutdown = (signal: string) => {
    logger.info(`Received ${signal}, starting graceful shutdown`, { service: SERVICE_NAME });

    // Force shutdown after 30 seconds
    const forceTimer = setTimeout(() => {
      logger.error('Forced shutdown after timeout', { service: SERVICE_NAME });
      process.exit(1);
    }, 30000);
    forceTimer.unref();

    if (!server) {
      process.exit(0);
    }

    server.close(() => {
      logServiceStop(SERVICE_NAME, config.PORT);
      closeDatabase()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Failed to close PostgreSQL pool', {
            service: SERVICE_NAME,
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

start().catch((error: unknown) => {
  logger.error('Failed to start directory service', {
    service: SERVICE_NAME,
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
