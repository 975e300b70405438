/**
 * Database Configuration for Material Service
 */

import type { Pool } from 'pg';
import { createPostgresPool } from '@campus-portal/shared/databases/postgres/connection';
import logger from '@campus-portal/shared/config/logger';

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) {
    pool = createPostgresPool({
      max: 10,
      connectionTimeoutMillis: 20000,
      applicationName: 'material-service',
    });
  }
  return pool;
}

/**
 * Verify connectivity once at startup so a bad DATABASE_URL fails fast
 */
export async function initDatabase(): Promise<Pool> {
  const activePool = getPool();
  await activePool.query('SELECT NOW()');
  logger.info('PostgreSQL connected', { service: 'material-service' });
  return activePool;
}

export async function closeDatabase(): Promise<void> {
  if (!pool) {
    return;
  }
  await pool.end();
  pool = null;
  logger.info('PostgreSQL pool closed', { service: 'material-service' });
}
