import { Pool, PoolClient, PoolConfig } from 'pg';
import { SAFE_POOL_LIMITS } from '../../config/pool-limits';
import logger from '../../config/logger';

export interface PostgresPoolOptions {
	connectionString?: string;
	ssl?: PoolConfig['ssl'];
	min?: number;
	max?: number;
	idleTimeoutMillis?: number;
	connectionTimeoutMillis?: number;
	applicationName?: string;
}

/**
 * Build a connection string from POSTGRES_URL / POSTGRES_URI / DATABASE_URL,
 * falling back to POSTGRES_HOST + POSTGRES_USER + POSTGRES_PASSWORD + POSTGRES_DB.
 */
export function buildPostgresConnectionString(env: NodeJS.ProcessEnv = process.env): string {
	const url = env.POSTGRES_URL || env.POSTGRES_URI || env.DATABASE_URL;
	if (url) {
		if (env.POSTGRES_SSL === 'true' && !/sslmode=/.test(url)) {
			const sep = url.includes('?') ? '&' : '?';
			return `${url}${sep}uselibpqcompat=true&sslmode=require`;
		}
		return url;
	}

	const { POSTGRES_USER, POSTGRES_PASSWORD, POSTGRES_DB } = env;
	if (!POSTGRES_USER || !POSTGRES_PASSWORD || !POSTGRES_DB) {
		throw new Error(
			'POSTGRES_URL (or POSTGRES_URI / DATABASE_URL) or POSTGRES_USER + POSTGRES_PASSWORD + POSTGRES_DB is required.'
		);
	}
	const host = env.POSTGRES_HOST || 'localhost';
	const port = env.POSTGRES_PORT || '5432';
	return `postgresql://${encodeURIComponent(POSTGRES_USER)}:${encodeURIComponent(POSTGRES_PASSWORD)}@${host}:${port}/${POSTGRES_DB}`;
}

export function createPostgresPool(options: PostgresPoolOptions = {}): Pool {
	const connectionString = options.connectionString || buildPostgresConnectionString(process.env);
	const ssl = options.ssl !== undefined
		? options.ssl
		: process.env.POSTGRES_SSL === 'true'
			? { rejectUnauthorized: false }
			: false;

	const pool = new Pool({
		connectionString,
		ssl,
		min: options.min ?? SAFE_POOL_LIMITS.getMin(),
		max: options.max ?? SAFE_POOL_LIMITS.getMax(),
		idleTimeoutMillis: options.idleTimeoutMillis ?? 30000,
		connectionTimeoutMillis: options.connectionTimeoutMillis ?? 30000,
		keepAlive: true,
		application_name: options.applicationName || `campus-portal-${process.env.NODE_ENV || 'development'}-${process.pid}`,
		// Prevents queries from running indefinitely
		options: `-c statement_timeout=${process.env.DB_STATEMENT_TIMEOUT || '30000'}`,
	});

	pool.on('error', (error) => {
		logger.error('Unexpected PostgreSQL pool error', {
			service: 'postgres-connection',
			error: error.message,
		});
	});

	return pool;
}

/**
 * Run handler inside BEGIN/COMMIT on a dedicated client; rolls back on any error.
 */
export async function withTransaction<T>(pool: Pool, handler: (client: PoolClient) => Promise<T>): Promise<T> {
	const client = await pool.connect();
	try {
		await client.query('BEGIN');
		const result = await handler(client);
		await client.query('COMMIT');
		return result;
	} catch (error) {
		await client.query('ROLLBACK');
		throw error;
	} finally {
		client.release();
	}
}
