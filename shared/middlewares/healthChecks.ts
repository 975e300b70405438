/**
 * Health Check Middleware
 * Provides /health (liveness) and /ready (readiness) endpoints
 * /ready checks database connectivity
 */

import { Request, Response } from 'express';
import type { Pool } from 'pg';
import logger from '../config/logger';

interface HealthCheckOptions {
	serviceName: string;
	getPostgresPool?: () => Pool;
}

async function checkPostgres(getPool?: () => Pool): Promise<'ok' | 'error'> {
	if (!getPool) {
		return 'ok';
	}

	try {
		const result = await getPool().query('SELECT 1 as health');
		return result.rows.length > 0 ? 'ok' : 'error';
	} catch (error) {
		logger.warn('PostgreSQL health check failed', {
			error: error instanceof Error ? error.message : String(error),
		});
		return 'error';
	}
}

/**
 * /health - liveness probe (always 200 while the process responds)
 * /ready - readiness probe (503 while dependencies are unhealthy)
 */
export function createHealthCheckEndpoints(options: HealthCheckOptions) {
	const { serviceName, getPostgresPool } = options;

	const healthHandler = (_req: Request, res: Response) => {
		res.status(200).json({
			status: 'ok',
			service: serviceName,
			timestamp: new Date().toISOString(),
		});
	};

	const readyHandler = async (_req: Request, res: Response) => {
		const checks = {
			postgres: await checkPostgres(getPostgresPool),
		};

		const allHealthy = Object.values(checks).every((status) => status === 'ok');

		res.status(allHealthy ? 200 : 503).json({
			ready: allHealthy,
			service: serviceName,
			checks,
			timestamp: new Date().toISOString(),
		});
	};

	return {
		healthHandler,
		readyHandler,
	};
}
