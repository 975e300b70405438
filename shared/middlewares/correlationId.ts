/**
 * Correlation ID Middleware
 * Reuses the caller's correlation id or mints one, and echoes it on the response
 */

import { Request, Response, NextFunction } from 'express';
import { randomBytes } from 'crypto';
import '../types/express';

/**
 * Format: corr-{timestamp}-{random}
 */
function generateCorrelationId(): string {
	const timestamp = Date.now();
	const random = randomBytes(12).toString('hex');
	return `corr-${timestamp}-${random}`;
}

/**
 * Supports both X-Correlation-ID and Correlation-Id headers
 */
function extractCorrelationId(req: Request): string {
	const correlationId = req.headers['x-correlation-id'] || req.headers['correlation-id'];

	if (Array.isArray(correlationId)) {
		return correlationId[0] || generateCorrelationId();
	}

	return correlationId || generateCorrelationId();
}

export function correlationIdMiddleware(req: Request, res: Response, next: NextFunction): void {
	const correlationId = extractCorrelationId(req);
	req.correlationId = correlationId;
	res.setHeader('X-Correlation-ID', correlationId);
	next();
}
