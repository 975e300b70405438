import { Request, Response, NextFunction } from 'express';
import { logApiRequest } from '../config/logger';

/**
 * Logs every request once the response has been sent
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
	const startTime = Date.now();
	res.on('finish', () => {
		logApiRequest(req, res, Date.now() - startTime);
	});
	next();
}
