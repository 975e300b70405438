import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { AppError } from '../config/errorHandler';
import logger from '../config/logger';
import { verifyAccessToken } from '../utils/tokenManager';
import { ErrorMessages } from '../utils/errorMessages';
import { ANONYMOUS_CALLER, type AuthenticatedCaller, type Caller } from '../types/caller';
import '../types/express';

const tokenClaimsSchema = z.object({
	// users.id
	sub: z.string().uuid(),
	email: z.string().optional(),
	role: z.enum(['student', 'cr', 'faculty', 'authority', 'moderator']).default('student'),
	isStaff: z.boolean().default(false),
	isSuperuser: z.boolean().default(false),
});

export function callerFromClaims(claims: unknown): AuthenticatedCaller {
	const parsed = tokenClaimsSchema.parse(claims);
	return {
		authenticated: true,
		userId: parsed.sub,
		email: parsed.email,
		role: parsed.role,
		isStaff: parsed.isStaff,
		isSuperuser: parsed.isSuperuser,
	};
}

/**
 * Resolves req.caller from an optional bearer token.
 * No header means an anonymous caller; a bad token is rejected with 401.
 */
export function attachCallerContext(req: Request, _res: Response, next: NextFunction): void {
	const header = req.headers.authorization;
	if (!header || !header.startsWith('Bearer ')) {
		req.caller = ANONYMOUS_CALLER;
		return next();
	}

	const token = header.substring('Bearer '.length).trim();
	if (!token) {
		req.caller = ANONYMOUS_CALLER;
		return next();
	}

	try {
		req.caller = callerFromClaims(verifyAccessToken(token));
		next();
	} catch (error) {
		if (error instanceof jwt.TokenExpiredError) {
			return next(new AppError(ErrorMessages.AUTH_TOKEN_EXPIRED, 401, 'TOKEN_EXPIRED'));
		}

		logger.warn('Failed to verify access token', {
			error: error instanceof Error ? error.message : String(error),
			correlationId: req.correlationId,
		});
		next(new AppError(ErrorMessages.AUTH_TOKEN_INVALID, 401, 'TOKEN_INVALID'));
	}
}

export function getCaller(req: Request): Caller {
	return req.caller ?? ANONYMOUS_CALLER;
}

/**
 * Returns the authenticated caller or throws the Unauthenticated error
 */
export function requireCaller(req: Request): AuthenticatedCaller {
	const caller = getCaller(req);
	if (!caller.authenticated) {
		throw new AppError(ErrorMessages.AUTH_REQUIRED, 401, 'UNAUTHENTICATED');
	}
	return caller;
}

export function isStaffCaller(caller: Caller): boolean {
	return caller.authenticated && (caller.isStaff || caller.isSuperuser);
}

export function requireAuth(req: Request, _res: Response, next: NextFunction): void {
	if (!getCaller(req).authenticated) {
		return next(new AppError(ErrorMessages.AUTH_REQUIRED, 401, 'UNAUTHENTICATED'));
	}
	next();
}

/**
 * Staff or superuser only (admin scaffolding and analytics)
 */
export function requireStaff(req: Request, _res: Response, next: NextFunction): void {
	const caller = getCaller(req);
	if (!caller.authenticated) {
		return next(new AppError(ErrorMessages.AUTH_REQUIRED, 401, 'UNAUTHENTICATED'));
	}
	if (!isStaffCaller(caller)) {
		return next(new AppError(ErrorMessages.FORBIDDEN, 403, 'FORBIDDEN'));
	}
	next();
}
