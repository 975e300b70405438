import jwt from 'jsonwebtoken';

const FALLBACK_SECRET = 'change_this_to_a_strong_secret_in_env';
const DEFAULT_ACCESS_EXPIRES_IN = '7d';

function getAccessSecret(): string {
	return process.env.JWT_ACCESS_SECRET || process.env.JWT_SECRET || FALLBACK_SECRET;
}

export function signAccessToken(
	payload: Record<string, unknown>,
	options?: { expiresIn?: string | number; secret?: string }
): string {
	const expiresIn = options?.expiresIn ?? (process.env.JWT_EXPIRES_IN || DEFAULT_ACCESS_EXPIRES_IN);
	return jwt.sign(payload, options?.secret ?? getAccessSecret(), { expiresIn } as jwt.SignOptions);
}

/**
 * Verify a bearer token and return its claims.
 * Throws jsonwebtoken's TokenExpiredError / JsonWebTokenError on failure.
 */
export function verifyAccessToken(token: string, secret?: string): jwt.JwtPayload {
	const decoded = jwt.verify(token, secret ?? getAccessSecret());
	if (typeof decoded === 'string') {
		throw new jwt.JsonWebTokenError('Token payload must be a JSON object');
	}
	return decoded;
}
