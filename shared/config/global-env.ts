import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import logger from './logger';

function findEnvPath(startDir = process.cwd()): string | null {
	let current = startDir;
	while (true) {
		const candidate = path.join(current, '.env');
		if (fs.existsSync(candidate)) {
			return candidate;
		}
		const parent = path.dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}
	return null;
}

// Load .env at import time (file system only, no connections)
const resolvedEnvPath = process.env.NODE_ENV === 'test' ? null : findEnvPath();

if (resolvedEnvPath) {
	const result = dotenv.config({ path: resolvedEnvPath });
	if (result.error) {
		logger.warn('⚠️ Failed to load .env file, falling back to process environment');
	} else {
		logger.info(`✅ Environment variables loaded from ${resolvedEnvPath}`);
	}
} else if (process.env.NODE_ENV !== undefined && process.env.NODE_ENV !== 'test') {
	logger.warn('⚠️ .env file not found in current or parent directories, using process environment');
}
