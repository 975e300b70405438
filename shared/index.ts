/**
 * Shared Package - Main Export
 * Central export point for utilities, types, and configuration used by every portal service
 */

// Config (loads .env as a side effect)
export * from './config';
export {
    logServiceStart,
    logServiceStop,
    logApiRequest,
    logApiError,
    logDatabaseOperation,
    logSecurityEvent,
} from './config/logger';

// Database connections
export * from './databases/index';

// Middlewares
export * from './middlewares/authMiddleware';
export * from './middlewares/correlationId';
export * from './middlewares/healthChecks';
export * from './middlewares/requestLogger';
export { globalErrorHandler, buildLoginUrl } from './middlewares/globalErrorHandler';

// Utils
export * from './utils/asyncHandler';
export * from './utils/responseBuilder';
export * from './utils/tokenManager';
export * from './utils/errorMessages';
export * from './utils/querySchemas';

// Types
export * from './types/caller';
import './types/express';
