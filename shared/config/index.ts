// Loads .env as a side effect
import './global-env';

export * from './errorHandler';
export * from './configLoader';
export * from './pool-limits';

export { default as logger } from './logger';
export { default } from './logger';
