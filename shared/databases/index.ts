/**
 * Database Connection Exports
 */

export * from './postgres/connection';
