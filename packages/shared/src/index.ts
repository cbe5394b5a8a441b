/**
 * Shared types, configuration and utilities
 */
export * from './types';
export * from './config/schema';
export * from './utils/errors';
export * from './utils/helpers';
export * from './utils/logger';
