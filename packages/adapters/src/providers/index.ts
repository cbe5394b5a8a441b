/**
 * Export all provider implementations
 */
export * from './matrix-notification';
