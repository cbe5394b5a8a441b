/**
 * Message formatting and delivery adapters
 */
export * from './interfaces';
export * from './formatters';
export * from './providers';
export * from './factory';
