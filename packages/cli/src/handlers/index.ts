/**
 * Export all handlers
 */
export { handler as sendNotificationHandler } from './send-notification';
export { handler as validateConfigHandler } from './validate-config';
export * from './report';
export type { CommandHandler, HandlerDeps, LineWriter } from './types';
