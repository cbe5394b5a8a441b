/**
 * Handler contract shared by the CLI commands
 */
import type { AxiosInstance } from 'axios';
import type { Environment, ExitCode, LogSink } from '@matrix-notify/shared';

export type LineWriter = (line: string) => void;

/**
 * Collaborators a handler may be given instead of the real ones
 */
export interface HandlerDeps {
  client?: AxiosInstance;
  generateTransactionId?: () => string;
  stdout?: LineWriter;
  stderr?: LineWriter;
  logSink?: LogSink;
}

export type CommandHandler = (env: Environment, deps?: HandlerDeps) => Promise<ExitCode>;
