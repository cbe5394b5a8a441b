/**
 * Error taxonomy for a notification run
 */

/**
 * Base class for every failure a run can end with
 */
export abstract class NotifyError extends Error {
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A required environment variable is absent or empty
 */
export class ConfigurationError extends NotifyError {
  readonly retryable = false;

  constructor(readonly variable: string) {
    super(`Missing required environment variable: ${variable}`);
  }
}

export type TransportFailureReason = 'timeout' | 'connection' | 'request';

/**
 * The request never produced an HTTP response
 */
export class TransportError extends NotifyError {
  readonly retryable = true;

  constructor(
    readonly reason: TransportFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The homeserver answered with a non-2xx status
 */
export class ProtocolError extends NotifyError {
  readonly retryable = true;

  constructor(
    readonly status: number,
    readonly statusText: string,
    readonly errcode?: string,
    readonly detail?: string
  ) {
    super(formatStatus(status, statusText, errcode, detail));
  }
}

function formatStatus(
  status: number,
  statusText: string,
  errcode?: string,
  detail?: string
): string {
  const summary = `${status} ${statusText}`.trim();
  if (!errcode) {
    return summary;
  }
  return `${summary} (${detail ? `${errcode}: ${detail}` : errcode})`;
}

/**
 * Render any thrown value as a single line
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
