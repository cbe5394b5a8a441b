/**
 * Adapter types for delivery channels
 */
import type { ConfigurationError, ProtocolError, TransportError } from '../utils/errors';

/**
 * Notification channel types
 */
export enum NotificationChannel {
  MATRIX = 'MATRIX',
}

/**
 * Matrix room a notification is delivered to
 */
export interface DeliveryTarget {
  /** Homeserver hostname, e.g. "matrix.example.org" */
  readonly homeserver: string;
  readonly accessToken: string;
  /** Room ID, e.g. "!abc123:example.org" */
  readonly roomId: string;
}

export enum DeliveryStatus {
  DELIVERED = 'DELIVERED',
  RETRYABLE = 'RETRYABLE',
  FATAL = 'FATAL',
}

export type DeliveryOutcome =
  | {
      status: DeliveryStatus.DELIVERED;
      transactionId: string;
      eventId?: string;
    }
  | {
      status: DeliveryStatus.RETRYABLE;
      error: TransportError | ProtocolError;
    }
  | {
      status: DeliveryStatus.FATAL;
      error: ConfigurationError;
    };

/**
 * Process exit codes understood by CheckMK
 */
export enum ExitCode {
  SUCCESS = 0,
  /** CheckMK retries the notification */
  RETRY = 1,
  /** CheckMK gives up on the notification */
  FAILED = 2,
}
