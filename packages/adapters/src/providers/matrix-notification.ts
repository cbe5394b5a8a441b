/**
 * Matrix notification adapter (client-server API v3)
 * @see https://spec.matrix.org/v1.10/client-server-api/#put_matrixclientv3roomsroomidsendeventtypetxnid
 */
import axios, { AxiosError, AxiosInstance, AxiosResponse } from 'axios';
import {
  DeliveryOutcome,
  DeliveryStatus,
  DeliveryTarget,
  Logger,
  Message,
  NotificationChannel,
  ProtocolError,
  REQUEST_TIMEOUT_MS,
  TransportError,
  buildHomeserverUrl,
  createLogger,
  describeError,
  generateTransactionId,
} from '@matrix-notify/shared';
import { INotificationAdapter } from '../interfaces';

/**
 * Body of an m.room.message event with an HTML rendering
 */
export interface MatrixTextMessage {
  msgtype: 'm.text';
  body: string;
  format: 'org.matrix.custom.html';
  formatted_body: string;
}

export interface MatrixAdapterOptions {
  /** HTTP client; defaults to a fresh axios instance */
  client?: AxiosInstance;
  /** Transaction ID source; defaults to random UUIDs */
  generateTransactionId?: () => string;
  logger?: Logger;
}

const TIMEOUT_CODES = new Set<string>([AxiosError.ECONNABORTED, AxiosError.ETIMEDOUT, 'ETIMEDOUT']);

const CONNECTION_CODES = new Set<string>([
  AxiosError.ERR_NETWORK,
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'EPROTO',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
]);

function isConnectionCode(code: string): boolean {
  return CONNECTION_CODES.has(code) || code.startsWith('CERT_') || code.startsWith('ERR_TLS_');
}

/**
 * Map a thrown transport failure to a TransportError
 */
export function classifyTransportError(error: unknown, signal?: AbortSignal): TransportError {
  if (signal?.aborted || (axios.isAxiosError(error) && TIMEOUT_CODES.has(error.code ?? ''))) {
    return new TransportError('timeout', 'Request timed out', { cause: error });
  }

  if (axios.isAxiosError(error) && isConnectionCode(error.code ?? '')) {
    return new TransportError('connection', describeError(error), { cause: error });
  }

  return new TransportError('request', describeError(error), { cause: error });
}

function readMatrixError(data: unknown): { errcode?: string; error?: string } {
  if (typeof data !== 'object' || data === null) {
    return {};
  }
  const errcode = 'errcode' in data && typeof data.errcode === 'string' ? data.errcode : undefined;
  const error = 'error' in data && typeof data.error === 'string' ? data.error : undefined;
  return { errcode, error };
}

function readEventId(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'event_id' in data) {
    return typeof data.event_id === 'string' ? data.event_id : undefined;
  }
  return undefined;
}

/**
 * Map a received response to a ProtocolError, or null for 2xx
 */
export function classifyResponse(response: AxiosResponse): ProtocolError | null {
  if (response.status >= 200 && response.status < 300) {
    return null;
  }
  const { errcode, error } = readMatrixError(response.data);
  return new ProtocolError(response.status, response.statusText, errcode, error);
}

export class MatrixNotificationAdapter implements INotificationAdapter {
  private config: DeliveryTarget;
  private client: AxiosInstance;
  private nextTransactionId: () => string;
  private logger: Logger;

  constructor(config: DeliveryTarget, options: MatrixAdapterOptions = {}) {
    this.config = config;
    this.client = options.client ?? axios.create();
    this.nextTransactionId = options.generateTransactionId ?? generateTransactionId;
    this.logger = (options.logger ?? createLogger()).child({
      homeserver: config.homeserver,
      roomId: config.roomId,
    });
  }

  getChannel(): NotificationChannel {
    return NotificationChannel.MATRIX;
  }

  /**
   * URL of the send-event endpoint for one transaction
   */
  buildSendUrl(transactionId: string): string {
    return buildHomeserverUrl(this.config.homeserver, [
      '_matrix',
      'client',
      'v3',
      'rooms',
      this.config.roomId,
      'send',
      'm.room.message',
      transactionId,
    ]);
  }

  async send(message: Message): Promise<DeliveryOutcome> {
    const transactionId = this.nextTransactionId();
    const log = this.logger.child({ transactionId });
    const payload: MatrixTextMessage = {
      msgtype: 'm.text',
      body: message.plainText,
      format: 'org.matrix.custom.html',
      formatted_body: message.htmlText,
    };

    log.debug('Sending Matrix message');

    const signal = AbortSignal.timeout(REQUEST_TIMEOUT_MS);
    let response: AxiosResponse;
    try {
      response = await this.client.put(this.buildSendUrl(transactionId), payload, {
        headers: this.buildHeaders(),
        timeout: REQUEST_TIMEOUT_MS,
        signal,
        validateStatus: () => true,
      });
    } catch (error) {
      const transportError = classifyTransportError(error, signal);
      log.debug('Matrix request failed', {
        reason: transportError.reason,
        error: transportError.message,
      });
      return { status: DeliveryStatus.RETRYABLE, error: transportError };
    }

    const protocolError = classifyResponse(response);
    if (protocolError) {
      log.debug('Matrix homeserver rejected message', {
        status: protocolError.status,
        errcode: protocolError.errcode,
      });
      return { status: DeliveryStatus.RETRYABLE, error: protocolError };
    }

    const eventId = readEventId(response.data);
    log.info('Matrix message delivered', { eventId });
    return { status: DeliveryStatus.DELIVERED, transactionId, eventId };
  }

  async validateConfig(): Promise<boolean> {
    const url = buildHomeserverUrl(this.config.homeserver, [
      '_matrix',
      'client',
      'v3',
      'account',
      'whoami',
    ]);

    try {
      const response = await this.client.get(url, {
        headers: this.buildHeaders(),
        timeout: REQUEST_TIMEOUT_MS,
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        validateStatus: () => true,
      });
      const rejected = classifyResponse(response);
      if (rejected) {
        this.logger.warn('Access token check failed', { error: rejected.message });
        return false;
      }
      return true;
    } catch (error) {
      this.logger.warn('Access token check failed', {
        error: classifyTransportError(error).message,
      });
      return false;
    }
  }

  private buildHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.config.accessToken}`,
    };
  }
}

/**
 * Deliver one message to a Matrix room
 */
export function deliver(
  target: DeliveryTarget,
  message: Message,
  options?: MatrixAdapterOptions
): Promise<DeliveryOutcome> {
  return new MatrixNotificationAdapter(target, options).send(message);
}
