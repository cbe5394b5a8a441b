/**
 * Notification types shared by the message builder and the CLI
 */

/**
 * What a monitoring notification is about
 */
export enum NotificationKind {
  HOST = 'HOST',
  SERVICE = 'SERVICE',
}

/**
 * Alert context for a single notification, read once per invocation.
 * Absent fields are empty strings.
 */
export interface NotificationContext {
  kind: NotificationKind;
  notificationType: string;
  hostname: string;
  site: string;
  timestamp: string;
  state: string;
  previousState: string;
  output: string;
  /** Empty unless kind is SERVICE */
  serviceName: string;
}

/**
 * Rendered message: plain text body plus its HTML rendering
 */
export interface Message {
  plainText: string;
  htmlText: string;
}
