/**
 * Abstract interface for notification providers
 */
import { DeliveryOutcome, Message, NotificationChannel } from '@matrix-notify/shared';

export interface INotificationAdapter {
  /**
   * Get the channel this adapter supports
   */
  getChannel(): NotificationChannel;

  /**
   * Send a message once. Failures are returned as outcomes, never thrown.
   */
  send(message: Message): Promise<DeliveryOutcome>;

  /**
   * Validate configuration against the remote service
   */
  validateConfig(): Promise<boolean>;
}
