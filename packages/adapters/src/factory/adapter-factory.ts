/**
 * Factory for creating adapter instances based on configuration
 */
import { DeliveryTargetConfigSchema, NotificationChannel } from '@matrix-notify/shared';
import { INotificationAdapter } from '../interfaces';
import { MatrixAdapterOptions, MatrixNotificationAdapter } from '../providers';

export class AdapterFactory {
  /**
   * Create a notification adapter
   */
  static createNotificationAdapter(
    channel: NotificationChannel,
    config: Record<string, unknown>,
    options: MatrixAdapterOptions = {}
  ): INotificationAdapter {
    switch (channel) {
      case NotificationChannel.MATRIX:
        return new MatrixNotificationAdapter(DeliveryTargetConfigSchema.parse(config), options);
      default:
        throw new Error(`Unsupported notification channel: ${String(channel)}`);
    }
  }
}
