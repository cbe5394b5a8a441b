/**
 * Notification handler: environment in, one Matrix message out
 */
import {
  ConfigurationError,
  DeliveryOutcome,
  DeliveryStatus,
  DeliveryTarget,
  Environment,
  NotificationChannel,
  TransportError,
  createLogger,
  describeError,
  loadDeliveryTarget,
  loadLogLevel,
  loadNotificationContext,
} from '@matrix-notify/shared';
import { AdapterFactory, buildMessage } from '@matrix-notify/adapters';
import { createOutput, reportOutcome } from './report';
import { CommandHandler, HandlerDeps } from './types';

async function sendNotification(env: Environment, deps: HandlerDeps): Promise<DeliveryOutcome> {
  const logger = createLogger({}, loadLogLevel(env), deps.logSink);

  let target: DeliveryTarget;
  try {
    target = loadDeliveryTarget(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return { status: DeliveryStatus.FATAL, error };
    }
    throw error;
  }

  const context = loadNotificationContext(env);
  logger.debug('Building notification message', {
    kind: context.kind,
    notificationType: context.notificationType,
    hostname: context.hostname,
    state: context.state,
  });
  const message = buildMessage(context);

  const adapter = AdapterFactory.createNotificationAdapter(
    NotificationChannel.MATRIX,
    { ...target },
    {
      client: deps.client,
      generateTransactionId: deps.generateTransactionId,
      logger,
    }
  );

  return adapter.send(message);
}

export const handler: CommandHandler = async (env, deps = {}) => {
  const output = createOutput(deps);

  try {
    return reportOutcome(output, await sendNotification(env, deps));
  } catch (error) {
    return reportOutcome(output, {
      status: DeliveryStatus.RETRYABLE,
      error: new TransportError('request', describeError(error), { cause: error }),
    });
  }
};
