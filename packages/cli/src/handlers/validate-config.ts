/**
 * Configuration check handler (--check): verifies the access token
 * against the homeserver without posting anything
 */
import {
  ConfigurationError,
  DeliveryStatus,
  ExitCode,
  NotificationChannel,
  createLogger,
  describeError,
  loadDeliveryTarget,
  loadLogLevel,
} from '@matrix-notify/shared';
import { AdapterFactory } from '@matrix-notify/adapters';
import { createOutput, reportOutcome } from './report';
import { CommandHandler } from './types';

export const handler: CommandHandler = async (env, deps = {}) => {
  const output = createOutput(deps);
  const logger = createLogger({}, loadLogLevel(env), deps.logSink);

  try {
    const target = loadDeliveryTarget(env);
    const adapter = AdapterFactory.createNotificationAdapter(
      NotificationChannel.MATRIX,
      { ...target },
      { client: deps.client, logger }
    );

    if (await adapter.validateConfig()) {
      output.stdout(`OK: Access token accepted by ${target.homeserver}`);
      return ExitCode.SUCCESS;
    }

    output.stderr('ERROR: Access token rejected or server unreachable');
    return ExitCode.RETRY;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return reportOutcome(output, { status: DeliveryStatus.FATAL, error });
    }
    output.stderr(`ERROR: ${describeError(error)}`);
    return ExitCode.RETRY;
  }
};
