/**
 * Configuration schema and validation using Zod
 */
import { z } from 'zod';
import { DeliveryTarget, NotificationContext, NotificationKind } from '../types';
import { ConfigurationError } from '../utils/errors';
import { LogLevel } from '../utils/logger';

/**
 * Environment record the configuration is read from
 */
export type Environment = Readonly<Record<string, string | undefined>>;

/** Total time allowed for one request to the homeserver */
export const REQUEST_TIMEOUT_MS = 15_000;

export const LOG_LEVEL_VARIABLE = 'MATRIX_NOTIFY_LOG_LEVEL';

const required = z.string({ required_error: 'missing' }).min(1, 'missing');
const optional = z.string().default('');

/**
 * Notification parameters configured on the CheckMK notification rule
 */
export const DeliveryTargetSchema = z
  .object({
    NOTIFY_PARAMETER_1: required,
    NOTIFY_PARAMETER_2: required,
    NOTIFY_PARAMETER_3: required,
  })
  .transform(
    (env): DeliveryTarget => ({
      homeserver: env.NOTIFY_PARAMETER_1,
      accessToken: env.NOTIFY_PARAMETER_2,
      roomId: env.NOTIFY_PARAMETER_3,
    })
  );

/**
 * Same target, keyed by field name, for adapter construction
 */
export const DeliveryTargetConfigSchema = z.object({
  homeserver: z.string().min(1),
  accessToken: z.string().min(1),
  roomId: z.string().min(1),
});

const HostFieldsSchema = z.object({
  NOTIFY_HOSTSHORTSTATE: optional,
  NOTIFY_PREVIOUSHOSTHARDSHORTSTATE: optional,
  NOTIFY_HOSTOUTPUT: optional,
});

const ServiceFieldsSchema = z.object({
  NOTIFY_SERVICESHORTSTATE: optional,
  NOTIFY_PREVIOUSSERVICEHARDSHORTSTATE: optional,
  NOTIFY_SERVICEOUTPUT: optional,
  NOTIFY_SERVICEDESC: optional,
});

/**
 * CheckMK NOTIFY_* variables describing the alert
 */
export const NotificationContextSchema = z
  .object({
    NOTIFY_WHAT: z
      .string()
      .default(NotificationKind.HOST)
      .transform((what) =>
        what.toUpperCase() === NotificationKind.SERVICE
          ? NotificationKind.SERVICE
          : NotificationKind.HOST
      ),
    NOTIFY_NOTIFICATIONTYPE: optional,
    NOTIFY_HOSTNAME: optional,
    OMD_SITE: optional,
    NOTIFY_SHORTDATETIME: optional,
  })
  .merge(HostFieldsSchema)
  .merge(ServiceFieldsSchema)
  .transform((env): NotificationContext => {
    const common = {
      kind: env.NOTIFY_WHAT,
      notificationType: env.NOTIFY_NOTIFICATIONTYPE,
      hostname: env.NOTIFY_HOSTNAME,
      site: env.OMD_SITE,
      timestamp: env.NOTIFY_SHORTDATETIME,
    };

    if (env.NOTIFY_WHAT === NotificationKind.SERVICE) {
      return {
        ...common,
        state: env.NOTIFY_SERVICESHORTSTATE,
        previousState: env.NOTIFY_PREVIOUSSERVICEHARDSHORTSTATE,
        output: env.NOTIFY_SERVICEOUTPUT,
        serviceName: env.NOTIFY_SERVICEDESC,
      };
    }

    return {
      ...common,
      state: env.NOTIFY_HOSTSHORTSTATE,
      previousState: env.NOTIFY_PREVIOUSHOSTHARDSHORTSTATE,
      output: env.NOTIFY_HOSTOUTPUT,
      serviceName: '',
    };
  });

export const LogLevelSchema = z
  .string()
  .transform((level) => level.toUpperCase())
  .pipe(z.nativeEnum(LogLevel))
  .catch(LogLevel.WARN);

/**
 * Load the delivery target, naming the first missing variable on failure
 */
export function loadDeliveryTarget(env: Environment): DeliveryTarget {
  const result = DeliveryTargetSchema.safeParse(env);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new ConfigurationError(String(issue?.path[0] ?? 'NOTIFY_PARAMETER_1'));
  }
  return result.data;
}

/**
 * Load the alert context. Never fails: absent fields become empty strings.
 */
export function loadNotificationContext(env: Environment): NotificationContext {
  return NotificationContextSchema.parse(env);
}

export function loadLogLevel(env: Environment): LogLevel {
  return LogLevelSchema.parse(env[LOG_LEVEL_VARIABLE]);
}
