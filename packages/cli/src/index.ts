#!/usr/bin/env tsx
/**
 * matrix-notify: CheckMK notification script that posts alerts to a Matrix room.
 *
 * Install as a CheckMK notification script and set the rule parameters to
 * homeserver, access token and room ID. Pass --check to verify the token only.
 */
import { ExitCode, describeError } from '@matrix-notify/shared';
import { sendNotificationHandler, validateConfigHandler } from './handlers';

const command = process.argv.slice(2).includes('--check')
  ? validateConfigHandler
  : sendNotificationHandler;

command(process.env).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`ERROR: Request failed: ${describeError(error)}`);
    process.exitCode = ExitCode.RETRY;
  }
);
