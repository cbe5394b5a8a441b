/**
 * Maps delivery outcomes to the single diagnostic line and exit code
 */
import {
  ConfigurationError,
  DeliveryOutcome,
  DeliveryStatus,
  ExitCode,
  ProtocolError,
  TransportError,
} from '@matrix-notify/shared';
import { HandlerDeps, LineWriter } from './types';

export interface Output {
  stdout: LineWriter;
  stderr: LineWriter;
}

export function createOutput(deps: HandlerDeps): Output {
  return {
    stdout: deps.stdout ?? ((line) => console.log(line)),
    stderr: deps.stderr ?? ((line) => console.error(line)),
  };
}

export function formatFailure(error: ConfigurationError | TransportError | ProtocolError): string {
  if (error instanceof ProtocolError) {
    return `HTTP error: ${error.message}`;
  }
  if (error instanceof TransportError) {
    switch (error.reason) {
      case 'timeout':
        return 'Request timed out';
      case 'connection':
        return `Could not connect to server: ${error.message}`;
      case 'request':
        return `Request failed: ${error.message}`;
    }
  }
  return error.message;
}

export function reportOutcome(output: Output, outcome: DeliveryOutcome): ExitCode {
  switch (outcome.status) {
    case DeliveryStatus.DELIVERED:
      output.stdout('OK: Message sent successfully');
      return ExitCode.SUCCESS;
    case DeliveryStatus.RETRYABLE:
      output.stderr(`ERROR: ${formatFailure(outcome.error)}`);
      return ExitCode.RETRY;
    case DeliveryStatus.FATAL:
      output.stderr(`ERROR: ${formatFailure(outcome.error)}`);
      return ExitCode.FAILED;
  }
}
