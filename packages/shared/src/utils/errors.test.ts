import { describe, it, expect } from 'vitest';
import { ConfigurationError, ProtocolError, TransportError, describeError } from './errors';

describe('ConfigurationError', () => {
  it('should name the missing variable and not be retryable', () => {
    const error = new ConfigurationError('NOTIFY_PARAMETER_2');

    expect(error.message).toBe('Missing required environment variable: NOTIFY_PARAMETER_2');
    expect(error.variable).toBe('NOTIFY_PARAMETER_2');
    expect(error.retryable).toBe(false);
    expect(error.name).toBe('ConfigurationError');
  });
});

describe('TransportError', () => {
  it('should keep the reason and cause', () => {
    const cause = new Error('socket hang up');
    const error = new TransportError('connection', 'socket hang up', { cause });

    expect(error.reason).toBe('connection');
    expect(error.cause).toBe(cause);
    expect(error.retryable).toBe(true);
  });
});

describe('ProtocolError', () => {
  it('should include the Matrix error code and message', () => {
    const error = new ProtocolError(403, 'Forbidden', 'M_FORBIDDEN', 'User not in room');
    expect(error.message).toBe('403 Forbidden (M_FORBIDDEN: User not in room)');
    expect(error.retryable).toBe(true);
  });

  it('should fall back to the status line', () => {
    expect(new ProtocolError(502, 'Bad Gateway').message).toBe('502 Bad Gateway');
    expect(new ProtocolError(500, '').message).toBe('500');
    expect(new ProtocolError(429, 'Too Many Requests', 'M_LIMIT_EXCEEDED').message).toBe(
      '429 Too Many Requests (M_LIMIT_EXCEEDED)'
    );
  });
});

describe('describeError', () => {
  it('should prefer the message of an Error', () => {
    expect(describeError(new TypeError('Invalid URL'))).toBe('Invalid URL');
  });

  it('should fall back to the error name when the message is empty', () => {
    expect(describeError(new RangeError())).toBe('RangeError');
  });

  it('should stringify anything else', () => {
    expect(describeError('boom')).toBe('boom');
    expect(describeError(42)).toBe('42');
  });
});
