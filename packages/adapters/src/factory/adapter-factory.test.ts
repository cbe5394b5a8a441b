import { describe, it, expect } from 'vitest';
import { NotificationChannel } from '@matrix-notify/shared';
import { AdapterFactory } from './adapter-factory';
import { MatrixNotificationAdapter } from '../providers';

describe('AdapterFactory.createNotificationAdapter', () => {
  it('should build a Matrix adapter from a target config', () => {
    const adapter = AdapterFactory.createNotificationAdapter(NotificationChannel.MATRIX, {
      homeserver: 'matrix.example.org',
      accessToken: 'test-token',
      roomId: '!abc123:example.org',
    });

    expect(adapter).toBeInstanceOf(MatrixNotificationAdapter);
    expect(adapter.getChannel()).toBe(NotificationChannel.MATRIX);
  });

  it('should reject an incomplete config', () => {
    expect(() =>
      AdapterFactory.createNotificationAdapter(NotificationChannel.MATRIX, {
        homeserver: 'matrix.example.org',
        roomId: '!abc123:example.org',
      })
    ).toThrow(/accessToken/);
  });
});
