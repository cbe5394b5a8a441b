import { describe, it, expect } from 'vitest';
import { NotificationContext, NotificationKind } from '@matrix-notify/shared';
import { DEFAULT_EMOJI, buildMessage, getStateEmoji } from './checkmk-message';

const HOST_CONTEXT: NotificationContext = {
  kind: NotificationKind.HOST,
  notificationType: 'PROBLEM',
  hostname: 'db01',
  site: 'prod',
  timestamp: '2026-10-19 08:15:00',
  state: 'DOWN',
  previousState: 'UP',
  output: 'No route to host',
  serviceName: '',
};

const SERVICE_CONTEXT: NotificationContext = {
  kind: NotificationKind.SERVICE,
  notificationType: 'PROBLEM',
  hostname: 'web01',
  site: 'prod',
  timestamp: '2026-10-19 08:15:00',
  state: 'CRIT',
  previousState: 'OK',
  output: 'CRIT - 98% used',
  serviceName: 'Filesystem /',
};

const EMPTY_CONTEXT: NotificationContext = {
  kind: NotificationKind.HOST,
  notificationType: '',
  hostname: '',
  site: '',
  timestamp: '',
  state: '',
  previousState: '',
  output: '',
  serviceName: '',
};

// =============================================================================
// EMOJI
// =============================================================================

describe('getStateEmoji', () => {
  it.each([
    ['OK', '✅'],
    ['UP', '✅'],
    ['WARN', '⚠️'],
    ['CRIT', '🚨'],
    ['DOWN', '🚨'],
    ['UNKNOWN', '❔'],
  ])('should map %s to %s', (state, emoji) => {
    expect(getStateEmoji(state)).toBe(emoji);
  });

  it('should fall back to the info indicator for unmapped states', () => {
    expect(getStateEmoji('frobnicate')).toBe('ℹ️');
    expect(DEFAULT_EMOJI).toBe('ℹ️');
  });

  it('should match case-sensitively', () => {
    expect(getStateEmoji('crit')).toBe('ℹ️');
  });
});

// =============================================================================
// PLAIN TEXT
// =============================================================================

describe('buildMessage plain text', () => {
  it('should render a host notification without a service line', () => {
    expect(buildMessage(HOST_CONTEXT).plainText).toBe(
      ['🚨 HOST PROBLEM: db01', 'State: UP → DOWN', 'Output: No route to host'].join('\n')
    );
  });

  it('should render a service notification with a service line', () => {
    expect(buildMessage(SERVICE_CONTEXT).plainText).toBe(
      [
        '🚨 SERVICE PROBLEM: web01',
        'Service: Filesystem /',
        'State: OK → CRIT',
        'Output: CRIT - 98% used',
      ].join('\n')
    );
  });

  it('should render missing fields as empty strings', () => {
    expect(buildMessage(EMPTY_CONTEXT).plainText).toBe(
      ['ℹ️ HOST : ', 'State:  → ', 'Output: '].join('\n')
    );
  });
});

// =============================================================================
// HTML
// =============================================================================

describe('buildMessage HTML', () => {
  it('should render a host notification', () => {
    expect(buildMessage(HOST_CONTEXT).htmlText).toBe(
      [
        '<p><b>🚨 HOST PROBLEM</b></p>',
        '<b>Host:</b> db01',
        '<b>State:</b> UP &rarr; <b>DOWN</b>',
        '<b>Output:</b> <code>No route to host</code>',
        '<p><small>Site: prod | 2026-10-19 08:15:00</small></p>',
      ].join('<br>')
    );
  });

  it('should add the service line only for service notifications', () => {
    const html = buildMessage(SERVICE_CONTEXT).htmlText;

    expect(html.split('<br>')).toEqual([
      '<p><b>🚨 SERVICE PROBLEM</b></p>',
      '<b>Host:</b> web01',
      '<b>Service:</b> Filesystem /',
      '<b>State:</b> OK &rarr; <b>CRIT</b>',
      '<b>Output:</b> <code>CRIT - 98% used</code>',
      '<p><small>Site: prod | 2026-10-19 08:15:00</small></p>',
    ]);
    expect(buildMessage(HOST_CONTEXT).htmlText).not.toContain('Service:');
  });

  it('should not contain literal newlines', () => {
    const html = buildMessage({ ...SERVICE_CONTEXT, output: 'line one' }).htmlText;
    expect(html.includes('\n')).toBe(false);
  });

  it('should carry the same emoji, states and output as the plain text', () => {
    const { plainText, htmlText } = buildMessage({ ...SERVICE_CONTEXT, state: 'WARN' });

    for (const fragment of ['⚠️', 'OK', 'WARN', 'CRIT - 98% used', 'Filesystem /', 'web01']) {
      expect(plainText).toContain(fragment);
      expect(htmlText).toContain(fragment);
    }
  });
});
