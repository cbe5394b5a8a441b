/**
 * Renders a CheckMK alert as a plain text / HTML message pair.
 *
 * Fields are inserted verbatim. Both bodies carry the same content; the HTML
 * one adds emphasis and a site/timestamp footer.
 */
import { Message, NotificationContext, NotificationKind } from '@matrix-notify/shared';

/** Emoji indicators keyed by short state code */
export const STATE_EMOJIS: ReadonlyMap<string, string> = new Map([
  ['OK', '✅'],
  ['UP', '✅'],
  ['WARN', '⚠️'],
  ['CRIT', '🚨'],
  ['DOWN', '🚨'],
  ['UNKNOWN', '❔'],
]);

export const DEFAULT_EMOJI = 'ℹ️';

/**
 * Look up the indicator for a state (exact, case-sensitive match)
 */
export function getStateEmoji(state: string): string {
  return STATE_EMOJIS.get(state) ?? DEFAULT_EMOJI;
}

function buildPlainText(context: NotificationContext, emoji: string): string {
  const lines = [`${emoji} ${context.kind} ${context.notificationType}: ${context.hostname}`];

  if (context.kind === NotificationKind.SERVICE) {
    lines.push(`Service: ${context.serviceName}`);
  }
  lines.push(`State: ${context.previousState} → ${context.state}`);
  lines.push(`Output: ${context.output}`);

  return lines.join('\n');
}

function buildHtmlText(context: NotificationContext, emoji: string): string {
  const lines = [
    `<p><b>${emoji} ${context.kind} ${context.notificationType}</b></p>`,
    `<b>Host:</b> ${context.hostname}`,
  ];

  if (context.kind === NotificationKind.SERVICE) {
    lines.push(`<b>Service:</b> ${context.serviceName}`);
  }
  lines.push(`<b>State:</b> ${context.previousState} &rarr; <b>${context.state}</b>`);
  lines.push(`<b>Output:</b> <code>${context.output}</code>`);
  lines.push(`<p><small>Site: ${context.site} | ${context.timestamp}</small></p>`);

  return lines.join('<br>');
}

export function buildMessage(context: NotificationContext): Message {
  const emoji = getStateEmoji(context.state);

  return {
    plainText: buildPlainText(context, emoji),
    htmlText: buildHtmlText(context, emoji),
  };
}
