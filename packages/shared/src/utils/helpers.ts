/**
 * Shared utility functions
 */
import { randomUUID } from 'crypto';

/**
 * Generate a Matrix transaction ID (random UUID v4)
 */
export function generateTransactionId(): string {
  return randomUUID();
}

/**
 * Percent-encode a value for use as a single URL path segment.
 * Everything outside the RFC 3986 unreserved set is encoded.
 */
export function encodePathSegment(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Build an HTTPS URL on a homeserver from raw path segments
 */
export function buildHomeserverUrl(homeserver: string, segments: string[]): string {
  return `https://${homeserver}/${segments.map(encodePathSegment).join('/')}`;
}
