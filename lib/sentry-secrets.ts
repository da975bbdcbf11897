/**
 * Secret scrubbing for Sentry (beforeSend). Google Ads credentials and bearer
 * tokens never leave the process.
 */
import type { Breadcrumb, Event } from '@sentry/nextjs';

export const FILTERED = '[Filtered]';

const SECRET_KEYS = new Set([
  'developer_token',
  'developer-token',
  'client_secret',
  'refresh_token',
  'access_token',
  'authorization',
  'x-admin-secret',
]);

function isSecretKey(key: string): boolean {
  return SECRET_KEYS.has(key.toLowerCase());
}

function scrubValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(scrubValue);
  if (value !== null && typeof value === 'object') return scrubRecord(Object.fromEntries(Object.entries(value)));
  return value;
}

/** Copy of `obj` with secret keys replaced, recursively. */
export function scrubRecord(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key] = isSecretKey(key) ? FILTERED : scrubValue(value);
  }
  return out;
}

function scrubHeaders(headers: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    out[key] = isSecretKey(key) ? FILTERED : value;
  }
  return out;
}

function scrubBreadcrumb(crumb: Breadcrumb): Breadcrumb {
  return crumb.data ? { ...crumb, data: scrubRecord(crumb.data) } : crumb;
}

/** Scrub secrets from a Sentry event (beforeSend). */
export function scrubEventSecrets<T extends Event>(event: T | null): T | null {
  if (!event) return null;

  if (event.request?.headers) {
    event.request.headers = scrubHeaders(event.request.headers);
  }
  if (event.request && event.request.data !== undefined) {
    event.request.data = scrubValue(event.request.data);
  }
  if (event.extra) {
    event.extra = scrubRecord(event.extra);
  }
  if (event.breadcrumbs) {
    event.breadcrumbs = event.breadcrumbs.map(scrubBreadcrumb);
  }
  return event;
}
