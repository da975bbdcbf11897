/**
 * IANA timezone normalization. Never throws.
 */

const IANA_REGEX = /^[A-Za-z][A-Za-z0-9_+-]+\/[A-Za-z][A-Za-z0-9_+-]+$/;

/** Normalize IANA timezone. Returns fallback on invalid or unknown zones. */
export function normalizeTimezone(tz: string | null | undefined, fallback = 'UTC'): string {
  if (tz == null || typeof tz !== 'string') return fallback;
  const s = tz.trim();
  if (!s) return fallback;
  if (s === 'UTC' || s === 'utc') return 'UTC';
  if (!IANA_REGEX.test(s)) return fallback;
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: s });
    return s;
  } catch {
    return fallback;
  }
}
