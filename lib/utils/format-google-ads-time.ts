/**
 * Google Ads REST conversion_date_time formatter.
 *
 * uploadClickConversions expects: yyyy-MM-dd HH:mm:ss±HH:mm
 * Example: 2026-02-28 10:15:10+03:00
 *
 * - No "T" separator.
 * - No milliseconds.
 * - Offset with colon (the CSV bulk import is the one that wants +0300; REST does not).
 */

import { normalizeTimezone } from '@/lib/utils/timezone';

export const GOOGLE_ADS_TIME_REGEX = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}[+-]\d{2}:\d{2}$/;

/** Parse ISO timestamp string, epoch seconds or Date. Returns null if invalid. */
export function parseTimestamp(ts: string | number | Date | null | undefined): Date | null {
  if (ts == null) return null;
  let d: Date;
  if (ts instanceof Date) d = ts;
  else if (typeof ts === 'number') d = new Date(ts * 1000);
  else d = new Date(ts.trim());
  return Number.isNaN(d.getTime()) ? null : d;
}

function formatOffset(d: Date, tz: string): string {
  // longOffset produces GMT+3:00, GMT-05:00, or plain GMT for UTC.
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: tz,
    timeZoneName: 'longOffset',
  }).formatToParts(d);

  const raw = (parts.find((p) => p.type === 'timeZoneName')?.value ?? '')
    .replace(/^GMT|^UTC/i, '')
    .replace(/−/g, '-')
    .trim();

  const m = raw.match(/^([+-])(\d{1,2}):?(\d{2})?$/);
  if (!m) return '+00:00';
  return `${m[1]}${m[2].padStart(2, '0')}:${m[3] ?? '00'}`;
}

/**
 * Format a Date in the given IANA timezone as yyyy-MM-dd HH:mm:ss±HH:mm.
 * sv-SE produces "yyyy-MM-dd HH:mm:ss" natively.
 */
export function formatGoogleAdsTime(d: Date, timezone?: string | null): string {
  const tz = normalizeTimezone(timezone, 'UTC');
  const base = new Intl.DateTimeFormat('sv-SE', {
    timeZone: tz,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  }).format(d);

  return `${base}${formatOffset(d, tz)}`;
}

/**
 * Strict variant for conversion timestamps: throws on invalid input instead of
 * silently using the current time.
 */
export function formatConversionDateTime(
  ts: string | number | Date | null | undefined,
  timezone?: string | null
): string {
  const d = parseTimestamp(ts);
  if (d == null) {
    throw new Error(`Invalid conversion timestamp: ${JSON.stringify(ts)}`);
  }
  return formatGoogleAdsTime(d, timezone);
}
