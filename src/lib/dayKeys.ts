/**
 * Calendar-day helpers
 * Day keys and bucket boundaries computed in a caller-supplied IANA time zone
 */

import { DateTime } from 'luxon';

export type BucketUnit = 'hour' | 'day' | 'month';

function toDateTime(date: Date | string, timezone: string): DateTime {
  const tz = timezone || 'UTC';
  const dt = date instanceof Date ? DateTime.fromJSDate(date, { zone: tz }) : DateTime.fromISO(date, { zone: tz });

  if (!dt.isValid) {
    // Fallback to UTC when the zone is unknown
    return date instanceof Date ? DateTime.fromJSDate(date, { zone: 'utc' }) : DateTime.fromISO(date, { zone: 'utc' });
  }
  return dt;
}

/**
 * Get day key (YYYY-MM-DD) for a given date in the specified timezone
 * @param date - Date object or ISO string
 * @param timezone - IANA timezone string (e.g., "Europe/Istanbul")
 */
export function getDayKey(date: Date | string, timezone: string): string {
  const dayKey = toDateTime(date, timezone).toISODate();
  if (!dayKey) {
    throw new Error('Failed to generate day key');
  }
  return dayKey;
}

/**
 * True when both instants fall on the same calendar day in the given zone.
 * Unparseable input is never the same day.
 */
export function isSameDay(a: Date | string, b: Date | string, timezone: string): boolean {
  const dtA = toDateTime(a, timezone);
  const dtB = toDateTime(b, timezone);
  if (!dtA.isValid || !dtB.isValid) {
    return false;
  }
  return getDayKey(a, timezone) === getDayKey(b, timezone);
}

/**
 * Night a sleep sample belongs to, keyed by the evening's date: samples before noon
 * count toward the previous evening. Returns null for unparseable dates.
 */
export function getNightKey(date: Date | string, timezone: string): string | null {
  const dt = toDateTime(date, timezone);
  if (!dt.isValid) {
    return null;
  }
  return dt.minus({ hours: 12 }).toISODate();
}

/**
 * Start of the hour/day/month containing the date, as an ISO string in the zone.
 * Returns null for unparseable dates.
 */
export function bucketStart(date: Date | string, unit: BucketUnit, timezone: string): string | null {
  const dt = toDateTime(date, timezone);
  if (!dt.isValid) {
    return null;
  }
  return dt.startOf(unit).toISO();
}
