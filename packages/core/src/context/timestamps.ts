/**
 * Timestamp parsing for persisted message records
 *
 * Records carry ISO-8601 strings written by different code paths over time,
 * sometimes without a zone designator and sometimes with a space instead of
 * the `T` separator. Zone-less values are taken as UTC.
 */

import type { TimestampFallbackReason } from '../types/index.js';

const ISO_DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const ISO_NAIVE_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?$/;
const ISO_ZONED_DATE_TIME =
  /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?)(?:(Z)|([+-]\d{2})(?::?(\d{2}))?)$/i;

export type TimestampResolution =
  | { ok: true; date: Date }
  | { ok: false; reason: TimestampFallbackReason };

/**
 * Parse an ISO-8601 string, assuming UTC when no offset is present
 *
 * @returns null when the string is not an ISO-8601 date or date-time
 */
export function parseIsoTimestamp(value: string): Date | null {
  const normalized = value.trim().replace(/^(\d{4}-\d{2}-\d{2}) (?=\d)/, '$1T');

  let candidate: string;
  const zoned = ISO_ZONED_DATE_TIME.exec(normalized);
  if (ISO_DATE_ONLY.test(normalized)) {
    candidate = `${normalized}T00:00:00Z`;
  } else if (ISO_NAIVE_DATE_TIME.test(normalized)) {
    candidate = `${normalized}Z`;
  } else if (zoned) {
    const [, dateTime, utc, offsetHours, offsetMinutes] = zoned;
    // ±HH and ±HHMM offsets are rewritten as ±HH:MM
    candidate = utc ? `${dateTime}Z` : `${dateTime}${offsetHours}:${offsetMinutes ?? '00'}`;
  } else {
    return null;
  }

  const date = new Date(candidate);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Resolve a raw timestamp field into a Date, or the reason it could not be
 */
export function resolveTimestamp(value: unknown): TimestampResolution {
  if (value === undefined || value === null) {
    return { ok: false, reason: 'missing' };
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? { ok: false, reason: 'unparseable' }
      : { ok: true, date: new Date(value.getTime()) };
  }

  if (typeof value === 'string') {
    const date = parseIsoTimestamp(value);
    return date ? { ok: true, date } : { ok: false, reason: 'unparseable' };
  }

  return { ok: false, reason: 'unsupported_type' };
}

/**
 * The timestamp field of a record: `timestamp`, then `created_at`, then `createdAt`
 */
export function pickTimestampField(record: {
  timestamp?: unknown;
  created_at?: unknown;
  createdAt?: unknown;
}): unknown {
  return record.timestamp ?? record.created_at ?? record.createdAt;
}

/**
 * Format an instant as `YYYY-MM-DD HH:mm` in UTC
 */
export function formatMinuteUtc(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}
