/**
 * Calendar date utilities
 *
 * Trading dates travel through the system as ISO `YYYY-MM-DD` strings. In that
 * canonical form lexical order equals chronological order, so comparisons on the
 * hot path stay plain string comparisons.
 */

import { DateTime } from 'luxon';

export type IsoDate = string;

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse a canonical ISO date (UTC, midnight). Returns null for anything else.
 */
export function parseIsoDate(value: string): DateTime | null {
  if (!ISO_DATE_PATTERN.test(value)) {
    return null;
  }
  const parsed = DateTime.fromISO(value, { zone: 'utc' });
  return parsed.isValid ? parsed : null;
}

export function isIsoDate(value: string): boolean {
  return parseIsoDate(value) !== null;
}

export function toIsoDate(value: DateTime): IsoDate {
  return value.toUTC().toFormat('yyyy-MM-dd');
}

/**
 * Normalize any ISO-8601 date or datetime string to `YYYY-MM-DD`
 */
export function normalizeIsoDate(value: string): IsoDate | null {
  const parsed = DateTime.fromISO(value.trim(), { zone: 'utc' });
  return parsed.isValid ? toIsoDate(parsed) : null;
}

export function compareIsoDates(a: IsoDate, b: IsoDate): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier)
 */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  const start = parseIsoDate(from);
  const end = parseIsoDate(to);
  if (!start || !end) {
    return 0;
  }
  return Math.round(end.diff(start, 'days').days);
}
