/**
 * UTC calendar-day helpers.
 *
 * Calendar days are 'YYYY-MM-DD' strings; a day spans
 * [00:00:00.000Z, next day 00:00:00.000Z).
 */

import type { CalendarDate } from '@airwatch/contracts';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

const LONG_WEEKDAY = new Intl.DateTimeFormat('en-US', { weekday: 'long', timeZone: 'UTC' });
const SHORT_WEEKDAY = new Intl.DateTimeFormat('en-US', { weekday: 'short', timeZone: 'UTC' });

/**
 * UTC calendar day containing the instant.
 *
 * @example
 * ```typescript
 * toCalendarDate(Date.parse('2025-01-15T23:59:59Z')); // '2025-01-15'
 * ```
 */
export function toCalendarDate(epochMs: number): CalendarDate {
  return new Date(epochMs).toISOString().slice(0, 10);
}

/**
 * Epoch ms of 00:00Z on the given day, or null when the string does not
 * start with a real calendar date. A trailing time part is ignored.
 */
export function parseCalendarDate(value: string): number | null {
  const match = DATE_PREFIX.exec(value.trim());
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const epochMs = Date.UTC(year, month - 1, day);
  const date = new Date(epochMs);

  // Rejects rollovers such as 2025-02-30
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return epochMs;
}

/**
 * Canonical 'YYYY-MM-DD' form, or null when unparseable.
 */
export function normalizeCalendarDate(value: string): CalendarDate | null {
  const epochMs = parseCalendarDate(value);
  return epochMs === null ? null : toCalendarDate(epochMs);
}

export function startOfUtcDay(epochMs: number): number {
  return Math.floor(epochMs / MS_PER_DAY) * MS_PER_DAY;
}

/**
 * Shifts a calendar day by whole days.
 *
 * @throws Error if date is not a calendar date
 */
export function addDays(date: CalendarDate, days: number): CalendarDate {
  const epochMs = parseCalendarDate(date);
  if (epochMs === null) {
    throw new Error(`Invalid calendar date: ${date}`);
  }
  return toCalendarDate(epochMs + days * MS_PER_DAY);
}

/**
 * English weekday names for a UTC day start.
 *
 * @example
 * ```typescript
 * weekdayNames(Date.parse('2025-01-15T00:00:00Z')); // { long: 'Wednesday', short: 'Wed' }
 * ```
 */
export function weekdayNames(epochMs: number): { long: string; short: string } {
  const date = new Date(epochMs);
  return {
    long: LONG_WEEKDAY.format(date),
    short: SHORT_WEEKDAY.format(date),
  };
}
