// src/forecast/utils/time.util.ts

import { DateTime } from 'luxon';
import { DAYS_OF_WEEK, DayOfWeek } from '../types/flow-profile.types';

/**
 * Formats tried after ISO 8601, in order. Month-first comes before
 * day-first because operator exports are month-first.
 */
export const DEFAULT_TIMESTAMP_FORMATS: readonly string[] = [
  'M/d/yyyy H:mm',
  'M/d/yyyy H:mm:ss',
  'd/M/yyyy H:mm',
  'yyyy-MM-dd H:mm',
];

/**
 * Parse an export timestamp in the given zone. Returns null when no format
 * matches.
 */
export function parseTripTimestamp(
  raw: string | undefined,
  zone: string,
  formats: readonly string[] = DEFAULT_TIMESTAMP_FORMATS,
): DateTime | null {
  const value = raw?.trim();
  if (!value) {
    return null;
  }

  const iso = DateTime.fromISO(value, { zone });
  if (iso.isValid) {
    return iso;
  }

  for (const format of formats) {
    const parsed = DateTime.fromFormat(value, format, { zone });
    if (parsed.isValid) {
      return parsed;
    }
  }

  return null;
}

/**
 * 0..6 with Monday = 0 (luxon weekday is 1..7, Monday = 1)
 */
export function toDayOfWeek(time: DateTime): DayOfWeek {
  return DAYS_OF_WEEK[time.weekday - 1];
}

/**
 * Distinct calendar weeks (Monday-start) from first to last, inclusive.
 */
export function countCalendarWeeks(first: DateTime, last: DateTime): number {
  const [from, to] = first.toMillis() <= last.toMillis() ? [first, last] : [last, first];
  const days = to.startOf('week').diff(from.startOf('week'), 'days').days;
  return Math.round(days / 7) + 1;
}

/**
 * Forward hour distance on a 24-hour clock: (target - current) mod 24, in 0..23.
 */
export function hoursAhead(targetHour: number, currentHour: number): number {
  return (((targetHour - currentHour) % 24) + 24) % 24;
}
