/**
 * Date utilities for local-date attribution.
 * Calendar arithmetic works on YYYY-MM-DD keys; the configured IANA zone is
 * applied through TZDate only, so the host timezone never leaks into results.
 */

import { TZDate } from '@date-fns/tz';
import { addDays as addCalendarDays, endOfWeek, format, getDay, isValid, parse, parseISO } from 'date-fns';

import type { Weekday } from '../types';

const DATE_KEY_FORMAT = 'yyyy-MM-dd';

const DATE_KEY_REGEX = /^\d{4}-\d{2}-\d{2}$/;

// Export format: "2024-01-01 08:00:00 -0600"
const EXPORT_TIMESTAMP_REGEX = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2}) ([+-])(\d{2}):?(\d{2})$/;

// ISO 8601 with a mandatory Z or numeric offset
const ISO_TIMESTAMP_REGEX =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)$/;

const WEEKDAYS: readonly Weekday[] = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
];

/**
 * Parse a timestamp written by the export.
 * Accepts the export's "YYYY-MM-DD HH:MM:SS ±HHMM" form and ISO 8601 with
 * an offset. Returns undefined for anything else, including ISO timestamps
 * without an offset, which would otherwise be read in the host's zone.
 */
export function parseExportTimestamp(value: string): Date | undefined {
  const trimmed = value.trim();
  const match = EXPORT_TIMESTAMP_REGEX.exec(trimmed);
  const iso = match ? `${match[1]}T${match[2]}${match[3]}${match[4]}:${match[5]}` : trimmed;
  if (!ISO_TIMESTAMP_REGEX.test(iso)) return undefined;

  const date = parseISO(iso);
  return isValid(date) ? date : undefined;
}

/**
 * Format an instant as YYYY-MM-DD in the given timezone.
 */
export function formatDateInTimezone(date: Date, timezone: string): string {
  return format(new TZDate(date.getTime(), timezone), DATE_KEY_FORMAT);
}

/**
 * Offset of the timezone from UTC at the given instant, in milliseconds.
 * Positive east of Greenwich.
 */
export function getTimezoneOffsetMs(date: Date, timezone: string): number {
  return new TZDate(date.getTime(), timezone).getTimezoneOffset() * -60_000;
}

/**
 * First instant of the local day after the one containing `date`.
 *
 * The next wall-clock midnight is read with the offset in force at `date`
 * and with the offset in force at that first reading; the earliest reading
 * that falls on the next local day wins. Where midnight itself is skipped by
 * a DST change the day starts at the first instant after the gap.
 */
export function startOfNextLocalDay(date: Date, timezone: string): Date {
  const nextKey = addDays(formatDateInTimezone(date, timezone), 1);
  const [year, month, day] = nextKey.split('-').map((part) => Number.parseInt(part, 10));
  const wallClock = Date.UTC(year, month - 1, day);

  const first = new Date(wallClock - getTimezoneOffsetMs(date, timezone));
  const second = new Date(wallClock - getTimezoneOffsetMs(first, timezone));

  const candidates = [first, second]
    .filter((candidate) => formatDateInTimezone(candidate, timezone) === nextKey)
    .sort((a, b) => a.getTime() - b.getTime());

  if (candidates.length > 0) return candidates[0];
  // Neither reading lands on the next day: take the later one
  return first.getTime() > second.getTime() ? first : second;
}

export function isDateKey(value: string): boolean {
  return DATE_KEY_REGEX.test(value) && isValid(parse(value, DATE_KEY_FORMAT, new Date()));
}

/**
 * Check that a timezone name is a valid IANA zone for this runtime.
 */
export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

export function addDays(dateKey: string, days: number): string {
  return format(addCalendarDays(parseISO(dateKey), days), DATE_KEY_FORMAT);
}

export function getWeekday(dateKey: string): Weekday {
  return WEEKDAYS[getDay(parseISO(dateKey))];
}

/**
 * Sunday that closes the ISO week (Monday to Sunday) containing the date.
 */
export function getWeekEndingDate(dateKey: string): string {
  return format(endOfWeek(parseISO(dateKey), { weekStartsOn: 1 }), DATE_KEY_FORMAT);
}
