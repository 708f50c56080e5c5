import { describe, expect, it } from 'vitest';

import {
  addDays,
  formatDateInTimezone,
  getTimezoneOffsetMs,
  getWeekday,
  getWeekEndingDate,
  isDateKey,
  isValidTimezone,
  parseExportTimestamp,
  startOfNextLocalDay,
} from '../src/utils/dateUtilities';

describe('parseExportTimestamp', () => {
  it('parses the export format with a numeric offset', () => {
    expect(parseExportTimestamp('2024-01-01 08:00:00 -0600')?.toISOString()).toBe(
      '2024-01-01T14:00:00.000Z',
    );
    expect(parseExportTimestamp('2024-06-01 23:30:00 +0200')?.toISOString()).toBe(
      '2024-06-01T21:30:00.000Z',
    );
  });

  it('parses ISO 8601 with an offset', () => {
    expect(parseExportTimestamp('2024-01-01T08:00:00Z')?.toISOString()).toBe(
      '2024-01-01T08:00:00.000Z',
    );
    expect(parseExportTimestamp('2024-01-01T08:00:00.500+02:00')?.toISOString()).toBe(
      '2024-01-01T06:00:00.500Z',
    );
  });

  it('rejects ISO timestamps without an offset', () => {
    expect(parseExportTimestamp('2024-01-01T08:00:00')).toBeUndefined();
    expect(parseExportTimestamp('2024-01-01')).toBeUndefined();
  });

  it('returns undefined for garbage', () => {
    expect(parseExportTimestamp('not a date')).toBeUndefined();
  });
});

describe('formatDateInTimezone', () => {
  it('uses the wall-clock date of the zone', () => {
    const instant = new Date('2024-01-02T03:00:00Z');
    expect(formatDateInTimezone(instant, 'UTC')).toBe('2024-01-02');
    expect(formatDateInTimezone(instant, 'America/Chicago')).toBe('2024-01-01');
    expect(formatDateInTimezone(instant, 'Asia/Tokyo')).toBe('2024-01-02');
  });
});

describe('getTimezoneOffsetMs', () => {
  it('follows daylight saving time', () => {
    expect(getTimezoneOffsetMs(new Date('2024-01-15T12:00:00Z'), 'America/New_York')).toBe(
      -5 * 3_600_000,
    );
    expect(getTimezoneOffsetMs(new Date('2024-07-01T12:00:00Z'), 'America/New_York')).toBe(
      -4 * 3_600_000,
    );
  });
});

describe('startOfNextLocalDay', () => {
  it('returns the next local midnight as a UTC instant', () => {
    expect(
      startOfNextLocalDay(new Date('2024-01-01T20:00:00Z'), 'America/Chicago').toISOString(),
    ).toBe('2024-01-02T06:00:00.000Z');
  });

  it('handles the day clocks spring forward', () => {
    expect(
      startOfNextLocalDay(new Date('2024-03-09T12:00:00Z'), 'America/New_York').toISOString(),
    ).toBe('2024-03-10T05:00:00.000Z');
    expect(
      startOfNextLocalDay(new Date('2024-03-10T12:00:00Z'), 'America/New_York').toISOString(),
    ).toBe('2024-03-11T04:00:00.000Z');
  });

  it('handles the day clocks fall back', () => {
    expect(
      startOfNextLocalDay(new Date('2024-11-03T05:00:00Z'), 'America/New_York').toISOString(),
    ).toBe('2024-11-04T05:00:00.000Z');
  });

  it('starts the day after the gap when midnight is skipped', () => {
    // Havana moves from 00:00 CST straight to 01:00 CDT on 2024-03-10
    const boundary = startOfNextLocalDay(new Date('2024-03-10T04:30:00Z'), 'America/Havana');

    expect(boundary.toISOString()).toBe('2024-03-10T05:00:00.000Z');
    expect(startOfNextLocalDay(boundary, 'America/Havana').toISOString()).toBe(
      '2024-03-11T04:00:00.000Z',
    );
  });
});

describe('calendar helpers', () => {
  it('adds days across month and year ends', () => {
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
  });

  it('names the weekday', () => {
    expect(getWeekday('2024-01-01')).toBe('Monday');
    expect(getWeekday('2024-01-07')).toBe('Sunday');
  });

  it('finds the Sunday ending the week', () => {
    expect(getWeekEndingDate('2024-01-01')).toBe('2024-01-07');
    expect(getWeekEndingDate('2024-01-07')).toBe('2024-01-07');
    expect(getWeekEndingDate('2024-12-30')).toBe('2025-01-05');
  });

  it('validates date keys', () => {
    expect(isDateKey('2024-02-29')).toBe(true);
    expect(isDateKey('2023-02-29')).toBe(false);
    expect(isDateKey('2024-1-1')).toBe(false);
  });

  it('validates timezone names', () => {
    expect(isValidTimezone('Europe/Berlin')).toBe(true);
    expect(isValidTimezone('Mars/Olympus_Mons')).toBe(false);
  });
});
