/**
 * Calendar arithmetic in an explicit IANA time zone.
 *
 * Nothing here reads the process time zone: every function takes the zone it
 * works in, so results are the same on any host.
 */

import { DateTime, IANAZone } from 'luxon';
import type { TimeOfDay, Weekday } from './types.ts';
import { invalidRule } from './errors.ts';

export function isValidTimeZone(zone: string): boolean {
  return IANAZone.isValidZone(zone);
}

/**
 * Wall-clock view of an instant in `zone`.
 */
export function zoned(date: Date, zone: string): DateTime {
  if (Number.isNaN(date.getTime())) {
    throw invalidRule('Date is invalid');
  }
  const dt = DateTime.fromJSDate(date, { zone });
  if (!dt.isValid) {
    throw invalidRule(`Unknown time zone: ${zone}`, 'time_zone');
  }
  return dt;
}

/**
 * Luxon numbers Monday=1..Sunday=7; rules use Sunday=1..Saturday=7.
 */
export function weekdayOf(dt: DateTime): Weekday {
  switch (dt.weekday) {
    case 7:
      return 1;
    case 1:
      return 2;
    case 2:
      return 3;
    case 3:
      return 4;
    case 4:
      return 5;
    case 5:
      return 6;
    default:
      return 7;
  }
}

export function daysInMonth(dt: DateTime): number {
  return dt.endOf('month').day;
}

/**
 * Moves to `day` in the same month, clamped to the month's last day.
 */
export function withClampedDay(dt: DateTime, day: number): DateTime {
  return dt.set({ day: Math.min(day, daysInMonth(dt)) });
}

/**
 * Pins the wall-clock time; a time skipped by a DST jump lands after the gap.
 */
export function withTimeOfDay(dt: DateTime, time: TimeOfDay): DateTime {
  return dt.set({ hour: time.hour, minute: time.minute, second: 0, millisecond: 0 });
}

/**
 * Calendar day in the zone, e.g. `2024-02-29`.
 */
export function dayKey(dt: DateTime): string {
  return dt.toFormat('yyyy-MM-dd');
}

export function extractTimeOfDay(date: Date, zone: string): TimeOfDay {
  const dt = zoned(date, zone);
  return { hour: dt.hour, minute: dt.minute };
}

export function formatDate(date: Date, zone: string): string {
  return zoned(date, zone).setLocale('en-US').toFormat('LLL d, yyyy');
}
