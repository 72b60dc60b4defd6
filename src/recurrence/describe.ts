/**
 * Human-readable text for recurrence rules.
 */

import { formatDate } from './calendar.ts';
import type { RecurrenceRule, TimeOfDay, Weekday } from './types.ts';

const SHORT_WEEKDAY_NAMES: Record<Weekday, string> = {
  1: 'Sun',
  2: 'Mon',
  3: 'Tue',
  4: 'Wed',
  5: 'Thu',
  6: 'Fri',
  7: 'Sat',
};

export function weekdayName(day: Weekday): string {
  return SHORT_WEEKDAY_NAMES[day];
}

export function ordinalSuffix(n: number): string {
  if (n >= 11 && n <= 13) return 'th';
  switch (n % 10) {
    case 1:
      return 'st';
    case 2:
      return 'nd';
    case 3:
      return 'rd';
    default:
      return 'th';
  }
}

/**
 * 12-hour clock, e.g. "9:00 AM", "12:30 PM".
 */
export function formatTime(time: TimeOfDay): string {
  const h = time.hour % 12 || 12;
  const m = time.minute.toString().padStart(2, '0');
  const ampm = time.hour >= 12 ? 'PM' : 'AM';
  return `${h}:${m} ${ampm}`;
}

function every(interval: number, singular: string, plural: string): string {
  return interval === 1 ? singular : `Every ${interval} ${plural}`;
}

function describeFrequency(rule: RecurrenceRule): string {
  const { interval } = rule;
  switch (rule.frequency) {
    case 'minutely':
      return every(interval, 'Every minute', 'minutes');
    case 'hourly':
      return every(interval, 'Hourly', 'hours');
    case 'daily':
      return every(interval, 'Daily', 'days');
    case 'weekly': {
      if (rule.days_of_week.length === 0) {
        return every(interval, 'Weekly', 'weeks');
      }
      const names = rule.days_of_week.map(weekdayName).join(', ');
      const prefix = interval === 1 ? 'Weekly on' : `Every ${interval} weeks on`;
      return `${prefix} ${names}`;
    }
    case 'monthly': {
      if (rule.day_of_month === null) {
        return every(interval, 'Monthly', 'months');
      }
      const prefix = interval === 1 ? 'Monthly on the' : `Every ${interval} months on the`;
      return `${prefix} ${rule.day_of_month}${ordinalSuffix(rule.day_of_month)}`;
    }
    case 'yearly':
      return every(interval, 'Yearly', 'years');
    case 'custom':
      return 'Custom pattern';
  }
}

/**
 * Full description, e.g. "Weekly on Mon, Wed at 9:00 AM after completion".
 */
export function describeRule(rule: RecurrenceRule): string {
  let description = describeFrequency(rule);

  const subDaily = rule.frequency === 'minutely' || rule.frequency === 'hourly';
  if (rule.preferred_time && !subDaily) {
    description += ` at ${formatTime(rule.preferred_time)}`;
  }

  if (rule.repeat_mode === 'from_completion') {
    return `${description} after completion`;
  }
  return description;
}

/**
 * Compact label for list rows, e.g. "Daily", "Every 3d".
 */
export function frequencyLabel(rule: RecurrenceRule): string {
  if (rule.frequency === 'custom') {
    return 'Custom';
  }
  if (rule.interval > 1) {
    switch (rule.frequency) {
      case 'minutely':
        return `Every ${rule.interval}min`;
      case 'hourly':
        return `Every ${rule.interval}h`;
      case 'daily':
        return `Every ${rule.interval}d`;
      case 'weekly':
        return `Every ${rule.interval}w`;
      case 'monthly':
        return `Every ${rule.interval}m`;
      case 'yearly':
        return `Every ${rule.interval}y`;
    }
  }
  switch (rule.frequency) {
    case 'minutely':
      return 'Every minute';
    case 'hourly':
      return 'Hourly';
    case 'daily':
      return 'Daily';
    case 'weekly':
      return 'Weekly';
    case 'monthly':
      return 'Monthly';
    case 'yearly':
      return 'Yearly';
  }
}

/**
 * How the series stops, or null when it runs forever.
 */
export function describeTermination(rule: RecurrenceRule): string | null {
  const parts: string[] = [];
  if (rule.max_occurrences !== null) {
    parts.push(rule.max_occurrences === 1 ? 'Ends after 1 occurrence' : `Ends after ${rule.max_occurrences} occurrences`);
  }
  if (rule.end_date !== null) {
    const text = `on ${formatDate(rule.end_date, rule.time_zone)}`;
    parts.push(parts.length > 0 ? text : `Ends ${text}`);
  }
  return parts.length > 0 ? parts.join(' or ') : null;
}
