/**
 * Conversion between recurrence rules and iCalendar RRULE strings.
 */

import { Frequency as RRuleFrequency, RRule, Weekday as RRuleWeekday, type ByWeekday, type Options } from 'rrule';
import { describeRule } from './describe.ts';
import { RecurrenceError, invalidRule } from './errors.ts';
import { createRecurrenceRule, resolveCadence } from './rule.ts';
import type { Frequency, RecurrenceRule, RecurrenceRuleInput, Weekday } from './types.ts';

// rrule numbers weekdays Monday=0..Sunday=6
const TO_RRULE_WEEKDAY: Record<Weekday, RRuleWeekday> = {
  1: RRule.SU,
  2: RRule.MO,
  3: RRule.TU,
  4: RRule.WE,
  5: RRule.TH,
  6: RRule.FR,
  7: RRule.SA,
};

const FROM_RRULE_WEEKDAY: Record<number, Weekday> = {
  0: 2,
  1: 3,
  2: 4,
  3: 5,
  4: 6,
  5: 7,
  6: 1,
};

const WEEKDAY_CODES: Record<string, number> = { MO: 0, TU: 1, WE: 2, TH: 3, FR: 4, SA: 5, SU: 6 };

function toRRuleFrequency(rule: RecurrenceRule): RRuleFrequency {
  const cadence = resolveCadence(rule);
  switch (cadence.unit) {
    case 'minute':
      return RRuleFrequency.MINUTELY;
    case 'hour':
      return RRuleFrequency.HOURLY;
    case 'day':
      return RRuleFrequency.DAILY;
    case 'week':
      return RRuleFrequency.WEEKLY;
    case 'month':
      return RRuleFrequency.MONTHLY;
    case 'year':
      return RRuleFrequency.YEARLY;
  }
}

function fromRRuleFrequency(freq: RRuleFrequency): Frequency {
  switch (freq) {
    case RRuleFrequency.MINUTELY:
      return 'minutely';
    case RRuleFrequency.HOURLY:
      return 'hourly';
    case RRuleFrequency.DAILY:
      return 'daily';
    case RRuleFrequency.WEEKLY:
      return 'weekly';
    case RRuleFrequency.MONTHLY:
      return 'monthly';
    case RRuleFrequency.YEARLY:
      return 'yearly';
    default:
      throw invalidRule(`Unsupported RRULE frequency: ${RRule.FREQUENCIES[freq] ?? String(freq)}`, 'frequency');
  }
}

/**
 * Serialises a rule as `RRULE:...`. The time zone is not part of the output;
 * store it beside the string.
 */
export function toRRuleString(rule: RecurrenceRule): string {
  const freq = toRRuleFrequency(rule);
  const options: Partial<Options> = { freq };

  if (rule.interval > 1) {
    options.interval = rule.interval;
  }
  if (freq === RRuleFrequency.WEEKLY && rule.days_of_week.length > 0) {
    options.byweekday = rule.days_of_week.map((day) => TO_RRULE_WEEKDAY[day]);
  }
  if (freq === RRuleFrequency.MONTHLY && rule.day_of_month !== null) {
    options.bymonthday = [rule.day_of_month];
  }
  if (rule.preferred_time && freq !== RRuleFrequency.MINUTELY && freq !== RRuleFrequency.HOURLY) {
    options.byhour = [rule.preferred_time.hour];
    options.byminute = [rule.preferred_time.minute];
  }
  if (rule.end_date) {
    options.until = rule.end_date;
  }
  if (rule.max_occurrences !== null) {
    options.count = rule.max_occurrences;
  }

  return RRule.optionsToString(options);
}

function toArray<T>(value: T | T[] | null | undefined): T[] {
  if (value === null || value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function weekdayIndex(value: ByWeekday): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const index = WEEKDAY_CODES[value];
    if (index === undefined) {
      throw invalidRule(`Unknown BYDAY value: ${value}`, 'days_of_week');
    }
    return index;
  }
  if (value.n !== undefined && value.n !== 0) {
    throw invalidRule(`Positional BYDAY values are not supported: ${value.toString()}`, 'days_of_week');
  }
  return value.weekday;
}

function single(values: number[], name: string, field: string): number | null {
  if (values.length === 0) return null;
  if (values.length > 1) {
    throw invalidRule(`Multiple ${name} values are not supported`, field);
  }
  return values[0] ?? null;
}

export interface FromRRuleOptions {
  time_zone?: string;
  repeat_mode?: RecurrenceRuleInput['repeat_mode'];
  recreate_if_incomplete?: boolean;
}

/**
 * Builds a rule from an RRULE string (with or without the `RRULE:` prefix).
 *
 * @throws RecurrenceError for parts the engine cannot express
 */
export function fromRRuleString(text: string, options: FromRRuleOptions = {}): RecurrenceRule {
  const clean = text.trim().replace(/^RRULE:/i, '');
  let parsed: Partial<Options>;
  try {
    parsed = RRule.parseString(`RRULE:${clean}`);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RecurrenceError('invalid_rule_configuration', `Invalid RRULE: ${reason}`, { cause: error });
  }

  if (parsed.freq === undefined) {
    throw invalidRule('RRULE is missing FREQ', 'frequency');
  }
  const frequency = fromRRuleFrequency(parsed.freq);

  const monthDay = single(toArray(parsed.bymonthday), 'BYMONTHDAY', 'day_of_month');
  if (monthDay !== null && monthDay < 0 && monthDay !== -1) {
    throw invalidRule(`BYMONTHDAY ${monthDay} is not supported`, 'day_of_month');
  }
  const hour = single(toArray(parsed.byhour), 'BYHOUR', 'preferred_time');
  const minute = single(toArray(parsed.byminute), 'BYMINUTE', 'preferred_time');

  return createRecurrenceRule({
    frequency,
    interval: parsed.interval ?? 1,
    days_of_week: toArray(parsed.byweekday).map((day) => FROM_RRULE_WEEKDAY[weekdayIndex(day)] ?? 0),
    // -1 is the last day of the month, which clamping to 31 produces
    day_of_month: monthDay === -1 ? 31 : monthDay,
    end_date: parsed.until ?? null,
    max_occurrences: parsed.count ?? null,
    preferred_time: hour !== null ? { hour, minute: minute ?? 0 } : null,
    time_zone: options.time_zone ?? parsed.tzid ?? undefined,
    repeat_mode: options.repeat_mode,
    recreate_if_incomplete: options.recreate_if_incomplete,
  });
}

/**
 * Human-readable description of an RRULE string.
 */
export function describeRRule(text: string): string {
  return describeRule(fromRRuleString(text));
}
