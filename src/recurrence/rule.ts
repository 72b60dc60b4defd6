/**
 * Building and validating recurrence rules.
 *
 * Rules are frozen once built. Editing a rule means building a new one with
 * `withChanges`, the same way a picker assembles a fresh rule on save.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.ts';
import { isValidTimeZone } from './calendar.ts';
import { RecurrenceError, fromZodError, invalidRule } from './errors.ts';
import {
  CADENCE_UNITS,
  FREQUENCIES,
  REPEAT_MODES,
  type Cadence,
  type RecurrenceRule,
  type RecurrenceRuleInput,
  type TimeOfDay,
  type Weekday,
} from './types.ts';

const WeekdaySchema = z
  .number()
  .int()
  .min(1, 'must be between 1 (Sunday) and 7 (Saturday)')
  .max(7, 'must be between 1 (Sunday) and 7 (Saturday)');

const TimeOfDaySchema = z.object({
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
});

export const RecurrenceRuleInputSchema = z.object({
  id: z.string().min(1).optional(),
  frequency: z.enum(FREQUENCIES),
  interval: z.number().int('must be a whole number').min(1, 'must be at least 1').default(1),
  days_of_week: z.array(WeekdaySchema).nullish(),
  day_of_month: z.number().int().min(1, 'must be between 1 and 31').max(31, 'must be between 1 and 31').nullish(),
  custom_unit: z.enum(CADENCE_UNITS).nullish(),
  end_date: z
    .date()
    .refine((date) => !Number.isNaN(date.getTime()), { message: 'must be a valid date' })
    .nullish(),
  max_occurrences: z.number().int().min(1, 'must be at least 1').nullish(),
  repeat_mode: z.enum(REPEAT_MODES).default('from_original'),
  preferred_time: TimeOfDaySchema.nullish(),
  time_zone: z.string().refine(isValidTimeZone, { message: 'must be an IANA time zone' }).optional(),
  recreate_if_incomplete: z.boolean().default(true),
});

const WEEKDAY_VALUES: readonly Weekday[] = [1, 2, 3, 4, 5, 6, 7];

function toWeekdays(days: readonly number[]): Weekday[] {
  const unique = new Set<Weekday>();
  for (const day of days) {
    const weekday = WEEKDAY_VALUES.find((w) => w === day);
    if (weekday === undefined) {
      throw invalidRule(`days_of_week entry ${day} is outside 1-7`, 'days_of_week');
    }
    unique.add(weekday);
  }
  return [...unique].sort((a, b) => a - b);
}

/**
 * Builds a frozen rule, failing fast on anything the engine cannot step.
 */
export function createRecurrenceRule(input: RecurrenceRuleInput, config: Pick<EngineConfig, 'default_time_zone'> = DEFAULT_ENGINE_CONFIG): RecurrenceRule {
  const parsed = RecurrenceRuleInputSchema.safeParse(input);
  if (!parsed.success) {
    throw fromZodError(parsed.error);
  }
  const data = parsed.data;

  const preferred = data.preferred_time ?? null;
  const rule: RecurrenceRule = {
    id: data.id ?? randomUUID(),
    frequency: data.frequency,
    interval: data.interval,
    days_of_week: Object.freeze(toWeekdays(data.days_of_week ?? [])),
    day_of_month: data.day_of_month ?? null,
    custom_unit: data.custom_unit ?? null,
    end_date: data.end_date ? new Date(data.end_date.getTime()) : null,
    max_occurrences: data.max_occurrences ?? null,
    repeat_mode: data.repeat_mode,
    preferred_time: preferred ? Object.freeze({ hour: preferred.hour, minute: preferred.minute }) : null,
    time_zone: data.time_zone ?? config.default_time_zone,
    recreate_if_incomplete: data.recreate_if_incomplete,
  };

  resolveCadence(rule);
  return Object.freeze(rule);
}

/**
 * Builds a new rule from `rule` with `changes` applied. The id is kept unless changed.
 */
export function withChanges(rule: RecurrenceRule, changes: Partial<RecurrenceRuleInput>): RecurrenceRule {
  return createRecurrenceRule({
    id: rule.id,
    frequency: rule.frequency,
    interval: rule.interval,
    days_of_week: rule.days_of_week,
    day_of_month: rule.day_of_month,
    custom_unit: rule.custom_unit,
    end_date: rule.end_date,
    max_occurrences: rule.max_occurrences,
    repeat_mode: rule.repeat_mode,
    preferred_time: rule.preferred_time,
    time_zone: rule.time_zone,
    recreate_if_incomplete: rule.recreate_if_incomplete,
    ...changes,
  });
}

/**
 * Checks the invariants of an already-built rule. Rules that did not come
 * from `createRecurrenceRule` (deserialised, hand written) go through here
 * before the engine steps them.
 */
export function validateRule(rule: RecurrenceRule): void {
  if (!Number.isInteger(rule.interval) || rule.interval < 1) {
    throw invalidRule(`interval must be a whole number of at least 1, got ${rule.interval}`, 'interval');
  }
  for (const day of rule.days_of_week) {
    if (!Number.isInteger(day) || day < 1 || day > 7) {
      throw invalidRule(`days_of_week entry ${day} is outside 1-7`, 'days_of_week');
    }
  }
  if (rule.day_of_month !== null && (!Number.isInteger(rule.day_of_month) || rule.day_of_month < 1 || rule.day_of_month > 31)) {
    throw invalidRule(`day_of_month must be between 1 and 31, got ${rule.day_of_month}`, 'day_of_month');
  }
  if (rule.max_occurrences !== null && (!Number.isInteger(rule.max_occurrences) || rule.max_occurrences < 1)) {
    throw invalidRule(`max_occurrences must be at least 1, got ${rule.max_occurrences}`, 'max_occurrences');
  }
  if (rule.end_date !== null && Number.isNaN(rule.end_date.getTime())) {
    throw invalidRule('end_date is not a valid date', 'end_date');
  }
  if (rule.preferred_time !== null) {
    const { hour, minute } = rule.preferred_time;
    if (!Number.isInteger(hour) || hour < 0 || hour > 23 || !Number.isInteger(minute) || minute < 0 || minute > 59) {
      throw invalidRule(`preferred_time ${hour}:${minute} is not a time of day`, 'preferred_time');
    }
  }
  if (!isValidTimeZone(rule.time_zone)) {
    throw invalidRule(`Unknown time zone: ${rule.time_zone}`, 'time_zone');
  }
}

function cadenceFor(unit: Cadence['unit'], rule: RecurrenceRule): Cadence {
  switch (unit) {
    case 'minute':
    case 'hour':
    case 'day':
    case 'year':
      return { unit, interval: rule.interval };
    case 'week':
      return { unit, interval: rule.interval, weekdays: rule.days_of_week };
    case 'month':
      return { unit, interval: rule.interval, day_of_month: rule.day_of_month };
  }
}

/**
 * Validates the rule and maps its frequency to a concrete cadence.
 */
export function resolveCadence(rule: RecurrenceRule): Cadence {
  validateRule(rule);

  switch (rule.frequency) {
    case 'minutely':
      return cadenceFor('minute', rule);
    case 'hourly':
      return cadenceFor('hour', rule);
    case 'daily':
      return cadenceFor('day', rule);
    case 'weekly':
      return cadenceFor('week', rule);
    case 'monthly':
      return cadenceFor('month', rule);
    case 'yearly':
      return cadenceFor('year', rule);
    case 'custom':
      if (rule.custom_unit) {
        return cadenceFor(rule.custom_unit, rule);
      }
      if (rule.days_of_week.length > 0) {
        return cadenceFor('week', rule);
      }
      if (rule.day_of_month !== null) {
        return cadenceFor('month', rule);
      }
      throw new RecurrenceError('unresolvable_custom_frequency', 'Custom frequency needs a custom_unit, days_of_week or day_of_month', {
        field: 'frequency',
      });
  }
}

export function isSubDaily(cadence: Cadence): boolean {
  return cadence.unit === 'minute' || cadence.unit === 'hour';
}

/**
 * Parse "HH:mm" (24-hour) into a time of day.
 */
export function parseTimeOfDay(text: string): TimeOfDay {
  const match = text.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!match) {
    throw invalidRule(`Time "${text}" is not in HH:mm format`, 'preferred_time');
  }
  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  if (hour > 23 || minute > 59) {
    throw invalidRule(`Time "${text}" is out of range`, 'preferred_time');
  }
  return { hour, minute };
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')}`;
}

// Factories

export interface FactoryOptions {
  interval?: number;
  end_date?: Date | null;
  max_occurrences?: number | null;
  /** "HH:mm" */
  time?: string | null;
  time_zone?: string;
  repeat_mode?: RecurrenceRuleInput['repeat_mode'];
  recreate_if_incomplete?: boolean;
}

function fromFactory(frequency: RecurrenceRuleInput['frequency'], options: FactoryOptions, extra: Partial<RecurrenceRuleInput> = {}): RecurrenceRule {
  return createRecurrenceRule({
    frequency,
    interval: options.interval,
    end_date: options.end_date,
    max_occurrences: options.max_occurrences,
    preferred_time: options.time ? parseTimeOfDay(options.time) : null,
    time_zone: options.time_zone,
    repeat_mode: options.repeat_mode,
    recreate_if_incomplete: options.recreate_if_incomplete,
    ...extra,
  });
}

export function minutely(options: Omit<FactoryOptions, 'time'> = {}): RecurrenceRule {
  return fromFactory('minutely', options);
}

export function hourly(options: Omit<FactoryOptions, 'time'> = {}): RecurrenceRule {
  return fromFactory('hourly', options);
}

export function daily(options: FactoryOptions = {}): RecurrenceRule {
  return fromFactory('daily', options);
}

export function weekly(days_of_week: readonly number[], options: FactoryOptions = {}): RecurrenceRule {
  return fromFactory('weekly', options, { days_of_week });
}

export function monthly(day_of_month: number | null, options: FactoryOptions = {}): RecurrenceRule {
  return fromFactory('monthly', options, { day_of_month });
}

export function yearly(options: FactoryOptions = {}): RecurrenceRule {
  return fromFactory('yearly', options);
}

// Presets

/** Monday through Friday */
export function weekdays(options: FactoryOptions = {}): RecurrenceRule {
  return weekly([2, 3, 4, 5, 6], options);
}

/** Saturday and Sunday */
export function weekends(options: FactoryOptions = {}): RecurrenceRule {
  return weekly([1, 7], options);
}

/**
 * Patterns offered for quick selection.
 */
export function commonPatterns(options: FactoryOptions = {}): RecurrenceRule[] {
  return [daily(options), weekdays(options), weekends(options), monthly(1, options), yearly(options)];
}
