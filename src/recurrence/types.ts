/**
 * Types for recurring tasks and habits.
 * Property names use snake_case to match the stored rule format.
 */

import type { Logger } from '../logger.ts';

export const FREQUENCIES = ['minutely', 'hourly', 'daily', 'weekly', 'monthly', 'yearly', 'custom'] as const;
export type Frequency = (typeof FREQUENCIES)[number];

export const REPEAT_MODES = ['from_original', 'from_completion'] as const;
export type RepeatMode = (typeof REPEAT_MODES)[number];

export const CADENCE_UNITS = ['minute', 'hour', 'day', 'week', 'month', 'year'] as const;
export type CadenceUnit = (typeof CADENCE_UNITS)[number];

/** 1 = Sunday ... 7 = Saturday */
export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export interface TimeOfDay {
  hour: number;
  minute: number;
}

export interface RecurrenceRule {
  readonly id: string;
  readonly frequency: Frequency;
  readonly interval: number;
  /** Sorted, unique. Empty means the anchor's weekday. */
  readonly days_of_week: readonly Weekday[];
  readonly day_of_month: number | null;
  /** Unit a `custom` rule steps by. */
  readonly custom_unit: CadenceUnit | null;
  /** Inclusive. */
  readonly end_date: Date | null;
  /** Counted from the series start; the seed occurrence is #1. */
  readonly max_occurrences: number | null;
  readonly repeat_mode: RepeatMode;
  readonly preferred_time: Readonly<TimeOfDay> | null;
  /** IANA identifier */
  readonly time_zone: string;
  readonly recreate_if_incomplete: boolean;
}

/**
 * Builder input: everything but `frequency` is optional.
 */
export interface RecurrenceRuleInput {
  id?: string;
  frequency: Frequency;
  interval?: number;
  days_of_week?: readonly number[] | null;
  day_of_month?: number | null;
  custom_unit?: CadenceUnit | null;
  end_date?: Date | null;
  max_occurrences?: number | null;
  repeat_mode?: RepeatMode;
  preferred_time?: TimeOfDay | null;
  time_zone?: string;
  recreate_if_incomplete?: boolean;
}

/**
 * Concrete stepping plan a rule resolves to.
 */
export type Cadence =
  | { unit: 'minute'; interval: number }
  | { unit: 'hour'; interval: number }
  | { unit: 'day'; interval: number }
  | { unit: 'week'; interval: number; weekdays: readonly Weekday[] }
  | { unit: 'month'; interval: number; day_of_month: number | null }
  | { unit: 'year'; interval: number };

export interface OccurrenceOptions {
  /** First occurrence of the series. Defaults to the reference date. */
  anchor?: Date;
  /** 1-based ordinal of the occurrence at the reference date. Overrides counting from `anchor`. */
  occurrence_index?: number;
  /** Ceiling on calendar steps for a single query. */
  max_iterations?: number;
  logger?: Logger;
}

/**
 * A recurring task or habit instance as seen by the repeat policy.
 */
export interface RecurringInstance {
  scheduled_date: Date | null;
  created_date: Date;
  completed_date: Date | null;
  /** 1-based; the first instance of a series is 1. */
  occurrence_index: number;
}

export type NextInstancePlan =
  | {
      status: 'scheduled';
      scheduled_date: Date;
      reference_date: Date;
      occurrence_index: number;
    }
  | { status: 'max_occurrences_reached'; occurrence_index: number }
  | { status: 'awaiting_completion' }
  | { status: 'no_further_occurrences'; reference_date: Date };

export interface NaturalLanguageParseResult {
  rule: RecurrenceRule | null;
  is_recurring: boolean;
  description: string;
}
