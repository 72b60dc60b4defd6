/**
 * Recurrence engine: computes occurrence dates from a rule and a reference date.
 *
 * Every function is pure. The same rule, reference date and options always
 * produce the same dates; nothing is cached between calls.
 */

import type { DateTime, DurationUnit } from 'luxon';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.ts';
import { createLogger, type Logger } from '../logger.ts';
import { dayKey, weekdayOf, withClampedDay, withTimeOfDay, zoned } from './calendar.ts';
import { isSubDaily, resolveCadence } from './rule.ts';
import type { Cadence, OccurrenceOptions, RecurrenceRule, TimeOfDay } from './types.ts';

const defaultLogger = createLogger('recurrence');

/** Default number of occurrences returned by `occurrences`. */
export const DEFAULT_OCCURRENCE_LIMIT = 50;

interface StepPlan {
  rule: RecurrenceRule;
  cadence: Cadence;
  zone: string;
  /** Series start, in the rule's zone. */
  anchor: DateTime;
  /** Pinned time, already dropped for sub-daily cadences. */
  time: TimeOfDay | null;
  maxIterations: number;
  logger: Logger;
}

function plan(rule: RecurrenceRule, reference: Date, options: OccurrenceOptions): StepPlan {
  const cadence = resolveCadence(rule);
  return {
    rule,
    cadence,
    zone: rule.time_zone,
    anchor: zoned(options.anchor ?? reference, rule.time_zone),
    time: isSubDaily(cadence) ? null : rule.preferred_time,
    maxIterations: options.max_iterations ?? DEFAULT_ENGINE_CONFIG.max_iterations,
    logger: options.logger ?? defaultLogger,
  };
}

function inRange(dt: DateTime): boolean {
  return dt.isValid && Number.isFinite(dt.toMillis());
}

function weeklyDays(weekdays: readonly number[], anchor: DateTime): readonly number[] {
  return weekdays.length > 0 ? weekdays : [weekdayOf(anchor)];
}

/** Sunday of the week containing `dt`, same wall-clock time. */
function weekStart(dt: DateTime): DateTime {
  return dt.minus({ days: weekdayOf(dt) - 1 });
}

/**
 * Weekly: the next listed weekday later in the reference week, otherwise the
 * first listed weekday `interval` weeks on. Weeks run Sunday to Saturday.
 */
function stepWeekly(base: DateTime, interval: number, weekdays: readonly number[], anchor: DateTime): DateTime {
  const days = weeklyDays(weekdays, anchor);
  const current = weekdayOf(base);

  const later = days.find((day) => day > current);
  if (later !== undefined) {
    return base.plus({ days: later - current });
  }
  const first = days[0] ?? current;
  return base.plus({ days: 7 * interval + (first - current) });
}

function stepMonthly(base: DateTime, interval: number, dayOfMonth: number | null, anchor: DateTime): DateTime {
  // Luxon clamps month arithmetic (Jan 31 + 1 month = Feb 28/29), so the
  // result is always in the target month before the day is applied.
  const advanced = base.plus({ months: interval });
  return withClampedDay(advanced, dayOfMonth ?? anchor.day);
}

/** Restores Feb 29 in leap years after a clamp to Feb 28. */
function alignToAnchorDay(advanced: DateTime, anchor: DateTime): DateTime {
  if (advanced.month !== anchor.month) {
    return advanced;
  }
  return withClampedDay(advanced, anchor.day);
}

function step(cadence: Cadence, base: DateTime, anchor: DateTime): DateTime {
  switch (cadence.unit) {
    case 'minute':
      return base.plus({ minutes: cadence.interval });
    case 'hour':
      return base.plus({ hours: cadence.interval });
    case 'day':
      return base.plus({ days: cadence.interval });
    case 'week':
      return stepWeekly(base, cadence.interval, cadence.weekdays, anchor);
    case 'month':
      return stepMonthly(base, cadence.interval, cadence.day_of_month, anchor);
    case 'year':
      return alignToAnchorDay(base.plus({ years: cadence.interval }), anchor);
  }
}

function pin(p: StepPlan, dt: DateTime): DateTime | null {
  if (!inRange(dt)) {
    return null;
  }
  const pinned = p.time ? withTimeOfDay(dt, p.time) : dt;
  return inRange(pinned) ? pinned : null;
}

/**
 * One calendar step with the pinned time applied; no termination checks.
 * Null when the step leaves the range a Date can hold.
 */
function advance(p: StepPlan, from: Date): Date | null {
  const next = pin(p, step(p.cadence, zoned(from, p.zone), p.anchor));
  if (!next) {
    p.logger.warn('Recurrence step left the supported date range', { rule_id: p.rule.id, after: from, interval: p.cadence.interval });
    return null;
  }
  return next.toJSDate();
}

/**
 * The k-th date of the series that starts at the anchor (k = 0 is the anchor),
 * computed directly instead of by stepping.
 */
function seriesDate(p: StepPlan, k: number): DateTime | null {
  if (k === 0) {
    return p.anchor;
  }
  const { cadence, anchor } = p;
  switch (cadence.unit) {
    case 'minute':
      return pin(p, anchor.plus({ minutes: k * cadence.interval }));
    case 'hour':
      return pin(p, anchor.plus({ hours: k * cadence.interval }));
    case 'day':
      return pin(p, anchor.plus({ days: k * cadence.interval }));
    case 'month': {
      const advanced = anchor.plus({ months: k * cadence.interval });
      return inRange(advanced) ? pin(p, withClampedDay(advanced, cadence.day_of_month ?? anchor.day)) : null;
    }
    case 'year': {
      const advanced = anchor.plus({ years: k * cadence.interval });
      return inRange(advanced) ? pin(p, alignToAnchorDay(advanced, anchor)) : null;
    }
    case 'week': {
      const days = weeklyDays(cadence.weekdays, anchor);
      const start = weekStart(anchor);
      const firstWeek = days.filter((day) => day > weekdayOf(anchor));
      if (k <= firstWeek.length) {
        return pin(p, start.plus({ days: firstWeek[k - 1] - 1 }));
      }
      const j = k - firstWeek.length - 1;
      const cycle = Math.floor(j / days.length) + 1;
      const day = days[j % days.length];
      return pin(p, start.plus({ days: 7 * cadence.interval * cycle + day - 1 }));
    }
  }
}

const DIFF_UNITS: Record<'minute' | 'hour' | 'day' | 'month' | 'year', DurationUnit> = {
  minute: 'minutes',
  hour: 'hours',
  day: 'days',
  month: 'months',
  year: 'years',
};

/**
 * Approximate ordinal (0-based) of the last series date at or before `target`.
 */
function estimateSeriesIndex(p: StepPlan, target: DateTime): number {
  const { cadence, anchor } = p;
  if (cadence.unit === 'week') {
    const days = weeklyDays(cadence.weekdays, anchor);
    const firstWeek = days.filter((day) => day > weekdayOf(anchor)).length;
    const weeks = Math.round(weekStart(target).startOf('day').diff(weekStart(anchor).startOf('day'), 'weeks').as('weeks'));
    const cycle = Math.floor(weeks / cadence.interval);
    return cycle < 1 ? 0 : firstWeek + (cycle - 1) * days.length;
  }
  const unit = DIFF_UNITS[cadence.unit];
  return Math.floor(target.diff(anchor, unit).as(unit) / cadence.interval);
}

interface SeriesPoint {
  /** 1-based; the anchor is 1. */
  index: number;
  date: DateTime;
}

/**
 * Last series date at or before `target`, which must not precede the anchor.
 */
function seek(p: StepPlan, target: Date): SeriesPoint {
  const limit = target.getTime();
  const notAfter = (dt: DateTime | null): dt is DateTime => dt !== null && dt.toMillis() <= limit;

  let k = Math.max(0, estimateSeriesIndex(p, zoned(target, p.zone)));
  let current = seriesDate(p, k);
  while (k > 0 && !notAfter(current)) {
    k--;
    current = seriesDate(p, k);
  }
  let date = current ?? p.anchor;

  for (let i = 0; i < p.maxIterations; i++) {
    const next = seriesDate(p, k + 1);
    if (!notAfter(next)) break;
    k++;
    date = next;
  }
  return { index: k + 1, date };
}

/**
 * Ordinal of the occurrence at `reference`: given, counted from the anchor,
 * or 1.
 */
function occurrenceIndexAt(p: StepPlan, reference: Date, options: OccurrenceOptions): number {
  if (options.occurrence_index !== undefined) {
    return options.occurrence_index;
  }
  if (p.rule.max_occurrences === null || !options.anchor || options.anchor.getTime() >= reference.getTime()) {
    return 1;
  }
  return seek(p, reference).index;
}

function isPastEnd(rule: RecurrenceRule, date: Date): boolean {
  return rule.end_date !== null && date.getTime() > rule.end_date.getTime();
}

function isCapped(rule: RecurrenceRule, index: number): boolean {
  return rule.max_occurrences !== null && index >= rule.max_occurrences;
}

/**
 * Earliest occurrence strictly after `after`, or null when the rule has ended.
 *
 * @throws RecurrenceError when the rule is invalid or a custom frequency cannot be resolved
 */
export function nextOccurrence(rule: RecurrenceRule, after: Date, options: OccurrenceOptions = {}): Date | null {
  const p = plan(rule, after, options);

  if (isCapped(rule, occurrenceIndexAt(p, after, options))) {
    return null;
  }

  const next = advance(p, after);
  if (!next) {
    return null;
  }
  if (next.getTime() <= after.getTime()) {
    p.logger.warn('Recurrence step made no progress', { rule_id: rule.id, after, next });
    return null;
  }
  if (isPastEnd(rule, next)) {
    return null;
  }
  return next;
}

function* walk(p: StepPlan, from: Date, startIndex: number): Generator<Date, void, undefined> {
  let index = startIndex;
  let current = from;

  for (let i = 0; i < p.maxIterations; i++) {
    if (isCapped(p.rule, index)) {
      return;
    }
    const next = advance(p, current);
    if (!next) {
      return;
    }
    if (next.getTime() <= current.getTime()) {
      p.logger.warn('Recurrence step made no progress', { rule_id: p.rule.id, after: current, next });
      return;
    }
    if (isPastEnd(p.rule, next)) {
      return;
    }
    yield next;
    index++;
    current = next;
  }

  p.logger.warn('Iteration ceiling reached, returning partial occurrences', {
    rule_id: p.rule.id,
    from,
    max_iterations: p.maxIterations,
  });
}

/**
 * Lazily yields occurrences strictly after `from`. Each call starts a fresh
 * walk; the rule is validated before the iterator is returned.
 *
 * @throws RecurrenceError when the rule is invalid or a custom frequency cannot be resolved
 */
export function iterateOccurrences(rule: RecurrenceRule, from: Date, options: OccurrenceOptions = {}): Generator<Date, void, undefined> {
  const p = plan(rule, from, options);
  return walk(p, from, occurrenceIndexAt(p, from, options));
}

/**
 * Up to `limit` occurrences strictly after `from`, in order.
 *
 * @throws RecurrenceError when the rule is invalid or a custom frequency cannot be resolved
 */
export function occurrences(rule: RecurrenceRule, from: Date, limit: number = DEFAULT_OCCURRENCE_LIMIT, options: OccurrenceOptions = {}): Date[] {
  const iterator = iterateOccurrences(rule, from, options);
  const max = Number.isFinite(limit) ? Math.floor(limit) : 0;
  const result: Date[] = [];
  if (max < 1) {
    return result;
  }

  for (const date of iterator) {
    result.push(date);
    if (result.length >= max) break;
  }
  return result;
}

/**
 * Short list of upcoming dates for previews, sized by configuration.
 */
export function previewOccurrences(
  rule: RecurrenceRule,
  from: Date,
  config: Pick<EngineConfig, 'preview_limit' | 'max_iterations' | 'debug'> = DEFAULT_ENGINE_CONFIG,
): Date[] {
  return occurrences(rule, from, config.preview_limit, {
    max_iterations: config.max_iterations,
    logger: createLogger('recurrence', { debug: config.debug }),
  });
}

/**
 * Whether `date` falls on an occurrence of the series that starts at `anchor`.
 * Compares calendar days in the rule's zone, or exact instants for minutely
 * and hourly rules. Dates past `end_date` or `max_occurrences` do not match.
 */
export function isOccurrence(rule: RecurrenceRule, date: Date, anchor: Date, options: Omit<OccurrenceOptions, 'anchor' | 'occurrence_index'> = {}): boolean {
  const p = plan(rule, date, { ...options, anchor });
  const exact = isSubDaily(p.cadence);

  const target = date.getTime();
  const targetKey = dayKey(zoned(date, p.zone));
  const same = (candidate: DateTime): boolean => (exact ? candidate.toMillis() === target : dayKey(candidate) === targetKey);

  if (same(p.anchor)) {
    return true;
  }
  if (p.anchor.toMillis() > target) {
    return false;
  }

  // The last date at or before `date`, and the one after it, can share its day.
  const { index, date: found } = seek(p, date);
  const candidates: Array<[DateTime | null, number]> = [
    [found, index],
    [seriesDate(p, index), index + 1],
  ];
  return candidates.some(
    ([candidate, ordinal]) =>
      candidate !== null &&
      same(candidate) &&
      (rule.max_occurrences === null || ordinal <= rule.max_occurrences) &&
      !isPastEnd(rule, candidate.toJSDate()),
  );
}
