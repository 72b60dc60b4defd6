/**
 * Repeat policy for recurring tasks and habits.
 *
 * Decides which date the next instance is computed from and whether it should
 * exist at all. Storing and materialising instances is left to the caller.
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.ts';
import { createLogger, type Logger } from '../logger.ts';
import { nextOccurrence } from './engine.ts';
import type { NextInstancePlan, RecurrenceRule, RecurringInstance } from './types.ts';

export interface PlanOptions {
  /** Supplies `debug` for the default logger and the iteration ceiling. */
  config?: Pick<EngineConfig, 'debug' | 'max_iterations'>;
  /** Replaces the logger built from `config`. */
  logger?: Logger;
}

/**
 * The date the next occurrence is stepped from.
 *
 * - from_original: the scheduled date, or the creation date when unscheduled
 * - from_completion: the completion date, or `now` when not yet completed
 */
export function resolveReferenceDate(rule: RecurrenceRule, instance: RecurringInstance, now: Date): Date {
  switch (rule.repeat_mode) {
    case 'from_original':
      return instance.scheduled_date ?? instance.created_date;
    case 'from_completion':
      return instance.completed_date ?? now;
  }
}

/**
 * Works out the next instance of a recurring item, if one is due.
 *
 * @throws RecurrenceError when the rule is invalid
 */
export function planNextInstance(rule: RecurrenceRule, instance: RecurringInstance, now: Date, options: PlanOptions = {}): NextInstancePlan {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const logger = options.logger ?? createLogger('recurrence-policy', { debug: config.debug });

  if (rule.max_occurrences !== null && instance.occurrence_index >= rule.max_occurrences) {
    logger.debug('Maximum occurrences reached', { rule_id: rule.id, occurrence_index: instance.occurrence_index });
    return { status: 'max_occurrences_reached', occurrence_index: instance.occurrence_index };
  }

  if (instance.completed_date === null && !rule.recreate_if_incomplete) {
    return { status: 'awaiting_completion' };
  }

  const reference = resolveReferenceDate(rule, instance, now);
  const scheduled = nextOccurrence(rule, reference, {
    occurrence_index: instance.occurrence_index,
    max_iterations: config.max_iterations,
    logger,
  });

  if (!scheduled) {
    return { status: 'no_further_occurrences', reference_date: reference };
  }

  logger.debug('Next instance planned', { rule_id: rule.id, reference, scheduled });
  return {
    status: 'scheduled',
    scheduled_date: scheduled,
    reference_date: reference,
    occurrence_index: instance.occurrence_index + 1,
  };
}
