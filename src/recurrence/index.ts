/**
 * Recurrence module for tasks and habits.
 */

export * from './types.ts';
export * from './errors.ts';
export * from './calendar.ts';
export * from './rule.ts';
export * from './engine.ts';
export * from './policy.ts';
export * from './describe.ts';
export * from './parser.ts';
export * from './rrule-interop.ts';
