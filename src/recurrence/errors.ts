/**
 * Error types for recurrence rules.
 *
 * Running out of occurrences (end date or occurrence cap reached) is not an
 * error: the engine returns `null` or an empty list for that case.
 */

import type { z } from 'zod';

export type RecurrenceErrorType = 'invalid_rule_configuration' | 'unresolvable_custom_frequency';

/**
 * Structured error for rule validation and cadence resolution.
 */
export class RecurrenceError extends Error {
  readonly type: RecurrenceErrorType;
  /** Rule property that failed, when a single one can be named. */
  readonly field?: string;
  /** Every validation message collected, first one mirrors `message`. */
  readonly issues: string[];

  constructor(
    type: RecurrenceErrorType,
    message: string,
    options?: {
      field?: string;
      issues?: string[];
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = 'RecurrenceError';
    this.type = type;
    this.field = options?.field;
    this.issues = options?.issues ?? [message];

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  toSafeString(): string {
    const parts = [`[${this.type}]`, this.message];
    if (this.field) {
      parts.push(`(field: ${this.field})`);
    }
    return parts.join(' ');
  }
}

export function isRecurrenceError(error: unknown): error is RecurrenceError {
  return error instanceof RecurrenceError;
}

export function invalidRule(message: string, field?: string): RecurrenceError {
  return new RecurrenceError('invalid_rule_configuration', message, { field });
}

/**
 * Converts zod issues into a single invalid_rule_configuration error.
 */
export function fromZodError(error: z.ZodError): RecurrenceError {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  const first = error.issues[0];
  const field = first && first.path.length > 0 ? first.path.join('.') : undefined;

  return new RecurrenceError('invalid_rule_configuration', issues[0] ?? 'Invalid recurrence rule', {
    field,
    issues,
    cause: error,
  });
}
