/**
 * Engine configuration schema using Zod.
 *
 * Environment variables:
 * - RECURRENCE_DEFAULT_TIME_ZONE: zone given to rules built without one (default UTC)
 * - RECURRENCE_MAX_ITERATIONS: ceiling on calendar steps per query (default 10000)
 * - RECURRENCE_PREVIEW_LIMIT: occurrences shown in previews (default 5)
 * - RECURRENCE_DEBUG: enable debug logging (true/false)
 */

import { z } from 'zod';
import { isValidTimeZone } from './recurrence/calendar.ts';

const BooleanFlagSchema = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

export const EngineConfigSchema = z.object({
  /** Zone for rules built without an explicit one */
  default_time_zone: z
    .string()
    .min(1)
    .refine(isValidTimeZone, { message: 'default_time_zone must be an IANA time zone' })
    .default('UTC')
    .describe('Default IANA time zone'),
  /** Ceiling on calendar steps for one query */
  max_iterations: z.coerce.number().int().min(1).max(1_000_000).default(10_000).describe('Iteration ceiling'),
  /** Occurrences returned by previewOccurrences */
  preview_limit: z.coerce.number().int().min(1).max(1000).default(5).describe('Preview size'),
  /** Enable debug logging */
  debug: BooleanFlagSchema.default(false).describe('Debug logging'),
});

export type EngineConfig = z.output<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});

/**
 * Validates configuration.
 * Throws a ZodError if validation fails.
 */
export function validateConfig(config: unknown): EngineConfig {
  return EngineConfigSchema.parse(config);
}

export function safeValidateConfig(config: unknown): { success: true; data: EngineConfig } | { success: false; errors: z.ZodIssue[] } {
  const result = EngineConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error.issues };
}

/**
 * Reads configuration from environment variables.
 * Unset or blank variables fall back to defaults.
 */
export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const pick = (name: string): string | undefined => {
    const value = env[name];
    return value && value.trim() ? value.trim() : undefined;
  };

  return validateConfig({
    default_time_zone: pick('RECURRENCE_DEFAULT_TIME_ZONE'),
    max_iterations: pick('RECURRENCE_MAX_ITERATIONS'),
    preview_limit: pick('RECURRENCE_PREVIEW_LIMIT'),
    debug: pick('RECURRENCE_DEBUG'),
  });
}
