/**
 * Validation Utilities
 *
 * zod building blocks for reading settings out of environment variables.
 */

import { z } from 'zod';

/**
 * Boolean flag written as "true"/"false" in any letter case; unset falls back to the default
 */
export function envFlag(defaultValue: boolean) {
  return z
    .string()
    .trim()
    .toLowerCase()
    .refine((value) => value === 'true' || value === 'false', {
      message: 'Expected "true" or "false"',
    })
    .transform((value) => value === 'true')
    .optional()
    .transform((value) => value ?? defaultValue);
}

/**
 * Positive number; unset falls back to the default
 */
export function envPositiveNumber(defaultValue: number) {
  return z.coerce.number().positive().optional().default(defaultValue);
}

/**
 * Empty strings count as unset
 */
export function envOptionalString() {
  return z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined));
}
