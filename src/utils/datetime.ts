/**
 * Date/Time Utilities
 *
 * Helper functions for date and time operations throughout the client.
 * Every internal timestamp is an instant in the canonical zone (UTC).
 */

import type { Frequency } from '../types.js';
import { TIME } from './constants.js';

// Time of day followed by `Z`, `±HH`, `±HHMM` or `±HH:MM`
const OFFSET_SUFFIX = /\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;
const NUMERIC_OFFSET = /([+-]\d{2}):?(\d{2})?$/;

export const FREQUENCY_MS: Record<Frequency, number> = {
  minute: TIME.MS_PER_MINUTE,
  hour: TIME.MS_PER_HOUR,
  day: TIME.MS_PER_DAY,
};

/**
 * Format a Date object to an API-compatible string
 * Format: "YYYY-MM-DDTHH:MM:SSZ"
 *
 * @example
 * formatDateTimeForAPI(new Date('2024-12-06T10:30:00.250Z'))
 * // => "2024-12-06T10:30:00Z"
 */
export function formatDateTimeForAPI(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Whether an ISO timestamp string carries an explicit UTC offset
 */
export function hasUtcOffset(value: string): boolean {
  return OFFSET_SUFFIX.test(value.trim());
}

/**
 * Parse a timestamp into the canonical zone. Strings must carry an explicit
 * offset; hour-only and colon-less offsets are normalized to `±HH:MM`.
 *
 * @returns The parsed instant, or null when the input is not a valid timestamp
 */
export function toCanonicalDate(value: string | number | Date): Date | null {
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value;
  }

  if (typeof value === 'number') {
    const date = new Date(value);
    return isNaN(date.getTime()) ? null : date;
  }

  const trimmed = value.trim();
  if (!hasUtcOffset(trimmed)) {
    return null;
  }

  const normalized = trimmed
    .replace(' ', 'T')
    .replace(
      NUMERIC_OFFSET,
      (_match, hours: string, minutes: string | undefined) => `${hours}:${minutes ?? '00'}`,
    );
  const date = new Date(normalized);
  return isNaN(date.getTime()) ? null : date;
}

export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * TIME.MS_PER_DAY);
}

export function subtractHours(date: Date, hours: number): Date {
  return new Date(date.getTime() - hours * TIME.MS_PER_HOUR);
}

/**
 * Midnight (UTC) of the day containing the given instant
 */
export function startOfDay(date: Date): Date {
  return new Date(Math.floor(date.getTime() / TIME.MS_PER_DAY) * TIME.MS_PER_DAY);
}

/**
 * Format duration in milliseconds to human-readable string
 *
 * @example
 * formatDuration(5432)
 * // => "5.43s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
