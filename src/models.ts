/**
 * Domain Models
 *
 * zod schemas for the wire payloads of the noise API. Record constructors
 * raise ValidationError; envelope decoders used on API responses raise
 * SchemaMismatchError.
 */

import { z } from 'zod';
import { SchemaMismatchError, ValidationError } from './errors.js';
import type { Location, NoiseAggregate, NoiseTimed } from './types.js';
import { hasUtcOffset, toCanonicalDate } from './utils/datetime.js';

/**
 * Timezone-aware ISO timestamp. A missing offset is rejected rather than defaulted.
 */
export const awareTimestamp = z
  .string()
  .refine(hasUtcOffset, { message: 'Expected an ISO-8601 timestamp with a UTC offset' })
  .transform((value, ctx) => {
    const date = toCanonicalDate(value);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid ISO-8601 timestamp' });
      return z.NEVER;
    }
    return date;
  });

export const LocationSchema: z.ZodType<Location, z.ZodTypeDef, unknown> = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  label: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  radius: z.number(),
  active: z.boolean(),
});

const levels = {
  min: z.number(),
  max: z.number(),
  mean: z.number(),
};

export const NoiseTimedSchema: z.ZodType<NoiseTimed, z.ZodTypeDef, unknown> = z.object({
  timestamp: awareTimestamp,
  ...levels,
});

export const NoiseAggregateSchema: z.ZodType<NoiseAggregate, z.ZodTypeDef, unknown> = z.object({
  start: awareTimestamp,
  end: awareTimestamp,
  count: z.number().int().nonnegative(),
  ...levels,
});

const LocationsEnvelopeSchema = z.object({
  locations: z.array(LocationSchema),
});

const MeasurementsEnvelopeSchema = z.object({
  measurements: z.array(z.unknown()),
});

const TimedMeasurementsSchema = z.array(NoiseTimedSchema);

const AggregateMeasurementsSchema = z
  .array(NoiseAggregateSchema)
  .max(1, { message: 'A life-time query yields at most one aggregate record' });

/**
 * Flatten zod issues to "path: message" strings
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

function construct<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, model: string): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new ValidationError(`Invalid ${model}`, describeIssues(result.error));
  }
  return result.data;
}

function decode<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
  context: string,
): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new SchemaMismatchError(`Unexpected response from ${context}`, describeIssues(result.error));
  }
  return result.data;
}

export function parseLocation(payload: unknown): Location {
  return construct(LocationSchema, payload, 'location');
}

export function parseNoiseTimed(payload: unknown): NoiseTimed {
  return construct(NoiseTimedSchema, payload, 'timed noise measurement');
}

export function parseNoiseAggregate(payload: unknown): NoiseAggregate {
  return construct(NoiseAggregateSchema, payload, 'aggregate noise measurement');
}

/**
 * Decode a `{ locations: [...] }` response body
 */
export function decodeLocations(payload: unknown, context: string): Location[] {
  return decode(LocationsEnvelopeSchema, payload, context).locations;
}

/**
 * Extract the untyped measurement list of a `{ measurements: [...] }` response body
 */
export function decodeMeasurementPage(payload: unknown, context: string): unknown[] {
  return decode(MeasurementsEnvelopeSchema, payload, context).measurements;
}

/**
 * Decode measurements into the shape implied by the granularity that was requested.
 * The payload itself is never inspected to pick the shape.
 */
export function decodeTimedMeasurements(measurements: unknown[], context: string): NoiseTimed[] {
  return decode(TimedMeasurementsSchema, measurements, context);
}

export function decodeAggregateMeasurements(
  measurements: unknown[],
  context: string,
): NoiseAggregate[] {
  return decode(AggregateMeasurementsSchema, measurements, context);
}
