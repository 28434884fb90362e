/**
 * Request Parameter Builder
 *
 * Turns a logical noise query into a validated, immutable parameter object
 * and serializes it for the query string.
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import { awareTimestamp, describeIssues } from './models.js';
import type { Granularity, NoiseQueryParameters, NoiseRequestParams } from './types.js';
import { API, ERRORS } from './utils/constants.js';
import { formatDateTimeForAPI } from './utils/datetime.js';

/**
 * Logical noise query as written by callers
 */
export interface NoiseQuery {
  granularity?: Granularity;
  start?: Date | string;
  end?: Date | string;
  page?: number;
}

const timestampInput = z.union([z.date(), awareTimestamp]);

const NoiseRequestParamsSchema = z
  .object({
    granularity: z.enum(API.GRANULARITIES).default(API.DEFAULT_GRANULARITY),
    start: timestampInput.optional(),
    end: timestampInput.optional(),
    page: z.number().int().nonnegative().optional(),
  })
  .strict()
  .superRefine((params, ctx) => {
    if (params.granularity === 'life-time' && params.page !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['page'],
        message: 'life-time requests are never paginated',
      });
    }
    if (params.start && params.end && params.start.getTime() > params.end.getTime()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['start'],
        message: 'start must not be after end',
      });
    }
  });

/**
 * Validate a noise query
 *
 * @throws {ValidationError} On a negative or fractional page, a timestamp
 * without offset, a page on a life-time query, or start after end
 *
 * @example
 * buildNoiseRequestParams({ granularity: 'hourly', start: '2024-03-03T00:00:00Z' })
 */
export function buildNoiseRequestParams(query: NoiseQuery = {}): NoiseRequestParams {
  const result = NoiseRequestParamsSchema.safeParse(query);
  if (!result.success) {
    throw new ValidationError(ERRORS.PARAMS.INVALID, describeIssues(result.error));
  }

  const { granularity, start, end, page } = result.data;
  return Object.freeze({
    granularity,
    ...(start !== undefined && { start }),
    ...(end !== undefined && { end }),
    ...(page !== undefined && { page }),
  });
}

/**
 * Copy of the parameters pointing at another page
 */
export function withPage(params: NoiseRequestParams, page: number): NoiseRequestParams {
  return buildNoiseRequestParams({ ...params, page });
}

/**
 * Serialize for the query string. Unset fields are left out entirely.
 *
 * @example
 * toQueryParameters(buildNoiseRequestParams({ granularity: 'life-time' }))
 * // => { granularity: 'life-time' }
 */
export function toQueryParameters(params: NoiseRequestParams): NoiseQueryParameters {
  const query: NoiseQueryParameters = { granularity: params.granularity };

  if (params.start) {
    query.start = formatDateTimeForAPI(params.start);
  }
  if (params.end) {
    query.end = formatDateTimeForAPI(params.end);
  }
  if (params.page !== undefined) {
    query.page = params.page;
  }

  return query;
}
