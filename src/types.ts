/**
 * Type definitions for the noise data client
 *
 * Wire-level models returned by the noise API, the typed route map used by the
 * fetcher, and the internal field registry types shared by the formatter and
 * the data manager.
 */

import type { API } from './utils/constants.js';

// ============================================================================
// Domain Types
// ============================================================================

/**
 * Aggregation level of a noise query
 */
export type Granularity = (typeof API.GRANULARITIES)[number];

/**
 * A sensor installation
 */
export interface Location {
  /** Stable identifier, always a string */
  id: string;
  /** Display name */
  label: string;
  latitude: number;
  longitude: number;
  /** Marker radius in meters */
  radius: number;
  /** Server-computed liveness flag */
  active: boolean;
}

/**
 * Decibel values shared by every measurement shape
 */
export interface NoiseLevels {
  min: number;
  max: number;
  mean: number;
}

/**
 * One raw sample or one hourly bucket, depending on the requested granularity
 */
export interface NoiseTimed extends NoiseLevels {
  timestamp: Date;
}

/**
 * Life-time summary of every sample recorded at a location
 */
export interface NoiseAggregate extends NoiseLevels {
  start: Date;
  end: Date;
  count: number;
}

/**
 * Validated parameters of a noise request
 */
export interface NoiseRequestParams {
  readonly granularity: Granularity;
  readonly start?: Date;
  readonly end?: Date;
  readonly page?: number;
}

/**
 * Noise data for one location, tagged with the granularity that was requested.
 * `cancelled` is set when pagination stopped early on an aborted signal; such a
 * result is incomplete.
 */
export type LocationNoiseData =
  | {
      granularity: 'life-time';
      measurements: NoiseAggregate[];
      cancelled: boolean;
    }
  | {
      granularity: 'raw' | 'hourly';
      measurements: NoiseTimed[];
      cancelled: boolean;
    };

// ============================================================================
// API Route Types
// ============================================================================

/**
 * Query string accepted by the noise endpoint. Timestamps are ISO-8601 strings.
 */
export interface NoiseQueryParameters {
  granularity?: Granularity;
  start?: string;
  end?: string;
  page?: number;
}

interface JsonResponse {
  content: {
    'application/json': unknown;
  };
}

/**
 * Route map for the typed fetcher. Response bodies are left as `unknown` and
 * validated against the models at runtime.
 */
export interface NoiseApiPaths {
  '/locations': {
    get: {
      responses: { 200: JsonResponse };
    };
  };
  '/locations/{id}': {
    get: {
      parameters: { path: { id: string } };
      responses: { 200: JsonResponse };
    };
  };
  '/locations/{id}/noise': {
    get: {
      parameters: { path: { id: string }; query: NoiseQueryParameters };
      responses: { 200: JsonResponse };
    };
  };
}

// ============================================================================
// Field Registry Types
// ============================================================================

/**
 * Semantic type of a registry field
 */
export type FieldType = 'string' | 'float' | 'integer' | 'boolean' | 'datetime';

/**
 * Value type carried by each internal field
 */
export interface FieldValues {
  deviceId: string;
  label: string;
  latitude: number;
  longitude: number;
  radius: number;
  active: boolean;
  timestamp: Date;
  min: number;
  max: number;
  mean: number;
  count: number;
  start: Date;
  end: Date;
  date: Date;
  hour: number;
}

/**
 * Internal field identifier
 */
export type Field = keyof FieldValues;

/**
 * One record of the internal tabular representation. `null` marks a gap.
 */
export type Row = { [F in Field]?: FieldValues[F] | null };

/**
 * Record keyed by wire names, as received from or sent to external consumers
 */
export type WireRecord = Record<string, unknown>;

/**
 * Regular frequencies supported by gap filling
 */
export type Frequency = 'minute' | 'hour' | 'day';

/**
 * Time window, both ends optional and inclusive
 */
export interface DateRange {
  start?: Date;
  end?: Date;
}
