/**
 * Noise API Client
 *
 * Handles all communication with the noise measurement API: authentication,
 * query serialization, timeouts, pagination and response validation.
 *
 * Uses openapi-typescript-fetch for typed calls against the route map in
 * types.ts; response bodies are validated with the zod models.
 */

import { ApiError, Fetcher, type Middleware } from 'openapi-typescript-fetch';
import {
  decodeAggregateMeasurements,
  decodeLocations,
  decodeMeasurementPage,
  decodeTimedMeasurements,
} from './models.js';
import { buildNoiseRequestParams, toQueryParameters, withPage } from './requestParams.js';
import { PaginationEngine } from './services/PaginationEngine.js';
import { TransportError } from './errors.js';
import type {
  Location,
  LocationNoiseData,
  NoiseApiPaths,
  NoiseRequestParams,
} from './types.js';
import { createLogger } from './utils/logger.js';
import { API, DEFAULTS, ERRORS, LOG_NAMESPACES } from './utils/constants.js';

const logger = createLogger(LOG_NAMESPACES.CLIENT);

/**
 * Construction options for the client
 */
export interface NoiseApiClientOptions {
  /** Base URL the endpoint paths are appended to */
  baseUrl: string;
  /** Static bearer token, sent with every request when set */
  apiToken?: string;
  /** Per-request timeout */
  timeoutMs?: number;
  /** Pagination engine, replaceable for tests */
  paginator?: PaginationEngine;
}

/**
 * Per-call options
 */
export interface RequestOptions {
  /** Cancels a paginated load between pages */
  signal?: AbortSignal;
}

/**
 * Logs the resolved URL of every request before it goes out
 */
const logRequest: Middleware = async (url, init, next) => {
  logger.info(`${init.method ?? 'GET'} Request: ${url}`);
  return next(url, init);
};

/**
 * Client for the noise measurement API
 *
 * The fetcher, and with it the underlying connection handling, is created
 * once and shared by every call.
 *
 * @example
 * const client = new NoiseApiClient({ baseUrl: 'https://noise.example.org/v1', apiToken: 'token' });
 * const locations = await client.getLocations();
 * const hourly = await client.getLocationNoiseData('42', buildNoiseRequestParams({ granularity: 'hourly' }));
 */
export class NoiseApiClient {
  private readonly fetcher: ReturnType<typeof Fetcher.for<NoiseApiPaths>>;
  private readonly timeoutMs: number;
  private readonly paginator: PaginationEngine;

  constructor(options: NoiseApiClientOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.REQUEST_TIMEOUT_MS;
    this.paginator = options.paginator ?? new PaginationEngine();

    this.fetcher = Fetcher.for<NoiseApiPaths>();
    this.fetcher.configure({
      baseUrl: options.baseUrl.replace(/\/+$/, ''),
      init: {
        headers: {
          Accept: 'application/json',
          ...(options.apiToken ? { Authorization: `Bearer ${options.apiToken}` } : {}),
        },
      },
      use: [logRequest],
    });

    logger.debug(`Initialized noise API client for ${options.baseUrl}`);
  }

  /**
   * Fetch every location, or the single location with the given identifier
   *
   * @throws {TransportError} If the request fails
   * @throws {SchemaMismatchError} If the body is not a locations envelope
   */
  async getLocations(locationId?: string): Promise<Location[]> {
    const body =
      locationId === undefined
        ? await this.send(API.ENDPOINTS.LOCATIONS, () =>
            this.fetcher.path(API.ENDPOINTS.LOCATIONS).method('get').create()({}, this.requestInit()),
          )
        : await this.send(API.ENDPOINTS.LOCATION, () =>
            this.fetcher
              .path(API.ENDPOINTS.LOCATION)
              .method('get')
              .create()({ id: locationId }, this.requestInit()),
          );

    const locations = decodeLocations(body, API.ENDPOINTS.LOCATIONS);
    logger.info(`Received ${locations.length} location(s)`);

    return locations;
  }

  /**
   * Fetch noise measurements for a location
   *
   * Without an explicit page, and for any granularity except life-time, every
   * page is collected until the server returns an empty one. The requested
   * granularity decides how the measurements are decoded.
   *
   * @throws {TransportError} If any page request fails; no partial result is returned
   * @throws {SchemaMismatchError} If the measurements do not match the requested granularity
   */
  async getLocationNoiseData(
    locationId: string,
    params: NoiseRequestParams = buildNoiseRequestParams(),
    options: RequestOptions = {},
  ): Promise<LocationNoiseData> {
    const context = `noise of location ${locationId} (${params.granularity})`;
    let measurements: unknown[];
    let cancelled = false;

    if (params.page !== undefined || params.granularity === 'life-time') {
      measurements = await this.fetchNoisePage(locationId, params);
    } else {
      const result = await this.paginator.collect(
        (page) => this.fetchNoisePage(locationId, withPage(params, page)),
        context,
        { signal: options.signal },
      );
      measurements = result.records;
      cancelled = result.cancelled;
    }

    logger.info(`Received ${measurements.length} measurement(s) for ${context}`);

    if (params.granularity === 'life-time') {
      return {
        granularity: params.granularity,
        measurements: decodeAggregateMeasurements(measurements, context),
        cancelled,
      };
    }

    return {
      granularity: params.granularity,
      measurements: decodeTimedMeasurements(measurements, context),
      cancelled,
    };
  }

  private async fetchNoisePage(locationId: string, params: NoiseRequestParams): Promise<unknown[]> {
    const getNoise = this.fetcher.path(API.ENDPOINTS.LOCATION_NOISE).method('get').create();

    const body = await this.send(API.ENDPOINTS.LOCATION_NOISE, () =>
      getNoise({ id: locationId, ...toQueryParameters(params) }, this.requestInit()),
    );

    return decodeMeasurementPage(body, API.ENDPOINTS.LOCATION_NOISE);
  }

  private requestInit(): RequestInit {
    return { signal: AbortSignal.timeout(this.timeoutMs) };
  }

  /**
   * Run one request and unwrap its body, mapping failures to TransportError
   */
  private async send(endpoint: string, request: () => Promise<{ data: unknown }>): Promise<unknown> {
    try {
      const { data } = await request();
      return data;
    } catch (error) {
      throw this.handleApiError(error, endpoint);
    }
  }

  /**
   * Handle and transform API errors
   */
  private handleApiError(error: unknown, endpoint: string): TransportError {
    if (error instanceof ApiError) {
      logger.error(`API error on ${endpoint}`, `Status: ${error.status} ${error.statusText}`);

      return new TransportError(
        `API request failed with status ${error.status}: ${error.statusText}`,
        error.status,
        error.url,
        error.data,
        { cause: error },
      );
    }

    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      logger.error(`Timeout on ${endpoint} after ${this.timeoutMs}ms`);
      return new TransportError(ERRORS.API.TIMEOUT, undefined, endpoint, undefined, { cause: error });
    }

    if (error instanceof TypeError) {
      logger.error(`Network error on ${endpoint}`, error);
      return new TransportError(ERRORS.API.NETWORK_ERROR, undefined, endpoint, undefined, {
        cause: error,
      });
    }

    if (error instanceof Error) {
      logger.error(`Error on ${endpoint}`, error);
      return new TransportError(error.message, undefined, endpoint, undefined, { cause: error });
    }

    logger.error(`Unexpected error on ${endpoint}`, error);
    return new TransportError(`Unexpected error: ${String(error)}`, undefined, endpoint);
  }
}
