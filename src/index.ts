/**
 * Noise data client
 *
 * Public surface for dashboard code: the data manager and the layers below it.
 */

export { AppDataManager, isSendingData } from './dataManager.js';
export type { DataManagerConfig } from './dataManager.js';
export { NoiseApiClient } from './noiseApiClient.js';
export type { NoiseApiClientOptions, RequestOptions } from './noiseApiClient.js';
export { buildNoiseRequestParams, toQueryParameters, withPage } from './requestParams.js';
export type { NoiseQuery } from './requestParams.js';
export {
  decodeAggregateMeasurements,
  decodeLocations,
  decodeTimedMeasurements,
  parseLocation,
  parseNoiseAggregate,
  parseNoiseTimed,
} from './models.js';
export { loadConfig } from './config.js';
export type { AppConfig, ManagerSettings } from './config.js';
export { NoiseDataError, SchemaMismatchError, TransportError, ValidationError } from './errors.js';
export * from './services/index.js';
export type * from './types.js';
