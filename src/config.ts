/**
 * Configuration
 *
 * Reads the client settings from environment variables (populated from
 * `.env` by dotenv in the entry point).
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import { describeIssues } from './models.js';
import { DEFAULTS, ENV, ERRORS, LOG_NAMESPACES } from './utils/constants.js';
import { createLogger } from './utils/logger.js';
import { envFlag, envOptionalString, envPositiveNumber } from './utils/validation.js';

/**
 * Settings consumed by the data manager
 */
export interface ManagerSettings {
  /** Keep only locations flagged active */
  filterActive: boolean;
  /** Keep the first location per identifier */
  deduplicate: boolean;
  /** Insert explicit gap rows into hourly series */
  fillGaps: boolean;
  /** Default noise window, counted back from the last measurement */
  lookbackDays: number;
  /** A location is sending data when its last measurement is this recent */
  activeThresholdHours: number;
}

export interface AppConfig extends ManagerSettings {
  apiUrl: string;
  apiToken?: string;
  requestTimeoutMs: number;
  /** Outlier threshold in dB */
  noiseThreshold: number;
  /** Directory for CSV exports; no export when unset */
  exportDir?: string;
}

const logger = createLogger(LOG_NAMESPACES.CONFIG);

const ConfigSchema = z.object({
  [ENV.API_URL]: z.string().trim().url(),
  [ENV.API_TOKEN]: envOptionalString(),
  [ENV.REQUEST_TIMEOUT_MS]: envPositiveNumber(DEFAULTS.REQUEST_TIMEOUT_MS),
  [ENV.ACTIVE_THRESHOLD_HOURS]: envPositiveNumber(DEFAULTS.ACTIVE_THRESHOLD_HOURS),
  [ENV.FILTER_ACTIVE]: envFlag(DEFAULTS.FILTER_ACTIVE),
  [ENV.DEDUPLICATE]: envFlag(DEFAULTS.DEDUPLICATE),
  [ENV.FILL_GAPS]: envFlag(DEFAULTS.FILL_GAPS),
  [ENV.LOOKBACK_DAYS]: envPositiveNumber(DEFAULTS.LOOKBACK_DAYS),
  [ENV.NOISE_THRESHOLD]: envPositiveNumber(DEFAULTS.NOISE_THRESHOLD),
  [ENV.EXPORT_DIR]: envOptionalString(),
});

/**
 * Load configuration from the environment
 *
 * @throws {ValidationError} If a variable is missing or malformed
 *
 * @example
 * loadConfig({ NOISE_API_URL: 'https://noise.example.org/v1', MAP_DEDUPLICATE: 'false' })
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = describeIssues(result.error);
    logger.error(ERRORS.CONFIG.INVALID, { issues });
    throw new ValidationError(ERRORS.CONFIG.INVALID, issues);
  }

  const values = result.data;
  logger.debug(`Loaded configuration for ${values[ENV.API_URL]}`);

  return {
    apiUrl: values[ENV.API_URL],
    apiToken: values[ENV.API_TOKEN],
    requestTimeoutMs: values[ENV.REQUEST_TIMEOUT_MS],
    activeThresholdHours: values[ENV.ACTIVE_THRESHOLD_HOURS],
    filterActive: values[ENV.FILTER_ACTIVE],
    deduplicate: values[ENV.DEDUPLICATE],
    fillGaps: values[ENV.FILL_GAPS],
    lookbackDays: values[ENV.LOOKBACK_DAYS],
    noiseThreshold: values[ENV.NOISE_THRESHOLD],
    exportDir: values[ENV.EXPORT_DIR],
  };
}
