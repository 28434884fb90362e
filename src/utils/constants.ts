/**
 * Application Constants
 *
 * Endpoint paths, environment variable names, defaults and error messages
 * shared across the client.
 */

export const API = {
  ENDPOINTS: {
    LOCATIONS: '/locations',
    LOCATION: '/locations/{id}',
    LOCATION_NOISE: '/locations/{id}/noise',
  },
  GRANULARITIES: ['raw', 'hourly', 'life-time'] as const,
  DEFAULT_GRANULARITY: 'raw',
  FIRST_PAGE: 0,
} as const;

export const ENV = {
  API_URL: 'NOISE_API_URL',
  API_TOKEN: 'NOISE_API_TOKEN',
  REQUEST_TIMEOUT_MS: 'NOISE_API_TIMEOUT_MS',
  ACTIVE_THRESHOLD_HOURS: 'ACTIVE_THRESHOLD_HOURS',
  FILTER_ACTIVE: 'MAP_FILTER_ACTIVE',
  DEDUPLICATE: 'MAP_DEDUPLICATE',
  FILL_GAPS: 'PLOT_FILL_GAPS',
  LOOKBACK_DAYS: 'LOOKBACK_DAYS',
  NOISE_THRESHOLD: 'NOISE_THRESHOLD',
  EXPORT_DIR: 'EXPORT_DIR',
  LOG_LEVEL: 'LOG_LEVEL',
  LOG_FORMAT: 'LOG_FORMAT',
} as const;

export const DEFAULTS = {
  REQUEST_TIMEOUT_MS: 30_000,
  ACTIVE_THRESHOLD_HOURS: 5,
  FILTER_ACTIVE: true,
  DEDUPLICATE: true,
  FILL_GAPS: true,
  LOOKBACK_DAYS: 7,
  NOISE_THRESHOLD: 65,
} as const;

export const TIME = {
  MS_PER_MINUTE: 60_000,
  MS_PER_HOUR: 3_600_000,
  MS_PER_DAY: 86_400_000,
} as const;

export const LOG_NAMESPACES = {
  CLIENT: 'noise-api',
  PAGINATION: 'pagination',
  FORMATTER: 'formatter',
  MANAGER: 'data-manager',
  CONFIG: 'config',
  EXPORT: 'export',
  MAIN: 'main',
} as const;

export const FILESYSTEM = {
  ENCODING: 'utf-8',
  CSV_EXTENSION: '.csv',
} as const;

export const ERRORS = {
  CONFIG: {
    INVALID: 'Invalid configuration',
  },
  API: {
    NETWORK_ERROR: 'Network error while contacting the noise API',
    TIMEOUT: 'Request to the noise API timed out',
  },
  PARAMS: {
    INVALID: 'Invalid noise request parameters',
  },
} as const;
