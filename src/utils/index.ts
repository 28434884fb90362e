/**
 * Utilities Index
 *
 * Central export point for all utility functions and constants.
 */

// Logger
export { createLogger, type Logger, type LogLevel, type LogFormat } from './logger.js';

// Constants
export * from './constants.js';

// Date/Time utilities
export * from './datetime.js';

// Validation utilities
export * from './validation.js';
