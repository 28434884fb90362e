import {
  createLogger as winstonCreateLogger,
  format as winstonFormat,
  transports,
  type Logger as WinstonLogger,
  type Logform,
} from 'winston';
import { ENV } from './constants.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';
export type Logger = WinstonLogger;
export type LogFormat = 'json' | 'pretty';

const FALLBACK_LEVEL: LogLevel = 'info';
const DEFAULT_FORMAT: LogFormat = process.stdout.isTTY ? 'pretty' : 'json';
const ALLOWED_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];
const ALLOWED_FORMATS: readonly LogFormat[] = ['json', 'pretty'];
const METADATA_EXCLUDE = ['message', 'level', 'timestamp', 'label', 'stack'];

const configuredLevel = resolveLogLevel(process.env[ENV.LOG_LEVEL]);

const baseLogger = winstonCreateLogger({
  // winston has no "silent" level, it is a flag on the logger
  level: configuredLevel === 'silent' ? FALLBACK_LEVEL : configuredLevel,
  silent: configuredLevel === 'silent',
  format: winstonFormat.combine(
    winstonFormat.errors({ stack: true }),
    winstonFormat.splat(),
    winstonFormat.metadata({ fillExcept: METADATA_EXCLUDE }),
  ),
  transports: [
    new transports.Console({
      format: buildTransportFormat(resolveLogFormat(process.env[ENV.LOG_FORMAT])),
    }),
  ],
});

/**
 * Child logger tagged with a namespace label, e.g. `createLogger(LOG_NAMESPACES.CLIENT)`.
 */
export function createLogger(namespace: string): Logger {
  return baseLogger.child({ label: namespace });
}

export function resolveLogLevel(input: string | undefined): LogLevel {
  const normalized = input?.toLowerCase();
  return isLogLevel(normalized) ? normalized : FALLBACK_LEVEL;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return (ALLOWED_LEVELS as readonly string[]).includes(value ?? '');
}

function resolveLogFormat(input: string | undefined): LogFormat {
  const normalized = input?.toLowerCase();
  return isLogFormat(normalized) ? normalized : DEFAULT_FORMAT;
}

function isLogFormat(value: string | undefined): value is LogFormat {
  return (ALLOWED_FORMATS as readonly string[]).includes(value ?? '');
}

function buildTransportFormat(logFormat: LogFormat): Logform.Format {
  if (logFormat === 'json') {
    return winstonFormat.combine(
      winstonFormat.timestamp(),
      winstonFormat.json({ replacer: errorReplacer }),
    );
  }

  return winstonFormat.combine(
    winstonFormat.colorize({ all: true }),
    winstonFormat.timestamp(),
    winstonFormat.printf(prettyPrint),
  );
}

function prettyPrint(info: Logform.TransformableInfo): string {
  const label = typeof info.label === 'string' ? info.label : 'noise-data';
  const timestamp = typeof info.timestamp === 'string' ? info.timestamp : new Date().toISOString();
  const stack = typeof info.stack === 'string' ? info.stack : undefined;
  const metadata = isPlainRecord(info.metadata) ? info.metadata : {};

  const meta =
    Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata, errorReplacer)}` : '';

  const base = `${timestamp} [${label}] ${info.level}: ${String(info.message)}`;
  return stack ? `${base}${meta}\n${stack}` : `${base}${meta}`;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
    };
  }
  return value;
}
