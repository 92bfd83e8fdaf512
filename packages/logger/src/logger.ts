import pino, { type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from 'pino';

import { getTraceContext } from './otel-correlation.js';
import { redactDeep, type RedactionMode } from './redaction.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Logger = Readonly<{
  debug: (context: Record<string, unknown>, message: string) => void;
  info: (context: Record<string, unknown>, message: string) => void;
  warn: (context: Record<string, unknown>, message: string) => void;
  error: (context: Record<string, unknown>, message: string) => void;
  fatal: (context: Record<string, unknown>, message: string) => void;
  child: (baseContext: Record<string, unknown>) => Logger;
}>;

export type CreateLoggerOptions = Readonly<{
  service: string;
  env: RedactionMode;
  level: LogLevel;
  version?: string;
  /** Defaults to stdout. */
  destination?: DestinationStream;
}>;

export function createLogger(options: CreateLoggerOptions): Logger {
  const pinoLogger = createPinoLogger(options);
  return createLoggerWrapper(pinoLogger, options.env, {});
}

/** Logger that drops everything; handy for tests and scripts. */
export function createSilentLogger(): Logger {
  const noop = (): void => undefined;
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    fatal: noop,
    child: () => logger,
  };
  return logger;
}

function createPinoLogger(options: CreateLoggerOptions): PinoLogger {
  const pinoOptions: LoggerOptions = {
    level: options.level,
    messageKey: 'message',
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    base: {
      service: options.service,
      env: options.env,
      version: options.version ?? process.env['npm_package_version'] ?? '0.0.0',
    },
    redact: {
      paths: ['*.password', '*.secret', '*.token', '*.api_key', '*.authorization'],
      censor: '[REDACTED]',
    },
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

function createLoggerWrapper(
  pinoLogger: PinoLogger,
  mode: RedactionMode,
  baseContext: Record<string, unknown>
): Logger {
  const log = (level: LogLevel, context: Record<string, unknown>, message: string): void => {
    const merged = {
      ...baseContext,
      ...context,
      ...getActiveTraceIds(),
    };

    const redacted = redactDeep(toSnakeCaseDeep(merged), mode);
    const fields = isRecord(redacted) ? redacted : { context: redacted };

    switch (level) {
      case 'debug':
        pinoLogger.debug(fields, message);
        return;
      case 'info':
        pinoLogger.info(fields, message);
        return;
      case 'warn':
        pinoLogger.warn(fields, message);
        return;
      case 'error':
        pinoLogger.error(fields, message);
        return;
      case 'fatal':
        pinoLogger.fatal(fields, message);
        return;
    }
  };

  return {
    debug: (context, message) => log('debug', context, message),
    info: (context, message) => log('info', context, message),
    warn: (context, message) => log('warn', context, message),
    error: (context, message) => log('error', context, message),
    fatal: (context, message) => log('fatal', context, message),
    child: (ctx) => createLoggerWrapper(pinoLogger, mode, { ...baseContext, ...ctx }),
  };
}

function getActiveTraceIds(): Record<string, unknown> {
  const { traceId, spanId } = getTraceContext();
  if (!traceId) return {};
  return {
    trace_id: traceId,
    span_id: spanId,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSnakeCaseDeep(value: unknown): unknown {
  if (value == null) return value;
  if (Array.isArray(value)) return value.map(toSnakeCaseDeep);
  if (value instanceof Error) return value;
  if (!isRecord(value)) return value;

  const out: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    out[toSnakeKey(key)] = toSnakeCaseDeep(val);
  }
  return out;
}

export function toSnakeKey(key: string): string {
  if (key.includes('_')) return key.toLowerCase();

  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z0-9]+)/g, '$1_$2')
    .toLowerCase();
}
