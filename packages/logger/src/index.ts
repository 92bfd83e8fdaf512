export { createLogger, createSilentLogger, toSnakeKey } from './logger.js';
export type { CreateLoggerOptions, Logger, LogLevel } from './logger.js';
export { redactDeep } from './redaction.js';
export type { RedactionMode } from './redaction.js';
export { setRequestIdAttribute, TRACER_NAME, withSpan } from './otel-correlation.js';
export type { TraceContext } from './otel-correlation.js';
