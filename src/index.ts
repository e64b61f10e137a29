/**
 * slatelog: a leveled line logger with pluggable sinks
 * and a human-readable HTTP request/response tracer
 */

export { Logger, createLogger, resolvePrefix, sharedLogger } from './logger';
export type { LoggerOptions } from './logger';
export { ConsoleSink, StreamSink, MemorySink, FanoutSink, NoOpSink, defaultSink } from './sinks';
export type { CapturedLine, LineWritable } from './sinks';
export { SeverityThreshold, sharedThreshold, resolveThreshold } from './threshold';
export type { EnvBag } from './threshold';
export {
  SEVERITIES,
  SEVERITY_NAMES,
  SEVERITY_ICONS,
  parseSeverity,
  severityIcon,
  severityInitial,
  severityKey,
  severityName,
  verifySeverityTables,
} from './severity';
export { buildLevelSlug, buildLine, createColorizer, formatElapsed } from './format';
export type { ColorMode, LineStyle } from './format';
export { HEADER_MASK, HeaderRedactions, sharedRedactions } from './redact';
export {
  HttpTraceLogger,
  TraceVerbosity,
  logRequest,
  logResponse,
  redactHeader,
  sharedTracer,
} from './http';
export type {
  HeaderSource,
  HeaderValue,
  HttpTraceLoggerOptions,
  RequestTraceOptions,
  ResponseTraceOptions,
  TraceBody,
  TraceRequest,
  TraceResponse,
} from './http';
export { SlatelogError, PreconditionError, errorMessage } from './errors';
export { Severity } from './types';
export type { CallOptions, LogSink, SeverityName, SinkErrorHandler } from './types';

// Default export
import { createLogger } from './logger';
import { Severity } from './types';

export default {
  createLogger,
  Severity,
};
