/**
 * Severities in order, least to most severe.
 * The ordinal is the gate: a logger emits a severity when it is >= the threshold.
 */
export enum Severity {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Notice = 3,
  Warning = 4,
  Error = 5,
  Fault = 6,
}

/**
 * Lower-case names accepted by `parseSeverity` and used as method names
 */
export type SeverityName = 'trace' | 'debug' | 'info' | 'notice' | 'warning' | 'error' | 'fault';

/**
 * Backend that records one finished line.
 * Implementations should not block and should handle their own I/O failures.
 */
export interface LogSink {
  write(severity: Severity, line: string): void;
}

/**
 * Called when a sink throws from `write`. The logging call itself never throws.
 */
export type SinkErrorHandler = (error: unknown, severity: Severity, line: string) => void;

/**
 * Per-call overrides for a single log line
 */
export interface CallOptions {
  /**
   * Replaces the logger prefix for this line when non-empty
   */
  prefix?: string;
  /**
   * Replaces the logger separator for this line when non-empty
   */
  separator?: string;
  /**
   * Sink for this line only
   */
  sink?: LogSink;
}
