import { type CallOptions, type LogSink, Severity, type SinkErrorHandler } from './types';
import { buildLine, graphemes, type LineStyle } from './format';
import { errorMessage, precondition } from './errors';
import { severityKey } from './severity';
import { defaultSink } from './sinks';
import { type EnvBag, processEnv, type SeverityThreshold, sharedThreshold } from './threshold';

/**
 * Logger configuration. Every field is optional; see `resolvePrefix` for the prefix default.
 */
export interface LoggerOptions {
  /** Text before the separator on every line */
  prefix?: string;
  /** Placed right after the prefix (default ':') */
  separator?: string;
  /** Exactly two characters wrapping the level glyph (default '[]') */
  brackets?: string;
  /** Icon glyph instead of the level initial (default false) */
  useIcons?: boolean;
  /** Prepend the bracketed level (default true) */
  showLevel?: boolean;
  /** Minimum-severity gate (default: the process-wide `sharedThreshold`) */
  threshold?: SeverityThreshold;
  /** Sink for lines without a per-call sink (default: `defaultSink`) */
  sink?: LogSink;
  /** Receives sink failures (default: one console.error line) */
  onSinkError?: SinkErrorHandler;
  /** Environment used for the prefix default; defaults to `process.env` */
  env?: EnvBag;
}

/**
 * Default prefix: `LOG_PREFIX`, then the running package name, then 'app'.
 */
export function resolvePrefix(env?: EnvBag): string {
  return env?.LOG_PREFIX || env?.npm_package_name || 'app';
}

const reportSinkError: SinkErrorHandler = (error, severity) => {
  console.error(`slatelog: sink failed to write a ${severityKey(severity)} line: ${errorMessage(error)}`);
};

/**
 * Leveled line logger: gates by severity, decorates the message, hands it to a sink
 */
export class Logger {
  readonly prefix: string;
  readonly separator: string;
  readonly brackets: string;
  readonly useIcons: boolean;
  readonly showLevel: boolean;
  private readonly style: LineStyle;
  private readonly threshold: SeverityThreshold;
  private readonly sink: LogSink;
  private readonly onSinkError: SinkErrorHandler;

  constructor(options: LoggerOptions = {}) {
    const brackets = options.brackets ?? '[]';
    precondition(graphemes(brackets).length === 2, 'There must be 2 and only 2 brackets');

    this.prefix = options.prefix ?? resolvePrefix(options.env ?? processEnv());
    this.separator = options.separator ?? ':';
    this.brackets = brackets;
    this.useIcons = options.useIcons ?? false;
    this.showLevel = options.showLevel ?? true;
    this.style = { brackets, useIcons: this.useIcons, showLevel: this.showLevel };
    this.threshold = options.threshold ?? sharedThreshold;
    this.sink = options.sink ?? defaultSink;
    this.onSinkError = options.onSinkError ?? reportSinkError;
  }

  /**
   * Current minimum severity, read through the threshold
   */
  get minimumSeverity(): Severity {
    return this.threshold.level;
  }

  /**
   * Route a message to the method for `level`
   */
  log(message: string, level: Severity): void {
    switch (level) {
      case Severity.Trace:
        this.trace(message);
        break;
      case Severity.Debug:
        this.debug(message);
        break;
      case Severity.Info:
        this.info(message);
        break;
      case Severity.Notice:
        this.notice(message);
        break;
      case Severity.Warning:
        this.warning(message);
        break;
      case Severity.Error:
        this.error(message);
        break;
      case Severity.Fault:
        this.fault(message);
        break;
    }
  }

  trace(message: string, call?: CallOptions): void {
    this.emit(Severity.Trace, message, call);
  }

  debug(message: string, call?: CallOptions): void {
    this.emit(Severity.Debug, message, call);
  }

  info(message: string, call?: CallOptions): void {
    this.emit(Severity.Info, message, call);
  }

  notice(message: string, call?: CallOptions): void {
    this.emit(Severity.Notice, message, call);
  }

  warning(message: string, call?: CallOptions): void {
    this.emit(Severity.Warning, message, call);
  }

  error(message: string, call?: CallOptions): void {
    this.emit(Severity.Error, message, call);
  }

  fault(message: string, call?: CallOptions): void {
    this.emit(Severity.Fault, message, call);
  }

  /**
   * True when a line at `level` would currently be written
   */
  isEnabled(level: Severity): boolean {
    return this.threshold.allows(level);
  }

  /**
   * The line `level` would produce for `message`, without gating or writing
   */
  format(message: string, level: Severity, call?: CallOptions): string {
    return buildLine(
      level,
      this.style,
      call?.prefix || this.prefix,
      call?.separator || this.separator,
      message,
    );
  }

  private emit(severity: Severity, message: string, call?: CallOptions): void {
    // Skip if below minimum level
    if (!this.threshold.allows(severity)) {
      return;
    }

    const line = this.format(message, severity, call);
    const sink = call?.sink ?? this.sink;

    try {
      sink.write(severity, line);
    } catch (err) {
      this.onSinkError(err, severity, line);
    }
  }
}

/**
 * Create a new logger instance
 */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * Process-wide default logger
 */
export const sharedLogger = new Logger();
