import { type LogSink, Severity } from './types';
import { type ColorMode, createColorizer } from './format';
import { severityKey } from './severity';

/**
 * Console sink routing each severity to the matching console method
 */
export class ConsoleSink implements LogSink {
  private colorize: (severity: Severity, line: string) => string;

  constructor(color: ColorMode = 'auto') {
    this.colorize = createColorizer(color);
  }

  write(severity: Severity, line: string): void {
    const output = this.colorize(severity, line);

    switch (severity) {
      case Severity.Trace:
      case Severity.Debug:
        console.debug(output);
        break;
      case Severity.Info:
      case Severity.Notice:
        console.info(output);
        break;
      case Severity.Warning:
        console.warn(output);
        break;
      case Severity.Error:
      case Severity.Fault:
        console.error(output);
        break;
    }
  }
}

/**
 * Minimal writable surface used by StreamSink (process.stdout, fs.WriteStream, ...)
 */
export interface LineWritable {
  write(chunk: string): unknown;
}

/**
 * Stream sink for Node.js writable streams, one line per write
 */
export class StreamSink implements LogSink {
  private stream: LineWritable;
  private tagSeverity: boolean;

  constructor(stream: LineWritable, tagSeverity: boolean = false) {
    this.stream = stream;
    this.tagSeverity = tagSeverity;
  }

  write(severity: Severity, line: string): void {
    const output = this.tagSeverity
      ? `[${severityKey(severity)}] ${line}\n`
      : `${line}\n`;

    this.stream.write(output);
  }
}

/**
 * A line captured by MemorySink
 */
export interface CapturedLine {
  severity: Severity;
  line: string;
}

/**
 * Memory sink for testing or buffering logs
 */
export class MemorySink implements LogSink {
  public logs: CapturedLine[] = [];

  write(severity: Severity, line: string): void {
    this.logs.push({ severity, line });
  }

  clear(): void {
    this.logs = [];
  }

  getLogs(): CapturedLine[] {
    return [...this.logs];
  }

  /**
   * Captured text only, in write order
   */
  lines(): string[] {
    return this.logs.map(entry => entry.line);
  }
}

/**
 * Sink that forwards every line to several sinks
 */
export class FanoutSink implements LogSink {
  private sinks: LogSink[];

  constructor(sinks: LogSink[]) {
    this.sinks = [...sinks];
  }

  write(severity: Severity, line: string): void {
    for (const sink of this.sinks) {
      sink.write(severity, line);
    }
  }
}

/**
 * No-op sink that discards all logs
 */
export class NoOpSink implements LogSink {
  write(_severity: Severity, _line: string): void {
    // Intentionally empty
  }
}

/**
 * Process-wide default sink used when a logger is given none
 */
export const defaultSink: LogSink = new ConsoleSink();
