import { afterEach, describe, expect, it, vi } from 'vitest';
import { Logger, type LoggerOptions, createLogger, resolvePrefix } from './logger';
import { MemorySink } from './sinks';
import { SeverityThreshold } from './threshold';
import { SEVERITIES } from './severity';
import { PreconditionError } from './errors';
import { type LogSink, Severity } from './types';

function setup(options: LoggerOptions = {}) {
  const sink = new MemorySink();
  const threshold = new SeverityThreshold(Severity.Trace);
  const logger = new Logger({ prefix: 'App', threshold, sink, ...options });
  return { sink, threshold, logger };
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('formats a notice with the level initial', () => {
    const { sink, logger } = setup();

    logger.notice('hi');

    expect(sink.getLogs()).toEqual([{ severity: Severity.Notice, line: '[N] App: hi' }]);
  });

  it('uses icons when asked', () => {
    const { sink, logger } = setup({ useIcons: true });

    logger.notice('hi');

    expect(sink.lines()).toEqual(['[🖤] App: hi']);
  });

  it('honours a custom bracket pair and separator', () => {
    const { sink, logger } = setup({ brackets: '<>', separator: ' |' });

    logger.debug('ready');

    expect(sink.lines()).toEqual(['<D> App | ready']);
  });

  it('omits the level slug when showLevel is off', () => {
    const { sink, logger } = setup({ showLevel: false });

    logger.error('down');

    expect(sink.lines()).toEqual(['App: down']);
  });

  it('logs an empty message after the prefix', () => {
    const { sink, logger } = setup();

    logger.info('');

    expect(sink.lines()).toEqual(['[I] App: ']);
  });

  it('applies non-empty per-call prefix and separator', () => {
    const { sink, logger } = setup();

    logger.warning('slow', { prefix: 'Net', separator: '>' });
    logger.warning('slow', { prefix: '', separator: '' });

    expect(sink.lines()).toEqual(['[W] Net> slow', '[W] App: slow']);
  });

  it('writes to a per-call sink instead of its own', () => {
    const { sink, logger } = setup();
    const other = new MemorySink();

    logger.fault('gone', { sink: other });

    expect(sink.logs).toHaveLength(0);
    expect(other.getLogs()).toEqual([{ severity: Severity.Fault, line: '[F] App: gone' }]);
  });

  it('rejects bracket pairs that are not two characters', () => {
    expect(() => new Logger({ brackets: '[' })).toThrow(PreconditionError);
    expect(() => new Logger({ brackets: '[[]' })).toThrow('There must be 2 and only 2 brackets');
    expect(() => new Logger({ brackets: '' })).toThrow(PreconditionError);
  });

  it('accepts a two-character pair made of astral symbols', () => {
    const { sink, logger } = setup({ brackets: '🙂🙃' });

    logger.info('ok');

    expect(sink.lines()).toEqual(['🙂I🙃 App: ok']);
  });

  it('counts multi-code-point glyphs as one bracket each', () => {
    const { sink, logger } = setup({ brackets: '❤️❤️' });

    logger.info('x');

    expect(sink.lines()).toEqual(['❤️I❤️ App: x']);
  });

  it('accepts a decomposed accented bracket', () => {
    const { sink, logger } = setup({ brackets: 'e\u0301]' });

    logger.debug('x');

    expect(sink.lines()).toEqual(['e\u0301D] App: x']);
  });

  it('routes log() to the method for each severity', () => {
    const { sink, logger } = setup();

    for (const severity of SEVERITIES) {
      logger.log('m', severity);
    }

    expect(sink.getLogs()).toEqual([
      { severity: Severity.Trace, line: '[T] App: m' },
      { severity: Severity.Debug, line: '[D] App: m' },
      { severity: Severity.Info, line: '[I] App: m' },
      { severity: Severity.Notice, line: '[N] App: m' },
      { severity: Severity.Warning, line: '[W] App: m' },
      { severity: Severity.Error, line: '[E] App: m' },
      { severity: Severity.Fault, line: '[F] App: m' },
    ]);
  });

  it('writes only severities at or above the threshold', () => {
    for (const threshold of SEVERITIES) {
      for (const severity of SEVERITIES) {
        const sink = new MemorySink();
        const logger = new Logger({ prefix: 'App', sink, threshold: new SeverityThreshold(threshold) });

        logger.log('x', severity);

        expect(sink.logs).toHaveLength(severity >= threshold ? 1 : 0);
      }
    }
  });

  it('reads the threshold on every call', () => {
    const { sink, threshold, logger } = setup();

    logger.info('one');
    threshold.setLevel(Severity.Error);
    logger.info('two');
    logger.error('three');

    expect(sink.lines()).toEqual(['[I] App: one', '[E] App: three']);
    expect(logger.minimumSeverity).toBe(Severity.Error);
    expect(logger.isEnabled(Severity.Info)).toBe(false);
  });

  it('shares one threshold between loggers', () => {
    const threshold = new SeverityThreshold(Severity.Trace);
    const a = new MemorySink();
    const b = new MemorySink();
    const first = new Logger({ prefix: 'A', sink: a, threshold });
    const second = new Logger({ prefix: 'B', sink: b, threshold });

    threshold.setLevel(Severity.Warning);
    first.notice('quiet');
    second.notice('quiet');

    expect(a.logs).toHaveLength(0);
    expect(b.logs).toHaveLength(0);
  });

  it('does not build the line when gated', () => {
    const { logger, threshold } = setup();
    const format = vi.spyOn(logger, 'format');

    threshold.setLevel(Severity.Fault);
    logger.error('dropped');

    expect(format).not.toHaveBeenCalled();
  });

  it('formats without gating or writing', () => {
    const { sink, threshold, logger } = setup();

    threshold.setLevel(Severity.Fault);

    expect(logger.format('hi', Severity.Notice)).toBe('[N] App: hi');
    expect(logger.format('hi', Severity.Notice, { prefix: 'X', separator: ' -' })).toBe('[N] X - hi');
    expect(sink.logs).toHaveLength(0);
  });

  it('hands sink failures to onSinkError instead of throwing', () => {
    const failure = new Error('disk full');
    const broken: LogSink = {
      write: () => {
        throw failure;
      },
    };
    const onSinkError = vi.fn();
    const { logger } = setup({ sink: broken, onSinkError });

    expect(() => logger.error('lost')).not.toThrow();
    expect(onSinkError).toHaveBeenCalledWith(failure, Severity.Error, '[E] App: lost');
  });

  it('reports sink failures on the console by default', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const broken: LogSink = {
      write: () => {
        throw new Error('disk full');
      },
    };
    const logger = new Logger({ prefix: 'App', sink: broken, threshold: new SeverityThreshold() });

    logger.warning('lost');

    expect(spy).toHaveBeenCalledWith('slatelog: sink failed to write a warning line: disk full');
  });

  it('exposes its configuration', () => {
    const { logger } = setup({ separator: '|', brackets: '()', useIcons: true, showLevel: false });

    expect(logger.prefix).toBe('App');
    expect(logger.separator).toBe('|');
    expect(logger.brackets).toBe('()');
    expect(logger.useIcons).toBe(true);
    expect(logger.showLevel).toBe(false);
  });

  it('defaults separator, brackets and toggles', () => {
    const logger = createLogger({ prefix: 'App' });

    expect(logger.separator).toBe(':');
    expect(logger.brackets).toBe('[]');
    expect(logger.useIcons).toBe(false);
    expect(logger.showLevel).toBe(true);
  });
});

describe('resolvePrefix', () => {
  it('prefers LOG_PREFIX, then the package name, then app', () => {
    expect(resolvePrefix({ LOG_PREFIX: 'svc', npm_package_name: 'pkg' })).toBe('svc');
    expect(resolvePrefix({ npm_package_name: 'pkg' })).toBe('pkg');
    expect(resolvePrefix({ LOG_PREFIX: '' })).toBe('app');
    expect(resolvePrefix(undefined)).toBe('app');
  });

  it('is used when no prefix is given', () => {
    const logger = new Logger({ env: { LOG_PREFIX: 'worker' } });

    expect(logger.prefix).toBe('worker');
  });
});
