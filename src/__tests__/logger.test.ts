import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LogLevel, Logger, getLogger, parseLogLevel } from '../agents/logger';
import { createConsoleSpy } from './helpers/stubs';

describe('Logger', () => {
  let consoleSpy: ReturnType<typeof createConsoleSpy>;

  beforeEach(() => {
    consoleSpy = createConsoleSpy();
  });

  afterEach(() => {
    consoleSpy.restore();
  });

  it('logs at info and above by default', () => {
    const log = new Logger('test');

    log.debug('hidden');
    log.info('shown');

    expect(consoleSpy.debug).not.toHaveBeenCalled();
    expect(consoleSpy.info).toHaveBeenCalledTimes(1);
  });

  it('prefixes each line with a timestamp, the level and the logger name', () => {
    const log = getLogger('content.test');

    log.info('server started');

    expect(consoleSpy.info.mock.calls[0]?.[0]).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \[INFO\] content\.test: server started$/
    );
  });

  it('routes warnings and errors to the matching console methods', () => {
    const log = new Logger('test');

    log.warning('careful');
    log.error('failed');
    log.critical('down');

    expect(consoleSpy.warn).toHaveBeenCalledTimes(1);
    expect(consoleSpy.error).toHaveBeenCalledTimes(2);
    expect(consoleSpy.error.mock.calls[1]?.[0]).toMatch(/\[CRITICAL\] test: down$/);
  });

  it('drops messages below the configured level', () => {
    const log = new Logger('test');
    log.setLevel(LogLevel.ERROR);

    log.info('hidden');
    log.warning('hidden');
    log.error('shown');

    expect(consoleSpy.info).not.toHaveBeenCalled();
    expect(consoleSpy.warn).not.toHaveBeenCalled();
    expect(consoleSpy.error).toHaveBeenCalledTimes(1);
  });
});

describe('parseLogLevel', () => {
  it('maps configured names onto levels', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('warning')).toBe(LogLevel.WARNING);
    expect(parseLogLevel('critical')).toBe(LogLevel.CRITICAL);
  });
});
