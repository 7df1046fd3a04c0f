import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, LogLevel } from '../../src/utils/logger';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('filters messages below its level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger({ level: LogLevel.WARN, timestamp: false });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown');

    expect(log).toHaveBeenCalledTimes(2);
    expect(logger.isLevelEnabled(LogLevel.INFO)).toBe(false);
    expect(logger.isLevelEnabled(LogLevel.ERROR)).toBe(true);
  });

  it('formats the prefix and level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger({ level: LogLevel.INFO, timestamp: false, prefix: 'Test' });

    logger.info('loaded', { operation: 'load' });

    expect(log).toHaveBeenCalledWith('\x1b[36mTest [INFO] loaded\x1b[0m', { operation: 'load' });
  });

  it('stays quiet when silent', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger({ level: LogLevel.SILENT });

    logger.error('hidden');

    expect(log).not.toHaveBeenCalled();
    expect(logger.level).toBe(LogLevel.SILENT);
  });

  it('times synchronous operations', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger({ level: LogLevel.INFO, timestamp: false, duration: false });

    expect(logger.withTiming('sum', () => 1 + 2)).toBe(3);
    expect(log).toHaveBeenCalledWith(
      '\x1b[36mRigMotion [INFO] Completed operation: sum\x1b[0m',
      { operation: 'sum', success: true }
    );
  });

  it('logs and rethrows errors from timed operations', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger({ level: LogLevel.INFO, timestamp: false, duration: false });

    expect(() => logger.withTiming('fail', () => {
      throw new Error('boom');
    })).toThrow('boom');
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(
      '\x1b[31mRigMotion [ERROR] Failed operation: fail\x1b[0m',
      { operation: 'fail', success: false, error: 'boom' }
    );
  });
});
