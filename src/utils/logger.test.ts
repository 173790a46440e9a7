import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Logger, LogLevel } from './logger.js';

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 2, 5, 7, 8, 9));
    logger = new Logger({ level: LogLevel.DEBUG, useColors: false });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should format info lines with timestamp and padded level', () => {
    logger.info('info message');
    expect(console.log).toHaveBeenCalledWith('03-05 07:08:09 INFO    info message');
  });

  it('should send errors to stderr', () => {
    logger.error('error message');
    expect(console.error).toHaveBeenCalledWith('03-05 07:08:09 ERROR   error message');
    expect(console.log).not.toHaveBeenCalled();
  });

  it('should prefix scoped children and share the level with the parent', () => {
    const child = logger.child('sync');
    child.warning('slow feed');
    expect(console.log).toHaveBeenCalledWith('03-05 07:08:09 WARNING [sync] slow feed');

    logger.setLevel(LogLevel.ERROR);
    child.warning('hidden');
    expect(console.log).toHaveBeenCalledTimes(1);
  });

  it('should filter messages based on level', () => {
    logger.setLevel(LogLevel.WARNING);

    logger.debug('debug');
    logger.info('info');
    logger.success('success');
    logger.warning('warning');
    logger.error('error');

    expect(console.log).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith('03-05 07:08:09 WARNING warning');
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('should print nothing when silent', () => {
    logger.setLevel(LogLevel.SILENT);
    logger.error('error');
    expect(console.error).not.toHaveBeenCalled();
  });

  it('should use colors when enabled', () => {
    logger = new Logger({ level: LogLevel.INFO, useColors: true });
    logger.success('done');
    expect(console.log).toHaveBeenCalledWith('03-05 07:08:09 \x1b[32mSUCCESS\x1b[0m done');
  });
});
