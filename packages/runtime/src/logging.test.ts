// Tests for loggers

import { describe, it, expect, vi, afterEach } from 'vitest';
import { consoleLogger, createCapturingLogger, withMinimumLevel } from './logging.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createCapturingLogger', () => {
  it('should capture level, message and data', () => {
    const logger = createCapturingLogger();

    logger.info('Mounted add-on', { addon: 'auth' });
    logger.error('Failed');

    expect(logger.entries.map((e) => [e.level, e.message, e.data])).toEqual([
      ['info', 'Mounted add-on', { addon: 'auth' }],
      ['error', 'Failed', undefined],
    ]);
  });
});

describe('withMinimumLevel', () => {
  it('should drop entries below the level', () => {
    const captured = createCapturingLogger();
    const logger = withMinimumLevel(captured, 'warn');

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(captured.entries.map((e) => e.message)).toEqual(['warn', 'error']);
  });

  it('should pass everything at debug', () => {
    const captured = createCapturingLogger();
    const logger = withMinimumLevel(captured, 'debug');

    logger.debug('a');
    logger.info('b');

    expect(captured.entries).toHaveLength(2);
  });
});

describe('consoleLogger', () => {
  it('should prefix the level', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    consoleLogger.warn('No module registered for add-on', { addon: 'lms' });

    expect(spy).toHaveBeenCalledWith('[WARN] No module registered for add-on', { addon: 'lms' });
  });

  it('should pass an empty string when there is no data', () => {
    const spy = vi.spyOn(console, 'info').mockImplementation(() => {});

    consoleLogger.info('Shutting down');

    expect(spy).toHaveBeenCalledWith('[INFO] Shutting down', '');
  });
});
