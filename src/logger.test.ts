/**
 * Tests for logger
 */

import { defaultLogger, getChildLogger, getLogLevel, initLogger } from './logger.js';

describe('getLogLevel', () => {
  const saved = process.env.WORDCASE_LOGGING_LEVEL;

  afterEach(() => {
    if (saved === undefined) {
      delete process.env.WORDCASE_LOGGING_LEVEL;
    } else {
      process.env.WORDCASE_LOGGING_LEVEL = saved;
    }
  });

  test('should lowercase a known level', () => {
    process.env.WORDCASE_LOGGING_LEVEL = 'DEBUG';
    expect(getLogLevel()).toBe('debug');
  });

  test('should fall back to info for unknown levels', () => {
    process.env.WORDCASE_LOGGING_LEVEL = 'http';
    expect(getLogLevel()).toBe('info');
  });
});

describe('initLogger', () => {
  test('should use the library log levels', () => {
    expect(initLogger('levels-check').levels).toEqual({ error: 0, warn: 1, info: 2, debug: 3 });
  });

  test('should cache loggers by name', () => {
    expect(initLogger('wordcase')).toBe(defaultLogger);
    expect(initLogger('cache-check')).toBe(initLogger('cache-check'));
  });

  test('should name child loggers after their parent', () => {
    const child = getChildLogger('wordcase', 'child');
    expect(child).toBe(initLogger('wordcase:child'));
    expect(child.defaultMeta).toEqual({ service: 'wordcase:child' });
  });
});
