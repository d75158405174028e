/**
 * Tests for System utilities
 */

import { getEnv } from './system.js';

describe('getEnv', () => {
  const key = 'WORDCASE_TEST_SYSTEM_VAR';

  afterEach(() => {
    delete process.env[key];
  });

  test('should return undefined when unset', () => {
    expect(getEnv(key)).toBeUndefined();
  });

  test('should fall back to default when unset', () => {
    expect(getEnv(key, 'fallback')).toBe('fallback');
  });

  test('should prefer the environment value', () => {
    process.env[key] = 'from-env';
    expect(getEnv(key, 'fallback')).toBe('from-env');
  });
});
