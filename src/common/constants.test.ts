/**
 * Tests for Constants
 */

import { DEFAULT_SEPARATORS, UNFRIENDLY_PATH_CHARS } from './constants.js';

describe('DEFAULT_SEPARATORS', () => {
  test('should list the identifier separators', () => {
    expect(DEFAULT_SEPARATORS).toEqual([' ', '-', '_', '.', '/']);
  });
});

describe('UNFRIENDLY_PATH_CHARS', () => {
  test('should list the reserved file name characters', () => {
    expect(UNFRIENDLY_PATH_CHARS).toEqual(['*', '?', '"', '<', '>', '|']);
  });
});
