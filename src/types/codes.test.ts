/**
 * Tests for Codes
 */

import { Codes } from './codes.js';

describe('Codes', () => {
  test('should have correct values', () => {
    expect(Codes.INVALID_CASE_STYLE).toBe(4001);
    expect(Codes.INVALID_OPTIONS).toBe(4002);
  });
});
