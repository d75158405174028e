/**
 * Tests for path format config
 */

import { InvalidOptionsError } from '../common/exceptions.js';
import { PathFormatConfigSchema, createPathFormatConfig, type PathFormatConfig } from './config.js';

describe('PathFormatConfigSchema', () => {
  test('should enable every step by default', () => {
    expect(PathFormatConfigSchema.parse({})).toEqual({
      stripAnsi: true,
      stripUnfriendlyChars: true,
      resolveParentDirs: true,
      collapseConsecutiveSlashes: true,
      escapeBackslashes: true,
    });
  });
});

describe('createPathFormatConfig', () => {
  test('should create config with defaults', () => {
    expect(createPathFormatConfig().resolveParentDirs).toBe(true);
  });

  test('should merge partial config', () => {
    const config = createPathFormatConfig({ stripAnsi: false });
    expect(config.stripAnsi).toBe(false);
    expect(config.escapeBackslashes).toBe(true);
  });

  test('should reject values of the wrong type', () => {
    const invalid = { stripAnsi: 'yes' } as unknown as Partial<PathFormatConfig>;
    let caught: unknown;
    try {
      createPathFormatConfig(invalid);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidOptionsError);
    expect(caught).toHaveProperty('issues', ['stripAnsi: Expected boolean, received string']);
  });
});
