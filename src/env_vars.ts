/**
 * Environment variables configuration
 */

import { getEnv } from './utils/system.js';

/**
 * Environment variable definitions
 */
export const envVars = {
  // Logging
  get WORDCASE_LOGGING_PATH(): string | undefined {
    return getEnv('WORDCASE_LOGGING_PATH');
  },

  get WORDCASE_LOGGING_FILE_NAME(): string {
    return getEnv('WORDCASE_LOGGING_FILE_NAME', 'wordcase.log');
  },

  get WORDCASE_LOGGING_LEVEL(): string {
    return getEnv('WORDCASE_LOGGING_LEVEL', 'INFO');
  },
};
