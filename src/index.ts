/**
 * wordcase
 * Main entry point
 */

// Version
export const VERSION = '0.1.0';

// Types
export { Codes } from './types/codes.js';

// Common
export {
  WordcaseException,
  InvalidCaseStyleError,
  InvalidOptionsError,
} from './common/exceptions.js';
export { DEFAULT_SEPARATORS, UNFRIENDLY_PATH_CHARS } from './common/constants.js';

// Case conversion
export * from './case/index.js';

// Path formatting
export * from './path/index.js';

// Utils
export { convertKeys } from './utils/case.js';

// Logging
export { initLogger, getChildLogger, defaultLogger } from './logger.js';
export type { Logger } from './logger.js';
