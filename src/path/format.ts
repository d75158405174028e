/**
 * Path string formatting
 *
 * Normalizes path strings into a platform-agnostic, forward-slash form on
 * top of the posix helpers from `path`. Purely lexical: the filesystem is
 * never consulted.
 */

import { posix } from 'path';
import { stripVTControlCharacters } from 'util';
import { UNFRIENDLY_PATH_CHARS } from '../common/constants.js';
import { getChildLogger } from '../logger.js';
import { createPathFormatConfig, type PathFormatConfig } from './config.js';

const logger = getChildLogger('wordcase', 'path');

const UNFRIENDLY_SET: ReadonlySet<string> = new Set(UNFRIENDLY_PATH_CHARS);

/**
 * Resolve `.` and `..` segments. A `..` that would climb above the start
 * of a relative path is dropped; posix.normalize already does so for
 * absolute paths.
 */
function resolveDots(path: string): string {
  let resolved = posix.normalize(path);
  let dropped = 0;

  while (resolved === '..' || resolved.startsWith('../')) {
    resolved = resolved.slice(3);
    dropped++;
  }

  if (dropped > 0) {
    logger.debug(`Dropped ${dropped} leading '..' segment(s) from '${path}'`);
  }

  return resolved === '' ? '.' : resolved;
}

/**
 * Normalize a path string.
 *
 * @example
 * ```ts
 * formatPath('C:\\Users\\\\test'); // 'C:/Users/test'
 * formatPath('/home/user/Workspace/../Vault/'); // '/home/user/Vault/'
 * formatPath('./home/file.txt'); // 'home/file.txt'
 * ```
 */
export function formatPath(path: string, config?: Partial<PathFormatConfig>): string {
  const options = createPathFormatConfig(config);

  if (path === '') {
    return '';
  }

  let result = options.stripAnsi ? stripVTControlCharacters(path) : path;

  if (options.escapeBackslashes) {
    result = result.replace(/\\/g, '/');
  }

  const endsWithSlash = result.endsWith('/');

  if (options.collapseConsecutiveSlashes) {
    result = result.replace(/\/{2,}/g, '/');
  }

  if (options.stripUnfriendlyChars) {
    result = Array.from(result)
      .filter((char) => !UNFRIENDLY_SET.has(char))
      .join('');
  }

  if (options.resolveParentDirs) {
    result = resolveDots(result);
  }

  if (endsWithSlash && !result.endsWith('/')) {
    result += '/';
  }

  if (result === './') {
    return '';
  }

  return result;
}

/**
 * Join path segments, then format the result with default settings
 */
export function joinPath(...segments: string[]): string {
  return formatPath(posix.join(...segments));
}
