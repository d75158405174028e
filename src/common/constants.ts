/**
 * Common constants
 */

/**
 * Separators recognised by the default tokenizer
 */
export const DEFAULT_SEPARATORS: readonly string[] = [' ', '-', '_', '.', '/'];

/**
 * Characters stripped from paths: reserved in Windows file names
 */
export const UNFRIENDLY_PATH_CHARS: readonly string[] = ['*', '?', '"', '<', '>', '|'];
