/**
 * Object key case conversion
 */

import { convert } from '../case/converter.js';
import type { CaseStyleType } from '../case/style.js';
import type { TokenizerOptions } from '../case/tokenizer.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Recursively rename the keys of plain objects, including objects nested
 * in arrays. Values, primitives and class instances are left as they are.
 */
export function convertKeys(value: unknown, style: CaseStyleType, options?: TokenizerOptions): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => convertKeys(item, style, options));
  }

  // a converted `__proto__` key must stay an own property
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, nested]) => [
        convert(key, style, options),
        convertKeys(nested, style, options),
      ])
    );
  }

  return value;
}
