/**
 * Case styles
 */

import { z } from 'zod';
import { InvalidCaseStyleError } from '../common/exceptions.js';
import { getChildLogger } from '../logger.js';
import { tokenize } from './tokenizer.js';

const logger = getChildLogger('wordcase', 'style');

/**
 * Case style enum
 */
export const CaseStyle = {
  SNAKE: 'snake',
  KEBAB: 'kebab',
  CAMEL: 'camel',
  PASCAL: 'pascal',
  SCREAMING_SNAKE: 'screaming_snake',
  TRAIN: 'train',
  FLAT: 'flat',
  DOT: 'dot',
  TITLE: 'title',
  LOWER: 'lower',
  UPPER: 'upper',
} as const;

/**
 * Case style type
 */
export type CaseStyleType = (typeof CaseStyle)[keyof typeof CaseStyle];

export const CASE_STYLES: readonly CaseStyleType[] = Object.values(CaseStyle);

export const CaseStyleSchema = z.enum([
  CaseStyle.SNAKE,
  CaseStyle.KEBAB,
  CaseStyle.CAMEL,
  CaseStyle.PASCAL,
  CaseStyle.SCREAMING_SNAKE,
  CaseStyle.TRAIN,
  CaseStyle.FLAT,
  CaseStyle.DOT,
  CaseStyle.TITLE,
  CaseStyle.LOWER,
  CaseStyle.UPPER,
]);

/**
 * Styles whose output can be tokenized back into the same words.
 * Everything except flat, which drops both separators and case.
 */
export function isBoundaryPreserving(style: CaseStyleType): boolean {
  return style !== CaseStyle.FLAT;
}

/**
 * Alternative names, keyed by their snake_case spelling with any trailing
 * "case" word removed
 */
const STYLE_ALIASES: ReadonlyMap<string, CaseStyleType> = new Map<string, CaseStyleType>([
  ['constant', CaseStyle.SCREAMING_SNAKE],
  ['macro', CaseStyle.SCREAMING_SNAKE],
  ['upper_snake', CaseStyle.SCREAMING_SNAKE],
  ['dash', CaseStyle.KEBAB],
  ['lower_camel', CaseStyle.CAMEL],
  ['upper_camel', CaseStyle.PASCAL],
  ['flatcase', CaseStyle.FLAT],
]);

/**
 * Resolve a user-facing style name such as "SCREAMING-SNAKE",
 * "screamingSnake", "Train-Case" or "constant"
 */
export function parseCaseStyle(name: string): CaseStyleType {
  const words = tokenize(name).map((word) => word.toLowerCase());
  if (words.length > 1 && words[words.length - 1] === 'case') {
    words.pop();
  }
  const key = words.join('_');

  const direct = CaseStyleSchema.safeParse(key);
  if (direct.success) {
    return direct.data;
  }

  const alias = STYLE_ALIASES.get(key);
  if (alias !== undefined) {
    logger.debug(`Resolved case style alias '${name}' to '${alias}'`);
    return alias;
  }

  logger.warn(`Rejected unknown case style '${name}'`);
  throw new InvalidCaseStyleError(name);
}
