/**
 * Word renderer
 */

import { CaseStyle, type CaseStyleType } from './style.js';
import type { Word, WordSequence } from './tokenizer.js';

const LETTER_RE = /\p{L}\p{M}*$/u;
const DIGIT_RE = /^\p{N}/u;

function lower(word: Word): string {
  return word.toLowerCase();
}

function upper(word: Word): string {
  return word.toUpperCase();
}

/**
 * Uppercase the first code point and lowercase the rest.
 * A leading digit or symbol passes through unchanged.
 */
export function capitalize(word: Word): string {
  const [first = '', ...rest] = Array.from(word);
  return first.toUpperCase() + rest.join('').toLowerCase();
}

export interface RenderOptions {
  /**
   * Write a word starting with a digit straight after a word ending with a
   * letter (`v2_release`). Only safe to re-tokenize when the tokenizer
   * splits on digits, so it follows `splitOnDigits` in `convert`.
   * Defaults to true.
   */
  attachDigits?: boolean;
}

function joinWords(words: readonly string[], separator: string, attachDigits: boolean): string {
  let result = '';
  words.forEach((word, index) => {
    if (index > 0) {
      const attached = attachDigits && LETTER_RE.test(words[index - 1]) && DIGIT_RE.test(word);
      if (!attached) {
        result += separator;
      }
    }
    result += word;
  });
  return result;
}

/**
 * Render words under a case style
 */
export function render(
  words: WordSequence,
  style: CaseStyleType,
  options: RenderOptions = {}
): string {
  const join = (parts: readonly string[], separator: string): string =>
    joinWords(parts, separator, options.attachDigits ?? true);

  switch (style) {
    case CaseStyle.SNAKE:
      return join(words.map(lower), '_');
    case CaseStyle.SCREAMING_SNAKE:
      return join(words.map(upper), '_');
    case CaseStyle.KEBAB:
      return join(words.map(lower), '-');
    case CaseStyle.CAMEL:
      return words.map((word, index) => (index === 0 ? lower(word) : capitalize(word))).join('');
    case CaseStyle.PASCAL:
      return words.map(capitalize).join('');
    case CaseStyle.TRAIN:
      return join(words.map(capitalize), '-');
    case CaseStyle.FLAT:
      return words.map(lower).join('');
    case CaseStyle.DOT:
      return join(words.map(lower), '.');
    case CaseStyle.TITLE:
      return join(words.map(capitalize), ' ');
    case CaseStyle.LOWER:
      return join(words.map(lower), ' ');
    case CaseStyle.UPPER:
      return join(words.map(upper), ' ');
    default: {
      const unhandled: never = style;
      return unhandled;
    }
  }
}
