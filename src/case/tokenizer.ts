/**
 * Identifier tokenizer
 *
 * Splits an identifier written in any common convention into its words.
 * Boundaries, in precedence order:
 *
 * 1. separator characters, which are consumed
 * 2. lowercase followed by uppercase (`fooBar` -> `foo`, `Bar`)
 * 3. letter/digit transitions (`v2Server` -> `v`, `2`, `Server`)
 * 4. the last capital of an uppercase run that precedes a lowercase letter
 *    starts the next word (`HTTPServer` -> `HTTP`, `Server`)
 *
 * Words keep their original casing; casing is decided at render time.
 */

import { z } from 'zod';
import { DEFAULT_SEPARATORS } from '../common/constants.js';
import { InvalidOptionsError } from '../common/exceptions.js';

/**
 * One semantic token of an identifier, never empty
 */
export type Word = string;

/**
 * Ordered words produced from a single input
 */
export type WordSequence = readonly Word[];

/**
 * Tokenizer configuration schema
 */
export const TokenizerConfigSchema = z.object({
  separators: z
    .array(
      z.string().refine((value) => Array.from(value).length === 1, {
        message: 'Separator must be a single character',
      })
    )
    .default([...DEFAULT_SEPARATORS]),
  splitOnDigits: z.boolean().default(true),
  dropSymbols: z.boolean().default(false),
});

export type TokenizerConfig = z.infer<typeof TokenizerConfigSchema>;

export type TokenizerOptions = Partial<TokenizerConfig>;

/**
 * Create tokenizer config with defaults
 */
export function createTokenizerConfig(options?: TokenizerOptions): TokenizerConfig {
  const result = TokenizerConfigSchema.safeParse(options ?? {});
  if (!result.success) {
    throw InvalidOptionsError.fromIssues('tokenizer options', result.error.issues);
  }
  return result.data;
}

type CharClass = 'upper' | 'lower' | 'letter' | 'digit' | 'mark' | 'symbol';

const UPPER_RE = /^[\p{Lu}\p{Lt}]$/u;
const LOWER_RE = /^\p{Ll}$/u;
const LETTER_RE = /^\p{L}$/u;
const DIGIT_RE = /^\p{N}$/u;
const MARK_RE = /^\p{M}$/u;

function classify(char: string): CharClass {
  if (UPPER_RE.test(char)) return 'upper';
  if (LOWER_RE.test(char)) return 'lower';
  if (LETTER_RE.test(char)) return 'letter';
  if (DIGIT_RE.test(char)) return 'digit';
  if (MARK_RE.test(char)) return 'mark';
  return 'symbol';
}

function isLetter(cls: CharClass): boolean {
  return cls === 'upper' || cls === 'lower' || cls === 'letter';
}

/**
 * Word under construction. A combining mark is stored with the class of
 * the character it follows and flagged so it stays with that character.
 */
class WordBuilder {
  chars: string[] = [];
  classes: CharClass[] = [];
  marks: boolean[] = [];

  get length(): number {
    return this.chars.length;
  }

  lastClass(): CharClass | undefined {
    return this.classes[this.classes.length - 1];
  }

  /**
   * Class of the base character before the last one
   */
  previousBaseClass(): CharClass | undefined {
    const last = this.baseIndexBefore(this.length);
    const before = this.baseIndexBefore(last);
    return before < 0 ? undefined : this.classes[before];
  }

  push(char: string, cls: CharClass, isMark: boolean = false): void {
    this.chars.push(char);
    this.classes.push(cls);
    this.marks.push(isMark);
  }

  /**
   * Split off the last base character and its marks into a new builder
   */
  splitLastBase(): WordBuilder {
    const start = Math.max(this.baseIndexBefore(this.length), 0);
    const tail = new WordBuilder();
    tail.chars = this.chars.splice(start);
    tail.classes = this.classes.splice(start);
    tail.marks = this.marks.splice(start);
    return tail;
  }

  private baseIndexBefore(end: number): number {
    let index = end - 1;
    while (index >= 0 && this.marks[index]) {
      index--;
    }
    return index;
  }

  toString(): string {
    return this.chars.join('');
  }
}

/**
 * Reusable tokenizer bound to one validated config
 */
export class Tokenizer {
  readonly config: TokenizerConfig;
  private readonly separators: ReadonlySet<string>;

  constructor(options?: TokenizerOptions) {
    this.config = createTokenizerConfig(options);
    this.separators = new Set(this.config.separators);
  }

  tokenize(input: string): WordSequence {
    const words: Word[] = [];
    let current = new WordBuilder();

    const flush = (): void => {
      if (current.length > 0) {
        words.push(current.toString());
      }
      current = new WordBuilder();
    };

    for (const char of input) {
      if (this.separators.has(char)) {
        flush();
        continue;
      }

      let cls = classify(char);
      const prev = current.lastClass();

      // combining marks belong to the character before them
      if (cls === 'mark') {
        if (prev !== undefined) {
          current.push(char, prev, true);
          continue;
        }
        cls = 'symbol';
      }

      if (cls === 'symbol' && this.config.dropSymbols) {
        continue;
      }

      if (prev !== undefined) {
        if (prev === 'lower' && cls === 'upper') {
          flush();
        } else if (this.config.splitOnDigits && this.isDigitBoundary(prev, cls)) {
          flush();
        } else if (prev === 'upper' && cls === 'lower' && current.previousBaseClass() === 'upper') {
          const tail = current.splitLastBase();
          flush();
          current = tail;
        }
      }

      current.push(char, cls);
    }

    flush();
    return Object.freeze(words);
  }

  private isDigitBoundary(prev: CharClass, next: CharClass): boolean {
    return (isLetter(prev) && next === 'digit') || (prev === 'digit' && isLetter(next));
  }
}

const defaultTokenizer = new Tokenizer();

/**
 * Split an identifier into words. Never throws for any input string;
 * invalid options raise InvalidOptionsError.
 */
export function tokenize(input: string, options?: TokenizerOptions): WordSequence {
  const tokenizer = options === undefined ? defaultTokenizer : new Tokenizer(options);
  return tokenizer.tokenize(input);
}
