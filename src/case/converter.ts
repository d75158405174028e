/**
 * Case conversion entry points
 */

import { render, type RenderOptions } from './renderer.js';
import { CaseStyle, type CaseStyleType } from './style.js';
import { tokenize, type TokenizerOptions, type WordSequence } from './tokenizer.js';

/**
 * Convert an identifier to the target case style
 */
export function convert(input: string, target: CaseStyleType, options?: TokenizerOptions): string {
  return render(tokenize(input, options), target, renderOptionsFor(options));
}

/**
 * Digits are attached on render only when re-tokenizing splits them off again
 */
function renderOptionsFor(options?: TokenizerOptions): RenderOptions {
  return { attachDigits: options?.splitOnDigits ?? true };
}

/**
 * Tokenizes once and renders the same words under any style
 *
 * @example
 * ```ts
 * const converter = CaseConverter.from('brew_coffee');
 * converter.toCamelCase(); // 'brewCoffee'
 * converter.to('train'); // 'Brew-Coffee'
 * ```
 */
export class CaseConverter {
  readonly words: WordSequence;
  private readonly renderOptions: RenderOptions;

  private constructor(words: WordSequence, renderOptions: RenderOptions) {
    this.words = words;
    this.renderOptions = renderOptions;
  }

  static from(input: string, options?: TokenizerOptions): CaseConverter {
    return new CaseConverter(tokenize(input, options), renderOptionsFor(options));
  }

  to(style: CaseStyleType): string {
    return render(this.words, style, this.renderOptions);
  }

  toSnakeCase(): string {
    return this.to(CaseStyle.SNAKE);
  }

  toKebabCase(): string {
    return this.to(CaseStyle.KEBAB);
  }

  toCamelCase(): string {
    return this.to(CaseStyle.CAMEL);
  }

  toPascalCase(): string {
    return this.to(CaseStyle.PASCAL);
  }

  toScreamingSnakeCase(): string {
    return this.to(CaseStyle.SCREAMING_SNAKE);
  }

  toTrainCase(): string {
    return this.to(CaseStyle.TRAIN);
  }

  toFlatCase(): string {
    return this.to(CaseStyle.FLAT);
  }

  toDotCase(): string {
    return this.to(CaseStyle.DOT);
  }

  toTitleCase(): string {
    return this.to(CaseStyle.TITLE);
  }

  toLowerCase(): string {
    return this.to(CaseStyle.LOWER);
  }

  toUpperCase(): string {
    return this.to(CaseStyle.UPPER);
  }
}

/** `brew_coffee` */
export const snakeCase = (input: string, options?: TokenizerOptions): string =>
  convert(input, CaseStyle.SNAKE, options);

/** `brew-coffee` */
export const kebabCase = (input: string, options?: TokenizerOptions): string =>
  convert(input, CaseStyle.KEBAB, options);

/** `brewCoffee` */
export const camelCase = (input: string, options?: TokenizerOptions): string =>
  convert(input, CaseStyle.CAMEL, options);

/** `BrewCoffee` */
export const pascalCase = (input: string, options?: TokenizerOptions): string =>
  convert(input, CaseStyle.PASCAL, options);

/** `BREW_COFFEE` */
export const screamingSnakeCase = (input: string, options?: TokenizerOptions): string =>
  convert(input, CaseStyle.SCREAMING_SNAKE, options);

/** `Brew-Coffee` */
export const trainCase = (input: string, options?: TokenizerOptions): string =>
  convert(input, CaseStyle.TRAIN, options);

/** `brewcoffee` */
export const flatCase = (input: string, options?: TokenizerOptions): string =>
  convert(input, CaseStyle.FLAT, options);

/** `brew.coffee` */
export const dotCase = (input: string, options?: TokenizerOptions): string =>
  convert(input, CaseStyle.DOT, options);

/** `Brew Coffee` */
export const titleCase = (input: string, options?: TokenizerOptions): string =>
  convert(input, CaseStyle.TITLE, options);

/** `brew coffee` */
export const lowerCase = (input: string, options?: TokenizerOptions): string =>
  convert(input, CaseStyle.LOWER, options);

/** `BREW COFFEE` */
export const upperCase = (input: string, options?: TokenizerOptions): string =>
  convert(input, CaseStyle.UPPER, options);
