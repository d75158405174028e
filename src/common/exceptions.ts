/**
 * wordcase exception classes
 */

import type { ZodIssue } from 'zod';
import { Codes } from '../types/codes.js';

/**
 * Base wordcase exception
 */
export class WordcaseException extends Error {
  protected _code: Codes | null = null;

  constructor(message: string, code?: Codes) {
    super(message);
    this.name = 'WordcaseException';
    this._code = code ?? null;
  }

  get code(): Codes | null {
    return this._code;
  }
}

/**
 * A case style name that does not resolve to any known style
 */
export class InvalidCaseStyleError extends WordcaseException {
  readonly styleName: string;

  constructor(styleName: string, message?: string) {
    super(message ?? `Unknown case style: '${styleName}'`, Codes.INVALID_CASE_STYLE);
    this.name = 'InvalidCaseStyleError';
    this.styleName = styleName;
  }
}

/**
 * Options object rejected by its schema
 */
export class InvalidOptionsError extends WordcaseException {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, Codes.INVALID_OPTIONS);
    this.name = 'InvalidOptionsError';
    this.issues = issues;
  }

  /**
   * Build from zod issues, prefixing each with its path
   */
  static fromIssues(what: string, issues: ZodIssue[]): InvalidOptionsError {
    const lines = issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return new InvalidOptionsError(`Invalid ${what}: ${lines.join('; ')}`, lines);
  }
}
