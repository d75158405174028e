/**
 * Tests for the word renderer
 */

import { capitalize, render } from './renderer.js';
import { CASE_STYLES, CaseStyle, type CaseStyleType } from './style.js';

describe('capitalize', () => {
  test('should uppercase the first letter and lowercase the rest', () => {
    expect(capitalize('hELLO')).toBe('Hello');
  });

  test('should pass a leading digit through', () => {
    expect(capitalize('2ND')).toBe('2nd');
  });

  test('should handle empty words', () => {
    expect(capitalize('')).toBe('');
  });
});

describe('render', () => {
  const words = ['HTTP', 'Server', 'error'];

  const cases: Array<[CaseStyleType, string]> = [
    [CaseStyle.SNAKE, 'http_server_error'],
    [CaseStyle.SCREAMING_SNAKE, 'HTTP_SERVER_ERROR'],
    [CaseStyle.KEBAB, 'http-server-error'],
    [CaseStyle.CAMEL, 'httpServerError'],
    [CaseStyle.PASCAL, 'HttpServerError'],
    [CaseStyle.TRAIN, 'Http-Server-Error'],
    [CaseStyle.FLAT, 'httpservererror'],
    [CaseStyle.DOT, 'http.server.error'],
    [CaseStyle.TITLE, 'Http Server Error'],
    [CaseStyle.LOWER, 'http server error'],
    [CaseStyle.UPPER, 'HTTP SERVER ERROR'],
  ];

  test.each(cases)('should render %s', (style, expected) => {
    expect(render(words, style)).toBe(expected);
  });

  test('should render empty sequence as empty string for every style', () => {
    for (const style of CASE_STYLES) {
      expect(render([], style)).toBe('');
    }
  });

  test('should attach digits to a preceding letter word', () => {
    expect(render(['v', '2', 'release'], CaseStyle.SCREAMING_SNAKE)).toBe('V2_RELEASE');
    expect(render(['Http', '2', 'Server'], CaseStyle.SNAKE)).toBe('http2_server');
    expect(render(['v', '2', 'release'], CaseStyle.TRAIN)).toBe('V2-Release');
  });

  test('should attach digits after a letter ending in a combining mark', () => {
    expect(render(['e\u0301', '2'], CaseStyle.SNAKE)).toBe('e\u03012');
  });

  test('should keep separators before digits when not attaching', () => {
    expect(render(['v', '2', 'release'], CaseStyle.SNAKE, { attachDigits: false })).toBe('v_2_release');
    expect(render(['page', '2'], CaseStyle.TRAIN, { attachDigits: false })).toBe('Page-2');
  });

  test('should keep separators between digit words and before letters', () => {
    expect(render(['1', '2'], CaseStyle.SNAKE)).toBe('1_2');
    expect(render(['2', 'fa'], CaseStyle.KEBAB)).toBe('2-fa');
  });

  test('should lowercase only the first camel word', () => {
    expect(render(['USER', 'ID'], CaseStyle.CAMEL)).toBe('userId');
  });
});
