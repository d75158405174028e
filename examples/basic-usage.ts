/**
 * Basic usage example
 *
 * Converts a few identifiers between case styles and formats some paths
 */

import {
  CASE_STYLES,
  CaseConverter,
  InvalidCaseStyleError,
  convert,
  convertKeys,
  formatPath,
  joinPath,
  parseCaseStyle,
  tokenize,
} from '../src/index.js';

function caseExample(): void {
  console.log('=== Case conversion ===\n');

  const identifier = 'HTTPServerError';
  console.log(`Words of ${identifier}: ${tokenize(identifier).join(', ')}`);

  for (const style of CASE_STYLES) {
    console.log(`  ${style.padEnd(16)} ${convert(identifier, style)}`);
  }

  const converter = CaseConverter.from('v2_release');
  console.log(`\nv2_release as constant: ${converter.toScreamingSnakeCase()}`);

  for (const name of ['Train-Case', 'constant', 'sponge']) {
    try {
      console.log(`'${name}' resolves to ${parseCaseStyle(name)}`);
    } catch (error) {
      if (error instanceof InvalidCaseStyleError) {
        console.log(`'${error.styleName}' is not a case style`);
      } else {
        throw error;
      }
    }
  }

  const payload = { user_id: 7, display_name: 'Ada', roles: [{ role_name: 'admin' }] };
  console.log('\nKeys in camel case:', JSON.stringify(convertKeys(payload, 'camel')));
}

function pathExample(): void {
  console.log('\n=== Path formatting ===\n');

  const paths = ['C:\\Users\\\\test', './home/file.txt', '/srv/app/releases/../current/'];
  for (const path of paths) {
    console.log(`  ${JSON.stringify(path)} -> ${JSON.stringify(formatPath(path))}`);
  }

  console.log(`  joined: ${joinPath('workspace', 'src\\lib', '../index.ts')}`);
}

caseExample();
pathExample();
