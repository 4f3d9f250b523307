import { describe, it, expect, beforeAll } from 'vitest';
import { TypeScriptExtractor, cleanJsDoc } from '../../../src/extractors/typescript.js';
import type { FileRecord } from '../../../src/types/index.js';

const SAMPLE = `import fs from 'node:fs';
import { join, resolve as resolvePath } from 'node:path';
import * as util from './util.js';
import type { Config } from './config.js';
import './side-effect.js';

/**
 * Greets a person.
 * @param name - who to greet
 */
export function greet(name: string): string {
  return \`Hello, \${name}\`;
}

export class UserService extends Base implements Service {
  run(): void {}
}

export interface Options {
  verbose: boolean;
}

export type UserId = string;

export enum Color {
  Red,
  Green,
}

/** Maximum retries */
export const MAX_RETRIES = 3;

export let counter = 0;

export const handler = async (event: Event): Promise<void> => {
  await handle(event);
};

export const buildCommand = new Command('build')
  .description('Build the project')
  .action(() => {});

function helper() {}
const internal = 1;
export { helper as publicHelper, internal };

export default function main() {}

export { a, b as c } from './reexported.js';
export * from './barrel.js';
export * as ns from './namespace.js';

const lazy = import('./lazy.js');
const legacy = require('./legacy');
`;

describe('TypeScriptExtractor', () => {
  let extractor: TypeScriptExtractor;
  let record: FileRecord;

  beforeAll(async () => {
    extractor = new TypeScriptExtractor();
    record = await extractor.extract('src/sample.ts', SAMPLE, 'typescript');
  });

  function exported(name: string) {
    return record.exports.find(e => e.name === name);
  }

  it('should declare the TypeScript and JavaScript languages', () => {
    expect(extractor.languages).toEqual(['typescript', 'javascript']);
  });

  it('should parse a well-formed file with status ok', () => {
    expect(record.status).toEqual({ state: 'ok' });
    expect(record.path).toBe('src/sample.ts');
    expect(record.language).toBe('typescript');
  });

  describe('exports', () => {
    it('should list exports in declaration order', () => {
      expect(record.exports.map(e => e.name)).toEqual([
        'greet',
        'UserService',
        'Options',
        'UserId',
        'Color',
        'MAX_RETRIES',
        'counter',
        'handler',
        'buildCommand',
        'publicHelper',
        'internal',
        'default',
        'a',
        'c',
        'ns',
      ]);
    });

    it('should classify declaration kinds', () => {
      expect(exported('greet')?.kind).toBe('function');
      expect(exported('UserService')?.kind).toBe('class');
      expect(exported('Options')?.kind).toBe('interface');
      expect(exported('UserId')?.kind).toBe('type');
      expect(exported('Color')?.kind).toBe('enum');
      expect(exported('MAX_RETRIES')?.kind).toBe('constant');
      expect(exported('counter')?.kind).toBe('variable');
      expect(exported('handler')?.kind).toBe('function');
    });

    it('should detect commander commands', () => {
      expect(exported('buildCommand')?.kind).toBe('command');
    });

    it('should capture JSDoc text without delimiters', () => {
      expect(exported('greet')?.doc).toBe('Greets a person.\n@param name - who to greet');
      expect(exported('MAX_RETRIES')?.doc).toBe('Maximum retries');
      expect(exported('UserService')?.doc).toBeNull();
    });

    it('should capture declaration headers as signatures', () => {
      expect(exported('greet')?.signature).toBe('export function greet(name: string): string');
      expect(exported('UserService')?.signature).toBe('export class UserService extends Base implements Service');
      expect(exported('Options')?.signature).toBe('export interface Options');
      expect(exported('UserId')?.signature).toBe('export type UserId = string');
      expect(exported('Color')?.signature).toBe('export enum Color');
      expect(exported('handler')?.signature).toBe('const handler = async (event: Event): Promise<void> =>');
    });

    it('should report the local declaration behind an export list', () => {
      expect(exported('publicHelper')).toMatchObject({ kind: 'function', signature: 'function helper()' });
      expect(exported('internal')).toMatchObject({ kind: 'constant', signature: 'const internal' });
    });

    it('should name default exports "default"', () => {
      expect(exported('default')).toMatchObject({
        kind: 'function',
        signature: 'export default function main()',
      });
      expect(exported('main')).toBeUndefined();
    });

    it('should report re-exports and namespace re-exports', () => {
      expect(exported('a')?.kind).toBe('re-export');
      expect(exported('c')?.kind).toBe('re-export');
      expect(exported('b')).toBeUndefined();
      expect(exported('ns')?.kind).toBe('namespace');
    });

    it('should record the span start line', () => {
      expect(exported('greet')?.span.startLine).toBe(11);
      expect(exported('MAX_RETRIES')?.span.startLine).toBe(31);
    });
  });

  describe('imports', () => {
    it('should extract imports in source order', () => {
      expect(record.imports.map(i => i.specifier)).toEqual([
        'node:fs',
        'node:path',
        './util.js',
        './config.js',
        './side-effect.js',
        './reexported.js',
        './barrel.js',
        './namespace.js',
        './lazy.js',
        './legacy',
      ]);
    });

    it('should record imported export names', () => {
      const byModule = Object.fromEntries(record.imports.map(i => [i.specifier, i.names]));

      expect(byModule['node:fs']).toEqual(['default']);
      expect(byModule['node:path']).toEqual(['join', 'resolve']);
      expect(byModule['./reexported.js']).toEqual(['a', 'b']);
    });

    it('should treat namespace, side-effect, star and call imports as whole-module', () => {
      const wholeModule = record.imports.filter(i => i.names.length === 0).map(i => i.specifier);

      expect(wholeModule).toEqual([
        './util.js',
        './side-effect.js',
        './barrel.js',
        './namespace.js',
        './lazy.js',
        './legacy',
      ]);
    });

    it('should flag type-only imports', () => {
      expect(record.imports.filter(i => i.typeOnly).map(i => i.specifier)).toEqual(['./config.js']);
    });
  });

  describe('degraded input', () => {
    it('should keep recovered symbols and mark syntax errors partial', async () => {
      const result = await extractor.extract(
        'src/broken.ts',
        'export function fine(): number {\n  return 1;\n}\n\nexport function broken(a: string {\n',
        'typescript'
      );

      expect(result.status.state).toBe('partial');
      if (result.status.state !== 'partial') return;
      expect(result.status.reason.code).toBe('PARSE_ERROR');
      expect(result.exports.map(e => e.name)).toContain('fine');
    });

    it('should fail files above the size limit', async () => {
      const small = new TypeScriptExtractor({ maxFileSize: 16 });
      const result = await small.extract('src/big.ts', 'export const value = "0123456789";\n', 'typescript');

      expect(result.status.state).toBe('failed');
      if (result.status.state !== 'failed') return;
      expect(result.status.reason.code).toBe('FILE_TOO_LARGE');
      expect(result.exports).toEqual([]);
      expect(result.imports).toEqual([]);
    });

    it('should report no symbols for an empty file', async () => {
      const result = await extractor.extract('src/empty.ts', '', 'typescript');

      expect(result).toEqual({
        path: 'src/empty.ts',
        language: 'typescript',
        exports: [],
        imports: [],
        status: { state: 'ok' },
      });
    });
  });

  describe('JavaScript', () => {
    it('should extract ES module JavaScript', async () => {
      const result = await extractor.extract(
        'lib/math.js',
        "import { helper } from './helper.js';\n\nexport function add(a, b) {\n  return helper(a) + b;\n}\n",
        'javascript'
      );

      expect(result.language).toBe('javascript');
      expect(result.exports.map(e => [e.name, e.kind])).toEqual([['add', 'function']]);
      expect(result.imports.map(i => [i.specifier, i.names])).toEqual([['./helper.js', ['helper']]]);
    });

    it('should extract CommonJS requires as whole-module imports', async () => {
      const result = await extractor.extract('lib/cjs.js', "const path = require('path');\n", 'javascript');

      expect(result.imports.map(i => [i.specifier, i.names])).toEqual([['path', []]]);
    });
  });

  it('should not list a declaration exported only through an export assignment', async () => {
    const assigned = await extractor.extract('src/legacy.ts', 'function foo() {}\nexport = foo;\n', 'typescript');
    const defaulted = await extractor.extract(
      'src/widget.ts',
      'class Widget {}\nexport default Widget;\n',
      'typescript'
    );

    expect(assigned.exports.map(e => e.name)).toEqual(['default']);
    expect(defaulted.exports.map(e => e.name)).toEqual(['default']);
  });

  it('should not leak state between files with the same path', async () => {
    await extractor.extract('src/same.ts', 'export const first = 1;\n', 'typescript');
    const second = await extractor.extract('src/same.ts', 'export const second = 2;\n', 'typescript');

    expect(second.exports.map(e => e.name)).toEqual(['second']);
  });
});

describe('cleanJsDoc', () => {
  it('should strip a single-line block', () => {
    expect(cleanJsDoc('/** Short summary */')).toBe('Short summary');
  });

  it('should strip leading asterisks on every line', () => {
    expect(cleanJsDoc('/**\n * First line\n *\n * Second paragraph\n */')).toBe('First line\n\nSecond paragraph');
  });

  it('should return an empty string for an empty block', () => {
    expect(cleanJsDoc('/** */')).toBe('');
  });
});
