import { describe, it, expect } from 'vitest';
import { ExportIndex } from '../../../src/analysis/export-index.js';
import { exportDecl } from '../../helpers/fixtures.js';

describe('ExportIndex', () => {
  const index = new ExportIndex([
    { moduleId: 'src/b', path: 'src/b.ts', decl: exportDecl('render') },
    { moduleId: 'src/a', path: 'src/a.ts', decl: exportDecl('zeta') },
    { moduleId: 'src/a', path: 'src/a.ts', decl: exportDecl('render', { kind: 'class' }) },
    { moduleId: 'src/a', path: 'src/a.ts', decl: exportDecl('render', { kind: 'variable' }) },
  ]);

  it('should sort entries by module id then name', () => {
    expect(index.entries().map(e => `${e.moduleId}:${e.decl.name}`)).toEqual([
      'src/a:render',
      'src/a:zeta',
      'src/b:render',
    ]);
  });

  it('should keep the first entry for a repeated name', () => {
    expect(index.size).toBe(3);
    expect(index.get('src/a', 'render')?.decl.kind).toBe('class');
  });

  it('should look up a name across modules', () => {
    expect(index.lookup('render').map(e => e.moduleId)).toEqual(['src/a', 'src/b']);
    expect(index.lookup('missing')).toEqual([]);
  });

  it('should answer membership queries', () => {
    expect(index.has('src/b', 'render')).toBe(true);
    expect(index.has('src/b', 'zeta')).toBe(false);
    expect(index.get('src/c', 'render')).toBeUndefined();
  });

  it('should list the exports of one module', () => {
    expect(index.exportsOf('src/a').map(e => e.decl.name)).toEqual(['render', 'zeta']);
    expect(index.exportsOf('src/c')).toEqual([]);
  });

  it('should not expose its internal arrays', () => {
    index.entries().pop();
    index.lookup('render').pop();

    expect(index.entries()).toHaveLength(3);
    expect(index.lookup('render')).toHaveLength(2);
  });
});
