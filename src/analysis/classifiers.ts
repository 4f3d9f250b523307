/**
 * Pluggable classification rules: test files, entry points and the public
 * surface. Library callers may pass their own predicates instead.
 */

import path from 'node:path';

import type { ExportDecl, ModuleId } from '../types/index.js';
import type { EntryPointsConfig, SurfaceConfig, TestsConfig } from '../config/index.js';

export type TestFileClassifier = (filePath: string) => boolean;
export type EntryPointPredicate = (moduleId: ModuleId, filePath: string, exportName: string) => boolean;
export type SurfacePredicate = (decl: ExportDecl) => boolean;

/**
 * A path is a test when any directory segment is a test directory, or the
 * file name carries a test infix or prefix (`a.test.ts`, `test_a.py`).
 */
export function createTestFileClassifier(config: TestsConfig): TestFileClassifier {
  const directories = new Set(config.directories);

  return filePath => {
    const segments = filePath.split('/');
    const fileName = segments.pop() ?? '';

    if (segments.some(segment => directories.has(segment))) return true;
    if (config.infixes.some(infix => fileName.includes(infix))) return true;
    return config.prefixes.some(prefix => fileName.startsWith(prefix));
  };
}

function normalizeEntry(entry: string): string {
  const normalized = path.posix.normalize(entry.replace(/\\/g, '/')).replace(/\/+$/, '');
  return normalized || '.';
}

export function createEntryPointPredicate(config: EntryPointsConfig): EntryPointPredicate {
  const files = new Set(config.files.map(normalizeEntry));
  const names = new Set(config.names);

  return (moduleId, filePath, exportName) =>
    names.has(exportName) || files.has(moduleId) || files.has(filePath);
}

export function createSurfacePredicate(config: SurfaceConfig): SurfacePredicate {
  const kinds = new Set<string>(config.kinds);
  return decl => kinds.has(decl.kind);
}
