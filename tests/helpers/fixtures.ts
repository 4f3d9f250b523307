/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';

import type { ExportDecl, FileRecord, ImportDecl, Language, SourceSpan } from '../../src/types/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(...parts: string[]): string {
  return path.join(__dirname, '../fixtures', ...parts);
}

export interface TempProjectResult {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string) => string;
  getFilePath: (relativePath: string) => string;
}

/**
 * Create a temporary project directory with files
 */
export function createTempProject(files: Record<string, string> = {}): TempProjectResult {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'crossdoc-project-'));

  const addFile = (relativePath: string, content: string): string => {
    const filePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    addFile(relativePath, content);
  }

  const cleanup = () => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  };

  const getFilePath = (relativePath: string): string => path.join(rootDir, relativePath);

  return { rootDir, cleanup, addFile, getFilePath };
}

const SPAN: SourceSpan = { startLine: 1, startColumn: 1, endLine: 1, endColumn: 1 };

/**
 * Hand-built export declaration; `line` sets the span start
 */
export function exportDecl(name: string, overrides: Partial<ExportDecl> & { line?: number } = {}): ExportDecl {
  const { line, ...rest } = overrides;
  return {
    name,
    kind: 'function',
    signature: `function ${name}()`,
    doc: null,
    span: line ? { ...SPAN, startLine: line, endLine: line } : SPAN,
    ...rest,
  };
}

export function importDecl(specifier: string, names: string[] = [], typeOnly = false): ImportDecl {
  return { specifier, names, typeOnly, span: SPAN };
}

/**
 * Hand-built file record with status `ok`
 */
export function fileRecord(
  filePath: string,
  exports: ExportDecl[] = [],
  imports: ImportDecl[] = [],
  language: Language = 'typescript'
): FileRecord {
  return { path: filePath, language, exports, imports, status: { state: 'ok' } };
}
