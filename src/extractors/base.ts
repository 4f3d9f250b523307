/**
 * Symbol extractor contract and the record-building helpers every extractor
 * shares
 */

import type {
  ExportDecl,
  FileRecord,
  ImportDecl,
  Language,
  ParseFailureCode,
  ParseReason,
  ParseStatus,
} from '../types/index.js';

export interface ExtractorOptions {
  /** Bytes; files above the limit fail with FILE_TOO_LARGE. 0 disables the check. */
  maxFileSize?: number;
}

/**
 * One implementation per grammar. `extract` never rejects: malformed input
 * yields a `failed` or `partial` record instead.
 */
export interface SymbolExtractor {
  readonly name: string;
  /** Language tags this extractor is selected for */
  readonly languages: readonly Language[];
  extract(path: string, content: string, language: Language): Promise<FileRecord>;
}

export const DEFAULT_MAX_FILE_SIZE = 1024 * 1024;

export function reason(code: ParseFailureCode, message: string): ParseReason {
  return { code, message };
}

export function buildFileRecord(
  path: string,
  language: Language,
  exports: ExportDecl[],
  imports: ImportDecl[],
  status: ParseStatus = { state: 'ok' }
): FileRecord {
  return { path, language, exports, imports, status };
}

/**
 * A record with no symbols, used whenever a file cannot be extracted
 */
export function failedFileRecord(path: string, language: Language, failure: ParseReason): FileRecord {
  return buildFileRecord(path, language, [], [], { state: 'failed', reason: failure });
}

export function isFileTooLarge(content: string, maxFileSize: number | undefined): boolean {
  const limit = maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
  return limit > 0 && Buffer.byteLength(content, 'utf8') > limit;
}

export function fileTooLargeReason(content: string, maxFileSize: number | undefined): ParseReason {
  const size = Buffer.byteLength(content, 'utf8');
  return reason(
    'FILE_TOO_LARGE',
    `File size (${formatBytes(size)}) exceeds limit (${formatBytes(maxFileSize ?? DEFAULT_MAX_FILE_SIZE)})`
  );
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Collapse runs of whitespace so multi-line headers fit on one line
 */
export function normalizeSignature(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Exports are unique by name within a file; the first declaration wins
 * (overload signatures and declaration merging repeat names).
 */
export function dedupeExports(exports: ExportDecl[]): ExportDecl[] {
  const seen = new Set<string>();
  return exports.filter(exp => {
    if (seen.has(exp.name)) return false;
    seen.add(exp.name);
    return true;
  });
}
