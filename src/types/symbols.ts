/**
 * Per-file symbol types produced by the extractors
 */

export type Language = 'typescript' | 'javascript' | 'python';

/**
 * Export kinds are an open enumeration: extractors may report kinds that are
 * not listed here and downstream consumers must pass them through.
 */
export type KnownExportKind =
  | 'function'
  | 'class'
  | 'interface'
  | 'type'
  | 'enum'
  | 'constant'
  | 'variable'
  | 'namespace'
  | 'command'
  | 're-export';

export type ExportKind = KnownExportKind | (string & {});

export interface SourceSpan {
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
}

export interface ExportDecl {
  name: string;
  kind: ExportKind;
  /** Declaration header as written in the source */
  signature: string;
  /** Doc comment text with comment delimiters removed */
  doc: string | null;
  span: SourceSpan;
}

export interface ImportDecl {
  /** Specifier exactly as written, e.g. `./util`, `node:fs`, `..models` */
  specifier: string;
  /** Exported names taken from the target; empty means the whole module */
  names: string[];
  typeOnly: boolean;
  span: SourceSpan;
}

export type ParseFailureCode =
  | 'PARSE_ERROR'
  | 'FILE_TOO_LARGE'
  | 'READ_ERROR'
  | 'UNSUPPORTED_LANGUAGE'
  | 'EXTRACTOR_ERROR';

export interface ParseReason {
  code: ParseFailureCode;
  message: string;
}

export type ParseStatus =
  | { state: 'ok' }
  | { state: 'partial'; reason: ParseReason }
  | { state: 'failed'; reason: ParseReason };

export interface FileRecord {
  /** Root-relative path with `/` separators; unique within a run */
  path: string;
  language: Language;
  exports: ExportDecl[];
  imports: ImportDecl[];
  status: ParseStatus;
}

export type ModuleId = string;

export type ResolutionResult =
  | { kind: 'resolved'; target: ModuleId }
  | { kind: 'external'; specifier: string }
  | { kind: 'unresolved'; specifier: string };

export interface ResolvedImport extends ImportDecl {
  resolution: ResolutionResult;
}
