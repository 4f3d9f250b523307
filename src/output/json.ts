/**
 * JSON report shaping. Everything is plain data sorted by stable keys so two
 * runs over the same tree produce identical files.
 */

import fs from 'node:fs';
import path from 'node:path';

import type {
  AmbiguityNotice,
  DegradedFile,
  DependencyEdge,
  ExportDecl,
  GapReport,
  ModuleId,
  ResolutionResult,
} from '../types/index.js';
import type { AnalysisResult } from '../analysis/analyzer.js';
import { sortBy } from '../utils/ordering.js';

export const REPORT_VERSION = 1;

export interface ReportImport {
  specifier: string;
  names: string[];
  typeOnly: boolean;
  line: number;
  resolution: ResolutionResult;
}

export interface ReportModule {
  id: ModuleId;
  path: string;
  language: string;
  isTest: boolean;
  status: string;
  exports: Array<Omit<ExportDecl, 'span'> & { line: number }>;
  imports: ReportImport[];
}

export interface JsonReport {
  version: number;
  root: string;
  modules: ReportModule[];
  edges: DependencyEdge[];
  externalDependencies: string[];
  unresolved: Record<ModuleId, string[]>;
  gaps: GapReport;
  cycles: ModuleId[][];
  degraded: DegradedFile[];
  ambiguities: AmbiguityNotice[];
  statistics: {
    files: number;
    modules: number;
    edges: number;
    exports: number;
    deadExports: number;
    untestedExports: number;
    undocumentedExports: number;
    partialFiles: number;
    failedFiles: number;
  };
}

export function buildJsonReport(result: AnalysisResult): JsonReport {
  const modules: ReportModule[] = result.graph.nodes.map(node => ({
    id: node.id,
    path: node.path,
    language: node.language,
    isTest: node.isTest,
    status: node.status,
    exports: result.index.exportsOf(node.id).map(({ decl }) => ({
      name: decl.name,
      kind: decl.kind,
      signature: decl.signature,
      doc: decl.doc,
      line: decl.span.startLine,
    })),
    imports: (result.imports[node.path] ?? []).map(imp => ({
      specifier: imp.specifier,
      names: imp.names,
      typeOnly: imp.typeOnly,
      line: imp.span.startLine,
      resolution: imp.resolution,
    })),
  }));

  const unresolved: Record<ModuleId, string[]> = {};
  for (const [moduleId, specifiers] of sortBy(Object.entries(result.graph.unresolved), ([id]) => id)) {
    unresolved[moduleId] = specifiers;
  }

  return {
    version: REPORT_VERSION,
    root: result.root,
    modules,
    edges: result.graph.edges,
    externalDependencies: result.externalDependencies,
    unresolved,
    gaps: result.gaps,
    cycles: result.cycles,
    degraded: result.degraded,
    ambiguities: result.ambiguities,
    statistics: {
      files: result.stats.totalFiles,
      modules: result.stats.modules,
      edges: result.stats.edges,
      exports: result.stats.exports,
      deadExports: result.gaps.dead.length,
      untestedExports: result.gaps.untested.length,
      undocumentedExports: result.gaps.undocumented.length,
      partialFiles: result.stats.partialFiles,
      failedFiles: result.stats.failedFiles,
    },
  };
}

export function formatJsonReport(result: AnalysisResult): string {
  return JSON.stringify(buildJsonReport(result), null, 2) + '\n';
}

export async function writeJsonReport(result: AnalysisResult, filePath: string): Promise<string> {
  const absolutePath = path.resolve(filePath);
  await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });
  await fs.promises.writeFile(absolutePath, formatJsonReport(result));
  return absolutePath;
}
