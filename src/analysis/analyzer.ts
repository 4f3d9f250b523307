/**
 * Analysis run orchestration: discovery, bounded-parallel extraction, then
 * resolution, graph building and the cross-reference queries on the joined
 * results
 */

import fs from 'node:fs';
import path from 'node:path';

import type {
  AmbiguityNotice,
  DegradedFile,
  FileRecord,
  GapReport,
  Language,
  ModuleId,
  ResolvedImport,
} from '../types/index.js';
import { getDefaultConfig, type Config } from '../config/index.js';
import { discoverFiles, type DiscoveredFile } from '../discovery/walker.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import { failedFileRecord, reason } from '../extractors/base.js';
import { createDefaultRegistry, type ExtractorRegistry } from '../extractors/registry.js';
import { silentLogger, type Logger } from '../logger.js';
import { sortBy } from '../utils/ordering.js';
import {
  createEntryPointPredicate,
  createSurfacePredicate,
  createTestFileClassifier,
  type EntryPointPredicate,
  type SurfacePredicate,
  type TestFileClassifier,
} from './classifiers.js';
import { findCycles, findGaps, listExternalDependencies } from './cross-reference.js';
import type { ExportIndex } from './export-index.js';
import { buildModuleGraph, type ModuleGraph } from './graph-builder.js';
import { ModuleResolver } from './module-resolver.js';
import { createRunSignal, runPool } from './pool.js';

export interface AnalyzerOptions {
  config?: Config;
  logger?: Logger;
  /** Defaults to a registry with the built-in extractors */
  registry?: ExtractorRegistry;
  isTestFile?: TestFileClassifier;
  isEntryPoint?: EntryPointPredicate;
  isSurface?: SurfacePredicate;
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
}

/**
 * A file supplied in memory rather than discovered on disk
 */
export interface SourceFileInput {
  path: string;
  language: Language;
  content: string;
}

export interface AnalysisStats {
  totalFiles: number;
  okFiles: number;
  partialFiles: number;
  failedFiles: number;
  modules: number;
  edges: number;
  exports: number;
  durationMs: number;
}

export interface AnalysisResult {
  root: string;
  /** Sorted by path */
  files: FileRecord[];
  /** Resolved imports per file path */
  imports: Record<string, ResolvedImport[]>;
  graph: ModuleGraph;
  index: ExportIndex;
  gaps: GapReport;
  cycles: ModuleId[][];
  externalDependencies: string[];
  degraded: DegradedFile[];
  ambiguities: AmbiguityNotice[];
  stats: AnalysisStats;
}

export class Analyzer {
  private config: Config;
  private logger: Logger;
  private registry: ExtractorRegistry | null;
  private isTestFile: TestFileClassifier;
  private isEntryPoint: EntryPointPredicate;
  private isSurface: SurfacePredicate;

  constructor(options: AnalyzerOptions = {}) {
    this.config = options.config ?? getDefaultConfig();
    this.logger = options.logger ?? silentLogger;
    this.registry = options.registry ?? null;
    this.isTestFile = options.isTestFile ?? createTestFileClassifier(this.config.tests);
    this.isEntryPoint = options.isEntryPoint ?? createEntryPointPredicate(this.config.entryPoints);
    this.isSurface = options.isSurface ?? createSurfacePredicate(this.config.surface);
  }

  private async getRegistry(): Promise<ExtractorRegistry> {
    if (!this.registry) {
      this.registry = await createDefaultRegistry({ maxFileSize: this.config.parser.maxFileSize });
    }
    return this.registry;
  }

  /**
   * Discover, extract and cross-reference every file under `rootDir`
   */
  async analyzeDirectory(rootDir: string, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    const startTime = Date.now();
    const root = path.resolve(rootDir);
    const signal = createRunSignal(options.signal, this.config.timeoutMs);

    const discovered = await discoverFiles(root, {
      include: this.config.include,
      exclude: this.config.exclude,
    });
    this.logger.info(`Found ${discovered.length} files in ${root}`);

    const registry = await this.getRegistry();
    const records = await runPool(discovered, file => this.readAndExtract(registry, file), {
      concurrency: this.config.concurrency,
      signal,
      onProgress: (completed, total) => this.logger.debug(`Extracted ${completed}/${total}`),
    });

    return this.assemble(root, records, startTime);
  }

  /**
   * Cross-reference files supplied in memory; paths are root-relative
   */
  async analyzeSources(
    rootDir: string,
    sources: SourceFileInput[],
    options: AnalyzeOptions = {}
  ): Promise<AnalysisResult> {
    const startTime = Date.now();
    const signal = createRunSignal(options.signal, this.config.timeoutMs);

    if (sources.length === 0) {
      throw new ConfigurationError('No source files to analyze');
    }
    const duplicate = this.findDuplicatePath(sources);
    if (duplicate) {
      throw new ConfigurationError(`Duplicate source path: ${duplicate}`);
    }

    const registry = await this.getRegistry();
    const records = await runPool(
      sources,
      source => registry.extract(source.path, source.content, source.language),
      { concurrency: this.config.concurrency, signal }
    );

    return this.assemble(path.resolve(rootDir), records, startTime);
  }

  private findDuplicatePath(sources: SourceFileInput[]): string | null {
    const seen = new Set<string>();
    for (const source of sources) {
      if (seen.has(source.path)) return source.path;
      seen.add(source.path);
    }
    return null;
  }

  private async readAndExtract(registry: ExtractorRegistry, file: DiscoveredFile): Promise<FileRecord> {
    let content: string;
    try {
      content = await fs.promises.readFile(file.absolutePath, 'utf-8');
    } catch (error) {
      return failedFileRecord(file.path, file.language, reason('READ_ERROR', errorMessage(error)));
    }
    return registry.extract(file.path, content, file.language);
  }

  /**
   * Single-threaded merge of the joined extraction results
   */
  private assemble(root: string, extracted: FileRecord[], startTime: number): AnalysisResult {
    const files = sortBy(extracted, f => f.path);
    const degraded: DegradedFile[] = [];

    for (const file of files) {
      if (file.status.state === 'ok') continue;
      degraded.push({ path: file.path, state: file.status.state, reason: file.status.reason });
      this.logger.warn(`${file.path}: ${file.status.state} (${file.status.reason.message})`);
    }

    const resolver = new ModuleResolver(
      files.map(f => f.path),
      this.config.resolution
    );
    const { graph, index, imports, ambiguities } = buildModuleGraph({
      files,
      resolver,
      isTestFile: this.isTestFile,
    });

    for (const notice of ambiguities) {
      this.logger.debug(
        `${notice.importer}: '${notice.specifier}' resolved to ${notice.chosen} over ${notice.rejected.join(', ')}`
      );
    }
    for (const [moduleId, specifiers] of Object.entries(graph.unresolved)) {
      this.logger.debug(`${moduleId}: unresolved ${specifiers.join(', ')}`);
    }

    const gaps = findGaps(graph, index, {
      isEntryPoint: this.isEntryPoint,
      isSurface: this.isSurface,
    });

    const durationMs = Date.now() - startTime;
    const stats: AnalysisStats = {
      totalFiles: files.length,
      okFiles: files.length - degraded.length,
      partialFiles: degraded.filter(d => d.state === 'partial').length,
      failedFiles: degraded.filter(d => d.state === 'failed').length,
      modules: graph.nodes.length,
      edges: graph.edges.length,
      exports: index.size,
      durationMs,
    };
    this.logger.info(`Analyzed ${stats.totalFiles} files in ${durationMs}ms`);

    return {
      root,
      files,
      imports,
      graph,
      index,
      gaps,
      cycles: findCycles(graph),
      externalDependencies: listExternalDependencies(graph),
      degraded,
      ambiguities,
      stats,
    };
  }
}

/**
 * Analyze a directory with a one-off analyzer
 */
export async function analyze(
  rootDir: string,
  options: AnalyzerOptions & AnalyzeOptions = {}
): Promise<AnalysisResult> {
  const { signal, ...analyzerOptions } = options;
  return new Analyzer(analyzerOptions).analyzeDirectory(rootDir, { signal });
}
