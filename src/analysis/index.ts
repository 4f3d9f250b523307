/**
 * Analysis exports
 */

export {
  Analyzer,
  analyze,
  type AnalyzerOptions,
  type AnalyzeOptions,
  type AnalysisResult,
  type AnalysisStats,
  type SourceFileInput,
} from './analyzer.js';
export {
  ModuleResolver,
  computeModuleIds,
  isBuiltinModule,
  extractPackageName,
  type ResolveOutcome,
  type ImportOutcome,
} from './module-resolver.js';
export {
  ModuleGraph,
  buildModuleGraph,
  resolveImports,
  type GraphBuildOptions,
  type GraphBuildResult,
  type ResolvedImports,
} from './graph-builder.js';
export { ExportIndex, type ExportEntry } from './export-index.js';
export {
  edgeReferences,
  referencingEdges,
  findDeadExports,
  findUntestedExports,
  findUndocumentedExports,
  findGaps,
  findCycles,
  listExternalDependencies,
  type GapQueryOptions,
} from './cross-reference.js';
export {
  createTestFileClassifier,
  createEntryPointPredicate,
  createSurfacePredicate,
  type TestFileClassifier,
  type EntryPointPredicate,
  type SurfacePredicate,
} from './classifiers.js';
export { runPool, createRunSignal, cancellationFrom, throwIfCancelled, type PoolOptions } from './pool.js';
