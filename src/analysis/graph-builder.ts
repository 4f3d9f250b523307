/**
 * Module graph construction: one node per file, one edge per importing pair
 */

import type {
  AmbiguityNotice,
  DependencyEdge,
  FileRecord,
  ModuleGraphData,
  ModuleId,
  ModuleNode,
  ResolvedImport,
} from '../types/index.js';
import { compareStrings, sortBy, sortStrings } from '../utils/ordering.js';
import { ExportIndex, type ExportEntry } from './export-index.js';
import type { ModuleResolver } from './module-resolver.js';
import type { TestFileClassifier } from './classifiers.js';

/**
 * Read-only dependency graph with adjacency lookups
 */
export class ModuleGraph implements ModuleGraphData {
  readonly nodes: ModuleNode[];
  readonly edges: DependencyEdge[];
  readonly externals: Record<ModuleId, string[]>;
  readonly unresolved: Record<ModuleId, string[]>;

  private readonly nodesById = new Map<ModuleId, ModuleNode>();
  private readonly outgoingById = new Map<ModuleId, DependencyEdge[]>();
  private readonly incomingById = new Map<ModuleId, DependencyEdge[]>();

  constructor(data: ModuleGraphData) {
    this.nodes = sortBy(data.nodes, n => n.id);
    this.edges = sortBy(data.edges, e => e.source, e => e.target);
    this.externals = data.externals;
    this.unresolved = data.unresolved;

    for (const node of this.nodes) {
      this.nodesById.set(node.id, node);
    }
    for (const edge of this.edges) {
      this.outgoingById.set(edge.source, [...(this.outgoingById.get(edge.source) ?? []), edge]);
      this.incomingById.set(edge.target, [...(this.incomingById.get(edge.target) ?? []), edge]);
    }
  }

  node(id: ModuleId): ModuleNode | undefined {
    return this.nodesById.get(id);
  }

  /**
   * Edges leaving `id`, sorted by target
   */
  outgoing(id: ModuleId): DependencyEdge[] {
    return this.outgoingById.get(id) ?? [];
  }

  /**
   * Edges entering `id`, sorted by source
   */
  incoming(id: ModuleId): DependencyEdge[] {
    return this.incomingById.get(id) ?? [];
  }

  toJSON(): ModuleGraphData {
    return {
      nodes: this.nodes,
      edges: this.edges,
      externals: this.externals,
      unresolved: this.unresolved,
    };
  }
}

export interface ResolvedImports {
  /** Resolved imports per file path, in source order; a Python from-import may expand to several */
  imports: Record<string, ResolvedImport[]>;
  /** Sorted by importer then specifier */
  ambiguities: AmbiguityNotice[];
  /** Module pairs linked through a package-style specifier */
  packageStyle: Set<string>;
}

function pairKey(source: ModuleId, target: ModuleId): string {
  return `${source}\u0000${target}`;
}

/**
 * Resolve every import of every file. Depends only on the record set, never
 * on the order records were produced in.
 */
export function resolveImports(files: FileRecord[], resolver: ModuleResolver): ResolvedImports {
  const imports: Record<string, ResolvedImport[]> = {};
  const ambiguities: AmbiguityNotice[] = [];
  const packageStyle = new Set<string>();

  for (const file of sortBy(files, f => f.path)) {
    const source = resolver.moduleIdOf(file.path) ?? file.path;

    imports[file.path] = file.imports.flatMap(original =>
      resolver.resolveImport(original, file.path, file.language).map(({ decl, outcome }) => {
        if (outcome.ambiguity) ambiguities.push(outcome.ambiguity);
        if (outcome.result.kind === 'resolved' && outcome.packageStyle) {
          packageStyle.add(pairKey(source, outcome.result.target));
        }
        return { ...decl, resolution: outcome.result };
      })
    );
  }

  return {
    imports,
    ambiguities: sortBy(ambiguities, a => a.importer, a => a.specifier),
    packageStyle,
  };
}

export interface GraphBuildOptions {
  files: FileRecord[];
  resolver: ModuleResolver;
  isTestFile: TestFileClassifier;
}

export interface GraphBuildResult {
  graph: ModuleGraph;
  index: ExportIndex;
  imports: Record<string, ResolvedImport[]>;
  ambiguities: AmbiguityNotice[];
}

interface EdgeAccumulator {
  source: ModuleId;
  target: ModuleId;
  symbols: Set<string>;
  wholeModule: boolean;
  external: boolean;
}

/**
 * Fold file records into the module graph and the export index
 */
export function buildModuleGraph(options: GraphBuildOptions): GraphBuildResult {
  const { files, resolver, isTestFile } = options;
  const resolved = resolveImports(files, resolver);

  const nodes: ModuleNode[] = [];
  const entries: ExportEntry[] = [];
  const edges = new Map<string, EdgeAccumulator>();
  const externals: Record<ModuleId, string[]> = {};
  const unresolved: Record<ModuleId, string[]> = {};

  for (const file of sortBy(files, f => f.path)) {
    const id = resolver.moduleIdOf(file.path) ?? file.path;

    nodes.push({
      id,
      path: file.path,
      language: file.language,
      isTest: isTestFile(file.path),
      status: file.status.state,
      exports: sortStrings(new Set(file.exports.map(e => e.name))),
    });

    for (const decl of file.exports) {
      entries.push({ moduleId: id, path: file.path, decl });
    }

    const fileExternals = new Set<string>();
    const fileUnresolved = new Set<string>();

    for (const imp of resolved.imports[file.path] ?? []) {
      const resolution = imp.resolution;
      if (resolution.kind === 'external') {
        fileExternals.add(resolution.specifier);
        continue;
      }
      if (resolution.kind === 'unresolved') {
        fileUnresolved.add(resolution.specifier);
        continue;
      }
      if (resolution.target === id) continue; // no self-edges

      const key = pairKey(id, resolution.target);
      const edge = edges.get(key) ?? {
        source: id,
        target: resolution.target,
        symbols: new Set<string>(),
        wholeModule: false,
        external: resolved.packageStyle.has(key),
      };
      for (const name of imp.names) edge.symbols.add(name);
      edge.wholeModule ||= imp.names.length === 0;
      edges.set(key, edge);
    }

    if (fileExternals.size > 0) externals[id] = sortStrings(fileExternals);
    if (fileUnresolved.size > 0) unresolved[id] = sortStrings(fileUnresolved);
  }

  const graph = new ModuleGraph({
    nodes,
    edges: [...edges.values()].map(edge => ({
      source: edge.source,
      target: edge.target,
      symbols: [...edge.symbols].sort(compareStrings),
      wholeModule: edge.wholeModule,
      external: edge.external,
    })),
    externals,
    unresolved,
  });

  return {
    graph,
    index: new ExportIndex(entries),
    imports: resolved.imports,
    ambiguities: resolved.ambiguities,
  };
}
