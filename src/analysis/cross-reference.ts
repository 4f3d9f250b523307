/**
 * Cross-reference queries over a finished module graph.
 *
 * An export (M, N) is referenced by an edge E when E.target is M and E
 * either names N or takes the whole module. Every query is a pure function
 * of its inputs and returns results sorted by (module id, export name).
 */

import type { DependencyEdge, Gap, GapKind, GapReport, ModuleId } from '../types/index.js';
import { sortBy, sortStrings } from '../utils/ordering.js';
import type { ExportEntry, ExportIndex } from './export-index.js';
import type { ModuleGraph } from './graph-builder.js';
import { extractPackageName } from './module-resolver.js';
import type { EntryPointPredicate, SurfacePredicate } from './classifiers.js';

export function edgeReferences(edge: DependencyEdge, name: string): boolean {
  return edge.wholeModule || edge.symbols.includes(name);
}

/**
 * Edges referencing one export, sorted by source module
 */
export function referencingEdges(graph: ModuleGraph, moduleId: ModuleId, name: string): DependencyEdge[] {
  return graph.incoming(moduleId).filter(edge => edgeReferences(edge, name));
}

function toGap(kind: GapKind, entry: ExportEntry): Gap {
  return {
    kind,
    moduleId: entry.moduleId,
    exportName: entry.decl.name,
    path: entry.path,
    line: entry.decl.span.startLine,
  };
}

function sortGaps(gaps: Gap[]): Gap[] {
  return sortBy(gaps, g => g.moduleId, g => g.exportName);
}

/**
 * Exports no edge references, entry points excepted. Edges from test
 * modules count as references.
 */
export function findDeadExports(
  graph: ModuleGraph,
  index: ExportIndex,
  isEntryPoint: EntryPointPredicate
): Gap[] {
  const gaps: Gap[] = [];

  for (const entry of index.entries()) {
    if (isEntryPoint(entry.moduleId, entry.path, entry.decl.name)) continue;
    if (referencingEdges(graph, entry.moduleId, entry.decl.name).length > 0) continue;
    gaps.push(toGap('dead-export', entry));
  }

  return sortGaps(gaps);
}

/**
 * Exports no test module references. Import reachability from tests is a
 * proxy for coverage; nothing is executed. Exports of test modules are not
 * checked.
 */
export function findUntestedExports(graph: ModuleGraph, index: ExportIndex): Gap[] {
  const gaps: Gap[] = [];

  for (const entry of index.entries()) {
    if (graph.node(entry.moduleId)?.isTest) continue;

    const tested = referencingEdges(graph, entry.moduleId, entry.decl.name).some(
      edge => graph.node(edge.source)?.isTest === true
    );
    if (!tested) gaps.push(toGap('untested-export', entry));
  }

  return sortGaps(gaps);
}

/**
 * Surface exports without doc text
 */
export function findUndocumentedExports(index: ExportIndex, isSurface: SurfacePredicate): Gap[] {
  const gaps: Gap[] = [];

  for (const entry of index.entries()) {
    if (!isSurface(entry.decl)) continue;
    if (entry.decl.doc !== null && entry.decl.doc.trim().length > 0) continue;
    gaps.push(toGap('undocumented-export', entry));
  }

  return sortGaps(gaps);
}

export interface GapQueryOptions {
  isEntryPoint: EntryPointPredicate;
  isSurface: SurfacePredicate;
}

export function findGaps(graph: ModuleGraph, index: ExportIndex, options: GapQueryOptions): GapReport {
  return {
    dead: findDeadExports(graph, index, options.isEntryPoint),
    untested: findUntestedExports(graph, index),
    undocumented: findUndocumentedExports(index, options.isSurface),
  };
}

/**
 * Strongly connected components with more than one module (Tarjan). Members
 * are sorted; components are sorted by their first member.
 */
export function findCycles(graph: ModuleGraph): ModuleId[][] {
  const nodes = graph.nodes.map(n => n.id);
  const indexByNode = new Map<ModuleId, number>();
  nodes.forEach((n, i) => indexByNode.set(n, i));

  const outEdges: number[][] = nodes.map(id =>
    graph
      .outgoing(id)
      .map(edge => indexByNode.get(edge.target))
      .filter((i): i is number => i !== undefined)
  );

  let indexCounter = 0;
  const order = new Array<number>(nodes.length).fill(-1);
  const lowlink = new Array<number>(nodes.length).fill(-1);
  const onStack = new Array<boolean>(nodes.length).fill(false);
  const stack: number[] = [];
  const components: number[][] = [];

  function strongConnect(v: number): void {
    order[v] = indexCounter;
    lowlink[v] = indexCounter;
    indexCounter++;
    stack.push(v);
    onStack[v] = true;

    for (const w of outEdges[v] ?? []) {
      if (order[w] === -1) {
        strongConnect(w);
        lowlink[v] = Math.min(lowlink[v] ?? 0, lowlink[w] ?? 0);
      } else if (onStack[w]) {
        lowlink[v] = Math.min(lowlink[v] ?? 0, order[w] ?? 0);
      }
    }

    if (lowlink[v] === order[v]) {
      const component: number[] = [];
      let w: number | undefined;
      do {
        w = stack.pop();
        if (w === undefined) break;
        onStack[w] = false;
        component.push(w);
      } while (w !== v);
      if (component.length > 1) {
        components.push(component);
      }
    }
  }

  for (let v = 0; v < nodes.length; v++) {
    if (order[v] === -1) strongConnect(v);
  }

  const cycles = components.map(component => sortStrings(component.map(i => nodes[i] ?? '')));
  return sortBy(cycles, cycle => cycle[0] ?? '');
}

/**
 * Package names of every external import in the graph, built-ins included
 * under their bare name
 */
export function listExternalDependencies(graph: ModuleGraph): string[] {
  const packages = new Set<string>();

  for (const [moduleId, specifiers] of Object.entries(graph.externals)) {
    const language = graph.node(moduleId)?.language ?? 'typescript';
    for (const specifier of specifiers) {
      packages.add(extractPackageName(specifier, language));
    }
  }

  return sortStrings(packages);
}
