/**
 * Graph-level types shared by the builder, the queries and the renderers
 */

import type { Language, ModuleId, ParseReason, ParseStatus } from './symbols.js';

export interface ModuleNode {
  id: ModuleId;
  path: string;
  language: Language;
  isTest: boolean;
  status: ParseStatus['state'];
  /** Exported names, sorted */
  exports: string[];
}

export interface DependencyEdge {
  source: ModuleId;
  target: ModuleId;
  /** Union of imported names across every import of the pair, sorted */
  symbols: string[];
  /** At least one import between the pair took the whole module */
  wholeModule: boolean;
  /** Reached through a package-style specifier rather than a relative path */
  external: boolean;
}

export interface ModuleGraphData {
  nodes: ModuleNode[];
  edges: DependencyEdge[];
  /** External specifiers per importing module */
  externals: Record<ModuleId, string[]>;
  /** Unresolved specifiers per importing module */
  unresolved: Record<ModuleId, string[]>;
}

export type GapKind = 'dead-export' | 'untested-export' | 'undocumented-export';

export interface Gap {
  kind: GapKind;
  moduleId: ModuleId;
  exportName: string;
  path: string;
  line: number;
}

export interface GapReport {
  dead: Gap[];
  untested: Gap[];
  undocumented: Gap[];
}

/**
 * A relative specifier matched more than one candidate; `chosen` won the
 * fixed tie-break.
 */
export interface AmbiguityNotice {
  importer: string;
  specifier: string;
  chosen: string;
  rejected: string[];
}

export interface DegradedFile {
  path: string;
  state: 'partial' | 'failed';
  reason: ParseReason;
}
