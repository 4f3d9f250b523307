/**
 * Read-only lookup of export declarations, built once per run by the graph
 * builder
 */

import type { ExportDecl, ModuleId } from '../types/index.js';
import { sortBy } from '../utils/ordering.js';

export interface ExportEntry {
  moduleId: ModuleId;
  path: string;
  decl: ExportDecl;
}

export class ExportIndex {
  private readonly sorted: ExportEntry[];
  private readonly byModule = new Map<ModuleId, Map<string, ExportEntry>>();
  private readonly byName = new Map<string, ExportEntry[]>();

  constructor(entries: Iterable<ExportEntry>) {
    this.sorted = [];

    // Names are unique per module; a repeated name keeps its first entry.
    for (const entry of sortBy(entries, e => e.moduleId, e => e.decl.name)) {
      const moduleExports = this.byModule.get(entry.moduleId) ?? new Map<string, ExportEntry>();
      if (moduleExports.has(entry.decl.name)) continue;

      this.sorted.push(entry);
      moduleExports.set(entry.decl.name, entry);
      this.byModule.set(entry.moduleId, moduleExports);

      const named = this.byName.get(entry.decl.name) ?? [];
      named.push(entry);
      this.byName.set(entry.decl.name, named);
    }
  }

  get size(): number {
    return this.sorted.length;
  }

  get(moduleId: ModuleId, name: string): ExportEntry | undefined {
    return this.byModule.get(moduleId)?.get(name);
  }

  has(moduleId: ModuleId, name: string): boolean {
    return this.get(moduleId, name) !== undefined;
  }

  /**
   * Every module exporting `name`, sorted by module id
   */
  lookup(name: string): ExportEntry[] {
    return [...(this.byName.get(name) ?? [])];
  }

  /**
   * Exports of one module, sorted by name
   */
  exportsOf(moduleId: ModuleId): ExportEntry[] {
    return [...(this.byModule.get(moduleId)?.values() ?? [])];
  }

  /**
   * All entries sorted by (module id, name)
   */
  entries(): ExportEntry[] {
    return [...this.sorted];
  }
}
