/**
 * Import specifier resolution against the discovered path set.
 *
 * Resolution is approximate: no module loader runs and no file system is
 * touched. The probe order and tie-breaks below are the contract.
 */

import path from 'node:path';

import type { AmbiguityNotice, ImportDecl, Language, ModuleId, ResolutionResult } from '../types/index.js';
import type { ResolutionConfig } from '../config/index.js';
import { compareStrings, sortBy } from '../utils/ordering.js';

/**
 * Node.js built-in modules
 */
const NODE_BUILTINS = new Set([
  'assert', 'async_hooks', 'buffer', 'child_process', 'cluster', 'console',
  'constants', 'crypto', 'dgram', 'diagnostics_channel', 'dns', 'domain',
  'events', 'fs', 'http', 'http2', 'https', 'inspector', 'module', 'net',
  'os', 'path', 'perf_hooks', 'process', 'punycode', 'querystring', 'readline',
  'repl', 'stream', 'string_decoder', 'sys', 'timers', 'tls', 'trace_events',
  'tty', 'url', 'util', 'v8', 'vm', 'wasi', 'worker_threads', 'zlib',
]);

/** Sources a `.js`-family specifier may be compiled from */
const COMPILED_FROM: Record<string, string[]> = {
  '.js': ['.ts', '.tsx'],
  '.jsx': ['.tsx'],
  '.mjs': ['.mts'],
  '.cjs': ['.cts'],
};

export interface ResolveOutcome {
  result: ResolutionResult;
  /** Resolved through a package-style specifier rather than a relative path */
  packageStyle: boolean;
  ambiguity: AmbiguityNotice | null;
}

export interface ImportOutcome {
  decl: ImportDecl;
  outcome: ResolveOutcome;
}

/**
 * Check if a specifier names a Node.js built-in
 */
export function isBuiltinModule(specifier: string): boolean {
  if (specifier.startsWith('node:')) return true;
  return NODE_BUILTINS.has(specifier.split('/')[0] ?? specifier);
}

/**
 * Extract package name from an import specifier
 */
export function extractPackageName(specifier: string, language: Language): string {
  if (specifier.startsWith('node:')) {
    return specifier.slice('node:'.length).split('/')[0] ?? specifier;
  }
  if (language === 'python') {
    return specifier.split('.')[0] ?? specifier;
  }
  // Handle scoped packages (@org/package)
  if (specifier.startsWith('@')) {
    return specifier.split('/').slice(0, 2).join('/');
  }
  return specifier.split('/')[0] ?? specifier;
}

function splitExtension(filePath: string, extensions: readonly string[]): { base: string; ext: string } {
  const ext = path.posix.extname(filePath);
  return extensions.includes(ext) ? { base: filePath.slice(0, -ext.length), ext } : { base: filePath, ext: '' };
}

/**
 * Assign a module id to every path. Index files collapse to their directory;
 * when two paths claim one id an exact file beats an index file, then the
 * earlier configured extension wins, and each loser keeps its full path.
 */
export function computeModuleIds(
  paths: Iterable<string>,
  config: Pick<ResolutionConfig, 'extensions' | 'indexFiles'>
): Map<string, ModuleId> {
  interface Claim {
    path: string;
    id: ModuleId;
    isIndex: boolean;
    extRank: number;
  }

  const claims = new Map<ModuleId, Claim[]>();

  for (const filePath of paths) {
    const { base, ext } = splitExtension(filePath, config.extensions);
    const isIndex = config.indexFiles.includes(path.posix.basename(base));
    const id = isIndex ? path.posix.dirname(base) : base;
    const extRank = ext ? config.extensions.indexOf(ext) : config.extensions.length;

    const group = claims.get(id) ?? [];
    group.push({ path: filePath, id, isIndex, extRank });
    claims.set(id, group);
  }

  const ids = new Map<string, ModuleId>();
  for (const group of claims.values()) {
    group.sort(
      (a, b) =>
        Number(a.isIndex) - Number(b.isIndex) || a.extRank - b.extRank || compareStrings(a.path, b.path)
    );
    group.forEach((claim, i) => ids.set(claim.path, i === 0 ? claim.id : claim.path));
  }

  return ids;
}

/**
 * Convert a tsconfig path pattern to regex
 */
function patternToRegex(pattern: string): RegExp {
  const escaped = pattern.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const withWildcard = escaped.replace('\\*', '(.*)');
  return new RegExp(`^${withWildcard}$`);
}

interface ProbeResult {
  match: string;
  rejected: string[];
}

export class ModuleResolver {
  private files: Set<string>;
  private idByPath: Map<string, ModuleId>;
  private config: ResolutionConfig;
  private aliases: Array<{ regex: RegExp; targets: string[] }>;

  constructor(paths: Iterable<string>, config: ResolutionConfig) {
    this.files = new Set(paths);
    this.config = config;
    this.idByPath = computeModuleIds(this.files, config);
    // Longest pattern first, as tsconfig picks the most specific alias
    this.aliases = sortBy(Object.entries(config.aliases), ([pattern]) => pattern)
      .sort(([a], [b]) => b.length - a.length)
      .map(([pattern, targets]) => ({ regex: patternToRegex(pattern), targets }));
  }

  moduleIdOf(filePath: string): ModuleId | undefined {
    return this.idByPath.get(filePath);
  }

  /**
   * All (path, module id) pairs sorted by path
   */
  moduleIds(): Array<[string, ModuleId]> {
    return sortBy(this.idByPath.entries(), ([filePath]) => filePath);
  }

  resolve(specifier: string, importerPath: string, language: Language): ResolveOutcome {
    const importerDir = path.posix.dirname(importerPath);

    if (language === 'python' && specifier.startsWith('.')) {
      return this.resolveLocal(this.pythonRelativeBase(specifier, importerDir), specifier, importerPath);
    }

    if (this.isRelative(specifier)) {
      return this.resolveLocal(path.posix.join(importerDir, specifier), specifier, importerPath);
    }

    if (specifier.startsWith('/')) {
      return this.resolveLocal(specifier.slice(1) || '.', specifier, importerPath);
    }

    return this.resolvePackageStyle(specifier, importerPath, language);
  }

  /**
   * Resolve one import declaration. A Python `from x import n` takes each
   * name that is a module under x as a whole-module import of that
   * submodule; names left over stay on the import of x, which is dropped
   * when none remain.
   */
  resolveImport(decl: ImportDecl, importerPath: string, language: Language): ImportOutcome[] {
    if (language !== 'python' || decl.names.length === 0) {
      return [{ decl, outcome: this.resolve(decl.specifier, importerPath, language) }];
    }

    const submodules: ImportOutcome[] = [];
    const remaining: string[] = [];

    for (const name of decl.names) {
      const specifier = decl.specifier.endsWith('.') ? decl.specifier + name : `${decl.specifier}.${name}`;
      const outcome = this.resolve(specifier, importerPath, language);
      if (outcome.result.kind === 'resolved') {
        submodules.push({ decl: { ...decl, specifier, names: [] }, outcome });
      } else {
        remaining.push(name);
      }
    }

    if (remaining.length === 0) return submodules;
    if (submodules.length === 0) {
      return [{ decl, outcome: this.resolve(decl.specifier, importerPath, language) }];
    }
    const base = { ...decl, names: remaining };
    return [{ decl: base, outcome: this.resolve(decl.specifier, importerPath, language) }, ...submodules];
  }

  private isRelative(specifier: string): boolean {
    return specifier === '.' || specifier === '..' || specifier.startsWith('./') || specifier.startsWith('../');
  }

  /**
   * `..models.user` from `pkg/sub/x.py` → `pkg/models/user`
   */
  private pythonRelativeBase(specifier: string, importerDir: string): string {
    const dots = /^\.+/.exec(specifier)?.[0].length ?? 0;
    const rest = specifier.slice(dots).split('.').filter(Boolean).join('/');
    const parents = Array.from({ length: dots - 1 }, () => '..');
    return path.posix.join(importerDir, ...parents, rest);
  }

  private resolveLocal(rawBase: string, specifier: string, importerPath: string): ResolveOutcome {
    const base = path.posix.normalize(rawBase).replace(/\/+$/, '') || '.';
    if (base === '..' || base.startsWith('../')) {
      return { result: { kind: 'unresolved', specifier }, packageStyle: false, ambiguity: null };
    }

    const probe = this.probe(base);
    if (!probe) {
      return { result: { kind: 'unresolved', specifier }, packageStyle: false, ambiguity: null };
    }

    return {
      result: this.resolvedTo(probe.match),
      packageStyle: false,
      ambiguity:
        probe.rejected.length > 0
          ? { importer: importerPath, specifier, chosen: probe.match, rejected: probe.rejected }
          : null,
    };
  }

  private resolvePackageStyle(specifier: string, importerPath: string, language: Language): ResolveOutcome {
    const external: ResolveOutcome = {
      result: { kind: 'external', specifier },
      packageStyle: true,
      ambiguity: null,
    };

    if (language !== 'python' && isBuiltinModule(specifier)) {
      return external;
    }

    const candidates: string[] = [];

    for (const alias of this.aliases) {
      const match = alias.regex.exec(specifier);
      if (!match) continue;
      const captured = match[1] ?? '';
      for (const target of alias.targets) {
        candidates.push(target.replace('*', captured));
      }
    }

    const modulePath = language === 'python' ? specifier.split('.').join('/') : specifier;
    for (const root of this.config.moduleRoots) {
      candidates.push(path.posix.join(root, modulePath));
    }

    for (const candidate of candidates) {
      const base = path.posix.normalize(candidate).replace(/\/+$/, '') || '.';
      if (base === '..' || base.startsWith('../')) continue;

      const probe = this.probe(base);
      if (probe) {
        return {
          result: this.resolvedTo(probe.match),
          packageStyle: true,
          ambiguity:
            probe.rejected.length > 0
              ? { importer: importerPath, specifier, chosen: probe.match, rejected: probe.rejected }
              : null,
        };
      }
    }

    return external;
  }

  /**
   * Probe order: exact path, path + each extension, the TypeScript source
   * of a `.js`-family path, then directory index + each extension. A file
   * match beats an index match; the index candidate is reported as rejected.
   */
  private probe(base: string): ProbeResult | null {
    const fileMatch = this.probeFile(base);
    const indexMatch = this.probeIndex(base);

    if (fileMatch) {
      return { match: fileMatch, rejected: indexMatch ? [indexMatch] : [] };
    }
    return indexMatch ? { match: indexMatch, rejected: [] } : null;
  }

  private probeFile(base: string): string | null {
    if (this.files.has(base)) return base;

    for (const ext of this.config.extensions) {
      if (this.files.has(base + ext)) return base + ext;
    }

    const ext = path.posix.extname(base);
    const sources = COMPILED_FROM[ext];
    if (sources) {
      const stem = base.slice(0, -ext.length);
      for (const sourceExt of sources) {
        if (this.files.has(stem + sourceExt)) return stem + sourceExt;
      }
    }

    return null;
  }

  private probeIndex(base: string): string | null {
    for (const indexFile of this.config.indexFiles) {
      for (const ext of this.config.extensions) {
        const candidate = path.posix.join(base, indexFile + ext);
        if (this.files.has(candidate)) return candidate;
      }
    }
    return null;
  }

  private resolvedTo(filePath: string): ResolutionResult {
    const target = this.idByPath.get(filePath) ?? filePath;
    return { kind: 'resolved', target };
  }
}
