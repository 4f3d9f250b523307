/**
 * File discovery: globs the analysis root and tags each file with a language
 */

import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';

import type { Language } from '../types/index.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import { sortBy } from '../utils/ordering.js';

export interface DiscoveredFile {
  /** Root-relative path with `/` separators */
  path: string;
  absolutePath: string;
  language: Language;
}

export interface DiscoveryOptions {
  include: string[];
  exclude: string[];
}

const LANGUAGE_BY_EXTENSION: Record<string, Language> = {
  ts: 'typescript',
  tsx: 'typescript',
  mts: 'typescript',
  cts: 'typescript',
  js: 'javascript',
  jsx: 'javascript',
  mjs: 'javascript',
  cjs: 'javascript',
  py: 'python',
  pyi: 'python',
};

/**
 * Detect the language of a file from its extension
 */
export function detectLanguage(filePath: string): Language | null {
  const match = /\.([^./\\]+)$/.exec(filePath);
  if (!match?.[1]) return null;
  return LANGUAGE_BY_EXTENSION[match[1].toLowerCase()] ?? null;
}

export function toPosixPath(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

/**
 * Discover analyzable files under `rootDir`, sorted by path
 */
export async function discoverFiles(rootDir: string, options: DiscoveryOptions): Promise<DiscoveredFile[]> {
  const absoluteRoot = path.resolve(rootDir);

  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(absoluteRoot);
  } catch (error) {
    throw new ConfigurationError(`Cannot read source tree ${absoluteRoot}: ${errorMessage(error)}`, [], {
      cause: error,
    });
  }
  if (!stat.isDirectory()) {
    throw new ConfigurationError(`Source tree root is not a directory: ${absoluteRoot}`);
  }

  const entries = await fg(options.include, {
    cwd: absoluteRoot,
    ignore: options.exclude,
    onlyFiles: true,
    dot: false,
    followSymbolicLinks: false,
  });

  const files: DiscoveredFile[] = [];
  for (const entry of entries) {
    const relativePath = toPosixPath(entry);
    const language = detectLanguage(relativePath);
    if (!language) continue;

    files.push({
      path: relativePath,
      absolutePath: path.join(absoluteRoot, relativePath),
      language,
    });
  }

  if (files.length === 0) {
    throw new ConfigurationError(`No source files found under ${absoluteRoot}`);
  }

  return sortBy(files, f => f.path);
}

