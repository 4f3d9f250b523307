/**
 * Extractor registry: selects the extractor for a language tag
 */

import type { FileRecord, Language } from '../types/index.js';
import { errorMessage } from '../errors.js';
import { failedFileRecord, reason, type ExtractorOptions, type SymbolExtractor } from './base.js';

export class ExtractorRegistry {
  private extractors: Map<Language, SymbolExtractor> = new Map();

  /**
   * Register an extractor for every language it declares; later
   * registrations replace earlier ones
   */
  register(extractor: SymbolExtractor): void {
    for (const language of extractor.languages) {
      this.extractors.set(language, extractor);
    }
  }

  get(language: Language): SymbolExtractor | undefined {
    return this.extractors.get(language);
  }

  has(language: Language): boolean {
    return this.extractors.has(language);
  }

  getLanguages(): Language[] {
    return Array.from(this.extractors.keys()).sort();
  }

  /**
   * Extract one file. Never rejects: a missing extractor or an extractor
   * that throws produces a failed record.
   */
  async extract(path: string, content: string, language: Language): Promise<FileRecord> {
    const extractor = this.extractors.get(language);
    if (!extractor) {
      return failedFileRecord(
        path,
        language,
        reason('UNSUPPORTED_LANGUAGE', `No extractor registered for ${language}`)
      );
    }

    try {
      return await extractor.extract(path, content, language);
    } catch (error) {
      return failedFileRecord(
        path,
        language,
        reason('EXTRACTOR_ERROR', `${extractor.name}: ${errorMessage(error)}`)
      );
    }
  }
}

/**
 * Create a registry with the built-in extractors
 */
export async function createDefaultRegistry(options: ExtractorOptions = {}): Promise<ExtractorRegistry> {
  const registry = new ExtractorRegistry();

  // Grammars load lazily; the Python binding is a native module.
  const [{ TypeScriptExtractor }, { PythonExtractor }] = await Promise.all([
    import('./typescript.js'),
    import('./python.js'),
  ]);

  registry.register(new TypeScriptExtractor(options));
  registry.register(new PythonExtractor(options));

  return registry;
}
