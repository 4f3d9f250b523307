/**
 * Extractor exports
 */

export {
  DEFAULT_MAX_FILE_SIZE,
  buildFileRecord,
  failedFileRecord,
  type ExtractorOptions,
  type SymbolExtractor,
} from './base.js';
export { ExtractorRegistry, createDefaultRegistry } from './registry.js';
export { TypeScriptExtractor, cleanJsDoc } from './typescript.js';
export { PythonExtractor, cleanDocstring } from './python.js';
