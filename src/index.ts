/**
 * crossdoc - static cross-reference analysis of source trees
 *
 * Extracts exports and imports per file, resolves imports to modules,
 * builds the module dependency graph and reports dead, untested and
 * undocumented exports.
 */

// Types
export * from './types/index.js';

// Errors and logging
export { CrossdocError, ConfigurationError, CancellationError, errorMessage, type CrossdocErrorCode } from './errors.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './logger.js';

// Extractors
export {
  ExtractorRegistry,
  TypeScriptExtractor,
  PythonExtractor,
  createDefaultRegistry,
  type ExtractorOptions,
  type SymbolExtractor,
} from './extractors/index.js';

// Discovery
export { discoverFiles, detectLanguage, type DiscoveredFile, type DiscoveryOptions } from './discovery/walker.js';

// Analysis
export * from './analysis/index.js';

// Output
export { buildJsonReport, formatJsonReport, writeJsonReport, type JsonReport } from './output/index.js';

// Config
export {
  configSchema,
  loadConfig,
  parseConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  type Config,
  type ConfigInput,
} from './config/index.js';
