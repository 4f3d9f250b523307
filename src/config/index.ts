/**
 * Config module exports
 */

export {
  configSchema,
  resolutionConfigSchema,
  testsConfigSchema,
  entryPointsConfigSchema,
  surfaceConfigSchema,
  parserConfigSchema,
  DEFAULT_EXTENSIONS,
  type Config,
  type ConfigInput,
  type ResolutionConfig,
  type TestsConfig,
  type EntryPointsConfig,
  type SurfaceConfig,
  type ParserConfig,
} from './schema.js';

export {
  loadConfig,
  parseConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  CONFIG_FILE_NAMES,
  PACKAGE_CONFIG_KEY,
} from './loader.js';
