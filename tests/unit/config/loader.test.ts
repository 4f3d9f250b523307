import { describe, it, expect, afterEach } from 'vitest';
import {
  loadConfig,
  parseConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
} from '../../../src/config/loader.js';
import { ConfigurationError } from '../../../src/errors.js';
import { createTempProject, getFixturePath, type TempProjectResult } from '../../helpers/fixtures.js';

describe('Config Loader', () => {
  describe('loadConfig', () => {
    it('should load and parse a valid config file', async () => {
      const config = await loadConfig(getFixturePath('configs', 'valid-config.json'));

      expect(config.include).toEqual(['src/**/*.ts', 'src/**/*.py']);
      expect(config.exclude).toEqual(['**/node_modules/**', '**/generated/**']);
      expect(config.resolution.moduleRoots).toEqual(['src']);
      expect(config.resolution.aliases).toEqual({ '@/*': ['src/*'] });
      expect(config.entryPoints).toEqual({ files: ['src/cli'], names: ['main', 'handler'] });
      expect(config.concurrency).toBe(8);
      expect(config.timeoutMs).toBe(60000);
    });

    it('should apply defaults for missing nested fields', async () => {
      const config = await loadConfig(getFixturePath('configs', 'valid-config.json'));

      expect(config.resolution.indexFiles).toEqual(['index', '__init__']);
      expect(config.resolution.extensions[0]).toBe('.ts');
      expect(config.tests.infixes).toContain('.test.');
      expect(config.parser.maxFileSize).toBe(1024 * 1024);
    });

    it('should apply defaults for an empty config', async () => {
      const config = await loadConfig(getFixturePath('configs', 'minimal-config.json'));

      expect(config).toEqual(getDefaultConfig());
    });

    it('should throw for non-existent config file', async () => {
      await expect(loadConfig('/non/existent/crossdoc.config.json')).rejects.toThrow('Config file not found');
    });

    it('should throw for invalid JSON', async () => {
      await expect(loadConfig(getFixturePath('configs', 'invalid-json.json'))).rejects.toThrow('Invalid JSON');
    });

    it('should list every offending field for schema violations', async () => {
      const error = await loadConfig(getFixturePath('configs', 'invalid-schema.json')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.message).toContain('Invalid configuration');
      expect(error.issues).toContain('include: Expected array, received string');
      expect(error.issues).toContain('resolution.extensions.0: extension must start with a dot');
      expect(error.issues).toContain('concurrency: Number must be greater than or equal to 1');
    });
  });

  describe('parseConfig', () => {
    it('should name the source in the error message', () => {
      expect(() => parseConfig({ concurrency: 'four' }, 'command-line options')).toThrow(
        'Invalid command-line options'
      );
    });

    it('should fill defaults around a partial section', () => {
      const config = parseConfig({ surface: { kinds: ['command'] } });

      expect(config.surface.kinds).toEqual(['command']);
    });
  });

  describe('getDefaultConfig', () => {
    it('should return the documented defaults', () => {
      const config = getDefaultConfig();

      expect(config.concurrency).toBe(4);
      expect(config.timeoutMs).toBeUndefined();
      expect(config.resolution.moduleRoots).toEqual(['.', 'src']);
      expect(config.entryPoints).toEqual({ files: [], names: ['main'] });
      expect(config.tests.directories).toEqual(['test', 'tests', '__tests__', 'spec']);
      expect(config.surface.kinds).toEqual(['function', 'class', 'interface', 'type', 'enum', 'constant', 'command']);
      expect(config.exclude).toContain('**/node_modules/**');
    });
  });

  describe('findConfig', () => {
    let project: TempProjectResult | null = null;

    afterEach(() => {
      project?.cleanup();
      project = null;
    });

    it('should find a config file in a parent directory', async () => {
      project = createTempProject({
        'crossdoc.config.json': JSON.stringify({ concurrency: 2 }),
        'packages/app/src/main.ts': 'export const x = 1;\n',
      });

      const config = await findConfig(project.getFilePath('packages/app/src'));

      expect(config?.concurrency).toBe(2);
    });

    it('should prefer crossdoc.config.json over .crossdocrc.json', async () => {
      project = createTempProject({
        'crossdoc.config.json': JSON.stringify({ concurrency: 2 }),
        '.crossdocrc.json': JSON.stringify({ concurrency: 3 }),
      });

      const config = await findConfig(project.rootDir);

      expect(config?.concurrency).toBe(2);
    });

    it('should read the crossdoc section of package.json', async () => {
      project = createTempProject({
        'package.json': JSON.stringify({ name: 'sample', crossdoc: { entryPoints: { files: ['src/cli'] } } }),
      });

      const config = await findConfig(project.rootDir);

      expect(config?.entryPoints.files).toEqual(['src/cli']);
    });

    it('should skip a package.json without a crossdoc section', async () => {
      project = createTempProject({
        'package.json': JSON.stringify({ name: 'outer', crossdoc: { concurrency: 6 } }),
        'inner/package.json': JSON.stringify({ name: 'inner' }),
      });

      const config = await findConfig(project.getFilePath('inner'));

      expect(config?.concurrency).toBe(6);
    });

    it('should surface validation errors of a found config', async () => {
      project = createTempProject({
        '.crossdocrc': JSON.stringify({ concurrency: 1000 }),
      });

      await expect(findConfig(project.rootDir)).rejects.toThrow(ConfigurationError);
    });
  });

  describe('loadConfigOrDefault', () => {
    it('should fall back to defaults when nothing is found', async () => {
      const project = createTempProject({ 'a.ts': 'export const a = 1;\n' });
      try {
        const config = await loadConfigOrDefault(project.rootDir);
        // a config above the temp directory would be picked up first
        expect(config.concurrency).toBeGreaterThanOrEqual(1);
      } finally {
        project.cleanup();
      }
    });
  });
});
