/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const DEFAULT_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs', '.py', '.pyi'];

export const parserConfigSchema = z.object({
  maxFileSize: z.number().int().nonnegative().default(1024 * 1024), // 0 = unlimited
});

export const resolutionConfigSchema = z.object({
  extensions: z
    .array(z.string().regex(/^\.[\w.-]+$/, 'extension must start with a dot'))
    .min(1)
    .default(DEFAULT_EXTENSIONS),
  indexFiles: z.array(z.string().min(1)).min(1).default(['index', '__init__']),
  moduleRoots: z.array(z.string()).default(['.', 'src']),
  aliases: z.record(z.string(), z.array(z.string())).default({}),
});

export const testsConfigSchema = z.object({
  directories: z.array(z.string()).default(['test', 'tests', '__tests__', 'spec']),
  infixes: z.array(z.string()).default(['.test.', '.spec.', '_test.', '_spec.']),
  prefixes: z.array(z.string()).default(['test_']),
});

export const entryPointsConfigSchema = z.object({
  /** Module ids or root-relative paths whose exports are never dead */
  files: z.array(z.string()).default([]),
  /** Export names that are never dead, wherever they are declared */
  names: z.array(z.string()).default(['main']),
});

export const surfaceConfigSchema = z.object({
  kinds: z
    .array(z.string())
    .default(['function', 'class', 'interface', 'type', 'enum', 'constant', 'command']),
});

export const configSchema = z.object({
  include: z.array(z.string()).default([
    '**/*.ts',
    '**/*.tsx',
    '**/*.mts',
    '**/*.cts',
    '**/*.js',
    '**/*.jsx',
    '**/*.mjs',
    '**/*.cjs',
    '**/*.py',
    '**/*.pyi',
  ]),
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/dist/**',
    '**/build/**',
    '**/.git/**',
    '**/venv/**',
    '**/.venv/**',
    '**/__pycache__/**',
    '**/coverage/**',
    '**/*.d.ts',
    '**/*.min.js',
  ]),
  resolution: resolutionConfigSchema.default({}),
  tests: testsConfigSchema.default({}),
  entryPoints: entryPointsConfigSchema.default({}),
  surface: surfaceConfigSchema.default({}),
  concurrency: z.number().int().min(1).max(64).default(4),
  timeoutMs: z.number().int().positive().optional(),
  parser: parserConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;
export type ResolutionConfig = z.infer<typeof resolutionConfigSchema>;
export type TestsConfig = z.infer<typeof testsConfigSchema>;
export type EntryPointsConfig = z.infer<typeof entryPointsConfigSchema>;
export type SurfaceConfig = z.infer<typeof surfaceConfigSchema>;
export type ParserConfig = z.infer<typeof parserConfigSchema>;
