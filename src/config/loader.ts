/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import type { ZodError } from 'zod';
import { ConfigurationError } from '../errors.js';
import { configSchema, type Config } from './schema.js';

export const CONFIG_FILE_NAMES = ['crossdoc.config.json', '.crossdocrc.json', '.crossdocrc'];
export const PACKAGE_CONFIG_KEY = 'crossdoc';

function formatIssues(error: ZodError): string[] {
  return error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`);
}

/**
 * Validate an already-parsed configuration object
 */
export function parseConfig(raw: unknown, source = 'configuration'): Config {
  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(
      `Invalid ${source}:\n${issues.map(i => `  - ${i}`).join('\n')}`,
      issues
    );
  }

  return result.data;
}

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in config file: ${absolutePath}`, [], { cause: error });
  }

  return parseConfig(rawConfig, `configuration in ${absolutePath}`);
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

function readPackageSection(packagePath: string): unknown {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(packagePath, 'utf-8'));
    if (parsed && typeof parsed === 'object' && PACKAGE_CONFIG_KEY in parsed) {
      return parsed[PACKAGE_CONFIG_KEY];
    }
  } catch {
    // unparseable package.json: not a config source
    return undefined;
  }
  return undefined;
}

/**
 * Walk up from `startDir` and load the first config file found
 */
export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (true) {
    for (const configName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const section = readPackageSection(packagePath);
      if (section !== undefined) {
        return parseConfig(section, `"${PACKAGE_CONFIG_KEY}" section of ${packagePath}`);
      }
    }

    if (currentDir === root) break;
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}
