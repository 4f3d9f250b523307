/**
 * init command - Write a default configuration file
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';

import { CONFIG_FILE_NAMES, getDefaultConfig } from '../../config/index.js';
import { ConfigurationError, errorMessage } from '../../errors.js';

interface InitOptions {
  force?: boolean;
}

/**
 * Write `crossdoc.config.json` holding every default; returns its path
 */
export async function writeDefaultConfig(directory: string, options: InitOptions = {}): Promise<string> {
  const projectPath = path.resolve(directory);
  const configPath = path.join(projectPath, CONFIG_FILE_NAMES[0] ?? 'crossdoc.config.json');

  if (fs.existsSync(configPath) && !options.force) {
    throw new ConfigurationError(`${configPath} already exists (use --force to overwrite)`);
  }

  const config = getDefaultConfig();
  await fs.promises.mkdir(projectPath, { recursive: true });
  await fs.promises.writeFile(configPath, JSON.stringify(config, null, 2) + '\n');
  return configPath;
}

export const initCommand = new Command('init')
  .description('Create a crossdoc.config.json with the default settings')
  .argument('[directory]', 'Project directory', '.')
  .option('--force', 'Overwrite an existing config file', false)
  .action(async (directory: string, options: InitOptions) => {
    try {
      const configPath = await writeDefaultConfig(directory, options);
      console.log(`Created ${configPath}`);
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
