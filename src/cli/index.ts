#!/usr/bin/env node

/**
 * crossdoc CLI
 */

import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze.js';
import { initCommand } from './commands/init.js';

const program = new Command();

program
  .name('crossdoc')
  .description('Cross-reference a source tree: module graph, dead, untested and undocumented exports')
  .version('0.1.0');

program.addCommand(initCommand);
program.addCommand(analyzeCommand);

program.parse(process.argv);
