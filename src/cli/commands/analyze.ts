/**
 * analyze command - Cross-reference a source tree and report gaps
 */

import { Command, InvalidArgumentError } from 'commander';
import path from 'node:path';

import { Analyzer, type AnalysisResult } from '../../analysis/analyzer.js';
import { loadConfig, loadConfigOrDefault, parseConfig, type Config } from '../../config/index.js';
import { CancellationError, errorMessage } from '../../errors.js';
import { createLogger, type Logger } from '../../logger.js';
import { formatJsonReport, writeJsonReport } from '../../output/json.js';

export interface AnalyzeCommandOptions {
  config?: string;
  output?: string;
  json?: boolean;
  concurrency?: number;
  timeout?: number;
  entry?: string[];
  verbose?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Config file (explicit, or found from the root upwards) with command-line
 * overrides applied and validated
 */
export async function resolveRunConfig(rootDirectory: string, options: AnalyzeCommandOptions): Promise<Config> {
  const base = options.config ? await loadConfig(options.config) : await loadConfigOrDefault(rootDirectory);

  return parseConfig(
    {
      ...base,
      concurrency: options.concurrency ?? base.concurrency,
      timeoutMs: options.timeout ?? base.timeoutMs,
      entryPoints: {
        ...base.entryPoints,
        files: [...base.entryPoints.files, ...(options.entry ?? [])],
      },
    },
    'command-line options'
  );
}

export function formatSummary(result: AnalysisResult): string[] {
  const lines = [
    `  Files:         ${result.stats.totalFiles}`,
    `  Modules:       ${result.stats.modules}`,
    `  Edges:         ${result.stats.edges}`,
    `  Exports:       ${result.stats.exports}`,
    `  Dead:          ${result.gaps.dead.length}`,
    `  Untested:      ${result.gaps.untested.length}`,
    `  Undocumented:  ${result.gaps.undocumented.length}`,
    `  Cycles:        ${result.cycles.length}`,
    `  Degraded:      ${result.degraded.length}`,
  ];

  if (result.degraded.length > 0) {
    lines.push('', 'Degraded files:');
    for (const file of result.degraded) {
      lines.push(`  ${file.path} [${file.state}] ${file.reason.code}: ${file.reason.message}`);
    }
  }

  return lines;
}

/**
 * Run an analysis and emit its report; resolves to the result
 */
export async function runAnalyze(
  directory: string,
  options: AnalyzeCommandOptions,
  logger: Logger,
  signal?: AbortSignal
): Promise<AnalysisResult> {
  const rootDirectory = path.resolve(directory);
  const config = await resolveRunConfig(rootDirectory, options);

  const analyzer = new Analyzer({ config, logger });
  const result = await analyzer.analyzeDirectory(rootDirectory, { signal });

  if (options.output) {
    const written = await writeJsonReport(result, options.output);
    logger.info(`Report written to ${written}`);
  }

  if (options.json) {
    process.stdout.write(formatJsonReport(result));
  } else {
    console.log(`Analysis complete!\n`);
    for (const line of formatSummary(result)) {
      console.log(line);
    }
  }

  return result;
}

export const analyzeCommand = new Command('analyze')
  .description('Build the module graph of a source tree and report dead, untested and undocumented exports')
  .argument('[directory]', 'Directory to analyze', '.')
  .option('-c, --config <path>', 'Path to config file')
  .option('-o, --output <file>', 'Write the JSON report to a file')
  .option('--json', 'Print the JSON report on stdout', false)
  .option('--concurrency <n>', 'Extraction workers', parseInteger)
  .option('--timeout <ms>', 'Cancel the run after this many milliseconds', parseInteger)
  .option('--entry <paths...>', 'Entry-point modules exempt from dead-export detection')
  .option('--verbose', 'Show verbose output', false)
  .action(async (directory: string, options: AnalyzeCommandOptions) => {
    const logger = createLogger({ verbose: options.verbose, quiet: options.json });
    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort();
    process.once('SIGINT', onInterrupt);

    try {
      await runAnalyze(directory, options, logger, controller.signal);
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(error instanceof CancellationError ? 2 : 1);
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  });
