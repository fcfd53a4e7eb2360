/**
 * Profile Command
 *
 * Profile one or more GeoPackages and write one Document per dataset.
 *
 * Usage:
 *   dataset-profiler profile <files...> [options]
 *
 * Options:
 *   -o, --out <dir>          Output directory (default: ./profiles)
 *   -m, --metadata <file>    Descriptive metadata (.xlsx/.xls or .yaml/.yml/.json)
 *   -c, --config <path>      Config file (default: nearest .dataset-profilerrc)
 *   --concurrency <n>        Datasets profiled at the same time
 *   --json                   Machine-readable summary and JSON log lines
 *   -v, --verbose            Debug logging
 *
 * Output:
 *   <out>/<dataset>.json for every dataset that could be processed
 */

import type { Command } from 'commander';
import { join, resolve } from 'node:path';
import type { DiagnosticCounts } from '../../core/diagnostics.js';
import { ConfigurationError, describeCause } from '../../core/errors.js';
import { atomicWriteJSON } from '../../core/utils/atomic-write.js';
import { createLogger, type Logger } from '../../core/utils/logger.js';
import { loadMetadataSource, type MetadataSource } from '../../document/metadata-source.js';
import { handleFromPath } from '../../reader/geopackage-reader.js';
import { DatasetProfiler, type ProfileRunResult } from '../../services/dataset-profiler.js';
import { loadConfig, type CLIConfig } from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';

export interface ProfileCommandOptions {
  readonly out?: string;
  readonly metadata?: string;
  readonly config?: string;
  readonly concurrency?: string;
  readonly json?: boolean;
  readonly verbose?: boolean;
}

export interface ProfileCommandContext {
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly logger?: Logger;
}

export interface ProfileSummary {
  readonly written: readonly string[];
  readonly failures: ProfileRunResult['failures'];
  readonly warnings: DiagnosticCounts;
  readonly durationMs: number;
  readonly exitCode: ExitCode;
}

export const DEFAULT_OUT_DIR = 'profiles';

/**
 * Register the profile command
 */
export function registerProfileCommand(program: Command): void {
  program
    .command('profile <files...>')
    .description('Profile GeoPackages into JSON Documents')
    .option('-o, --out <dir>', 'Output directory', DEFAULT_OUT_DIR)
    .option('-m, --metadata <file>', 'Descriptive metadata workbook or YAML/JSON file')
    .option('-c, --config <path>', 'Config file path')
    .option('--concurrency <n>', 'Datasets profiled at the same time')
    .option('--json', 'Machine-readable output')
    .option('-v, --verbose', 'Verbose output')
    .action(async (files: string[], options: ProfileCommandOptions) => {
      process.exitCode = await runProfileCommand(files, options);
    });
}

/**
 * Exit code for a completed run
 */
export function exitCodeFor(result: Pick<ProfileRunResult, 'failures' | 'counts'>): ExitCode {
  if (result.failures.length > 0) return EXIT_CODES.ERRORS;
  return Object.keys(result.counts).length > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
}

async function loadMetadata(path: string | undefined, cwd: string): Promise<MetadataSource | undefined> {
  if (path === undefined) return undefined;
  try {
    return await loadMetadataSource(resolve(cwd, path));
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    throw new ConfigurationError(`Metadata file ${path} could not be loaded: ${describeCause(error)}`);
  }
}

/**
 * Execute the profile command
 *
 * @returns Process exit code
 */
export async function runProfileCommand(
  files: readonly string[],
  options: ProfileCommandOptions,
  context: ProfileCommandContext = {}
): Promise<ExitCode> {
  const cwd = context.cwd ?? process.cwd();

  let config: CLIConfig;
  let log: Logger;
  let metadata: MetadataSource | undefined;
  let profiler: DatasetProfiler;
  try {
    config = loadConfig({
      configPath: options.config,
      cwd,
      env: context.env,
      overrides: {
        verbose: options.verbose,
        json: options.json,
        concurrency: options.concurrency === undefined ? undefined : Number(options.concurrency),
      },
    });
    log = context.logger ?? createLogger({ level: config.verbose ? 'debug' : 'info', json: config.json });
    metadata = await loadMetadata(options.metadata, cwd);
    profiler = new DatasetProfiler({ config: config.profiler, metadata, logger: log });
  } catch (error) {
    console.error(`Configuration error: ${describeCause(error)}`);
    return EXIT_CODES.CONFIG_ERROR;
  }

  let result: ProfileRunResult;
  try {
    result = await profiler.profileAll(files.map((file) => handleFromPath(resolve(cwd, file))));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
      return EXIT_CODES.CONFIG_ERROR;
    }
    throw error;
  }

  const outDir = resolve(cwd, options.out ?? DEFAULT_OUT_DIR);
  const written: string[] = [];
  for (const [name, document] of result.documents) {
    const target = join(outDir, `${name}.json`);
    await atomicWriteJSON(target, document);
    log.debug('Document written', { dataset: name, path: target });
    written.push(target);
  }

  const summary: ProfileSummary = {
    written,
    failures: result.failures,
    warnings: result.counts,
    durationMs: result.durationMs,
    exitCode: exitCodeFor(result),
  };
  printSummary(summary, config.json);
  return summary.exitCode;
}

function printSummary(summary: ProfileSummary, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }

  console.log('\nDataset Profiler');
  console.log('='.repeat(50));
  console.log(`Documents written: ${summary.written.length}`);
  for (const path of summary.written) {
    console.log(`  ${path}`);
  }
  if (summary.failures.length > 0) {
    console.log(`Failed datasets: ${summary.failures.length}`);
    for (const failure of summary.failures) {
      console.log(`  [${failure.code}] ${failure.dataset}: ${failure.message}`);
    }
  }
  const warningCodes = Object.entries(summary.warnings);
  if (warningCodes.length > 0) {
    console.log('Warnings:');
    for (const [code, count] of warningCodes) {
      console.log(`  ${code}: ${count}`);
    }
  }
  console.log(`Duration: ${summary.durationMs}ms`);
}
