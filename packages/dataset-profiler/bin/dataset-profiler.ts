#!/usr/bin/env tsx
/**
 * Dataset Profiler CLI Entry Point
 *
 * @module dataset-profiler-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { registerProfileCommand } from '../src/cli/commands/profile.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';

export { EXIT_CODES, type ExitCode } from '../src/cli/lib/exit-codes.js';

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('dataset-profiler')
    .description('Profile GeoPackage datasets: schema, code lists and geometry previews')
    .version(getVersion(), '-V, --version', 'Output the version number');

  registerProfileCommand(program);
  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Fatal: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  });
