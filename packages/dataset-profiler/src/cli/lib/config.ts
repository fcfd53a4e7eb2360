/**
 * CLI Configuration Loading
 *
 * Loads profiler settings from an rc-file (YAML or JSON) with environment
 * variable overrides. Precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (DATASET_PROFILER_*)
 * 3. Config file (.dataset-profilerrc or --config path)
 * 4. Defaults (core/config)
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import {
  ProfilerConfigInputSchema,
  resolveConfig,
  type ProfilerConfig,
  type ProfilerConfigInput,
} from '../../core/config.js';
import { ConfigurationError, describeCause } from '../../core/errors.js';

export interface CLIConfig {
  readonly profiler: ProfilerConfig;
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path, null when none was found */
  readonly configPath: string | null;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory the rc-file search starts from */
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly concurrency?: number;
  };
}

export const CONFIG_FILE_NAMES = [
  '.dataset-profilerrc',
  '.dataset-profilerrc.yaml',
  '.dataset-profilerrc.yml',
  '.dataset-profilerrc.json',
] as const;

const ENV_PREFIX = 'DATASET_PROFILER_';

/**
 * Find a config file in `startDir` or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate an rc-file (YAML also handles plain JSON)
 *
 * @throws {ConfigurationError}
 */
export function parseConfigFile(filePath: string): ProfilerConfigInput {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Config file ${filePath} could not be read: ${describeCause(error)}`);
  }

  const parsed = ProfilerConfigInputSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid config file ${filePath}: ${issues.join('; ')}`, 'CONFIGURATION_INVALID', issues);
  }
  return parsed.data;
}

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = envString(env, name);
  if (value === undefined) return undefined;
  const num = Number(value);
  if (!Number.isFinite(num)) {
    throw new ConfigurationError(`${ENV_PREFIX}${name} must be a number, got "${value}"`);
  }
  return num;
}

function envBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = envString(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigurationError} When the file is missing or invalid, or a
 *   merged value is out of range
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = options.env ?? process.env;

  let configPath: string | null;
  const explicit = options.configPath ?? envString(env, 'CONFIG');
  if (explicit !== undefined) {
    configPath = resolve(options.cwd ?? process.cwd(), explicit);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
  }

  const fileConfig = configPath ? parseConfigFile(configPath) : {};

  const input: ProfilerConfigInput = {
    ...fileConfig,
    codeTablePrefix: envString(env, 'CODE_TABLE_PREFIX') ?? fileConfig.codeTablePrefix,
    sampleSize: envNumber(env, 'SAMPLE_SIZE') ?? fileConfig.sampleSize,
    canonicalCrs: envString(env, 'CANONICAL_CRS') ?? fileConfig.canonicalCrs,
    concurrency: options.overrides?.concurrency ?? envNumber(env, 'CONCURRENCY') ?? fileConfig.concurrency,
  };

  return {
    profiler: resolveConfig(input),
    verbose: options.overrides?.verbose ?? envBool(env, 'VERBOSE') ?? false,
    json: options.overrides?.json ?? envBool(env, 'JSON') ?? false,
    configPath,
  };
}
