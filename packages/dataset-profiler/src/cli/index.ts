/**
 * Dataset Profiler CLI
 *
 * @module cli
 */

export { registerProfileCommand, runProfileCommand, exitCodeFor, DEFAULT_OUT_DIR } from './commands/profile.js';
export type { ProfileCommandOptions, ProfileCommandContext, ProfileSummary } from './commands/profile.js';
export { loadConfig, findConfigFile, parseConfigFile, CONFIG_FILE_NAMES } from './lib/config.js';
export type { CLIConfig, LoadConfigOptions } from './lib/config.js';
export { EXIT_CODES, type ExitCode } from './lib/exit-codes.js';
