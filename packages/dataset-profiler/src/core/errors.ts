/**
 * Dataset Profiler Error Types
 *
 * Only two conditions escape the pipeline as thrown errors: a dataset that
 * cannot be opened at all, and configuration/environment problems. Every
 * other condition is recovered locally and recorded as a diagnostic.
 */

import { DIAGNOSTIC_CODES } from './types/diagnostics.js';

export const PROFILER_ERROR_CODES = [
  ...DIAGNOSTIC_CODES,
  'DATASET_NAME_DUPLICATE',
  'CONFIGURATION_INVALID',
  'NO_DATASETS',
] as const;

export type ProfilerErrorCode = (typeof PROFILER_ERROR_CODES)[number];

/**
 * Base class for all profiler errors
 */
export class ProfilerError extends Error {
  constructor(
    message: string,
    public readonly code: ProfilerErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProfilerError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Dataset could not be opened or enumerated. The dataset is skipped and
 * processing continues with the remaining datasets.
 */
export class DatasetUnreadableError extends ProfilerError {
  constructor(
    public readonly dataset: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(
      `Dataset "${dataset}" could not be read (${path}): ${describeCause(cause)}`,
      'DATASET_UNREADABLE',
      { cause }
    );
    this.name = 'DatasetUnreadableError';
  }
}

/**
 * Layer could not be opened; it is skipped within an otherwise processed dataset
 */
export class LayerUnreadableError extends ProfilerError {
  constructor(
    public readonly dataset: string,
    public readonly layer: string,
    cause?: unknown
  ) {
    super(
      `Layer "${layer}" in dataset "${dataset}" could not be read: ${describeCause(cause)}`,
      'LAYER_UNREADABLE',
      { cause }
    );
    this.name = 'LayerUnreadableError';
  }
}

/**
 * Fatal configuration or environment error
 *
 * RECOVERY:
 * - Check the rc-file and DATASET_PROFILER_* environment variables
 * - Supply at least one dataset path
 */
export class ConfigurationError extends ProfilerError {
  constructor(
    message: string,
    code: 'CONFIGURATION_INVALID' | 'NO_DATASETS' = 'CONFIGURATION_INVALID',
    public readonly issues: readonly string[] = []
  ) {
    super(message, code);
    this.name = 'ConfigurationError';
  }
}

/**
 * Type guard for profiler errors
 */
export function isProfilerError(error: unknown): error is ProfilerError {
  return error instanceof ProfilerError;
}

/**
 * Render an unknown thrown value as a message
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}
