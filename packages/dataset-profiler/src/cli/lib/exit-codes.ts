/**
 * Process exit codes of the dataset-profiler CLI
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  /** Every dataset produced a Document, at least one with warnings */
  WARNINGS: 1,
  /** At least one dataset failed */
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
