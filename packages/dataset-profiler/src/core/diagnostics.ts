/**
 * Diagnostics Collector
 *
 * Records every recoverable condition raised while profiling a dataset so
 * detection quality can be audited after the run. Each record is also logged
 * at warn level.
 */

import { DIAGNOSTIC_CODES } from './types/diagnostics.js';
import type { DiagnosticCode, ProfileWarning } from './types/diagnostics.js';
import type { Logger } from './utils/logger.js';

export type DiagnosticCounts = Partial<Record<DiagnosticCode, number>>;

export class DiagnosticsCollector {
  private readonly warnings: ProfileWarning[] = [];

  constructor(
    public readonly dataset: string,
    private readonly log?: Logger
  ) {}

  record(warning: Omit<ProfileWarning, 'dataset'>): void {
    const entry: ProfileWarning = { dataset: this.dataset, ...warning };
    this.warnings.push(entry);
    this.log?.warn(entry.message, {
      code: entry.code,
      ...(entry.layer !== undefined && { layer: entry.layer }),
      ...(entry.field !== undefined && { field: entry.field }),
      ...(entry.count !== undefined && { count: entry.count }),
    });
  }

  list(): readonly ProfileWarning[] {
    return [...this.warnings];
  }

  /**
   * Occurrences per code; folded warnings contribute their `count`
   */
  counts(): DiagnosticCounts {
    return countWarnings(this.warnings);
  }
}

export function countWarnings(warnings: readonly ProfileWarning[]): DiagnosticCounts {
  const counts: DiagnosticCounts = {};
  for (const warning of warnings) {
    counts[warning.code] = (counts[warning.code] ?? 0) + (warning.count ?? 1);
  }
  return counts;
}

/**
 * Add per-code counts of several runs together
 */
export function mergeCounts(...all: readonly DiagnosticCounts[]): DiagnosticCounts {
  const merged: DiagnosticCounts = {};
  for (const counts of all) {
    for (const code of DIAGNOSTIC_CODES) {
      const count = counts[code];
      if (count !== undefined) {
        merged[code] = (merged[code] ?? 0) + count;
      }
    }
  }
  return merged;
}
