/**
 * Recoverable condition taxonomy
 *
 * @module core/types/diagnostics
 */

export const DIAGNOSTIC_CODES = [
  'DATASET_UNREADABLE',
  'LAYER_UNREADABLE',
  'FIELD_TYPE_UNKNOWN',
  'FIELD_UNREADABLE',
  'GEOMETRY_UNREADABLE',
  'GEOMETRY_INVALID_AFTER_SIMPLIFICATION',
  'CODE_LIST_AMBIGUOUS_BINDING',
  'REFERENCE_SYSTEM_MISSING',
  'REFERENCE_SYSTEM_UNSUPPORTED',
] as const;

export type DiagnosticCode = (typeof DIAGNOSTIC_CODES)[number];

export interface ProfileWarning {
  readonly code: DiagnosticCode;
  readonly dataset: string;
  readonly layer?: string;
  readonly field?: string;
  readonly message: string;
  /** Number of occurrences folded into this warning (feature-level conditions) */
  readonly count?: number;
}
