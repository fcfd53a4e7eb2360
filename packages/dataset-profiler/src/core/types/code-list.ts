/**
 * Controlled vocabulary types produced by the Code List Resolver
 *
 * @module core/types/code-list
 */

import type { FieldValue } from './field-value.js';

/**
 * How a field was tied to its CodeList
 *
 * - exact: field name equals the Code Table name without prefix
 * - qualified: Code Table named `<prefix><layer>_<field>`
 * - variant: singular/plural or `_code`/`_id` suffixed form
 * - inferred: statistical fallback on a low-cardinality text field
 */
export type BindingMatch = 'exact' | 'qualified' | 'variant' | 'inferred';

export type CodeListSource =
  | { readonly kind: 'table'; readonly layer: string }
  | { readonly kind: 'inferred'; readonly layer: string; readonly field: string };

export interface CodeListEntry {
  readonly code: FieldValue;
  /** Absent for inferred lists and single-column Code Tables */
  readonly label: string | null;
}

export interface CodeListBinding {
  readonly layer: string;
  readonly field: string;
  readonly match: BindingMatch;
}

export interface CodeList {
  /** `table:<layer>` or `inferred:<layer>.<field>` */
  readonly id: string;
  readonly source: CodeListSource;
  readonly entries: readonly CodeListEntry[];
  readonly bindings: readonly CodeListBinding[];
}
