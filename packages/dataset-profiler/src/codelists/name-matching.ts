/**
 * Code Table ↔ field name matching
 *
 * Names are compared lower-cased. Match kinds, strongest first:
 *
 *   exact      field name == Code Table name without prefix
 *   qualified  Code Table name without prefix == `<layer>_<field>`
 *   variant    the two names share a singular/plural form, where the field
 *              name may also drop a trailing `_code`, `_kode` or `_id`
 *
 * Tie-break among candidates of the same kind: shortest prefix-stripped name,
 * then the lexicographically first Code Table name. This is a documented
 * policy, surfaced as CODE_LIST_AMBIGUOUS_BINDING whenever it decides.
 */

import type { BindingMatch } from '../core/types/code-list.js';

const FIELD_SUFFIXES = ['_code', '_kode', '_id'] as const;

const MATCH_RANK: Record<Exclude<BindingMatch, 'inferred'>, number> = {
  exact: 0,
  qualified: 1,
  variant: 2,
};

export type TableMatch = Exclude<BindingMatch, 'inferred'>;

export interface CodeTableRef {
  /** Layer name of the Code Table */
  readonly table: string;
  /** Lower-cased name without the reserved prefix */
  readonly stripped: string;
}

export interface TableCandidate extends CodeTableRef {
  readonly match: TableMatch;
}

export interface BindingDecision {
  readonly winner: TableCandidate;
  /** All candidates of the winning kind, winner included, in tie-break order */
  readonly tied: readonly TableCandidate[];
}

export function stripPrefix(table: string, prefix: string): string {
  return table.slice(prefix.length).toLowerCase();
}

/**
 * Singular and plural forms of a name, the name itself included
 */
export function numberForms(name: string): Set<string> {
  const forms = new Set<string>([name]);
  if (name.endsWith('ies') && name.length > 3) {
    forms.add(`${name.slice(0, -3)}y`);
  }
  if (name.endsWith('es') && name.length > 2) {
    forms.add(name.slice(0, -2));
  }
  if (name.endsWith('s') && name.length > 1) {
    forms.add(name.slice(0, -1));
  }
  if (name.endsWith('y') && name.length > 1) {
    forms.add(`${name.slice(0, -1)}ies`);
  }
  forms.add(`${name}s`);
  forms.add(`${name}es`);
  return forms;
}

/**
 * Variant forms of a field name: number forms of the name and of the name
 * without a trailing code/id suffix
 */
export function fieldVariants(field: string): Set<string> {
  const lower = field.toLowerCase();
  const variants = numberForms(lower);
  for (const suffix of FIELD_SUFFIXES) {
    if (lower.endsWith(suffix) && lower.length > suffix.length) {
      for (const form of numberForms(lower.slice(0, -suffix.length))) {
        variants.add(form);
      }
    }
  }
  return variants;
}

/**
 * How (if at all) a Code Table matches a field of a layer
 */
export function matchCodeTable(
  ref: CodeTableRef,
  layer: string,
  field: string
): TableMatch | null {
  const fieldName = field.toLowerCase();
  if (ref.stripped.length === 0) return null;
  if (fieldName === ref.stripped) return 'exact';
  if (ref.stripped === `${layer.toLowerCase()}_${fieldName}`) return 'qualified';

  const tableForms = numberForms(ref.stripped);
  for (const variant of fieldVariants(fieldName)) {
    if (tableForms.has(variant)) return 'variant';
  }
  return null;
}

function compareCandidates(a: TableCandidate, b: TableCandidate): number {
  const rank = MATCH_RANK[a.match] - MATCH_RANK[b.match];
  if (rank !== 0) return rank;
  const length = a.stripped.length - b.stripped.length;
  if (length !== 0) return length;
  return a.table < b.table ? -1 : a.table > b.table ? 1 : 0;
}

/**
 * Pick the Code Table a field binds to
 *
 * @returns null when no Code Table matches
 */
export function chooseCodeTable(
  refs: readonly CodeTableRef[],
  layer: string,
  field: string
): BindingDecision | null {
  const candidates: TableCandidate[] = [];
  for (const ref of refs) {
    const match = matchCodeTable(ref, layer, field);
    if (match) candidates.push({ ...ref, match });
  }
  if (candidates.length === 0) return null;

  candidates.sort(compareCandidates);
  const [winner] = candidates;
  if (!winner) return null;
  return {
    winner,
    tied: candidates.filter((candidate) => candidate.match === winner.match),
  };
}
