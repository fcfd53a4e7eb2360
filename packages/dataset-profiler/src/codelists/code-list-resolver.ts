/**
 * Code List Resolver
 *
 * Two tiers, tried in order per dataset:
 *
 * 1. Naming convention - layers whose name carries the Code Table prefix are
 *    authoritative vocabularies. Their (code, label) rows become a CodeList,
 *    bound to the fields whose names match (see name-matching.ts).
 * 2. Statistical fallback - text fields of regular layers left unbound by
 *    tier 1 become inferred CodeLists when their values are short and of low
 *    cardinality. Thresholds come from configuration.
 *
 * A field bound in tier 1 is never looked at by tier 2.
 */

import type { CodeListHeuristic } from '../core/config.js';
import type { DiagnosticsCollector } from '../core/diagnostics.js';
import type {
  CodeList,
  CodeListBinding,
  CodeListEntry,
} from '../core/types/code-list.js';
import type { DatasetCatalog, FieldProfile, LayerProfile } from '../core/types/dataset.js';
import type { GeoPackageReader } from '../reader/geopackage-reader.js';
import type { ColumnStatistics } from '../reader/types.js';
import { fieldValueKey, formatFieldValue, toFieldValue } from '../schema/field-value.js';
import { layerStorageOrder } from '../schema/schema-extractor.js';
import { chooseCodeTable, stripPrefix, type CodeTableRef } from './name-matching.js';

export interface CodeListResolverOptions {
  readonly codeTablePrefix: string;
  readonly heuristic: CodeListHeuristic;
}

// ============================================================================
// Tier 1 - Code Tables
// ============================================================================

/**
 * Columns holding the code and the label: the first two non-key, non-geometry fields
 */
export function codeTableColumns(layer: LayerProfile): {
  code: FieldProfile | null;
  label: FieldProfile | null;
} {
  const valueFields = layer.fields.filter((field) => !field.primaryKey && field.type !== 'geometry');
  return { code: valueFields[0] ?? null, label: valueFields[1] ?? null };
}

/**
 * Distinct (code, label) pairs of a Code Table in row order
 *
 * Null codes are skipped; for a repeated code the first label seen wins.
 */
export function readCodeTable(reader: GeoPackageReader, layer: LayerProfile): CodeListEntry[] {
  const { code, label } = codeTableColumns(layer);
  if (!code) return [];

  const columns = label ? [code.name, label.name] : [code.name];
  const orderBy = layerStorageOrder(layer);

  const seen = new Set<string>();
  const entries: CodeListEntry[] = [];
  for (const [rawCode, rawLabel] of reader.readRows(layer.name, columns, orderBy)) {
    const codeValue = toFieldValue(rawCode ?? null, code.type);
    if (!codeValue) continue;

    const key = fieldValueKey(codeValue);
    if (seen.has(key)) continue;
    seen.add(key);

    const labelValue = label ? toFieldValue(rawLabel ?? null, label.type) : null;
    entries.push({ code: codeValue, label: labelValue ? formatFieldValue(labelValue) : null });
  }
  return entries;
}

interface TableBindings {
  readonly bindings: Map<string, CodeListBinding[]>;
  readonly boundFields: Set<string>;
}

function fieldKey(layer: string, field: string): string {
  return `${layer}\u0000${field}`;
}

function isBindable(field: FieldProfile): boolean {
  return field.type !== 'geometry' && !field.primaryKey;
}

/**
 * Bind fields of regular layers to the readable Code Tables
 */
export function bindCodeTables(
  layers: readonly LayerProfile[],
  refs: readonly CodeTableRef[],
  diagnostics: DiagnosticsCollector
): TableBindings {
  const bindings = new Map<string, CodeListBinding[]>(refs.map((ref) => [ref.table, []]));
  const boundFields = new Set<string>();
  if (refs.length === 0) return { bindings, boundFields };

  for (const layer of layers) {
    if (layer.isCodeTable) continue;
    for (const field of layer.fields) {
      if (!isBindable(field)) continue;

      const decision = chooseCodeTable(refs, layer.name, field.name);
      if (!decision) continue;

      const { winner, tied } = decision;
      if (tied.length > 1) {
        diagnostics.record({
          code: 'CODE_LIST_AMBIGUOUS_BINDING',
          layer: layer.name,
          field: field.name,
          message:
            `Field ${layer.name}.${field.name} matches ${tied.length} Code Tables ` +
            `(${tied.map((candidate) => candidate.table).join(', ')}) as ${winner.match}; ` +
            `bound to ${winner.table} (shortest name, then alphabetical)`,
        });
      }

      bindings.get(winner.table)?.push({ layer: layer.name, field: field.name, match: winner.match });
      boundFields.add(fieldKey(layer.name, field.name));
    }
  }
  return { bindings, boundFields };
}

// ============================================================================
// Tier 2 - Statistical fallback
// ============================================================================

/**
 * Whether column statistics describe a controlled vocabulary
 */
export function qualifiesAsCodeList(stats: ColumnStatistics, heuristic: CodeListHeuristic): boolean {
  if (stats.nonNullCount === 0) return false;
  if (stats.maxLength > heuristic.maxTextLength) return false;
  if (stats.distinctCount < heuristic.minDistinctValues) return false;
  if (stats.distinctCount > heuristic.maxDistinctValues) return false;
  return stats.distinctCount / stats.nonNullCount <= heuristic.maxCardinalityRatio;
}

function compareCodes(a: CodeListEntry, b: CodeListEntry): number {
  const left = formatFieldValue(a.code);
  const right = formatFieldValue(b.code);
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Inferred CodeList for a text field, or null when it does not qualify
 */
export function inferCodeList(
  reader: GeoPackageReader,
  layer: LayerProfile,
  field: FieldProfile,
  heuristic: CodeListHeuristic
): CodeList | null {
  if (field.type !== 'text' || field.primaryKey) return null;

  const stats = reader.columnStatistics(layer.name, field.name);
  if (!qualifiesAsCodeList(stats, heuristic)) return null;

  const entries: CodeListEntry[] = [];
  for (const raw of reader.distinctValues(layer.name, field.name)) {
    const code = toFieldValue(raw, 'text');
    if (code) entries.push({ code, label: null });
  }
  entries.sort(compareCodes);

  return {
    id: `inferred:${layer.name}.${field.name}`,
    source: { kind: 'inferred', layer: layer.name, field: field.name },
    entries,
    bindings: [{ layer: layer.name, field: field.name, match: 'inferred' }],
  };
}

// ============================================================================
// Resolution
// ============================================================================

interface PositionedCodeList {
  readonly list: CodeList;
  readonly layerIndex: number;
  /** -1 for Code Table lists so they precede field-level lists of the same layer */
  readonly fieldIndex: number;
}

/**
 * Resolve the CodeLists of a dataset and their field bindings
 *
 * CodeLists are returned in the order their source layer/field appears in
 * the catalog.
 */
export function resolveCodeLists(
  reader: GeoPackageReader,
  catalog: DatasetCatalog,
  options: CodeListResolverOptions,
  diagnostics: DiagnosticsCollector
): CodeList[] {
  const positioned: PositionedCodeList[] = [];

  // Tier 1: read every Code Table; unreadable ones take no part in binding
  const tableEntries = new Map<string, CodeListEntry[]>();
  const refs: CodeTableRef[] = [];
  for (const layer of catalog.layers) {
    if (!layer.isCodeTable) continue;
    try {
      tableEntries.set(layer.name, readCodeTable(reader, layer));
      refs.push({ table: layer.name, stripped: stripPrefix(layer.name, options.codeTablePrefix) });
    } catch (error) {
      diagnostics.record({
        code: 'LAYER_UNREADABLE',
        layer: layer.name,
        message: `Code Table "${layer.name}" could not be read: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  }

  const { bindings, boundFields } = bindCodeTables(catalog.layers, refs, diagnostics);

  catalog.layers.forEach((layer, layerIndex) => {
    const entries = tableEntries.get(layer.name);
    if (!entries) return;
    positioned.push({
      list: {
        id: `table:${layer.name}`,
        source: { kind: 'table', layer: layer.name },
        entries,
        bindings: bindings.get(layer.name) ?? [],
      },
      layerIndex,
      fieldIndex: -1,
    });
  });

  // Tier 2: unbound text fields of regular layers
  catalog.layers.forEach((layer, layerIndex) => {
    if (layer.isCodeTable) return;
    layer.fields.forEach((field, fieldIndex) => {
      if (boundFields.has(fieldKey(layer.name, field.name))) return;
      try {
        const list = inferCodeList(reader, layer, field, options.heuristic);
        if (list) positioned.push({ list, layerIndex, fieldIndex });
      } catch (error) {
        diagnostics.record({
          code: 'FIELD_UNREADABLE',
          layer: layer.name,
          field: field.name,
          message: `Statistics for ${layer.name}.${field.name} could not be read: ${error instanceof Error ? error.message : String(error)}`,
        });
      }
    });
  });

  positioned.sort((a, b) => a.layerIndex - b.layerIndex || a.fieldIndex - b.fieldIndex);
  return positioned.map((entry) => entry.list);
}
