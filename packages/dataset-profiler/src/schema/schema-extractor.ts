/**
 * Schema Extractor
 *
 * Enumerates the layers of a GeoPackage and, per layer, its fields with an
 * inferred semantic type and a deterministic sample of values. Layers that
 * cannot be described are skipped with LAYER_UNREADABLE; a field whose values
 * cannot be read keeps its place as `text` without samples.
 */

import type { DiagnosticsCollector } from '../core/diagnostics.js';
import { LayerUnreadableError } from '../core/errors.js';
import type {
  DatasetCatalog,
  FieldProfile,
  LayerProfile,
  ReferenceSystem,
} from '../core/types/dataset.js';
import type { FieldValue } from '../core/types/field-value.js';
import type { GeoPackageReader } from '../reader/geopackage-reader.js';
import type { ColumnInfo, ContentsEntry, GeometryColumnInfo } from '../reader/types.js';
import { toFieldValue } from './field-value.js';
import { mapNativeType } from './type-mapping.js';

export interface SchemaExtractionOptions {
  readonly sampleSize: number;
  readonly codeTablePrefix: string;
}

export function isCodeTableName(name: string, prefix: string): boolean {
  return name.toLowerCase().startsWith(prefix.toLowerCase());
}

/**
 * Integer primary key used as storage order, if the table has one
 */
export function storageOrderColumn(columns: readonly ColumnInfo[]): string | null {
  const keys = columns.filter((column) => column.primaryKey);
  const [key] = keys;
  if (keys.length !== 1 || !key) return null;
  return mapNativeType(key.declaredType).type === 'integer' ? key.name : null;
}

/**
 * Storage order column of an extracted layer
 */
export function layerStorageOrder(layer: LayerProfile): string | null {
  const keys = layer.fields.filter((field) => field.primaryKey);
  const [key] = keys;
  if (keys.length !== 1 || !key) return null;
  return key.type === 'integer' ? key.name : null;
}

function readReferenceSystem(reader: GeoPackageReader, srsId: number): ReferenceSystem {
  const entry = reader.spatialRefSys(srsId);
  return {
    srsId,
    name: entry?.name ?? null,
    organization: entry?.organization ?? null,
    code: entry?.organizationCoordsysId ?? null,
    definition: entry?.definition ?? null,
  };
}

function extractField(
  reader: GeoPackageReader,
  table: string,
  column: ColumnInfo,
  geometry: GeometryColumnInfo | null,
  orderBy: string | null,
  options: SchemaExtractionOptions,
  diagnostics: DiagnosticsCollector
): FieldProfile {
  const base = {
    name: column.name,
    nativeType: column.declaredType,
    nullable: !column.notNull && !column.primaryKey,
    primaryKey: column.primaryKey,
  };

  if (geometry && column.name === geometry.columnName) {
    return { ...base, type: 'geometry', samples: [] };
  }

  const mapping = mapNativeType(column.declaredType);
  if (mapping.unknown) {
    diagnostics.record({
      code: 'FIELD_TYPE_UNKNOWN',
      layer: table,
      field: column.name,
      message: `Unknown native type "${column.declaredType}" for ${table}.${column.name}, treated as text`,
    });
  }
  // A geometry-typed column that is not the registered geometry column is not previewed
  if (mapping.type === 'geometry') {
    return { ...base, type: 'geometry', samples: [] };
  }

  try {
    const samples: FieldValue[] = [];
    for (const raw of reader.sampleValues(table, column.name, options.sampleSize, orderBy)) {
      const value = toFieldValue(raw, mapping.type);
      if (value) samples.push(value);
    }
    return { ...base, type: mapping.type, samples };
  } catch (error) {
    diagnostics.record({
      code: 'FIELD_UNREADABLE',
      layer: table,
      field: column.name,
      message: `Values of ${table}.${column.name} could not be read: ${error instanceof Error ? error.message : String(error)}`,
    });
    return { ...base, type: 'text', samples: [] };
  }
}

/**
 * Describe one layer
 *
 * @throws {LayerUnreadableError} When the table cannot be described
 */
export function extractLayer(
  reader: GeoPackageReader,
  entry: ContentsEntry,
  options: SchemaExtractionOptions,
  diagnostics: DiagnosticsCollector
): LayerProfile {
  const table = entry.tableName;
  try {
    const columns = reader.describeColumns(table);
    const geometry = entry.dataType === 'features' ? reader.geometryColumn(table) : null;
    const orderBy = storageOrderColumn(columns);
    const rowCount = reader.countRows(table);

    return {
      name: table,
      kind: geometry ? 'spatial' : 'attribute',
      isCodeTable: isCodeTableName(table, options.codeTablePrefix),
      description: entry.description || null,
      fields: columns.map((column) =>
        extractField(reader, table, column, geometry, orderBy, options, diagnostics)
      ),
      rowCount,
      geometryColumn: geometry?.columnName ?? null,
      geometryType: geometry?.geometryTypeName ?? null,
      referenceSystem: geometry ? readReferenceSystem(reader, geometry.srsId) : null,
    };
  } catch (error) {
    throw new LayerUnreadableError(reader.name, table, error);
  }
}

/**
 * Build the layer/field catalog of a dataset
 */
export function extractSchema(
  reader: GeoPackageReader,
  options: SchemaExtractionOptions,
  diagnostics: DiagnosticsCollector
): DatasetCatalog {
  const layers: LayerProfile[] = [];

  for (const entry of reader.listContents()) {
    try {
      layers.push(extractLayer(reader, entry, options, diagnostics));
    } catch (error) {
      if (!(error instanceof LayerUnreadableError)) throw error;
      diagnostics.record({
        code: 'LAYER_UNREADABLE',
        layer: entry.tableName,
        message: error.message,
      });
    }
  }

  return { name: reader.name, path: reader.path, layers };
}
