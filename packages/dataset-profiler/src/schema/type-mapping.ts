/**
 * Native column type → semantic type mapping
 *
 * GeoPackage columns declare SQLite type names (optionally with a length,
 * e.g. TEXT(20)). Names that do not map fall back to `text`; callers record
 * the fallback as FIELD_TYPE_UNKNOWN.
 */

import type { SemanticType } from '../core/types/field-value.js';

const NATIVE_TYPES: Readonly<Record<string, SemanticType>> = {
  INTEGER: 'integer',
  INT: 'integer',
  BIGINT: 'integer',
  MEDIUMINT: 'integer',
  SMALLINT: 'integer',
  TINYINT: 'integer',
  DOUBLE: 'real',
  FLOAT: 'real',
  REAL: 'real',
  NUMERIC: 'real',
  DECIMAL: 'real',
  TEXT: 'text',
  VARCHAR: 'text',
  CHAR: 'text',
  STRING: 'text',
  BOOLEAN: 'boolean',
  BOOL: 'boolean',
  DATE: 'datetime',
  DATETIME: 'datetime',
  TIMESTAMP: 'datetime',
  BLOB: 'binary',
  GEOMETRY: 'geometry',
  POINT: 'geometry',
  LINESTRING: 'geometry',
  POLYGON: 'geometry',
  MULTIPOINT: 'geometry',
  MULTILINESTRING: 'geometry',
  MULTIPOLYGON: 'geometry',
  GEOMETRYCOLLECTION: 'geometry',
  CIRCULARSTRING: 'geometry',
  COMPOUNDCURVE: 'geometry',
  CURVEPOLYGON: 'geometry',
  MULTICURVE: 'geometry',
  MULTISURFACE: 'geometry',
  CURVE: 'geometry',
  SURFACE: 'geometry',
};

export interface TypeMapping {
  readonly type: SemanticType;
  /** The native type was not recognised and `text` was assumed */
  readonly unknown: boolean;
}

/**
 * Strip a length/precision suffix and normalise case: "text(20)" → "TEXT"
 */
export function baseTypeName(nativeType: string): string {
  return nativeType.replace(/\(.*\)\s*$/, '').trim().toUpperCase();
}

export function mapNativeType(nativeType: string): TypeMapping {
  const type = NATIVE_TYPES[baseTypeName(nativeType)];
  return type ? { type, unknown: false } : { type: 'text', unknown: true };
}
