/**
 * Raw catalog rows read from a GeoPackage
 *
 * @module reader/types
 */

/**
 * Values as returned by better-sqlite3
 */
export type SqlValue = number | bigint | string | Buffer | null;

export type ContentDataType = 'features' | 'attributes';

export interface ContentsEntry {
  readonly tableName: string;
  readonly dataType: ContentDataType;
  readonly identifier: string | null;
  readonly description: string | null;
  readonly srsId: number | null;
}

export interface ColumnInfo {
  readonly name: string;
  /** Declared type, upper-cased as written in the table definition */
  readonly declaredType: string;
  readonly notNull: boolean;
  readonly primaryKey: boolean;
}

export interface GeometryColumnInfo {
  readonly columnName: string;
  readonly geometryTypeName: string;
  readonly srsId: number;
}

export interface SpatialRefSysEntry {
  readonly srsId: number;
  readonly name: string | null;
  readonly organization: string | null;
  readonly organizationCoordsysId: number | null;
  readonly definition: string | null;
}

export interface ColumnStatistics {
  readonly nonNullCount: number;
  readonly distinctCount: number;
  /** Longest value in characters, 0 for an empty column */
  readonly maxLength: number;
}

export interface FeatureRow {
  readonly geometry: Uint8Array | null;
  readonly properties: Readonly<Record<string, SqlValue>>;
}
