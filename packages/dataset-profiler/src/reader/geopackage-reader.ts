/**
 * GeoPackage Reader
 *
 * Read-only view of a GeoPackage through better-sqlite3. The reader knows the
 * GeoPackage system tables (gpkg_contents, gpkg_geometry_columns,
 * gpkg_spatial_ref_sys) and exposes the table-level queries the profiler
 * needs; it never writes to the package.
 *
 * All identifiers coming from the package are quoted before they reach SQL.
 */

import Database from 'better-sqlite3';
import { basename, extname } from 'node:path';
import { DatasetUnreadableError } from '../core/errors.js';
import type { DatasetHandle } from '../core/types/dataset.js';
import type {
  ColumnInfo,
  ColumnStatistics,
  ContentDataType,
  ContentsEntry,
  FeatureRow,
  GeometryColumnInfo,
  SpatialRefSysEntry,
  SqlValue,
} from './types.js';

// ============================================================================
// Database Row Types (internal)
// ============================================================================

interface ContentsRow {
  readonly table_name: string;
  readonly data_type: string;
  readonly identifier: string | null;
  readonly description: string | null;
  readonly srs_id: number | null;
}

interface TableInfoRow {
  readonly cid: number;
  readonly name: string;
  readonly type: string;
  readonly notnull: number;
  readonly dflt_value: SqlValue;
  readonly pk: number;
}

interface GeometryColumnsRow {
  readonly column_name: string;
  readonly geometry_type_name: string;
  readonly srs_id: number;
}

interface SpatialRefSysRow {
  readonly srs_id: number;
  readonly srs_name: string | null;
  readonly organization: string | null;
  readonly organization_coordsys_id: number | null;
  readonly definition: string | null;
}

interface StatisticsRow {
  readonly non_null: number;
  readonly distinct_count: number;
  readonly max_length: number | null;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Quote an SQL identifier
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Dataset name from its storage location: base name without extension
 */
export function datasetNameFromPath(path: string): string {
  return basename(path, extname(path));
}

/**
 * Build a handle for a GeoPackage path
 */
export function handleFromPath(path: string): DatasetHandle {
  return { name: datasetNameFromPath(path), path };
}

function isContentDataType(value: string): value is ContentDataType {
  return value === 'features' || value === 'attributes';
}

// ============================================================================
// Reader
// ============================================================================

export class GeoPackageReader {
  constructor(
    public readonly name: string,
    public readonly path: string,
    private readonly db: Database.Database
  ) {}

  /**
   * Open a GeoPackage read-only
   *
   * @throws {DatasetUnreadableError} When the file is missing, is not SQLite,
   *   or lacks the gpkg_contents table
   */
  static open(handle: DatasetHandle): GeoPackageReader {
    let db: Database.Database | null = null;
    try {
      db = new Database(handle.path, { readonly: true, fileMustExist: true });
      const reader = new GeoPackageReader(handle.name, handle.path, db);
      reader.assertGeoPackage();
      return reader;
    } catch (error) {
      db?.close();
      if (error instanceof DatasetUnreadableError) throw error;
      throw new DatasetUnreadableError(handle.name, handle.path, error);
    }
  }

  /**
   * Verify the GeoPackage system tables are present
   *
   * @throws {DatasetUnreadableError}
   */
  assertGeoPackage(): void {
    const row = this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'gpkg_contents'"
      )
      .get();
    if (!row) {
      throw new DatasetUnreadableError(this.name, this.path, 'gpkg_contents table not found');
    }
  }

  /**
   * Feature and attribute tables in gpkg_contents order
   */
  listContents(): ContentsEntry[] {
    const rows = this.db
      .prepare<[], ContentsRow>(
        'SELECT table_name, data_type, identifier, description, srs_id FROM gpkg_contents ORDER BY rowid'
      )
      .all();

    const entries: ContentsEntry[] = [];
    for (const row of rows) {
      const dataType = row.data_type.toLowerCase();
      if (!isContentDataType(dataType)) continue;
      entries.push({
        tableName: row.table_name,
        dataType,
        identifier: row.identifier,
        description: row.description,
        srsId: row.srs_id,
      });
    }
    return entries;
  }

  /**
   * Columns of a table in declaration order
   *
   * @throws {Error} When the table does not exist
   */
  describeColumns(table: string): ColumnInfo[] {
    const rows = this.db
      .prepare<[], TableInfoRow>(`PRAGMA table_info(${quoteIdentifier(table)})`)
      .all();
    if (rows.length === 0) {
      throw new Error(`table "${table}" does not exist`);
    }
    return rows.map((row) => ({
      name: row.name,
      declaredType: row.type.trim().toUpperCase(),
      notNull: row.notnull === 1,
      primaryKey: row.pk > 0,
    }));
  }

  geometryColumn(table: string): GeometryColumnInfo | null {
    if (!this.hasTable('gpkg_geometry_columns')) return null;
    const row = this.db
      .prepare<[string], GeometryColumnsRow>(
        'SELECT column_name, geometry_type_name, srs_id FROM gpkg_geometry_columns WHERE table_name = ?'
      )
      .get(table);
    if (!row) return null;
    return {
      columnName: row.column_name,
      geometryTypeName: row.geometry_type_name.toUpperCase(),
      srsId: row.srs_id,
    };
  }

  spatialRefSys(srsId: number): SpatialRefSysEntry | null {
    if (!this.hasTable('gpkg_spatial_ref_sys')) return null;
    const row = this.db
      .prepare<[number], SpatialRefSysRow>(
        `SELECT srs_id, srs_name, organization, organization_coordsys_id, definition
         FROM gpkg_spatial_ref_sys WHERE srs_id = ?`
      )
      .get(srsId);
    if (!row) return null;
    return {
      srsId: row.srs_id,
      name: row.srs_name,
      organization: row.organization,
      organizationCoordsysId: row.organization_coordsys_id,
      definition: row.definition,
    };
  }

  countRows(table: string): number {
    const row = this.db
      .prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${quoteIdentifier(table)}`)
      .get();
    return row?.n ?? 0;
  }

  /**
   * First `limit` non-null values of a column in storage order
   */
  sampleValues(table: string, column: string, limit: number, orderBy: string | null): SqlValue[] {
    if (limit <= 0) return [];
    const col = quoteIdentifier(column);
    const order = orderBy ? ` ORDER BY ${quoteIdentifier(orderBy)}` : '';
    return this.db
      .prepare<[number], SqlValue[]>(
        `SELECT ${col} FROM ${quoteIdentifier(table)} WHERE ${col} IS NOT NULL${order} LIMIT ?`
      )
      .raw(true)
      .all(limit)
      .map((row) => row[0] ?? null);
  }

  columnStatistics(table: string, column: string): ColumnStatistics {
    const col = quoteIdentifier(column);
    const row = this.db
      .prepare<[], StatisticsRow>(
        `SELECT COUNT(${col}) AS non_null,
                COUNT(DISTINCT ${col}) AS distinct_count,
                MAX(LENGTH(${col})) AS max_length
         FROM ${quoteIdentifier(table)}`
      )
      .get();
    return {
      nonNullCount: row?.non_null ?? 0,
      distinctCount: row?.distinct_count ?? 0,
      maxLength: row?.max_length ?? 0,
    };
  }

  distinctValues(table: string, column: string): SqlValue[] {
    const col = quoteIdentifier(column);
    return this.db
      .prepare<[], SqlValue[]>(
        `SELECT DISTINCT ${col} FROM ${quoteIdentifier(table)} WHERE ${col} IS NOT NULL`
      )
      .raw(true)
      .all()
      .map((row) => row[0] ?? null);
  }

  /**
   * All rows of the given columns, as arrays in column order
   */
  readRows(table: string, columns: readonly string[], orderBy: string | null): SqlValue[][] {
    if (columns.length === 0) return [];
    const order = orderBy ? ` ORDER BY ${quoteIdentifier(orderBy)}` : '';
    return this.db
      .prepare<[], SqlValue[]>(
        `SELECT ${columns.map(quoteIdentifier).join(', ')} FROM ${quoteIdentifier(table)}${order}`
      )
      .raw(true)
      .all();
  }

  /**
   * Stream features with their geometry blob and selected attribute columns
   */
  *iterateFeatures(
    table: string,
    geometryColumn: string,
    propertyColumns: readonly string[],
    orderBy: string | null
  ): Generator<FeatureRow> {
    const columns = [geometryColumn, ...propertyColumns];
    const order = orderBy ? ` ORDER BY ${quoteIdentifier(orderBy)}` : '';
    const statement = this.db
      .prepare<[], SqlValue[]>(
        `SELECT ${columns.map(quoteIdentifier).join(', ')} FROM ${quoteIdentifier(table)}${order}`
      )
      .raw(true);

    for (const row of statement.iterate()) {
      const blob = row[0];
      const properties: Record<string, SqlValue> = {};
      propertyColumns.forEach((name, index) => {
        properties[name] = row[index + 1] ?? null;
      });
      yield {
        geometry: blob instanceof Uint8Array ? blob : null,
        properties,
      };
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private hasTable(name: string): boolean {
    return (
      this.db
        .prepare<[string], { name: string }>(
          "SELECT name FROM sqlite_master WHERE type IN ('table', 'view') AND name = ?"
        )
        .get(name) !== undefined
    );
  }
}
