/**
 * GeoPackage test fixtures
 *
 * Builds minimal GeoPackages in better-sqlite3 databases: the three system
 * tables the profiler reads, feature and attribute tables, and geometry
 * blobs encoded with wkx behind a GeoPackage binary header.
 */

import Database from 'better-sqlite3';
import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import wkx from 'wkx';
import type { Geometry } from 'geojson';
import { DiagnosticsCollector } from '../../core/diagnostics.js';
import { GeoPackageReader, quoteIdentifier } from '../../reader/geopackage-reader.js';
import type { SqlValue } from '../../reader/types.js';

export const WGS84_WKT =
  'GEOGCS["WGS 84",DATUM["WGS_1984",SPHEROID["WGS 84",6378137,298.257223563]],PRIMEM["Greenwich",0],UNIT["degree",0.0174532925199433]]';

export interface ColumnDefinition {
  readonly name: string;
  readonly type: string;
}

export interface FeatureTableOptions {
  readonly name: string;
  readonly columns?: readonly ColumnDefinition[];
  readonly geometryColumn?: string;
  readonly geometryType?: string;
  readonly srsId?: number;
  readonly description?: string;
}

export interface AttributeTableOptions {
  readonly name: string;
  readonly columns: readonly ColumnDefinition[];
  /** Declare `fid INTEGER PRIMARY KEY` first (default true) */
  readonly withKey?: boolean;
  readonly description?: string;
}

export interface SpatialRefSysOptions {
  readonly srsId: number;
  readonly name: string;
  readonly organization: string;
  readonly code: number;
  readonly definition: string;
}

export type FixtureRow = Readonly<Record<string, SqlValue>>;

/**
 * Empty GeoPackage with the default reference systems (4326, -1, 0)
 */
export function createGeoPackageDb(filename = ':memory:'): Database.Database {
  const db = new Database(filename);
  db.exec(`
    CREATE TABLE gpkg_spatial_ref_sys (
      srs_name TEXT NOT NULL,
      srs_id INTEGER PRIMARY KEY,
      organization TEXT NOT NULL,
      organization_coordsys_id INTEGER NOT NULL,
      definition TEXT NOT NULL,
      description TEXT
    );
    CREATE TABLE gpkg_contents (
      table_name TEXT NOT NULL PRIMARY KEY,
      data_type TEXT NOT NULL,
      identifier TEXT UNIQUE,
      description TEXT DEFAULT '',
      last_change DATETIME NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
      min_x DOUBLE, min_y DOUBLE, max_x DOUBLE, max_y DOUBLE,
      srs_id INTEGER
    );
    CREATE TABLE gpkg_geometry_columns (
      table_name TEXT NOT NULL,
      column_name TEXT NOT NULL,
      geometry_type_name TEXT NOT NULL,
      srs_id INTEGER NOT NULL,
      z TINYINT NOT NULL,
      m TINYINT NOT NULL,
      PRIMARY KEY (table_name, column_name)
    );
  `);
  addSpatialRefSys(db, { srsId: 4326, name: 'WGS 84', organization: 'EPSG', code: 4326, definition: WGS84_WKT });
  addSpatialRefSys(db, { srsId: -1, name: 'Undefined cartesian SRS', organization: 'NONE', code: -1, definition: 'undefined' });
  addSpatialRefSys(db, { srsId: 0, name: 'Undefined geographic SRS', organization: 'NONE', code: 0, definition: 'undefined' });
  return db;
}

export function addSpatialRefSys(db: Database.Database, srs: SpatialRefSysOptions): void {
  db.prepare(
    `INSERT INTO gpkg_spatial_ref_sys (srs_name, srs_id, organization, organization_coordsys_id, definition)
     VALUES (?, ?, ?, ?, ?)`
  ).run(srs.name, srs.srsId, srs.organization, srs.code, srs.definition);
}

function columnDefinitions(columns: readonly ColumnDefinition[]): string[] {
  return columns.map((column) => `${quoteIdentifier(column.name)} ${column.type}`);
}

function registerContents(
  db: Database.Database,
  table: string,
  dataType: string,
  description: string,
  srsId: number | null
): void {
  db.prepare(
    'INSERT INTO gpkg_contents (table_name, data_type, identifier, description, srs_id) VALUES (?, ?, ?, ?, ?)'
  ).run(table, dataType, table, description, srsId);
}

/**
 * Feature table `fid INTEGER PRIMARY KEY, geom <TYPE>, ...columns`
 */
export function addFeatureTable(db: Database.Database, table: FeatureTableOptions): void {
  const geometryColumn = table.geometryColumn ?? 'geom';
  const geometryType = table.geometryType ?? 'POINT';
  const srsId = table.srsId ?? 4326;
  const definitions = [
    '"fid" INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL',
    `${quoteIdentifier(geometryColumn)} ${geometryType}`,
    ...columnDefinitions(table.columns ?? []),
  ];
  db.exec(`CREATE TABLE ${quoteIdentifier(table.name)} (${definitions.join(', ')})`);
  registerContents(db, table.name, 'features', table.description ?? '', srsId);
  db.prepare(
    'INSERT INTO gpkg_geometry_columns (table_name, column_name, geometry_type_name, srs_id, z, m) VALUES (?, ?, ?, ?, 0, 0)'
  ).run(table.name, geometryColumn, geometryType, srsId);
}

/**
 * Attribute (non-spatial) table, by default keyed by `fid INTEGER PRIMARY KEY`
 */
export function addAttributeTable(db: Database.Database, table: AttributeTableOptions): void {
  const definitions = [
    ...(table.withKey === false ? [] : ['"fid" INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL']),
    ...columnDefinitions(table.columns),
  ];
  db.exec(`CREATE TABLE ${quoteIdentifier(table.name)} (${definitions.join(', ')})`);
  registerContents(db, table.name, 'attributes', table.description ?? '', null);
}

export function insertRows(db: Database.Database, table: string, rows: readonly FixtureRow[]): void {
  const insert = db.transaction((batch: readonly FixtureRow[]) => {
    for (const row of batch) {
      const names = Object.keys(row);
      db.prepare(
        `INSERT INTO ${quoteIdentifier(table)} (${names.map(quoteIdentifier).join(', ')}) VALUES (${names.map(() => '?').join(', ')})`
      ).run(...names.map((name) => row[name] ?? null));
    }
  });
  insert(rows);
}

export interface BlobOptions {
  readonly srsId?: number;
  /** Write an [minx, maxx, miny, maxy] envelope (indicator 1) */
  readonly envelope?: readonly [number, number, number, number];
}

/**
 * GeoPackage geometry blob: little-endian header followed by wkx WKB
 */
export function encodeGeometryBlob(geometry: Geometry, options: BlobOptions = {}): Buffer {
  const envelope = options.envelope;
  const header = Buffer.alloc(8 + (envelope ? 32 : 0));
  header.write('GP', 0, 'ascii');
  header.writeUInt8(0, 2);
  header.writeUInt8(envelope ? 0x03 : 0x01, 3);
  header.writeInt32LE(options.srsId ?? 4326, 4);
  envelope?.forEach((value, index) => header.writeDoubleLE(value, 8 + index * 8));
  return Buffer.concat([header, wkx.Geometry.parseGeoJSON(geometry).toWkb()]);
}

/**
 * Blob flagged as an empty geometry
 */
export function emptyGeometryBlob(srsId = 4326): Buffer {
  const header = Buffer.alloc(8);
  header.write('GP', 0, 'ascii');
  header.writeUInt8(0x11, 3);
  header.writeInt32LE(srsId, 4);
  return header;
}

export function point(x: number, y: number): Geometry {
  return { type: 'Point', coordinates: [x, y] };
}

export function square(x: number, y: number, size: number): Geometry {
  return {
    type: 'Polygon',
    coordinates: [
      [
        [x, y],
        [x + size, y],
        [x + size, y + size],
        [x, y + size],
        [x, y],
      ],
    ],
  };
}

export function openFixtureReader(db: Database.Database, name = 'fixture'): GeoPackageReader {
  return new GeoPackageReader(name, `/data/${name}.gpkg`, db);
}

export function collector(dataset = 'fixture'): DiagnosticsCollector {
  return new DiagnosticsCollector(dataset);
}

export function makeTempDir(prefix = 'dataset-profiler-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * Build a GeoPackage file on disk and close it
 */
export function writeGeoPackageFile(path: string, build: (db: Database.Database) => void): string {
  const db = createGeoPackageDb(path);
  try {
    build(db);
  } finally {
    db.close();
  }
  return path;
}

/**
 * The region sample used across tests: a spatial `regions` layer with a
 * `region_type` field, and a `code_region_type` Code Table with a duplicate
 * R1 row
 */
export function buildRegionsPackage(db: Database.Database): void {
  addFeatureTable(db, {
    name: 'regions',
    geometryType: 'POLYGON',
    columns: [
      { name: 'name', type: 'TEXT' },
      { name: 'region_type', type: 'TEXT(4)' },
      { name: 'population', type: 'INTEGER' },
    ],
    description: 'Administrative regions',
  });
  insertRows(db, 'regions', [
    { geom: encodeGeometryBlob(square(0, 0, 1)), name: 'North', region_type: 'R1', population: 1200 },
    { geom: encodeGeometryBlob(square(1, 0, 1)), name: 'South', region_type: 'R2', population: null },
    { geom: encodeGeometryBlob(square(0, 1, 1)), name: 'East', region_type: 'R1', population: 800 },
  ]);

  addAttributeTable(db, {
    name: 'code_region_type',
    columns: [
      { name: 'code', type: 'TEXT' },
      { name: 'label', type: 'TEXT' },
    ],
  });
  insertRows(db, 'code_region_type', [
    { code: 'R1', label: 'Region One' },
    { code: 'R2', label: 'Region Two' },
    { code: 'R1', label: 'Region One (duplicate)' },
  ]);
}
