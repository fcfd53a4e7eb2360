/**
 * GeoPackage reader tests
 */

import Database from 'better-sqlite3';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatasetUnreadableError } from '../../../core/errors.js';
import {
  GeoPackageReader,
  datasetNameFromPath,
  handleFromPath,
  quoteIdentifier,
} from '../../../reader/geopackage-reader.js';
import {
  addAttributeTable,
  addFeatureTable,
  createGeoPackageDb,
  encodeGeometryBlob,
  insertRows,
  makeTempDir,
  openFixtureReader,
  point,
  writeGeoPackageFile,
} from '../../utils/fixtures.js';

describe('path helpers', () => {
  it('names a dataset after its file without extension', () => {
    expect(datasetNameFromPath('/data/roads.v2.gpkg')).toBe('roads.v2');
    expect(handleFromPath('/data/rivers.gpkg')).toEqual({ name: 'rivers', path: '/data/rivers.gpkg' });
  });

  it('quotes identifiers', () => {
    expect(quoteIdentifier('odd"name')).toBe('"odd""name"');
  });
});

describe('GeoPackageReader', () => {
  let db: Database.Database;
  let reader: GeoPackageReader;

  beforeEach(() => {
    db = createGeoPackageDb();
    addFeatureTable(db, {
      name: 'wells',
      columns: [
        { name: 'status', type: 'text(12)' },
        { name: 'depth', type: 'REAL' },
      ],
    });
    addAttributeTable(db, { name: 'inspections', columns: [{ name: 'note', type: 'TEXT' }] });
    db.prepare("INSERT INTO gpkg_contents (table_name, data_type) VALUES ('tiles_base', 'tiles')").run();
    insertRows(db, 'wells', [
      { fid: 3, geom: encodeGeometryBlob(point(3, 3)), status: 'dry', depth: 12.5 },
      { fid: 1, geom: encodeGeometryBlob(point(1, 1)), status: null, depth: 4 },
      { fid: 2, geom: null, status: 'active', depth: null },
      { fid: 4, geom: encodeGeometryBlob(point(4, 4)), status: 'active', depth: 7 },
    ]);
    reader = openFixtureReader(db);
  });

  afterEach(() => {
    reader.close();
  });

  it('lists feature and attribute tables in contents order', () => {
    expect(reader.listContents().map((entry) => [entry.tableName, entry.dataType])).toEqual([
      ['wells', 'features'],
      ['inspections', 'attributes'],
    ]);
  });

  it('describes columns in declaration order', () => {
    expect(reader.describeColumns('wells')).toEqual([
      { name: 'fid', declaredType: 'INTEGER', notNull: true, primaryKey: true },
      { name: 'geom', declaredType: 'POINT', notNull: false, primaryKey: false },
      { name: 'status', declaredType: 'TEXT(12)', notNull: false, primaryKey: false },
      { name: 'depth', declaredType: 'REAL', notNull: false, primaryKey: false },
    ]);
  });

  it('throws when describing a missing table', () => {
    expect(() => reader.describeColumns('nope')).toThrow('table "nope" does not exist');
  });

  it('reads the geometry column and its reference system', () => {
    expect(reader.geometryColumn('wells')).toEqual({ columnName: 'geom', geometryTypeName: 'POINT', srsId: 4326 });
    expect(reader.geometryColumn('inspections')).toBeNull();
    expect(reader.spatialRefSys(4326)).toMatchObject({ organization: 'EPSG', organizationCoordsysId: 4326 });
    expect(reader.spatialRefSys(9999)).toBeNull();
  });

  it('samples non-null values in key order', () => {
    expect(reader.sampleValues('wells', 'status', 5, 'fid')).toEqual(['active', 'dry', 'active']);
    expect(reader.sampleValues('wells', 'status', 2, 'fid')).toEqual(['active', 'dry']);
    expect(reader.sampleValues('wells', 'status', 0, 'fid')).toEqual([]);
  });

  it('computes column statistics', () => {
    expect(reader.countRows('wells')).toBe(4);
    expect(reader.columnStatistics('wells', 'status')).toEqual({
      nonNullCount: 3,
      distinctCount: 2,
      maxLength: 6,
    });
  });

  it('iterates features with their properties', () => {
    const rows = [...reader.iterateFeatures('wells', 'geom', ['status'], 'fid')];
    expect(rows.map((row) => row.properties['status'])).toEqual([null, 'active', 'dry', 'active']);
    expect(rows[1]?.geometry).toBeNull();
    expect(rows[0]?.geometry).toBeInstanceOf(Uint8Array);
  });
});

describe('GeoPackageReader.open', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('opens a GeoPackage file read-only', () => {
    const path = writeGeoPackageFile(join(dir, 'parcels.gpkg'), (db) => {
      addAttributeTable(db, { name: 'owners', columns: [{ name: 'name', type: 'TEXT' }] });
    });
    const reader = GeoPackageReader.open(handleFromPath(path));
    try {
      expect(reader.name).toBe('parcels');
      expect(reader.listContents()).toHaveLength(1);
    } finally {
      reader.close();
    }
  });

  it('fails on a missing file', () => {
    expect(() => GeoPackageReader.open({ name: 'ghost', path: join(dir, 'ghost.gpkg') })).toThrow(
      DatasetUnreadableError
    );
  });

  it('fails on a SQLite file without gpkg_contents', () => {
    const path = join(dir, 'plain.gpkg');
    const plain = new Database(path);
    plain.exec('CREATE TABLE t (x INTEGER)');
    plain.close();

    let caught: unknown;
    try {
      GeoPackageReader.open({ name: 'plain', path });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DatasetUnreadableError);
    expect(caught).toMatchObject({ code: 'DATASET_UNREADABLE', dataset: 'plain' });
  });
});
