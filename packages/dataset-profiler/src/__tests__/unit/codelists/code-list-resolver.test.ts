/**
 * Code List Resolver tests
 */

import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { qualifiesAsCodeList, resolveCodeLists } from '../../../codelists/code-list-resolver.js';
import { DEFAULT_CONFIG } from '../../../core/config.js';
import type { DatasetCatalog } from '../../../core/types/dataset.js';
import { extractSchema } from '../../../schema/schema-extractor.js';
import {
  addAttributeTable,
  buildRegionsPackage,
  collector,
  createGeoPackageDb,
  insertRows,
  openFixtureReader,
} from '../../utils/fixtures.js';

const OPTIONS = { codeTablePrefix: 'code_', heuristic: DEFAULT_CONFIG.codeLists };

function resolve(db: Database.Database, diagnostics = collector()) {
  const reader = openFixtureReader(db);
  const catalog = extractSchema(reader, { sampleSize: 5, codeTablePrefix: 'code_' }, diagnostics);
  return resolveCodeLists(reader, catalog, OPTIONS, diagnostics);
}

describe('qualifiesAsCodeList', () => {
  const heuristic = DEFAULT_CONFIG.codeLists;

  it('accepts short low-cardinality values', () => {
    expect(qualifiesAsCodeList({ nonNullCount: 50, distinctCount: 3, maxLength: 10 }, heuristic)).toBe(true);
    expect(qualifiesAsCodeList({ nonNullCount: 200, distinctCount: 25, maxLength: 40 }, heuristic)).toBe(true);
  });

  it('rejects high cardinality regardless of length', () => {
    expect(qualifiesAsCodeList({ nonNullCount: 50, distinctCount: 40, maxLength: 2 }, heuristic)).toBe(false);
  });

  it('rejects long values, too many values and empty columns', () => {
    expect(qualifiesAsCodeList({ nonNullCount: 50, distinctCount: 3, maxLength: 41 }, heuristic)).toBe(false);
    expect(qualifiesAsCodeList({ nonNullCount: 200, distinctCount: 26, maxLength: 4 }, heuristic)).toBe(false);
    expect(qualifiesAsCodeList({ nonNullCount: 0, distinctCount: 0, maxLength: 0 }, heuristic)).toBe(false);
  });
});

describe('resolveCodeLists', () => {
  let db: Database.Database;

  afterEach(() => {
    vi.restoreAllMocks();
  });

  beforeEach(() => {
    db = createGeoPackageDb();
    buildRegionsPackage(db);
  });

  it('binds a Code Table to the field of the same name', () => {
    const lists = resolve(db);

    expect(lists).toEqual([
      {
        id: 'table:code_region_type',
        source: { kind: 'table', layer: 'code_region_type' },
        entries: [
          { code: { kind: 'text', value: 'R1' }, label: 'Region One' },
          { code: { kind: 'text', value: 'R2' }, label: 'Region Two' },
        ],
        bindings: [{ layer: 'regions', field: 'region_type', match: 'exact' }],
      },
    ]);
  });

  it('infers a CodeList from a short low-cardinality text field', () => {
    addAttributeTable(db, {
      name: 'inspections',
      columns: [
        { name: 'outcome', type: 'TEXT' },
        { name: 'inspector', type: 'TEXT' },
        { name: 'region_type', type: 'TEXT' },
      ],
    });
    const outcomes = ['pass', 'reinspect', 'fail'];
    insertRows(
      db,
      'inspections',
      Array.from({ length: 50 }, (_, index) => ({
        outcome: outcomes[index % 3] ?? null,
        inspector: `inspector-${index % 40}`,
        region_type: index % 2 === 0 ? 'R1' : 'R2',
      }))
    );

    const lists = resolve(db);

    expect(lists.map((list) => list.id)).toEqual(['table:code_region_type', 'inferred:inspections.outcome']);
    expect(lists[0]?.bindings).toEqual([
      { layer: 'regions', field: 'region_type', match: 'exact' },
      { layer: 'inspections', field: 'region_type', match: 'exact' },
    ]);
    expect(lists[1]).toEqual({
      id: 'inferred:inspections.outcome',
      source: { kind: 'inferred', layer: 'inspections', field: 'outcome' },
      entries: [
        { code: { kind: 'text', value: 'fail' }, label: null },
        { code: { kind: 'text', value: 'pass' }, label: null },
        { code: { kind: 'text', value: 'reinspect' }, label: null },
      ],
      bindings: [{ layer: 'inspections', field: 'outcome', match: 'inferred' }],
    });
  });

  it('breaks ambiguous bindings deterministically and warns', () => {
    addAttributeTable(db, { name: 'sites', columns: [{ name: 'type_code', type: 'TEXT' }] });
    addAttributeTable(db, { name: 'code_types', columns: [{ name: 'code', type: 'TEXT' }] });
    addAttributeTable(db, { name: 'code_type', columns: [{ name: 'code', type: 'TEXT' }] });
    insertRows(db, 'code_type', [{ code: 'A' }, { code: 'B' }]);
    const diagnostics = collector();

    const lists = resolve(db, diagnostics);

    expect(lists.find((list) => list.id === 'table:code_type')?.bindings).toEqual([
      { layer: 'sites', field: 'type_code', match: 'variant' },
    ]);
    expect(lists.find((list) => list.id === 'table:code_types')?.bindings).toEqual([]);
    expect(lists.find((list) => list.id === 'table:code_type')?.entries).toEqual([
      { code: { kind: 'text', value: 'A' }, label: null },
      { code: { kind: 'text', value: 'B' }, label: null },
    ]);
    expect(diagnostics.list()).toEqual([
      {
        dataset: 'fixture',
        code: 'CODE_LIST_AMBIGUOUS_BINDING',
        layer: 'sites',
        field: 'type_code',
        message:
          'Field sites.type_code matches 2 Code Tables (code_type, code_types) as variant; ' +
          'bound to code_type (shortest name, then alphabetical)',
      },
    ]);
  });

  it('keeps an empty Code Table as an empty CodeList', () => {
    db.exec('DELETE FROM code_region_type');

    const [list] = resolve(db);

    expect(list?.entries).toEqual([]);
    expect(list?.bindings).toHaveLength(1);
  });

  it('skips a Code Table that cannot be read', () => {
    const reader = openFixtureReader(db);
    const catalog: DatasetCatalog = {
      name: 'fixture',
      path: '/data/fixture.gpkg',
      layers: [
        {
          name: 'code_vanished',
          kind: 'attribute',
          isCodeTable: true,
          description: null,
          fields: [
            { name: 'code', type: 'text', nativeType: 'TEXT', nullable: true, primaryKey: false, samples: [] },
          ],
          rowCount: 0,
          geometryColumn: null,
          geometryType: null,
          referenceSystem: null,
        },
      ],
    };
    const diagnostics = collector();

    const lists = resolveCodeLists(reader, catalog, OPTIONS, diagnostics);

    expect(lists).toEqual([]);
    expect(diagnostics.counts()).toEqual({ LAYER_UNREADABLE: 1 });
  });

  it('records a field whose statistics cannot be read and keeps the other lists', () => {
    const reader = openFixtureReader(db);
    const columnStatistics = reader.columnStatistics.bind(reader);
    vi.spyOn(reader, 'columnStatistics').mockImplementation((table, column) => {
      if (column === 'name') throw new Error('database disk image is malformed');
      return columnStatistics(table, column);
    });
    const diagnostics = collector();
    const catalog = extractSchema(reader, { sampleSize: 5, codeTablePrefix: 'code_' }, diagnostics);

    const lists = resolveCodeLists(reader, catalog, OPTIONS, diagnostics);

    expect(lists.map((list) => list.id)).toEqual(['table:code_region_type']);
    expect(diagnostics.list()).toEqual([
      {
        dataset: 'fixture',
        code: 'FIELD_UNREADABLE',
        layer: 'regions',
        field: 'name',
        message: 'Statistics for regions.name could not be read: database disk image is malformed',
      },
    ]);
  });
});
