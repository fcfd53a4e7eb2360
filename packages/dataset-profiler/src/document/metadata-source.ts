/**
 * Descriptive metadata sources
 *
 * A MetadataSource answers "what descriptive key/value pairs belong to this
 * dataset name?". Lookups are exact on the dataset name (the file name
 * without extension); unmatched entries are never reported.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import * as XLSX from 'xlsx';
import { parseDocument } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import type { DescriptiveMetadata, MetadataEntry } from '../core/types/document.js';

export interface MetadataSource {
  lookup(datasetName: string): DescriptiveMetadata | undefined;
}

/** Sheet and key column read from a metadata workbook */
export const METADATA_SHEET = 'metadata';
export const METADATA_KEY_COLUMN = 'dataset';

export class InMemoryMetadataSource implements MetadataSource {
  private readonly entries: ReadonlyMap<string, DescriptiveMetadata>;

  constructor(entries: Iterable<readonly [string, DescriptiveMetadata]> = []) {
    this.entries = new Map(entries);
  }

  lookup(datasetName: string): DescriptiveMetadata | undefined {
    return this.entries.get(datasetName);
  }

  get size(): number {
    return this.entries.size;
  }
}

// ============================================================================
// YAML / JSON
// ============================================================================

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const KeySchema = z.union([z.string(), z.number(), z.boolean()]);
// Maps rather than objects so key order survives parsing
const MetadataFileSchema = z.map(KeySchema, z.map(KeySchema, ScalarSchema)).nullable();

/**
 * Parse a YAML or JSON document keyed by dataset name
 *
 * ```yaml
 * roads:
 *   title: Road network
 *   license: CC-BY-4.0
 * ```
 */
export function parseMetadataDocument(content: string, origin = 'metadata'): InMemoryMetadataSource {
  const document = parseDocument(content);
  const [syntaxError] = document.errors;
  if (syntaxError) {
    throw new ConfigurationError(`Invalid metadata file ${origin}: ${syntaxError.message}`);
  }

  const parsed = MetadataFileSchema.safeParse(document.toJS({ mapAsMap: true }));
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid metadata file ${origin}`,
      'CONFIGURATION_INVALID',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const entries: Array<readonly [string, DescriptiveMetadata]> = [];
  for (const [dataset, values] of parsed.data ?? []) {
    const metadata: MetadataEntry[] = [];
    for (const [key, value] of values) {
      if (value !== null) metadata.push({ key: String(key), value: String(value) });
    }
    entries.push([String(dataset), metadata]);
  }
  return new InMemoryMetadataSource(entries);
}

export async function loadMetadataFile(path: string): Promise<InMemoryMetadataSource> {
  return parseMetadataDocument(await readFile(path, 'utf8'), path);
}

// ============================================================================
// Spreadsheet
// ============================================================================

function cellText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'number' && Number.isNaN(value)) return null;
  const text = String(value);
  return text.trim() === '' ? null : text;
}

/**
 * Read the `metadata` sheet of a workbook: one row per dataset, keyed by the
 * `dataset` column. Blank cells are dropped, the first row for a name wins.
 */
export function parseMetadataWorkbook(buffer: Buffer, origin = 'workbook'): InMemoryMetadataSource {
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const sheet = workbook.Sheets[METADATA_SHEET];
  if (!sheet) {
    throw new ConfigurationError(`Workbook ${origin} has no "${METADATA_SHEET}" sheet`);
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false, defval: null });
  const [header, ...body] = rows;
  const columns = (header ?? []).map((cell) => cellText(cell));
  const keyIndex = columns.indexOf(METADATA_KEY_COLUMN);
  if (keyIndex === -1) {
    throw new ConfigurationError(`Sheet "${METADATA_SHEET}" of ${origin} has no "${METADATA_KEY_COLUMN}" column`);
  }

  const entries = new Map<string, DescriptiveMetadata>();
  for (const row of body) {
    const dataset = cellText(row[keyIndex]);
    if (dataset === null || entries.has(dataset)) continue;

    const metadata: MetadataEntry[] = [];
    columns.forEach((column, index) => {
      if (column === null || index === keyIndex) return;
      const value = cellText(row[index]);
      if (value !== null) metadata.push({ key: column, value });
    });
    entries.set(dataset, metadata);
  }
  return new InMemoryMetadataSource(entries);
}

export async function loadMetadataWorkbook(path: string): Promise<InMemoryMetadataSource> {
  return parseMetadataWorkbook(await readFile(path), path);
}

/**
 * Pick the loader by file extension
 */
export async function loadMetadataSource(path: string): Promise<InMemoryMetadataSource> {
  const extension = extname(path).toLowerCase();
  if (extension === '.xlsx' || extension === '.xls') {
    return loadMetadataWorkbook(path);
  }
  if (extension === '.yaml' || extension === '.yml' || extension === '.json') {
    return loadMetadataFile(path);
  }
  throw new ConfigurationError(`Unsupported metadata file type "${extension}" (${path})`);
}
