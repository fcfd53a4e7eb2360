/**
 * Profile command tests
 */

import { existsSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { exitCodeFor, runProfileCommand } from '../../../cli/commands/profile.js';
import { EXIT_CODES } from '../../../cli/lib/exit-codes.js';
import { createLogger } from '../../../core/utils/logger.js';
import { buildRegionsPackage, makeTempDir, writeGeoPackageFile } from '../../utils/fixtures.js';

describe('exitCodeFor', () => {
  it('maps run outcomes to exit codes', () => {
    expect(exitCodeFor({ failures: [], counts: {} })).toBe(EXIT_CODES.SUCCESS);
    expect(exitCodeFor({ failures: [], counts: { GEOMETRY_UNREADABLE: 3 } })).toBe(EXIT_CODES.WARNINGS);
    expect(
      exitCodeFor({
        failures: [{ dataset: 'roads', path: '/data/roads.gpkg', code: 'DATASET_UNREADABLE', message: 'gone' }],
        counts: { DATASET_UNREADABLE: 1 },
      })
    ).toBe(EXIT_CODES.ERRORS);
  });
});

describe('runProfileCommand', () => {
  let dir: string;
  let log: MockInstance<typeof console.log>;
  let errors: MockInstance<typeof console.error>;
  const context = () => ({
    cwd: dir,
    env: { DATASET_PROFILER_CONCURRENCY: '1' },
    logger: createLogger({ level: 'error' }),
  });

  beforeEach(() => {
    dir = makeTempDir();
    writeGeoPackageFile(join(dir, 'regions.gpkg'), buildRegionsPackage);
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    errors = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes one Document per dataset', async () => {
    const code = await runProfileCommand(['regions.gpkg'], { out: 'out', json: true }, context());

    expect(code).toBe(EXIT_CODES.SUCCESS);
    const written: unknown = JSON.parse(readFileSync(join(dir, 'out', 'regions.json'), 'utf8'));
    expect(written).toMatchObject({
      dataset: { name: 'regions', fileName: 'regions.gpkg', path: join(dir, 'regions.gpkg') },
      codeLists: [{ id: 'table:code_region_type' }],
    });

    expect(log).toHaveBeenCalledTimes(1);
    const summary: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(summary).toMatchObject({
      written: [join(dir, 'out', 'regions.json')],
      failures: [],
      warnings: {},
      exitCode: 0,
    });
  });

  it('attaches descriptive metadata', async () => {
    writeFileSync(join(dir, 'metadata.yaml'), 'regions:\n  title: Regions of the test area\n');

    await runProfileCommand(['regions.gpkg'], { out: 'out', metadata: 'metadata.yaml' }, context());

    const written: unknown = JSON.parse(readFileSync(join(dir, 'out', 'regions.json'), 'utf8'));
    expect(written).toMatchObject({
      title: 'Regions of the test area',
      metadata: [{ key: 'title', value: 'Regions of the test area' }],
    });
  });

  it('exits with the error code when a dataset fails', async () => {
    const code = await runProfileCommand(['regions.gpkg', 'missing.gpkg'], { out: 'out' }, context());

    expect(code).toBe(EXIT_CODES.ERRORS);
    expect(existsSync(join(dir, 'out', 'regions.json'))).toBe(true);
    expect(existsSync(join(dir, 'out', 'missing.json'))).toBe(false);
    expect(log).toHaveBeenCalledWith('Failed datasets: 1');
  });

  it('exits with the configuration code for invalid options', async () => {
    const code = await runProfileCommand(['regions.gpkg'], { concurrency: 'lots' }, context());

    expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(errors).toHaveBeenCalledWith(expect.stringMatching(/^Configuration error: Invalid profiler configuration/));
    expect(existsSync(join(dir, 'profiles'))).toBe(false);
  });

  it('exits with the configuration code for an unsupported metadata file', async () => {
    const code = await runProfileCommand(['regions.gpkg'], { metadata: 'metadata.txt' }, context());

    expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
  });

  it('reports a repeated dataset name as a failed dataset', async () => {
    const code = await runProfileCommand(['regions.gpkg', './regions.gpkg'], { out: 'out' }, context());

    expect(code).toBe(EXIT_CODES.ERRORS);
    expect(existsSync(join(dir, 'out', 'regions.json'))).toBe(true);
    expect(log).toHaveBeenCalledWith(
      `  [DATASET_NAME_DUPLICATE] regions: Dataset name "regions" is already used by ${join(dir, 'regions.gpkg')}`
    );
  });
});
