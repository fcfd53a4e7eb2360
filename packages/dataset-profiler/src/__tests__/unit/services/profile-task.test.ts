/**
 * Profile task tests
 *
 * Tasks run in this process here; the pooled path is covered by the
 * DatasetProfiler tests.
 */

import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG } from '../../../core/config.js';
import { ProfileTaskResultSchema, runProfileTask, type ProfileTask } from '../../../services/profile-task.js';
import { buildRegionsPackage, makeTempDir, writeGeoPackageFile } from '../../utils/fixtures.js';

describe('runProfileTask', () => {
  let dir: string;
  let regionsPath: string;

  beforeEach(() => {
    dir = makeTempDir();
    regionsPath = writeGeoPackageFile(join(dir, 'regions.gpkg'), buildRegionsPackage);
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  function taskFor(path: string, name: string): ProfileTask {
    return {
      handle: { name, path },
      metadata: [{ key: 'title', value: 'Regions' }],
      generatedAt: '2024-05-01T12:00:00.000Z',
      config: DEFAULT_CONFIG,
      log: { level: 'error', json: false },
    };
  }

  it('profiles the dataset named by the task', () => {
    const result = runProfileTask(taskFor(regionsPath, 'regions'));

    if (result.status !== 'fulfilled') {
      throw new Error(`expected a Document, got ${result.message}`);
    }
    expect(result.document.title).toBe('Regions');
    expect(result.document.generatedAt).toBe('2024-05-01T12:00:00.000Z');
    expect(result.document.metadata).toEqual([{ key: 'title', value: 'Regions' }]);
    expect(result.document.codeLists.map((list) => list.id)).toEqual(['table:code_region_type']);
  });

  it('reports a dataset that cannot be opened', () => {
    const result = runProfileTask(taskFor(join(dir, 'missing.gpkg'), 'missing'));

    expect(result).toMatchObject({ status: 'rejected', code: 'DATASET_UNREADABLE' });
  });

  it('rejects a malformed task', () => {
    const result = runProfileTask({ handle: { name: 'regions' } });

    expect(result).toMatchObject({ status: 'rejected', code: 'CONFIGURATION_INVALID' });
    expect(result.status === 'rejected' && result.message).toMatch(/^Malformed profile task: /);
  });
});

describe('ProfileTaskResultSchema', () => {
  it('accepts both result shapes', () => {
    expect(ProfileTaskResultSchema.safeParse({ status: 'rejected', code: 'NO_DATASETS', message: 'none' }).success).toBe(
      true
    );
    expect(ProfileTaskResultSchema.safeParse({ status: 'fulfilled', document: { title: 'Regions' } }).success).toBe(
      true
    );
  });

  it('rejects unknown codes and non-object documents', () => {
    expect(ProfileTaskResultSchema.safeParse({ status: 'rejected', code: 'BOGUS', message: 'x' }).success).toBe(false);
    expect(ProfileTaskResultSchema.safeParse({ status: 'fulfilled', document: 'regions' }).success).toBe(false);
  });
});
