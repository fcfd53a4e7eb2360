/**
 * Dataset Profiler Service
 *
 * Runs the per-dataset pipeline (schema extraction, then CodeList resolution
 * and preview construction, then assembly) over an explicit list of dataset
 * handles. Datasets are independent: one that cannot be opened, or whose
 * name repeats an earlier one, is reported as a failure and the others
 * still produce Documents.
 *
 * With `concurrency` 1 everything runs in this process. Otherwise datasets
 * are spread over up to `concurrency` worker processes. Results are keyed by
 * dataset name, in input order.
 */

import { resolveConfig, type ProfilerConfig, type ProfilerConfigInput } from '../core/config.js';
import { countWarnings, mergeCounts, type DiagnosticCounts } from '../core/diagnostics.js';
import { ConfigurationError, describeCause, isProfilerError, type ProfilerErrorCode } from '../core/errors.js';
import type { DatasetHandle } from '../core/types/dataset.js';
import type { ProfileDocument } from '../core/types/document.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import { deepFreeze, systemClock, type Clock } from '../document/document-assembler.js';
import type { MetadataSource } from '../document/metadata-source.js';
import { profileDataset } from './profile-pipeline.js';
import type { ProfileTask, ProfileTaskResult } from './profile-task.js';
import { ProfileWorkerPool } from './worker-pool.js';

export interface DatasetProfilerOptions {
  readonly config?: ProfilerConfigInput;
  readonly metadata?: MetadataSource;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export interface DatasetFailure {
  readonly dataset: string;
  readonly path: string;
  readonly code: ProfilerErrorCode;
  readonly message: string;
}

export interface ProfileRunResult {
  /** Documents keyed by dataset name, in input order */
  readonly documents: ReadonlyMap<string, ProfileDocument>;
  /** In input order */
  readonly failures: readonly DatasetFailure[];
  /** Diagnostic occurrences per code across the run */
  readonly counts: DiagnosticCounts;
  readonly durationMs: number;
}

export class DatasetProfiler {
  readonly config: ProfilerConfig;
  private readonly metadata: MetadataSource | undefined;
  private readonly clock: Clock;
  private readonly log: Logger;

  /**
   * @throws {ConfigurationError} When the configuration is invalid
   */
  constructor(options: DatasetProfilerOptions = {}) {
    this.config = resolveConfig(options.config);
    this.metadata = options.metadata;
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? defaultLogger).child({ module: 'dataset-profiler' });
  }

  /**
   * Profile a single dataset in this process
   *
   * @throws {DatasetUnreadableError} When the dataset cannot be opened
   */
  profile(handle: DatasetHandle): ProfileDocument {
    return profileDataset(handle, {
      config: this.config,
      metadata: this.metadata,
      clock: this.clock,
      log: this.log,
    });
  }

  /**
   * Profile every dataset in `handles`
   *
   * @throws {ConfigurationError} NO_DATASETS for an empty list
   */
  async profileAll(handles: readonly DatasetHandle[]): Promise<ProfileRunResult> {
    if (handles.length === 0) {
      throw new ConfigurationError('No datasets to profile', 'NO_DATASETS');
    }

    const startTime = Date.now();
    const firstPaths = new Map<string, string>();
    const duplicates = new Map<DatasetHandle, string>();
    const unique: DatasetHandle[] = [];
    for (const handle of handles) {
      const firstPath = firstPaths.get(handle.name);
      if (firstPath === undefined) {
        firstPaths.set(handle.name, handle.path);
        unique.push(handle);
      } else {
        duplicates.set(handle, firstPath);
      }
    }

    const workers = Math.min(this.config.concurrency, unique.length);
    this.log.info(`Profiling ${unique.length} dataset(s)`, { workers });
    const outcomes = new Map<string, ProfileTaskResult>();
    const results = workers > 1 ? await this.profileInWorkers(unique, workers) : this.profileInProcess(unique);
    unique.forEach((handle, index) => {
      const result = results[index];
      if (result) outcomes.set(handle.name, result);
    });

    const documents = new Map<string, ProfileDocument>();
    const failures: DatasetFailure[] = [];
    for (const handle of handles) {
      const firstPath = duplicates.get(handle);
      const outcome: ProfileTaskResult | undefined =
        firstPath === undefined
          ? outcomes.get(handle.name)
          : {
              status: 'rejected',
              code: 'DATASET_NAME_DUPLICATE',
              message: `Dataset name "${handle.name}" is already used by ${firstPath}`,
            };
      if (!outcome) continue;

      if (outcome.status === 'fulfilled') {
        documents.set(handle.name, outcome.document);
        continue;
      }
      const failure: DatasetFailure = {
        dataset: handle.name,
        path: handle.path,
        code: outcome.code,
        message: outcome.message,
      };
      failures.push(failure);
      this.log.error(`Dataset "${handle.name}" skipped`, { code: failure.code, error: failure.message });
    }

    const failureCounts: DiagnosticCounts = {};
    for (const failure of failures) {
      if (failure.code === 'DATASET_UNREADABLE') {
        failureCounts.DATASET_UNREADABLE = (failureCounts.DATASET_UNREADABLE ?? 0) + 1;
      }
    }
    const counts = mergeCounts(
      ...[...documents.values()].map((document) => countWarnings(document.warnings)),
      failureCounts
    );

    const durationMs = Date.now() - startTime;
    this.log.info('Profiling finished', { documents: documents.size, failures: failures.length, durationMs });
    return { documents, failures, counts, durationMs };
  }

  private profileInProcess(handles: readonly DatasetHandle[]): ProfileTaskResult[] {
    return handles.map((handle): ProfileTaskResult => {
      try {
        return { status: 'fulfilled', document: this.profile(handle) };
      } catch (error) {
        return {
          status: 'rejected',
          code: isProfilerError(error) ? error.code : 'DATASET_UNREADABLE',
          message: describeCause(error),
        };
      }
    });
  }

  private async profileInWorkers(handles: readonly DatasetHandle[], workers: number): Promise<ProfileTaskResult[]> {
    const pool = new ProfileWorkerPool(workers);
    try {
      const settled = await Promise.allSettled(handles.map((handle) => pool.run(this.taskFor(handle))));
      return settled.map((result): ProfileTaskResult => {
        if (result.status === 'rejected') {
          return { status: 'rejected', code: 'DATASET_UNREADABLE', message: describeCause(result.reason) };
        }
        // Structured clones arrive unfrozen
        return result.value.status === 'fulfilled'
          ? { status: 'fulfilled', document: deepFreeze(result.value.document) }
          : result.value;
      });
    } finally {
      await pool.close();
    }
  }

  private taskFor(handle: DatasetHandle): ProfileTask {
    return {
      handle: { name: handle.name, path: handle.path },
      metadata: this.metadata?.lookup(handle.name) ?? null,
      generatedAt: this.clock().toISOString(),
      config: this.config,
      log: { level: this.log.level, json: this.log.json },
    };
  }
}
