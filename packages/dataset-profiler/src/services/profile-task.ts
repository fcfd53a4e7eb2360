/**
 * Profile task messages exchanged with worker processes
 *
 * A task carries everything a worker needs to profile one dataset on its
 * own: the handle, the dataset's metadata entries, the resolved
 * configuration, the generation timestamp and the log settings. Both
 * directions are validated, since they cross a process boundary.
 */

import { z } from 'zod';
import { ProfilerConfigSchema, type ProfilerConfig } from '../core/config.js';
import { describeCause, isProfilerError, PROFILER_ERROR_CODES, type ProfilerErrorCode } from '../core/errors.js';
import { isRecord } from '../core/type-guards.js';
import type { DatasetHandle } from '../core/types/dataset.js';
import type { DescriptiveMetadata, ProfileDocument } from '../core/types/document.js';
import { createLogger, type LogLevel } from '../core/utils/logger.js';
import { InMemoryMetadataSource } from '../document/metadata-source.js';
import { profileDataset } from './profile-pipeline.js';

export interface ProfileTask {
  readonly handle: DatasetHandle;
  readonly metadata: DescriptiveMetadata | null;
  /** ISO timestamp stamped on the Document */
  readonly generatedAt: string;
  readonly config: ProfilerConfig;
  readonly log: { readonly level: LogLevel; readonly json: boolean };
}

export type ProfileTaskResult =
  | { readonly status: 'fulfilled'; readonly document: ProfileDocument }
  | { readonly status: 'rejected'; readonly code: ProfilerErrorCode; readonly message: string };

export const ProfileTaskSchema = z.object({
  handle: z.object({ name: z.string().min(1), path: z.string().min(1) }),
  metadata: z.array(z.object({ key: z.string(), value: z.string() })).nullable(),
  generatedAt: z.string().datetime(),
  config: ProfilerConfigSchema,
  log: z.object({ level: z.enum(['debug', 'info', 'warn', 'error']), json: z.boolean() }),
});

export const ProfileTaskResultSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('fulfilled'), document: z.custom<ProfileDocument>(isRecord) }),
  z.object({ status: z.literal('rejected'), code: z.enum(PROFILER_ERROR_CODES), message: z.string() }),
]);

/**
 * Run one task in the current process; never throws
 */
export function runProfileTask(message: unknown): ProfileTaskResult {
  const parsed = ProfileTaskSchema.safeParse(message);
  if (!parsed.success) {
    return {
      status: 'rejected',
      code: 'CONFIGURATION_INVALID',
      message: `Malformed profile task: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
    };
  }

  const task = parsed.data;
  try {
    const document = profileDataset(task.handle, {
      config: task.config,
      metadata: task.metadata ? new InMemoryMetadataSource([[task.handle.name, task.metadata]]) : undefined,
      clock: () => new Date(task.generatedAt),
      log: createLogger({ level: task.log.level, json: task.log.json }).child({ module: 'dataset-profiler' }),
    });
    return { status: 'fulfilled', document };
  } catch (error) {
    return {
      status: 'rejected',
      code: isProfilerError(error) ? error.code : 'DATASET_UNREADABLE',
      message: describeCause(error),
    };
  }
}
