/**
 * Dataset Profiler
 *
 * Introspects GeoPackage datasets into self-describing Documents: layers and
 * typed fields with samples, code lists bound to the fields that use them,
 * and simplified geometry previews in a single geographic reference system.
 *
 * @example
 * ```typescript
 * import { DatasetProfiler, handleFromPath } from 'dataset-profiler';
 *
 * const profiler = new DatasetProfiler({ config: { concurrency: 2 } });
 * const { documents, failures } = await profiler.profileAll([
 *   handleFromPath('data/roads.gpkg'),
 * ]);
 * ```
 *
 * @packageDocumentation
 */

export type * from './core/types/index.js';
export { DIAGNOSTIC_CODES } from './core/types/diagnostics.js';

export {
  DEFAULT_CONFIG,
  ProfilerConfigSchema,
  ProfilerConfigInputSchema,
  effectiveFeatureCap,
  resolveConfig,
} from './core/config.js';
export type { CodeListHeuristic, ProfilerConfig, ProfilerConfigInput, SimplificationPolicy } from './core/config.js';

export {
  ConfigurationError,
  DatasetUnreadableError,
  LayerUnreadableError,
  PROFILER_ERROR_CODES,
  ProfilerError,
  isProfilerError,
} from './core/errors.js';
export type { ProfilerErrorCode } from './core/errors.js';

export { DiagnosticsCollector, countWarnings, mergeCounts } from './core/diagnostics.js';
export type { DiagnosticCounts } from './core/diagnostics.js';
export { Logger, createLogger, logger } from './core/utils/logger.js';
export type { LogLevel, LoggerConfig } from './core/utils/logger.js';

export { GeoPackageReader, datasetNameFromPath, handleFromPath } from './reader/geopackage-reader.js';
export { decodeGeometryBlob, parseGeometryHeader } from './reader/gpkg-geometry.js';

export { extractSchema } from './schema/schema-extractor.js';
export { resolveCodeLists } from './codelists/code-list-resolver.js';
export { buildPreviews } from './preview/preview-builder.js';

export { assembleDocument } from './document/document-assembler.js';
export type { AssemblyContext, AssemblyInput, Clock } from './document/document-assembler.js';
export {
  InMemoryMetadataSource,
  loadMetadataFile,
  loadMetadataSource,
  loadMetadataWorkbook,
  parseMetadataDocument,
  parseMetadataWorkbook,
} from './document/metadata-source.js';
export type { MetadataSource } from './document/metadata-source.js';

export { profileDataset } from './services/profile-pipeline.js';
export type { PipelineContext } from './services/profile-pipeline.js';
export { DatasetProfiler } from './services/dataset-profiler.js';
export type {
  DatasetFailure,
  DatasetProfilerOptions,
  ProfileRunResult,
} from './services/dataset-profiler.js';
