/**
 * Per-dataset pipeline
 *
 * Schema extraction, then CodeList resolution and preview construction,
 * joined by the Document Assembler. Everything runs on one synchronous
 * better-sqlite3 connection; parallelism happens across datasets, in
 * separate worker processes (see worker-pool.ts).
 */

import { resolveCodeLists } from '../codelists/code-list-resolver.js';
import type { ProfilerConfig } from '../core/config.js';
import { DiagnosticsCollector } from '../core/diagnostics.js';
import type { DatasetHandle } from '../core/types/dataset.js';
import type { ProfileDocument } from '../core/types/document.js';
import type { Logger } from '../core/utils/logger.js';
import { assembleDocument, type Clock } from '../document/document-assembler.js';
import type { MetadataSource } from '../document/metadata-source.js';
import { buildPreviews } from '../preview/preview-builder.js';
import { GeoPackageReader } from '../reader/geopackage-reader.js';
import { extractSchema } from '../schema/schema-extractor.js';

export interface PipelineContext {
  readonly config: ProfilerConfig;
  readonly metadata?: MetadataSource;
  readonly clock: Clock;
  readonly log: Logger;
}

/**
 * Profile one dataset into a Document
 *
 * @throws {DatasetUnreadableError} When the dataset cannot be opened
 */
export function profileDataset(handle: DatasetHandle, context: PipelineContext): ProfileDocument {
  const { config } = context;
  const log = context.log.child({ dataset: handle.name });
  const diagnostics = new DiagnosticsCollector(handle.name, log);
  const reader = GeoPackageReader.open(handle);

  try {
    const catalog = extractSchema(
      reader,
      { sampleSize: config.sampleSize, codeTablePrefix: config.codeTablePrefix },
      diagnostics
    );
    log.debug('Schema extracted', { layers: catalog.layers.length });

    const codeLists = resolveCodeLists(
      reader,
      catalog,
      { codeTablePrefix: config.codeTablePrefix, heuristic: config.codeLists },
      diagnostics
    );
    const { previews, extent } = buildPreviews(reader, catalog, config, diagnostics);
    log.debug('Code lists and previews built', { codeLists: codeLists.length, previews: previews.length });

    return assembleDocument(
      { catalog, codeLists, previews, extent, warnings: diagnostics.list() },
      { metadata: context.metadata, clock: context.clock }
    );
  } finally {
    reader.close();
  }
}
