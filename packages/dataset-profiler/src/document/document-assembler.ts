/**
 * Document Assembler
 *
 * Combines the extraction result, CodeLists, previews and descriptive
 * metadata of one dataset into an immutable ProfileDocument.
 */

import { basename } from 'node:path';
import type { CodeList } from '../core/types/code-list.js';
import type { DatasetCatalog } from '../core/types/dataset.js';
import type { ProfileWarning } from '../core/types/diagnostics.js';
import type { DescriptiveMetadata, DocumentLayer, ProfileDocument } from '../core/types/document.js';
import type { BoundingBox, GeometryPreview } from '../core/types/preview.js';
import type { MetadataSource } from './metadata-source.js';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface AssemblyInput {
  readonly catalog: DatasetCatalog;
  readonly codeLists: readonly CodeList[];
  readonly previews: readonly GeometryPreview[];
  readonly extent: BoundingBox | null;
  readonly warnings: readonly ProfileWarning[];
}

export interface AssemblyContext {
  readonly metadata?: MetadataSource;
  readonly clock?: Clock;
}

/**
 * Recursively freeze a value and everything reachable from it
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function codeListIndex(codeLists: readonly CodeList[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const list of codeLists) {
    for (const binding of list.bindings) {
      index.set(`${binding.layer}\u0000${binding.field}`, list.id);
    }
  }
  return index;
}

export function assembleDocument(input: AssemblyInput, context: AssemblyContext = {}): ProfileDocument {
  const { catalog } = input;
  const generatedAt = (context.clock ?? systemClock)().toISOString();
  const metadata: DescriptiveMetadata = [...(context.metadata?.lookup(catalog.name) ?? [])];
  const boundLists = codeListIndex(input.codeLists);
  const fileName = basename(catalog.path);

  const layers: DocumentLayer[] = catalog.layers
    .filter((layer) => !layer.isCodeTable)
    .map((layer) => ({
      name: layer.name,
      kind: layer.kind,
      description: layer.description,
      rowCount: layer.rowCount,
      geometryColumn: layer.geometryColumn,
      geometryType: layer.geometryType,
      referenceSystem: layer.referenceSystem,
      fields: layer.fields.map((field) => ({
        ...field,
        codeListId: boundLists.get(`${layer.name}\u0000${field.name}`) ?? null,
      })),
    }));

  return deepFreeze({
    dataset: { name: catalog.name, fileName, path: catalog.path },
    title: metadata.find((entry) => entry.key === 'title')?.value ?? catalog.name,
    generatedAt,
    metadata,
    datasetInfo: { fileName, generatedAt, layerCount: layers.length },
    layers,
    codeLists: [...input.codeLists],
    previews: [...input.previews],
    extent: input.extent,
    warnings: [...input.warnings],
  });
}
