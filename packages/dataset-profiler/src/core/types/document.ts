/**
 * Document Model - the engine's output contract
 *
 * One Document per successfully processed dataset. The presentation layer
 * depends on this shape structurally:
 * - `layers` holds regular layers only (Code Tables are surfaced through
 *   `codeLists`), in gpkg_contents order, fields in declaration order
 * - `codeLists` are ordered by the position of their source layer/field
 * - every preview coordinate is in `previews[].referenceSystem`
 * - `metadata` is always present, empty when no descriptive entry exists
 *
 * @module core/types/document
 */

import type { CodeList } from './code-list.js';
import type { FieldProfile, LayerKind, ReferenceSystem } from './dataset.js';
import type { ProfileWarning } from './diagnostics.js';
import type { BoundingBox, GeometryPreview } from './preview.js';

export interface MetadataEntry {
  readonly key: string;
  readonly value: string;
}

/**
 * Descriptive key/value pairs from the metadata collaborator, in source
 * order (an array, since object keys that look like integers would be
 * reordered)
 */
export type DescriptiveMetadata = readonly MetadataEntry[];

export interface DocumentField extends FieldProfile {
  /** Id of the CodeList bound to this field */
  readonly codeListId: string | null;
}

export interface DocumentLayer {
  readonly name: string;
  readonly kind: LayerKind;
  readonly description: string | null;
  readonly rowCount: number;
  readonly geometryColumn: string | null;
  readonly geometryType: string | null;
  readonly referenceSystem: ReferenceSystem | null;
  readonly fields: readonly DocumentField[];
}

export interface DatasetInfo {
  readonly fileName: string;
  readonly generatedAt: string;
  /** Regular layers shown in the Document */
  readonly layerCount: number;
}

export interface ProfileDocument {
  readonly dataset: {
    readonly name: string;
    readonly fileName: string;
    readonly path: string;
  };
  readonly title: string;
  readonly generatedAt: string;
  readonly metadata: DescriptiveMetadata;
  readonly datasetInfo: DatasetInfo;
  readonly layers: readonly DocumentLayer[];
  readonly codeLists: readonly CodeList[];
  readonly previews: readonly GeometryPreview[];
  /** Union of preview extents */
  readonly extent: BoundingBox | null;
  readonly warnings: readonly ProfileWarning[];
}
