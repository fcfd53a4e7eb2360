/**
 * Dataset catalog types produced by the Schema Extractor
 *
 * @module core/types/dataset
 */

import type { FieldValue, SemanticType } from './field-value.js';

/**
 * Caller-supplied reference to one GeoPackage
 */
export interface DatasetHandle {
  /** Stable dataset name (file base name without extension) */
  readonly name: string;
  /** Filesystem location of the package */
  readonly path: string;
}

export type LayerKind = 'spatial' | 'attribute';

/**
 * Reference system declared for a spatial layer
 */
export interface ReferenceSystem {
  readonly srsId: number;
  readonly name: string | null;
  readonly organization: string | null;
  readonly code: number | null;
  /** WKT definition as stored in gpkg_spatial_ref_sys */
  readonly definition: string | null;
}

export interface FieldProfile {
  readonly name: string;
  readonly type: SemanticType;
  /** Column type as declared in the table definition */
  readonly nativeType: string;
  readonly nullable: boolean;
  readonly primaryKey: boolean;
  /** First non-null values in storage order */
  readonly samples: readonly FieldValue[];
}

export interface LayerProfile {
  readonly name: string;
  readonly kind: LayerKind;
  /** Name carries the reserved Code Table prefix */
  readonly isCodeTable: boolean;
  readonly description: string | null;
  readonly fields: readonly FieldProfile[];
  readonly rowCount: number;
  readonly geometryColumn: string | null;
  readonly geometryType: string | null;
  readonly referenceSystem: ReferenceSystem | null;
}

/**
 * Output of the Schema Extractor for one dataset
 */
export interface DatasetCatalog {
  readonly name: string;
  readonly path: string;
  /** All readable layers in gpkg_contents order, Code Tables included */
  readonly layers: readonly LayerProfile[];
}
