/**
 * Geometry preview types produced by the Geometry Preview Builder
 *
 * @module core/types/preview
 */

import type { FeatureCollection, Geometry } from 'geojson';

/**
 * [minLon, minLat, maxLon, maxLat] in the canonical reference system
 */
export type BoundingBox = readonly [number, number, number, number];

/**
 * Display properties of a previewed feature, keyed by field name
 */
export type PreviewProperties = Record<string, string | null>;

export interface GeometryPreview {
  readonly layer: string;
  /** Canonical reference system identifier, e.g. EPSG:4326 */
  readonly referenceSystem: string;
  /** Distinct geometry types observed, in first-seen order */
  readonly geometryTypes: readonly string[];
  /** Readable features in the layer */
  readonly featureCount: number;
  readonly previewedFeatureCount: number;
  /** Feature cap applied */
  readonly truncated: boolean;
  /** Extent of the unsimplified geometry, null for an empty layer */
  readonly bbox: BoundingBox | null;
  /** Simplification tolerance in canonical units */
  readonly tolerance: number;
  /** Features that kept their original geometry after a failed simplification */
  readonly fallbackCount: number;
  readonly fieldOrder: readonly string[];
  readonly features: FeatureCollection<Geometry, PreviewProperties>;
}
