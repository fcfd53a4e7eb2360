/**
 * Geometry Preview Builder
 *
 * For each spatial, non-Code-Table layer:
 *   1. decode and reproject every feature into the canonical system
 *   2. compute the extent over the unsimplified coordinates
 *   3. keep an evenly strided subset when the layer exceeds the feature cap
 *   4. simplify the kept features, falling back per feature on invalid output
 *
 * The simplification tolerance is derived once per dataset (relative policy:
 * a fraction of the dataset extent diagonal), so all layers of a dataset are
 * simplified alike.
 */

import { bbox as turfBbox, feature, featureCollection } from '@turf/turf';
import type { Feature, Geometry } from 'geojson';
import { effectiveFeatureCap, type ProfilerConfig, type SimplificationPolicy } from '../core/config.js';
import type { DiagnosticsCollector } from '../core/diagnostics.js';
import type { DatasetCatalog, LayerProfile } from '../core/types/dataset.js';
import type { BoundingBox, GeometryPreview, PreviewProperties } from '../core/types/preview.js';
import { decodeGeometryBlob } from '../reader/gpkg-geometry.js';
import type { GeoPackageReader } from '../reader/geopackage-reader.js';
import { formatFieldValue, toFieldValue } from '../schema/field-value.js';
import { layerStorageOrder } from '../schema/schema-extractor.js';
import { hasFiniteCoordinates, resolveReferenceSystem, transformGeometry } from './reproject.js';
import { simplifyGeometry } from './simplify.js';

export interface LoadedLayer {
  readonly layer: LayerProfile;
  readonly features: readonly Feature<Geometry, PreviewProperties>[];
  readonly bbox: BoundingBox | null;
  readonly geometryTypes: readonly string[];
}

export interface DatasetPreviews {
  readonly previews: GeometryPreview[];
  readonly extent: BoundingBox | null;
  readonly tolerance: number;
}

// ============================================================================
// Pure helpers
// ============================================================================

/**
 * Indices of an evenly strided subset: exactly `cap` indices when count > cap
 */
export function strideIndices(count: number, cap: number): number[] {
  if (count <= cap) {
    return Array.from({ length: count }, (_, index) => index);
  }
  return Array.from({ length: cap }, (_, index) => Math.floor((index * count) / cap));
}

export function selectStrided<T>(items: readonly T[], cap: number): T[] {
  const selected: T[] = [];
  for (const index of strideIndices(items.length, cap)) {
    const item = items[index];
    if (item !== undefined) selected.push(item);
  }
  return selected;
}

export function unionExtent(a: BoundingBox | null, b: BoundingBox | null): BoundingBox | null {
  if (!a) return b;
  if (!b) return a;
  return [Math.min(a[0], b[0]), Math.min(a[1], b[1]), Math.max(a[2], b[2]), Math.max(a[3], b[3])];
}

/**
 * Simplification tolerance in canonical units for a dataset extent
 */
export function toleranceFor(policy: SimplificationPolicy, extent: BoundingBox | null): number {
  if (policy.mode === 'absolute') {
    return policy.tolerance;
  }
  if (!extent) return 0;
  const diagonal = Math.hypot(extent[2] - extent[0], extent[3] - extent[1]);
  return diagonal * policy.ratio;
}

function extentOf(features: readonly Feature<Geometry, PreviewProperties>[]): BoundingBox | null {
  if (features.length === 0) return null;
  const [minX, minY, maxX, maxY] = turfBbox(featureCollection([...features]));
  return [minX, minY, maxX, maxY];
}

// ============================================================================
// Layer loading
// ============================================================================

/**
 * Decode and reproject all features of a spatial layer
 *
 * @returns null when the layer's reference system cannot be reprojected
 */
export function loadLayerFeatures(
  reader: GeoPackageReader,
  layer: LayerProfile,
  canonicalCrs: string,
  diagnostics: DiagnosticsCollector
): LoadedLayer | null {
  const geometryColumn = layer.geometryColumn;
  if (!geometryColumn) return null;

  const resolution = resolveReferenceSystem(layer.referenceSystem, canonicalCrs);
  if (resolution.status === 'unsupported') {
    diagnostics.record({
      code: 'REFERENCE_SYSTEM_UNSUPPORTED',
      layer: layer.name,
      message: `Layer "${layer.name}" has no preview: ${resolution.reason}`,
    });
    return null;
  }
  if (resolution.status === 'canonical' && resolution.assumed) {
    diagnostics.record({
      code: 'REFERENCE_SYSTEM_MISSING',
      layer: layer.name,
      message: `Layer "${layer.name}" declares no usable reference system; coordinates assumed to be ${canonicalCrs}`,
    });
  }

  const propertyFields = layer.fields.filter((field) => field.type !== 'geometry');
  const fieldTypes = new Map(propertyFields.map((field) => [field.name, field.type]));
  const features: Feature<Geometry, PreviewProperties>[] = [];
  const geometryTypes: string[] = [];
  let unreadable = 0;

  for (const row of reader.iterateFeatures(
    layer.name,
    geometryColumn,
    propertyFields.map((field) => field.name),
    layerStorageOrder(layer)
  )) {
    if (!row.geometry) continue;

    let geometry: Geometry | null;
    try {
      geometry = decodeGeometryBlob(row.geometry);
    } catch {
      unreadable += 1;
      continue;
    }
    if (!geometry) continue;

    if (resolution.status === 'transform') {
      geometry = transformGeometry(geometry, resolution.transform);
    }
    if (!hasFiniteCoordinates(geometry)) {
      unreadable += 1;
      continue;
    }

    if (!geometryTypes.includes(geometry.type)) {
      geometryTypes.push(geometry.type);
    }

    const properties: PreviewProperties = {};
    for (const [name, raw] of Object.entries(row.properties)) {
      const value = toFieldValue(raw, fieldTypes.get(name) ?? 'text');
      properties[name] = value ? formatFieldValue(value) : null;
    }
    features.push(feature(geometry, properties));
  }

  if (unreadable > 0) {
    diagnostics.record({
      code: 'GEOMETRY_UNREADABLE',
      layer: layer.name,
      count: unreadable,
      message: `${unreadable} feature(s) of "${layer.name}" had geometry that could not be decoded or reprojected`,
    });
  }

  return { layer, features, bbox: extentOf(features), geometryTypes };
}

// ============================================================================
// Preview construction
// ============================================================================

/**
 * Build the preview of one loaded layer
 */
export function buildLayerPreview(
  loaded: LoadedLayer,
  options: { readonly tolerance: number; readonly featureCap: number; readonly canonicalCrs: string },
  diagnostics: DiagnosticsCollector
): GeometryPreview {
  const selected = selectStrided(loaded.features, options.featureCap);
  let fallbackCount = 0;

  const simplified = selected.map((source) => {
    const outcome = simplifyGeometry(source.geometry, options.tolerance);
    if (outcome.fellBack) fallbackCount += 1;
    return feature(outcome.geometry, { ...source.properties });
  });

  if (fallbackCount > 0) {
    diagnostics.record({
      code: 'GEOMETRY_INVALID_AFTER_SIMPLIFICATION',
      layer: loaded.layer.name,
      count: fallbackCount,
      message: `${fallbackCount} feature(s) of "${loaded.layer.name}" kept their original geometry because simplification was invalid`,
    });
  }

  return {
    layer: loaded.layer.name,
    referenceSystem: options.canonicalCrs,
    geometryTypes: loaded.geometryTypes,
    featureCount: loaded.features.length,
    previewedFeatureCount: simplified.length,
    truncated: loaded.features.length > options.featureCap,
    bbox: loaded.bbox,
    tolerance: options.tolerance,
    fallbackCount,
    fieldOrder: loaded.layer.fields.filter((field) => field.type !== 'geometry').map((field) => field.name),
    features: featureCollection(simplified),
  };
}

/**
 * Previews of every spatial regular layer of a dataset, plus the dataset extent
 */
export function buildPreviews(
  reader: GeoPackageReader,
  catalog: DatasetCatalog,
  config: Pick<ProfilerConfig, 'canonicalCrs' | 'preview'>,
  diagnostics: DiagnosticsCollector
): DatasetPreviews {
  const spatialLayers = catalog.layers.filter((layer) => layer.kind === 'spatial' && !layer.isCodeTable);

  const loaded: LoadedLayer[] = [];
  for (const layer of spatialLayers) {
    try {
      const result = loadLayerFeatures(reader, layer, config.canonicalCrs, diagnostics);
      if (result) loaded.push(result);
    } catch (error) {
      diagnostics.record({
        code: 'LAYER_UNREADABLE',
        layer: layer.name,
        message: `Features of "${layer.name}" could not be read: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  }

  const extent = loaded.reduce<BoundingBox | null>((acc, entry) => unionExtent(acc, entry.bbox), null);
  const tolerance = toleranceFor(config.preview.simplification, extent);
  const featureCap = effectiveFeatureCap(config, spatialLayers.length);

  const previews = loaded.map((entry) =>
    buildLayerPreview(entry, { tolerance, featureCap, canonicalCrs: config.canonicalCrs }, diagnostics)
  );
  return { previews, extent, tolerance };
}
