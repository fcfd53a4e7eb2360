/**
 * Type Guards
 *
 * Runtime narrowing for values that cross a library boundary untyped
 * (decoded WKB, parsed rc-files, spreadsheet rows).
 */

import type { Geometry, Position } from 'geojson';

const GEOMETRY_TYPES: readonly string[] = [
  'Point',
  'MultiPoint',
  'LineString',
  'MultiLineString',
  'Polygon',
  'MultiPolygon',
  'GeometryCollection',
];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isPosition(value: unknown): value is Position {
  return (
    Array.isArray(value) &&
    value.length >= 2 &&
    value.every((n) => typeof n === 'number' && Number.isFinite(n))
  );
}

/**
 * Check nesting depth of a coordinates array: 0 = position, 1 = position list, ...
 */
function hasCoordinateDepth(value: unknown, depth: number): boolean {
  if (depth === 0) return isPosition(value);
  return Array.isArray(value) && value.every((item) => hasCoordinateDepth(item, depth - 1));
}

const COORDINATE_DEPTH: Record<string, number> = {
  Point: 0,
  MultiPoint: 1,
  LineString: 1,
  MultiLineString: 2,
  Polygon: 2,
  MultiPolygon: 3,
};

/**
 * Type guard for GeoJSON Geometry, coordinates included
 */
export function isGeometry(geom: unknown): geom is Geometry {
  if (!isRecord(geom)) return false;
  const type = geom.type;
  if (typeof type !== 'string' || !GEOMETRY_TYPES.includes(type)) return false;

  if (type === 'GeometryCollection') {
    return Array.isArray(geom.geometries) && geom.geometries.every(isGeometry);
  }
  const depth = COORDINATE_DEPTH[type];
  return depth !== undefined && hasCoordinateDepth(geom.coordinates, depth);
}
