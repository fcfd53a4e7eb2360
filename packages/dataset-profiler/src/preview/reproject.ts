/**
 * Reprojection into the canonical geographic reference system
 *
 * Resolution order for a layer's reference system:
 *   1. missing SRS (no row, srs_id 0 or -1, organization NONE or absent with
 *      an undefined definition) - assumed
 *      to already be canonical; callers record REFERENCE_SYSTEM_MISSING
 *   2. same authority code as the canonical system - identity
 *   3. authority code known to proj4, or a UTM zone registered on demand
 *   4. the WKT definition stored in gpkg_spatial_ref_sys
 *   5. otherwise unsupported
 */

import proj4 from 'proj4';
import type { Geometry, Position } from 'geojson';
import type { ReferenceSystem } from '../core/types/dataset.js';

export type PositionTransform = (position: Position) => Position;

export type ReferenceSystemResolution =
  | { readonly status: 'canonical'; readonly assumed: boolean }
  | { readonly status: 'transform'; readonly source: string; readonly transform: PositionTransform }
  | { readonly status: 'unsupported'; readonly reason: string };

/**
 * proj4 definition for UTM zones of WGS 84 (326xx north, 327xx south) and
 * ETRS89 (258xx)
 */
export function utmDefinition(code: number): string | null {
  const zone = code % 100;
  if (code >= 32601 && code <= 32660) {
    return `+proj=utm +zone=${zone} +datum=WGS84 +units=m +no_defs`;
  }
  if (code >= 32701 && code <= 32760) {
    return `+proj=utm +zone=${zone} +south +datum=WGS84 +units=m +no_defs`;
  }
  if (code >= 25828 && code <= 25838) {
    return `+proj=utm +zone=${zone} +ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +units=m +no_defs`;
  }
  return null;
}

/**
 * Make sure proj4 knows an AUTHORITY:CODE identifier
 */
export function ensureDefinition(identifier: string): boolean {
  const key = identifier.toUpperCase();
  if (proj4.defs(key)) return true;

  const match = /^EPSG:(\d+)$/.exec(key);
  const definition = match?.[1] ? utmDefinition(Number(match[1])) : null;
  if (!definition) return false;

  proj4.defs(key, definition);
  return true;
}

function isUndefinedDefinition(definition: string | null): boolean {
  return definition === null || definition.trim() === '' || definition.trim().toLowerCase() === 'undefined';
}

function converterTransform(from: string, to: string): PositionTransform {
  const converter = proj4(from, to);
  return (position) => {
    const [x, y] = converter.forward([position[0] ?? 0, position[1] ?? 0]);
    return [x ?? Number.NaN, y ?? Number.NaN];
  };
}

/**
 * Decide how coordinates of a reference system reach the canonical one
 */
export function resolveReferenceSystem(
  referenceSystem: ReferenceSystem | null,
  canonicalCrs: string
): ReferenceSystemResolution {
  const canonical = canonicalCrs.toUpperCase();
  if (!ensureDefinition(canonical)) {
    return { status: 'unsupported', reason: `canonical reference system ${canonicalCrs} is not known to proj4` };
  }

  if (!referenceSystem || referenceSystem.srsId === 0 || referenceSystem.srsId === -1) {
    return { status: 'canonical', assumed: true };
  }

  // NONE is the GeoPackage placeholder organization of undefined systems
  const organization =
    referenceSystem.organization === null || referenceSystem.organization.toUpperCase() === 'NONE'
      ? null
      : referenceSystem.organization.toUpperCase();
  if ((organization === null || referenceSystem.code === null) && isUndefinedDefinition(referenceSystem.definition)) {
    return { status: 'canonical', assumed: true };
  }

  if (organization !== null && referenceSystem.code !== null) {
    const source = `${organization}:${referenceSystem.code}`;
    if (source === canonical) {
      return { status: 'canonical', assumed: false };
    }
    if (ensureDefinition(source)) {
      return { status: 'transform', source, transform: converterTransform(source, canonical) };
    }
  }

  const definition = referenceSystem.definition;
  if (definition !== null && !isUndefinedDefinition(definition)) {
    try {
      return {
        status: 'transform',
        source: referenceSystem.name ?? `srs_id ${referenceSystem.srsId}`,
        transform: converterTransform(definition, canonical),
      };
    } catch (error) {
      return {
        status: 'unsupported',
        reason: `definition of srs_id ${referenceSystem.srsId} could not be parsed: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }

  return { status: 'unsupported', reason: `no usable definition for srs_id ${referenceSystem.srsId}` };
}

/**
 * Apply a position transform to every coordinate of a geometry
 */
export function transformGeometry(geometry: Geometry, transform: PositionTransform): Geometry {
  switch (geometry.type) {
    case 'Point':
      return { type: 'Point', coordinates: transform(geometry.coordinates) };
    case 'MultiPoint':
      return { type: 'MultiPoint', coordinates: geometry.coordinates.map(transform) };
    case 'LineString':
      return { type: 'LineString', coordinates: geometry.coordinates.map(transform) };
    case 'MultiLineString':
      return {
        type: 'MultiLineString',
        coordinates: geometry.coordinates.map((line) => line.map(transform)),
      };
    case 'Polygon':
      return {
        type: 'Polygon',
        coordinates: geometry.coordinates.map((ring) => ring.map(transform)),
      };
    case 'MultiPolygon':
      return {
        type: 'MultiPolygon',
        coordinates: geometry.coordinates.map((polygon) => polygon.map((ring) => ring.map(transform))),
      };
    case 'GeometryCollection':
      return {
        type: 'GeometryCollection',
        geometries: geometry.geometries.map((member) => transformGeometry(member, transform)),
      };
  }
}

/**
 * Every coordinate of the geometry is a finite number
 */
export function hasFiniteCoordinates(geometry: Geometry): boolean {
  const finite = (position: Position): boolean => position.every(Number.isFinite);
  switch (geometry.type) {
    case 'Point':
      return finite(geometry.coordinates);
    case 'MultiPoint':
    case 'LineString':
      return geometry.coordinates.every(finite);
    case 'MultiLineString':
    case 'Polygon':
      return geometry.coordinates.every((part) => part.every(finite));
    case 'MultiPolygon':
      return geometry.coordinates.every((polygon) => polygon.every((ring) => ring.every(finite)));
    case 'GeometryCollection':
      return geometry.geometries.every(hasFiniteCoordinates);
  }
}
