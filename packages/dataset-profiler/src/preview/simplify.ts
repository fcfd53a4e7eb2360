/**
 * Validity-preserving geometry simplification
 *
 * Uses @turf/turf for Douglas-Peucker simplification and for the validity
 * check: closed rings of at least four positions, no self-intersections
 * (turf.kinks), holes inside their shell, and MultiPolygon members that
 * were disjoint staying disjoint. A simplification that throws or produces
 * an invalid shape is discarded and the unsimplified geometry is kept for
 * that feature.
 */

import { booleanIntersects, booleanPointInPolygon, kinks, simplify } from '@turf/turf';
import type { Geometry, MultiPolygon, Polygon, Position } from 'geojson';

export interface SimplifyOutcome {
  readonly geometry: Geometry;
  /** Simplification was rejected and the input geometry returned */
  readonly fellBack: boolean;
}

function samePosition(a: Position | undefined, b: Position | undefined): boolean {
  return a !== undefined && b !== undefined && a[0] === b[0] && a[1] === b[1];
}

function isValidRing(ring: readonly Position[]): boolean {
  return ring.length >= 4 && samePosition(ring[0], ring[ring.length - 1]);
}

function holesInsideShell(coordinates: Position[][]): boolean {
  const [shell, ...holes] = coordinates;
  if (!shell) return false;
  const outline: Polygon = { type: 'Polygon', coordinates: [shell] };
  return holes.every((hole) => hole.every((position) => booleanPointInPolygon(position, outline)));
}

function isValidPolygon(coordinates: Position[][]): boolean {
  if (coordinates.length === 0 || !coordinates.every(isValidRing)) return false;
  const polygon: Polygon = { type: 'Polygon', coordinates };
  return kinks(polygon).features.length === 0 && holesInsideShell(coordinates);
}

function memberPolygons(geometry: MultiPolygon): Polygon[] {
  return geometry.coordinates.map((coordinates) => ({ type: 'Polygon', coordinates }));
}

/**
 * Members of `original` that did not intersect still do not intersect in
 * `simplified`
 */
export function keepsMembersDisjoint(original: MultiPolygon, simplified: MultiPolygon): boolean {
  const before = memberPolygons(original);
  const after = memberPolygons(simplified);
  if (before.length !== after.length) return false;

  for (let i = 0; i < after.length; i++) {
    for (let j = i + 1; j < after.length; j++) {
      const a = after[i];
      const b = after[j];
      const sourceA = before[i];
      const sourceB = before[j];
      if (!a || !b || !sourceA || !sourceB) return false;
      if (booleanIntersects(a, b) && !booleanIntersects(sourceA, sourceB)) return false;
    }
  }
  return true;
}

/**
 * Structural and topological validity check used to accept a simplification
 */
export function isValidGeometry(geometry: Geometry): boolean {
  switch (geometry.type) {
    case 'Point':
    case 'MultiPoint':
      return true;
    case 'LineString':
      return geometry.coordinates.length >= 2;
    case 'MultiLineString':
      return geometry.coordinates.length > 0 && geometry.coordinates.every((line) => line.length >= 2);
    case 'Polygon':
      return isValidPolygon(geometry.coordinates);
    case 'MultiPolygon':
      return geometry.coordinates.length > 0 && geometry.coordinates.every(isValidPolygon);
    case 'GeometryCollection':
      return geometry.geometries.every(isValidGeometry);
  }
}

/**
 * Simplify a geometry at `tolerance`, keeping the input when the result
 * would not be valid
 */
export function simplifyGeometry(geometry: Geometry, tolerance: number): SimplifyOutcome {
  if (tolerance <= 0 || geometry.type === 'Point' || geometry.type === 'MultiPoint') {
    return { geometry, fellBack: false };
  }

  if (geometry.type === 'GeometryCollection') {
    const members = geometry.geometries.map((member) => simplifyGeometry(member, tolerance));
    return {
      geometry: { type: 'GeometryCollection', geometries: members.map((member) => member.geometry) },
      fellBack: members.some((member) => member.fellBack),
    };
  }

  let simplified: Geometry;
  try {
    simplified = simplify(geometry, { tolerance, highQuality: false, mutate: false });
  } catch {
    // turf rejects degenerate input
    return { geometry, fellBack: true };
  }
  const valid =
    isValidGeometry(simplified) &&
    (geometry.type !== 'MultiPolygon' ||
      (simplified.type === 'MultiPolygon' && keepsMembersDisjoint(geometry, simplified)));
  return valid ? { geometry: simplified, fellBack: false } : { geometry, fellBack: true };
}
