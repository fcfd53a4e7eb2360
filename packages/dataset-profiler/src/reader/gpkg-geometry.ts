/**
 * GeoPackage geometry blob decoding
 *
 * A GeoPackage geometry value is a small binary header followed by standard
 * WKB:
 *
 *   bytes 0-1  magic "GP"
 *   byte  2    version (0 = version 1)
 *   byte  3    flags: bit 0 byte order (1 = little endian), bits 1-3 envelope
 *              contents indicator, bit 4 empty geometry, bit 5 extended type
 *   bytes 4-7  srs_id (int32, header byte order)
 *   envelope   0, 32, 48, 48 or 64 bytes of doubles depending on indicator
 *   WKB        geometry
 *
 * The WKB payload is decoded with wkx. Z and M ordinates are dropped; the
 * preview is two-dimensional.
 */

import wkx from 'wkx';
import type { Geometry, Position } from 'geojson';
import { isGeometry } from '../core/type-guards.js';

const ENVELOPE_SIZES: Record<number, number> = {
  0: 0,
  1: 32,
  2: 48,
  3: 48,
  4: 64,
};

export interface GeoPackageGeometryHeader {
  readonly version: number;
  readonly srsId: number;
  readonly empty: boolean;
  /** Byte offset of the WKB payload */
  readonly wkbOffset: number;
}

export class GeometryBlobError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeometryBlobError';
  }
}

/**
 * Parse the GeoPackage binary header
 *
 * @throws {GeometryBlobError} On a bad magic number or unknown envelope indicator
 */
export function parseGeometryHeader(blob: Uint8Array): GeoPackageGeometryHeader {
  if (blob.length < 8 || blob[0] !== 0x47 || blob[1] !== 0x50) {
    throw new GeometryBlobError('Not a GeoPackage geometry blob (missing GP magic)');
  }

  const flags = blob[3] ?? 0;
  const littleEndian = (flags & 0x01) === 1;
  const envelopeIndicator = (flags >> 1) & 0x07;
  const envelopeSize = ENVELOPE_SIZES[envelopeIndicator];
  if (envelopeSize === undefined) {
    throw new GeometryBlobError(`Invalid envelope contents indicator ${envelopeIndicator}`);
  }

  const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength);
  const wkbOffset = 8 + envelopeSize;
  if (wkbOffset > blob.length) {
    throw new GeometryBlobError('Geometry blob truncated inside envelope');
  }

  return {
    version: blob[2] ?? 0,
    srsId: view.getInt32(4, littleEndian),
    empty: ((flags >> 4) & 0x01) === 1,
    wkbOffset,
  };
}

function toPlanar(position: Position): Position {
  return [position[0] ?? 0, position[1] ?? 0];
}

/**
 * Drop Z/M ordinates from every position of a geometry
 */
export function flattenGeometry(geometry: Geometry): Geometry {
  switch (geometry.type) {
    case 'Point':
      return { type: 'Point', coordinates: toPlanar(geometry.coordinates) };
    case 'MultiPoint':
      return { type: 'MultiPoint', coordinates: geometry.coordinates.map(toPlanar) };
    case 'LineString':
      return { type: 'LineString', coordinates: geometry.coordinates.map(toPlanar) };
    case 'MultiLineString':
      return {
        type: 'MultiLineString',
        coordinates: geometry.coordinates.map((line) => line.map(toPlanar)),
      };
    case 'Polygon':
      return {
        type: 'Polygon',
        coordinates: geometry.coordinates.map((ring) => ring.map(toPlanar)),
      };
    case 'MultiPolygon':
      return {
        type: 'MultiPolygon',
        coordinates: geometry.coordinates.map((polygon) =>
          polygon.map((ring) => ring.map(toPlanar))
        ),
      };
    case 'GeometryCollection':
      return {
        type: 'GeometryCollection',
        geometries: geometry.geometries.map(flattenGeometry),
      };
  }
}

/**
 * Decode a GeoPackage geometry blob into a planar GeoJSON geometry
 *
 * @returns The geometry, or null when the blob flags an empty geometry
 * @throws {GeometryBlobError} When the blob or its WKB payload cannot be decoded
 */
export function decodeGeometryBlob(blob: Uint8Array): Geometry | null {
  const header = parseGeometryHeader(blob);
  if (header.empty) {
    return null;
  }

  const wkb = Buffer.from(blob.buffer, blob.byteOffset + header.wkbOffset, blob.byteLength - header.wkbOffset);
  let decoded: unknown;
  try {
    decoded = wkx.Geometry.parse(wkb).toGeoJSON();
  } catch (error) {
    throw new GeometryBlobError(
      `Invalid WKB payload: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isGeometry(decoded)) {
    throw new GeometryBlobError('WKB payload did not decode to a GeoJSON geometry');
  }
  return flattenGeometry(decoded);
}
