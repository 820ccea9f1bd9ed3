/**
 * GeoJSON interop for ArcGIS geometries
 *
 * Coordinates are copied as-is: ArcGIS x/y and GeoJSON longitude/latitude
 * share axis order, and no reprojection happens here.
 *
 * Ring winding differs between the two. ArcGIS outer rings run clockwise and
 * holes counterclockwise, and one polygon may hold several outer rings.
 * RFC 7946 wants the opposite winding and one outer ring per Polygon, so
 * ArcGIS polygons are split on their clockwise rings and rewound on the way
 * out, and GeoJSON rings are rewound on the way in.
 */

import booleanClockwise from '@turf/boolean-clockwise';
import rewind from '@turf/rewind';
import type {
  Geometry as GeoJSONGeometry,
  MultiPolygon as GeoJSONMultiPolygon,
  Polygon as GeoJSONPolygon,
  Position as GeoJSONPosition,
} from 'geojson';
import { ConversionError } from '../core/errors.js';
import {
  Envelope,
  Multipoint,
  Point,
  Polygon,
  Polyline,
  type Geometry,
  type GeometryOptions,
  type MultipartGeometry,
  type Position,
} from './geometry.js';

/**
 * GeoJSON positions hold at most an altitude after x and y, so an m value
 * is dropped
 */
function positionReader(geometry: MultipartGeometry): (p: Position) => GeoJSONPosition {
  if (!geometry.hasM) {
    return (p) => [...p];
  }
  const width = geometry.hasZ ? 3 : 2;
  return (p) => p.slice(0, width);
}

/** Group ArcGIS rings into polygons: each clockwise ring starts a new one */
function splitRings(rings: readonly GeoJSONPosition[][]): GeoJSONPosition[][][] {
  const polygons: GeoJSONPosition[][][] = [];
  for (const ring of rings) {
    const current = polygons[polygons.length - 1];
    if (current === undefined || booleanClockwise(ring)) {
      polygons.push([ring]);
    } else {
      current.push(ring);
    }
  }
  return polygons;
}

function polygonToGeoJSON(polygon: Polygon): GeoJSONPolygon | GeoJSONMultiPolygon {
  const toPosition = positionReader(polygon);
  const parts = splitRings(polygon.rings.map((ring) => ring.map(toPosition)));
  const [first] = parts;
  if (parts.length === 1 && first !== undefined) {
    const single: GeoJSONPolygon = { type: 'Polygon', coordinates: first };
    return rewind(single);
  }
  const multi: GeoJSONMultiPolygon = { type: 'MultiPolygon', coordinates: parts };
  return rewind(multi);
}

export function geometryToGeoJSON(geometry: Geometry): GeoJSONGeometry {
  if (geometry instanceof Point) {
    const coordinates = geometry.z !== undefined ? [geometry.x, geometry.y, geometry.z] : [geometry.x, geometry.y];
    return { type: 'Point', coordinates };
  }
  if (geometry instanceof Multipoint) {
    return { type: 'MultiPoint', coordinates: geometry.points.map(positionReader(geometry)) };
  }
  if (geometry instanceof Polyline) {
    const toPosition = positionReader(geometry);
    const paths = geometry.paths.map((path) => path.map(toPosition));
    const [first] = paths;
    if (paths.length === 1 && first !== undefined) {
      return { type: 'LineString', coordinates: first };
    }
    return { type: 'MultiLineString', coordinates: paths };
  }
  if (geometry instanceof Polygon) {
    return polygonToGeoJSON(geometry);
  }
  if (geometry instanceof Envelope) {
    const { xmin, ymin, xmax, ymax } = geometry;
    return {
      type: 'Polygon',
      coordinates: [[[xmin, ymin], [xmax, ymin], [xmax, ymax], [xmin, ymax], [xmin, ymin]]],
    };
  }
  throw new ConversionError(
    `No GeoJSON form for ${geometry.geometryType}`,
    geometry.geometryType,
    geometry.toJSON()
  );
}

/** hasZ when any position carries an altitude */
function altitudeFlag(positions: readonly GeoJSONPosition[]): { hasZ?: true } {
  return positions.some((p) => p.length > 2) ? { hasZ: true } : {};
}

export function geometryFromGeoJSON(geometry: GeoJSONGeometry, options: GeometryOptions = {}): Geometry {
  switch (geometry.type) {
    case 'Point': {
      const [x, y, z] = geometry.coordinates;
      if (x === undefined || y === undefined) {
        throw new ConversionError('Point needs x and y coordinates', 'Point', geometry);
      }
      return new Point(x, y, { ...options, z });
    }
    case 'MultiPoint':
      return new Multipoint(geometry.coordinates, { ...options, ...altitudeFlag(geometry.coordinates) });
    case 'LineString':
      return new Polyline([geometry.coordinates], { ...options, ...altitudeFlag(geometry.coordinates) });
    case 'MultiLineString':
      return new Polyline(geometry.coordinates, { ...options, ...altitudeFlag(geometry.coordinates.flat(1)) });
    case 'Polygon': {
      const rings = rewind(geometry, { reverse: true }).coordinates;
      return new Polygon(rings, { ...options, ...altitudeFlag(rings.flat(1)) });
    }
    case 'MultiPolygon': {
      const rings = rewind(geometry, { reverse: true }).coordinates.flat(1);
      return new Polygon(rings, { ...options, ...altitudeFlag(rings.flat(1)) });
    }
    case 'GeometryCollection':
      throw new ConversionError(
        'GeometryCollection has no single ArcGIS geometry equivalent',
        'GeometryCollection',
        geometry
      );
  }
}
