/**
 * Build geometry objects from ArcGIS JSON
 *
 * The shape is chosen by the keys present, the same way the REST API
 * distinguishes geometry objects that carry no explicit type tag.
 */

import { ConversionError } from '../core/errors.js';
import { isJsonObject } from '../core/json.js';
import { parseWire } from '../core/wire.js';
import {
  Envelope,
  Multipoint,
  Point,
  Polygon,
  Polyline,
  type Attributes,
  type Geometry,
  type MultipartOptions,
} from './geometry.js';
import {
  AttributesSchema,
  EnvelopeJsonSchema,
  MultipointJsonSchema,
  PointJsonSchema,
  PolygonJsonSchema,
  PolylineJsonSchema,
  SpatialReferenceJsonSchema,
} from './schemas.js';
import { SpatialReference, type SpatialReferenceLike } from './spatial-reference.js';

export function spatialReferenceFromJson(json: unknown): SpatialReference {
  return new SpatialReference(parseWire(SpatialReferenceJsonSchema, json, 'SpatialReference'));
}

/**
 * Parse feature attributes; a missing attribute object means no attributes
 */
export function attributesFromJson(json: unknown): Attributes {
  if (json === undefined || json === null) {
    return {};
  }
  return parseWire(AttributesSchema, json, 'Attributes');
}

/**
 * Build a geometry from its JSON form
 *
 * @param attributes - Attribute object of the feature the geometry belongs to
 * @param spatialReference - Used when the JSON carries no spatial reference of its own
 */
export function geometryFromJson(
  json: unknown,
  attributes?: unknown,
  spatialReference?: SpatialReferenceLike
): Geometry {
  if (!isJsonObject(json)) {
    throw new ConversionError('Geometry must be a JSON object', 'Geometry', json);
  }

  const options = (
    sr: unknown,
    flags: Pick<MultipartOptions, 'hasZ' | 'hasM'> = {}
  ): MultipartOptions => ({
    hasZ: flags.hasZ,
    hasM: flags.hasM,
    attributes: attributesFromJson(attributes),
    spatialReference: sr !== undefined ? spatialReferenceFromJson(sr) : spatialReference,
  });

  if ('x' in json && 'y' in json) {
    const point = parseWire(PointJsonSchema, json, 'Point');
    return new Point(point.x, point.y, { ...options(point.spatialReference), z: point.z, m: point.m });
  }
  if ('points' in json) {
    const multipoint = parseWire(MultipointJsonSchema, json, 'Multipoint');
    return new Multipoint(multipoint.points, options(multipoint.spatialReference, multipoint));
  }
  if ('paths' in json) {
    const polyline = parseWire(PolylineJsonSchema, json, 'Polyline');
    return new Polyline(polyline.paths, options(polyline.spatialReference, polyline));
  }
  if ('rings' in json) {
    const polygon = parseWire(PolygonJsonSchema, json, 'Polygon');
    return new Polygon(polygon.rings, options(polygon.spatialReference, polygon));
  }
  if ('xmin' in json) {
    const envelope = parseWire(EnvelopeJsonSchema, json, 'Envelope');
    return new Envelope(envelope, options(envelope.spatialReference));
  }

  throw new ConversionError(
    `Unrecognized geometry with keys: ${Object.keys(json).join(', ') || '(none)'}`,
    'Geometry',
    json
  );
}

/**
 * Convert a spatial reference or geometry JSON object
 *
 * Objects carrying `wkid`, `latestWkid` or `wkt` at the top level are
 * spatial references; anything else is read as a geometry.
 */
export function convertFromJson(json: unknown, attributes?: unknown): SpatialReference | Geometry {
  if (isJsonObject(json) && ('wkid' in json || 'latestWkid' in json || 'wkt' in json)) {
    return spatialReferenceFromJson(json);
  }
  return geometryFromJson(json, attributes);
}
