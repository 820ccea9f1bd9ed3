export {
  Geometry,
  Point,
  Multipoint,
  Polyline,
  Polygon,
  Envelope,
  MultipartGeometry,
  type GeometryType,
  type GeometryOptions,
  type PointOptions,
  type MultipartOptions,
  type EnvelopeBounds,
  type Attributes,
  type AttributeValue,
  type Position,
  type FeatureJson,
} from './geometry.js';
export { SpatialReference, WGS84_WKID, type SpatialReferenceLike } from './spatial-reference.js';
export { attributesFromJson, convertFromJson, geometryFromJson, spatialReferenceFromJson } from './convert.js';
export { geometryFromGeoJSON, geometryToGeoJSON } from './geojson.js';
export type { SpatialReferenceJson } from './schemas.js';
