/**
 * GPFeatureRecordSetLayer: features sharing one spatial reference
 *
 * Wire form:
 * ```json
 * {
 *   "geometryType": "esriGeometryPoint",
 *   "spatialReference": { "wkid": 4326 },
 *   "features": [{ "geometry": { "x": 1, "y": 2 }, "attributes": { "id": 1 } }]
 * }
 * ```
 *
 * The spatial reference is given explicitly or taken from the first feature.
 * Every feature must report the same geometry type when the layer is encoded.
 */

import { feature, featureCollection } from '@turf/helpers';
import type { FeatureCollection, GeoJsonProperties, Geometry as GeoJSONGeometry } from 'geojson';
import { z } from 'zod';
import { InconsistentGeometryError, MissingSpatialReferenceError } from '../core/errors.js';
import type { JsonObject } from '../core/json.js';
import { parseWire } from '../core/wire.js';
import { attributesFromJson, geometryFromJson, spatialReferenceFromJson } from '../geometry/convert.js';
import { geometryFromGeoJSON, geometryToGeoJSON } from '../geometry/geojson.js';
import { Geometry, type GeometryType } from '../geometry/geometry.js';
import { SpatialReference, WGS84_WKID, type SpatialReferenceLike } from '../geometry/spatial-reference.js';
import type { GPValueContract } from './base.js';

const FeatureSetJsonSchema = z.object({
  geometryType: z.string().optional(),
  spatialReference: z.unknown(),
  features: z.array(
    z.object({
      geometry: z.unknown(),
      attributes: z.unknown().optional(),
    })
  ),
});

export class GPFeatureRecordSetLayer implements GPValueContract {
  static readonly typeName = 'GPFeatureRecordSetLayer';

  readonly typeName = 'GPFeatureRecordSetLayer' as const;
  readonly features: readonly Geometry[];
  readonly spatialReference: SpatialReference;
  /** Union of the attribute names across all features */
  readonly fields: ReadonlySet<string>;

  /**
   * @param features - One geometry or a sequence of them
   * @param spatialReference - Defaults to the first feature's spatial reference
   * @throws {MissingSpatialReferenceError} If no spatial reference is given and none can be inferred
   */
  constructor(features: Geometry | readonly Geometry[], spatialReference?: SpatialReferenceLike) {
    this.features = features instanceof Geometry ? [features] : [...features];

    const first = this.features[0];
    if (spatialReference !== undefined) {
      this.spatialReference = SpatialReference.from(spatialReference);
    } else if (first === undefined) {
      throw new MissingSpatialReferenceError();
    } else if (first.spatialReference === undefined) {
      throw new MissingSpatialReferenceError('Could not determine spatial reference: first feature has none');
    } else {
      this.spatialReference = SpatialReference.from(first.spatialReference);
    }

    this.fields = new Set(this.features.flatMap((geometry) => Object.keys(geometry.attributes)));
  }

  /** Distinct geometry types, in order of first appearance */
  get geometryTypes(): GeometryType[] {
    return [...new Set(this.features.map((geometry) => geometry.geometryType))];
  }

  /**
   * @throws {InconsistentGeometryError} Unless every feature has the same geometry type
   */
  toJSON(): JsonObject {
    const geometryTypes = this.geometryTypes;
    const geometryType = geometryTypes[0];
    if (geometryTypes.length !== 1 || geometryType === undefined) {
      throw new InconsistentGeometryError(geometryTypes);
    }

    return {
      geometryType,
      spatialReference: this.spatialReference.toJSON(),
      features: this.features.map((geometry) => geometry.toFeatureJson()),
    };
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }

  /**
   * GeoJSON view of the features, attributes as properties. Coordinates are
   * not reprojected.
   */
  toGeoJSON(): FeatureCollection<GeoJSONGeometry, GeoJsonProperties> {
    return featureCollection(
      this.features.map((geometry) => feature(geometryToGeoJSON(geometry), { ...geometry.attributes }))
    );
  }

  static fromJson(value: unknown): GPFeatureRecordSetLayer {
    const json = parseWire(FeatureSetJsonSchema, value, GPFeatureRecordSetLayer.typeName);
    const spatialReference = spatialReferenceFromJson(json.spatialReference);
    const geometries = json.features.map((entry) =>
      geometryFromJson(entry.geometry, entry.attributes, spatialReference)
    );
    return new GPFeatureRecordSetLayer(geometries, spatialReference);
  }

  /**
   * Build a layer from GeoJSON. Features without geometry are skipped.
   *
   * @param spatialReference - Spatial reference of the coordinates, WGS84 unless given
   */
  static fromGeoJSON(
    collection: FeatureCollection<GeoJSONGeometry | null>,
    spatialReference: SpatialReferenceLike = WGS84_WKID
  ): GPFeatureRecordSetLayer {
    const geometries: Geometry[] = [];
    for (const item of collection.features) {
      if (!item.geometry) continue;
      geometries.push(
        geometryFromGeoJSON(item.geometry, {
          spatialReference,
          attributes: attributesFromJson(item.properties),
        })
      );
    }
    return new GPFeatureRecordSetLayer(geometries, spatialReference);
  }

  static fromJsonDefinition(_definition: unknown): typeof GPFeatureRecordSetLayer {
    return GPFeatureRecordSetLayer;
  }
}
