/**
 * ArcGIS geometry model
 *
 * Each geometry carries its REST type tag, an optional spatial reference and
 * the attribute values of the feature it belongs to. Two JSON forms exist:
 * the standalone geometry object (spatial reference included when set) and
 * the feature form used inside a feature set, where the spatial reference
 * lives on the set instead.
 */

import type { JsonObject } from '../core/json.js';
import { SpatialReference, type SpatialReferenceLike } from './spatial-reference.js';

export type GeometryType =
  | 'esriGeometryPoint'
  | 'esriGeometryMultipoint'
  | 'esriGeometryPolyline'
  | 'esriGeometryPolygon'
  | 'esriGeometryEnvelope';

export type AttributeValue = string | number | boolean | null;

export type Attributes = Readonly<Record<string, AttributeValue>>;

/** [x, y] with optional z and m appended */
export type Position = readonly number[];

export interface GeometryOptions {
  readonly spatialReference?: SpatialReferenceLike;
  readonly attributes?: Attributes;
}

/** One entry of a feature set's `features` array */
export type FeatureJson = {
  readonly geometry: JsonObject;
  readonly attributes: Attributes;
};

export abstract class Geometry {
  abstract readonly geometryType: GeometryType;
  readonly spatialReference?: SpatialReference;
  readonly attributes: Attributes;

  constructor(options: GeometryOptions = {}) {
    this.spatialReference =
      options.spatialReference !== undefined ? SpatialReference.from(options.spatialReference) : undefined;
    this.attributes = { ...(options.attributes ?? {}) };
  }

  /** Geometry JSON without the spatial reference */
  protected abstract shapeJson(): JsonObject;

  toJSON(): JsonObject {
    const shape = this.shapeJson();
    return this.spatialReference ? { ...shape, spatialReference: this.spatialReference.toJSON() } : shape;
  }

  toFeatureJson(): FeatureJson {
    return {
      geometry: this.shapeJson(),
      attributes: { ...this.attributes },
    };
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }
}

export interface PointOptions extends GeometryOptions {
  readonly z?: number;
  readonly m?: number;
}

export class Point extends Geometry {
  readonly geometryType = 'esriGeometryPoint' as const;
  readonly z?: number;
  readonly m?: number;

  constructor(
    readonly x: number,
    readonly y: number,
    options: PointOptions = {}
  ) {
    super(options);
    this.z = options.z;
    this.m = options.m;
  }

  protected shapeJson(): JsonObject {
    return {
      x: this.x,
      y: this.y,
      ...(this.z !== undefined ? { z: this.z } : {}),
      ...(this.m !== undefined ? { m: this.m } : {}),
    };
  }
}

export interface MultipartOptions extends GeometryOptions {
  /** Coordinates carry a z value after x and y */
  readonly hasZ?: boolean;
  /** Coordinates carry an m value, after z when both are present */
  readonly hasM?: boolean;
}

/**
 * Vertex-list geometries. `hasZ`/`hasM` say how to read the values after
 * x and y, so they travel with the coordinates.
 */
export abstract class MultipartGeometry extends Geometry {
  readonly hasZ?: boolean;
  readonly hasM?: boolean;

  constructor(options: MultipartOptions = {}) {
    super(options);
    this.hasZ = options.hasZ;
    this.hasM = options.hasM;
  }

  protected vertexFlags(): JsonObject {
    return {
      ...(this.hasZ !== undefined ? { hasZ: this.hasZ } : {}),
      ...(this.hasM !== undefined ? { hasM: this.hasM } : {}),
    };
  }
}

export class Multipoint extends MultipartGeometry {
  readonly geometryType = 'esriGeometryMultipoint' as const;

  constructor(
    readonly points: readonly Position[],
    options: MultipartOptions = {}
  ) {
    super(options);
  }

  protected shapeJson(): JsonObject {
    return { ...this.vertexFlags(), points: this.points.map((p) => [...p]) };
  }
}

export class Polyline extends MultipartGeometry {
  readonly geometryType = 'esriGeometryPolyline' as const;

  constructor(
    readonly paths: readonly (readonly Position[])[],
    options: MultipartOptions = {}
  ) {
    super(options);
  }

  protected shapeJson(): JsonObject {
    return { ...this.vertexFlags(), paths: this.paths.map((path) => path.map((p) => [...p])) };
  }
}

/** Rings are clockwise for outer boundaries and counterclockwise for holes */
export class Polygon extends MultipartGeometry {
  readonly geometryType = 'esriGeometryPolygon' as const;

  constructor(
    readonly rings: readonly (readonly Position[])[],
    options: MultipartOptions = {}
  ) {
    super(options);
  }

  protected shapeJson(): JsonObject {
    return { ...this.vertexFlags(), rings: this.rings.map((ring) => ring.map((p) => [...p])) };
  }
}

export interface EnvelopeBounds {
  readonly xmin: number;
  readonly ymin: number;
  readonly xmax: number;
  readonly ymax: number;
}

export class Envelope extends Geometry {
  readonly geometryType = 'esriGeometryEnvelope' as const;
  readonly xmin: number;
  readonly ymin: number;
  readonly xmax: number;
  readonly ymax: number;

  constructor(bounds: EnvelopeBounds, options: GeometryOptions = {}) {
    super(options);
    this.xmin = bounds.xmin;
    this.ymin = bounds.ymin;
    this.xmax = bounds.xmax;
    this.ymax = bounds.ymax;
  }

  protected shapeJson(): JsonObject {
    return { xmin: this.xmin, ymin: this.ymin, xmax: this.xmax, ymax: this.ymax };
  }
}
