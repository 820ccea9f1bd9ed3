/**
 * Spatial reference descriptor attached to ArcGIS geometry
 */

import type { JsonObject } from '../core/json.js';
import { parseWire } from '../core/wire.js';
import { SpatialReferenceJsonSchema, type SpatialReferenceJson } from './schemas.js';

/** Anything a spatial reference can be built from */
export type SpatialReferenceLike = SpatialReference | number | SpatialReferenceJson;

export const WGS84_WKID = 4326;

export class SpatialReference {
  readonly wkid?: number;
  readonly latestWkid?: number;
  readonly wkt?: string;

  constructor(json: SpatialReferenceJson) {
    this.wkid = json.wkid;
    this.latestWkid = json.latestWkid;
    this.wkt = json.wkt;
  }

  /**
   * Copy a spatial reference, or build one from a wkid or its JSON form
   */
  static from(like: SpatialReferenceLike): SpatialReference {
    if (like instanceof SpatialReference) {
      return new SpatialReference(like.toJSON());
    }
    if (typeof like === 'number') {
      return new SpatialReference({ wkid: like });
    }
    return new SpatialReference(parseWire(SpatialReferenceJsonSchema, like, 'SpatialReference'));
  }

  equals(other: SpatialReference): boolean {
    return this.wkid === other.wkid && this.latestWkid === other.latestWkid && this.wkt === other.wkt;
  }

  toJSON(): JsonObject {
    return {
      ...(this.wkid !== undefined ? { wkid: this.wkid } : {}),
      ...(this.latestWkid !== undefined ? { latestWkid: this.latestWkid } : {}),
      ...(this.wkt !== undefined ? { wkt: this.wkt } : {}),
    };
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }
}
