/**
 * Zod schemas for ArcGIS geometry JSON
 *
 * Shapes follow the REST API geometry objects: coordinates are [x, y]
 * arrays with optional z and m values appended.
 */

import { z } from 'zod';

export const SpatialReferenceJsonSchema = z
  .object({
    wkid: z.number().int().optional(),
    latestWkid: z.number().int().optional(),
    wkt: z.string().min(1).optional(),
  })
  .refine(
    (sr) => sr.wkid !== undefined || sr.latestWkid !== undefined || sr.wkt !== undefined,
    'Spatial reference needs a wkid, latestWkid or wkt'
  );

export type SpatialReferenceJson = z.infer<typeof SpatialReferenceJsonSchema>;

const PositionSchema = z.array(z.number()).min(2, 'Coordinate needs at least x and y');

const Common = {
  spatialReference: SpatialReferenceJsonSchema.optional(),
  hasZ: z.boolean().optional(),
  hasM: z.boolean().optional(),
};

export const PointJsonSchema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number().optional(),
  m: z.number().optional(),
  spatialReference: SpatialReferenceJsonSchema.optional(),
});

export const MultipointJsonSchema = z.object({
  points: z.array(PositionSchema),
  ...Common,
});

export const PolylineJsonSchema = z.object({
  paths: z.array(z.array(PositionSchema)),
  ...Common,
});

export const PolygonJsonSchema = z.object({
  rings: z.array(z.array(PositionSchema)),
  ...Common,
});

export const EnvelopeJsonSchema = z.object({
  xmin: z.number(),
  ymin: z.number(),
  xmax: z.number(),
  ymax: z.number(),
  spatialReference: SpatialReferenceJsonSchema.optional(),
});

export const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const AttributesSchema = z.record(AttributeValueSchema);

export type PointJson = z.infer<typeof PointJsonSchema>;
export type MultipointJson = z.infer<typeof MultipointJsonSchema>;
export type PolylineJson = z.infer<typeof PolylineJsonSchema>;
export type PolygonJson = z.infer<typeof PolygonJsonSchema>;
export type EnvelopeJson = z.infer<typeof EnvelopeJsonSchema>;
