import { describe, it, expect } from 'vitest';
import { geometryFromGeoJSON, geometryToGeoJSON } from '../../../geometry/geojson.js';
import { Envelope, Multipoint, Point, Polygon, Polyline } from '../../../geometry/geometry.js';
import { ConversionError } from '../../../core/errors.js';

describe('geometryToGeoJSON', () => {
  it('converts points, with z when present', () => {
    expect(geometryToGeoJSON(new Point(1, 2))).toEqual({ type: 'Point', coordinates: [1, 2] });
    expect(geometryToGeoJSON(new Point(1, 2, { z: 3, m: 9 }))).toEqual({ type: 'Point', coordinates: [1, 2, 3] });
  });

  it('converts multipoints', () => {
    expect(geometryToGeoJSON(new Multipoint([[0, 0], [1, 1]]))).toEqual({
      type: 'MultiPoint',
      coordinates: [[0, 0], [1, 1]],
    });
  });

  it('converts a single-path polyline to a LineString', () => {
    expect(geometryToGeoJSON(new Polyline([[[0, 0], [1, 1]]]))).toEqual({
      type: 'LineString',
      coordinates: [[0, 0], [1, 1]],
    });
  });

  it('converts a multi-path polyline to a MultiLineString', () => {
    expect(geometryToGeoJSON(new Polyline([[[0, 0], [1, 1]], [[2, 2], [3, 3]]]))).toEqual({
      type: 'MultiLineString',
      coordinates: [[[0, 0], [1, 1]], [[2, 2], [3, 3]]],
    });
  });

  it('rewinds an outer ring and its hole to GeoJSON orientation', () => {
    const outer = [[0, 0], [0, 4], [4, 4], [0, 0]];
    const hole = [[1, 1], [2, 1], [2, 2], [1, 1]];
    expect(geometryToGeoJSON(new Polygon([outer, hole]))).toEqual({
      type: 'Polygon',
      coordinates: [
        [[0, 0], [4, 4], [0, 4], [0, 0]],
        [[1, 1], [2, 2], [2, 1], [1, 1]],
      ],
    });
  });

  it('splits a polygon with several outer rings into a MultiPolygon', () => {
    const first = [[0, 0], [0, 1], [1, 1], [1, 0], [0, 0]];
    const second = [[5, 5], [5, 6], [6, 6], [6, 5], [5, 5]];
    expect(geometryToGeoJSON(new Polygon([first, second]))).toEqual({
      type: 'MultiPolygon',
      coordinates: [
        [[[0, 0], [1, 0], [1, 1], [0, 1], [0, 0]]],
        [[[5, 5], [6, 5], [6, 6], [5, 6], [5, 5]]],
      ],
    });
  });

  it('drops m values from GeoJSON positions', () => {
    expect(geometryToGeoJSON(new Polyline([[[0, 0, 7], [1, 1, 8]]], { hasM: true }))).toEqual({
      type: 'LineString',
      coordinates: [[0, 0], [1, 1]],
    });
    expect(geometryToGeoJSON(new Multipoint([[0, 0, 3, 7]], { hasZ: true, hasM: true }))).toEqual({
      type: 'MultiPoint',
      coordinates: [[0, 0, 3]],
    });
  });

  it('converts an envelope to a closed rectangle', () => {
    expect(geometryToGeoJSON(new Envelope({ xmin: 0, ymin: 0, xmax: 2, ymax: 1 }))).toEqual({
      type: 'Polygon',
      coordinates: [[[0, 0], [2, 0], [2, 1], [0, 1], [0, 0]]],
    });
  });
});

describe('geometryFromGeoJSON', () => {
  it('builds a point with the given options', () => {
    const point = geometryFromGeoJSON(
      { type: 'Point', coordinates: [5, 6] },
      { spatialReference: 4326, attributes: { id: 7 } }
    );
    expect(point).toBeInstanceOf(Point);
    expect(point.toJSON()).toEqual({ x: 5, y: 6, spatialReference: { wkid: 4326 } });
    expect(point.attributes).toEqual({ id: 7 });
  });

  it('builds polylines from line strings', () => {
    const line = geometryFromGeoJSON({ type: 'LineString', coordinates: [[0, 0], [1, 1]] });
    expect(line.toJSON()).toEqual({ paths: [[[0, 0], [1, 1]]] });

    const multi = geometryFromGeoJSON({ type: 'MultiLineString', coordinates: [[[0, 0], [1, 1]], [[2, 2], [3, 3]]] });
    expect(multi.toJSON()).toEqual({ paths: [[[0, 0], [1, 1]], [[2, 2], [3, 3]]] });
  });

  it('flattens multipolygons into one ring list', () => {
    const polygon = geometryFromGeoJSON({
      type: 'MultiPolygon',
      coordinates: [
        [[[0, 0], [1, 0], [1, 1], [0, 0]]],
        [[[5, 5], [6, 5], [6, 6], [5, 5]]],
      ],
    });
    expect(polygon).toBeInstanceOf(Polygon);
    expect(polygon.toJSON()).toEqual({
      rings: [
        [[0, 0], [1, 1], [1, 0], [0, 0]],
        [[5, 5], [6, 6], [6, 5], [5, 5]],
      ],
    });
  });

  it('rewinds a counterclockwise outer ring to clockwise', () => {
    const polygon = geometryFromGeoJSON({
      type: 'Polygon',
      coordinates: [[[0, 0], [1, 0], [1, 1], [0, 1], [0, 0]]],
    });
    expect(polygon.toJSON()).toEqual({ rings: [[[0, 0], [0, 1], [1, 1], [1, 0], [0, 0]]] });
  });

  it('round-trips a polygon with a hole', () => {
    const geojson = {
      type: 'Polygon' as const,
      coordinates: [
        [[0, 0], [4, 0], [4, 4], [0, 4], [0, 0]],
        [[1, 1], [1, 2], [2, 2], [2, 1], [1, 1]],
      ],
    };
    const polygon = geometryFromGeoJSON(geojson);
    expect(polygon.toJSON()).toEqual({
      rings: [
        [[0, 0], [0, 4], [4, 4], [4, 0], [0, 0]],
        [[1, 1], [2, 1], [2, 2], [1, 2], [1, 1]],
      ],
    });
    expect(geometryToGeoJSON(polygon)).toEqual(geojson);
  });

  it('marks positions with an altitude as hasZ', () => {
    const line = geometryFromGeoJSON({ type: 'LineString', coordinates: [[0, 0, 10], [1, 1, 12]] });
    expect(line.toJSON()).toEqual({ hasZ: true, paths: [[[0, 0, 10], [1, 1, 12]]] });
  });

  it('rejects geometry collections', () => {
    expect(() => geometryFromGeoJSON({ type: 'GeometryCollection', geometries: [] })).toThrow(ConversionError);
  });
});
