import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  ConversionError,
  GPTypeError,
  InconsistentGeometryError,
  InvalidUnitError,
  MissingSpatialReferenceError,
  UnparseableDateError,
  UnresolvableTypeError,
  isConversionError,
  isGPTypeError,
  isInvalidUnitError,
  isUnresolvableTypeError,
} from '../../../core/errors.js';
import { parseWire } from '../../../core/wire.js';

describe('errors', () => {
  it('keep the prototype chain', () => {
    const error = new InvalidUnitError('esriParsecs', ['esriMeters']);
    expect(error).toBeInstanceOf(InvalidUnitError);
    expect(error).toBeInstanceOf(GPTypeError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('InvalidUnitError');
    expect(error.code).toBe('INVALID_UNIT');
    expect(error.message).toBe('Unit "esriParsecs" not valid');
  });

  it('describe missing spatial references', () => {
    expect(new MissingSpatialReferenceError().message).toBe('Could not determine spatial reference');
    expect(new MissingSpatialReferenceError().code).toBe('MISSING_SPATIAL_REFERENCE');
  });

  it('list the geometry types found', () => {
    expect(new InconsistentGeometryError(['esriGeometryPoint', 'esriGeometryPolygon']).message).toBe(
      'Must have consistent geometries, found esriGeometryPoint, esriGeometryPolygon'
    );
    expect(new InconsistentGeometryError([]).message).toBe(
      'Must have consistent geometries: record set has no features'
    );
  });

  it('name every format tried for a date', () => {
    const error = new UnparseableDateError('soon', ['%Y-%m-%d', '%d/%m/%Y']);
    expect(error.message).toBe('Cannot convert "soon" to a date using "%Y-%m-%d" or "%d/%m/%Y"');
    expect(error.formats).toEqual(['%Y-%m-%d', '%d/%m/%Y']);
  });

  it('name the unknown type', () => {
    expect(new UnresolvableTypeError('GPComposite').message).toBe('Unsupported geoprocessing type: GPComposite');
  });

  it('narrow with type guards', () => {
    const error: unknown = new UnresolvableTypeError('GPComposite');
    expect(isGPTypeError(error)).toBe(true);
    expect(isUnresolvableTypeError(error)).toBe(true);
    expect(isInvalidUnitError(error)).toBe(false);
    expect(isGPTypeError(new Error('plain'))).toBe(false);
  });

  describe('ConversionError', () => {
    it('carries the validation issues from parseWire', () => {
      const schema = z.object({ a: z.number() });
      let caught: unknown;
      try {
        parseWire(schema, { a: 'x' }, 'Thing');
      } catch (error) {
        caught = error;
      }

      expect(isConversionError(caught)).toBe(true);
      if (!isConversionError(caught)) return;
      expect(caught.message).toBe('Cannot decode Thing: Expected number, received string');
      expect(caught.typeName).toBe('Thing');
      expect(caught.value).toEqual({ a: 'x' });
      expect(caught.toLogString()).toBe(
        'ConversionError (Thing): Cannot decode Thing: Expected number, received string\n' +
          '  a: Expected number, received string'
      );
    });

    it('logs a single line without issues', () => {
      expect(new ConversionError('bad value', 'GPLong', 'x').toLogString()).toBe(
        'ConversionError (GPLong): bad value'
      );
    });
  });
});
