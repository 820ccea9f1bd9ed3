import { describe, it, expect } from 'vitest';
import { GPDate } from '../../../gptypes/date.js';
import { ConversionError, UnparseableDateError } from '../../../core/errors.js';
import { createConfig } from '../../../core/config.js';

describe('GPDate', () => {
  describe('construction', () => {
    it('parses text with the default format', () => {
      const value = new GPDate('2020-01-15');
      expect(value.date.getTime()).toBe(new Date(2020, 0, 15).getTime());
      expect(value.format).toBe('%Y-%m-%d');
    });

    it('falls back to the service rendering and keeps the requested format', () => {
      const value = new GPDate('Wed Jan 15 10:30:00 UTC 2020', '%Y-%m-%d');
      expect(value.date.getTime()).toBe(new Date(2020, 0, 15, 10, 30).getTime());
      expect(value.format).toBe('%Y-%m-%d');
    });

    it('throws UnparseableDateError when neither format matches', () => {
      try {
        new GPDate('not a date');
        expect.unreachable('expected UnparseableDateError');
      } catch (error) {
        expect(error).toBeInstanceOf(UnparseableDateError);
        if (error instanceof UnparseableDateError) {
          expect(error.value).toBe('not a date');
          expect(error.formats).toEqual(['%Y-%m-%d', '%a %b %d %H:%M:%S %Z %Y']);
          expect(error.message).toBe(
            'Cannot convert "not a date" to a date using "%Y-%m-%d" or "%a %b %d %H:%M:%S %Z %Y"'
          );
        }
      }
    });

    it('rejects an invalid Date', () => {
      expect(() => new GPDate(new Date(Number.NaN))).toThrow(ConversionError);
      expect(() => new GPDate(new Date(Number.NaN))).toThrow('Cannot use an invalid Date');
    });

    it('takes its formats from the given config', () => {
      const config = createConfig({ defaultDateFormat: '%d/%m/%Y', fallbackDateFormat: '%Y%m%d' });
      const value = new GPDate('20200115', undefined, config);
      expect(value.format).toBe('%d/%m/%Y');
      expect(value.toJSON()).toEqual({ date: '15/01/2020', format: 'd/m/Y' });
      expect(() => new GPDate('someday', undefined, config)).toThrow(
        'Cannot convert "someday" to a date using "%d/%m/%Y" or "%Y%m%d"'
      );
    });

    it('copies a Date instead of sharing it', () => {
      const source = new Date(2020, 0, 15);
      const value = new GPDate(source);
      source.setFullYear(1999);
      expect(value.date.getFullYear()).toBe(2020);
    });
  });

  describe('encoding', () => {
    it('writes the date with its format and strips percent signs from the format', () => {
      const value = new GPDate(new Date(2020, 0, 15), '%Y-%m-%d');
      expect(value.toJSON()).toEqual({ date: '2020-01-15', format: 'Y-m-d' });
      expect(value.toString()).toBe('{"date":"2020-01-15","format":"Y-m-d"}');
    });

    it('writes times', () => {
      const value = new GPDate(new Date(2021, 6, 4, 18, 30), '%d/%m/%Y %H:%M');
      expect(value.toJSON()).toEqual({ date: '04/07/2021 18:30', format: 'd/m/Y H:M' });
    });
  });

  describe('decoding', () => {
    it('restores percent signs before parsing', () => {
      const value = GPDate.fromJson({ date: '2020-01-15', format: 'Y-m-d' });
      expect(value).toBeInstanceOf(GPDate);
      expect(value.format).toBe('%Y-%m-%d');
      expect(value.date.getTime()).toBe(new Date(2020, 0, 15).getTime());
    });

    it('reads a bare string with the fallback format', () => {
      const value = GPDate.fromJson('Wed Jan 15 10:30:00 UTC 2020');
      expect(value.format).toBe('%a %b %d %H:%M:%S %Z %Y');
      expect(value.toJSON()).toEqual({ date: 'Wed Jan 15 10:30:00 UTC 2020', format: 'a b d H:M:S Z Y' });
    });

    it('rejects other wire shapes', () => {
      expect(() => GPDate.fromJson(42)).toThrow(ConversionError);
      expect(() => GPDate.fromJson({ date: '2020-01-15' })).toThrow(ConversionError);
    });

    it('round-trips a date with a time of day', () => {
      const value = new GPDate(new Date(2021, 6, 4, 18, 30), '%d/%m/%Y %H:%M');
      const decoded = GPDate.fromJson(value.toJSON());
      expect(decoded.date.getTime()).toBe(value.date.getTime());
      expect(decoded.format).toBe(value.format);
    });
  });
});
