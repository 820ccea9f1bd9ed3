/**
 * GPDate: a date paired with the format it is exchanged in
 *
 * The format uses percent-escaped strftime directives locally ("%Y-%m-%d").
 * On the wire the service drops the percent signs ("Y-m-d"), so decoding
 * puts them back before every directive character. A bare date string from
 * the service is in its default rendering, the fallback format.
 */

import { isValid } from 'date-fns';
import { z } from 'zod';
import { DEFAULT_CONFIG, type GPParamsConfig } from '../core/config.js';
import { ConversionError, UnparseableDateError } from '../core/errors.js';
import type { JsonObject } from '../core/json.js';
import { createLogger } from '../core/logger.js';
import { parseWire } from '../core/wire.js';
import type { GPValueContract } from './base.js';
import { formatDate, fromWireFormat, parseDate, toWireFormat } from './strftime.js';

const log = createLogger({ module: 'date' });

const DateJsonSchema = z.union([
  z.object({
    date: z.string(),
    format: z.string(),
  }),
  z.string(),
]);

type DateFormats = Pick<GPParamsConfig, 'defaultDateFormat' | 'fallbackDateFormat'>;

export class GPDate implements GPValueContract {
  static readonly typeName = 'GPDate';

  readonly typeName = 'GPDate' as const;
  readonly date: Date;
  readonly format: string;

  /**
   * @param date - A Date, or text in `format` (or in the fallback format)
   * @param format - strftime-style format with percent signs; the configured default when omitted
   * @throws {ConversionError} If `date` is an invalid Date
   * @throws {UnparseableDateError} If the text matches neither format
   */
  constructor(date: Date | string, format?: string, config: DateFormats = DEFAULT_CONFIG) {
    this.format = format ?? config.defaultDateFormat;
    if (typeof date === 'string') {
      this.date = GPDate.parse(date, this.format, config.fallbackDateFormat);
    } else if (isValid(date)) {
      this.date = new Date(date.getTime());
    } else {
      throw new ConversionError('Cannot use an invalid Date', GPDate.typeName, date);
    }
  }

  private static parse(text: string, format: string, fallbackFormat: string): Date {
    const parsed = parseDate(text, format);
    if (parsed) {
      return parsed;
    }

    const fallback = parseDate(text, fallbackFormat);
    if (fallback) {
      log.debug('Parsed date with fallback format', { text, format, fallbackFormat });
      return fallback;
    }

    throw new UnparseableDateError(text, [format, fallbackFormat]);
  }

  toJSON(): JsonObject {
    return {
      date: formatDate(this.date, this.format),
      format: toWireFormat(this.format),
    };
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }

  /**
   * A bare string is the service's own rendering and is read with the
   * fallback format.
   */
  static fromJson(value: unknown, config: DateFormats = DEFAULT_CONFIG): GPDate {
    const json = parseWire(DateJsonSchema, value, GPDate.typeName);
    if (typeof json === 'string') {
      return new GPDate(json, config.fallbackDateFormat, config);
    }
    return new GPDate(json.date, fromWireFormat(json.format), config);
  }

  static fromJsonDefinition(_definition: unknown): typeof GPDate {
    return GPDate;
  }
}
