/**
 * URL-valued parameter types
 *
 * GPDataFile carries only a URL. GPRasterData and GPRasterLayer share one
 * structure, a URL plus a data format (jpg, png, tif...), and differ only in
 * the type name they register under.
 */

import { z } from 'zod';
import type { JsonObject } from '../core/json.js';
import { parseWire } from '../core/wire.js';
import type { GPValueContract } from './base.js';

const DataFileJsonSchema = z.object({
  url: z.string(),
});

const UrlWithFormatJsonSchema = z.object({
  url: z.string(),
  format: z.string(),
});

export class GPDataFile implements GPValueContract {
  static readonly typeName = 'GPDataFile';
  readonly typeName = 'GPDataFile' as const;

  constructor(readonly url: string) {}

  toJSON(): JsonObject {
    return { url: this.url };
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }

  static fromJson(value: unknown): GPDataFile {
    return new GPDataFile(parseWire(DataFileJsonSchema, value, GPDataFile.typeName).url);
  }

  static fromJsonDefinition(_definition: unknown): typeof GPDataFile {
    return GPDataFile;
  }
}

function defineUrlWithFormatType<N extends string>(typeName: N) {
  return class GPUrlWithFormat implements GPValueContract {
    static readonly typeName: N = typeName;
    readonly typeName: N = typeName;

    constructor(
      readonly url: string,
      readonly format: string
    ) {}

    toJSON(): JsonObject {
      return { url: this.url, format: this.format };
    }

    toString(): string {
      return JSON.stringify(this.toJSON());
    }

    static fromJson(value: unknown): GPUrlWithFormat {
      const json = parseWire(UrlWithFormatJsonSchema, value, typeName);
      return new GPUrlWithFormat(json.url, json.format);
    }

    static fromJsonDefinition(_definition: unknown): typeof GPUrlWithFormat {
      return GPUrlWithFormat;
    }
  };
}

export const GPRasterData = defineUrlWithFormatType('GPRasterData');
export type GPRasterData = InstanceType<typeof GPRasterData>;

export const GPRasterLayer = defineUrlWithFormatType('GPRasterLayer');
export type GPRasterLayer = InstanceType<typeof GPRasterLayer>;
