/**
 * GPRecordSet: a loosely typed table of records
 *
 * Entries are passed through without validation. The wire form is
 * `{"features": [...]}`; a bare array is accepted when decoding.
 */

import { z } from 'zod';
import { JsonValueSchema, type JsonObject, type JsonValue } from '../core/json.js';
import { parseWire } from '../core/wire.js';
import type { GPValueContract } from './base.js';

const RecordSetJsonSchema = z.union([
  z.object({ features: z.array(JsonValueSchema) }),
  z.array(JsonValueSchema),
]);

export class GPRecordSet implements GPValueContract {
  static readonly typeName = 'GPRecordSet';
  readonly typeName = 'GPRecordSet' as const;
  readonly features: readonly JsonValue[];

  constructor(features: readonly JsonValue[]) {
    this.features = [...features];
  }

  toJSON(): JsonObject {
    return { features: this.features };
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }

  static fromJson(value: unknown): GPRecordSet {
    const json = parseWire(RecordSetJsonSchema, value, GPRecordSet.typeName);
    return new GPRecordSet(Array.isArray(json) ? json : json.features);
  }

  static fromJsonDefinition(_definition: unknown): typeof GPRecordSet {
    return GPRecordSet;
  }
}
