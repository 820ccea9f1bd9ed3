/**
 * Scalar parameter types: GPBoolean, GPDouble, GPLong, GPString
 *
 * Each fixes one conversion function. Encoding applies it to the stored
 * value; decoding applies it to the wire value and returns the bare
 * primitive, not an instance, so callers get plain values for simple types.
 */

import type { JsonPrimitive, JsonValue } from '../core/json.js';
import type { GPValueContract } from './base.js';
import { toBoolean, toDouble, toLong, toText } from './conversions.js';

type Conversion<T extends JsonPrimitive> = (value: unknown, typeName: string) => T;

function defineSimpleType<N extends string, T extends JsonPrimitive>(typeName: N, conversion: Conversion<T>) {
  return class GPSimpleType implements GPValueContract {
    static readonly typeName: N = typeName;
    readonly typeName: N = typeName;
    readonly value: T;

    constructor(value: JsonValue) {
      this.value = conversion(value, typeName);
    }

    toJSON(): T {
      return conversion(this.value, typeName);
    }

    toString(): string {
      return JSON.stringify(this.toJSON());
    }

    static fromJson(value: unknown): T {
      return conversion(value, typeName);
    }

    static fromJsonDefinition(_definition: unknown): typeof GPSimpleType {
      return GPSimpleType;
    }
  };
}

export const GPBoolean = defineSimpleType('GPBoolean', toBoolean);
export type GPBoolean = InstanceType<typeof GPBoolean>;

export const GPDouble = defineSimpleType('GPDouble', toDouble);
export type GPDouble = InstanceType<typeof GPDouble>;

export const GPLong = defineSimpleType('GPLong', toLong);
export type GPLong = InstanceType<typeof GPLong>;

export const GPString = defineSimpleType('GPString', toText);
export type GPString = InstanceType<typeof GPString>;
