/**
 * Primitive conversions behind the scalar parameter types
 *
 * Each takes any decoded JSON value and yields the primitive the service
 * expects, or throws a ConversionError naming the target type.
 */

import { ConversionError } from '../core/errors.js';

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * JSON truthiness: false, 0, "", null, [] and {} are false
 */
export function toBoolean(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return true;
}

export function toDouble(value: unknown, typeName = 'GPDouble'): number {
  let result: number;
  if (typeof value === 'number') {
    result = value;
  } else if (typeof value === 'boolean') {
    result = value ? 1 : 0;
  } else if (typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())) {
    result = Number(value.trim());
  } else {
    throw new ConversionError(`Cannot convert ${JSON.stringify(value) ?? String(value)} to a double`, typeName, value);
  }

  if (!Number.isFinite(result)) {
    throw new ConversionError(`Double must be finite, got ${result}`, typeName, value);
  }
  return result;
}

export function toLong(value: unknown, typeName = 'GPLong'): number {
  let result: number;
  if (typeof value === 'number' && Number.isFinite(value)) {
    // -0 normalized to 0
    result = Math.trunc(value) || 0;
  } else if (typeof value === 'boolean') {
    result = value ? 1 : 0;
  } else if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    result = Number.parseInt(value.trim(), 10);
  } else {
    throw new ConversionError(`Cannot convert ${JSON.stringify(value) ?? String(value)} to a long`, typeName, value);
  }

  if (!Number.isSafeInteger(result)) {
    throw new ConversionError(`Long ${result} is outside the safe integer range`, typeName, value);
  }
  return result;
}

/**
 * Strings pass through; numbers and booleans become their JSON text
 */
export function toText(value: unknown, typeName = 'GPString'): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  throw new ConversionError(`Cannot convert ${JSON.stringify(value) ?? String(value)} to a string`, typeName, value);
}
