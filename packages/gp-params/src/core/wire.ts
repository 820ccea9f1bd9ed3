/**
 * Wire-shape validation shared by every decoder
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { ConversionError } from './errors.js';

/**
 * Validate a wire value against a schema or throw a ConversionError
 *
 * @param typeName - Type being decoded, reported on failure
 */
export function parseWire<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  typeName: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const first = result.error.errors[0]?.message ?? 'Invalid value';
    throw new ConversionError(
      `Cannot decode ${typeName}: ${first}`,
      typeName,
      value,
      result.error.errors
    );
  }
  return result.data;
}
