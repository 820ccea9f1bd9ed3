/**
 * Parameter descriptions and request encoding
 *
 * A task publishes one description per parameter, naming its data type.
 * The data type is resolved through the registry, so a description naming
 * an unknown type fails here, before any request is built.
 */

import type { JsonPrimitive } from '../core/json.js';
import { parseWire } from '../core/wire.js';
import type { GPTypeDefinition } from '../gptypes/base.js';
import type { GPValue } from '../gptypes/index.js';
import { defaultRegistry } from '../registry/builtin.js';
import type { TypeRegistry } from '../registry/type-registry.js';
import { ParameterInfoJsonSchema, type ParameterDirection, type ParameterType } from './schemas.js';

export interface GPParameterInfo {
  readonly name: string;
  readonly dataType: string;
  readonly definition: GPTypeDefinition;
  readonly displayName?: string;
  readonly description?: string;
  readonly direction?: ParameterDirection;
  readonly parameterType?: ParameterType;
  readonly category?: string;
  /** Decoded default value; scalar types decode to bare primitives */
  readonly defaultValue?: unknown;
  readonly choiceList?: readonly string[];
}

/**
 * Parse one parameter description
 *
 * @throws {UnresolvableTypeError} If the data type is not registered
 * @throws {ConversionError} If the description or its default value is malformed
 */
export function parseParameterInfo(json: unknown, registry: TypeRegistry = defaultRegistry): GPParameterInfo {
  const info = parseWire(ParameterInfoJsonSchema, json, 'GPParameterInfo');
  const definition = registry.resolve(info.dataType).fromJsonDefinition(json);
  const hasDefault = info.defaultValue !== undefined && info.defaultValue !== null;

  return {
    name: info.name,
    dataType: info.dataType,
    definition,
    displayName: info.displayName,
    description: info.description,
    direction: info.direction,
    parameterType: info.parameterType,
    category: info.category,
    defaultValue: hasDefault ? definition.fromJson(info.defaultValue, registry.config) : undefined,
    choiceList: info.choiceList,
  };
}

/**
 * Decode a wire value for the named data type
 *
 * @throws {UnresolvableTypeError} If the data type is not registered
 */
export function decodeParameterValue(
  dataType: string,
  value: unknown,
  registry: TypeRegistry = defaultRegistry
): unknown {
  return registry.resolve(dataType).fromJson(value, registry.config);
}

export type ParameterInput = GPValue | JsonPrimitive;

/**
 * Form fields for a geoprocessing request
 *
 * Strings travel as raw text; every other value as its compact JSON.
 * Null becomes an empty field.
 */
export function encodeParameterValues(values: Readonly<Record<string, ParameterInput>>): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const [name, value] of Object.entries(values)) {
    fields[name] = encodeParameterValue(value);
  }
  return fields;
}

function encodeParameterValue(value: ParameterInput): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return JSON.stringify(value);
  if (value.typeName === 'GPString') return value.value;
  return value.toString();
}
