/**
 * Contract shared by every geoprocessing parameter type
 *
 * A type definition is the class itself: it carries the registered type name
 * and decodes wire values. Instances carry one parameter's value and encode
 * it. Scalar definitions decode to bare primitives rather than instances, so
 * `TDecoded` is not always the instance type.
 */

import type { GPParamsConfig } from '../core/config.js';
import type { JsonValue } from '../core/json.js';

export interface GPTypeDefinition<TDecoded = unknown> {
  readonly typeName: string;

  /**
   * Decode a wire value of this type. Types with configurable defaults
   * (date formats) read them from `config`.
   */
  fromJson(value: unknown, config?: GPParamsConfig): TDecoded;

  /**
   * Interpret a schema element describing this type. Every built-in type
   * returns itself.
   */
  fromJsonDefinition(definition: unknown): GPTypeDefinition<TDecoded>;
}

export interface GPValueContract {
  readonly typeName: string;

  /** The exact wire value for this parameter */
  toJSON(): JsonValue;

  /** Compact JSON text of the wire value */
  toString(): string;
}
