/**
 * gp-params - Geoprocessing parameter conversion
 *
 * Converts between the JSON a geoprocessing service exchanges and typed
 * parameter values:
 * - Scalars, linear units, dates, data files and raster references
 * - Feature record sets with ArcGIS geometry and GeoJSON interop
 * - A type registry and parameter description parsing
 *
 * @packageDocumentation
 */

// Core
export { DEFAULT_CONFIG, createConfig, type GPParamsConfig } from './core/config.js';
export {
  GPTypeError,
  InvalidUnitError,
  MissingSpatialReferenceError,
  InconsistentGeometryError,
  UnparseableDateError,
  UnresolvableTypeError,
  ConversionError,
  isGPTypeError,
  isInvalidUnitError,
  isMissingSpatialReferenceError,
  isInconsistentGeometryError,
  isUnparseableDateError,
  isUnresolvableTypeError,
  isConversionError,
  type GPTypeErrorCode,
} from './core/errors.js';
export { createLogger, Logger, type LoggerConfig, type LogLevel, type LogMetadata } from './core/logger.js';
export type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from './core/json.js';

// Geometry
export * from './geometry/index.js';

// Parameter types
export * from './gptypes/index.js';

// Registry
export { TypeRegistry, defaultRegistry, registerBuiltinTypes } from './registry/index.js';

// Parameter descriptions
export * from './parameters/index.js';
