/**
 * gp-params Error Types
 *
 * Every failure a conversion can raise. Nothing here is retried or recovered
 * internally: the caller decides whether a bad value is a schema mismatch or
 * bad user input.
 */

import type { ZodIssue } from 'zod';

export type GPTypeErrorCode =
  | 'INVALID_UNIT'
  | 'MISSING_SPATIAL_REFERENCE'
  | 'INCONSISTENT_GEOMETRY'
  | 'UNPARSEABLE_DATE'
  | 'UNRESOLVABLE_TYPE'
  | 'CONVERSION_FAILED';

/**
 * Base class for all conversion failures
 */
export abstract class GPTypeError extends Error {
  abstract readonly code: GPTypeErrorCode;

  constructor(message: string) {
    super(message);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A linear unit outside the allowed unit set
 */
export class InvalidUnitError extends GPTypeError {
  public readonly name = 'InvalidUnitError' as const;
  public readonly code = 'INVALID_UNIT' as const;

  constructor(
    public readonly unit: string,
    public readonly allowedUnits: readonly string[]
  ) {
    super(`Unit ${JSON.stringify(unit)} not valid`);
  }
}

/**
 * A feature record set with no features and no explicit spatial reference
 */
export class MissingSpatialReferenceError extends GPTypeError {
  public readonly name = 'MissingSpatialReferenceError' as const;
  public readonly code = 'MISSING_SPATIAL_REFERENCE' as const;

  constructor(message = 'Could not determine spatial reference') {
    super(message);
  }
}

/**
 * Features in one record set that do not share a single geometry type
 *
 * Raised at encode time. An empty record set reports no geometry types and
 * fails the same way.
 */
export class InconsistentGeometryError extends GPTypeError {
  public readonly name = 'InconsistentGeometryError' as const;
  public readonly code = 'INCONSISTENT_GEOMETRY' as const;

  constructor(public readonly geometryTypes: readonly string[]) {
    super(
      geometryTypes.length === 0
        ? 'Must have consistent geometries: record set has no features'
        : `Must have consistent geometries, found ${geometryTypes.join(', ')}`
    );
  }
}

/**
 * A date string that matches neither the supplied nor the fallback format
 */
export class UnparseableDateError extends GPTypeError {
  public readonly name = 'UnparseableDateError' as const;
  public readonly code = 'UNPARSEABLE_DATE' as const;

  constructor(
    public readonly value: string,
    public readonly formats: readonly string[]
  ) {
    super(`Cannot convert ${JSON.stringify(value)} to a date using ${formats.map((f) => JSON.stringify(f)).join(' or ')}`);
  }
}

/**
 * A registry lookup for a type name that was never registered
 */
export class UnresolvableTypeError extends GPTypeError {
  public readonly name = 'UnresolvableTypeError' as const;
  public readonly code = 'UNRESOLVABLE_TYPE' as const;

  constructor(public readonly typeName: string) {
    super(`Unsupported geoprocessing type: ${typeName}`);
  }
}

/**
 * A wire value whose shape or content cannot become the requested type
 */
export class ConversionError extends GPTypeError {
  public readonly name = 'ConversionError' as const;
  public readonly code = 'CONVERSION_FAILED' as const;

  constructor(
    message: string,
    public readonly typeName: string,
    public readonly value: unknown,
    public readonly issues: readonly ZodIssue[] = []
  ) {
    super(message);
  }

  /**
   * One line per validation issue, for logging
   */
  toLogString(): string {
    const parts = [`ConversionError (${this.typeName}): ${this.message}`];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      parts.push(`  ${path}: ${issue.message}`);
    }
    return parts.join('\n');
  }
}

export function isGPTypeError(error: unknown): error is GPTypeError {
  return error instanceof GPTypeError;
}

export function isInvalidUnitError(error: unknown): error is InvalidUnitError {
  return error instanceof InvalidUnitError;
}

export function isMissingSpatialReferenceError(error: unknown): error is MissingSpatialReferenceError {
  return error instanceof MissingSpatialReferenceError;
}

export function isInconsistentGeometryError(error: unknown): error is InconsistentGeometryError {
  return error instanceof InconsistentGeometryError;
}

export function isUnparseableDateError(error: unknown): error is UnparseableDateError {
  return error instanceof UnparseableDateError;
}

export function isUnresolvableTypeError(error: unknown): error is UnresolvableTypeError {
  return error instanceof UnresolvableTypeError;
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}
