/**
 * GPLinearUnit: a distance with an ArcGIS unit name
 */

import { z } from 'zod';
import { DEFAULT_CONFIG, type GPParamsConfig } from '../core/config.js';
import { InvalidUnitError } from '../core/errors.js';
import type { JsonObject } from '../core/json.js';
import { parseWire } from '../core/wire.js';
import { toDouble } from './conversions.js';
import type { GPValueContract } from './base.js';

export const ALLOWED_LINEAR_UNITS = [
  'esriCentimeters',
  'esriDecimalDegrees',
  'esriDecimeters',
  'esriFeet',
  'esriInches',
  'esriKilometers',
  'esriMeters',
  'esriMiles',
  'esriMillimeters',
  'esriNauticalMiles',
  'esriPoints',
  'esriUnknownUnits',
  'esriYards',
] as const;

export type LinearUnitName = (typeof ALLOWED_LINEAR_UNITS)[number];

const allowedUnitSet: ReadonlySet<string> = new Set(ALLOWED_LINEAR_UNITS);

export function isLinearUnitName(unit: string): unit is LinearUnitName {
  return allowedUnitSet.has(unit);
}

const LinearUnitJsonSchema = z.object({
  distance: z.union([z.number(), z.string()]),
  units: z.string(),
});

type DistanceInput = number | string;

export class GPLinearUnit implements GPValueContract {
  static readonly typeName = 'GPLinearUnit';
  readonly typeName = 'GPLinearUnit' as const;
  readonly distance: number;
  readonly units: LinearUnitName;

  /**
   * @param value - Distance, or a `[distance, unit]` pair
   * @param unit - Defaults to the configured default unit (esriMeters)
   */
  constructor(
    value: DistanceInput | readonly [DistanceInput, string],
    unit?: string,
    config: Pick<GPParamsConfig, 'defaultLinearUnit'> = DEFAULT_CONFIG
  ) {
    let distance: DistanceInput;
    if (typeof value === 'number' || typeof value === 'string') {
      distance = value;
    } else {
      [distance, unit] = value;
    }
    this.distance = toDouble(distance, GPLinearUnit.typeName);
    this.units = GPLinearUnit.checkUnit(unit ?? config.defaultLinearUnit);
  }

  private static checkUnit(unit: string): LinearUnitName {
    if (!isLinearUnitName(unit)) {
      throw new InvalidUnitError(unit, ALLOWED_LINEAR_UNITS);
    }
    return unit;
  }

  toJSON(): JsonObject {
    return { distance: this.distance, units: this.units };
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }

  static fromJson(value: unknown): GPLinearUnit {
    const json = parseWire(LinearUnitJsonSchema, value, GPLinearUnit.typeName);
    return new GPLinearUnit(json.distance, json.units);
  }

  static fromJsonDefinition(_definition: unknown): typeof GPLinearUnit {
    return GPLinearUnit;
  }
}
