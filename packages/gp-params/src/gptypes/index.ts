import { GPDate } from './date.js';
import { GPFeatureRecordSetLayer } from './feature-record-set.js';
import { GPLinearUnit } from './linear-unit.js';
import { GPRecordSet } from './record-set.js';
import { GPBoolean, GPDouble, GPLong, GPString } from './scalar.js';
import { GPDataFile, GPRasterData, GPRasterLayer } from './url.js';

export type { GPTypeDefinition, GPValueContract } from './base.js';
export { toBoolean, toDouble, toLong, toText } from './conversions.js';
export { ALLOWED_LINEAR_UNITS, isLinearUnitName, type LinearUnitName } from './linear-unit.js';
export { DATE_DIRECTIVE_CHARACTERS, formatDate, fromWireFormat, parseDate, toWireFormat } from './strftime.js';
export {
  GPBoolean,
  GPDouble,
  GPLong,
  GPString,
  GPLinearUnit,
  GPDate,
  GPDataFile,
  GPRasterData,
  GPRasterLayer,
  GPFeatureRecordSetLayer,
  GPRecordSet,
};

/** Every parameter value this package can encode */
export type GPValue =
  | GPBoolean
  | GPDouble
  | GPLong
  | GPString
  | GPLinearUnit
  | GPDate
  | GPDataFile
  | GPRasterData
  | GPRasterLayer
  | GPFeatureRecordSetLayer
  | GPRecordSet;

export type GPTypeName = GPValue['typeName'];

/** The built-in type definitions, in registration order */
export const BUILTIN_TYPES = [
  GPBoolean,
  GPDouble,
  GPLong,
  GPString,
  GPLinearUnit,
  GPDate,
  GPDataFile,
  GPRasterData,
  GPRasterLayer,
  GPFeatureRecordSetLayer,
  GPRecordSet,
] as const;

export function isGPValue(value: unknown): value is GPValue {
  return BUILTIN_TYPES.some((definition) => value instanceof definition);
}
