export {
  decodeParameterValue,
  encodeParameterValues,
  parseParameterInfo,
  type GPParameterInfo,
  type ParameterInput,
} from './parameter-info.js';
export type { ParameterDirection, ParameterType } from './schemas.js';
