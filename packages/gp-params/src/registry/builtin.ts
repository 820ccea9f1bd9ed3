/**
 * Registration of the built-in parameter types
 */

import { BUILTIN_TYPES } from '../gptypes/index.js';
import { TypeRegistry } from './type-registry.js';

/**
 * Register every built-in type; call once per registry
 */
export function registerBuiltinTypes(registry: TypeRegistry): TypeRegistry {
  for (const definition of BUILTIN_TYPES) {
    registry.register(definition);
  }
  return registry;
}

/** Process-wide registry holding the built-in types */
export const defaultRegistry = registerBuiltinTypes(new TypeRegistry());
