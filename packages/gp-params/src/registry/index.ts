export { TypeRegistry } from './type-registry.js';
export { defaultRegistry, registerBuiltinTypes } from './builtin.js';
