/**
 * Registry of geoprocessing type definitions by name
 *
 * Schema parsing looks up "the type named X" here. Registration happens once,
 * through an explicit call during initialization; after that the registry is
 * only read. Names containing the reserved separator describe compound types
 * ("GPString|GPLong") and are never registered on their own.
 */

import { DEFAULT_CONFIG, type GPParamsConfig } from '../core/config.js';
import { UnresolvableTypeError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { GPTypeDefinition } from '../gptypes/base.js';

const log = createLogger({ module: 'registry' });

export class TypeRegistry {
  private readonly definitions = new Map<string, GPTypeDefinition>();

  /** Settings handed to every definition this registry decodes with */
  readonly config: GPParamsConfig;

  constructor(config: GPParamsConfig = DEFAULT_CONFIG) {
    this.config = config;
  }

  /**
   * Register a definition under its own type name
   *
   * @returns false when the name contains the reserved separator and was skipped
   */
  register(definition: GPTypeDefinition): boolean {
    const name = definition.typeName;
    if (name.includes(this.config.reservedTypeSeparator)) {
      log.debug('Skipping compound type name', { typeName: name });
      return false;
    }

    if (this.definitions.has(name)) {
      log.warn('Replacing registered type definition', { typeName: name });
    }
    this.definitions.set(name, definition);
    log.debug('Registered type definition', { typeName: name });
    return true;
  }

  lookup(name: string): GPTypeDefinition | undefined {
    return this.definitions.get(name);
  }

  /**
   * @throws {UnresolvableTypeError} If no definition is registered under the name
   */
  resolve(name: string): GPTypeDefinition {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new UnresolvableTypeError(name);
    }
    return definition;
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  names(): string[] {
    return [...this.definitions.keys()];
  }
}
