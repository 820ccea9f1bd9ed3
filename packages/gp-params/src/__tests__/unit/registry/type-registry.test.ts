import { describe, it, expect } from 'vitest';
import { TypeRegistry } from '../../../registry/type-registry.js';
import { defaultRegistry, registerBuiltinTypes } from '../../../registry/builtin.js';
import { createConfig } from '../../../core/config.js';
import { UnresolvableTypeError } from '../../../core/errors.js';
import type { GPTypeDefinition } from '../../../gptypes/base.js';
import { GPLinearUnit, GPString } from '../../../gptypes/index.js';

const Widget: GPTypeDefinition<string> = {
  typeName: 'Widget',
  fromJson: (value) => `widget:${String(value)}`,
  fromJsonDefinition: () => Widget,
};

describe('TypeRegistry', () => {
  it('looks up a registered definition by name', () => {
    const registry = new TypeRegistry();
    expect(registry.register(Widget)).toBe(true);
    expect(registry.lookup('Widget')).toBe(Widget);
    expect(registry.has('Widget')).toBe(true);
    expect(registry.resolve('Widget').fromJson(3)).toBe('widget:3');
  });

  it('never registers compound type names', () => {
    const registry = new TypeRegistry();
    const compound: GPTypeDefinition = { ...Widget, typeName: 'GPString|GPLong' };

    expect(registry.register(compound)).toBe(false);
    expect(registry.has('GPString|GPLong')).toBe(false);
    expect(registry.names()).toEqual([]);
  });

  it('honours a configured separator', () => {
    const registry = new TypeRegistry(createConfig({ reservedTypeSeparator: ';' }));
    expect(registry.register({ ...Widget, typeName: 'A|B' })).toBe(true);
    expect(registry.register({ ...Widget, typeName: 'A;B' })).toBe(false);
  });

  it('replaces a definition registered twice', () => {
    const registry = new TypeRegistry();
    const replacement: GPTypeDefinition = { ...Widget, fromJson: () => 'replaced' };
    registry.register(Widget);
    registry.register(replacement);

    expect(registry.lookup('Widget')).toBe(replacement);
    expect(registry.names()).toEqual(['Widget']);
  });

  it('returns undefined from lookup and throws from resolve for unknown names', () => {
    const registry = new TypeRegistry();
    expect(registry.lookup('GPRasterDataLayer')).toBeUndefined();
    expect(() => registry.resolve('GPRasterDataLayer')).toThrow(UnresolvableTypeError);
    expect(() => registry.resolve('GPRasterDataLayer')).toThrow('Unsupported geoprocessing type: GPRasterDataLayer');
  });
});

describe('built-in types', () => {
  it('are registered in order on the default registry', () => {
    expect(defaultRegistry.names()).toEqual([
      'GPBoolean',
      'GPDouble',
      'GPLong',
      'GPString',
      'GPLinearUnit',
      'GPDate',
      'GPDataFile',
      'GPRasterData',
      'GPRasterLayer',
      'GPFeatureRecordSetLayer',
      'GPRecordSet',
    ]);
  });

  it('register onto a fresh registry', () => {
    const registry = registerBuiltinTypes(new TypeRegistry());
    expect(registry).not.toBe(defaultRegistry);
    expect(registry.resolve('GPString')).toBe(GPString);
    expect(registry.resolve('GPLinearUnit')).toBe(GPLinearUnit);
  });
});
