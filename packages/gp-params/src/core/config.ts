/**
 * gp-params Configuration
 *
 * Fixed settings the parameter types share: date formats, the default
 * linear unit and the separator reserved for compound type names.
 *
 * TYPE SAFETY: All configuration is strongly typed and immutable.
 */

export interface GPParamsConfig {
  /** Format used when a date is built without one (strftime directives) */
  readonly defaultDateFormat: string;

  /** Format the service uses to render dates with a time zone */
  readonly fallbackDateFormat: string;

  /** Unit assigned to a linear unit built without one */
  readonly defaultLinearUnit: string;

  /** Characters that mark a compound type name; such names are never registered */
  readonly reservedTypeSeparator: string;
}

export const DEFAULT_CONFIG: GPParamsConfig = {
  defaultDateFormat: '%Y-%m-%d',
  fallbackDateFormat: '%a %b %d %H:%M:%S %Z %Y',
  defaultLinearUnit: 'esriMeters',
  reservedTypeSeparator: '|',
};

/**
 * Build a configuration from partial overrides
 */
export function createConfig(overrides: Partial<GPParamsConfig> = {}): GPParamsConfig {
  return {
    ...DEFAULT_CONFIG,
    ...overrides,
  };
}
