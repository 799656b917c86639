/**
 * Naming helpers shared by the emitters.
 *
 * @packageDocumentation
 */

import { propNameToIdentifier } from '../schema/validator.js';
import type { PropertyIR, SyspropIR } from '../schema/types.js';

/** Banner written at the top of every generated file. */
export const GENERATED_FILE_BANNER = '// Generated by the sysprop generator. DO NOT EDIT!\n\n';

/**
 * Returns the runtime key of a property: `ro.` for properties that cannot be
 * changed after boot (Readonly and Writeonce), then the set's prefix with a
 * trailing dot, then the property name.
 *
 * @param ir - The property set.
 * @param prop - One of its properties.
 * @returns The key, e.g. `"ro.vendor.audio.volume"`.
 */
export function propertyKey(ir: Pick<SyspropIR, 'prefix'>, prop: PropertyIR): string {
  let prefix = (prop.access === 'ReadWrite' ? '' : 'ro.') + ir.prefix;
  if (prefix !== '' && !prefix.endsWith('.')) {
    prefix += '.';
  }
  return prefix + prop.name;
}

/**
 * Accessor identifier of a property (dots replaced with underscores).
 */
export function propertyIdentifier(prop: Pick<PropertyIR, 'name'>): string {
  return propNameToIdentifier(prop.name);
}

/**
 * Name of the enum type generated for an Enum or EnumList property in C++
 * and Java.
 */
export function enumTypeName(prop: Pick<PropertyIR, 'name'>): string {
  return `${propertyIdentifier(prop)}_values`;
}

/**
 * Splits a property's enum values in declaration order.
 */
export function enumValues(prop: Pick<PropertyIR, 'enum_values'>): string[] {
  return prop.enum_values.split('|');
}

/**
 * Text after the last dot of the module name, used as the class name.
 */
export function moduleClassName(module: string): string {
  return module.slice(module.lastIndexOf('.') + 1);
}

/**
 * Text before the last dot of the module name, used as the Java package.
 */
export function modulePackage(module: string): string {
  const lastDot = module.lastIndexOf('.');
  return lastDot === -1 ? '' : module.slice(0, lastDot);
}

/**
 * Converts camelCase or mixed-case text to snake_case.
 *
 * An underscore goes before an upper-case letter that follows a lower-case
 * letter or digit, and before the last capital of an upper-case run that is
 * followed by a lower-case letter. Runs of underscores collapse to one.
 *
 * @example
 * ```typescript
 * camelCaseToSnakeCase('test_BOOLeaN'); // 'test_boo_lea_n'
 * camelCaseToSnakeCase('audioHALVersion'); // 'audio_hal_version'
 * ```
 */
export function camelCaseToSnakeCase(text: string): string {
  let result = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    const prev = text.charAt(i - 1);
    const next = text.charAt(i + 1);
    const isUpper = /[A-Z]/.test(ch);

    if (isUpper && i > 0) {
      const afterLowerOrDigit = /[a-z0-9]/.test(prev);
      const endsUpperRun = /[A-Z]/.test(prev) && /[a-z]/.test(next);
      if (afterLowerOrDigit || endsUpperRun) {
        result += '_';
      }
    }
    result += ch.toLowerCase();
  }
  return result.replace(/_+/g, '_');
}

/**
 * Converts snake_case text to CamelCase by capitalizing the first letter of
 * every underscore-separated part. The rest of each part is kept as is.
 *
 * @example
 * ```typescript
 * snakeCaseToCamelCase('test_enum'); // 'TestEnum'
 * ```
 */
export function snakeCaseToCamelCase(text: string): string {
  return text
    .split('_')
    .filter((part) => part !== '')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
}

/**
 * Escapes a value for use inside a double-quoted string literal in C++,
 * Java or Rust.
 */
export function quoteString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}
