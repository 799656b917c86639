/**
 * Types for sysprop schema documents and the validated IR handed to emitters.
 *
 * Field names follow the schema's own spelling (`enum_values`,
 * `legacy_prop_name`, ...) so a parsed document reads like its source text.
 *
 * @packageDocumentation
 */

/**
 * Build partition that defines a property set.
 */
export type Owner = 'Platform' | 'Vendor' | 'Odm';

/**
 * Visibility tier of a property. Ordered Internal < Public < System.
 */
export type Scope = 'Internal' | 'Public' | 'System';

/**
 * Read/write capability of a property.
 */
export type Access = 'ReadWrite' | 'Readonly' | 'Writeonce';

/**
 * Scalar property kinds.
 */
export type ScalarType =
  | 'Boolean'
  | 'Integer'
  | 'UInt'
  | 'Long'
  | 'ULong'
  | 'Double'
  | 'String'
  | 'Enum';

/**
 * List property kinds, one per scalar kind.
 */
export type ListType = `${ScalarType}List`;

/**
 * Every type tag a property may declare.
 */
export type PropertyType = ScalarType | ListType;

export const OWNERS: readonly Owner[] = ['Platform', 'Vendor', 'Odm'];

export const SCOPES: readonly Scope[] = ['Internal', 'Public', 'System'];

export const ACCESS_MODES: readonly Access[] = ['ReadWrite', 'Readonly', 'Writeonce'];

export const SCALAR_TYPES: readonly ScalarType[] = [
  'Boolean',
  'Integer',
  'UInt',
  'Long',
  'ULong',
  'Double',
  'String',
  'Enum',
];

export const PROPERTY_TYPES: readonly PropertyType[] = [
  ...SCALAR_TYPES,
  ...SCALAR_TYPES.map((type): ListType => `${type}List`),
];

/**
 * Module name reserved for properties owned by the platform.
 */
export const PLATFORM_MODULE = 'android.os.PlatformProperties';

/**
 * A single property as it appears in a parsed schema document.
 */
export interface Property {
  /** Dotted property name, e.g. `"persist.audio.volume"`. */
  name: string;
  type: PropertyType;
  scope: Scope;
  /** Pipe-delimited enum values, only meaningful for Enum and EnumList. */
  enum_values: string;
  /** Explicit access mode, if the document declared one. */
  access?: Access;
  /** Legacy read-only flag, if the document declared one. */
  readonly?: boolean;
  /** Key read when the primary key is unset. Empty means none. */
  legacy_prop_name: string;
  deprecated: boolean;
  /** Boolean values are written as `1`/`0` instead of `true`/`false`. */
  integer_as_bool: boolean;
}

/**
 * A parsed schema document, before validation.
 */
export interface PropertySet {
  owner: Owner;
  /** Dotted module name; the last segment becomes the generated class name. */
  module: string;
  /** Prepended to every property's runtime key. */
  prefix: string;
  properties: Property[];
}

/**
 * A property after normalization: access mode and read-only flag resolved.
 */
export interface PropertyIR {
  readonly name: string;
  readonly type: PropertyType;
  readonly scope: Scope;
  readonly enum_values: string;
  readonly access: Access;
  readonly readonly: boolean;
  readonly legacy_prop_name: string;
  readonly deprecated: boolean;
  readonly integer_as_bool: boolean;
}

/**
 * The validated, normalized property set consumed by the emitters.
 */
export interface SyspropIR {
  readonly owner: Owner;
  readonly module: string;
  readonly prefix: string;
  readonly properties: readonly PropertyIR[];
}

/**
 * Checks whether a type tag is one of the list kinds.
 *
 * @param type - The type tag.
 * @returns True for `*List` types.
 */
export function isListType(type: PropertyType): type is ListType {
  return type.endsWith('List');
}

/**
 * Checks whether a type tag carries enum values.
 *
 * @param type - The type tag.
 * @returns True for Enum and EnumList.
 */
export function isEnumType(type: PropertyType): boolean {
  return type === 'Enum' || type === 'EnumList';
}

/**
 * Returns the scalar kind of a type tag (the element kind for lists).
 *
 * @param type - The type tag.
 * @returns The scalar kind.
 */
export function elementType(type: PropertyType): ScalarType {
  const scalar = SCALAR_TYPES.find((candidate) => candidate === type || `${candidate}List` === type);
  if (scalar === undefined) {
    throw new Error(`Unknown property type '${type}'`);
  }
  return scalar;
}

/**
 * Position of a scope in the Internal < Public < System ordering.
 *
 * @param scope - The scope.
 * @returns 0, 1 or 2.
 */
export function scopeRank(scope: Scope): number {
  return SCOPES.indexOf(scope);
}

/**
 * Checks whether a property belongs in output generated for a given scope.
 *
 * @param prop - The property.
 * @param scope - The requested output scope.
 * @returns True when the property's scope does not exceed the requested one.
 */
export function isInScope(prop: Pick<PropertyIR, 'scope'>, scope: Scope): boolean {
  return scopeRank(prop.scope) <= scopeRank(scope);
}

/**
 * Narrows an arbitrary string to a scope.
 *
 * @param value - Candidate value.
 * @returns True if the value names a scope.
 */
export function isScope(value: string): value is Scope {
  return SCOPES.some((scope) => scope === value);
}
