/**
 * Default-fill pass that turns a validated property set into the IR.
 *
 * @packageDocumentation
 */

import type { Access, Property, PropertyIR, PropertySet, SyspropIR } from './types.js';

function resolveAccess(prop: Property): Access {
  if (prop.access !== undefined) {
    return prop.access;
  }
  if (prop.readonly === false) {
    return 'ReadWrite';
  }
  return 'Readonly';
}

/**
 * Resolves the access mode of one property. An explicit `access` wins; a bare
 * `readonly` flag maps to Readonly or ReadWrite; with neither the property is
 * read-only.
 *
 * @param prop - A property from a validated set.
 * @returns The normalized property.
 */
export function normalizeProperty(prop: Property): PropertyIR {
  const access = resolveAccess(prop);
  return {
    name: prop.name,
    type: prop.type,
    scope: prop.scope,
    enum_values: prop.enum_values,
    access,
    readonly: access === 'Readonly',
    legacy_prop_name: prop.legacy_prop_name,
    deprecated: prop.deprecated,
    integer_as_bool: prop.integer_as_bool,
  };
}

/**
 * Builds the IR from a property set that has already passed validation.
 * The input is left untouched.
 *
 * @param props - The validated property set.
 * @returns The normalized, read-only IR.
 */
export function normalizeSchema(props: PropertySet): SyspropIR {
  return {
    owner: props.owner,
    module: props.module,
    prefix: props.prefix,
    properties: props.properties.map(normalizeProperty),
  };
}
