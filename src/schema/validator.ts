/**
 * Semantic validation for parsed sysprop schemas.
 *
 * Checks run in a fixed order and stop at the first failure; the message of
 * that failure is the whole result. Messages are stable strings that callers
 * and tests match verbatim.
 *
 * @packageDocumentation
 */

import { isEnumType, PLATFORM_MODULE, type Property, type PropertySet } from './types.js';

/**
 * Error thrown by {@link assertSchemaValid}.
 */
export class SchemaValidationError extends Error {
  /**
   * Creates a new SchemaValidationError.
   *
   * @param message - The message of the first violated rule.
   */
  constructor(message: string) {
    super(message);
    this.name = 'SchemaValidationError';
  }
}

/**
 * Result of validating a property set.
 */
export type SchemaValidationResult = { valid: true } | { valid: false; error: string };

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Checks that a name is a C-style identifier (ASCII letters, digits and
 * underscores, not starting with a digit).
 *
 * @param name - The candidate identifier.
 * @returns True if the name is a valid identifier.
 */
export function isCorrectIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

/**
 * Checks that a name is a non-empty, dot-separated sequence of identifiers.
 *
 * @param name - The candidate property name.
 * @returns True if every dot-separated segment is an identifier.
 */
export function isCorrectPropertyName(name: string): boolean {
  if (name === '') {
    return false;
  }
  return name.split('.').every(isCorrectIdentifier);
}

/**
 * Converts a dotted property name into the identifier used for generated
 * accessors by replacing every dot with an underscore.
 *
 * @param name - The property name.
 * @returns The accessor identifier.
 */
export function propNameToIdentifier(name: string): string {
  return name.replace(/\./g, '_');
}

function validateProperty(props: PropertySet, prop: Property): string | undefined {
  if (!isCorrectPropertyName(prop.name)) {
    return `Invalid prop name "${prop.name}"`;
  }

  if (isEnumType(prop.type)) {
    // Splitting "" yields [""], so an absent enum_values is reported as an
    // invalid value rather than an empty list.
    const values = prop.enum_values.split('|');
    if (values.length === 0) {
      return `Enum values are empty for prop "${prop.name}"`;
    }

    for (const value of values) {
      if (!isCorrectIdentifier(value)) {
        return `Invalid enum value "${value}" for prop "${prop.name}"`;
      }
    }

    const seen = new Set<string>();
    for (const value of values) {
      if (seen.has(value)) {
        return `Duplicated enum value "${value}" for prop "${prop.name}"`;
      }
      seen.add(value);
    }
  }

  if (props.owner === 'Platform') {
    const fullName = props.prefix + prop.name;
    if (fullName.startsWith('vendor.') || fullName.startsWith('odm.')) {
      return `Prop "${prop.name}" owned by platform cannot have vendor. or odm. namespace`;
    }
  }

  return undefined;
}

function findFirstError(props: PropertySet): string | undefined {
  const segments = props.module.split('.');
  if (segments.length <= 1) {
    return `Invalid module name "${props.module}"`;
  }

  for (const segment of segments) {
    if (!isCorrectIdentifier(segment)) {
      return `Invalid name "${segment}" in module`;
    }
  }

  if (props.prefix !== '' && !isCorrectPropertyName(props.prefix)) {
    return `Invalid prefix "${props.prefix}"`;
  }

  if (props.properties.length === 0) {
    return 'There is no defined property';
  }

  for (const prop of props.properties) {
    const error = validateProperty(props, prop);
    if (error !== undefined) {
      return error;
    }
  }

  const identifiers = new Set<string>();
  for (const prop of props.properties) {
    const identifier = propNameToIdentifier(prop.name);
    if (identifiers.has(identifier)) {
      return `Duplicated prop name "${prop.name}"`;
    }
    identifiers.add(identifier);
  }

  if (props.owner === 'Platform') {
    if (props.module !== PLATFORM_MODULE) {
      return `Platform-defined properties should have "${PLATFORM_MODULE}" as module name`;
    }
  } else if (props.module === PLATFORM_MODULE) {
    return `Vendor or Odm cannot use "${PLATFORM_MODULE}" as module name`;
  }

  return undefined;
}

/**
 * Validates a parsed property set.
 *
 * Rules, in order: module name, prefix, non-empty property list, each
 * property (name, enum values, platform namespace), normalized-name
 * uniqueness, and module/owner consistency. Only the first violation is
 * reported.
 *
 * @param props - The parsed property set.
 * @returns `{ valid: true }`, or the message of the first violated rule.
 *
 * @example
 * ```typescript
 * const result = validateSchema(parseSchema(text));
 * if (!result.valid) {
 *   console.error(result.error); // e.g. 'Duplicated prop name "dup"'
 * }
 * ```
 */
export function validateSchema(props: PropertySet): SchemaValidationResult {
  const error = findFirstError(props);
  return error === undefined ? { valid: true } : { valid: false, error };
}

/**
 * Validates a parsed property set and throws if it is invalid.
 *
 * @param props - The parsed property set.
 * @throws SchemaValidationError carrying the first violation's message.
 */
export function assertSchemaValid(props: PropertySet): void {
  const result = validateSchema(props);
  if (!result.valid) {
    throw new SchemaValidationError(result.error);
  }
}
