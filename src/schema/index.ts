/**
 * Schema module: parsing, validation and normalization of sysprop schemas.
 *
 * @packageDocumentation
 */

export { parseSchema, SchemaParseError } from './parser.js';
export {
  assertSchemaValid,
  isCorrectIdentifier,
  isCorrectPropertyName,
  propNameToIdentifier,
  SchemaValidationError,
  validateSchema,
} from './validator.js';
export type { SchemaValidationResult } from './validator.js';
export { normalizeProperty, normalizeSchema } from './normalize.js';
export { loadSchema, loadSchemaFromText, SchemaLoadError } from './loader.js';
export {
  ACCESS_MODES,
  elementType,
  isEnumType,
  isInScope,
  isListType,
  isScope,
  OWNERS,
  PLATFORM_MODULE,
  PROPERTY_TYPES,
  SCALAR_TYPES,
  SCOPES,
  scopeRank,
} from './types.js';
export type {
  Access,
  ListType,
  Owner,
  Property,
  PropertyIR,
  PropertySet,
  PropertyType,
  ScalarType,
  Scope,
  SyspropIR,
} from './types.js';
