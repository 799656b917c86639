/**
 * Rust emitter: a single `mod.rs` with one key constant, one getter and,
 * for writable properties, one setter per property, built on the
 * `rustutils::system_properties` crate.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import {
  elementType,
  isEnumType,
  isInScope,
  isListType,
  type PropertyIR,
  type Scope,
  type SyspropIR,
} from '../schema/types.js';
import { CodeWriter } from './code-writer.js';
import {
  camelCaseToSnakeCase,
  enumValues,
  GENERATED_FILE_BANNER,
  propertyIdentifier,
  propertyKey,
  quoteString,
  snakeCaseToCamelCase,
} from './naming.js';
import type { GeneratedFile, RustEmitOptions } from './types.js';

const MODULE_DOCS = `//! Autogenerated system property accessors.
//!
//! This is an autogenerated module. The module contains methods for typed access to
//! Android system properties.

`;

const MODULE_IMPORTS = `use std::fmt;
use rustutils::system_properties::{self, error::SysPropError, parsers_formatters};

`;

const RUST_KEYWORDS = new Set(['type']);

/**
 * Name of the enum generated for an Enum or EnumList property.
 *
 * @example
 * ```typescript
 * rustEnumTypeName({ name: 'test_enum' }); // 'TestEnumValues'
 * ```
 */
export function rustEnumTypeName(prop: Pick<PropertyIR, 'name'>): string {
  return `${snakeCaseToCamelCase(propertyIdentifier(prop))}Values`;
}

/**
 * Snake-case accessor name of a property.
 */
export function rustFunctionName(prop: Pick<PropertyIR, 'name'>): string {
  return camelCaseToSnakeCase(propertyIdentifier(prop));
}

/**
 * Name of the constant holding a property's key.
 */
export function rustKeyConstant(prop: Pick<PropertyIR, 'name'>): string {
  return `${rustFunctionName(prop).toUpperCase()}_PROP`;
}

/**
 * Rust type of one value of a property (the element type for lists).
 */
export function rustElementType(prop: PropertyIR): string {
  switch (elementType(prop.type)) {
    case 'Boolean':
      return 'bool';
    case 'Integer':
      return 'i32';
    case 'UInt':
      return 'u32';
    case 'Long':
      return 'i64';
    case 'ULong':
      return 'u64';
    case 'Double':
      return 'f64';
    case 'String':
      return 'String';
    case 'Enum':
      return rustEnumTypeName(prop);
  }
}

/**
 * Rust type returned by a getter.
 */
export function rustReturnType(prop: PropertyIR): string {
  const element = rustElementType(prop);
  return isListType(prop.type) ? `Vec<${element}>` : element;
}

/**
 * Rust type accepted by a setter. Strings and lists are borrowed.
 */
export function rustAcceptType(prop: PropertyIR): string {
  if (prop.type === 'String') {
    return '&str';
  }
  if (isListType(prop.type)) {
    return `&[${rustElementType(prop)}]`;
  }
  return rustElementType(prop);
}

function parserFunction(prop: PropertyIR): string {
  if (prop.type === 'Boolean') {
    return 'parsers_formatters::parse_bool';
  }
  if (prop.type === 'BooleanList') {
    return 'parsers_formatters::parse_bool_list';
  }
  return isListType(prop.type) ? 'parsers_formatters::parse_list' : 'parsers_formatters::parse';
}

function formatterFunction(prop: PropertyIR): string {
  if (prop.type === 'Boolean') {
    return prop.integer_as_bool
      ? 'parsers_formatters::format_bool_as_int'
      : 'parsers_formatters::format_bool';
  }
  if (prop.type === 'BooleanList') {
    return prop.integer_as_bool
      ? 'parsers_formatters::format_bool_list_as_int'
      : 'parsers_formatters::format_bool_list';
  }
  return isListType(prop.type) ? 'parsers_formatters::format_list' : 'parsers_formatters::format';
}

function writeReadMatch(writer: CodeWriter, parser: string): void {
  writer.indent();
  writer.write('Err(e) => Err(SysPropError::FetchError(e)),\n');
  writer.write(`Ok(Some(val)) => ${parser}(val.as_str()).map_err(SysPropError::ParseError).map(Some),\n`);
  writer.write('Ok(None) => Ok(None),\n');
  writer.dedent();
}

function writeEnum(writer: CodeWriter, prop: PropertyIR): void {
  const enumType = rustEnumTypeName(prop);
  const values = enumValues(prop);

  writer.write('#[allow(missing_docs)]\n');
  writer.write('#[derive(Copy, Clone, Debug, Eq, PartialEq, PartialOrd, Hash, Ord)]\n');
  writer.write(`pub enum ${enumType} {\n`);
  writer.indent();
  for (const value of values) {
    writer.write(`${snakeCaseToCamelCase(value)},\n`);
  }
  writer.dedent();
  writer.write('}\n\n');

  writer.write(`impl std::str::FromStr for ${enumType} {\n`);
  writer.indent();
  writer.write('type Err = String;\n\n');
  writer.write('fn from_str(s: &str) -> std::result::Result<Self, Self::Err> {\n');
  writer.indent();
  writer.write('match s {\n');
  writer.indent();
  for (const value of values) {
    writer.write(`"${value}" => Ok(${enumType}::${snakeCaseToCamelCase(value)}),\n`);
  }
  writer.write(`_ => Err(format!("'{}' cannot be parsed for ${enumType}", s)),\n`);
  writer.dedent();
  writer.write('}\n');
  writer.dedent();
  writer.write('}\n');
  writer.dedent();
  writer.write('}\n\n');

  writer.write(`impl fmt::Display for ${enumType} {\n`);
  writer.indent();
  writer.write("fn fmt(&self, f: &mut fmt::Formatter<'_>) -> fmt::Result {\n");
  writer.indent();
  writer.write('match self {\n');
  writer.indent();
  for (const value of values) {
    writer.write(`${enumType}::${snakeCaseToCamelCase(value)} => write!(f, "${value}"),\n`);
  }
  writer.dedent();
  writer.write('}\n');
  writer.dedent();
  writer.write('}\n');
  writer.dedent();
  writer.write('}\n\n');
}

/**
 * Generates `mod.rs`.
 *
 * @param ir - The validated property set.
 * @param scope - Highest scope included.
 * @returns Rust source text.
 */
export function generateRustSource(ir: SyspropIR, scope: Scope): string {
  const writer = new CodeWriter();

  writer.write(MODULE_DOCS);
  writer.write(GENERATED_FILE_BANNER);
  writer.write(MODULE_IMPORTS);

  for (const prop of ir.properties) {
    if (!isInScope(prop, scope)) {
      continue;
    }

    const name = rustFunctionName(prop);
    const constant = rustKeyConstant(prop);
    const key = propertyKey(ir, prop);
    const parser = parserFunction(prop);

    writer.write(`/// The property name of the "${name}" API.\n`);
    writer.write(`pub const ${constant}: &str = ${quoteString(key)};\n\n`);

    if (isEnumType(prop.type)) {
      writeEnum(writer, prop);
    }

    writer.write(`/// Returns the value of the property '${key}' if set.\n`);
    if (prop.deprecated) {
      writer.write('#[deprecated]\n');
    }
    const getter = RUST_KEYWORDS.has(name) ? `r#${name}` : name;
    writer.write(
      `pub fn ${getter}() -> std::result::Result<Option<${rustReturnType(prop)}>, SysPropError> {\n`
    );
    writer.indent();
    writer.write(`let result = match system_properties::read(${constant}) {\n`);
    writeReadMatch(writer, parser);
    writer.write('};\n');
    if (prop.legacy_prop_name === '') {
      writer.write('result\n');
    } else {
      writer.write('if result.is_ok() { return result; }\n');
      writer.write(
        `log::debug!("Failed to fetch the original property '{}' ('{}'), falling back to the legacy one '{}'.", ${constant}, result.unwrap_err(), ${quoteString(prop.legacy_prop_name)});\n`
      );
      writer.write(`match system_properties::read(${quoteString(prop.legacy_prop_name)}) {\n`);
      writeReadMatch(writer, parser);
      writer.write('}\n');
    }
    writer.dedent();
    writer.write('}\n\n');

    if (prop.access === 'Readonly') {
      continue;
    }

    writer.write(`/// Sets the value of the property '${key}', returns 'Ok' if successful.\n`);
    if (prop.deprecated) {
      writer.write('#[deprecated]\n');
    }
    writer.write(
      `pub fn set_${name}(v: ${rustAcceptType(prop)}) -> std::result::Result<(), SysPropError> {\n`
    );
    writer.indent();
    let writeArgument = 'v';
    if (prop.type !== 'String') {
      const formatArgument = isListType(prop.type) ? 'v' : '&v';
      writer.write(`let value = ${formatterFunction(prop)}(${formatArgument});\n`);
      writeArgument = 'value.as_str()';
    }
    writer.write(
      `system_properties::write(${constant}, ${writeArgument}).map_err(SysPropError::SetError)\n`
    );
    writer.dedent();
    writer.write('}\n\n');
  }

  return writer.code();
}

/**
 * Generates the Rust module.
 *
 * @param ir - The validated property set.
 * @param options - Output directory and scope.
 * @returns `mod.rs` in the Rust output directory.
 */
export function generateRustFiles(ir: SyspropIR, options: RustEmitOptions): GeneratedFile[] {
  return [
    {
      path: path.join(options.rustOutputDir, 'mod.rs'),
      content: generateRustSource(ir, options.scope),
      description: 'generated rust lib',
    },
  ];
}
