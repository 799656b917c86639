import { describe, it, expect } from 'vitest';
import { loadSchemaFromText } from '../schema/loader.js';
import {
  generateRustFiles,
  generateRustSource,
  rustAcceptType,
  rustElementType,
  rustEnumTypeName,
  rustFunctionName,
  rustKeyConstant,
  rustReturnType,
} from './rust-generator.js';
import type { PropertyIR, SyspropIR } from '../schema/types.js';

const SCHEMA = `
owner: Vendor
module: "vendor.example.Props"
prefix: "vendor.example"
prop { name: "volume" type: Integer scope: Public access: ReadWrite }
prop { name: "label" type: String scope: Public access: Writeonce legacy_prop_name: "legacy.label" }
prop { name: "test_enum" type: EnumList enum_values: "a_b|off" scope: Internal }
prop { name: "type" type: BooleanList scope: System readonly: false integer_as_bool: true deprecated: true }
prop { name: "audioHALVersion" type: UInt scope: System }
`;

const base: PropertyIR = {
  name: 'x',
  type: 'Boolean',
  scope: 'Public',
  enum_values: 'a',
  access: 'ReadWrite',
  readonly: false,
  legacy_prop_name: '',
  deprecated: false,
  integer_as_bool: false,
};

describe('rust-generator', () => {
  describe('helpers', () => {
    it('should derive Rust names from the property name', () => {
      expect(rustFunctionName({ name: 'audioHALVersion' })).toBe('audio_hal_version');
      expect(rustKeyConstant({ name: 'audio.halVersion' })).toBe('AUDIO_HAL_VERSION_PROP');
      expect(rustEnumTypeName({ name: 'test_enum' })).toBe('TestEnumValues');
    });

    it('should borrow strings and lists in setters', () => {
      expect(rustAcceptType({ ...base, type: 'String' })).toBe('&str');
      expect(rustAcceptType({ ...base, type: 'StringList' })).toBe('&[String]');
      expect(rustAcceptType({ ...base, name: 'm', type: 'EnumList' })).toBe('&[MValues]');
      expect(rustAcceptType({ ...base, type: 'ULong' })).toBe('u64');
    });

    it('should map list properties through their element type', () => {
      expect(rustElementType({ ...base, type: 'UIntList' })).toBe('u32');
      expect(rustElementType({ ...base, type: 'Long' })).toBe('i64');
      expect(rustElementType({ ...base, name: 'm', type: 'EnumList' })).toBe('MValues');
      expect(rustReturnType({ ...base, type: 'BooleanList' })).toBe('Vec<bool>');
    });

    it('should return owned values from getters', () => {
      expect(rustReturnType({ ...base, type: 'DoubleList' })).toBe('Vec<f64>');
      expect(rustReturnType({ ...base, type: 'String' })).toBe('String');
    });
  });

  describe('generateRustSource', () => {
    const ir = loadSchemaFromText(SCHEMA, 'example.sysprop');
    const code = generateRustSource(ir, 'System');

    it('should start with module docs, the banner and imports', () => {
      expect(code.startsWith(
        [
          '//! Autogenerated system property accessors.',
          '//!',
          '//! This is an autogenerated module. The module contains methods for typed access to',
          '//! Android system properties.',
          '',
          '// Generated by the sysprop generator. DO NOT EDIT!',
          '',
          'use std::fmt;',
          'use rustutils::system_properties::{self, error::SysPropError, parsers_formatters};',
          '',
          '',
        ].join('\n')
      )).toBe(true);
    });

    it('should emit a constant, a getter and a setter', () => {
      expect(code).toContain(
        [
          '/// The property name of the "volume" API.',
          'pub const VOLUME_PROP: &str = "vendor.example.volume";',
          '',
          "/// Returns the value of the property 'vendor.example.volume' if set.",
          'pub fn volume() -> std::result::Result<Option<i32>, SysPropError> {',
          '    let result = match system_properties::read(VOLUME_PROP) {',
          '        Err(e) => Err(SysPropError::FetchError(e)),',
          '        Ok(Some(val)) => parsers_formatters::parse(val.as_str()).map_err(SysPropError::ParseError).map(Some),',
          '        Ok(None) => Ok(None),',
          '    };',
          '    result',
          '}',
          '',
          "/// Sets the value of the property 'vendor.example.volume', returns 'Ok' if successful.",
          'pub fn set_volume(v: i32) -> std::result::Result<(), SysPropError> {',
          '    let value = parsers_formatters::format(&v);',
          '    system_properties::write(VOLUME_PROP, value.as_str()).map_err(SysPropError::SetError)',
          '}',
        ].join('\n')
      );
    });

    it('should fall back to the legacy key and pass strings through', () => {
      expect(code).toContain(
        [
          '    if result.is_ok() { return result; }',
          "    log::debug!(\"Failed to fetch the original property '{}' ('{}'), falling back to the legacy one '{}'.\", LABEL_PROP, result.unwrap_err(), \"legacy.label\");",
          '    match system_properties::read("legacy.label") {',
        ].join('\n')
      );
      expect(code).toContain(
        '    system_properties::write(LABEL_PROP, v).map_err(SysPropError::SetError)\n'
      );
    });

    it('should emit enums with parsing and display', () => {
      expect(code).toContain(
        [
          '#[allow(missing_docs)]',
          '#[derive(Copy, Clone, Debug, Eq, PartialEq, PartialOrd, Hash, Ord)]',
          'pub enum TestEnumValues {',
          '    AB,',
          '    Off,',
          '}',
        ].join('\n')
      );
      expect(code).toContain('            "a_b" => Ok(TestEnumValues::AB),\n');
      expect(code).toContain(
        "            _ => Err(format!(\"'{}' cannot be parsed for TestEnumValues\", s)),\n"
      );
      expect(code).toContain('            TestEnumValues::Off => write!(f, "off"),\n');
      expect(code).toContain(
        'pub fn test_enum() -> std::result::Result<Option<Vec<TestEnumValues>>, SysPropError> {'
      );
      expect(code).toContain(
        '        Ok(Some(val)) => parsers_formatters::parse_list(val.as_str()).map_err(SysPropError::ParseError).map(Some),\n'
      );
      expect(code).not.toContain('set_test_enum');
    });

    it('should escape keyword names and mark deprecated accessors', () => {
      expect(code).toContain(
        [
          '#[deprecated]',
          'pub fn r#type() -> std::result::Result<Option<Vec<bool>>, SysPropError> {',
        ].join('\n')
      );
      expect(code).toContain(
        [
          '#[deprecated]',
          'pub fn set_type(v: &[bool]) -> std::result::Result<(), SysPropError> {',
          '    let value = parsers_formatters::format_bool_list_as_int(v);',
        ].join('\n')
      );
    });

    it('should snake-case camelCase names', () => {
      expect(code).toContain('pub const AUDIO_HAL_VERSION_PROP: &str = "ro.vendor.example.audioHALVersion";\n');
      expect(code).toContain('pub fn audio_hal_version() -> std::result::Result<Option<u32>, SysPropError> {\n');
    });

    it('should keep braces and quotes in legacy names out of the format string', () => {
      const legacyIr: SyspropIR = {
        owner: 'Vendor',
        module: 'vendor.example.Props',
        prefix: '',
        properties: [{ ...base, name: 'mode', type: 'String', legacy_prop_name: 'old.{mode}"x' }],
      };

      const legacyCode = generateRustSource(legacyIr, 'System');

      expect(legacyCode).toContain(
        "    log::debug!(\"Failed to fetch the original property '{}' ('{}'), falling back to the legacy one '{}'.\", MODE_PROP, result.unwrap_err(), \"old.{mode}\\\"x\");\n"
      );
      expect(legacyCode).toContain('    match system_properties::read("old.{mode}\\"x") {\n');
    });

    it('should skip properties above the requested scope', () => {
      const publicCode = generateRustSource(ir, 'Public');

      expect(publicCode).toContain('pub fn test_enum()');
      expect(publicCode).not.toContain('r#type');
      expect(publicCode).not.toContain('AUDIO_HAL_VERSION_PROP');
    });
  });

  describe('generateRustFiles', () => {
    it('should write mod.rs into the output directory', () => {
      const ir = loadSchemaFromText(SCHEMA, 'example.sysprop');
      const files = generateRustFiles(ir, { rustOutputDir: '/out/rust', scope: 'System' });

      expect(files.map((f) => [f.path, f.description])).toEqual([
        ['/out/rust/mod.rs', 'generated rust lib'],
      ]);
    });
  });
});
