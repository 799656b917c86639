import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { parseSchema } from './parser.js';
import {
  assertSchemaValid,
  isCorrectIdentifier,
  isCorrectPropertyName,
  propNameToIdentifier,
  SchemaValidationError,
  validateSchema,
} from './validator.js';
import type { Property, PropertySet } from './types.js';

function prop(overrides: Partial<Property> = {}): Property {
  return {
    name: 'enabled',
    type: 'Boolean',
    scope: 'Internal',
    enum_values: '',
    legacy_prop_name: '',
    deprecated: false,
    integer_as_bool: false,
    ...overrides,
  };
}

function vendorSet(overrides: Partial<PropertySet> = {}): PropertySet {
  return {
    owner: 'Vendor',
    module: 'vendor.example.ExampleProperties',
    prefix: '',
    properties: [prop()],
    ...overrides,
  };
}

function errorOf(text: string): string | undefined {
  const result = validateSchema(parseSchema(text));
  return result.valid ? undefined : result.error;
}

describe('validator', () => {
  describe('isCorrectIdentifier', () => {
    it('should accept letters, digits and underscores not starting with a digit', () => {
      expect(isCorrectIdentifier('abc')).toBe(true);
      expect(isCorrectIdentifier('_a1')).toBe(true);
      expect(isCorrectIdentifier('A_B_9')).toBe(true);
    });

    it('should reject empty names, leading digits and other characters', () => {
      expect(isCorrectIdentifier('')).toBe(false);
      expect(isCorrectIdentifier('1a')).toBe(false);
      expect(isCorrectIdentifier('a-b')).toBe(false);
      expect(isCorrectIdentifier('a.b')).toBe(false);
      expect(isCorrectIdentifier('é')).toBe(false);
    });
  });

  describe('isCorrectPropertyName', () => {
    it('should accept dotted identifiers', () => {
      expect(isCorrectPropertyName('persist.audio.volume')).toBe(true);
      expect(isCorrectPropertyName('x')).toBe(true);
    });

    it('should reject empty names and empty segments', () => {
      expect(isCorrectPropertyName('')).toBe(false);
      expect(isCorrectPropertyName('a..b')).toBe(false);
      expect(isCorrectPropertyName('a.')).toBe(false);
      expect(isCorrectPropertyName('.a')).toBe(false);
    });
  });

  describe('propNameToIdentifier', () => {
    it('should replace every dot with an underscore', () => {
      expect(propNameToIdentifier('a.b.c')).toBe('a_b_c');
      expect(propNameToIdentifier('plain')).toBe('plain');
    });
  });

  describe('rejection scenarios', () => {
    it('should reject duplicated property names', () => {
      expect(
        errorOf(`
          owner: Vendor
          module: "com.error.DuplicatedField"
          prop { name: "dup" type: Integer scope: Public }
          prop { name: "dup" type: String scope: Internal }
        `)
      ).toBe('Duplicated prop name "dup"');
    });

    it('should reject a set without properties', () => {
      expect(errorOf('module: "com.example.EmptyProp"')).toBe('There is no defined property');
    });

    it('should reject invalid property names', () => {
      expect(
        errorOf(`
          owner: Odm
          module: "odm.example.Props"
          prop { name: "!@#$" type: Boolean }
        `)
      ).toBe('Invalid prop name "!@#$"');
    });

    it('should reject empty enum values as an invalid value', () => {
      expect(
        errorOf(`
          owner: Vendor
          module: "vendor.example.Props"
          prop { name: "mode" type: Enum enum_values: "" }
        `)
      ).toBe('Invalid enum value "" for prop "mode"');
    });

    it('should reject an Enum with no enum_values field the same way', () => {
      expect(
        errorOf(`
          owner: Vendor
          module: "vendor.example.Props"
          prop { name: "mode" type: EnumList }
        `)
      ).toBe('Invalid enum value "" for prop "mode"');
    });

    it('should reject the first duplicated enum value', () => {
      expect(
        errorOf(`
          owner: Vendor
          module: "vendor.example.Props"
          prop { name: "status" type: Enum enum_values: "on|off|intermediate|on" }
        `)
      ).toBe('Duplicated enum value "on" for prop "status"');
    });

    it('should reject invalid enum values before duplicates', () => {
      expect(validateSchema(vendorSet({
        properties: [prop({ name: 'status', type: 'Enum', enum_values: 'a|a|b-c' })],
      }))).toEqual({ valid: false, error: 'Invalid enum value "b-c" for prop "status"' });
    });

    it('should reject an empty module name', () => {
      expect(errorOf('module: ""\nprop { name: "x" }')).toBe('Invalid module name ""');
    });

    it('should reject a single-segment module name', () => {
      expect(errorOf('module: "Props"\nprop { name: "x" }')).toBe('Invalid module name "Props"');
    });

    it('should reject invalid module segments', () => {
      expect(errorOf('module: "vendor.1bad.Props"\nprop { name: "x" }')).toBe(
        'Invalid name "1bad" in module'
      );
    });

    it('should reject invalid prefixes', () => {
      expect(validateSchema(vendorSet({ prefix: 'vendor..audio' }))).toEqual({
        valid: false,
        error: 'Invalid prefix "vendor..audio"',
      });
    });

    it('should reject vendor namespaces on platform properties', () => {
      expect(
        errorOf(`
          owner: Platform
          module: "android.os.PlatformProperties"
          prefix: "vendor.buildprop"
          prop { name: "disable_bluetooth" type: Boolean }
        `)
      ).toBe('Prop "disable_bluetooth" owned by platform cannot have vendor. or odm. namespace');
    });

    it('should reject odm names on platform properties', () => {
      expect(
        errorOf(`
          module: "android.os.PlatformProperties"
          prop { name: "odm.feature" }
        `)
      ).toBe('Prop "odm.feature" owned by platform cannot have vendor. or odm. namespace');
    });

    it('should reject platform properties outside the platform module', () => {
      expect(
        errorOf(`
          owner: Platform
          module: "android.os.Other"
          prop { name: "feature.enabled" }
        `)
      ).toBe('Platform-defined properties should have "android.os.PlatformProperties" as module name');
    });

    it('should reject vendor properties in the platform module', () => {
      expect(
        errorOf(`
          owner: Vendor
          module: "android.os.PlatformProperties"
          prop { name: "feature.enabled" }
        `)
      ).toBe('Vendor or Odm cannot use "android.os.PlatformProperties" as module name');
    });

    it('should reject names that collide after normalization, reporting the later one', () => {
      expect(
        validateSchema(vendorSet({ properties: [prop({ name: 'a.b' }), prop({ name: 'a_b' })] }))
      ).toEqual({ valid: false, error: 'Duplicated prop name "a_b"' });
    });
  });

  describe('ordering', () => {
    it('should report the module name before anything else', () => {
      expect(
        validateSchema({ owner: 'Platform', module: 'x', prefix: 'bad..prefix', properties: [] })
      ).toEqual({ valid: false, error: 'Invalid module name "x"' });
    });

    it('should report the prefix before the empty property list', () => {
      expect(validateSchema(vendorSet({ prefix: '1x', properties: [] }))).toEqual({
        valid: false,
        error: 'Invalid prefix "1x"',
      });
    });

    it('should report per-property errors before duplicate names', () => {
      expect(
        validateSchema(
          vendorSet({ properties: [prop({ name: 'a' }), prop({ name: 'a' }), prop({ name: '9' })] })
        )
      ).toEqual({ valid: false, error: 'Invalid prop name "9"' });
    });

    it('should report duplicate names before module ownership', () => {
      expect(
        validateSchema({
          owner: 'Platform',
          module: 'com.example.Props',
          prefix: '',
          properties: [prop({ name: 'a' }), prop({ name: 'a' })],
        })
      ).toEqual({ valid: false, error: 'Duplicated prop name "a"' });
    });

    it('should report properties in declaration order', () => {
      expect(
        validateSchema(
          vendorSet({
            properties: [
              prop({ name: 'first', type: 'Enum', enum_values: 'x|x' }),
              prop({ name: 'bad name' }),
            ],
          })
        )
      ).toEqual({ valid: false, error: 'Duplicated enum value "x" for prop "first"' });
    });
  });

  describe('acceptance', () => {
    it('should accept a set covering scalar, list and enum types', () => {
      const props = parseSchema(`
        owner: Vendor
        module: "vendor.example.AllTypes"
        prefix: "vendor.example"
        prop { name: "flag" type: Boolean scope: Public access: ReadWrite }
        prop { name: "count" type: Integer scope: Internal }
        prop { name: "unsigned_count" type: UInt scope: System readonly: false }
        prop { name: "size" type: Long }
        prop { name: "timestamp" type: ULong access: Writeonce }
        prop { name: "ratio" type: Double }
        prop { name: "label" type: String legacy_prop_name: "legacy.label" }
        prop { name: "mode" type: Enum enum_values: "fast|slow" }
        prop { name: "flags" type: BooleanList integer_as_bool: true }
        prop { name: "modes" type: EnumList enum_values: "a|b|c" deprecated: true }
      `);

      expect(validateSchema(props)).toEqual({ valid: true });
      expect(props.properties).toHaveLength(10);
      expect(props.properties.map((p) => p.type)).toEqual([
        'Boolean',
        'Integer',
        'UInt',
        'Long',
        'ULong',
        'Double',
        'String',
        'Enum',
        'BooleanList',
        'EnumList',
      ]);
    });

    it('should accept platform properties in the platform module', () => {
      expect(
        validateSchema({
          owner: 'Platform',
          module: 'android.os.PlatformProperties',
          prefix: 'persist',
          properties: [prop()],
        })
      ).toEqual({ valid: true });
    });
  });

  describe('assertSchemaValid', () => {
    it('should not throw for a valid set', () => {
      expect(() => assertSchemaValid(vendorSet())).not.toThrow();
    });

    it('should throw the first violation as a SchemaValidationError', () => {
      expect(() => assertSchemaValid(vendorSet({ properties: [] }))).toThrow(SchemaValidationError);
      expect(() => assertSchemaValid(vendorSet({ properties: [] }))).toThrow(
        'There is no defined property'
      );
    });
  });

  describe('Property-based tests', () => {
    const arbitrarySet: fc.Arbitrary<PropertySet> = fc.record({
      owner: fc.constantFrom('Platform' as const, 'Vendor' as const, 'Odm' as const),
      module: fc.constantFrom('android.os.PlatformProperties', 'vendor.x.Y', 'bad', ''),
      prefix: fc.constantFrom('', 'vendor', 'odm.x', '1bad'),
      properties: fc.array(
        fc.record({
          name: fc.constantFrom('a', 'a.b', 'a_b', 'vendor.x', '!', ''),
          type: fc.constantFrom('Boolean' as const, 'Enum' as const, 'EnumList' as const),
          scope: fc.constantFrom('Internal' as const, 'Public' as const, 'System' as const),
          enum_values: fc.constantFrom('', 'a|b', 'a|a', 'a|-'),
          legacy_prop_name: fc.constant(''),
          deprecated: fc.boolean(),
          integer_as_bool: fc.boolean(),
        }),
        { maxLength: 4 }
      ),
    });

    it('validation is idempotent', () => {
      fc.assert(
        fc.property(arbitrarySet, (props) => {
          expect(validateSchema(props)).toEqual(validateSchema(props));
        })
      );
    });

    it('validation does not modify its input', () => {
      fc.assert(
        fc.property(arbitrarySet, (props) => {
          const before = structuredClone(props);
          validateSchema(props);
          expect(props).toEqual(before);
        })
      );
    });
  });
});
