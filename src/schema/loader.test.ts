import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadSchema, loadSchemaFromText, SchemaLoadError } from './loader.js';
import { SchemaParseError } from './parser.js';

const VALID_SCHEMA = `
owner: Vendor
module: "vendor.example.ExampleProperties"
prop {
    name: "feature.enabled"
    type: Boolean
    scope: Public
}
`;

describe('loader', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'schema-loader-test-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('loadSchemaFromText', () => {
    it('should return the normalized IR', () => {
      const ir = loadSchemaFromText(VALID_SCHEMA, 'example.sysprop');

      expect(ir.module).toBe('vendor.example.ExampleProperties');
      expect(ir.properties[0]?.access).toBe('Readonly');
      expect(ir.properties[0]?.readonly).toBe(true);
    });

    it('should report parse failures with the path and keep the cause', () => {
      try {
        loadSchemaFromText('module: ', 'broken.sysprop');
        expect.fail('Expected SchemaLoadError');
      } catch (error) {
        expect(error).toBeInstanceOf(SchemaLoadError);
        const loadError = error as SchemaLoadError;
        expect(loadError.message).toBe('Error parsing file broken.sysprop');
        expect(loadError.stage).toBe('parse');
        expect(loadError.cause).toBeInstanceOf(SchemaParseError);
      }
    });

    it('should report validation failures with the validator message', () => {
      try {
        loadSchemaFromText('owner: Vendor\nmodule: "a.B"', 'empty.sysprop');
        expect.fail('Expected SchemaLoadError');
      } catch (error) {
        expect(error).toBeInstanceOf(SchemaLoadError);
        const loadError = error as SchemaLoadError;
        expect(loadError.message).toBe('There is no defined property');
        expect(loadError.stage).toBe('validate');
      }
    });
  });

  describe('loadSchema', () => {
    it('should read and load a schema file', async () => {
      const file = join(tempDir, 'example.sysprop');
      await writeFile(file, VALID_SCHEMA, 'utf-8');

      const ir = await loadSchema(file);

      expect(ir.properties.map((p) => p.name)).toEqual(['feature.enabled']);
    });

    it('should report read failures with the path and OS message', async () => {
      const file = join(tempDir, 'missing.sysprop');

      await expect(loadSchema(file)).rejects.toThrow(`Error reading file ${file}: ENOENT`);
      await expect(loadSchema(file)).rejects.toMatchObject({ stage: 'read' });
    });
  });
});
