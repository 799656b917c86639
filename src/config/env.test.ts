import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should read SYSPROPGEN_SCOPE into output.scope', () => {
      const result = readEnvOverrides({ SYSPROPGEN_SCOPE: 'Public' });

      expect(result.overrides.output?.scope).toBe('Public');
      expect(result.appliedVars).toEqual(['SYSPROPGEN_SCOPE']);
    });

    it('should read SYSPROPGEN_DEBUG into logging.debug', () => {
      const result = readEnvOverrides({ SYSPROPGEN_DEBUG: 'yes' });

      expect(result.overrides.logging?.debug).toBe(true);
    });

    it('should prefer full names over shortcuts', () => {
      const result = readEnvOverrides({
        SYSPROPGEN_SCOPE: 'Public',
        SYSPROPGEN_OUTPUT_SCOPE: 'Internal',
        SYSPROPGEN_DEBUG: 'on',
        SYSPROPGEN_LOGGING_DEBUG: 'off',
      });

      expect(result.overrides).toEqual({
        output: { scope: 'Internal' },
        logging: { debug: false },
      });
      expect(result.appliedVars).toEqual([
        'SYSPROPGEN_SCOPE',
        'SYSPROPGEN_DEBUG',
        'SYSPROPGEN_OUTPUT_SCOPE',
        'SYSPROPGEN_LOGGING_DEBUG',
      ]);
    });

    it('should ignore empty and unrelated variables', () => {
      const result = readEnvOverrides({ SYSPROPGEN_SCOPE: '', PATH: '/usr/bin' });

      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('should trim scope values', () => {
      expect(readEnvOverrides({ SYSPROPGEN_SCOPE: ' System ' }).overrides.output?.scope).toBe(
        'System'
      );
    });

    describe('coercion errors', () => {
      it('should throw EnvCoercionError for an unknown scope', () => {
        expect(() => readEnvOverrides({ SYSPROPGEN_SCOPE: 'public' })).toThrow(EnvCoercionError);
        expect(() => readEnvOverrides({ SYSPROPGEN_SCOPE: 'public' })).toThrow(
          "Cannot coerce 'SYSPROPGEN_SCOPE' value 'public' to scope. Expected one of: Internal, Public, System"
        );
      });

      it('should throw EnvCoercionError for an invalid boolean', () => {
        expect(() => readEnvOverrides({ SYSPROPGEN_DEBUG: 'maybe' })).toThrow(
          "Cannot coerce 'SYSPROPGEN_DEBUG' value 'maybe' to boolean. Expected one of: true, 1, yes, on, false, 0, no, off"
        );
      });

      it('should record the variable, value and type on the error', () => {
        try {
          readEnvOverrides({ SYSPROPGEN_LOGGING_DEBUG: 'x' });
          expect.fail('Expected EnvCoercionError');
        } catch (error) {
          expect(error).toBeInstanceOf(EnvCoercionError);
          const coercionError = error as EnvCoercionError;
          expect(coercionError.envVar).toBe('SYSPROPGEN_LOGGING_DEBUG');
          expect(coercionError.rawValue).toBe('x');
          expect(coercionError.expectedType).toBe('boolean');
        }
      });

      it('should collect errors when asked and keep valid overrides', () => {
        const result = readEnvOverrides(
          { SYSPROPGEN_SCOPE: 'nope', SYSPROPGEN_DEBUG: 'true' },
          { collectErrors: true }
        );

        expect(result.errors).toHaveLength(1);
        expect(result.errors[0]?.envVar).toBe('SYSPROPGEN_SCOPE');
        expect(result.overrides).toEqual({ logging: { debug: true } });
        expect(result.appliedVars).toEqual(['SYSPROPGEN_DEBUG']);
      });
    });

    describe('Property-based tests', () => {
      it('accepts every boolean spelling in any case', () => {
        fc.assert(
          fc.property(
            fc.constantFrom('true', '1', 'yes', 'on', 'false', '0', 'no', 'off'),
            fc.boolean(),
            (spelling, upper) => {
              const value = upper ? spelling.toUpperCase() : spelling;
              const expected = ['true', '1', 'yes', 'on'].includes(spelling);
              expect(readEnvOverrides({ SYSPROPGEN_DEBUG: value }).overrides.logging?.debug).toBe(
                expected
              );
            }
          )
        );
      });
    });
  });

  describe('applyEnvOverrides', () => {
    it('should override config file values', () => {
      const fileConfig = parseConfig('[output]\nscope = "Internal"\n');

      const config = applyEnvOverrides(fileConfig, { SYSPROPGEN_OUTPUT_SCOPE: 'Public' });

      expect(config.output.scope).toBe('Public');
      expect(config.logging.debug).toBe(false);
    });

    it('should return an equal config when no variables are set', () => {
      expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
    });

    it('should not modify the base config', () => {
      applyEnvOverrides(DEFAULT_CONFIG, { SYSPROPGEN_DEBUG: '1' });

      expect(DEFAULT_CONFIG.logging.debug).toBe(false);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every supported variable', () => {
      expect(Object.keys(getEnvVarDocumentation()).sort()).toEqual([
        'SYSPROPGEN_DEBUG',
        'SYSPROPGEN_LOGGING_DEBUG',
        'SYSPROPGEN_OUTPUT_SCOPE',
        'SYSPROPGEN_SCOPE',
      ]);
    });
  });
});
