import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];
  let originalWrite: typeof process.stderr.write;

  beforeEach(() => {
    capturedOutput = [];
    originalWrite = process.stderr.write.bind(process.stderr);
    process.stderr.write = vi.fn((chunk: string | Uint8Array): boolean => {
      capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    }) as typeof process.stderr.write;
  });

  afterEach(() => {
    process.stderr.write = originalWrite;
  });

  function parseOutput(index: number): Record<string, unknown> {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return JSON.parse(output.trim()) as Record<string, unknown>;
  }

  describe('normal logging', () => {
    it('should log info messages with all standard fields', () => {
      const logger = new Logger({ component: 'sysprop-cpp' });
      logger.info('schema_loaded', { properties: 3 });

      expect(capturedOutput).toHaveLength(1);
      const parsed = parseOutput(0);
      expect(parsed.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('sysprop-cpp');
      expect(parsed.event).toBe('schema_loaded');
      expect(parsed.data).toEqual({ properties: 3 });
    });

    it('should omit data when none is given', () => {
      const logger = new Logger({ component: 'sysprop-cpp' });
      logger.warn('empty_scope');

      expect(parseOutput(0)).not.toHaveProperty('data');
    });

    it('should not log debug messages when debugMode is false', () => {
      const logger = new Logger({ component: 'sysprop-java' });
      logger.debug('files_written', { count: 2 });

      expect(capturedOutput).toHaveLength(0);
    });

    it('should log debug messages when debugMode is true', () => {
      const logger = new Logger({ component: 'sysprop-java', debugMode: true });
      logger.debug('files_written', { count: 2 });

      expect(parseOutput(0).level).toBe('debug');
    });

    it('should log error messages correctly', () => {
      const logger = new Logger({ component: 'sysprop-rust' });
      logger.error('generation_failed', { message: 'There is no defined property' });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('error');
      expect(parsed.data).toEqual({ message: 'There is no defined property' });
    });

    it('should write to a custom sink instead of stderr', () => {
      const lines: string[] = [];
      const logger = new Logger({ component: 'sink-test', sink: (line) => lines.push(line) });
      logger.info('hello');

      expect(capturedOutput).toHaveLength(0);
      expect(lines).toHaveLength(1);
      expect(lines[0]?.endsWith('\n')).toBe(true);
    });
  });

  describe('unserializable data', () => {
    it('should handle circular references without throwing', () => {
      const logger = new Logger({ component: 'TestLogger' });
      const circular: Record<string, unknown> = { name: 'test' };
      circular.self = circular;

      expect(() => {
        logger.info('circular_test', circular);
      }).not.toThrow();

      const parsed = parseOutput(0);
      expect(parsed.event).toBe('circular_test');
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('should handle BigInt values without throwing', () => {
      const logger = new Logger({ component: 'TestLogger' });
      logger.info('bigint_test', { value: BigInt(42) });

      expect(parseOutput(0).originalData).toBe('[unserializable]');
    });

    it('should always produce exactly one JSON line (property-based)', () => {
      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.jsonValue()), (data) => {
          const lines: string[] = [];
          const logger = new Logger({ component: 'PropertyTest', sink: (l) => lines.push(l) });
          logger.info('fuzz_test', data);

          expect(lines).toHaveLength(1);
          const line = lines[0] ?? '';
          expect(line.trim().split('\n')).toHaveLength(1);
          expect(() => JSON.parse(line) as unknown).not.toThrow();
        })
      );
    });
  });
});
