/**
 * Schema loading pipeline: read, parse, validate, normalize.
 *
 * @packageDocumentation
 */

import { parseSchema } from './parser.js';
import { validateSchema } from './validator.js';
import { normalizeSchema } from './normalize.js';
import type { PropertySet, SyspropIR } from './types.js';
import { safeReadTextFile } from '../utils/safe-fs.js';

/**
 * Error raised when a schema file cannot be turned into an IR.
 *
 * The message is the one surfaced to users: the read failure, the generic
 * parse failure, or the exact validation message.
 */
export class SchemaLoadError extends Error {
  /** Which stage failed. */
  public readonly stage: 'read' | 'parse' | 'validate';
  /** The underlying error, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new SchemaLoadError.
   *
   * @param message - User-facing message.
   * @param stage - The failed stage.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, stage: 'read' | 'parse' | 'validate', cause?: Error) {
    super(message);
    this.name = 'SchemaLoadError';
    this.stage = stage;
    this.cause = cause;
  }
}

/**
 * Parses, validates and normalizes schema text.
 *
 * @param text - Raw schema text.
 * @param sourcePath - Path reported in the parse failure message.
 * @returns The normalized IR.
 * @throws SchemaLoadError if parsing or validation fails.
 */
export function loadSchemaFromText(text: string, sourcePath: string): SyspropIR {
  let parsed: PropertySet;
  try {
    parsed = parseSchema(text);
  } catch (error) {
    throw new SchemaLoadError(
      `Error parsing file ${sourcePath}`,
      'parse',
      error instanceof Error ? error : undefined
    );
  }

  const result = validateSchema(parsed);
  if (!result.valid) {
    throw new SchemaLoadError(result.error, 'validate');
  }

  return normalizeSchema(parsed);
}

/**
 * Reads a schema file and turns it into the IR.
 *
 * @param schemaPath - Path to the schema file.
 * @returns The normalized IR.
 * @throws SchemaLoadError if the file cannot be read, parsed or validated.
 *
 * @example
 * ```typescript
 * const ir = await loadSchema('vendor/audio.sysprop');
 * ir.properties.every((p) => p.access !== undefined); // true
 * ```
 */
export async function loadSchema(schemaPath: string): Promise<SyspropIR> {
  let text: string;
  try {
    text = await safeReadTextFile(schemaPath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchemaLoadError(
      `Error reading file ${schemaPath}: ${reason}`,
      'read',
      error instanceof Error ? error : undefined
    );
  }

  return loadSchemaFromText(text, schemaPath);
}
