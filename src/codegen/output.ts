/**
 * Writes emitter output to disk.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { safeMkdir, safeWriteFile } from '../utils/safe-fs.js';
import type { GeneratedFile } from './types.js';

/**
 * Error raised when a generated file or its directory cannot be written.
 */
export class OutputWriteError extends Error {
  /** The directory or file that could not be written. */
  public readonly target: string;
  /** The underlying error. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new OutputWriteError.
   *
   * @param message - User-facing message.
   * @param target - The path that failed.
   * @param cause - The underlying error.
   */
  constructor(message: string, target: string, cause?: Error) {
    super(message);
    this.name = 'OutputWriteError';
    this.target = target;
    this.cause = cause;
  }
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Creates the parent directory of every file, then writes the files in
 * order. No file is written unless every directory exists.
 *
 * @param files - Files produced by an emitter.
 * @returns The paths written.
 * @throws OutputWriteError on the first directory or write failure.
 */
export async function writeGeneratedFiles(files: readonly GeneratedFile[]): Promise<string[]> {
  const dirs = new Set(files.map((file) => path.dirname(file.path)));
  for (const dir of dirs) {
    try {
      await safeMkdir(dir, { recursive: true });
    } catch (error) {
      throw new OutputWriteError(
        `Creating directory to ${dir} failed: ${reasonOf(error)}`,
        dir,
        error instanceof Error ? error : undefined
      );
    }
  }

  const written: string[] = [];
  for (const file of files) {
    try {
      await safeWriteFile(file.path, file.content);
    } catch (error) {
      throw new OutputWriteError(
        `Writing ${file.description} to ${file.path} failed: ${reasonOf(error)}`,
        file.path,
        error instanceof Error ? error : undefined
      );
    }

    written.push(file.path);
  }

  return written;
}
