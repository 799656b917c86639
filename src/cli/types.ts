/**
 * CLI types shared by the generator front ends.
 */

import type { EnvRecord } from '../config/env.js';
import type { LogSink } from '../utils/logger.js';

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;
}

/**
 * Process-level inputs a run reads, injectable for tests.
 */
export interface RunOptions {
  /**
   * Executable name used in usage errors.
   * @defaultValue `sysprop-<language>`
   */
  exeName?: string;

  /**
   * Environment for config overrides.
   * @defaultValue process.env
   */
  env?: EnvRecord;

  /**
   * Directory searched for syspropgen.toml.
   * @defaultValue process.cwd()
   */
  cwd?: string;

  /**
   * Destination for structured log lines.
   * @defaultValue process.stderr
   */
  logSink?: LogSink;
}
