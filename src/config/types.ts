/**
 * Configuration types for syspropgen.toml parsing.
 *
 * @packageDocumentation
 */

import type { Scope } from '../schema/types.js';

/**
 * Settings that shape generated output.
 */
export interface OutputConfig {
  /** Highest property scope included when no `--scope` flag is given. */
  scope: Scope;
}

/**
 * Settings for the structured logger.
 */
export interface LoggingConfig {
  /** Whether debug-level events are written. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from syspropgen.toml.
 */
export interface Config {
  output: OutputConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  output?: Partial<OutputConfig>;
  logging?: Partial<LoggingConfig>;
}
