/**
 * Default configuration values for syspropgen.toml.
 *
 * @packageDocumentation
 */

import type { Config, LoggingConfig, OutputConfig } from './types.js';

/**
 * File looked up in the working directory when no `--config` is given.
 */
export const CONFIG_FILE_NAME = 'syspropgen.toml';

/**
 * Default output settings: every scope is included.
 */
export const DEFAULT_OUTPUT: OutputConfig = {
  scope: 'System',
};

/**
 * Default logging settings (debug events suppressed).
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  output: DEFAULT_OUTPUT,
  logging: DEFAULT_LOGGING,
};
