/**
 * Configuration module for syspropgen.toml parsing.
 *
 * Provides typed configuration parsing with defaults and environment
 * variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type { Config, LoggingConfig, OutputConfig, PartialConfig } from './types.js';
export { CONFIG_FILE_NAME, DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_OUTPUT } from './defaults.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { loadConfig } from './loader.js';
export type { LoadConfigOptions, LoadedConfig } from './loader.js';
