/**
 * Environment variable overrides for configuration.
 *
 * Provides support for SYSPROPGEN_* environment variables to override
 * configuration values at runtime. Environment variables take precedence
 * over config file values, which take precedence over defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { isScope, SCOPES, type Scope } from '../schema/types.js';
import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/** Config field an environment variable writes to. */
type EnvTarget = 'output.scope' | 'logging.debug';

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: SYSPROPGEN_<SECTION>_<FIELD> maps to config.<section>.<field>.
 * Shortcuts come first so the full names win when both are set.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvTarget>> = {
  SYSPROPGEN_SCOPE: 'output.scope',
  SYSPROPGEN_DEBUG: 'logging.debug',
  SYSPROPGEN_OUTPUT_SCOPE: 'output.scope',
  SYSPROPGEN_LOGGING_DEBUG: 'logging.debug',
};

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Coerces a string value to a scope. Surrounding whitespace is ignored;
 * the name is case-sensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced scope.
 * @throws EnvCoercionError if the value does not name a scope.
 */
function coerceToScope(value: string, envVar: string): Scope {
  const trimmed = value.trim();

  if (isScope(trimmed)) {
    return trimmed;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'scope',
    `Cannot coerce '${envVar}' value '${value}' to scope. Expected one of: ${SCOPES.join(', ')}`
  );
}

function applyOverride(
  overrides: PartialConfig,
  target: EnvTarget,
  value: string,
  envVar: string
): void {
  switch (target) {
    case 'output.scope':
      overrides.output = { ...overrides.output, scope: coerceToScope(value, envVar) };
      break;
    case 'logging.debug':
      overrides.logging = { ...overrides.logging, debug: coerceToBoolean(value, envVar) };
      break;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Empty values are treated as unset.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of
 *   throwing the first one.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ SYSPROPGEN_SCOPE: 'Public' });
 * result.overrides.output?.scope; // 'Public'
 * result.appliedVars; // ['SYSPROPGEN_SCOPE']
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, target] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      applyOverride(overrides, target, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    output: {
      ...base.output,
      ...partial.output,
    },
    logging: {
      ...base.logging,
      ...partial.logging,
    },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return {
    SYSPROPGEN_SCOPE: {
      description: 'Override the output scope (shortcut for SYSPROPGEN_OUTPUT_SCOPE)',
      type: 'scope',
    },
    SYSPROPGEN_OUTPUT_SCOPE: {
      description: 'Override the output scope (Internal, Public, System)',
      type: 'scope',
    },
    SYSPROPGEN_DEBUG: {
      description: 'Enable debug logging (shortcut for SYSPROPGEN_LOGGING_DEBUG)',
      type: 'boolean',
    },
    SYSPROPGEN_LOGGING_DEBUG: {
      description: 'Enable or disable debug logging (true/false)',
      type: 'boolean',
    },
  };
}
