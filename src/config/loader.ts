/**
 * Locates, reads and resolves configuration for a generator run.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { safeExists, safeReadTextFile } from '../utils/safe-fs.js';
import { CONFIG_FILE_NAME } from './defaults.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Explicit config file, resolved against `cwd`. It must exist. */
  configPath?: string | undefined;
  /** Directory searched for syspropgen.toml when no path is given. */
  cwd?: string;
  /** Environment used for overrides. */
  env?: EnvRecord;
}

/**
 * Resolved configuration and where it came from.
 */
export interface LoadedConfig {
  config: Config;
  /** The file that was read, or undefined when only defaults and env apply. */
  source: string | undefined;
}

/**
 * Loads configuration: defaults, then the config file, then environment
 * overrides.
 *
 * A missing implicit syspropgen.toml is skipped; a missing explicit
 * `configPath` is an error.
 *
 * @param options - Where to look and which environment to read.
 * @returns The resolved configuration.
 * @throws ConfigParseError if the file is missing, unreadable or invalid.
 * @throws EnvCoercionError if an environment override is invalid.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const { configPath, cwd = process.cwd(), env = process.env } = options;
  const candidate =
    configPath === undefined ? path.join(cwd, CONFIG_FILE_NAME) : path.resolve(cwd, configPath);

  let config = getDefaultConfig();
  let source: string | undefined;

  if (await safeExists(candidate)) {
    let tomlContent: string;
    try {
      tomlContent = await safeReadTextFile(candidate);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigParseError(
        `Failed to read config file ${candidate}: ${reason}`,
        error instanceof Error ? error : undefined
      );
    }

    try {
      config = parseConfig(tomlContent);
    } catch (error) {
      if (error instanceof ConfigParseError) {
        throw new ConfigParseError(`${candidate}: ${error.message}`, error);
      }
      throw error;
    }
    source = candidate;
  } else if (configPath !== undefined) {
    throw new ConfigParseError(`Config file not found: ${configPath}`);
  }

  return { config: applyEnvOverrides(config, env), source };
}
