/**
 * Command-line parsing shared by the three generator front ends.
 *
 * Flags take their value either as the next argument (`--scope Public`) or
 * inline (`--scope=Public`). Anything that does not start with `--` is the
 * input file.
 *
 * @packageDocumentation
 */

import { isScope, type Scope } from '../schema/types.js';
import type { TargetLanguage } from '../codegen/types.js';

/**
 * Error raised for malformed command lines. The runner prints its message
 * after the executable name and follows it with the usage line.
 */
export class CliUsageError extends Error {
  /**
   * Creates a new CliUsageError.
   *
   * @param message - What is wrong with the command line.
   */
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/** Options every front end accepts. */
interface CommonArgs {
  readonly inputFile: string;
  /** Scope from `--scope`; undefined defers to configuration. */
  readonly scope: Scope | undefined;
  /** Explicit `--config` path. */
  readonly configPath: string | undefined;
}

export interface CppArgs extends CommonArgs {
  readonly language: 'cpp';
  readonly headerOutputDir: string;
  readonly sourceOutputDir: string;
  readonly includeName: string | undefined;
}

export interface JavaArgs extends CommonArgs {
  readonly language: 'java';
  readonly javaOutputDir: string;
  readonly jniOutputDir: string;
}

export interface RustArgs extends CommonArgs {
  readonly language: 'rust';
  readonly rustOutputDir: string;
}

/**
 * A fully parsed command line for one of the generators.
 */
export type GeneratorArgs = CppArgs | JavaArgs | RustArgs;

/**
 * Result of parsing: either a help request or arguments to run with.
 */
export type ParsedCommandLine = { help: true } | { help: false; args: GeneratorArgs };

const COMMON_FLAGS = ['scope', 'config'] as const;

const LANGUAGE_FLAGS: Readonly<Record<TargetLanguage, readonly string[]>> = {
  cpp: ['header-output-dir', 'source-output-dir', 'include-name', ...COMMON_FLAGS],
  java: ['java-output-dir', 'jni-output-dir', ...COMMON_FLAGS],
  rust: ['rust-output-dir', ...COMMON_FLAGS],
};

const FLAG_PLACEHOLDERS: Readonly<Record<string, string>> = {
  'include-name': 'name',
  scope: 'scope',
  config: 'file',
};

/**
 * Name of the executable for a language.
 */
export function executableName(language: TargetLanguage): string {
  return `sysprop-${language}`;
}

/**
 * Usage line for a language's front end.
 *
 * @example
 * ```typescript
 * usageLine('rust');
 * // 'Usage: sysprop-rust [--rust-output-dir dir] [--scope scope] [--config file] sysprop_file'
 * ```
 */
export function usageLine(language: TargetLanguage, exeName = executableName(language)): string {
  const flags = LANGUAGE_FLAGS[language].map(
    (flag) => `[--${flag} ${FLAG_PLACEHOLDERS[flag] ?? 'dir'}]`
  );
  return `Usage: ${exeName} ${flags.join(' ')} sysprop_file`;
}

function parseScope(value: string): Scope {
  if (!isScope(value)) {
    throw new CliUsageError(`Invalid scope "${value}"`);
  }
  return value;
}

/**
 * Parses the arguments after the executable name.
 *
 * @param language - Which front end is parsing.
 * @param argv - Arguments, without the node binary and script.
 * @returns A help request, or the parsed arguments with output directories
 *   defaulting to `.`.
 * @throws CliUsageError for unknown flags, missing flag values, or a missing
 *   or extra input file.
 */
export function parseGeneratorArgs(
  language: TargetLanguage,
  argv: readonly string[]
): ParsedCommandLine {
  const known = LANGUAGE_FLAGS[language];
  const values = new Map<string, string>();
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--help' || arg === '-h') {
      return { help: true };
    }

    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = arg.slice(2, eq === -1 ? undefined : eq);
    if (!known.includes(name)) {
      throw new CliUsageError(`Unknown option --${name}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value === '') {
      throw new CliUsageError(`Option --${name} requires a value`);
    }
    values.set(name, value);
  }

  const inputFile = positional[0];
  if (inputFile === undefined) {
    throw new CliUsageError('No input file specified');
  }
  if (positional.length > 1) {
    throw new CliUsageError('More than one input file');
  }

  const scopeValue = values.get('scope');
  const common: CommonArgs = {
    inputFile,
    scope: scopeValue === undefined ? undefined : parseScope(scopeValue),
    configPath: values.get('config'),
  };
  const dir = (flag: string): string => values.get(flag) ?? '.';

  switch (language) {
    case 'cpp':
      return {
        help: false,
        args: {
          ...common,
          language,
          headerOutputDir: dir('header-output-dir'),
          sourceOutputDir: dir('source-output-dir'),
          includeName: values.get('include-name'),
        },
      };
    case 'java':
      return {
        help: false,
        args: {
          ...common,
          language,
          javaOutputDir: dir('java-output-dir'),
          jniOutputDir: dir('jni-output-dir'),
        },
      };
    case 'rust':
      return {
        help: false,
        args: { ...common, language, rustOutputDir: dir('rust-output-dir') },
      };
  }
}
