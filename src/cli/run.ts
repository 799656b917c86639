/**
 * Runner shared by the generator front ends: parse the command line, load
 * configuration, load the schema, emit, write.
 *
 * @packageDocumentation
 */

import { loadConfig, type LoadedConfig } from '../config/loader.js';
import { generateCppFiles } from '../codegen/cpp-generator.js';
import { generateJavaFiles } from '../codegen/java-generator.js';
import { generateRustFiles } from '../codegen/rust-generator.js';
import { writeGeneratedFiles } from '../codegen/output.js';
import type { GeneratedFile, TargetLanguage } from '../codegen/types.js';
import { loadSchema } from '../schema/loader.js';
import type { Scope, SyspropIR } from '../schema/types.js';
import { Logger } from '../utils/logger.js';
import {
  CliUsageError,
  executableName,
  parseGeneratorArgs,
  usageLine,
  type GeneratorArgs,
} from './args.js';
import type { CliCommandResult, RunOptions } from './types.js';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Builds the files for one run from the parsed arguments.
 *
 * @param ir - The loaded schema.
 * @param args - Parsed command line.
 * @param scope - Resolved output scope.
 * @returns Files to write.
 */
export function emitFiles(ir: SyspropIR, args: GeneratorArgs, scope: Scope): GeneratedFile[] {
  switch (args.language) {
    case 'cpp':
      return generateCppFiles(ir, args.inputFile, {
        headerOutputDir: args.headerOutputDir,
        sourceOutputDir: args.sourceOutputDir,
        ...(args.includeName === undefined ? {} : { includeName: args.includeName }),
        scope,
      });
    case 'java':
      return generateJavaFiles(ir, {
        javaOutputDir: args.javaOutputDir,
        jniOutputDir: args.jniOutputDir,
        scope,
      });
    case 'rust':
      return generateRustFiles(ir, { rustOutputDir: args.rustOutputDir, scope });
  }
}

/**
 * Runs one generator front end.
 *
 * Usage errors print `<exe>: <message>` and the usage line to stderr.
 * Configuration errors print `<exe>: <message>`. Generation failures print
 * `Error during generating <language> sysprop from <file>: <message>`. All
 * three exit with 1; `--help` prints the usage line to stdout and exits 0.
 *
 * @param language - Which emitter to run.
 * @param argv - Arguments after the executable name.
 * @param options - Injectable process inputs.
 * @returns The exit code.
 */
export async function runGenerator(
  language: TargetLanguage,
  argv: readonly string[],
  options: RunOptions = {}
): Promise<CliCommandResult> {
  const exeName = options.exeName ?? executableName(language);

  let args: GeneratorArgs;
  try {
    const parsed = parseGeneratorArgs(language, argv);
    if (parsed.help) {
      console.log(usageLine(language, exeName));
      return { exitCode: 0 };
    }
    args = parsed.args;
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`${exeName}: ${error.message}`);
      console.error(usageLine(language, exeName));
      return { exitCode: 1 };
    }
    throw error;
  }

  let loaded: LoadedConfig;
  try {
    loaded = await loadConfig({
      configPath: args.configPath,
      ...(options.cwd === undefined ? {} : { cwd: options.cwd }),
      ...(options.env === undefined ? {} : { env: options.env }),
    });
  } catch (error) {
    console.error(`${exeName}: ${errorMessage(error)}`);
    return { exitCode: 1 };
  }

  const logger = new Logger({
    component: exeName,
    debugMode: loaded.config.logging.debug,
    ...(options.logSink === undefined ? {} : { sink: options.logSink }),
  });
  const scope = args.scope ?? loaded.config.output.scope;

  try {
    const ir = await loadSchema(args.inputFile);
    logger.debug('schema_loaded', {
      file: args.inputFile,
      module: ir.module,
      properties: ir.properties.length,
      scope,
      config: loaded.source ?? null,
    });

    const written = await writeGeneratedFiles(emitFiles(ir, args, scope));
    logger.debug('files_written', { files: written });

    return { exitCode: 0 };
  } catch (error) {
    const message = errorMessage(error);
    logger.error('generation_failed', {
      file: args.inputFile,
      errorType: error instanceof Error ? error.name : typeof error,
      message,
    });
    console.error(`Error during generating ${language} sysprop from ${args.inputFile}: ${message}`);
    return { exitCode: 1 };
  }
}
