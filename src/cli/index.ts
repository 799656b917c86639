/**
 * Command-line front ends for the generators.
 *
 * @packageDocumentation
 */

export {
  CliUsageError,
  executableName,
  parseGeneratorArgs,
  usageLine,
} from './args.js';
export type { CppArgs, GeneratorArgs, JavaArgs, ParsedCommandLine, RustArgs } from './args.js';
export { emitFiles, runGenerator } from './run.js';
export type { CliCommandResult, RunOptions } from './types.js';
export { withErrorHandling } from './utils/errorHandling.js';
