/**
 * Process boundary for the generator entry points.
 */

import type { CliCommandResult } from '../types.js';

/**
 * Runs a front end and turns its outcome into the process exit code.
 *
 * Expected failures are already reported by the runner through its result.
 * Anything thrown past it is printed as `<exe>: <message>` and exits with 1.
 *
 * @param exeName - Name printed before an unexpected error.
 * @param fn - The run to execute.
 */
export function withErrorHandling(
  exeName: string,
  fn: () => CliCommandResult | Promise<CliCommandResult>
): void {
  void (async () => {
    try {
      const result = await fn();
      process.exitCode = result.exitCode;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`${exeName}: ${message}`);
      process.exitCode = 1;
    }
  })();
}
