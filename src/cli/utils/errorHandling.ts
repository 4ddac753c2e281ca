/**
 * Shared error handling for the process boundary.
 */

import { isOperatorAbort } from '../../prompt/index.js';
import { formatCliError } from '../errors.js';
import { EXIT_CODES, consoleOutput, type CliCommandResult, type CliOutput } from '../types.js';

/**
 * Runs a command handler and converts thrown errors into exit codes:
 * operator aborts exit with 130, anything else prints a red message and
 * exits with 1.
 *
 * @param fn - The handler.
 * @param output - Where error messages go.
 * @param colors - Whether error messages are colored.
 */
export async function runWithErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  output: CliOutput = consoleOutput,
  colors = true
): Promise<CliCommandResult> {
  try {
    return await fn();
  } catch (error) {
    if (isOperatorAbort(error)) {
      output.err('Aborted.');
      return { exitCode: EXIT_CODES.ABORTED };
    }
    output.err(formatCliError(error, colors));
    return { exitCode: EXIT_CODES.FAILURE };
  }
}

/**
 * Wraps a command handler with standard error handling and exits the
 * process with the resulting code.
 *
 * @param fn - The function to wrap (sync or async).
 */
export function withErrorHandling(fn: () => CliCommandResult | Promise<CliCommandResult>): void {
  void runWithErrorHandling(fn).then((result) => {
    process.exit(result.exitCode);
  });
}
