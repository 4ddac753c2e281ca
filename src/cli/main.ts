/**
 * Command dispatch, separated from the executable so it can be driven with
 * injected I/O.
 */

import { INSTALL_STAGES } from '../install/index.js';
import type { CliAppOptions } from './app.js';
import { parseArgs } from './args.js';
import { formatUsage } from './commands/help.js';
import { handleRunCommand } from './commands/run.js';
import { handleVersionCommand } from './commands/version.js';
import { formatCliError, isUsageError } from './errors.js';
import { runWithErrorHandling } from './utils/errorHandling.js';
import { EXIT_CODES, consoleOutput, type CliCommandResult, type CliOutput, type ParsedArgs } from './types.js';

/**
 * Options for {@link runCli}.
 */
export interface RunCliOptions extends CliAppOptions {
  readonly output?: CliOutput;
}

/**
 * Parses `argv` and runs the selected command.
 *
 * @param argv - Arguments after the program name.
 * @param options - Output and application overrides.
 */
export async function runCli(
  argv: readonly string[],
  options: RunCliOptions = {}
): Promise<CliCommandResult> {
  const { output = consoleOutput, ...appOptions } = options;
  const env = appOptions.env ?? process.env;
  const colors = env.NO_COLOR === undefined || env.NO_COLOR === '';
  const usage = formatUsage(INSTALL_STAGES);

  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv, INSTALL_STAGES.map((stage) => stage.name));
  } catch (error) {
    if (!isUsageError(error)) {
      throw error;
    }
    output.err(formatCliError(error, colors));
    output.err('');
    output.err(usage);
    return { exitCode: EXIT_CODES.USAGE };
  }

  switch (parsed.kind) {
    case 'help':
      output.out(usage);
      return { exitCode: EXIT_CODES.SUCCESS };
    case 'version':
      return handleVersionCommand(output);
    case 'run': {
      const { stage, forceRun } = parsed;
      return runWithErrorHandling(
        () => handleRunCommand(stage, output, { ...appOptions, forceRun }),
        output,
        colors
      );
    }
  }
}
