/**
 * Runs one installation stage.
 */

import { formatSummary, summarize } from '../../runner/index.js';
import { createCliApp, type CliAppOptions } from '../app.js';
import { EXIT_CODES, type CliCommandResult, type CliOutput } from '../types.js';

/**
 * Handles `stepstone <stage>`.
 *
 * @param stage - A valid stage name.
 * @param output - Where `Aborted.` goes.
 * @param options - Application options.
 */
export async function handleRunCommand(
  stage: string,
  output: CliOutput,
  options: CliAppOptions = {}
): Promise<CliCommandResult> {
  const app = await createCliApp(options);
  try {
    const report = await app.runner.runStage(stage);

    if (report.aborted) {
      output.err('Aborted.');
      return { exitCode: EXIT_CODES.ABORTED };
    }

    const { prompter } = app.context;
    prompter.blank();
    prompter.info(formatSummary(summarize(report)));
    return { exitCode: EXIT_CODES.SUCCESS };
  } finally {
    app.close();
  }
}
