/**
 * Command line parsing.
 *
 * @packageDocumentation
 */

import { UsageError } from './errors.js';
import type { ParsedArgs } from './types.js';

/** Flag that runs every leaf regardless of its status. */
export const FORCE_RUN_FLAG = '--no-skip-completed';

/**
 * Parses `stepstone <stage> [options]`.
 *
 * `-h`/`--help` and `--version` win wherever they appear, even next to
 * otherwise invalid arguments.
 *
 * @param argv - Arguments after the program name.
 * @param stageNames - Valid stage names.
 * @throws {UsageError} If the command line is invalid.
 */
export function parseArgs(argv: readonly string[], stageNames: readonly string[]): ParsedArgs {
  if (argv.includes('-h') || argv.includes('--help')) {
    return { kind: 'help' };
  }
  if (argv.includes('--version')) {
    return { kind: 'version' };
  }

  let stage: string | undefined;
  let forceRun = false;

  for (const arg of argv) {
    if (arg === FORCE_RUN_FLAG) {
      forceRun = true;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new UsageError(`Unrecognized option '${arg}'.`, 'unknown_option', arg);
    } else if (stage === undefined) {
      if (!stageNames.includes(arg)) {
        throw new UsageError(`Unrecognised installation stage '${arg}'.`, 'unknown_stage', arg);
      }
      stage = arg;
    } else {
      throw new UsageError(`Unexpected argument '${arg}'.`, 'unexpected_argument', arg);
    }
  }

  if (stage === undefined) {
    throw new UsageError('Installation stage not provided.', 'missing_stage');
  }
  return { kind: 'run', stage, forceRun };
}
