/**
 * Type definitions for the stepstone CLI.
 *
 * @packageDocumentation
 */

/**
 * Result of a CLI command.
 */
export interface CliCommandResult {
  /** Exit code for the process. */
  exitCode: number;
}

/**
 * Process exit codes.
 */
export const EXIT_CODES = {
  /** Normal completion, including declined and failed steps. */
  SUCCESS: 0,
  /** Unexpected error. */
  FAILURE: 1,
  /** Invalid command line. */
  USAGE: 2,
  /** Operator abort (Ctrl+C or end of input). */
  ABORTED: 130,
} as const;

/**
 * Parsed command line.
 */
export type ParsedArgs =
  | { readonly kind: 'run'; readonly stage: string; readonly forceRun: boolean }
  | { readonly kind: 'help' }
  | { readonly kind: 'version' };

/**
 * Where the CLI writes messages outside the prompter: usage text, summaries
 * of failures, `Aborted.`.
 */
export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

/**
 * Output bound to the process streams.
 */
export const consoleOutput: CliOutput = {
  out(text: string): void {
    console.log(text);
  },
  err(text: string): void {
    console.error(text);
  },
};
