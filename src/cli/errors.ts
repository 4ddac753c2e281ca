/**
 * CLI error types and their presentation.
 *
 * @packageDocumentation
 */

import { createStyler } from '../prompt/index.js';

/**
 * Error type for an invalid command line.
 */
export type UsageErrorType = 'missing_stage' | 'unknown_stage' | 'unknown_option' | 'unexpected_argument';

/**
 * Error thrown when the command line cannot be parsed.
 */
export class UsageError extends Error {
  /** The type of usage error. */
  public readonly errorType: UsageErrorType;
  /** The offending argument, if any. */
  public readonly argument: string | undefined;

  /**
   * Creates a new UsageError.
   *
   * @param message - Human-readable error message.
   * @param errorType - The type of usage error.
   * @param argument - The offending argument.
   */
  constructor(message: string, errorType: UsageErrorType, argument?: string) {
    super(message);
    this.name = 'UsageError';
    this.errorType = errorType;
    this.argument = argument;
  }
}

/**
 * Type guard for usage errors.
 *
 * @param error - The value to check.
 */
export function isUsageError(error: unknown): error is UsageError {
  return error instanceof UsageError;
}

/**
 * Formats an error for stderr: `Error: <message>` in red.
 *
 * @param error - The thrown value.
 * @param colors - Whether to emit ANSI colors.
 */
export function formatCliError(error: unknown, colors: boolean): string {
  const message = error instanceof Error ? error.message : String(error);
  return createStyler(colors).paint(`Error: ${message}`, 'red');
}
