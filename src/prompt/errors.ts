/**
 * Errors raised by the interactive input layer.
 *
 * @packageDocumentation
 */

/**
 * Reason the operator stopped the run.
 */
export type AbortReason = 'interrupt' | 'end_of_input';

/**
 * Raised when the operator cancels the run at a prompt (Ctrl+C) or input
 * ends (Ctrl+D, closed pipe). The runner stops the walk when it sees one.
 */
export class OperatorAbortError extends Error {
  /** What ended the prompt. */
  public readonly reason: AbortReason;

  /**
   * Creates a new OperatorAbortError.
   *
   * @param reason - What ended the prompt.
   */
  constructor(reason: AbortReason) {
    super(reason === 'interrupt' ? 'Interrupted by operator' : 'Input ended');
    this.name = 'OperatorAbortError';
    this.reason = reason;
  }
}

/**
 * Raised when a proposed action references an argument it was not given.
 */
export class ProposedActionError extends Error {
  /** The command template. */
  public readonly template: string;
  /** The placeholder without an argument. */
  public readonly placeholder: string;

  /**
   * Creates a new ProposedActionError.
   *
   * @param template - The command template.
   * @param placeholder - The missing placeholder name.
   */
  constructor(template: string, placeholder: string) {
    super(`Missing argument '${placeholder}' for command template: ${template}`);
    this.name = 'ProposedActionError';
    this.template = template;
    this.placeholder = placeholder;
  }
}

/**
 * Type guard for operator aborts.
 *
 * @param error - The caught value.
 */
export function isOperatorAbort(error: unknown): error is OperatorAbortError {
  return error instanceof OperatorAbortError;
}
