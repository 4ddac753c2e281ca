/**
 * Interfaces of the interactive input layer.
 *
 * Reading, writing and command execution are abstracted for testability.
 *
 * @packageDocumentation
 */

/**
 * Interface for reading operator input.
 */
export interface InputReader {
  /**
   * Reads one line. The line is pre-filled with `initial`, which the
   * operator may edit.
   *
   * @throws {OperatorAbortError} On Ctrl+C or end of input.
   */
  readLine(prompt: string, initial?: string): Promise<string>;

  /**
   * Waits for a single key press after printing `prompt`.
   *
   * @throws {OperatorAbortError} On Ctrl+C or end of input.
   */
  readKey(prompt: string): Promise<string>;

  /** Releases the input stream. Reading again reopens it. */
  close(): void;
}

/**
 * Interface for writing operator-facing output.
 */
export interface OutputWriter {
  /** Write a line of text. */
  writeLine(text: string): void;
  /** Terminal width in columns, when known. */
  readonly columns?: number | undefined;
}

/**
 * Result of running a command line.
 */
export interface CommandResult {
  /** Exit status; non-zero also covers signals and spawn failures. */
  readonly exitCode: number;
  /** Terminating signal, if any. */
  readonly signal?: string;
}

/**
 * Runs a command line in a subprocess shell.
 */
export interface CommandExecutor {
  run(commandLine: string): Promise<CommandResult>;
}

/**
 * A command proposed to the operator: a template with `{name}`
 * placeholders plus the arguments substituted into it.
 */
export interface ProposedAction {
  readonly template: string;
  readonly args: Readonly<Record<string, string>>;
}

/**
 * What happened to a proposed command.
 */
export type CommandOutcome =
  | { readonly kind: 'skipped' }
  | { readonly kind: 'executed'; readonly command: string; readonly exitCode: number };

/**
 * Default choice for a yes/no question.
 */
export type YesNoDefault = 'yes' | 'no';

/**
 * Color names understood by the text styler.
 */
export type TextColor = 'red' | 'green' | 'yellow' | 'dim' | 'bold';
