/**
 * Interactive input layer: prompts, editable commands and formatted output.
 *
 * @packageDocumentation
 */

export { Prompter, parseYesNo, succeeded } from './prompter.js';
export type { BulletOptions, PrompterOptions, YesNoAnswer } from './prompter.js';
export { proposeCommand, renderAction, shellQuote } from './action.js';
export {
  CLI_STYLES,
  MIN_LINE_WIDTH,
  centerText,
  collapseWhitespace,
  createStyler,
  formatBanner,
  formatBullet,
  resolveLineWidth,
  wrapText,
  yesNoSuffix,
} from './format.js';
export type { TextStyler } from './format.js';
export { OperatorAbortError, ProposedActionError, isOperatorAbort } from './errors.js';
export type { AbortReason } from './errors.js';
export { ShellCommandExecutor, createReadlineReader, defaultOutputWriter } from './terminal.js';
export type { ShellCommandExecutorOptions } from './terminal.js';
export type {
  CommandExecutor,
  CommandOutcome,
  CommandResult,
  InputReader,
  OutputWriter,
  ProposedAction,
  TextColor,
  YesNoDefault,
} from './types.js';
