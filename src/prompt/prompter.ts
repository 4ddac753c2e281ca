/**
 * Operator prompts and formatted output.
 *
 * The Prompter is the only way step bodies talk to the operator: free text
 * with a default, yes/no questions, editable commands and pauses, plus
 * colored and word-wrapped messages.
 *
 * @packageDocumentation
 */

import { Logger } from '../utils/logger.js';
import { renderAction } from './action.js';
import {
  centerText,
  createStyler,
  formatBullet,
  resolveLineWidth,
  wrapText,
  yesNoSuffix,
  type TextStyler,
} from './format.js';
import type {
  CommandExecutor,
  CommandOutcome,
  InputReader,
  OutputWriter,
  ProposedAction,
  TextColor,
  YesNoDefault,
} from './types.js';

/**
 * Parsed answer to a yes/no question.
 */
export type YesNoAnswer = 'yes' | 'no' | 'empty' | 'invalid';

/**
 * Parses a yes/no answer, case-insensitively.
 *
 * @param input - Raw operator input.
 */
export function parseYesNo(input: string): YesNoAnswer {
  switch (input.trim().toLowerCase()) {
    case 'y':
    case 'yes':
      return 'yes';
    case 'n':
    case 'no':
      return 'no';
    case '':
      return 'empty';
    default:
      return 'invalid';
  }
}

/**
 * Options for creating a Prompter.
 */
export interface PrompterOptions {
  readonly reader: InputReader;
  readonly writer: OutputWriter;
  readonly executor: CommandExecutor;
  /** Whether to emit ANSI colors. @defaultValue true */
  readonly colors?: boolean;
  /** Upper bound for the wrap width. @defaultValue 80 */
  readonly maxLineWidth?: number;
  readonly logger?: Logger;
}

/**
 * Options for a bullet.
 */
export interface BulletOptions {
  /** Bullet marker. @defaultValue '*' */
  readonly marker?: string;
  readonly color?: TextColor;
}

/**
 * Interactive prompts and formatted output for one operator.
 */
export class Prompter {
  private readonly reader: InputReader;
  private readonly writer: OutputWriter;
  private readonly executor: CommandExecutor;
  private readonly styler: TextStyler;
  private readonly maxLineWidth: number;
  private readonly logger: Logger;

  constructor(options: PrompterOptions) {
    this.reader = options.reader;
    this.writer = options.writer;
    this.executor = options.executor;
    this.styler = createStyler(options.colors ?? true);
    this.maxLineWidth = options.maxLineWidth ?? 80;
    this.logger = options.logger ?? new Logger({ component: 'Prompter' });
  }

  /** Current wrap width. */
  get lineWidth(): number {
    return resolveLineWidth(this.writer.columns, this.maxLineWidth);
  }

  /**
   * Colors text with this prompter's styler.
   *
   * @param text - Text to color.
   * @param color - Color name.
   */
  paint(text: string, color: TextColor): string {
    return this.styler.paint(text, color);
  }

  // Output

  /** Writes an empty line. */
  blank(): void {
    this.writer.writeLine('');
  }

  /**
   * Writes a line as is, without wrapping.
   *
   * @param text - The line.
   * @param color - Optional color.
   */
  line(text: string, color?: TextColor): void {
    this.writer.writeLine(color === undefined ? text : this.paint(text, color));
  }

  /**
   * Writes a wrapped paragraph.
   *
   * @param text - Prose; whitespace is collapsed.
   */
  info(text: string): void {
    this.paragraph(text);
  }

  /** Writes a wrapped green paragraph. */
  success(text: string): void {
    this.paragraph(text, 'green');
  }

  /** Writes a wrapped yellow paragraph. */
  warn(text: string): void {
    this.paragraph(text, 'yellow');
  }

  /** Writes a wrapped red paragraph. */
  error(text: string): void {
    this.paragraph(text, 'red');
  }

  /**
   * Writes a bullet with a hanging indent.
   *
   * @param text - Bullet text.
   * @param options - Marker and color.
   */
  bullet(text: string, options: BulletOptions = {}): void {
    for (const formatted of formatBullet(text, options.marker ?? '*', this.lineWidth)) {
      this.line(formatted, options.color);
    }
  }

  /**
   * Writes a line with `text` centered using `pad`.
   *
   * @param text - Text to center.
   * @param pad - Pad character.
   */
  centered(text: string, pad = ' '): void {
    this.writer.writeLine(centerText(text, this.lineWidth, pad));
  }

  // Input

  /**
   * Asks for free text. The line is pre-filled with `defaultValue`.
   *
   * @param prompt - Question text.
   * @param defaultValue - Editable initial value.
   * @returns The trimmed answer.
   */
  async askText(prompt: string, defaultValue = ''): Promise<string> {
    const answer = await this.reader.readLine(`${this.paint(prompt, 'yellow')} `, defaultValue);
    return answer.trim();
  }

  /**
   * Asks a yes/no question until the answer is valid.
   *
   * @param prompt - Question text.
   * @param defaultChoice - Answer taken on empty input, if any.
   */
  async askYesNo(prompt: string, defaultChoice?: YesNoDefault): Promise<boolean> {
    const question = `${prompt} ${yesNoSuffix(defaultChoice)}`;

    for (;;) {
      const answer = parseYesNo(await this.askText(question));
      if (answer === 'yes') {
        return true;
      }
      if (answer === 'no') {
        return false;
      }
      if (answer === 'empty' && defaultChoice !== undefined) {
        return defaultChoice === 'yes';
      }
      const reason = answer === 'empty' ? 'No default selection.' : 'Invalid input.';
      this.writer.writeLine(`${reason} Please enter y[es] or n[o].`);
    }
  }

  /**
   * Shows a command pre-filled on an editable line and runs what the
   * operator confirms with Enter. An empty line skips execution.
   *
   * @param action - The proposed command, or a literal command line.
   */
  async askEditableCommand(action: ProposedAction | string): Promise<CommandOutcome> {
    const proposed = typeof action === 'string' ? action : renderAction(action);
    const answer = await this.reader.readLine(
      `${this.paint('Press Enter to run:', 'green')} `,
      proposed
    );
    const command = answer.trim();

    if (command.length === 0) {
      this.logger.debug('command_skipped', { proposed });
      return { kind: 'skipped' };
    }
    return this.runCommand(command);
  }

  /**
   * Runs a command without offering it for editing, e.g. an editor the
   * operator already agreed to open. A non-zero exit is shown in red.
   *
   * @param action - The command, or a literal command line.
   */
  async runCommand(action: ProposedAction | string): Promise<CommandOutcome> {
    const command = typeof action === 'string' ? action : renderAction(action);
    const result = await this.executor.run(command);
    this.logger.debug('command_exited', { command, exitCode: result.exitCode });
    if (result.exitCode !== 0) {
      const suffix = result.signal !== undefined ? ` (${result.signal})` : '';
      this.error(`Command exited with status ${String(result.exitCode)}${suffix}.`);
    }
    return { kind: 'executed', command, exitCode: result.exitCode };
  }

  /**
   * Waits for the operator to press a key.
   *
   * @param message - Text shown while waiting.
   */
  async pause(message = 'Press any key to continue...'): Promise<void> {
    await this.reader.readKey(this.paint(message, 'green'));
    this.blank();
  }

  private paragraph(text: string, color?: TextColor): void {
    for (const wrapped of wrapText(text, this.lineWidth)) {
      this.line(wrapped, color);
    }
  }
}

/**
 * Whether a command outcome is a run that exited with status 0.
 *
 * @param outcome - The outcome of `askEditableCommand`.
 */
export function succeeded(outcome: CommandOutcome): boolean {
  return outcome.kind === 'executed' && outcome.exitCode === 0;
}
