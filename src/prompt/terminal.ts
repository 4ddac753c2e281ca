/**
 * Terminal implementations of the input layer interfaces.
 *
 * One readline interface serves every prompt of a session. It is paused
 * between prompts, so commands started in between own the terminal.
 *
 * @packageDocumentation
 */

import * as readline from 'node:readline';
import { execa } from 'execa';
import { OperatorAbortError, type AbortReason } from './errors.js';
import type { CommandExecutor, CommandResult, InputReader, OutputWriter } from './types.js';

const CTRL_C = '\u0003';
const CTRL_D = '\u0004';

/**
 * Default output writer using process.stdout.
 */
export const defaultOutputWriter: OutputWriter = {
  writeLine(text: string): void {
    process.stdout.write(text + '\n');
  },
  get columns(): number | undefined {
    return process.stdout.isTTY ? process.stdout.columns : undefined;
  },
};

/**
 * Stream the reader takes lines from. `process.stdin` or, in tests, a
 * plain readable stream.
 */
export type ReaderInput = NodeJS.ReadableStream & {
  readonly isTTY?: boolean;
  readonly readableEnded?: boolean;
  setRawMode?(mode: boolean): unknown;
};

type RawModeInput = ReaderInput & { setRawMode(mode: boolean): unknown };

function supportsRawMode(input: ReaderInput): input is RawModeInput {
  return input.isTTY === true && typeof input.setRawMode === 'function';
}

interface PendingRead {
  readonly resolve: (line: string) => void;
  readonly reject: (error: OperatorAbortError) => void;
}

/**
 * Creates a readline-based input reader.
 *
 * Lines that arrive before they are asked for (piped input) are queued and
 * answer later prompts in order. Once input has ended every further read
 * rejects with `end_of_input`. Without a terminal the pre-filled text cannot
 * be shown, so the line is taken as typed.
 *
 * @param input - Input stream.
 * @param output - Output stream for prompts and echo.
 */
export function createReadlineReader(
  input: ReaderInput = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): InputReader {
  const terminal = input.isTTY === true;
  const queued: string[] = [];
  let pending: PendingRead | undefined;
  let ended: AbortReason | undefined;
  let rl: readline.Interface | undefined;

  function finish(reason: AbortReason): void {
    ended ??= reason;
    const waiting = pending;
    pending = undefined;
    waiting?.reject(new OperatorAbortError(ended));
  }

  function open(): readline.Interface {
    if (rl !== undefined) {
      return rl;
    }
    const created = readline.createInterface({ input, output, terminal });
    created.on('line', (line) => {
      const waiting = pending;
      if (waiting === undefined) {
        queued.push(line);
        return;
      }
      pending = undefined;
      created.pause();
      waiting.resolve(line);
    });
    created.on('SIGINT', () => {
      output.write('\n');
      ended ??= 'interrupt';
      created.close();
    });
    created.on('close', () => {
      // Closed on purpose by readKey or close(): nothing ended.
      if (rl !== created) {
        return;
      }
      rl = undefined;
      finish('end_of_input');
    });
    rl = created;
    return created;
  }

  function release(): void {
    const current = rl;
    rl = undefined;
    current?.close();
  }

  function readLine(prompt: string, initial = ''): Promise<string> {
    const next = queued.shift();
    if (next !== undefined) {
      output.write(prompt);
      return Promise.resolve(next);
    }
    if (ended === undefined && input.readableEnded === true) {
      ended = 'end_of_input';
    }
    if (ended !== undefined) {
      return Promise.reject(new OperatorAbortError(ended));
    }

    const current = open();
    return new Promise((resolve, reject) => {
      pending = { resolve, reject };
      current.setPrompt(prompt);
      current.prompt();
      if (terminal && initial.length > 0) {
        current.write(initial);
      }
    });
  }

  function readKey(prompt: string): Promise<string> {
    if (!supportsRawMode(input)) {
      return readLine(prompt).then((answer) => answer.charAt(0) || '\n');
    }
    if (ended !== undefined) {
      return Promise.reject(new OperatorAbortError(ended));
    }

    // The line editor must not see raw key presses.
    release();
    output.write(prompt);
    return new Promise((resolve, reject) => {
      const onData = (buffer: Buffer): void => {
        input.setRawMode(false);
        input.pause();
        input.removeListener('data', onData);
        output.write('\n');

        const key = buffer.toString('utf-8');
        if (key === CTRL_C) {
          reject(new OperatorAbortError('interrupt'));
        } else if (key === CTRL_D) {
          reject(new OperatorAbortError('end_of_input'));
        } else {
          resolve(key);
        }
      };

      input.setRawMode(true);
      input.resume();
      input.on('data', onData);
    });
  }

  return { readLine, readKey, close: release };
}

/**
 * Options for the shell executor.
 */
export interface ShellCommandExecutorOptions {
  /** Shell program used to interpret command lines. @defaultValue 'bash' */
  readonly shell?: string;
}

/**
 * Runs command lines through a shell with the terminal attached.
 *
 * The child inherits stdin, stdout and stderr, so interactive programs
 * (`passwd`, `arch-chroot`, editors) work. Only the exit status is captured.
 */
export class ShellCommandExecutor implements CommandExecutor {
  private readonly shell: string;

  constructor(options: ShellCommandExecutorOptions = {}) {
    this.shell = options.shell ?? 'bash';
  }

  async run(commandLine: string): Promise<CommandResult> {
    const result = await execa(commandLine, {
      shell: this.shell,
      stdio: 'inherit',
      reject: false,
    });

    const exitCode = result.exitCode ?? 1;
    return result.signal !== undefined ? { exitCode, signal: result.signal } : { exitCode };
  }
}
