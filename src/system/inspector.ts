/**
 * Read-only access to the machine being installed.
 *
 * Probes and step bodies inspect files and query system tools through this
 * interface; tests replace it with an in-memory fake.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import {
  safeExists,
  safeReadTextIfExists,
  safeStatIfExists,
} from '../utils/safe-fs.js';

/**
 * Output of a captured command.
 */
export interface CapturedOutput {
  /** Exit status; `127` when the program could not be started. */
  readonly exitCode: number;
  readonly stdout: string;
}

/**
 * Inspection primitives used by probes.
 */
export interface SystemInspector {
  /** Whether a file or directory exists. */
  exists(path: string): Promise<boolean>;
  /** Whether `path` is a regular file. */
  isFile(path: string): Promise<boolean>;
  /** Whether `path` is a directory. */
  isDirectory(path: string): Promise<boolean>;
  /** Reads a text file; `undefined` when it does not exist or cannot be read. */
  readText(path: string): Promise<string | undefined>;
  /** Runs a program without a shell and captures stdout. */
  capture(command: string, args: readonly string[]): Promise<CapturedOutput>;
}

/**
 * Whether `text` has a line that is neither blank nor a `#` comment.
 *
 * @param text - File contents.
 */
export function hasSignificantContent(text: string): boolean {
  return text.split('\n').some((line) => {
    const trimmed = line.trim();
    return trimmed.length > 0 && !trimmed.startsWith('#');
  });
}

/**
 * Whether a file exists and has content other than blank lines and comments.
 *
 * @param system - The inspector.
 * @param path - File path.
 */
export async function fileHasContent(system: SystemInspector, path: string): Promise<boolean> {
  const text = await system.readText(path);
  return text !== undefined && hasSignificantContent(text);
}

/**
 * Whether a package is installed, according to `pacman -Q`.
 *
 * @param system - The inspector.
 * @param name - Package name.
 */
export async function packageInstalled(system: SystemInspector, name: string): Promise<boolean> {
  const result = await system.capture('pacman', ['-Q', name]);
  return result.exitCode === 0;
}

/**
 * Inspector backed by the local file system and `execa`.
 */
export class NodeSystemInspector implements SystemInspector {
  async exists(path: string): Promise<boolean> {
    return safeExists(path);
  }

  async isFile(path: string): Promise<boolean> {
    const stats = await safeStatIfExists(path);
    return stats?.isFile() ?? false;
  }

  async isDirectory(path: string): Promise<boolean> {
    const stats = await safeStatIfExists(path);
    return stats?.isDirectory() ?? false;
  }

  async readText(path: string): Promise<string | undefined> {
    try {
      return await safeReadTextIfExists(path);
    } catch {
      return undefined;
    }
  }

  async capture(command: string, args: readonly string[]): Promise<CapturedOutput> {
    const result = await execa(command, args, { reject: false, stdin: 'ignore', stderr: 'ignore' });
    if (result.failed && result.exitCode === undefined) {
      return { exitCode: 127, stdout: '' };
    }
    return { exitCode: result.exitCode ?? 1, stdout: result.stdout };
  }
}
