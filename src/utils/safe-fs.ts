/**
 * File system wrappers with path validation.
 *
 * Every path is resolved to an absolute path and checked for emptiness and
 * null bytes before the underlying `node:fs/promises` call runs.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadText(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Reads a UTF-8 text file, returning `undefined` when it does not exist.
 *
 * Other errors (permissions, reading a directory) still throw.
 *
 * @param filePath - The path to the file to read.
 */
export async function safeReadTextIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await safeReadText(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

/**
 * Writes a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 */
export async function safeWriteText(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  await fs.writeFile(validatedPath, data, 'utf-8');
}

/**
 * Appends one line to a file and flushes it to disk before returning.
 *
 * The file is opened in append mode, so concurrent readers never see a
 * partially rewritten file. A file whose last line lacks its newline (e.g.
 * after editing by hand) gets one first, so the new line stays separate.
 * The handle is closed even when the write fails.
 *
 * @param filePath - The file to append to (created if missing).
 * @param line - The line to append, without its terminating newline.
 */
export async function safeAppendLineDurable(filePath: string, line: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  const handle = await fs.open(validatedPath, 'a+');
  try {
    const { size } = await handle.stat();
    let separator = '';
    if (size > 0) {
      const last = Buffer.alloc(1);
      await handle.read(last, 0, 1, size - 1);
      separator = last[0] === 0x0a ? '' : '\n';
    }
    await handle.appendFile(separator + line + '\n', 'utf-8');
    await handle.datasync();
  } finally {
    await handle.close();
  }
}

/**
 * Checks if a file or directory exists after validating the path.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  const validatedPath = validatePath(filePath);
  try {
    await fs.access(validatedPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Gets file statistics, returning `undefined` when the path does not exist
 * or cannot be inspected.
 *
 * @param filePath - The path to the file or directory.
 */
export async function safeStatIfExists(filePath: string): Promise<Stats | undefined> {
  const validatedPath = validatePath(filePath);
  try {
    return await fs.stat(validatedPath);
  } catch {
    return undefined;
  }
}

/**
 * Creates a directory after validating the path.
 *
 * @param filePath - The path to the directory to create.
 * @param options - Optional recursive mode and mode options.
 */
export async function safeMkdir(
  filePath: string,
  options?: { recursive?: boolean; mode?: number }
): Promise<string | undefined> {
  const validatedPath = validatePath(filePath);
  return fs.mkdir(validatedPath, options);
}

/**
 * Removes a file or directory tree after validating the path.
 *
 * @param filePath - The path to remove.
 * @param options - Removal options.
 */
export async function safeRm(
  filePath: string,
  options?: { force?: boolean; recursive?: boolean }
): Promise<void> {
  const validatedPath = validatePath(filePath);
  await fs.rm(validatedPath, options);
}

/**
 * Deletes a file, ignoring a missing file.
 *
 * @param filePath - The path to the file to delete.
 */
export async function safeUnlinkIfExists(filePath: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  try {
    await fs.unlink(validatedPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return;
    }
    throw error;
  }
}

/**
 * Narrows an unknown error to a Node.js system error carrying a `code`.
 *
 * @param error - The caught value.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
