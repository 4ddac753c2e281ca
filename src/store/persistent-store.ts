/**
 * Persistent progress and configuration store.
 *
 * Two plain-text, append-only files live in one directory:
 *
 * - `marked-complete`: one step name per line. Read as a set.
 * - `config`: one `key value` pair per line. The last entry for a key wins.
 *
 * Persistence is enabled iff the directory exists. Every write is appended
 * and flushed before the call returns, so an interrupted run loses at most
 * the step in progress.
 *
 * @packageDocumentation
 */

import { join } from 'node:path';
import { Logger } from '../utils/logger.js';
import {
  safeAppendLineDurable,
  safeMkdir,
  safeReadTextIfExists,
  safeRm,
  safeStatIfExists,
  safeUnlinkIfExists,
  safeWriteText,
} from '../utils/safe-fs.js';

/** File name of the completion log inside the store directory. */
export const COMPLETION_LOG_FILE = 'marked-complete';

/** File name of the configuration log inside the store directory. */
export const CONFIG_FILE = 'config';

/**
 * Error type for store misuse.
 */
export type PersistentStoreErrorType = 'invalid_key' | 'invalid_value' | 'invalid_name';

/**
 * Error thrown when a caller passes data that cannot be stored in the
 * line-oriented file format.
 */
export class PersistentStoreError extends Error {
  /** The type of store error. */
  public readonly errorType: PersistentStoreErrorType;

  /**
   * Creates a new PersistentStoreError.
   *
   * @param message - Human-readable error message.
   * @param errorType - The type of store error.
   */
  constructor(message: string, errorType: PersistentStoreErrorType) {
    super(message);
    this.name = 'PersistentStoreError';
    this.errorType = errorType;
  }
}

/**
 * A single entry of the configuration log.
 */
export interface ConfigEntry {
  readonly key: string;
  readonly value: string;
}

/**
 * Options for opening a store.
 */
export interface PersistentStoreOptions {
  /** Logger for write failures and debug traces. */
  readonly logger?: Logger;
}

function isSignificantLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length > 0 && !trimmed.startsWith('#');
}

/**
 * Parses the completion log into the set of completed step names.
 *
 * @param text - Raw file contents.
 */
export function parseCompletionLog(text: string): ReadonlySet<string> {
  const names = new Set<string>();
  for (const line of text.split('\n')) {
    if (isSignificantLine(line)) {
      names.add(line.trim());
    }
  }
  return names;
}

/**
 * Parses the configuration log into its entries, in file order.
 *
 * The key is everything up to the first whitespace; the value is the rest of
 * the line after that whitespace (possibly empty).
 *
 * @param text - Raw file contents.
 */
export function parseConfigEntries(text: string): ConfigEntry[] {
  const entries: ConfigEntry[] = [];
  for (const rawLine of text.split('\n')) {
    if (!isSignificantLine(rawLine)) {
      continue;
    }
    const line = rawLine.replace(/\r$/, '').trimStart();
    const match = /^(\S+)(?:\s+(.*))?$/.exec(line);
    const key = match?.[1];
    if (key === undefined) {
      continue;
    }
    entries.push({ key, value: match?.[2] ?? '' });
  }
  return entries;
}

/**
 * Returns the value of the last entry for `key`, if any.
 *
 * @param entries - Parsed configuration entries.
 * @param key - The key to look up.
 */
export function lookupConfig(entries: readonly ConfigEntry[], key: string): string | undefined {
  let found: string | undefined;
  for (const entry of entries) {
    if (entry.key === key) {
      found = entry.value;
    }
  }
  return found;
}

function assertStorableKey(key: string): void {
  if (key.length === 0 || /\s/.test(key)) {
    throw new PersistentStoreError(
      `Invalid config key '${key}': keys must be non-empty and contain no whitespace`,
      'invalid_key'
    );
  }
}

function assertStorableValue(key: string, value: string): void {
  if (/[\r\n]/.test(value)) {
    throw new PersistentStoreError(
      `Invalid value for config key '${key}': values must be a single line`,
      'invalid_value'
    );
  }
}

function assertBareFileName(fileName: string): void {
  if (fileName.length === 0 || fileName === '.' || fileName === '..' || /[/\\]/.test(fileName)) {
    throw new PersistentStoreError(
      `Invalid file name '${fileName}': expected a bare file name`,
      'invalid_name'
    );
  }
}

function assertStorableName(name: string): void {
  if (name.trim().length === 0 || name !== name.trim() || /[\r\n]/.test(name)) {
    throw new PersistentStoreError(
      `Invalid step name '${name}': names must be a single trimmed line`,
      'invalid_name'
    );
  }
}

/**
 * Durable key-value configuration plus completion log for resumable runs.
 *
 * @example
 * ```typescript
 * const store = await PersistentStore.open('.stepstone');
 * if (store.isEnabled()) {
 *   await store.configSet('text_editor', 'nano');
 * }
 * ```
 */
export class PersistentStore {
  private readonly dir: string;
  private readonly logger: Logger;
  private enabled = false;

  private constructor(dir: string, logger: Logger) {
    this.dir = dir;
    this.logger = logger;
  }

  /**
   * Opens a store rooted at `dir`. Persistence is enabled iff the directory
   * already exists.
   *
   * @param dir - The store directory.
   * @param options - Store options.
   */
  static async open(dir: string, options: PersistentStoreOptions = {}): Promise<PersistentStore> {
    const store = new PersistentStore(
      dir,
      options.logger ?? new Logger({ component: 'PersistentStore' })
    );
    await store.refresh();
    return store;
  }

  /** The store directory, whether or not it exists. */
  get directory(): string {
    return this.dir;
  }

  /** Whether reads and writes reach the disk. */
  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Re-derives the enabled flag from the file system.
   *
   * @returns The new enabled flag.
   */
  async refresh(): Promise<boolean> {
    const stats = await safeStatIfExists(this.dir);
    this.enabled = stats?.isDirectory() ?? false;
    this.logger.debug('store_refreshed', { dir: this.dir, enabled: this.enabled });
    return this.enabled;
  }

  /**
   * Enables or disables persistence. Enabling creates the directory; when
   * that fails persistence stays disabled. Disabling deletes nothing.
   *
   * @param enabled - The desired state.
   * @returns `true` when the store ends up in the requested state.
   */
  async setEnabled(enabled: boolean): Promise<boolean> {
    if (!enabled) {
      this.enabled = false;
      return true;
    }
    if (this.enabled) {
      return true;
    }
    try {
      await safeMkdir(this.dir, { recursive: true });
    } catch (error) {
      this.logger.warn('store_create_failed', {
        dir: this.dir,
        error: error instanceof Error ? error.message : String(error),
      });
      this.enabled = false;
      return false;
    }
    return this.refresh();
  }

  /**
   * Deletes the store directory and disables persistence.
   */
  async destroy(): Promise<void> {
    await safeRm(this.dir, { recursive: true, force: true });
    this.enabled = false;
  }

  /**
   * Path of an auxiliary file inside the store directory.
   *
   * @param fileName - A bare file name.
   * @returns The path, or `undefined` when persistence is disabled.
   */
  pathFor(fileName: string): string | undefined {
    return this.enabled ? join(this.dir, fileName) : undefined;
  }

  /**
   * Appends `name` to the completion log.
   *
   * @param name - The step name.
   * @returns `false` when persistence is disabled or the write failed.
   */
  async markComplete(name: string): Promise<boolean> {
    assertStorableName(name);
    return this.append(COMPLETION_LOG_FILE, name);
  }

  /**
   * Whether `name` appears at least once in the completion log.
   *
   * @param name - The step name.
   */
  async isComplete(name: string): Promise<boolean> {
    const text = await this.read(COMPLETION_LOG_FILE);
    return text !== undefined && parseCompletionLog(text).has(name);
  }

  /**
   * Every step name in the completion log.
   */
  async completedSteps(): Promise<ReadonlySet<string>> {
    const text = await this.read(COMPLETION_LOG_FILE);
    return text === undefined ? new Set<string>() : parseCompletionLog(text);
  }

  /**
   * Returns the last value written for `key`.
   *
   * @param key - The config key.
   * @returns The value, or `undefined` when unset or persistence is disabled.
   */
  async configGet(key: string): Promise<string | undefined> {
    const text = await this.read(CONFIG_FILE);
    return text === undefined ? undefined : lookupConfig(parseConfigEntries(text), key);
  }

  /**
   * Every config entry in write order, including overridden ones.
   */
  async configEntries(): Promise<ConfigEntry[]> {
    const text = await this.read(CONFIG_FILE);
    return text === undefined ? [] : parseConfigEntries(text);
  }

  /**
   * Appends a config entry.
   *
   * @param key - A non-empty key without whitespace.
   * @param value - A single-line value.
   * @returns `false` when persistence is disabled or the write failed, so the
   *   caller can fall back to asking every time.
   * @throws {PersistentStoreError} If the key or value cannot be stored.
   */
  async configSet(key: string, value: string): Promise<boolean> {
    assertStorableKey(key);
    assertStorableValue(key, value);
    return this.append(CONFIG_FILE, value.length > 0 ? `${key} ${value}` : key);
  }

  /**
   * Reads an auxiliary file owned by a step.
   *
   * @param fileName - A bare file name.
   * @returns The contents, or `undefined` when absent or persistence is disabled.
   */
  async readFile(fileName: string): Promise<string | undefined> {
    assertBareFileName(fileName);
    return this.read(fileName);
  }

  /**
   * Replaces an auxiliary file owned by a step.
   *
   * @param fileName - A bare file name.
   * @param content - The new contents.
   * @returns `false` when persistence is disabled or the write failed.
   */
  async writeFile(fileName: string, content: string): Promise<boolean> {
    assertBareFileName(fileName);
    if (!this.enabled) {
      return false;
    }
    try {
      await safeWriteText(join(this.dir, fileName), content);
    } catch (error) {
      this.logger.warn('store_write_failed', {
        file: fileName,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
    this.logger.debug('store_file_written', { file: fileName, bytes: content.length });
    return true;
  }

  /**
   * Deletes an auxiliary file if it exists. A no-op when disabled.
   *
   * @param fileName - A bare file name.
   */
  async removeFile(fileName: string): Promise<void> {
    assertBareFileName(fileName);
    if (this.enabled) {
      await safeUnlinkIfExists(join(this.dir, fileName));
    }
  }

  private async read(fileName: string): Promise<string | undefined> {
    if (!this.enabled) {
      return undefined;
    }
    try {
      return await safeReadTextIfExists(join(this.dir, fileName));
    } catch (error) {
      this.logger.warn('store_read_failed', {
        file: fileName,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  private async append(fileName: string, line: string): Promise<boolean> {
    if (!this.enabled) {
      return false;
    }
    try {
      await safeAppendLineDurable(join(this.dir, fileName), line);
    } catch (error) {
      this.logger.warn('store_write_failed', {
        file: fileName,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
    this.logger.debug('store_appended', { file: fileName, line });
    return true;
  }
}
