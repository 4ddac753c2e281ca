/**
 * TOML configuration parser for stepstone.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_CONFIG, DEFAULT_DISPLAY, DEFAULT_LOGGING, DEFAULT_PATHS, DEFAULT_SHELL } from './defaults.js';
import type { Config, DisplayConfig, LoggingConfig, PathConfig, ShellConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'ConfigParseError';
  }
}

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extracts a table from the parsed document.
 *
 * @throws ConfigParseError if the key holds something other than a table.
 */
function section(document: RawSection, name: string): RawSection | undefined {
  const value = document[name];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected table, got ${typeof value}`);
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

function parsePaths(raw: RawSection | undefined): PathConfig {
  const result: PathConfig = { ...DEFAULT_PATHS };
  if (raw === undefined) {
    return result;
  }

  if ('persist_dir' in raw) {
    result.persist_dir = validateString(raw.persist_dir, 'paths.persist_dir');
  }
  if ('mirrorlist' in raw) {
    result.mirrorlist = validateString(raw.mirrorlist, 'paths.mirrorlist');
  }
  if ('mount_root' in raw) {
    result.mount_root = validateString(raw.mount_root, 'paths.mount_root');
  }

  return result;
}

function parseDisplay(raw: RawSection | undefined): DisplayConfig {
  const result: DisplayConfig = { ...DEFAULT_DISPLAY };
  if (raw === undefined) {
    return result;
  }

  if ('colors' in raw) {
    result.colors = validateBoolean(raw.colors, 'display.colors');
  }
  if ('max_line_width' in raw) {
    result.max_line_width = validateNumber(raw.max_line_width, 'display.max_line_width');
    if (!Number.isInteger(result.max_line_width)) {
      throw new ConfigParseError(
        `Invalid value for 'display.max_line_width': must be an integer, got ${String(result.max_line_width)}`
      );
    }
  }

  return result;
}

function parseShell(raw: RawSection | undefined): ShellConfig {
  const result: ShellConfig = { ...DEFAULT_SHELL };
  if (raw !== undefined && 'program' in raw) {
    result.program = validateString(raw.program, 'shell.program');
  }
  return result;
}

function parseLogging(raw: RawSection | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * Unknown sections and keys are ignored.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field types.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [paths]
 * mount_root = "/target"
 *
 * [display]
 * colors = false
 * `);
 * console.log(config.paths.mount_root); // "/target"
 * console.log(config.display.max_line_width); // 80
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let document: RawSection;

  try {
    document = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    paths: parsePaths(section(document, 'paths')),
    display: parseDisplay(section(document, 'display')),
    shell: parseShell(section(document, 'shell')),
    logging: parseLogging(section(document, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    paths: { ...DEFAULT_CONFIG.paths },
    display: { ...DEFAULT_CONFIG.display },
    shell: { ...DEFAULT_CONFIG.shell },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
