/**
 * Semantic validation for configuration values.
 *
 * Validates that configuration values are semantically correct beyond type
 * checking: paths are usable and the line width is within range.
 *
 * @packageDocumentation
 */

import { isAbsolute } from 'node:path';
import type { Config } from './types.js';

/** Smallest accepted `display.max_line_width`. */
export const MIN_MAX_LINE_WIDTH = 20;
/** Largest accepted `display.max_line_width`. */
export const MAX_MAX_LINE_WIDTH = 400;

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

function validateNonEmpty(value: string, field: string, errors: ValidationError[]): boolean {
  if (value.trim() === '') {
    errors.push({ field, value, message: `'${field}' must not be empty` });
    return false;
  }
  return true;
}

function validateAbsolute(value: string, field: string, errors: ValidationError[]): void {
  if (validateNonEmpty(value, field, errors) && !isAbsolute(value)) {
    errors.push({ field, value, message: `'${field}' must be an absolute path, got '${value}'` });
  }
}

/**
 * Validates configuration semantically.
 *
 * - `paths.persist_dir` is non-empty (relative paths are allowed)
 * - `paths.mirrorlist` and `paths.mount_root` are absolute
 * - `display.max_line_width` is an integer within range
 * - `shell.program` is non-empty
 *
 * @param config - The configuration to validate.
 * @returns Validation result with every failure found.
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  validateNonEmpty(config.paths.persist_dir, 'paths.persist_dir', errors);
  validateAbsolute(config.paths.mirrorlist, 'paths.mirrorlist', errors);
  validateAbsolute(config.paths.mount_root, 'paths.mount_root', errors);

  const width = config.display.max_line_width;
  if (!Number.isInteger(width) || width < MIN_MAX_LINE_WIDTH || width > MAX_MAX_LINE_WIDTH) {
    errors.push({
      field: 'display.max_line_width',
      value: width,
      message: `'display.max_line_width' must be an integer between ${String(MIN_MAX_LINE_WIDTH)} and ${String(MAX_MAX_LINE_WIDTH)}, got ${String(width)}`,
    });
  }

  validateNonEmpty(config.shell.program, 'shell.program', errors);

  return { valid: errors.length === 0, errors };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The configuration to validate.
 * @throws ConfigValidationError listing every failure.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);
  if (!result.valid) {
    const details = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(`Configuration validation failed:\n${details}`, result.errors);
  }
}
