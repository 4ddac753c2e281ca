/**
 * Configuration module for stepstone.toml parsing and validation.
 *
 * Provides typed configuration parsing with defaults, semantic validation,
 * and environment variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  Config,
  DisplayConfig,
  LoggingConfig,
  PartialConfig,
  PathConfig,
  ShellConfig,
} from './types.js';
export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  DEFAULT_DISPLAY,
  DEFAULT_LOGGING,
  DEFAULT_PATHS,
  DEFAULT_SHELL,
} from './defaults.js';
export {
  ConfigValidationError,
  MAX_MAX_LINE_WIDTH,
  MIN_MAX_LINE_WIDTH,
  assertConfigValid,
  validateConfig,
} from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { loadConfig } from './loader.js';
export type { LoadConfigOptions, LoadedConfig } from './loader.js';
