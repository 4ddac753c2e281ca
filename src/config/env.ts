/**
 * Environment variable overrides for configuration.
 *
 * Provides support for STEPSTONE_* environment variables, plus the
 * conventional NO_COLOR, to override configuration values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);
  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

/**
 * Coerces a string value to a boolean.
 *
 * Accepts 'true', '1', 'yes', 'on' and 'false', '0', 'no', 'off',
 * case-insensitively.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  if (TRUTHY.includes(trimmed)) {
    return true;
  }
  if (FALSY.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

/**
 * One supported environment variable.
 */
interface EnvVarMapping {
  readonly type: 'string' | 'number' | 'boolean';
  readonly description: string;
  /** Coerces `raw` and writes it into `overrides`. */
  readonly apply: (overrides: PartialConfig, raw: string, envVar: string) => void;
}

const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  STEPSTONE_PERSIST_DIR: {
    type: 'string',
    description: 'Override the persistence directory',
    apply: (o, raw) => {
      o.paths = { ...o.paths, persist_dir: raw };
    },
  },
  STEPSTONE_MIRRORLIST: {
    type: 'string',
    description: 'Override the pacman mirror list path',
    apply: (o, raw) => {
      o.paths = { ...o.paths, mirrorlist: raw };
    },
  },
  STEPSTONE_MOUNT_ROOT: {
    type: 'string',
    description: 'Override the mount point of the new system',
    apply: (o, raw) => {
      o.paths = { ...o.paths, mount_root: raw };
    },
  },
  STEPSTONE_COLORS: {
    type: 'boolean',
    description: 'Enable or disable ANSI colors (true/false)',
    apply: (o, raw, envVar) => {
      o.display = { ...o.display, colors: coerceToBoolean(raw, envVar) };
    },
  },
  STEPSTONE_MAX_LINE_WIDTH: {
    type: 'number',
    description: 'Override the maximum line width for wrapped text',
    apply: (o, raw, envVar) => {
      o.display = { ...o.display, max_line_width: coerceToNumber(raw, envVar) };
    },
  },
  STEPSTONE_SHELL: {
    type: 'string',
    description: 'Override the shell used to run commands',
    apply: (o, raw) => {
      o.shell = { ...o.shell, program: raw };
    },
  },
  STEPSTONE_DEBUG: {
    type: 'boolean',
    description: 'Enable or disable debug logging (true/false)',
    apply: (o, raw, envVar) => {
      o.logging = { ...o.logging, debug: coerceToBoolean(raw, envVar) };
    },
  },
};

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Empty values are ignored. A non-empty `NO_COLOR` disables colors and wins
 * over `STEPSTONE_COLORS`.
 *
 * @param env - The environment object to read from.
 * @param options - `collectErrors` gathers coercion errors instead of throwing.
 * @throws EnvCoercionError when a value cannot be coerced and errors are not collected.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ STEPSTONE_MOUNT_ROOT: '/target' });
 * console.log(result.overrides.paths?.mount_root); // "/target"
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];
    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  const noColor = env.NO_COLOR;
  if (noColor !== undefined && noColor !== '') {
    overrides.display = { ...overrides.display, colors: false };
    appliedVars.push('NO_COLOR');
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    paths: { ...base.paths, ...partial.paths },
    display: { ...base.display, ...partial.display },
    shell: { ...base.shell, ...partial.shell },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Mapping of env var names to descriptions and types.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  docs.NO_COLOR = { description: 'Disable ANSI colors when set to any non-empty value', type: 'string' };
  docs.STEPSTONE_CONFIG = { description: 'Path of the configuration file', type: 'string' };
  return docs;
}
