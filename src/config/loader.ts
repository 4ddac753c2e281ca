/**
 * Loads the effective configuration: file, then environment, then
 * validation. Problems never stop the program; they become warnings and the
 * affected layer falls back to defaults.
 *
 * @packageDocumentation
 */

import { resolve } from 'node:path';
import { safeReadTextIfExists } from '../utils/safe-fs.js';
import { CONFIG_FILE_NAME } from './defaults.js';
import { mergeConfig, readEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import { validateConfig } from './validator.js';
import type { Config } from './types.js';

/**
 * Options for loading configuration.
 */
export interface LoadConfigOptions {
  /** Directory the default config file and relative paths resolve against. */
  readonly cwd?: string;
  /** Environment to read overrides from. */
  readonly env?: EnvRecord;
}

/**
 * Effective configuration and how it was obtained.
 */
export interface LoadedConfig {
  readonly config: Config;
  /** Absolute path of the config file that was read, if any. */
  readonly source: string | undefined;
  /** Human-readable problems that caused a fallback to defaults. */
  readonly warnings: readonly string[];
}

/**
 * Loads `stepstone.toml` (or `STEPSTONE_CONFIG`) and applies env overrides.
 *
 * A missing file is not a problem. A file that does not parse is ignored with
 * a warning. Env values that do not coerce are ignored with a warning. If the
 * merged result fails validation, the defaults are used with a warning per
 * failure.
 *
 * @param options - Working directory and environment.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const warnings: string[] = [];

  const configured = env.STEPSTONE_CONFIG;
  const configPath = resolve(cwd, configured !== undefined && configured !== '' ? configured : CONFIG_FILE_NAME);

  let fileConfig = getDefaultConfig();
  let source: string | undefined;
  const content = await safeReadTextIfExists(configPath);
  if (content !== undefined) {
    try {
      fileConfig = parseConfig(content);
      source = configPath;
    } catch (error) {
      const message = error instanceof ConfigParseError ? error.message : String(error);
      warnings.push(`Failed to load config from ${configPath}: ${message}`);
    }
  }

  const envResult = readEnvOverrides(env, { collectErrors: true });
  for (const error of envResult.errors) {
    warnings.push(`Ignoring ${error.envVar}: ${error.message}`);
  }

  const merged = mergeConfig(fileConfig, envResult.overrides);
  const validation = validateConfig(merged);
  if (!validation.valid) {
    for (const error of validation.errors) {
      warnings.push(`Invalid configuration: ${error.message}`);
    }
    return { config: getDefaultConfig(), source, warnings };
  }

  return { config: merged, source, warnings };
}
