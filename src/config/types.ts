/**
 * Configuration types for stepstone.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Path configuration.
 */
export interface PathConfig {
  /** Directory of the completion log and config store. Relative paths resolve against the working directory. */
  persist_dir: string;
  /** Pacman mirror list edited by the mirror step. */
  mirrorlist: string;
  /** Mount point of the system being installed. */
  mount_root: string;
}

/**
 * Terminal output settings.
 */
export interface DisplayConfig {
  /** Whether to use ANSI colors in output. */
  colors: boolean;
  /** Upper bound for wrapped prose, in columns. */
  max_line_width: number;
}

/**
 * Shell used to run proposed commands.
 */
export interface ShellConfig {
  /** Shell program, looked up on PATH. */
  program: string;
}

/**
 * Structured logging settings.
 */
export interface LoggingConfig {
  /** Emit debug entries (phase transitions, store writes). */
  debug: boolean;
}

/**
 * Complete configuration object parsed from stepstone.toml.
 */
export interface Config {
  paths: PathConfig;
  display: DisplayConfig;
  shell: ShellConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with a full one.
 */
export interface PartialConfig {
  paths?: Partial<PathConfig>;
  display?: Partial<DisplayConfig>;
  shell?: Partial<ShellConfig>;
  logging?: Partial<LoggingConfig>;
}
