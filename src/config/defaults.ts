/**
 * Default configuration values for stepstone.toml.
 *
 * @packageDocumentation
 */

import type { Config, DisplayConfig, LoggingConfig, PathConfig, ShellConfig } from './types.js';

/**
 * Default paths. The store lives beside the working directory so that it can
 * be copied into the new system before `arch-chroot`.
 */
export const DEFAULT_PATHS: PathConfig = {
  persist_dir: '.stepstone',
  mirrorlist: '/etc/pacman.d/mirrorlist',
  mount_root: '/mnt',
};

/**
 * Default display settings.
 */
export const DEFAULT_DISPLAY: DisplayConfig = {
  colors: true,
  max_line_width: 80,
};

export const DEFAULT_SHELL: ShellConfig = {
  program: 'bash',
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  paths: DEFAULT_PATHS,
  display: DEFAULT_DISPLAY,
  shell: DEFAULT_SHELL,
  logging: DEFAULT_LOGGING,
};

/** Default configuration file name, looked up in the working directory. */
export const CONFIG_FILE_NAME = 'stepstone.toml';
