/**
 * stepstone
 *
 * An interactive, resumable Arch Linux installation guide. Each step probes
 * the machine for its status, is skipped when already done, and otherwise
 * proposes editable commands to the operator.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './steps/index.js';
export * from './store/index.js';
export * from './prompt/index.js';
export * from './system/index.js';
export * from './runner/index.js';
export * from './config/index.js';
export * from './install/index.js';
export { Logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
export { createCliApp } from './cli/app.js';
export type { CliApp, CliAppOptions } from './cli/app.js';
export { runCli } from './cli/main.js';
