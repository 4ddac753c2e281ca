/**
 * Version command handler.
 *
 * Displays the version by reading it directly from package.json.
 */

import { readFileSync } from 'node:fs';
import type { CliCommandResult, CliOutput } from '../types.js';

const PACKAGE_JSON_URL = new URL('../../../package.json', import.meta.url);

export const LICENSE_TEXT =
  'This is free software released under the MIT license. There is NO WARRANTY, to the extent permitted by law.';

function isVersioned(value: unknown): value is { version: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    typeof value.version === 'string'
  );
}

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersionFromPackageJson(url: URL = PACKAGE_JSON_URL): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(url, 'utf-8'));
    return isVersioned(packageJson) ? packageJson.version : '(unknown)';
  } catch {
    return '(unknown)';
  }
}

/**
 * Handles `--version`.
 */
export function handleVersionCommand(output: CliOutput): CliCommandResult {
  output.out(`stepstone ${getVersionFromPackageJson()}`);
  output.out('');
  output.out(LICENSE_TEXT);
  return { exitCode: 0 };
}
