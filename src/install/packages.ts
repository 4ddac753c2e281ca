/**
 * Package name list and package selection prompts.
 *
 * @packageDocumentation
 */

import type { StepContext } from '../steps/index.js';

/** Store file holding one available package name per line. */
export const PACKAGE_NAMES_FILE = 'package-names';

/**
 * Splits a space separated answer into package names.
 *
 * @param text - Operator input.
 */
export function splitPackageList(text: string): string[] {
  return text.split(/\s+/).filter((name) => name.length > 0);
}

/**
 * Removes repeated names, keeping the first occurrence.
 *
 * @param names - Package names.
 */
export function uniquePackages(names: readonly string[]): string[] {
  return [...new Set(names)];
}

/**
 * Reads the package name list from the store.
 *
 * @returns The names, or `undefined` when there is no list to check against.
 */
export async function readPackageNames(ctx: StepContext): Promise<ReadonlySet<string> | undefined> {
  const text = await ctx.store.readFile(PACKAGE_NAMES_FILE);
  if (text === undefined) {
    return undefined;
  }
  const names = splitPackageList(text);
  return names.length > 0 ? new Set(names) : undefined;
}

/**
 * First name missing from `known`, if any. Without a list every name passes.
 *
 * @param names - Names to check.
 * @param known - Available package names.
 */
export function findMissingPackage(
  names: readonly string[],
  known: ReadonlySet<string> | undefined
): string | undefined {
  if (known === undefined) {
    return undefined;
  }
  return names.find((name) => !known.has(name));
}

/**
 * Asks for package names until every one exists in the package name list.
 *
 * @param ctx - The step context.
 * @param defaults - Pre-filled names.
 */
export async function askPackages(ctx: StepContext, defaults: readonly string[] = []): Promise<string[]> {
  const known = await readPackageNames(ctx);
  let packages = splitPackageList(await ctx.prompter.askText('Enter package name(s):', defaults.join(' ')));

  for (;;) {
    const missing = findMissingPackage(packages, known);
    if (missing === undefined) {
      return packages;
    }
    ctx.prompter.error(`The package '${missing}' does not exist.`);
    packages = splitPackageList(
      await ctx.prompter.askText('Enter package name(s):', packages.join(' '))
    );
  }
}
