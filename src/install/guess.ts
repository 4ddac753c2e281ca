/**
 * Best-effort guesses used to pre-fill answers.
 *
 * @packageDocumentation
 */

import type { StepContext } from '../steps/index.js';

export type CpuVendor = 'amd' | 'intel';

export const CPUINFO_PATH = '/proc/cpuinfo';
export const LOCALE_GEN_PATH = '/etc/locale.gen';

/**
 * Guesses the CPU vendor from `/proc/cpuinfo`, announcing the result.
 */
export async function guessCpuVendor(ctx: StepContext): Promise<CpuVendor | undefined> {
  const cpuinfo = (await ctx.system.readText(CPUINFO_PATH)) ?? '';
  const vendorLine = cpuinfo.split('\n').find((line) => line.startsWith('vendor_id')) ?? '';

  if (vendorLine.includes('AuthenticAMD')) {
    ctx.prompter.info('Detected AMD CPU.');
    return 'amd';
  }
  if (vendorLine.includes('GenuineIntel')) {
    ctx.prompter.info('Detected Intel CPU.');
    return 'intel';
  }
  ctx.prompter.warn('Failed to guess CPU manufacturer.');
  return undefined;
}

/**
 * Guesses the system locale from the first uncommented entry of
 * `/etc/locale.gen`, e.g. `en_US.UTF-8`.
 */
export async function guessLocale(ctx: StepContext): Promise<string | undefined> {
  const text = (await ctx.system.readText(LOCALE_GEN_PATH)) ?? '';
  for (const line of text.split('\n')) {
    const match = /^([^#\s]\S*)/.exec(line);
    if (match?.[1] !== undefined) {
      ctx.prompter.info(`Guessed locale from '${LOCALE_GEN_PATH}': '${match[1]}'.`);
      return match[1];
    }
  }
  ctx.prompter.warn(`Failed to guess locale from '${LOCALE_GEN_PATH}'.`);
  return undefined;
}
