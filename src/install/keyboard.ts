/**
 * Console keyboard layout selection.
 *
 * @packageDocumentation
 */

import type { StepContext } from '../steps/index.js';

/** Store config key of the layout chosen in the live environment. */
export const KEYBOARD_LAYOUT_CONFIG_KEY = 'keyboard_layout';

/**
 * Lists the layouts known to `localectl`; empty when it cannot be run.
 */
export async function listKeymaps(ctx: StepContext): Promise<string[]> {
  const result = await ctx.system.capture('localectl', ['list-keymaps']);
  if (result.exitCode !== 0) {
    ctx.logger.warn('keymap_list_failed', { exitCode: result.exitCode });
    return [];
  }
  return result.stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Asks for a layout name until it is one `localectl` knows. An empty answer
 * prints the list of layouts. When the list is unavailable any non-empty
 * answer is accepted.
 */
export async function askKeyboardLayout(ctx: StepContext): Promise<string> {
  const keymaps = await listKeymaps(ctx);
  const known = new Set(keymaps);
  if (known.size === 0) {
    ctx.prompter.warn("Could not list keyboard layouts with 'localectl'. The name will not be checked.");
  }

  const isAcceptable = (name: string): boolean =>
    known.size === 0 ? name.length > 0 : known.has(name);

  let keymap: string | undefined;
  while (keymap === undefined || !isAcceptable(keymap)) {
    if (keymap === '') {
      ctx.prompter.info(keymaps.join(' '));
    } else if (keymap !== undefined) {
      ctx.prompter.error(`'${keymap}' is not a valid layout name.`);
    }

    ctx.prompter.blank();
    ctx.prompter.info('Enter the name of the desired keyboard layout.');
    ctx.prompter.bullet(
      'To view a list of valid layout names, press Enter without typing anything.'
    );
    keymap = await ctx.prompter.askText('Keyboard layout name:');
  }

  return keymap;
}
