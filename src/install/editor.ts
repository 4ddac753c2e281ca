/**
 * Text editor preference and file editing.
 *
 * @packageDocumentation
 */

import { proposeCommand, type YesNoDefault } from '../prompt/index.js';
import type { StepContext } from '../steps/index.js';

/** Editors shipped in the Arch Linux live environment. */
export const EDITOR_CHOICES: readonly string[] = ['nano', 'vi', 'vim'];

/** Store config key of the preferred editor. */
export const EDITOR_CONFIG_KEY = 'text_editor';

/**
 * Returns the preferred editor, asking until the answer is one of
 * {@link EDITOR_CHOICES} when none is stored. The answer is stored, so later
 * calls return it without asking.
 */
export async function getEditor(ctx: StepContext): Promise<string> {
  const stored = await ctx.store.configGet(EDITOR_CONFIG_KEY);
  if (stored !== undefined && stored.length > 0) {
    return stored;
  }

  let editor = '';
  while (!EDITOR_CHOICES.includes(editor)) {
    if (editor.length > 0) {
      ctx.prompter.error('Input does not match the available options.');
    }
    ctx.prompter.blank();
    ctx.prompter.info(
      "The text editors available in the Arch Linux live environment are 'nano', 'vi', and 'vim'. Please choose your preferred text editor."
    );
    editor = await ctx.prompter.askText('Text editor:', 'nano');
  }

  await ctx.store.configSet(EDITOR_CONFIG_KEY, editor);
  return editor;
}

/**
 * Offers to open `file` in the preferred editor.
 *
 * @param ctx - The step context.
 * @param file - Path of the file.
 * @param defaultChoice - Default answer.
 * @returns Whether the editor was started.
 */
export async function askEdit(
  ctx: StepContext,
  file: string,
  defaultChoice?: YesNoDefault
): Promise<boolean> {
  if (!(await ctx.prompter.askYesNo(`Edit '${file}'?`, defaultChoice))) {
    return false;
  }
  const editor = await getEditor(ctx);
  await ctx.prompter.runCommand(proposeCommand('{editor} {file}', { editor, file }));
  return true;
}
