/**
 * Final steps shared by both stages.
 *
 * @packageDocumentation
 */

import { proposeCommand } from '../prompt/index.js';
import { leaf, type LeafStep } from '../steps/index.js';
import { constantProbe } from './probes.js';

/**
 * Removes the persistence directory. Listed in both stages, so the same
 * object is returned every time.
 */
export function cleanupStep(): LeafStep {
  return leaf(
    'cleanup',
    async (ctx) =>
      (await ctx.system.exists(ctx.store.directory))
        ? { status: 'NotDone', message: 'Cleanup not complete.' }
        : { status: 'Done', message: 'Cleanup complete.' },
    async (ctx) => {
      const { prompter, store } = ctx;
      prompter.info(
        `The persistence directory '${store.directory}' is no longer needed once the installation is finished.`
      );
      prompter.blank();
      if (!(await prompter.askYesNo(`Delete '${store.directory}'?`, 'yes'))) {
        return 'Declined';
      }
      await prompter.askEditableCommand(proposeCommand('rm -rv {dir}', { dir: store.directory }));
      await store.refresh();
      return 'Completed';
    }
  );
}

export function rebootStep(): LeafStep {
  return leaf(
    'reboot',
    constantProbe('NeverRun', 'A reboot is required to boot the newly installed system.'),
    async (ctx) => {
      if (!(await ctx.prompter.askYesNo('Reboot now?', 'no'))) {
        return 'Declined';
      }
      await ctx.prompter.askEditableCommand('reboot');
      return 'Completed';
    }
  );
}
