/**
 * Setup steps: introduction and the optional persistence directory.
 *
 * @packageDocumentation
 */

import { composite, leaf, type CompositeStep, type LeafStep } from '../steps/index.js';
import { constantProbe } from './probes.js';

const INSTALLATION_GUIDE_URL = 'https://wiki.archlinux.org/title/Installation_guide';

function readme(): LeafStep {
  return leaf('readme', constantProbe('NeverRun', ''), async (ctx) => {
    const { prompter } = ctx;
    prompter.centered('stepstone: an interactive Arch Linux installer');
    prompter.blank();
    prompter.info(
      'Throughout the installation process, you may be prompted to switch to another TTY to perform an action manually. This can be done using the Alt+(arrow key) shortcut.'
    );
    prompter.blank();
    prompter.info(
      "You will be prompted before any commands that alter the system are run. These commands will be executed in a shell, and you will see their output. You may also edit these commands, or delete them entirely if you don't want to run them. For example:"
    );
    await prompter.askEditableCommand("echo 'Hello World!'");
    await prompter.pause();
    prompter.info(
      `It is highly recommended to have the Arch Linux installation guide at <${INSTALLATION_GUIDE_URL}> open during the installation process, whether in another TTY or on another device.`
    );
    prompter.blank();
    prompter.info(
      'You may press Ctrl+C to exit stepstone at any time, and your progress will be remembered when you run stepstone again.'
    );
    await prompter.pause();
    return 'Completed';
  });
}

function createPersistDir(): LeafStep {
  return leaf(
    'create-persist-dir',
    async (ctx) => {
      const dir = ctx.store.directory;
      return (await ctx.store.refresh())
        ? { status: 'Done', message: `The directory '${dir}' exists.` }
        : { status: 'NotDone', message: `The directory '${dir}' does not exist.` };
    },
    async (ctx) => {
      const { prompter, store } = ctx;
      prompter.info(
        `The optional persistence directory '${store.directory}' is used for the following purposes:`
      );
      prompter.bullet('Storing user preferences (e.g. keyboard layout, text editor)');
      prompter.bullet('Remembering which steps have been marked as complete');
      prompter.blank();

      if (!(await prompter.askYesNo('Create the optional persistence directory?', 'yes'))) {
        return 'Declined';
      }
      if (!(await store.setEnabled(true))) {
        prompter.error(`Could not create the directory '${store.directory}'.`);
      }
      return 'Completed';
    }
  );
}

/**
 * Builds the `setup` composite.
 */
export function setupSteps(): CompositeStep {
  return composite('setup', [readme(), createPersistDir()]);
}
