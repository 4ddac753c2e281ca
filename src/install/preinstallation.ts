/**
 * Pre-installation steps run in the live environment.
 *
 * @packageDocumentation
 */

import { proposeCommand } from '../prompt/index.js';
import {
  askMarkComplete,
  composite,
  leaf,
  markedStatus,
  type CompositeStep,
  type LeafStep,
  type StepContext,
} from '../steps/index.js';
import { KEYBOARD_LAYOUT_CONFIG_KEY, askKeyboardLayout } from './keyboard.js';
import { ttyReminder } from './reminders.js';
import type { InstallSettings } from './settings.js';

/** Directory present only when booted in UEFI mode. */
export const EFIVARS_PATH = '/sys/firmware/efi/efivars';

function setKeyboardLayout(): LeafStep {
  return leaf('set-keyboard-layout', markedStatus, async (ctx) => {
    const { prompter } = ctx;
    prompter.info('If you prefer a keyboard layout other than US QWERTY, you may change it now.');
    prompter.bullet(
      "If you have already changed the keyboard layout (e.g. using 'loadkeys'), you may skip this step."
    );
    prompter.blank();

    if (await prompter.askYesNo('Change current keyboard layout?', 'no')) {
      const layout = await askKeyboardLayout(ctx);
      await ctx.store.configSet(KEYBOARD_LAYOUT_CONFIG_KEY, layout);
      await prompter.askEditableCommand(proposeCommand('loadkeys {layout}', { layout }));
    }

    prompter.blank();
    await askMarkComplete(ctx);
    return 'Completed';
  });
}

function verifyBootMode(): LeafStep {
  return leaf(
    'verify-boot-mode',
    async (ctx) =>
      (await ctx.system.isDirectory(EFIVARS_PATH))
        ? { status: 'Informational', message: 'This system is booted in UEFI mode.' }
        : {
            status: 'Inapplicable',
            message: `Could not access the directory '${EFIVARS_PATH}'. This system is probably not booted in UEFI mode.`,
          },
    async (ctx) => {
      ctx.prompter.info('The boot mode is chosen by the firmware and cannot be changed here.');
      return 'Completed';
    }
  );
}

function testInternetConnection(): LeafStep {
  return leaf('test-internet-connection', markedStatus, async (ctx) => {
    const { prompter } = ctx;
    prompter.info('Please connect to the internet. (You may have already done this before starting stepstone.)');
    ttyReminder(ctx);
    prompter.blank();

    if (!(await prompter.askYesNo("Test internet connection with 'ping'?", 'yes'))) {
      return 'Declined';
    }
    await prompter.askEditableCommand('ping -c 4 archlinux.org');

    prompter.blank();
    await askMarkComplete(ctx);
    return 'Completed';
  });
}

function updateSystemClock(): LeafStep {
  return leaf(
    'update-system-clock',
    async (ctx) => {
      const result = await ctx.system.capture('timedatectl', ['status']);
      return result.stdout.includes('NTP service: active')
        ? { status: 'Done', message: 'The NTP service is active.' }
        : { status: 'NotDone', message: 'The NTP service has not been started yet.' };
    },
    async (ctx) => {
      if (!(await ctx.prompter.askYesNo('Sync the system clock using NTP?', 'yes'))) {
        return 'Declined';
      }
      await ctx.prompter.askEditableCommand('timedatectl set-ntp true');
      return 'Completed';
    }
  );
}

/**
 * Shows `lines` as shell examples under a heading.
 */
function examples(ctx: StepContext, heading: string, lines: readonly string[]): void {
  ctx.prompter.blank();
  ctx.prompter.info(heading);
  for (const line of lines) {
    ctx.prompter.bullet(line, { marker: '#' });
  }
}

/**
 * Body of a manual step: instructions, then the completion question.
 */
function manualStep(name: string, instruct: (ctx: StepContext) => void): LeafStep {
  return leaf(name, markedStatus, async (ctx) => {
    instruct(ctx);
    ctx.prompter.blank();
    ttyReminder(ctx);
    ctx.prompter.blank();
    await askMarkComplete(ctx);
    return 'Completed';
  });
}

function prepareFilesystems(settings: InstallSettings): CompositeStep {
  const root = settings.mountRoot;

  const partitionDisks = manualStep('partition-disks', (ctx) => {
    ctx.prompter.info(
      "Please partition your disk(s) using 'fdisk' or similar. (This step is not automated, to give you full control.) Consider including the following:"
    );
    ctx.prompter.bullet('Root partition (required)');
    ctx.prompter.bullet('EFI system partition (for UEFI booting; might already exist)');
    ctx.prompter.bullet('Swap partition (or a swap file, if supported)');
  });

  const formatPartitions = manualStep('format-partitions', (ctx) => {
    ctx.prompter.info('Please format the partitions you created in the previous step.');
    examples(ctx, 'EFI partition example:', ['mkfs.fat -F32 /dev/sdX1']);
    examples(ctx, 'Root partition example:', ['mkfs.ext4 /dev/sdX2']);
    examples(ctx, 'Swap partition example:', ['mkswap /dev/sdX3', 'swapon /dev/sdX3']);
  });

  const mountFilesystems = manualStep('mount-filesystems', (ctx) => {
    ctx.prompter.info('Please mount the partitions you formatted in the previous step.');
    examples(ctx, 'Root partition example:', [`mount /dev/sdX2 ${root}`]);
    examples(ctx, 'EFI partition example:', [`mkdir ${root}/efi`, `mount /dev/sdX1 ${root}/efi`]);
  });

  return composite('prepare-filesystems', [partitionDisks, formatPartitions, mountFilesystems]);
}

/**
 * Builds the `preinstallation` composite.
 */
export function preinstallationSteps(settings: InstallSettings): CompositeStep {
  return composite('preinstallation', [
    setKeyboardLayout(),
    verifyBootMode(),
    testInternetConnection(),
    updateSystemClock(),
    prepareFilesystems(settings),
  ]);
}
