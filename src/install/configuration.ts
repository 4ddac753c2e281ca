/**
 * Configuration steps run inside the new system.
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
  type ProbeResult,
  type StepContext,
} from '../steps/index.js';
import { packageInstalled } from '../system/index.js';
import { askEdit } from './editor.js';
import { LOCALE_GEN_PATH, guessLocale } from './guess.js';
import { KEYBOARD_LAYOUT_CONFIG_KEY, askKeyboardLayout } from './keyboard.js';
import { contentProbe, existsProbe, fileProbe } from './probes.js';
import { ctrlCReminder } from './reminders.js';
import type { InstallSettings } from './settings.js';

export const LOCALTIME_PATH = '/etc/localtime';
export const ZONEINFO_DIR = '/usr/share/zoneinfo';
export const ADJTIME_PATH = '/etc/adjtime';
export const LOCALE_CONF_PATH = '/etc/locale.conf';
export const VCONSOLE_CONF_PATH = '/etc/vconsole.conf';
export const HOSTNAME_PATH = '/etc/hostname';
export const HOSTS_PATH = '/etc/hosts';
export const MKINITCPIO_CONF_PATH = '/etc/mkinitcpio.conf';
export const GRUB_DIR = '/boot/grub';
export const GRUB_CFG_PATH = '/boot/grub/grub.cfg';
export const GRUB_DEFAULTS_PATH = '/etc/default/grub';

// ---------------------------------------------------------------------------
// System time
// ---------------------------------------------------------------------------

function setTimeZone(): LeafStep {
  return leaf(
    'set-time-zone',
    existsProbe(
      LOCALTIME_PATH,
      `The file '${LOCALTIME_PATH}' exists.`,
      `The file '${LOCALTIME_PATH}' does not exist.`
    ),
    async (ctx) => {
      const { prompter, system } = ctx;
      prompter.info(
        `Time zones are named after the files under '${ZONEINFO_DIR}', e.g. 'Europe/London' or 'America/New_York'.`
      );
      prompter.blank();
      if (!(await prompter.askYesNo('Set the time zone?', 'yes'))) {
        return 'Declined';
      }

      let zone = await prompter.askText('Time zone:', 'UTC');
      for (;;) {
        const zoneFile = `${ZONEINFO_DIR}/${zone}`;
        if (zone.length > 0 && (await system.isFile(zoneFile))) {
          await prompter.askEditableCommand(
            proposeCommand('ln -sf {zone} {link}', { zone: zoneFile, link: LOCALTIME_PATH })
          );
          return 'Completed';
        }
        if (zone.length > 0 && (await system.isDirectory(zoneFile))) {
          prompter.error(`'${zone}' is a region, not a time zone. Please include the city.`);
        } else {
          prompter.error(`The time zone '${zone}' does not exist.`);
        }
        zone = await prompter.askText('Time zone:', zone);
      }
    }
  );
}

function generateAdjtime(): LeafStep {
  return leaf(
    'generate-adjtime',
    existsProbe(ADJTIME_PATH, `The file '${ADJTIME_PATH}' exists.`, `The file '${ADJTIME_PATH}' does not exist.`),
    async (ctx) => {
      if (!(await ctx.prompter.askYesNo(`Generate '${ADJTIME_PATH}' from the system clock?`, 'yes'))) {
        return 'Declined';
      }
      await ctx.prompter.askEditableCommand('hwclock --systohc');
      return 'Completed';
    }
  );
}

// ---------------------------------------------------------------------------
// Localization
// ---------------------------------------------------------------------------

function selectLocales(): LeafStep {
  return leaf(
    'select-locales',
    contentProbe(
      LOCALE_GEN_PATH,
      `Locales are selected in '${LOCALE_GEN_PATH}'.`,
      `No locales are selected in '${LOCALE_GEN_PATH}' yet.`
    ),
    async (ctx) => {
      ctx.prompter.info(
        `Uncomment the locales you need in '${LOCALE_GEN_PATH}', e.g. 'en_US.UTF-8 UTF-8'.`
      );
      ctx.prompter.blank();
      return (await askEdit(ctx, LOCALE_GEN_PATH, 'yes')) ? 'Completed' : 'Declined';
    }
  );
}

function generateLocales(): LeafStep {
  return leaf('generate-locales', markedStatus, async (ctx) => {
    if (!(await ctx.prompter.askYesNo('Generate the selected locales?', 'yes'))) {
      return 'Declined';
    }
    await ctx.prompter.askEditableCommand('locale-gen');
    ctx.prompter.blank();
    await askMarkComplete(ctx);
    return 'Completed';
  });
}

function createLocaleConf(): LeafStep {
  return leaf(
    'create-locale-conf',
    fileProbe(
      LOCALE_CONF_PATH,
      `The file '${LOCALE_CONF_PATH}' exists.`,
      `The file '${LOCALE_CONF_PATH}' does not exist.`
    ),
    async (ctx) => {
      if (!(await ctx.prompter.askYesNo(`Create '${LOCALE_CONF_PATH}'?`, 'yes'))) {
        return 'Declined';
      }
      const locale = (await guessLocale(ctx)) ?? 'en_US.UTF-8';
      await ctx.prompter.askEditableCommand(
        proposeCommand('echo {line} > {path}', { line: `LANG=${locale}`, path: LOCALE_CONF_PATH })
      );
      return 'Completed';
    }
  );
}

/**
 * Done when `/etc/vconsole.conf` sets a keymap; otherwise the completion
 * log decides, since keeping the default layout is a valid outcome.
 */
async function keymapStatus(ctx: StepContext): Promise<ProbeResult> {
  const text = (await ctx.system.readText(VCONSOLE_CONF_PATH)) ?? '';
  if (text.split('\n').some((line) => line.trim().startsWith('KEYMAP='))) {
    return { status: 'Done', message: `A keyboard layout is set in '${VCONSOLE_CONF_PATH}'.` };
  }
  return markedStatus(ctx);
}

function setDefaultKeyboardLayout(): LeafStep {
  return leaf('set-default-keyboard-layout', keymapStatus, async (ctx) => {
    const { prompter } = ctx;
    prompter.info('The default keyboard layout of the console is US QWERTY unless another is set.');
    prompter.blank();

    if (await prompter.askYesNo('Set a different default keyboard layout?', 'no')) {
      const stored = await ctx.store.configGet(KEYBOARD_LAYOUT_CONFIG_KEY);
      let layout: string | undefined;
      if (stored !== undefined && stored.length > 0) {
        if (await prompter.askYesNo(`Use the layout '${stored}' chosen earlier?`, 'yes')) {
          layout = stored;
        }
      }
      layout ??= await askKeyboardLayout(ctx);
      await prompter.askEditableCommand(
        proposeCommand('echo {line} >> {path}', { line: `KEYMAP=${layout}`, path: VCONSOLE_CONF_PATH })
      );
    }

    prompter.blank();
    await askMarkComplete(ctx);
    return 'Completed';
  });
}

// ---------------------------------------------------------------------------
// Network configuration
// ---------------------------------------------------------------------------

function setHostname(): LeafStep {
  return leaf(
    'set-hostname',
    fileProbe(HOSTNAME_PATH, `The file '${HOSTNAME_PATH}' exists.`, `The file '${HOSTNAME_PATH}' does not exist.`),
    async (ctx) => {
      if (!(await ctx.prompter.askYesNo('Set the hostname?', 'yes'))) {
        return 'Declined';
      }
      let hostname = '';
      while (hostname.length === 0) {
        hostname = await ctx.prompter.askText('Hostname:');
      }
      await ctx.prompter.askEditableCommand(
        proposeCommand('echo {hostname} > {path}', { hostname, path: HOSTNAME_PATH })
      );
      return 'Completed';
    }
  );
}

function generateHosts(): LeafStep {
  return leaf(
    'generate-hosts',
    contentProbe(HOSTS_PATH, `The file '${HOSTS_PATH}' has entries.`, `The file '${HOSTS_PATH}' has no entries yet.`),
    async (ctx) => {
      const { prompter } = ctx;
      if (!(await prompter.askYesNo(`Add the local host entries to '${HOSTS_PATH}'?`, 'yes'))) {
        return 'Declined';
      }
      const stored = ((await ctx.system.readText(HOSTNAME_PATH)) ?? '').trim();
      const hostname = stored.length > 0 ? stored : 'MYHOSTNAME';
      const address = await prompter.askText('IP address for the hostname:', '127.0.1.1');

      const entries: readonly (readonly [string, string])[] = [
        ['127.0.0.1', 'localhost'],
        ['::1', 'localhost'],
        [address, `${hostname}.localdomain ${hostname}`],
      ];
      for (const [ip, names] of entries) {
        await prompter.askEditableCommand(
          proposeCommand('printf {format} {ip} {names} >> {path}', {
            format: '%s\\t%s\\n',
            ip,
            names,
            path: HOSTS_PATH,
          })
        );
      }
      prompter.blank();
      await askEdit(ctx, HOSTS_PATH, 'no');
      return 'Completed';
    }
  );
}

// ---------------------------------------------------------------------------
// Initramfs and root password
// ---------------------------------------------------------------------------

function recreateInitramfs(): LeafStep {
  return leaf('recreate-initramfs', markedStatus, async (ctx) => {
    const { prompter } = ctx;
    prompter.info(
      `Recreating the initramfs is usually unnecessary, since pacstrap already created it. It is needed after changing '${MKINITCPIO_CONF_PATH}'.`
    );
    prompter.blank();
    await askEdit(ctx, MKINITCPIO_CONF_PATH, 'no');
    if (await prompter.askYesNo('Recreate the initramfs?', 'no')) {
      await prompter.askEditableCommand('mkinitcpio -P');
    }
    prompter.blank();
    await askMarkComplete(ctx);
    return 'Completed';
  });
}

/**
 * Reads the root account's password state from `passwd -S root`.
 * The second field is `P` (usable), `NP` (none) or `L` (locked).
 */
export async function rootPasswordStatus(ctx: StepContext): Promise<ProbeResult> {
  const result = await ctx.system.capture('passwd', ['-S', 'root']);
  if (result.exitCode !== 0) {
    return { status: 'Inapplicable', message: 'Not running as root.' };
  }
  const state = result.stdout.trim().split(/\s+/)[1];
  switch (state) {
    case 'P':
      return { status: 'Done', message: 'The root password is set.' };
    case 'NP':
      return { status: 'NotDone', message: 'No root password set.' };
    case 'L':
      return { status: 'NotDone', message: 'Root password is locked.' };
    default:
      return { status: 'NotDone', message: 'Could not determine the root password status.' };
  }
}

function setRootPassword(): LeafStep {
  return leaf('set-root-password', rootPasswordStatus, async (ctx) => {
    if (!(await ctx.prompter.askYesNo('Set the root password?', 'yes'))) {
      return 'Declined';
    }
    await ctx.prompter.askEditableCommand('passwd');
    return 'Completed';
  });
}

// ---------------------------------------------------------------------------
// Boot manager
// ---------------------------------------------------------------------------

const GRUB_NOT_INSTALLED: ProbeResult = {
  status: 'Inapplicable',
  message: 'The GRUB package is not installed.',
};

function installGrub(): LeafStep {
  return leaf(
    'install-grub',
    async (ctx) => {
      if (await ctx.system.isDirectory(GRUB_DIR)) {
        return { status: 'Done', message: `The directory '${GRUB_DIR}' exists.` };
      }
      if (await packageInstalled(ctx.system, 'grub')) {
        return { status: 'NotDone', message: `The directory '${GRUB_DIR}' does not exist.` };
      }
      return GRUB_NOT_INSTALLED;
    },
    async (ctx) => {
      const { prompter } = ctx;
      prompter.info('Install GRUB to the EFI system partition, or to a disk when booting in BIOS mode.');
      prompter.bullet('grub-install --target=x86_64-efi --efi-directory=/efi --bootloader-id=GRUB', {
        marker: '#',
      });
      prompter.bullet('grub-install --target=i386-pc /dev/sdX', { marker: '#' });
      prompter.blank();
      if (!(await prompter.askYesNo('Install GRUB for UEFI booting?', 'yes'))) {
        return 'Declined';
      }
      await prompter.askEditableCommand(
        'grub-install --target=x86_64-efi --efi-directory=/efi --bootloader-id=GRUB'
      );
      return 'Completed';
    }
  );
}

function runOsProber(): LeafStep {
  return leaf(
    'run-os-prober',
    async (ctx) =>
      (await packageInstalled(ctx.system, 'os-prober'))
        ? markedStatus(ctx)
        : { status: 'Inapplicable', message: 'The os-prober package is not installed.' },
    async (ctx) => {
      const { prompter } = ctx;
      prompter.info(
        `To let GRUB detect other operating systems, set 'GRUB_DISABLE_OS_PROBER=false' in '${GRUB_DEFAULTS_PATH}' and mount their partitions.`
      );
      prompter.blank();
      await askEdit(ctx, GRUB_DEFAULTS_PATH, 'yes');
      if (await prompter.askYesNo('Run os-prober now?', 'yes')) {
        await prompter.askEditableCommand('os-prober');
      }
      prompter.blank();
      await askMarkComplete(ctx);
      return 'Completed';
    }
  );
}

function grubMkconfig(): LeafStep {
  return leaf(
    'grub-mkconfig',
    async (ctx) => {
      if (await ctx.system.isFile(GRUB_CFG_PATH)) {
        return { status: 'Done', message: `The file '${GRUB_CFG_PATH}' exists.` };
      }
      if (await packageInstalled(ctx.system, 'grub')) {
        return { status: 'NotDone', message: `The file '${GRUB_CFG_PATH}' does not exist.` };
      }
      return GRUB_NOT_INSTALLED;
    },
    async (ctx) => {
      await askEdit(ctx, GRUB_DEFAULTS_PATH, 'no');
      if (!(await ctx.prompter.askYesNo('Generate the GRUB configuration file?', 'yes'))) {
        return 'Declined';
      }
      await ctx.prompter.askEditableCommand(
        proposeCommand('grub-mkconfig -o {path}', { path: GRUB_CFG_PATH })
      );
      return 'Completed';
    }
  );
}

function otherBootManager(settings: InstallSettings): LeafStep {
  return leaf(
    'other-boot-manager',
    async (ctx) =>
      (await packageInstalled(ctx.system, 'grub'))
        ? { status: 'Inapplicable', message: 'GRUB is installed.' }
        : { status: 'NeverRun', message: '' },
    async (ctx) => {
      const { prompter } = ctx;
      prompter.warn(
        'No supported boot manager is installed. Install and configure a boot manager manually, or the new system will not boot.'
      );
      prompter.blank();
      ctrlCReminder(ctx, settings);
      prompter.blank();
      await prompter.pause();
      return 'Completed';
    }
  );
}

/**
 * Builds the `configuration` composite.
 */
export function configurationSteps(settings: InstallSettings): CompositeStep {
  return composite('configuration', [
    composite('system-time', [setTimeZone(), generateAdjtime()]),
    composite('localization', [
      selectLocales(),
      generateLocales(),
      createLocaleConf(),
      setDefaultKeyboardLayout(),
    ]),
    composite('network-configuration', [setHostname(), generateHosts()]),
    recreateInitramfs(),
    setRootPassword(),
    composite('boot-manager', [installGrub(), runOsProber(), grubMkconfig(), otherBootManager(settings)]),
  ]);
}
