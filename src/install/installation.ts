/**
 * Installation steps: package selection, pacstrap, fstab and chroot entry.
 *
 * @packageDocumentation
 */

import { dirname, join } from 'node:path';
import { proposeCommand, succeeded, type ProposedAction } from '../prompt/index.js';
import {
  askMarkComplete,
  composite,
  leaf,
  markedStatus,
  type CompositeStep,
  type LeafStep,
  type StepContext,
} from '../steps/index.js';
import type { PackageCategory } from './catalog.js';
import { askEdit } from './editor.js';
import { guessCpuVendor } from './guess.js';
import { PACKAGE_NAMES_FILE, askPackages, splitPackageList, uniquePackages } from './packages.js';
import { contentProbe, directoryProbe } from './probes.js';
import { showChrootStageCommand } from './reminders.js';
import type { InstallSettings } from './settings.js';

function selectMirrors(settings: InstallSettings): LeafStep {
  return leaf('select-mirrors', markedStatus, async (ctx) => {
    ctx.prompter.info(
      `Packages will be downloaded from the mirror servers listed in '${settings.mirrorlist}'. Mirrors higher in the list are preferred.`
    );
    ctx.prompter.blank();
    await askEdit(ctx, settings.mirrorlist, 'no');
    ctx.prompter.blank();
    await askMarkComplete(ctx);
    return 'Completed';
  });
}

/**
 * Writes the output of `pacman -Ssq` to the package-names file.
 *
 * @returns Whether a non-empty list was written.
 */
async function writePackageNames(ctx: StepContext): Promise<boolean> {
  const result = await ctx.system.capture('pacman', ['-Ssq']);
  if (result.exitCode !== 0 || splitPackageList(result.stdout).length === 0) {
    ctx.logger.debug('package_list_empty', { exitCode: result.exitCode });
    return false;
  }
  return ctx.store.writeFile(PACKAGE_NAMES_FILE, result.stdout);
}

function generatePackageNames(): LeafStep {
  return leaf(
    'generate-package-names',
    async (ctx) => {
      if (!ctx.store.isEnabled()) {
        return { status: 'UnknownPersistenceDisabled', message: 'Persistence disabled.' };
      }
      return (await ctx.store.readFile(PACKAGE_NAMES_FILE)) !== undefined
        ? { status: 'Done', message: 'The list of package names exists.' }
        : { status: 'NotDone', message: 'The list of package names does not exist yet.' };
    },
    async (ctx) => {
      const { prompter } = ctx;
      prompter.info('A list of available package names is used to check package names entered later.');
      prompter.blank();
      if (!(await prompter.askYesNo('Generate the list of package names?', 'yes'))) {
        return 'Declined';
      }
      if (await writePackageNames(ctx)) {
        return 'Completed';
      }

      prompter.warn('Could not retrieve any package names. The package databases may need refreshing.');
      if (await prompter.askYesNo('Refresh package databases?', 'yes')) {
        const outcome = await prompter.askEditableCommand('pacman -Sy');
        if (succeeded(outcome) && (await writePackageNames(ctx))) {
          return 'Completed';
        }
      }
      prompter.error('Failed to generate the list of package names.');
      return 'Completed';
    }
  );
}

/**
 * Pre-filled answer for one category.
 */
async function categoryDefaults(ctx: StepContext, category: PackageCategory): Promise<string[]> {
  const defaults = [...category.defaults];
  if (category.guessMicrocode === true) {
    const vendor = await guessCpuVendor(ctx);
    if (vendor !== undefined) {
      defaults.push(`${vendor}-ucode`);
    }
  }
  if (category.defaultConfigKey !== undefined) {
    const value = await ctx.store.configGet(category.defaultConfigKey);
    if (value !== undefined) {
      defaults.push(...splitPackageList(value));
    }
  }
  return uniquePackages(defaults);
}

/**
 * Builds `pacstrap {root} {pkg0} {pkg1} ...` so every name is substituted
 * and quoted on its own.
 */
export function pacstrapAction(root: string, packages: readonly string[]): ProposedAction {
  const args: Record<string, string> = { root };
  const placeholders = packages.map((name, index) => {
    args[`pkg${String(index)}`] = name;
    return `{pkg${String(index)}}`;
  });
  return proposeCommand(['pacstrap', '{root}', ...placeholders].join(' '), args);
}

function pacstrap(settings: InstallSettings): LeafStep {
  const cacheDir = join(settings.mountRoot, 'var/cache/pacman');

  return leaf(
    'pacstrap',
    directoryProbe(
      cacheDir,
      `The directory '${cacheDir}' exists, so packages have been installed.`,
      `The directory '${cacheDir}' does not exist, so no packages have been installed yet.`
    ),
    async (ctx) => {
      const { prompter } = ctx;
      const packages: string[] = [...settings.catalog.base];

      for (const category of settings.catalog.categories) {
        prompter.blank();
        prompter.info(category.intro);
        for (const suggestion of category.suggestions) {
          prompter.bullet(
            suggestion.note !== undefined ? `${suggestion.name} (${suggestion.note})` : suggestion.name
          );
        }
        const defaults = await categoryDefaults(ctx, category);
        packages.push(...(await askPackages(ctx, defaults)));
      }

      const selected = uniquePackages(packages);
      if (ctx.logger.isDebugEnabled) {
        ctx.logger.debug('packages_selected', { count: selected.length, packages: selected.join(' ') });
      }
      prompter.blank();
      await prompter.askEditableCommand(pacstrapAction(settings.mountRoot, selected));
      return 'Completed';
    }
  );
}

function generateFstab(settings: InstallSettings): LeafStep {
  const fstab = join(settings.mountRoot, 'etc/fstab');

  return leaf(
    'generate-fstab',
    contentProbe(fstab, `The file '${fstab}' has content.`, `The file '${fstab}' has no entries yet.`),
    async (ctx) => {
      if (!(await ctx.prompter.askYesNo(`Generate '${fstab}'?`, 'yes'))) {
        return 'Declined';
      }
      await ctx.prompter.askEditableCommand(
        proposeCommand('genfstab -U {root} >> {fstab}', { root: settings.mountRoot, fstab })
      );
      ctx.prompter.blank();
      await askEdit(ctx, fstab, 'no');
      return 'Completed';
    }
  );
}

/**
 * Proposes copying `source` to the same path below the mount root. The copy
 * goes into the parent directory, so running it again overwrites instead of
 * nesting.
 */
async function copyIntoNewSystem(ctx: StepContext, settings: InstallSettings, source: string): Promise<void> {
  const parent = join(settings.mountRoot, dirname(source));
  await ctx.prompter.askEditableCommand(proposeCommand('mkdir -p {parent}', { parent }));
  await ctx.prompter.askEditableCommand(proposeCommand('cp -rv {source} {parent}', { source, parent }));
}

function chroot(settings: InstallSettings): LeafStep {
  return leaf('chroot', markedStatus, async (ctx) => {
    const { prompter, store } = ctx;
    if (!(await prompter.askYesNo('Change root into the new system?', 'yes'))) {
      return 'Declined';
    }

    prompter.info(
      'To continue using stepstone in the new system, stepstone and its persistence directory (if any) must be copied into it.'
    );
    await copyIntoNewSystem(ctx, settings, settings.programDir);
    if (store.isEnabled()) {
      await copyIntoNewSystem(ctx, settings, store.directory);
    }

    prompter.blank();
    prompter.info(
      'Please change root into the new system. You may start stepstone in the chroot by entering the following commands into the chroot shell:'
    );
    showChrootStageCommand(ctx, settings);
    prompter.info(
      'Once stepstone is running in the chroot, you may regain access to the chroot shell using Ctrl+C. To continue with stepstone, simply enter the above commands again.'
    );
    await prompter.askEditableCommand(proposeCommand('arch-chroot {root}', { root: settings.mountRoot }));

    prompter.blank();
    prompter.info('Exited chroot.');
    prompter.warn('If the terminal is unresponsive, a process in the chroot may still be suspended on this TTY.');
    prompter.blank();
    await askMarkComplete(ctx);
    return 'Completed';
  });
}

/**
 * Builds the `installation` composite.
 */
export function installationSteps(settings: InstallSettings): CompositeStep {
  return composite('installation', [
    composite('packages', [selectMirrors(settings), generatePackageNames(), pacstrap(settings)]),
    generateFstab(settings),
    chroot(settings),
  ]);
}
