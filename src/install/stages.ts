/**
 * The installation tree.
 *
 * @packageDocumentation
 */

import { StepRegistry, type Stage } from '../steps/index.js';
import { configurationSteps } from './configuration.js';
import { cleanupStep, rebootStep } from './finish.js';
import { installationSteps } from './installation.js';
import { preinstallationSteps } from './preinstallation.js';
import type { InstallSettings } from './settings.js';
import { setupSteps } from './setup.js';

/**
 * Name and description of each stage, in command-line order. Available
 * without building the tree, so arguments can be checked first.
 */
export const INSTALL_STAGES = [
  { name: 'start', description: 'Begin the installation process.' },
  { name: 'chroot', description: 'Continue the installation process from within the chroot.' },
] as const satisfies readonly { readonly name: string; readonly description: string }[];

export const CHROOT_NOTICE =
  "You are now in a chroot shell. To exit the chroot shell and go back to stepstone outside the chroot, use the 'exit' command or press Ctrl+D.";

/**
 * Builds the `start` and `chroot` stages. Both end with the same `cleanup`
 * step object.
 */
export function buildInstallStages(settings: InstallSettings): Stage[] {
  const [start, chroot] = INSTALL_STAGES;
  const cleanup = cleanupStep();
  return [
    {
      ...start,
      steps: [
        setupSteps(),
        preinstallationSteps(settings),
        installationSteps(settings),
        cleanup,
        rebootStep(),
      ],
    },
    {
      ...chroot,
      steps: [configurationSteps(settings), cleanup],
      notice: CHROOT_NOTICE,
    },
  ];
}

/**
 * Builds and validates the registry of installation stages.
 *
 * @throws {StepRegistryError} If the tree is invalid.
 */
export function buildInstallRegistry(settings: InstallSettings): StepRegistry {
  return new StepRegistry(buildInstallStages(settings));
}
