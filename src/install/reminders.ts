/**
 * Recurring hints shown by several steps.
 *
 * @packageDocumentation
 */

import { join } from 'node:path';
import type { StepContext } from '../steps/index.js';
import type { InstallSettings } from './settings.js';

/** Entry point below the package root. */
export const CLI_ENTRY = 'dist/cli/index.js';

/**
 * Command that starts the chroot stage from the copy of stepstone in the
 * new system, which lives at the same path as outside it.
 */
export function chrootStageCommand(settings: InstallSettings): string {
  return `node ${join(settings.programDir, CLI_ENTRY)} chroot`;
}

/**
 * Reminds the operator how to reach another TTY.
 */
export function ttyReminder(ctx: StepContext): void {
  ctx.prompter.bullet(
    'To leave stepstone and perform this action manually, you may wish to switch to another TTY using Alt+(arrow key).'
  );
}

/**
 * Shows the commands that start the chroot stage inside the new system.
 */
export function showChrootStageCommand(ctx: StepContext, settings: InstallSettings): void {
  ctx.prompter.bullet(`cd ${settings.workDir}`, { marker: '#' });
  ctx.prompter.bullet(chrootStageCommand(settings), { marker: '#' });
}

/**
 * Reminds the operator that Ctrl+C leads back to the chroot shell.
 */
export function ctrlCReminder(ctx: StepContext, settings: InstallSettings): void {
  ctx.prompter.bullet(
    'To exit stepstone and perform this action manually, you may use Ctrl+C to access the chroot shell. Once you are finished, the following commands will start stepstone again:'
  );
  showChrootStageCommand(ctx, settings);
}
