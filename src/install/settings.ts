/**
 * Settings shared by the installation steps.
 *
 * @packageDocumentation
 */

import type { PackageCatalog } from './catalog.js';

export interface InstallSettings {
  /** Mount point of the new system in the live environment. */
  readonly mountRoot: string;
  /** Pacman mirror list path. */
  readonly mirrorlist: string;
  /** Directory stepstone is started from; shown when re-entering the chroot. */
  readonly workDir: string;
  /** Package root of stepstone itself; copied into the new system. */
  readonly programDir: string;
  /** Package suggestions for pacstrap. */
  readonly catalog: PackageCatalog;
}
