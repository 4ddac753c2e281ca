/**
 * Arch Linux installation content.
 *
 * @packageDocumentation
 */

export { CHROOT_NOTICE, INSTALL_STAGES, buildInstallRegistry, buildInstallStages } from './stages.js';
export type { InstallSettings } from './settings.js';
export {
  DEFAULT_CATALOG_PATH,
  PackageCatalogError,
  loadPackageCatalog,
  parsePackageCatalog,
} from './catalog.js';
export type { PackageCatalog, PackageCategory, PackageSuggestion } from './catalog.js';
export { EDITOR_CHOICES, EDITOR_CONFIG_KEY, askEdit, getEditor } from './editor.js';
export { KEYBOARD_LAYOUT_CONFIG_KEY, askKeyboardLayout, listKeymaps } from './keyboard.js';
export {
  PACKAGE_NAMES_FILE,
  askPackages,
  findMissingPackage,
  readPackageNames,
  splitPackageList,
  uniquePackages,
} from './packages.js';
export { guessCpuVendor, guessLocale } from './guess.js';
export type { CpuVendor } from './guess.js';
export { pacstrapAction } from './installation.js';
export { rootPasswordStatus } from './configuration.js';
