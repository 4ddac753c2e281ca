import { describe, it, expect, afterEach } from 'vitest';
import { ACCEPT, FakeSystemInspector, makeContext, type TestHarness } from '../../tests/helpers/fakes.js';
import { EDITOR_CONFIG_KEY, askEdit, getEditor } from './editor.js';
import { guessCpuVendor, guessLocale } from './guess.js';
import { askKeyboardLayout, listKeymaps } from './keyboard.js';
import {
  PACKAGE_NAMES_FILE,
  askPackages,
  findMissingPackage,
  readPackageNames,
  splitPackageList,
  uniquePackages,
} from './packages.js';

describe('installation helpers', () => {
  let harness: TestHarness | undefined;

  afterEach(async () => {
    await harness?.cleanup();
    harness = undefined;
  });

  describe('getEditor', () => {
    it('asks until the answer is a known editor, then stores it', async () => {
      harness = await makeContext({ answers: ['emacs', 'vim'] });
      const ctx = harness.stepContext('select-mirrors');

      expect(await getEditor(ctx)).toBe('vim');
      expect(harness.reader.prompts).toEqual([
        { prompt: 'Text editor: ', initial: 'nano' },
        { prompt: 'Text editor: ', initial: 'nano' },
      ]);
      expect(harness.writer.lines).toContain('Input does not match the available options.');
      expect(await harness.store.configGet(EDITOR_CONFIG_KEY)).toBe('vim');
    });

    it('returns the stored editor without prompting once set', async () => {
      harness = await makeContext({ answers: [ACCEPT] });
      const ctx = harness.stepContext('select-mirrors');

      expect(await getEditor(ctx)).toBe('nano');
      expect(await getEditor(ctx)).toBe('nano');
      expect(await getEditor(ctx)).toBe('nano');
      expect(harness.reader.prompts).toHaveLength(1);
      expect(await harness.store.configGet(EDITOR_CONFIG_KEY)).toBe('nano');
    });

    it('prompts every time when persistence is disabled', async () => {
      harness = await makeContext({ persistence: false, answers: ['vi', 'nano'] });
      const ctx = harness.stepContext('select-mirrors');

      expect(await getEditor(ctx)).toBe('vi');
      expect(await getEditor(ctx)).toBe('nano');
      expect(harness.reader.prompts).toHaveLength(2);
    });
  });

  describe('askEdit', () => {
    it('opens the file in the stored editor on yes', async () => {
      harness = await makeContext({ answers: ['y'] });
      await harness.store.configSet(EDITOR_CONFIG_KEY, 'vi');

      expect(await askEdit(harness.stepContext('generate-fstab'), '/mnt/etc/fstab', 'no')).toBe(true);
      expect(harness.reader.prompts[0]?.prompt).toBe("Edit '/mnt/etc/fstab'? [y/N] ");
      expect(harness.executor.commands).toEqual(['vi /mnt/etc/fstab']);
    });

    it('runs nothing on no', async () => {
      harness = await makeContext({ answers: [''] });
      expect(await askEdit(harness.stepContext('generate-fstab'), '/mnt/etc/fstab', 'no')).toBe(false);
      expect(harness.executor.commands).toEqual([]);
    });
  });

  describe('keyboard layouts', () => {
    it('lists layouts on an empty answer and rejects unknown ones', async () => {
      const system = new FakeSystemInspector().withOutput('localectl list-keymaps', {
        exitCode: 0,
        stdout: 'de\nus\n',
      });
      harness = await makeContext({ system, answers: ['', 'fr', 'de'] });

      expect(await askKeyboardLayout(harness.stepContext('set-keyboard-layout'))).toBe('de');
      expect(harness.writer.lines).toContain('de us');
      expect(harness.writer.lines).toContain("'fr' is not a valid layout name.");
      expect(harness.reader.prompts).toHaveLength(3);
    });

    it('accepts any non-empty name when localectl is unavailable', async () => {
      harness = await makeContext({ answers: ['', 'custom'] });
      const ctx = harness.stepContext('set-keyboard-layout');

      expect(await listKeymaps(ctx)).toEqual([]);
      expect(await askKeyboardLayout(ctx)).toBe('custom');
      expect(harness.writer.lines).toContain(
        "Could not list keyboard layouts with 'localectl'. The name will not be checked."
      );
    });
  });

  describe('packages', () => {
    it('splits and deduplicates package lists', () => {
      expect(splitPackageList('  base  linux\tvim ')).toEqual(['base', 'linux', 'vim']);
      expect(uniquePackages(['base', 'linux', 'base'])).toEqual(['base', 'linux']);
    });

    it('finds the first unknown package', () => {
      const known = new Set(['base', 'linux']);
      expect(findMissingPackage(['base', 'nope', 'other'], known)).toBe('nope');
      expect(findMissingPackage(['base'], known)).toBeUndefined();
      expect(findMissingPackage(['anything'], undefined)).toBeUndefined();
    });

    it('validates answers against the package name list', async () => {
      harness = await makeContext({ answers: ['linux nope', 'linux vim'] });
      await harness.store.writeFile(PACKAGE_NAMES_FILE, 'base\nlinux\nvim\n');
      const ctx = harness.stepContext('pacstrap');

      expect(await askPackages(ctx, ['linux'])).toEqual(['linux', 'vim']);
      expect(harness.writer.lines).toEqual(["The package 'nope' does not exist."]);
      expect(harness.reader.prompts).toEqual([
        { prompt: 'Enter package name(s): ', initial: 'linux' },
        { prompt: 'Enter package name(s): ', initial: 'linux nope' },
      ]);
    });

    it('accepts any names without a package name list', async () => {
      harness = await makeContext({ answers: ['whatever'] });
      const ctx = harness.stepContext('pacstrap');
      expect(await readPackageNames(ctx)).toBeUndefined();
      expect(await askPackages(ctx)).toEqual(['whatever']);
    });
  });

  describe('guesses', () => {
    it('detects the CPU vendor from /proc/cpuinfo', async () => {
      const system = new FakeSystemInspector().withFile(
        '/proc/cpuinfo',
        'processor\t: 0\nvendor_id\t: GenuineIntel\n'
      );
      harness = await makeContext({ system });

      expect(await guessCpuVendor(harness.stepContext('pacstrap'))).toBe('intel');
      expect(harness.writer.lines).toEqual(['Detected Intel CPU.']);
    });

    it('warns when the vendor is unknown', async () => {
      harness = await makeContext();
      expect(await guessCpuVendor(harness.stepContext('pacstrap'))).toBeUndefined();
      expect(harness.writer.lines).toEqual(['Failed to guess CPU manufacturer.']);
    });

    it('takes the first uncommented locale', async () => {
      const system = new FakeSystemInspector().withFile(
        '/etc/locale.gen',
        '# en_US.UTF-8 UTF-8\n\nde_DE.UTF-8 UTF-8\nfr_FR.UTF-8 UTF-8\n'
      );
      harness = await makeContext({ system });

      expect(await guessLocale(harness.stepContext('create-locale-conf'))).toBe('de_DE.UTF-8');
      expect(harness.writer.lines).toEqual(["Guessed locale from '/etc/locale.gen': 'de_DE.UTF-8'."]);
    });

    it('warns when no locale is selected', async () => {
      const system = new FakeSystemInspector().withFile('/etc/locale.gen', '# en_US.UTF-8 UTF-8\n');
      harness = await makeContext({ system });

      expect(await guessLocale(harness.stepContext('create-locale-conf'))).toBeUndefined();
      expect(harness.writer.lines).toEqual(["Failed to guess locale from '/etc/locale.gen'."]);
    });
  });
});
