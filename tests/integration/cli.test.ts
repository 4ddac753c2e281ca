/**
 * Integration tests for the command line: argument handling, exit codes and
 * whole stage walks over an in-memory machine.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runCli, type RunCliOptions } from '../../src/cli/main.js';
import { PersistentStore } from '../../src/store/index.js';
import {
  FakeSystemInspector,
  RecordingExecutor,
  RecordingWriter,
  ScriptedReader,
} from '../helpers/fakes.js';

interface CapturedOutput {
  readonly out: string[];
  readonly err: string[];
}

/**
 * A machine where every chroot stage step is already done or inapplicable.
 */
function configuredSystem(): FakeSystemInspector {
  return new FakeSystemInspector()
    .withFile('/etc/localtime', 'TZif')
    .withFile('/etc/adjtime', '0.0 0 0.0\n')
    .withFile('/etc/locale.gen', '# comment\nen_US.UTF-8 UTF-8\n')
    .withFile('/etc/locale.conf', 'LANG=en_US.UTF-8\n')
    .withFile('/etc/vconsole.conf', 'KEYMAP=us\n')
    .withFile('/etc/hostname', 'archbox\n')
    .withFile('/etc/hosts', '127.0.0.1\tlocalhost\n')
    .withFile('/boot/grub/grub.cfg', '# generated\n')
    .withDirectory('/boot/grub')
    .withOutput('passwd -S root', { exitCode: 0, stdout: 'root P 2024-01-01 0 99999 7 -1\n' })
    .withOutput('pacman -Q grub', { exitCode: 0, stdout: 'grub 2:2.12-1\n' });
}

describe('CLI Integration Tests', () => {
  let cwd: string;
  let output: CapturedOutput;
  let reader: ScriptedReader;
  let writer: RecordingWriter;
  let executor: RecordingExecutor;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'stepstone-cli-'));
    output = { out: [], err: [] };
    reader = new ScriptedReader();
    writer = new RecordingWriter();
    executor = new RecordingExecutor();
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  function cli(argv: readonly string[], system = new FakeSystemInspector()): ReturnType<typeof runCli> {
    const options: RunCliOptions = {
      cwd,
      env: { NO_COLOR: '1' },
      reader,
      writer,
      executor,
      system,
      output: {
        out: (text) => output.out.push(text),
        err: (text) => output.err.push(text),
      },
    };
    return runCli(argv, options);
  }

  describe('usage', () => {
    it('exits with 2 and prints usage when the stage is missing', async () => {
      const result = await cli([]);

      expect(result.exitCode).toBe(2);
      expect(output.err[0]).toBe('Error: Installation stage not provided.');
      expect(output.err[1]).toBe('');
      expect(output.err[2]?.split('\n').slice(0, 2)).toEqual(['USAGE:', '  stepstone <stage> [options]']);
      expect(output.out).toEqual([]);
    });

    it('exits with 2 for an unknown stage', async () => {
      const result = await cli(['install']);

      expect(result.exitCode).toBe(2);
      expect(output.err[0]).toBe("Error: Unrecognised installation stage 'install'.");
    });

    it('prints usage on --help', async () => {
      const result = await cli(['--help']);

      expect(result.exitCode).toBe(0);
      expect(output.out).toHaveLength(1);
      expect(output.out[0]?.split('\n')).toEqual([
        'USAGE:',
        '  stepstone <stage> [options]',
        '',
        'STAGES:',
        '  start   Begin the installation process.',
        '  chroot  Continue the installation process from within the chroot.',
        '',
        'OPTIONS:',
        '  --no-skip-completed  Run every step, including those already complete',
        '  -h, --help           Show this help message',
        '  --version            Show version information',
      ]);
    });

    it('prints the version and license', async () => {
      const result = await cli(['--version']);

      expect(result.exitCode).toBe(0);
      expect(output.out[0]).toMatch(/^stepstone \d+\.\d+\.\d+$/);
      expect(output.out[1]).toBe('');
      expect(output.out[2]).toContain('MIT license');
    });
  });

  describe('running a stage', () => {
    it('exits with 130 when input ends mid-step', async () => {
      const result = await cli(['start']);

      expect(result.exitCode).toBe(130);
      expect(output.err).toEqual(['Aborted.']);
      expect(reader.prompts).toEqual([{ prompt: 'Press Enter to run: ', initial: "echo 'Hello World!'" }]);
      expect(executor.commands).toEqual([]);
      expect(reader.closed).toBe(true);
    });

    it('skips every step that is already complete', async () => {
      const store = await PersistentStore.open(join(cwd, '.stepstone'));
      await store.setEnabled(true);
      await store.markComplete('generate-locales');
      await store.markComplete('recreate-initramfs');

      const result = await cli(['chroot'], configuredSystem());

      expect(result.exitCode).toBe(0);
      expect(output.err).toEqual([]);
      expect(reader.prompts).toEqual([]);
      expect(executor.commands).toEqual([]);
      expect(writer.lines).toContain(
        'Visited 15 steps (0 run, 15 skipped): 13 Done, 2 Inapplicable'
      );
    });

    it('runs completed steps again with --no-skip-completed', async () => {
      const store = await PersistentStore.open(join(cwd, '.stepstone'));
      await store.setEnabled(true);
      await store.markComplete('generate-locales');
      await store.markComplete('recreate-initramfs');

      const result = await cli(['chroot', '--no-skip-completed'], configuredSystem());

      expect(result.exitCode).toBe(130);
      expect(reader.prompts[0]?.prompt).toBe('Set the time zone? [Y/n] ');
    });
  });
});
