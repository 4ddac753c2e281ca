import { describe, it, expect } from 'vitest';
import {
  ABORT,
  ACCEPT,
  RecordingExecutor,
  RecordingWriter,
  ScriptedReader,
  type ScriptedAnswer,
} from '../../tests/helpers/fakes.js';
import { proposeCommand } from './action.js';
import { OperatorAbortError } from './errors.js';
import { Prompter, parseYesNo, succeeded } from './prompter.js';

function setup(answers: readonly ScriptedAnswer[] = [], columns?: number) {
  const reader = new ScriptedReader(answers);
  const writer = new RecordingWriter(columns);
  const executor = new RecordingExecutor();
  const prompter = new Prompter({ reader, writer, executor, colors: false, maxLineWidth: 80 });
  return { reader, writer, executor, prompter };
}

describe('parseYesNo', () => {
  it('accepts y, yes, n and no in any case', () => {
    expect(parseYesNo('Y')).toBe('yes');
    expect(parseYesNo(' yes ')).toBe('yes');
    expect(parseYesNo('N')).toBe('no');
    expect(parseYesNo('No')).toBe('no');
  });

  it('distinguishes empty from invalid input', () => {
    expect(parseYesNo('')).toBe('empty');
    expect(parseYesNo('maybe')).toBe('invalid');
  });
});

describe('Prompter', () => {
  describe('output', () => {
    it('wraps paragraphs to the terminal width', () => {
      const { prompter, writer } = setup([], 30);
      prompter.info('Please partition your disks using fdisk or a similar tool.');
      expect(writer.lines).toEqual(['Please partition your disks', 'using fdisk or a similar tool.']);
    });

    it('colors warnings and errors when colors are on', () => {
      const writer = new RecordingWriter();
      const prompter = new Prompter({
        reader: new ScriptedReader(),
        writer,
        executor: new RecordingExecutor(),
        colors: true,
      });
      prompter.warn('careful');
      prompter.error('broken');
      expect(writer.lines).toEqual(['\x1b[33mcareful\x1b[0m', '\x1b[31mbroken\x1b[0m']);
    });

    it('writes bullets with their marker', () => {
      const { prompter, writer } = setup();
      prompter.bullet('Root partition (required)');
      prompter.bullet('mkswap /dev/sdX3', { marker: '#' });
      expect(writer.lines).toEqual(['* Root partition (required)', '# mkswap /dev/sdX3']);
    });

    it('centers text across the line', () => {
      const { prompter, writer } = setup();
      prompter.centered('hi');
      expect(writer.lines[0]).toHaveLength(80);
      expect(writer.lines[0]?.trim()).toBe('hi');
    });
  });

  describe('askText', () => {
    it('pre-fills the default and trims the answer', async () => {
      const { prompter, reader } = setup(['  vim  ']);
      expect(await prompter.askText('Text editor:', 'nano')).toBe('vim');
      expect(reader.prompts).toEqual([{ prompt: 'Text editor: ', initial: 'nano' }]);
    });

    it('returns the default when accepted', async () => {
      const { prompter } = setup([ACCEPT]);
      expect(await prompter.askText('Text editor:', 'nano')).toBe('nano');
    });

    it('propagates operator aborts', async () => {
      const { prompter } = setup([ABORT]);
      await expect(prompter.askText('Hostname:')).rejects.toBeInstanceOf(OperatorAbortError);
    });
  });

  describe('askYesNo', () => {
    it('uses the default on empty input', async () => {
      const { prompter, reader } = setup(['', '']);
      expect(await prompter.askYesNo('Continue?', 'yes')).toBe(true);
      expect(await prompter.askYesNo('Continue?', 'no')).toBe(false);
      expect(reader.prompts.map((p) => p.prompt)).toEqual(['Continue? [Y/n] ', 'Continue? [y/N] ']);
    });

    it('asks again on invalid input', async () => {
      const { prompter, writer } = setup(['maybe', 'y']);
      expect(await prompter.askYesNo('Continue?', 'no')).toBe(true);
      expect(writer.lines).toEqual(['Invalid input. Please enter y[es] or n[o].']);
    });

    it('asks again on empty input without a default', async () => {
      const { prompter, writer } = setup(['', 'n']);
      expect(await prompter.askYesNo('Continue?')).toBe(false);
      expect(writer.lines).toEqual(['No default selection. Please enter y[es] or n[o].']);
    });
  });

  describe('askEditableCommand', () => {
    it('runs the proposed command when accepted', async () => {
      const { prompter, reader, executor } = setup([ACCEPT]);
      const outcome = await prompter.askEditableCommand(
        proposeCommand('loadkeys {layout}', { layout: 'de-latin1' })
      );

      expect(reader.prompts).toEqual([{ prompt: 'Press Enter to run: ', initial: 'loadkeys de-latin1' }]);
      expect(executor.commands).toEqual(['loadkeys de-latin1']);
      expect(outcome).toEqual({ kind: 'executed', command: 'loadkeys de-latin1', exitCode: 0 });
      expect(succeeded(outcome)).toBe(true);
    });

    it('runs the edited command', async () => {
      const { prompter, executor } = setup(['ping -c 1 archlinux.org']);
      await prompter.askEditableCommand('ping -c 4 archlinux.org');
      expect(executor.commands).toEqual(['ping -c 1 archlinux.org']);
    });

    it('skips execution when the line is cleared', async () => {
      const { prompter, executor } = setup(['   ']);
      const outcome = await prompter.askEditableCommand('reboot');
      expect(outcome).toEqual({ kind: 'skipped' });
      expect(succeeded(outcome)).toBe(false);
      expect(executor.commands).toEqual([]);
    });

    it('reports a non-zero exit in red without throwing', async () => {
      const { prompter, writer, executor } = setup([ACCEPT]);
      executor.respond('locale-gen', { exitCode: 2 });
      const outcome = await prompter.askEditableCommand('locale-gen');

      expect(outcome).toEqual({ kind: 'executed', command: 'locale-gen', exitCode: 2 });
      expect(succeeded(outcome)).toBe(false);
      expect(writer.lines).toEqual(['Command exited with status 2.']);
    });
  });

  describe('runCommand', () => {
    it('runs without offering the command for editing', async () => {
      const { prompter, reader, executor } = setup();
      await prompter.runCommand(proposeCommand('{editor} {file}', { editor: 'nano', file: '/etc/hosts' }));
      expect(reader.prompts).toEqual([]);
      expect(executor.commands).toEqual(['nano /etc/hosts']);
    });

    it('names the terminating signal', async () => {
      const { prompter, writer, executor } = setup();
      executor.respond('arch-chroot /mnt', { exitCode: 130, signal: 'SIGINT' });
      await prompter.runCommand('arch-chroot /mnt');
      expect(writer.lines).toEqual(['Command exited with status 130 (SIGINT).']);
    });
  });

  describe('pause', () => {
    it('waits for a key and then writes a blank line', async () => {
      const { prompter, reader, writer } = setup();
      await prompter.pause();
      expect(reader.keyPrompts).toEqual(['Press any key to continue...']);
      expect(writer.lines).toEqual(['']);
    });
  });
});
