/**
 * Tests for application wiring.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  FakeSystemInspector,
  RecordingExecutor,
  RecordingWriter,
  ScriptedReader,
} from '../../tests/helpers/fakes.js';
import { createCliApp, type CliAppOptions } from './app.js';

describe('createCliApp', () => {
  let cwd: string;
  let writer: RecordingWriter;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'stepstone-app-'));
    writer = new RecordingWriter();
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  function options(env: Record<string, string> = {}): CliAppOptions {
    return {
      cwd,
      env,
      reader: new ScriptedReader(),
      writer,
      executor: new RecordingExecutor(),
      system: new FakeSystemInspector(),
    };
  }

  it('uses defaults when no config file exists', async () => {
    const app = await createCliApp(options());

    expect(app.configSource).toBeUndefined();
    expect(app.config.paths.mount_root).toBe('/mnt');
    expect(app.context.store.directory).toBe(join(cwd, '.stepstone'));
    expect(app.context.store.isEnabled()).toBe(false);
    expect(app.context.forceRun).toBe(false);
    expect(app.registry.stageNames()).toEqual(['start', 'chroot']);
    expect(writer.lines).toEqual([]);
  });

  it('reads stepstone.toml from the working directory', async () => {
    const configPath = join(cwd, 'stepstone.toml');
    await writeFile(configPath, '[paths]\npersist_dir = "progress"\nmount_root = "/target"\n');

    const app = await createCliApp(options());

    expect(app.configSource).toBe(configPath);
    expect(app.config.paths.mount_root).toBe('/target');
    expect(app.context.store.directory).toBe(join(cwd, 'progress'));
  });

  it('lets the environment override the file', async () => {
    await writeFile(join(cwd, 'stepstone.toml'), '[paths]\nmount_root = "/target"\n');

    const app = await createCliApp(options({ STEPSTONE_MOUNT_ROOT: '/other' }));

    expect(app.config.paths.mount_root).toBe('/other');
  });

  it('warns and falls back to defaults when the file does not parse', async () => {
    const configPath = join(cwd, 'stepstone.toml');
    await writeFile(configPath, 'invalid [ toml');

    const app = await createCliApp(options({ NO_COLOR: '1' }));

    expect(app.configSource).toBeUndefined();
    expect(app.config.paths.mount_root).toBe('/mnt');
    expect(writer.lines[0]?.startsWith('Failed to load config from')).toBe(true);
  });

  it('passes the force-run flag into the context', async () => {
    const app = await createCliApp({ ...options(), forceRun: true });
    expect(app.context.forceRun).toBe(true);
  });
});
