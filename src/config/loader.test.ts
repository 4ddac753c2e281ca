import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from './index.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'stepstone-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return defaults when no config file exists', async () => {
    const loaded = await loadConfig({ cwd: dir, env: {} });

    expect(loaded.config).toEqual(DEFAULT_CONFIG);
    expect(loaded.source).toBeUndefined();
    expect(loaded.warnings).toEqual([]);
  });

  it('should read stepstone.toml from the working directory', async () => {
    await writeFile(join(dir, 'stepstone.toml'), '[paths]\nmount_root = "/target"\n');
    const loaded = await loadConfig({ cwd: dir, env: {} });

    expect(loaded.config.paths.mount_root).toBe('/target');
    expect(loaded.source).toBe(join(dir, 'stepstone.toml'));
  });

  it('should read the file named by STEPSTONE_CONFIG', async () => {
    await writeFile(join(dir, 'custom.toml'), '[shell]\nprogram = "zsh"\n');
    const loaded = await loadConfig({ cwd: dir, env: { STEPSTONE_CONFIG: 'custom.toml' } });

    expect(loaded.config.shell.program).toBe('zsh');
  });

  it('should let env override the file', async () => {
    await writeFile(join(dir, 'stepstone.toml'), '[paths]\nmount_root = "/target"\n');
    const loaded = await loadConfig({ cwd: dir, env: { STEPSTONE_MOUNT_ROOT: '/other' } });

    expect(loaded.config.paths.mount_root).toBe('/other');
  });

  it('should warn and use defaults for an unparsable file', async () => {
    await writeFile(join(dir, 'stepstone.toml'), '[paths\n');
    const loaded = await loadConfig({ cwd: dir, env: { STEPSTONE_SHELL: 'zsh' } });

    expect(loaded.source).toBeUndefined();
    expect(loaded.config.shell.program).toBe('zsh');
    expect(loaded.warnings).toHaveLength(1);
    expect(loaded.warnings[0]).toMatch(/^Failed to load config from .*stepstone\.toml: Invalid TOML syntax/);
  });

  it('should warn about env values that do not coerce', async () => {
    const loaded = await loadConfig({ cwd: dir, env: { STEPSTONE_DEBUG: 'maybe' } });

    expect(loaded.config.logging.debug).toBe(false);
    expect(loaded.warnings).toHaveLength(1);
    expect(loaded.warnings[0]).toMatch(/^Ignoring STEPSTONE_DEBUG: /);
  });

  it('should fall back to defaults when validation fails', async () => {
    await writeFile(join(dir, 'stepstone.toml'), '[display]\nmax_line_width = 5\n');
    const loaded = await loadConfig({ cwd: dir, env: {} });

    expect(loaded.config).toEqual(DEFAULT_CONFIG);
    expect(loaded.warnings).toEqual([
      "Invalid configuration: 'display.max_line_width' must be an integer between 20 and 400, got 5",
    ]);
  });
});
