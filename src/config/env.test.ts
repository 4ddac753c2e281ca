import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
  readEnvOverrides,
} from './env.js';
import { DEFAULT_CONFIG, getDefaultConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should read path env vars', () => {
      const result = readEnvOverrides({
        STEPSTONE_PERSIST_DIR: '/root/progress',
        STEPSTONE_MIRRORLIST: '/tmp/mirrorlist',
        STEPSTONE_MOUNT_ROOT: '/target',
      });

      expect(result.overrides.paths).toEqual({
        persist_dir: '/root/progress',
        mirrorlist: '/tmp/mirrorlist',
        mount_root: '/target',
      });
      expect(result.appliedVars).toEqual([
        'STEPSTONE_PERSIST_DIR',
        'STEPSTONE_MIRRORLIST',
        'STEPSTONE_MOUNT_ROOT',
      ]);
    });

    it('should coerce booleans and numbers', () => {
      const result = readEnvOverrides({
        STEPSTONE_COLORS: 'off',
        STEPSTONE_MAX_LINE_WIDTH: ' 120 ',
        STEPSTONE_DEBUG: 'YES',
      });

      expect(result.overrides.display).toEqual({ colors: false, max_line_width: 120 });
      expect(result.overrides.logging).toEqual({ debug: true });
    });

    it('should read the shell program', () => {
      expect(readEnvOverrides({ STEPSTONE_SHELL: 'zsh' }).overrides.shell).toEqual({
        program: 'zsh',
      });
    });

    it('should ignore unset and empty variables', () => {
      const result = readEnvOverrides({ STEPSTONE_SHELL: '', STEPSTONE_DEBUG: undefined });
      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('should ignore unrelated variables', () => {
      expect(readEnvOverrides({ HOME: '/root', PATH: '/usr/bin' }).overrides).toEqual({});
    });

    it('should let NO_COLOR disable colors over STEPSTONE_COLORS', () => {
      const result = readEnvOverrides({ STEPSTONE_COLORS: 'true', NO_COLOR: '1' });
      expect(result.overrides.display?.colors).toBe(false);
      expect(result.appliedVars).toContain('NO_COLOR');
    });

    it('should ignore an empty NO_COLOR', () => {
      expect(readEnvOverrides({ NO_COLOR: '' }).overrides.display).toBeUndefined();
    });

    it('should throw EnvCoercionError for an invalid boolean', () => {
      expect(() => readEnvOverrides({ STEPSTONE_DEBUG: 'maybe' })).toThrow(EnvCoercionError);
    });

    it('should throw EnvCoercionError for an invalid number', () => {
      try {
        readEnvOverrides({ STEPSTONE_MAX_LINE_WIDTH: 'wide' });
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(EnvCoercionError);
        const coercion = error as EnvCoercionError;
        expect(coercion.envVar).toBe('STEPSTONE_MAX_LINE_WIDTH');
        expect(coercion.rawValue).toBe('wide');
        expect(coercion.expectedType).toBe('number');
      }
    });

    it('should collect errors when asked and keep valid overrides', () => {
      const result = readEnvOverrides(
        { STEPSTONE_DEBUG: 'maybe', STEPSTONE_MOUNT_ROOT: '/target' },
        { collectErrors: true }
      );

      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.envVar).toBe('STEPSTONE_DEBUG');
      expect(result.overrides.paths?.mount_root).toBe('/target');
      expect(result.appliedVars).toEqual(['STEPSTONE_MOUNT_ROOT']);
    });
  });

  describe('applyEnvOverrides', () => {
    it('should override config values and keep the rest', () => {
      const config = applyEnvOverrides(getDefaultConfig(), { STEPSTONE_MOUNT_ROOT: '/target' });

      expect(config.paths.mount_root).toBe('/target');
      expect(config.paths.persist_dir).toBe(DEFAULT_CONFIG.paths.persist_dir);
      expect(config.display).toEqual(DEFAULT_CONFIG.display);
    });

    it('should not mutate the base config', () => {
      const base = getDefaultConfig();
      applyEnvOverrides(base, { STEPSTONE_SHELL: 'zsh' });
      expect(base.shell.program).toBe('bash');
    });
  });

  describe('mergeConfig', () => {
    it('should return an equal config for empty overrides', () => {
      expect(mergeConfig(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every supported variable', () => {
      const docs = getEnvVarDocumentation();
      expect(Object.keys(docs).sort()).toEqual([
        'NO_COLOR',
        'STEPSTONE_COLORS',
        'STEPSTONE_CONFIG',
        'STEPSTONE_DEBUG',
        'STEPSTONE_MAX_LINE_WIDTH',
        'STEPSTONE_MIRRORLIST',
        'STEPSTONE_MOUNT_ROOT',
        'STEPSTONE_PERSIST_DIR',
        'STEPSTONE_SHELL',
      ]);
      expect(docs.STEPSTONE_MAX_LINE_WIDTH?.type).toBe('number');
    });
  });

  describe('property-based tests', () => {
    it('should pass any non-empty string through to string settings', () => {
      fc.assert(
        fc.property(fc.string({ minLength: 1 }), (value) => {
          const result = readEnvOverrides({ STEPSTONE_SHELL: value });
          expect(result.overrides.shell?.program).toBe(value);
        })
      );
    });

    it('should coerce any integer line width', () => {
      fc.assert(
        fc.property(fc.integer({ min: -10000, max: 10000 }), (width) => {
          const result = readEnvOverrides({ STEPSTONE_MAX_LINE_WIDTH: String(width) });
          expect(result.overrides.display?.max_line_width).toBe(width);
        })
      );
    });
  });
});
