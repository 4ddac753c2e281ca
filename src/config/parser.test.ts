import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { ConfigParseError, DEFAULT_CONFIG, getDefaultConfig, parseConfig } from './index.js';

describe('Config Parser', () => {
  describe('parseConfig', () => {
    describe('valid TOML parsing', () => {
      it('should parse empty TOML to default config', () => {
        expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
      });

      it('should parse complete valid configuration', () => {
        const toml = `
[paths]
persist_dir = "/root/progress"
mirrorlist = "/tmp/mirrorlist"
mount_root = "/target"

[display]
colors = false
max_line_width = 100

[shell]
program = "zsh"

[logging]
debug = true
`;
        const config = parseConfig(toml);

        expect(config.paths).toEqual({
          persist_dir: '/root/progress',
          mirrorlist: '/tmp/mirrorlist',
          mount_root: '/target',
        });
        expect(config.display).toEqual({ colors: false, max_line_width: 100 });
        expect(config.shell.program).toBe('zsh');
        expect(config.logging.debug).toBe(true);
      });

      it('should merge partial sections with defaults', () => {
        const config = parseConfig(`
[paths]
mount_root = "/target"
`);

        expect(config.paths.mount_root).toBe('/target');
        expect(config.paths.persist_dir).toBe('.stepstone');
        expect(config.paths.mirrorlist).toBe('/etc/pacman.d/mirrorlist');
        expect(config.display).toEqual(DEFAULT_CONFIG.display);
      });

      it('should ignore unknown sections and keys', () => {
        const config = parseConfig(`
[unknown]
key = "value"

[display]
unknown_key = 3
`);
        expect(config).toEqual(DEFAULT_CONFIG);
      });
    });

    describe('invalid TOML', () => {
      it('should throw ConfigParseError for invalid syntax', () => {
        expect(() => parseConfig('[paths\nmount_root = ')).toThrow(ConfigParseError);
        expect(() => parseConfig('[paths\nmount_root = ')).toThrow(/^Invalid TOML syntax/);
      });

      it('should keep the underlying error as cause', () => {
        try {
          parseConfig('= broken');
          expect.fail('should have thrown');
        } catch (error) {
          expect(error).toBeInstanceOf(ConfigParseError);
          expect((error as ConfigParseError).cause).toBeInstanceOf(Error);
        }
      });
    });

    describe('type validation', () => {
      it('should reject a non-string path', () => {
        expect(() => parseConfig('[paths]\nmount_root = 5')).toThrow(
          "Invalid type for 'paths.mount_root': expected string, got number"
        );
      });

      it('should reject a non-boolean colors flag', () => {
        expect(() => parseConfig('[display]\ncolors = "yes"')).toThrow(
          "Invalid type for 'display.colors': expected boolean, got string"
        );
      });

      it('should reject a non-integer line width', () => {
        expect(() => parseConfig('[display]\nmax_line_width = 80.5')).toThrow(
          "Invalid value for 'display.max_line_width': must be an integer, got 80.5"
        );
      });

      it('should reject a section that is not a table', () => {
        expect(() => parseConfig('shell = "bash"')).toThrow(
          "Invalid type for 'shell': expected table, got string"
        );
      });

      it('should reject a non-boolean debug flag', () => {
        expect(() => parseConfig('[logging]\ndebug = 1')).toThrow(ConfigParseError);
      });
    });

    describe('property-based tests', () => {
      it('should round-trip any simple shell program name', () => {
        fc.assert(
          fc.property(fc.stringMatching(/^[a-z][a-z0-9_-]{0,15}$/), (program) => {
            const config = parseConfig(`[shell]\nprogram = "${program}"`);
            expect(config.shell.program).toBe(program);
          })
        );
      });

      it('should accept any integer line width and leave range checks to the validator', () => {
        fc.assert(
          fc.property(fc.integer({ min: -1000, max: 1000 }), (width) => {
            const config = parseConfig(`[display]\nmax_line_width = ${String(width)}`);
            expect(config.display.max_line_width).toBe(width);
          })
        );
      });
    });
  });

  describe('getDefaultConfig', () => {
    it('should return a copy equal to the defaults', () => {
      const config = getDefaultConfig();
      expect(config).toEqual(DEFAULT_CONFIG);
      config.paths.mount_root = '/elsewhere';
      expect(DEFAULT_CONFIG.paths.mount_root).toBe('/mnt');
    });
  });
});
