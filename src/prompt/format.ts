/**
 * Text formatting for operator output: colors, word wrapping, bullets and
 * centered banners.
 *
 * @packageDocumentation
 */

import type { TextColor } from './types.js';

/**
 * ANSI escape sequences for terminal output.
 */
export const CLI_STYLES = {
  /** Bold text marker. */
  BOLD: '\x1b[1m',
  /** Reset formatting. */
  RESET: '\x1b[0m',
  /** Dim/gray text. */
  DIM: '\x1b[2m',
  /** Green text for success. */
  GREEN: '\x1b[32m',
  /** Yellow text for warnings and questions. */
  YELLOW: '\x1b[33m',
  /** Red text for errors. */
  RED: '\x1b[31m',
} as const;

const COLOR_CODES: Readonly<Record<TextColor, string>> = {
  red: CLI_STYLES.RED,
  green: CLI_STYLES.GREEN,
  yellow: CLI_STYLES.YELLOW,
  dim: CLI_STYLES.DIM,
  bold: CLI_STYLES.BOLD,
};

/** Narrowest line width the wrapper will use. */
export const MIN_LINE_WIDTH = 20;

/**
 * Applies colors to text, or passes it through when colors are off.
 */
export interface TextStyler {
  readonly colors: boolean;
  paint(text: string, color: TextColor): string;
}

/**
 * Creates a styler.
 *
 * @param colors - Whether ANSI colors are emitted.
 */
export function createStyler(colors: boolean): TextStyler {
  return {
    colors,
    paint(text: string, color: TextColor): string {
      if (!colors || text.length === 0) {
        return text;
      }
      return `${COLOR_CODES[color]}${text}${CLI_STYLES.RESET}`;
    },
  };
}

/**
 * Effective line width: the terminal width capped at `maxWidth`.
 *
 * @param columns - Terminal columns, if known.
 * @param maxWidth - Configured maximum.
 */
export function resolveLineWidth(columns: number | undefined, maxWidth: number): number {
  const width = columns !== undefined && columns > 0 ? Math.min(columns, maxWidth) : maxWidth;
  return Math.max(width, MIN_LINE_WIDTH);
}

/**
 * Collapses all whitespace (including newlines and tabs) into single spaces.
 *
 * @param text - Source text, usually an indented template literal.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Word-wraps `text` to `width` columns, breaking on spaces. Words longer
 * than the width are split.
 *
 * @param text - Prose to wrap; whitespace is collapsed first.
 * @param width - Maximum line length.
 * @returns The wrapped lines (one empty line for empty input).
 */
export function wrapText(text: string, width: number): string[] {
  const words = collapseWhitespace(text).split(' ').filter((word) => word.length > 0);
  const lines: string[] = [];
  let current = '';

  for (const word of words) {
    let remaining = word;
    while (remaining.length > width) {
      if (current.length > 0) {
        lines.push(current);
        current = '';
      }
      lines.push(remaining.slice(0, width));
      remaining = remaining.slice(width);
    }
    if (remaining.length === 0) {
      continue;
    }
    if (current.length === 0) {
      current = remaining;
    } else if (current.length + 1 + remaining.length <= width) {
      current = `${current} ${remaining}`;
    } else {
      lines.push(current);
      current = remaining;
    }
  }

  if (current.length > 0 || lines.length === 0) {
    lines.push(current);
  }
  return lines;
}

/**
 * Formats a bulleted paragraph with a hanging indent.
 *
 * @param text - Bullet text.
 * @param marker - Bullet marker, e.g. `*`, `#` or `Status:`.
 * @param width - Total line width.
 */
export function formatBullet(text: string, marker: string, width: number): string[] {
  const prefix = `${marker} `;
  const indent = ' '.repeat(prefix.length);
  const wrapped = wrapText(text, Math.max(width - prefix.length, 1));
  return wrapped.map((line, index) => (index === 0 ? prefix : indent) + line);
}

/**
 * Centers `text` in `width` by repeatedly adding `pad` on both sides, then
 * trimming from the right.
 *
 * @param text - Text to center.
 * @param width - Target width.
 * @param pad - Pad string (usually one character).
 */
export function centerText(text: string, width: number, pad: string): string {
  if (pad.length === 0) {
    return text;
  }
  let result = text;
  while (result.length < width) {
    result = `${pad}${result}${pad}`;
  }
  return result.slice(0, Math.max(width, 0));
}

/**
 * Formats the banner printed before a step runs.
 *
 * @param name - Step name.
 * @param pad - Pad character for the banner weight.
 * @param width - Line width.
 */
export function formatBanner(name: string, pad: string, width: number): string {
  return centerText(` ${name} `, width, pad);
}

/**
 * Prompt suffix for a yes/no question.
 *
 * @param defaultChoice - The default answer, if any.
 */
export function yesNoSuffix(defaultChoice: 'yes' | 'no' | undefined): string {
  switch (defaultChoice) {
    case 'yes':
      return '[Y/n]';
    case 'no':
      return '[y/N]';
    default:
      return '[y/n]';
  }
}
