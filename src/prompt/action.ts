/**
 * Proposed shell commands.
 *
 * A proposed action is a command template with `{name}` placeholders and
 * the arguments to substitute. Arguments are shell-quoted when rendered,
 * so operator input becomes a single word on the command line.
 *
 * @packageDocumentation
 */

import { ProposedActionError } from './errors.js';
import type { ProposedAction } from './types.js';

const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;
const SAFE_WORD_PATTERN = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Creates a proposed action.
 *
 * @param template - Command template, e.g. `loadkeys {layout}`.
 * @param args - Values for the template's placeholders.
 *
 * @example
 * ```typescript
 * renderAction(proposeCommand('ln -sf {zone} {link}', { zone: '/usr/share/zoneinfo/UTC', link: '/etc/localtime' }));
 * // => "ln -sf /usr/share/zoneinfo/UTC /etc/localtime"
 * ```
 */
export function proposeCommand(
  template: string,
  args: Readonly<Record<string, string>> = {}
): ProposedAction {
  return { template, args };
}

/**
 * Quotes a value for POSIX shells. Values made only of safe characters are
 * returned unchanged.
 *
 * @param value - The raw argument.
 */
export function shellQuote(value: string): string {
  if (value.length === 0) {
    return "''";
  }
  if (SAFE_WORD_PATTERN.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Renders a proposed action into the command line shown to the operator.
 *
 * @param action - The proposed action.
 * @throws {ProposedActionError} If a placeholder has no argument.
 */
export function renderAction(action: ProposedAction): string {
  return action.template.replace(PLACEHOLDER_PATTERN, (_match, name: string) => {
    const value = Object.prototype.hasOwnProperty.call(action.args, name)
      ? action.args[name]
      : undefined;
    if (value === undefined) {
      throw new ProposedActionError(action.template, name);
    }
    return shellQuote(value);
  });
}
