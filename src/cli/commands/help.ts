/**
 * Usage text.
 */

import { FORCE_RUN_FLAG } from '../args.js';

/**
 * Stage listed in the usage text.
 */
export interface StageUsage {
  readonly name: string;
  readonly description: string;
}

/**
 * Formats the usage text.
 *
 * @param stages - Stages in display order.
 */
export function formatUsage(stages: readonly StageUsage[]): string {
  const nameWidth = Math.max(...stages.map((stage) => stage.name.length));
  const stageLines = stages.map(
    (stage) => `  ${stage.name.padEnd(nameWidth)}  ${stage.description}`
  );

  return [
    'USAGE:',
    '  stepstone <stage> [options]',
    '',
    'STAGES:',
    ...stageLines,
    '',
    'OPTIONS:',
    `  ${FORCE_RUN_FLAG}  Run every step, including those already complete`,
    '  -h, --help           Show this help message',
    '  --version            Show version information',
  ].join('\n');
}
