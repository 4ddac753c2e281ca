/**
 * Display color and run/skip policy for step statuses.
 *
 * Both are pure functions of the status code.
 *
 * @packageDocumentation
 */

import type { Step, StatusCode } from './types.js';

/**
 * Color used to print a status message.
 */
export type StatusColor = 'green' | 'red' | 'yellow';

/**
 * What the runner does with a probed leaf.
 */
export type StepDecision = 'run' | 'skip';

/**
 * Visual weight of a step banner.
 */
export type BannerWeight = 'heavy' | 'medium' | 'light';

/**
 * Maps a status to its display color.
 *
 * @param status - The probed status.
 */
export function statusColor(status: StatusCode): StatusColor {
  switch (status) {
    case 'Done':
    case 'Informational':
      return 'green';
    case 'NotDone':
      return 'red';
    case 'UnknownPersistenceDisabled':
    case 'NeverRun':
    case 'Inapplicable':
      return 'yellow';
  }
}

/**
 * Whether a status can never lead to running the body, even in force-run
 * mode. The runner propagates such a status as is.
 *
 * @param status - The probed status.
 */
export function isTerminalStatus(status: StatusCode): boolean {
  return status === 'Inapplicable' || status === 'Informational';
}

/**
 * Decides whether a leaf's body runs.
 *
 * Ambiguous statuses (`UnknownPersistenceDisabled`, `NeverRun`) always run.
 *
 * @param status - The probed status.
 * @param forceRun - Whether `--no-skip-completed` is active.
 */
export function decideAction(status: StatusCode, forceRun: boolean): StepDecision {
  if (isTerminalStatus(status)) {
    return 'skip';
  }
  if (status === 'Done' && !forceRun) {
    return 'skip';
  }
  return 'run';
}

/**
 * Banner weight for a step at `depth` (0 for a stage's top-level steps).
 *
 * @param step - The step.
 * @param depth - Depth below the stage.
 */
export function bannerWeight(step: Step, depth: number): BannerWeight {
  if (step.kind === 'Leaf') {
    return 'light';
  }
  return depth === 0 ? 'heavy' : 'medium';
}

/**
 * Pad character drawn around a banner of the given weight.
 *
 * @param weight - The banner weight.
 */
export function bannerPad(weight: BannerWeight): string {
  switch (weight) {
    case 'heavy':
      return '#';
    case 'medium':
      return '=';
    case 'light':
      return '-';
  }
}
